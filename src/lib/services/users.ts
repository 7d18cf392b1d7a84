import { v4 as uuidv4 } from 'uuid';
import type { Db } from '../database';
import type { User, UserType } from '../types';
import { AuthenticationError, NotFoundError, PermissionDeniedError, ValidationError } from '../errors';
import { hashPassword, verifyPassword } from '../auth/passwords';
import { issueTokenPair, type TokenPair } from '../auth/tokens';
import type { ProfileInput, RegisterInput, UserUpdateInput } from '../validation/auth';
import { deleteUserRows } from './cascade';

export const LOGIN_FAILED_MESSAGE = 'No active account found with the given credentials';

export function findUserByEmail(db: Db, email: string) {
    const needle = email.trim().toLowerCase();
    return db.data.users.find((u) => u.email.toLowerCase() === needle);
}

/** Administrative rights follow the staff flag, which only an admin can grant. */
export function isAdmin(user: User) {
    return user.is_active && user.is_staff;
}

export function requireAdmin(user: User) {
    if (!isAdmin(user)) throw new PermissionDeniedError();
}

function assertEmailAvailable(db: Db, email: string, exceptId?: string) {
    const existing = findUserByEmail(db, email);
    if (existing && existing.id !== exceptId) {
        throw ValidationError.field('email', 'user with this email already exists.');
    }
}

interface NewUserFields {
    email: string;
    password: string;
    first_name: string;
    last_name: string;
    user_type?: UserType;
    phone?: string;
    address?: string;
    date_of_birth?: string | null;
    is_active?: boolean;
    is_staff?: boolean;
}

export async function createUser(db: Db, fields: NewUserFields, now = new Date()): Promise<User> {
    assertEmailAvailable(db, fields.email);

    const userType = fields.user_type ?? 'lawyer';
    const user: User = {
        id: uuidv4(),
        email: fields.email.trim().toLowerCase(),
        first_name: fields.first_name,
        last_name: fields.last_name,
        user_type: userType,
        password_hash: await hashPassword(fields.password),
        phone: fields.phone ?? '',
        address: fields.address ?? '',
        date_of_birth: fields.date_of_birth ?? null,
        is_active: fields.is_active ?? true,
        is_staff: fields.is_staff ?? userType === 'admin',
        date_joined: now.toISOString(),
        last_login: null,
    };
    db.data.users.push(user);
    await db.write();
    console.info(`[auth] Created ${user.user_type} account ${user.email}`);
    return user;
}

/** Exchanges credentials for a token pair; unknown, inactive and wrong-password accounts fail alike. */
export async function login(db: Db, email: string, password: string, now = new Date()): Promise<{ user: User; tokens: TokenPair }> {
    const user = findUserByEmail(db, email);
    const valid = user !== undefined && await verifyPassword(password, user.password_hash);
    if (!user || !valid || !user.is_active) {
        console.warn(`[auth] Failed login for ${email}`);
        throw new AuthenticationError(LOGIN_FAILED_MESSAGE);
    }

    user.last_login = now.toISOString();
    await db.write();
    return { user, tokens: await issueTokenPair(user, now) };
}

export function register(db: Db, input: RegisterInput) {
    return createUser(db, {
        email: input.email,
        password: input.password,
        first_name: input.first_name,
        last_name: input.last_name,
        user_type: input.user_type,
        is_staff: false,
    });
}

export async function updateProfile(db: Db, user: User, input: ProfileInput) {
    if (input.first_name !== undefined) user.first_name = input.first_name;
    if (input.last_name !== undefined) user.last_name = input.last_name;
    if (input.phone !== undefined) user.phone = input.phone;
    if (input.address !== undefined) user.address = input.address;
    if (input.date_of_birth !== undefined) user.date_of_birth = input.date_of_birth;
    await db.write();
    return user;
}

export async function changePassword(db: Db, user: User, oldPassword: string, newPassword: string) {
    if (!(await verifyPassword(oldPassword, user.password_hash))) {
        throw ValidationError.field('old_password', 'Wrong password.');
    }
    user.password_hash = await hashPassword(newPassword);
    await db.write();
    console.info(`[auth] Password changed for user ${user.id}`);
}

export function listUsers(db: Db) {
    return [...db.data.users].sort((a, b) => a.email.localeCompare(b.email));
}

/** `me` resolves to the caller; non-admins may only reach their own record. */
export function getUserForCaller(db: Db, caller: User, id: string): User {
    const targetId = id === 'me' ? caller.id : id;
    if (targetId !== caller.id && !isAdmin(caller)) {
        throw new PermissionDeniedError();
    }
    const user = db.data.users.find((u) => u.id === targetId);
    if (!user) throw new NotFoundError();
    return user;
}

export async function updateUser(db: Db, caller: User, target: User, input: UserUpdateInput) {
    if (input.email !== undefined) {
        assertEmailAvailable(db, input.email, target.id);
        target.email = input.email;
    }
    if (input.first_name !== undefined) target.first_name = input.first_name;
    if (input.last_name !== undefined) target.last_name = input.last_name;
    if (input.phone !== undefined) target.phone = input.phone;
    if (input.address !== undefined) target.address = input.address;
    if (input.date_of_birth !== undefined) target.date_of_birth = input.date_of_birth;
    if (input.password !== undefined) target.password_hash = await hashPassword(input.password);

    // Role and account flags are administrative.
    if (isAdmin(caller)) {
        if (input.user_type !== undefined) {
            target.user_type = input.user_type;
            target.is_staff = input.is_staff ?? input.user_type === 'admin';
        } else if (input.is_staff !== undefined) {
            target.is_staff = input.is_staff;
        }
        if (input.is_active !== undefined) target.is_active = input.is_active;
    }

    await db.write();
    return target;
}

export async function deleteUser(db: Db, target: User) {
    await deleteUserRows(db, target.id);
    await db.write();
    console.info(`[auth] Deleted account ${target.email}`);
}
