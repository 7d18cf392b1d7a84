import bcrypt from 'bcryptjs';

const SALT_ROUNDS = 10;

export function hashPassword(password: string): Promise<string> {
    return bcrypt.hash(password, SALT_ROUNDS);
}

export async function verifyPassword(password: string, hash: string | undefined | null): Promise<boolean> {
    if (!hash) return false;
    return bcrypt.compare(password, hash);
}
