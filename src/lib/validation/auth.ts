import { z } from 'zod';
import { SELF_SERVICE_USER_TYPES, USER_TYPES } from '../types';
import {
    REQUIRED, choiceErrors, emailField, nullableDate, optionalText, passwordField, requiredText,
} from './fields';

export const loginSchema = z.object({
    email: z.string({ required_error: REQUIRED }).trim().min(1, 'This field may not be blank.'),
    password: z.string({ required_error: REQUIRED }).min(1, 'This field may not be blank.'),
});

export const refreshSchema = z.object({
    refresh: z.string({ required_error: REQUIRED }).min(1, 'This field may not be blank.'),
});

export const verifySchema = z.object({
    token: z.string({ required_error: REQUIRED }).min(1, 'This field may not be blank.'),
});

export const registerSchema = z
    .object({
        email: emailField,
        password: passwordField,
        password2: z.string({ required_error: REQUIRED }),
        first_name: requiredText(150),
        last_name: requiredText(150),
        user_type: z.enum(SELF_SERVICE_USER_TYPES, choiceErrors).optional(),
    })
    .superRefine((data, ctx) => {
        if (data.password !== data.password2) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['password'], message: "Password fields didn't match." });
        }
    });

export const profileSchema = z.object({
    first_name: requiredText(150),
    last_name: requiredText(150),
    phone: optionalText(20),
    address: optionalText(),
    date_of_birth: nullableDate,
}).partial();

export const changePasswordSchema = z.object({
    old_password: z.string({ required_error: REQUIRED }),
    new_password: passwordField,
});

const userFields = {
    email: emailField,
    first_name: requiredText(150),
    last_name: requiredText(150),
    user_type: z.enum(USER_TYPES, choiceErrors),
    phone: optionalText(20),
    address: optionalText(),
    date_of_birth: nullableDate,
    is_active: z.boolean().optional(),
    is_staff: z.boolean().optional(),
};

export const userCreateSchema = z.object({
    ...userFields,
    user_type: userFields.user_type.optional(),
    password: passwordField,
});

export const userUpdateSchema = z.object({ ...userFields, password: passwordField }).partial();

export type RegisterInput = z.output<typeof registerSchema>;
export type ProfileInput = z.output<typeof profileSchema>;
export type UserCreateInput = z.output<typeof userCreateSchema>;
export type UserUpdateInput = z.output<typeof userUpdateSchema>;
