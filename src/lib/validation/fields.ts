import { z } from 'zod';

export const REQUIRED = 'This field is required.';
export const BLANK = 'This field may not be blank.';

const tooLong = (max: number) => `Ensure this field has no more than ${max} characters.`;

export function requiredText(max?: number) {
    const base = z.string({ required_error: REQUIRED, invalid_type_error: 'Not a valid string.' }).trim().min(1, BLANK);
    return max === undefined ? base : base.max(max, tooLong(max));
}

/** Optional free text; `null` is read as empty. */
export function optionalText(max?: number) {
    const base = z.string({ invalid_type_error: 'Not a valid string.' }).trim();
    const bounded = max === undefined ? base : base.max(max, tooLong(max));
    return z.union([bounded, z.null().transform(() => '')]).optional();
}

export const idField = z.string({ required_error: REQUIRED, invalid_type_error: 'Incorrect type. Expected pk value.' }).trim().min(1, BLANK);

export const dateField = z
    .string({ required_error: REQUIRED })
    .date('Date has wrong format. Use one of these formats instead: YYYY-MM-DD.');

export const nullableDate = z.union([dateField, z.null(), z.literal('').transform(() => null)]).optional();

/** ISO 8601 timestamp; one without an offset is read as server-local time. */
export const dateTimeField = z
    .string({ required_error: REQUIRED })
    .datetime({ offset: true, local: true, message: 'Datetime has wrong format. Use one of these formats instead: YYYY-MM-DDThh:mm[:ss[.uuuuuu]][+HH:MM|-HH:MM|Z].' })
    .transform((value) => new Date(value).toISOString());

export const emailField = z
    .string({ required_error: REQUIRED })
    .trim()
    .toLowerCase()
    .email('Enter a valid email address.')
    .max(254, tooLong(254));

/** Optional email; blank and null both store as null. */
export const nullableEmail = z
    .union([emailField, z.null(), z.literal('').transform(() => null)])
    .optional();

/** Error messages for `z.enum` fields. */
export const choiceErrors: { errorMap: z.ZodErrorMap } = {
    errorMap: (_issue, ctx) => ({
        message: ctx.data === undefined ? REQUIRED : `"${String(ctx.data)}" is not a valid choice.`,
    }),
};

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;
const NOT_A_NUMBER = 'A valid number is required.';

/** Number given as JSON number or numeric string. */
export function decimal(bounds: { min?: number; max?: number } = {}) {
    let target = z.number({ invalid_type_error: NOT_A_NUMBER }).finite(NOT_A_NUMBER);
    if (bounds.min !== undefined) {
        target = target.min(bounds.min, `Ensure this value is greater than or equal to ${bounds.min}.`);
    }
    if (bounds.max !== undefined) {
        target = target.max(bounds.max, `Ensure this value is less than or equal to ${bounds.max}.`);
    }
    return z
        .union([z.number(), z.string().trim().regex(DECIMAL_PATTERN, NOT_A_NUMBER).transform(Number)], {
            errorMap: (_issue, ctx) => ({ message: ctx.data === undefined ? REQUIRED : NOT_A_NUMBER }),
        })
        .pipe(target);
}

export const passwordField = z
    .string({ required_error: REQUIRED })
    .min(8, 'This password is too short. It must contain at least 8 characters.');
