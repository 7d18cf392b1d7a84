import { z } from 'zod';
import { nullableDate, nullableEmail, optionalText, requiredText } from './fields';

export const clientSchema = z.object({
    first_name: requiredText(150),
    last_name: requiredText(150),
    email: nullableEmail,
    phone: optionalText(20),
    address: optionalText(),
    city: optionalText(100),
    state: optionalText(100),
    postal_code: optionalText(20),
    country: optionalText(100),
    date_of_birth: nullableDate,
    occupation: optionalText(100),
    company: optionalText(200),
    is_active: z.boolean({ invalid_type_error: 'Must be a valid boolean.' }).optional(),
});

export const clientPatchSchema = clientSchema.partial();

export const clientNoteSchema = z.object({
    title: requiredText(200),
    content: requiredText(),
});

export const clientNotePatchSchema = clientNoteSchema.partial();

export const documentFieldsSchema = z.object({
    title: optionalText(200),
    description: optionalText(),
    document_type: optionalText(50),
});

export type ClientCreateInput = z.output<typeof clientSchema>;
export type ClientInput = z.output<typeof clientPatchSchema>;
export type ClientNoteCreateInput = z.output<typeof clientNoteSchema>;
export type ClientNoteInput = z.output<typeof clientNotePatchSchema>;
export type DocumentFieldsInput = z.output<typeof documentFieldsSchema>;
