import { z } from 'zod';
import { CASE_STATUSES } from '../types';
import { choiceErrors, idField, optionalText, requiredText } from './fields';

export const caseSchema = z.object({
    title: requiredText(200),
    description: optionalText(),
    client: idField,
    status: z.enum(CASE_STATUSES, choiceErrors).optional(),
    assigned_to: z.array(idField, { invalid_type_error: 'Expected a list of items.' }).optional(),
});

export const casePatchSchema = caseSchema.partial();

export const caseNoteSchema = z.object({
    content: requiredText(),
});

export type CaseCreateInput = z.output<typeof caseSchema>;
export type CaseInput = z.output<typeof casePatchSchema>;
