import { z } from 'zod';
import { APPOINTMENT_STATUSES } from '../types';
import { choiceErrors, dateTimeField, idField, optionalText, requiredText } from './fields';

const nullableId = z.union([idField, z.null(), z.literal('').transform(() => null)]).optional();

export const appointmentSchema = z.object({
    title: requiredText(200),
    description: optionalText(),
    start_time: dateTimeField,
    end_time: dateTimeField,
    status: z.enum(APPOINTMENT_STATUSES, choiceErrors).optional(),
    location: optionalText(255),
    notes: optionalText(),
    client: nullableId,
    case: nullableId,
});

export const appointmentPatchSchema = appointmentSchema.partial();

export type AppointmentCreateInput = z.output<typeof appointmentSchema>;
export type AppointmentInput = z.output<typeof appointmentPatchSchema>;
