import { z } from 'zod';
import { INVOICE_STATUSES } from '../types';
import { choiceErrors, dateField, decimal, idField, optionalText, requiredText } from './fields';

export const invoiceItemSchema = z.object({
    description: requiredText(200),
    quantity: decimal({ min: 0.01 }),
    unit_price: decimal({ min: 0 }),
    tax_rate: decimal({ min: 0, max: 100 }).optional(),
});

export const invoiceSchema = z.object({
    invoice_number: optionalText(50),
    client: idField,
    case: z.union([idField, z.null(), z.literal('').transform(() => null)]).optional(),
    issue_date: dateField.optional(),
    due_date: dateField,
    status: z.enum(INVOICE_STATUSES, choiceErrors).optional(),
    notes: optionalText(),
    items: z.array(invoiceItemSchema, { invalid_type_error: 'Expected a list of items.' }).optional(),
});

export const invoicePatchSchema = invoiceSchema.partial();

export type InvoiceItemInput = z.output<typeof invoiceItemSchema>;
export type InvoiceCreateInput = z.output<typeof invoiceSchema>;
export type InvoiceInput = z.output<typeof invoicePatchSchema>;
