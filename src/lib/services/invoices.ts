import { format } from 'date-fns';
import { v4 as uuidv4 } from 'uuid';
import type { Db } from '../database';
import type { Invoice, InvoiceItem, InvoiceStatus, User } from '../types';
import { NotFoundError, ValidationError } from '../errors';
import type { InvoiceCreateInput, InvoiceInput, InvoiceItemInput } from '../validation/invoices';
import { computeTotals, lineAmount } from '../money';
import { recordActivity } from './activity';
import { deleteInvoiceRows } from './cascade';

export interface InvoiceFilters {
    status?: string;
    client?: string;
    case?: string;
}


export function listInvoices(db: Db, user: User, filters: InvoiceFilters = {}): Invoice[] {
    let invoices = db.data.invoices.filter((i) => i.created_by === user.id);

    if (filters.status) {
        invoices = invoices.filter((i) => i.status === filters.status);
    }
    if (filters.client) {
        invoices = invoices.filter((i) => i.client_id === filters.client);
    }
    if (filters.case) {
        invoices = invoices.filter((i) => i.case_id === filters.case);
    }

    return invoices.sort((a, b) =>
        b.issue_date.localeCompare(a.issue_date) || b.created_at.localeCompare(a.created_at));
}

export function getInvoice(db: Db, user: User, id: string): Invoice {
    const invoice = db.data.invoices.find((i) => i.id === id && i.created_by === user.id);
    if (!invoice) throw new NotFoundError();
    return invoice;
}

/** Next `INV-<year>-<seq>` number for the year of `now`, counting every user's invoices. */
export function generateInvoiceNumber(db: Db, now = new Date()) {
    const prefix = `INV-${format(now, 'yyyy')}-`;
    let highest = 0;
    for (const invoice of db.data.invoices) {
        if (!invoice.invoice_number.startsWith(prefix)) continue;
        const seq = Number.parseInt(invoice.invoice_number.slice(prefix.length), 10);
        if (Number.isFinite(seq) && seq > highest) highest = seq;
    }
    return `${prefix}${String(highest + 1).padStart(4, '0')}`;
}

function assertNumberAvailable(db: Db, invoiceNumber: string, exceptId?: string) {
    if (db.data.invoices.some((i) => i.id !== exceptId && i.invoice_number === invoiceNumber)) {
        throw ValidationError.field('invoice_number', 'invoice with this invoice number already exists.');
    }
}

function assertDueAfterIssue(issueDate: string, dueDate: string) {
    if (dueDate < issueDate) {
        throw ValidationError.field('due_date', 'Due date cannot be before the issue date.');
    }
}

function resolveClient(db: Db, user: User, clientId: string) {
    if (!db.data.clients.some((c) => c.id === clientId && c.created_by === user.id)) {
        throw ValidationError.field('client', `Invalid pk "${clientId}" - object does not exist.`);
    }
    return clientId;
}

function resolveCase(db: Db, user: User, caseId: string | null | undefined) {
    if (!caseId) return null;
    const visible = db.data.cases.some((c) =>
        c.id === caseId && (c.created_by === user.id || c.assigned_to.includes(user.id)));
    if (!visible) throw ValidationError.field('case', `Invalid pk "${caseId}" - object does not exist.`);
    return caseId;
}

function buildItems(invoiceId: string, items: InvoiceItemInput[], now: Date): InvoiceItem[] {
    const timestamp = now.toISOString();
    return items.map((item) => ({
        id: uuidv4(),
        invoice_id: invoiceId,
        description: item.description,
        quantity: item.quantity,
        unit_price: item.unit_price,
        tax_rate: item.tax_rate ?? 0,
        amount: lineAmount(item),
        created_at: timestamp,
        updated_at: timestamp,
    }));
}

/** Entering `paid` stamps paid_at; leaving it clears the stamp. */
export function applyInvoiceStatus(invoice: Invoice, status: InvoiceStatus, now: Date) {
    if (status === 'paid' && invoice.status !== 'paid') {
        invoice.paid_at = now.toISOString();
    } else if (status !== 'paid') {
        invoice.paid_at = null;
    }
    invoice.status = status;
}

export async function createInvoice(db: Db, user: User, input: InvoiceCreateInput, now = new Date()): Promise<Invoice> {
    const issueDate = input.issue_date ?? format(now, 'yyyy-MM-dd');
    assertDueAfterIssue(issueDate, input.due_date);

    const invoiceNumber = input.invoice_number || generateInvoiceNumber(db, now);
    assertNumberAvailable(db, invoiceNumber);

    const id = uuidv4();
    const items = buildItems(id, input.items ?? [], now);
    const timestamp = now.toISOString();
    const invoice: Invoice = {
        id,
        invoice_number: invoiceNumber,
        client_id: resolveClient(db, user, input.client),
        case_id: resolveCase(db, user, input.case),
        issue_date: issueDate,
        due_date: input.due_date,
        status: 'draft',
        ...computeTotals(items),
        notes: input.notes ?? '',
        created_by: user.id,
        created_at: timestamp,
        updated_at: timestamp,
        paid_at: null,
    };
    applyInvoiceStatus(invoice, input.status ?? 'draft', now);

    db.data.invoices.push(invoice);
    db.data.invoice_items.push(...items);
    recordActivity(db, user.id, 'invoice_created', `Created invoice ${invoice.invoice_number}`, invoice.id, now);
    await db.write();
    return invoice;
}

export async function updateInvoice(db: Db, user: User, invoice: Invoice, input: InvoiceInput, now = new Date()): Promise<Invoice> {
    assertDueAfterIssue(input.issue_date ?? invoice.issue_date, input.due_date ?? invoice.due_date);
    if (input.invoice_number) assertNumberAvailable(db, input.invoice_number, invoice.id);
    const clientId = input.client !== undefined ? resolveClient(db, user, input.client) : undefined;
    const caseId = input.case !== undefined ? resolveCase(db, user, input.case) : undefined;

    if (input.invoice_number) invoice.invoice_number = input.invoice_number;
    if (clientId !== undefined) invoice.client_id = clientId;
    if (caseId !== undefined) invoice.case_id = caseId;
    if (input.issue_date !== undefined) invoice.issue_date = input.issue_date;
    if (input.due_date !== undefined) invoice.due_date = input.due_date;
    if (input.notes !== undefined) invoice.notes = input.notes;
    if (input.status !== undefined) applyInvoiceStatus(invoice, input.status, now);

    if (input.items !== undefined) {
        const items = buildItems(invoice.id, input.items, now);
        db.data.invoice_items = db.data.invoice_items.filter((i) => i.invoice_id !== invoice.id);
        db.data.invoice_items.push(...items);
        Object.assign(invoice, computeTotals(items));
    }
    invoice.updated_at = now.toISOString();

    const paid = input.status === 'paid';
    recordActivity(db, user.id, paid ? 'invoice_paid' : 'invoice_updated',
        `${paid ? 'Marked paid' : 'Updated'} invoice ${invoice.invoice_number}`, invoice.id, now);
    await db.write();
    return invoice;
}

export function markInvoicePaid(db: Db, user: User, invoice: Invoice, now = new Date()) {
    return updateInvoice(db, user, invoice, { status: 'paid' }, now);
}

/** Moves a draft to `sent`; no message leaves the system. */
export async function sendInvoiceToClient(db: Db, user: User, invoice: Invoice, now = new Date()) {
    if (invoice.status === 'draft') {
        applyInvoiceStatus(invoice, 'sent', now);
        invoice.updated_at = now.toISOString();
    }
    recordActivity(db, user.id, 'invoice_sent', `Sent invoice ${invoice.invoice_number} to client`, invoice.id, now);
    await db.write();
    return invoice;
}

export async function deleteInvoice(db: Db, user: User, invoice: Invoice) {
    deleteInvoiceRows(db, invoice.id);
    recordActivity(db, user.id, 'invoice_deleted', `Deleted invoice ${invoice.invoice_number}`, invoice.id);
    await db.write();
}
