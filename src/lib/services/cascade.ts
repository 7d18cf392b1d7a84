import fs from 'fs';
import type { Db } from '../database';
import type { ClientDocument } from '../types';

// lowdb has no foreign keys; these helpers apply the delete policy by hand.
// None of them write: callers persist once after the whole cascade.

async function removeStoredFiles(documents: ClientDocument[]) {
    for (const doc of documents) {
        try {
            await fs.promises.rm(doc.path, { force: true });
        } catch (error) {
            console.warn(`[cascade] Could not remove ${doc.path}:`, error);
        }
    }
}

export function deleteInvoiceRows(db: Db, invoiceId: string) {
    db.data.invoices = db.data.invoices.filter((i) => i.id !== invoiceId);
    db.data.invoice_items = db.data.invoice_items.filter((i) => i.invoice_id !== invoiceId);
}

export function deleteCaseRows(db: Db, caseId: string) {
    db.data.cases = db.data.cases.filter((c) => c.id !== caseId);
    db.data.case_notes = db.data.case_notes.filter((n) => n.case_id !== caseId);

    for (const invoice of db.data.invoices) {
        if (invoice.case_id === caseId) invoice.case_id = null;
    }
    for (const appointment of db.data.appointments) {
        if (appointment.case_id === caseId) appointment.case_id = null;
    }
}

export async function deleteClientRows(db: Db, clientId: string) {
    const documents = db.data.client_documents.filter((d) => d.client_id === clientId);

    db.data.clients = db.data.clients.filter((c) => c.id !== clientId);
    db.data.client_notes = db.data.client_notes.filter((n) => n.client_id !== clientId);
    db.data.client_documents = db.data.client_documents.filter((d) => d.client_id !== clientId);

    for (const item of db.data.cases.filter((c) => c.client_id === clientId)) {
        deleteCaseRows(db, item.id);
    }
    for (const invoice of db.data.invoices.filter((i) => i.client_id === clientId)) {
        deleteInvoiceRows(db, invoice.id);
    }
    for (const appointment of db.data.appointments) {
        if (appointment.client_id === clientId) appointment.client_id = null;
    }

    await removeStoredFiles(documents);
}

export async function deleteUserRows(db: Db, userId: string) {
    for (const client of db.data.clients.filter((c) => c.created_by === userId)) {
        await deleteClientRows(db, client.id);
    }

    db.data.users = db.data.users.filter((u) => u.id !== userId);
    db.data.appointments = db.data.appointments.filter((a) => a.user_id !== userId);
    db.data.dashboard_stats = db.data.dashboard_stats.filter((s) => s.user_id !== userId);
    db.data.recent_activities = db.data.recent_activities.filter((a) => a.user_id !== userId);

    for (const item of db.data.cases) {
        if (item.created_by === userId) item.created_by = null;
        item.assigned_to = item.assigned_to.filter((id) => id !== userId);
    }
    for (const note of db.data.case_notes) {
        if (note.author === userId) note.author = null;
    }
    for (const note of db.data.client_notes) {
        if (note.created_by === userId) note.created_by = null;
    }
    for (const doc of db.data.client_documents) {
        if (doc.uploaded_by === userId) doc.uploaded_by = null;
    }
    for (const invoice of db.data.invoices) {
        if (invoice.created_by === userId) invoice.created_by = null;
    }
}
