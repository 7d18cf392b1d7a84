import type { Db } from './database';
import type {
    Appointment, Case, CaseNote, Client, ClientDocument, ClientNote, DashboardStats,
    Invoice, InvoiceItem, RecentActivity, User,
} from './types';
import type {
    AppointmentDto, AppointmentSummaryDto, CaseDto, CaseNoteDto, ClientDocumentDto, ClientDto,
    ClientNoteDto, ClientSummaryDto, DashboardStatsDto, InvoiceDto, InvoiceItemDto, ProfileDto,
    RecentActivityDto, UserDto, UserSummaryDto,
} from './api-types';
import { APPOINTMENT_STATUS_LABELS, CASE_STATUS_LABELS, INVOICE_STATUS_LABELS, fullName } from './labels';

const byNewest = (a: { created_at: string }, b: { created_at: string }) => b.created_at.localeCompare(a.created_at);

function findUser(db: Db, id: string | null) {
    return id ? db.data.users.find((u) => u.id === id) ?? null : null;
}

export function serializeUserSummary(user: User): UserSummaryDto {
    return {
        id: user.id,
        email: user.email,
        first_name: user.first_name,
        last_name: user.last_name,
        full_name: fullName(user),
    };
}

export function serializeUser(user: User): UserDto {
    return {
        ...serializeUserSummary(user),
        user_type: user.user_type,
        phone: user.phone,
        address: user.address,
        date_of_birth: user.date_of_birth,
        is_active: user.is_active,
        is_staff: user.is_staff,
        date_joined: user.date_joined,
        last_login: user.last_login,
    };
}

export function serializeProfile(user: User): ProfileDto {
    return {
        ...serializeUserSummary(user),
        user_type: user.user_type,
        phone: user.phone,
        address: user.address,
        date_of_birth: user.date_of_birth,
    };
}

export function serializeClient(client: Client): ClientDto {
    const { created_by: _owner, ...fields } = client;
    return { ...fields, full_name: fullName(client) };
}

export function serializeClientSummary(client: Client): ClientSummaryDto {
    return {
        id: client.id,
        first_name: client.first_name,
        last_name: client.last_name,
        email: client.email,
        phone: client.phone,
    };
}

export function serializeClientNote(db: Db, note: ClientNote): ClientNoteDto {
    const author = findUser(db, note.created_by);
    return {
        id: note.id,
        client: note.client_id,
        title: note.title,
        content: note.content,
        created_by: author ? serializeUserSummary(author) : null,
        created_at: note.created_at,
        updated_at: note.updated_at,
    };
}

export function documentDownloadPath(doc: ClientDocument) {
    return `/api/clients/${doc.client_id}/documents/${doc.id}/download/`;
}

export function serializeClientDocument(db: Db, doc: ClientDocument): ClientDocumentDto {
    const uploader = findUser(db, doc.uploaded_by);
    return {
        id: doc.id,
        client: doc.client_id,
        title: doc.title,
        description: doc.description,
        document_type: doc.document_type,
        document: documentDownloadPath(doc),
        file_name: doc.file_name,
        mime_type: doc.mime_type,
        size: doc.size,
        uploaded_by: uploader ? serializeUserSummary(uploader) : null,
        uploaded_at: doc.uploaded_at,
    };
}

export function serializeCaseNote(db: Db, note: CaseNote): CaseNoteDto {
    const author = findUser(db, note.author);
    return {
        id: note.id,
        content: note.content,
        author: note.author,
        author_name: author ? fullName(author) : null,
        created_at: note.created_at,
        updated_at: note.updated_at,
    };
}

export function serializeCase(db: Db, item: Case): CaseDto {
    const client = db.data.clients.find((c) => c.id === item.client_id);
    const creator = findUser(db, item.created_by);
    const assignees = item.assigned_to
        .map((id) => findUser(db, id))
        .filter((u): u is User => u !== null);

    return {
        id: item.id,
        title: item.title,
        description: item.description,
        client: item.client_id,
        client_name: client ? fullName(client) : null,
        status: item.status,
        status_display: CASE_STATUS_LABELS[item.status],
        created_by: item.created_by,
        created_by_name: creator ? fullName(creator) : null,
        assigned_to: [...item.assigned_to],
        assigned_to_names: assignees.map(fullName),
        notes: db.data.case_notes
            .filter((n) => n.case_id === item.id)
            .sort(byNewest)
            .map((n) => serializeCaseNote(db, n)),
        created_at: item.created_at,
        updated_at: item.updated_at,
        closed_at: item.closed_at,
    };
}

export function serializeAppointment(db: Db, appointment: Appointment): AppointmentDto {
    const client = appointment.client_id ? db.data.clients.find((c) => c.id === appointment.client_id) : undefined;
    return {
        id: appointment.id,
        user: appointment.user_id,
        client: appointment.client_id,
        client_name: client ? fullName(client) : null,
        case: appointment.case_id,
        title: appointment.title,
        description: appointment.description,
        start_time: appointment.start_time,
        end_time: appointment.end_time,
        status: appointment.status,
        status_display: APPOINTMENT_STATUS_LABELS[appointment.status],
        location: appointment.location,
        notes: appointment.notes,
        created_at: appointment.created_at,
        updated_at: appointment.updated_at,
    };
}

export function serializeAppointmentSummary(db: Db, appointment: Appointment): AppointmentSummaryDto {
    const client = appointment.client_id ? db.data.clients.find((c) => c.id === appointment.client_id) : undefined;
    return {
        id: appointment.id,
        title: appointment.title,
        start_time: appointment.start_time,
        end_time: appointment.end_time,
        status: appointment.status,
        client_name: client?.first_name ?? null,
        client_last_name: client?.last_name ?? null,
    };
}

export function serializeInvoiceItem(item: InvoiceItem): InvoiceItemDto {
    const { invoice_id: _invoice, ...fields } = item;
    return fields;
}

export function serializeInvoice(db: Db, invoice: Invoice): InvoiceDto {
    const client = db.data.clients.find((c) => c.id === invoice.client_id);
    const linkedCase = invoice.case_id ? db.data.cases.find((c) => c.id === invoice.case_id) : undefined;
    const creator = findUser(db, invoice.created_by);

    return {
        id: invoice.id,
        invoice_number: invoice.invoice_number,
        client: invoice.client_id,
        client_name: client ? fullName(client) : null,
        case: invoice.case_id,
        case_title: linkedCase?.title ?? null,
        issue_date: invoice.issue_date,
        due_date: invoice.due_date,
        status: invoice.status,
        status_display: INVOICE_STATUS_LABELS[invoice.status],
        subtotal: invoice.subtotal,
        tax_amount: invoice.tax_amount,
        total: invoice.total,
        notes: invoice.notes,
        items: db.data.invoice_items
            .filter((i) => i.invoice_id === invoice.id)
            .sort((a, b) => a.created_at.localeCompare(b.created_at))
            .map(serializeInvoiceItem),
        created_by: invoice.created_by,
        created_by_name: creator ? fullName(creator) : null,
        created_at: invoice.created_at,
        updated_at: invoice.updated_at,
        paid_at: invoice.paid_at,
    };
}

export function serializeActivity(activity: RecentActivity): RecentActivityDto {
    const { user_id, ...fields } = activity;
    return { ...fields, user: user_id };
}

export function serializeDashboardStats(stats: DashboardStats): DashboardStatsDto {
    const { user_id, ...fields } = stats;
    return { ...fields, user: user_id };
}
