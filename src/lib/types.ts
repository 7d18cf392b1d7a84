// Persisted row shapes (server side).
// Wire shapes the API returns live in ./api-types so the front end never sees password hashes.

export const USER_TYPES = ['admin', 'lawyer', 'paralegal'] as const;
export type UserType = (typeof USER_TYPES)[number];

/** Roles anyone may pick when registering; admin accounts are made by an admin. */
export const SELF_SERVICE_USER_TYPES = ['lawyer', 'paralegal'] as const satisfies readonly UserType[];

export interface User {
    id: string;
    email: string;
    first_name: string;
    last_name: string;
    user_type: UserType;
    password_hash: string;
    phone: string;
    address: string;
    date_of_birth: string | null;
    is_active: boolean;
    is_staff: boolean;
    date_joined: string;
    last_login: string | null;
}

export interface Client {
    id: string;
    first_name: string;
    last_name: string;
    email: string | null;
    phone: string;
    address: string;
    city: string;
    state: string;
    postal_code: string;
    country: string;
    date_of_birth: string | null;
    occupation: string;
    company: string;
    is_active: boolean;
    created_by: string;
    created_at: string;
    updated_at: string;
}

export interface ClientNote {
    id: string;
    client_id: string;
    title: string;
    content: string;
    created_by: string | null;
    created_at: string;
    updated_at: string;
}

export interface ClientDocument {
    id: string;
    client_id: string;
    title: string;
    description: string;
    document_type: string;
    file_name: string;
    mime_type: string;
    size: number;
    path: string;
    uploaded_by: string | null;
    uploaded_at: string;
}

export const CASE_STATUSES = ['open', 'in_progress', 'pending', 'closed'] as const;
export type CaseStatus = (typeof CASE_STATUSES)[number];

export interface Case {
    id: string;
    title: string;
    description: string;
    client_id: string;
    status: CaseStatus;
    created_by: string | null;
    assigned_to: string[];
    created_at: string;
    updated_at: string;
    closed_at: string | null;
}

export interface CaseNote {
    id: string;
    case_id: string;
    author: string | null;
    content: string;
    created_at: string;
    updated_at: string;
}

export const APPOINTMENT_STATUSES = ['scheduled', 'confirmed', 'cancelled', 'completed'] as const;
export type AppointmentStatus = (typeof APPOINTMENT_STATUSES)[number];

export interface Appointment {
    id: string;
    user_id: string;
    client_id: string | null;
    case_id: string | null;
    title: string;
    description: string;
    start_time: string;
    end_time: string;
    status: AppointmentStatus;
    location: string;
    notes: string;
    created_at: string;
    updated_at: string;
}

export const INVOICE_STATUSES = ['draft', 'sent', 'paid', 'overdue', 'cancelled'] as const;
export type InvoiceStatus = (typeof INVOICE_STATUSES)[number];

export interface Invoice {
    id: string;
    invoice_number: string;
    client_id: string;
    case_id: string | null;
    issue_date: string;
    due_date: string;
    status: InvoiceStatus;
    subtotal: number;
    tax_amount: number;
    total: number;
    notes: string;
    created_by: string | null;
    created_at: string;
    updated_at: string;
    paid_at: string | null;
}

export interface InvoiceItem {
    id: string;
    invoice_id: string;
    description: string;
    quantity: number;
    unit_price: number;
    tax_rate: number;
    amount: number;
    created_at: string;
    updated_at: string;
}

export interface DashboardStats {
    id: string;
    user_id: string;
    stat_date: string;
    total_clients: number;
    total_appointments: number;
    upcoming_appointments: number;
    completed_appointments: number;
    cancelled_appointments: number;
    new_clients_this_month: number;
    revenue_this_month: number;
}

export const ACTIVITY_TYPES = [
    'client_created',
    'client_updated',
    'client_deleted',
    'appointment_created',
    'appointment_updated',
    'appointment_confirmed',
    'appointment_completed',
    'appointment_cancelled',
    'appointment_deleted',
    'case_created',
    'case_updated',
    'case_closed',
    'case_note_added',
    'case_deleted',
    'invoice_created',
    'invoice_updated',
    'invoice_sent',
    'invoice_paid',
    'invoice_deleted',
] as const;
export type ActivityType = (typeof ACTIVITY_TYPES)[number];

export interface RecentActivity {
    id: string;
    user_id: string;
    action_type: ActivityType;
    description: string;
    related_object_id: string | null;
    created_at: string;
}

export interface RevokedToken {
    jti: string;
    expires_at: string;
}

export interface DbSchema {
    users: User[];
    clients: Client[];
    client_notes: ClientNote[];
    client_documents: ClientDocument[];
    cases: Case[];
    case_notes: CaseNote[];
    appointments: Appointment[];
    invoices: Invoice[];
    invoice_items: InvoiceItem[];
    dashboard_stats: DashboardStats[];
    recent_activities: RecentActivity[];
    revoked_tokens: RevokedToken[];
}
