import type { AppointmentStatus, CaseStatus, InvoiceStatus, UserType } from './types';

export const CASE_STATUS_LABELS: Record<CaseStatus, string> = {
    open: 'Open',
    in_progress: 'In Progress',
    pending: 'Pending',
    closed: 'Closed',
};

export const APPOINTMENT_STATUS_LABELS: Record<AppointmentStatus, string> = {
    scheduled: 'Scheduled',
    confirmed: 'Confirmed',
    cancelled: 'Cancelled',
    completed: 'Completed',
};

export const INVOICE_STATUS_LABELS: Record<InvoiceStatus, string> = {
    draft: 'Draft',
    sent: 'Sent',
    paid: 'Paid',
    overdue: 'Overdue',
    cancelled: 'Cancelled',
};

export const USER_TYPE_LABELS: Record<UserType, string> = {
    admin: 'Admin',
    lawyer: 'Lawyer',
    paralegal: 'Paralegal',
};

export function fullName(person: { first_name: string; last_name: string }) {
    return `${person.first_name} ${person.last_name}`.trim();
}
