import {
    APPOINTMENT_STATUS_LABELS, CASE_STATUS_LABELS, INVOICE_STATUS_LABELS,
} from '../labels';
import type { AppointmentStatus, CaseStatus, InvoiceStatus } from '../types';

export type StatusTone = 'blue' | 'green' | 'amber' | 'purple' | 'red' | 'gray';

export interface StatusView {
    label: string;
    tone: StatusTone;
    /** Tailwind classes for a badge in this tone. */
    className: string;
}

const TONE_CLASSES: Record<StatusTone, string> = {
    blue: 'bg-blue-100 text-blue-800 border-blue-200',
    green: 'bg-green-100 text-green-800 border-green-200',
    amber: 'bg-amber-100 text-amber-800 border-amber-200',
    purple: 'bg-purple-100 text-purple-800 border-purple-200',
    red: 'bg-red-100 text-red-800 border-red-200',
    gray: 'bg-gray-100 text-gray-700 border-gray-200',
};

const CASE_TONES: Record<CaseStatus, StatusTone> = {
    open: 'blue',
    in_progress: 'amber',
    pending: 'purple',
    closed: 'gray',
};

const APPOINTMENT_TONES: Record<AppointmentStatus, StatusTone> = {
    scheduled: 'blue',
    confirmed: 'green',
    cancelled: 'red',
    completed: 'gray',
};

const INVOICE_TONES: Record<InvoiceStatus, StatusTone> = {
    draft: 'gray',
    sent: 'blue',
    paid: 'green',
    overdue: 'red',
    cancelled: 'amber',
};

function view(label: string, tone: StatusTone): StatusView {
    return { label, tone, className: TONE_CLASSES[tone] };
}

export function caseStatusView(status: CaseStatus): StatusView {
    return view(CASE_STATUS_LABELS[status], CASE_TONES[status]);
}

export function appointmentStatusView(status: AppointmentStatus): StatusView {
    return view(APPOINTMENT_STATUS_LABELS[status], APPOINTMENT_TONES[status]);
}

export function invoiceStatusView(status: InvoiceStatus): StatusView {
    return view(INVOICE_STATUS_LABELS[status], INVOICE_TONES[status]);
}

/** Sent invoices past their due date read as overdue even before anyone flips the status. */
export function isInvoiceOverdue(invoice: { status: InvoiceStatus; due_date: string }, today: string): boolean {
    return invoice.status === 'overdue' || (invoice.status === 'sent' && invoice.due_date < today);
}
