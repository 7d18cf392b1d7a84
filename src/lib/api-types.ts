// Wire shapes returned by /api. Shared by the route serializers and the front-end API client.
import type {
    ActivityType, AppointmentStatus, CaseStatus, InvoiceStatus, UserType,
} from './types';
import type { z } from 'zod';
import type {
    changePasswordSchema, loginSchema, profileSchema, registerSchema,
} from './validation/auth';
import type { clientNoteSchema, clientSchema, documentFieldsSchema } from './validation/clients';
import type { caseNoteSchema, caseSchema } from './validation/cases';
import type { appointmentSchema } from './validation/appointments';
import type { invoiceItemSchema, invoiceSchema } from './validation/invoices';
import type { activitySchema } from './validation/dashboard';

export type { ActivityType, AppointmentStatus, CaseStatus, InvoiceStatus, UserType };
export type { Page } from './pagination';

export interface UserSummaryDto {
    id: string;
    email: string;
    first_name: string;
    last_name: string;
    full_name: string;
}

export interface UserDto extends UserSummaryDto {
    user_type: UserType;
    phone: string;
    address: string;
    date_of_birth: string | null;
    is_active: boolean;
    is_staff: boolean;
    date_joined: string;
    last_login: string | null;
}

export interface ProfileDto extends UserSummaryDto {
    user_type: UserType;
    phone: string;
    address: string;
    date_of_birth: string | null;
}

export interface TokenPairDto {
    access: string;
    refresh: string;
}

export interface LoginResponseDto extends TokenPairDto {
    user: UserDto;
}

export interface ClientDto {
    id: string;
    first_name: string;
    last_name: string;
    full_name: string;
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
    created_at: string;
    updated_at: string;
}

export interface ClientNoteDto {
    id: string;
    client: string;
    title: string;
    content: string;
    created_by: UserSummaryDto | null;
    created_at: string;
    updated_at: string;
}

export interface ClientDocumentDto {
    id: string;
    client: string;
    title: string;
    description: string;
    document_type: string;
    document: string;
    file_name: string;
    mime_type: string;
    size: number;
    uploaded_by: UserSummaryDto | null;
    uploaded_at: string;
}

export interface CityCountDto {
    city: string;
    count: number;
}

export interface ClientStatsDto {
    total_clients: number;
    active_clients: number;
    inactive_clients: number;
    new_clients_this_month: number;
    top_cities: CityCountDto[];
}

export interface NotesSummaryDto {
    client: string;
    client_name: string;
    total_notes: number;
    latest_note_at: string | null;
    recent_notes: ClientNoteDto[];
}

export interface CaseNoteDto {
    id: string;
    content: string;
    author: string | null;
    author_name: string | null;
    created_at: string;
    updated_at: string;
}

export interface CaseDto {
    id: string;
    title: string;
    description: string;
    client: string;
    client_name: string | null;
    status: CaseStatus;
    status_display: string;
    created_by: string | null;
    created_by_name: string | null;
    assigned_to: string[];
    assigned_to_names: string[];
    notes: CaseNoteDto[];
    created_at: string;
    updated_at: string;
    closed_at: string | null;
}

export interface AppointmentDto {
    id: string;
    user: string;
    client: string | null;
    client_name: string | null;
    case: string | null;
    title: string;
    description: string;
    start_time: string;
    end_time: string;
    status: AppointmentStatus;
    status_display: string;
    location: string;
    notes: string;
    created_at: string;
    updated_at: string;
}

export interface CalendarEntryDto {
    id: string;
    title: string;
    start: string;
    end: string;
    status: AppointmentStatus;
    client_name: string;
    location: string;
    description: string;
}

export interface AppointmentStatsDto {
    total: number;
    today: number;
    upcoming: number;
    completed: number;
    active_clients: number;
    total_revenue: number;
}

export interface InvoiceItemDto {
    id: string;
    description: string;
    quantity: number;
    unit_price: number;
    tax_rate: number;
    amount: number;
    created_at: string;
    updated_at: string;
}

export interface InvoiceDto {
    id: string;
    invoice_number: string;
    client: string;
    client_name: string | null;
    case: string | null;
    case_title: string | null;
    issue_date: string;
    due_date: string;
    status: InvoiceStatus;
    status_display: string;
    subtotal: number;
    tax_amount: number;
    total: number;
    notes: string;
    items: InvoiceItemDto[];
    created_by: string | null;
    created_by_name: string | null;
    created_at: string;
    updated_at: string;
    paid_at: string | null;
}

export interface RecentActivityDto {
    id: string;
    user: string;
    action_type: ActivityType;
    description: string;
    related_object_id: string | null;
    created_at: string;
}

export interface DashboardStatsDto {
    id: string;
    user: string;
    stat_date: string;
    total_clients: number;
    total_appointments: number;
    upcoming_appointments: number;
    completed_appointments: number;
    cancelled_appointments: number;
    new_clients_this_month: number;
    revenue_this_month: number;
}

export interface ClientSummaryDto {
    id: string;
    first_name: string;
    last_name: string;
    email: string | null;
    phone: string;
}

export interface AppointmentSummaryDto {
    id: string;
    title: string;
    start_time: string;
    end_time: string;
    status: AppointmentStatus;
    client_name: string | null;
    client_last_name: string | null;
}

export interface DashboardDto {
    total_clients: number;
    total_appointments: number;
    upcoming_appointments: number;
    completed_appointments: number;
    cancelled_appointments: number;
    new_clients_this_month: number;
    recent_clients: ClientSummaryDto[];
    upcoming_appointments_list: AppointmentSummaryDto[];
    recent_activities: RecentActivityDto[];
    user_info: ProfileDto;
}

export interface ActivityChartPointDto {
    day: string;
    total: number;
    completed: number;
    cancelled: number;
}

export interface ClientGrowthPointDto {
    day: string;
    new_clients: number;
}

export interface StatusMessageDto {
    status: string;
}

export interface HealthDto {
    status: 'healthy';
    service: string;
    version: string;
}

/** 400 body: field name → messages. */
export type FieldErrorsDto = Record<string, string[]>;

// Request payloads accepted by the write endpoints, taken from the server's schemas.
export type LoginPayload = z.input<typeof loginSchema>;
export type RegisterPayload = z.input<typeof registerSchema>;
export type ProfilePayload = z.input<typeof profileSchema>;
export type ChangePasswordPayload = z.input<typeof changePasswordSchema>;
export type ClientPayload = z.input<typeof clientSchema>;
export type ClientNotePayload = z.input<typeof clientNoteSchema>;
export type DocumentFieldsPayload = z.input<typeof documentFieldsSchema>;
export type CasePayload = z.input<typeof caseSchema>;
export type CaseNotePayload = z.input<typeof caseNoteSchema>;
export type AppointmentPayload = z.input<typeof appointmentSchema>;
export type InvoiceItemPayload = z.input<typeof invoiceItemSchema>;
export type InvoicePayload = z.input<typeof invoiceSchema>;
export type ActivityPayload = z.input<typeof activitySchema>;
