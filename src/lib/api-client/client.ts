import { getClientConfig } from '../config';
import type {
    ActivityChartPointDto, ActivityPayload, AppointmentDto, AppointmentPayload, AppointmentStatsDto,
    AppointmentStatus, CalendarEntryDto, CaseDto, CaseNoteDto, CasePayload, CaseStatus,
    ChangePasswordPayload, ClientDocumentDto, ClientDto, ClientGrowthPointDto, ClientNoteDto,
    ClientNotePayload, ClientPayload, ClientStatsDto, DashboardDto, DashboardStatsDto,
    DocumentFieldsPayload, InvoiceDto, InvoicePayload, InvoiceStatus, LoginResponseDto,
    NotesSummaryDto, Page, ProfileDto, ProfilePayload, RecentActivityDto, RegisterPayload,
    StatusMessageDto, UserDto,
} from '../api-types';
import { ApiError, NetworkError, messageFromBody } from './errors';
import { defaultTokenStore, type TokenStore } from './token-store';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type QueryParams = Record<string, string | number | boolean | null | undefined>;

interface RequestOptions {
    query?: QueryParams;
    body?: unknown;
    form?: FormData;
    /** Send the bearer token and refresh on 401. Off for login, register and the token endpoints. */
    auth?: boolean;
}

export interface ApiClientOptions {
    baseUrl?: string;
    timeoutMs?: number;
    tokenStore?: TokenStore;
    fetchImpl?: typeof fetch;
    /** Called once a refresh has failed and the stored tokens were dropped. */
    onSessionExpired?: () => void;
}

type PageParams = { page?: number; page_size?: number };
export type ClientListParams = PageParams & { search?: string; is_active?: boolean; city?: string };
export type CaseListParams = PageParams & { status?: CaseStatus; client?: string; search?: string };
export type AppointmentListParams = PageParams & {
    status?: AppointmentStatus;
    client?: string;
    start_date?: string;
    end_date?: string;
};
export type InvoiceListParams = PageParams & { status?: InvoiceStatus; client?: string; case?: string };

async function readBody(response: Response): Promise<unknown> {
    const text = await response.text();
    if (!text) return null;
    try {
        return JSON.parse(text);
    } catch {
        return text;
    }
}

/**
 * Client for the /api back end. One instance per app, shared through React context.
 * Concurrent 401s wait on a single refresh request, then each retries once.
 */
export class ApiClient {
    readonly tokens: TokenStore;
    private readonly baseUrl: string;
    private readonly timeoutMs: number;
    private readonly fetchImpl: typeof fetch;
    private onSessionExpired: (() => void) | undefined;
    private refreshing: Promise<boolean> | null = null;

    constructor(options: ApiClientOptions = {}) {
        const config = getClientConfig();
        this.baseUrl = (options.baseUrl ?? config.apiBaseUrl).replace(/\/+$/, '');
        this.timeoutMs = options.timeoutMs ?? config.timeoutMs;
        this.tokens = options.tokenStore ?? defaultTokenStore();
        this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
        this.onSessionExpired = options.onSessionExpired;
    }

    setSessionExpiredHandler(handler: (() => void) | undefined) {
        this.onSessionExpired = handler;
    }

    isAuthenticated() {
        return this.tokens.getAccessToken() !== null;
    }

    buildUrl(path: string, query: QueryParams = {}) {
        const search = new URLSearchParams();
        for (const [key, value] of Object.entries(query)) {
            if (value !== undefined && value !== null && value !== '') {
                search.set(key, String(value));
            }
        }
        const qs = search.toString();
        return `${this.baseUrl}${path}${qs ? `?${qs}` : ''}`;
    }

    async request<T>(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<T> {
        const response = await this.send(method, path, options);
        const text = await response.text();
        const payload: T = JSON.parse(text || 'null');
        return payload;
    }

    async requestBlob(path: string, query?: QueryParams): Promise<Blob> {
        const response = await this.send('GET', path, { query });
        return response.blob();
    }

    private async send(method: HttpMethod, path: string, options: RequestOptions, retried = false): Promise<Response> {
        const useAuth = options.auth !== false;
        const headers: Record<string, string> = { Accept: 'application/json' };
        let body: BodyInit | undefined;
        if (options.form) {
            body = options.form;
        } else if (options.body !== undefined) {
            headers['Content-Type'] = 'application/json';
            body = JSON.stringify(options.body);
        }

        const token = useAuth ? this.tokens.getAccessToken() : null;
        if (token) {
            headers.Authorization = `Bearer ${token}`;
        }

        const response = await this.fetchWithTimeout(this.buildUrl(path, options.query), { method, headers, body });

        if (response.status === 401 && useAuth && !retried) {
            // Another request may already have renewed the token this one was sent with.
            const current = this.tokens.getAccessToken();
            const renewed = (current !== null && current !== token) || await this.refreshAccessToken();
            if (renewed) {
                return this.send(method, path, options, true);
            }
        } else if (response.status === 401 && useAuth) {
            // Rejected again with a fresh token
            this.expireSession();
        }

        if (!response.ok) {
            const data = await readBody(response);
            throw new ApiError(response.status, messageFromBody(response.status, data), data);
        }
        return response;
    }

    private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), this.timeoutMs);
        try {
            return await this.fetchImpl(url, { ...init, signal: controller.signal });
        } catch (error) {
            if (controller.signal.aborted) {
                throw new NetworkError(`The server did not answer within ${this.timeoutMs / 1000}s.`, true, { cause: error });
            }
            throw new NetworkError('Unable to reach the server. Check your connection.', false, { cause: error });
        } finally {
            clearTimeout(timer);
        }
    }

    private refreshAccessToken(): Promise<boolean> {
        this.refreshing ??= this.performRefresh().finally(() => {
            this.refreshing = null;
        });
        return this.refreshing;
    }

    private async performRefresh(): Promise<boolean> {
        const refresh = this.tokens.getRefreshToken();
        if (refresh) {
            try {
                const { access } = await this.request<{ access: string }>('POST', '/auth/token/refresh/', {
                    body: { refresh },
                    auth: false,
                });
                this.tokens.setAccessToken(access);
                return true;
            } catch (error) {
                console.warn('[api] Token refresh failed:', error);
            }
        }

        this.expireSession();
        return false;
    }

    private expireSession() {
        this.tokens.clear();
        this.onSessionExpired?.();
    }

    // ============================================
    // AUTH
    // ============================================

    readonly auth = {
        login: async (email: string, password: string): Promise<UserDto> => {
            const result = await this.request<LoginResponseDto>('POST', '/auth/login/', {
                body: { email, password },
                auth: false,
            });
            this.tokens.setTokens(result.access, result.refresh);
            return result.user;
        },

        register: (payload: RegisterPayload) =>
            this.request<UserDto>('POST', '/auth/register/', { body: payload, auth: false }),

        logout: async () => {
            const refresh = this.tokens.getRefreshToken();
            try {
                if (refresh) {
                    await this.request<null>('POST', '/auth/logout/', { body: { refresh } });
                }
            } finally {
                this.tokens.clear();
            }
        },

        profile: () => this.request<ProfileDto>('GET', '/auth/profile/'),

        updateProfile: (payload: ProfilePayload) =>
            this.request<ProfileDto>('PATCH', '/auth/profile/', { body: payload }),

        changePassword: (payload: ChangePasswordPayload) =>
            this.request<{ message: string }>('PUT', '/auth/change-password/', { body: payload }),
    };

    // ============================================
    // CLIENTS
    // ============================================

    readonly clients = {
        list: (params: ClientListParams = {}) => this.request<Page<ClientDto>>('GET', '/clients/', { query: params }),
        get: (id: string) => this.request<ClientDto>('GET', `/clients/${id}/`),
        create: (payload: ClientPayload) => this.request<ClientDto>('POST', '/clients/', { body: payload }),
        update: (id: string, payload: Partial<ClientPayload>) =>
            this.request<ClientDto>('PATCH', `/clients/${id}/`, { body: payload }),
        remove: (id: string) => this.request<null>('DELETE', `/clients/${id}/`),
        activate: (id: string) => this.request<ClientDto>('POST', `/clients/${id}/activate/`),
        deactivate: (id: string) => this.request<ClientDto>('POST', `/clients/${id}/deactivate/`),
        stats: () => this.request<ClientStatsDto>('GET', '/clients/stats/'),
        appointments: (id: string) => this.request<AppointmentDto[]>('GET', `/clients/${id}/appointments/`),

        notes: (id: string, params: PageParams = {}) =>
            this.request<Page<ClientNoteDto>>('GET', `/clients/${id}/notes/`, { query: params }),
        addNote: (id: string, payload: ClientNotePayload) =>
            this.request<ClientNoteDto>('POST', `/clients/${id}/notes/`, { body: payload }),
        updateNote: (id: string, noteId: string, payload: Partial<ClientNotePayload>) =>
            this.request<ClientNoteDto>('PATCH', `/clients/${id}/notes/${noteId}/`, { body: payload }),
        removeNote: (id: string, noteId: string) => this.request<null>('DELETE', `/clients/${id}/notes/${noteId}/`),
        notesSummary: (id: string) => this.request<NotesSummaryDto>('GET', `/clients/${id}/notes_summary/`),

        documents: (id: string, params: PageParams = {}) =>
            this.request<Page<ClientDocumentDto>>('GET', `/clients/${id}/documents/`, { query: params }),
        uploadDocument: (id: string, file: Blob, fileName: string, fields: DocumentFieldsPayload = {}) => {
            const form = new FormData();
            form.append('document', file, fileName);
            for (const [key, value] of Object.entries(fields)) {
                if (typeof value === 'string' && value) form.append(key, value);
            }
            return this.request<ClientDocumentDto>('POST', `/clients/${id}/documents/`, { form });
        },
        updateDocument: (id: string, documentId: string, payload: DocumentFieldsPayload) =>
            this.request<ClientDocumentDto>('PATCH', `/clients/${id}/documents/${documentId}/`, { body: payload }),
        removeDocument: (id: string, documentId: string) =>
            this.request<null>('DELETE', `/clients/${id}/documents/${documentId}/`),
        downloadDocument: (doc: Pick<ClientDocumentDto, 'id' | 'client'>) =>
            this.requestBlob(`/clients/${doc.client}/documents/${doc.id}/download/`),
    };

    // ============================================
    // CASES
    // ============================================

    readonly cases = {
        list: (params: CaseListParams = {}) => this.request<Page<CaseDto>>('GET', '/cases/', { query: params }),
        get: (id: string) => this.request<CaseDto>('GET', `/cases/${id}/`),
        create: (payload: CasePayload) => this.request<CaseDto>('POST', '/cases/', { body: payload }),
        update: (id: string, payload: Partial<CasePayload>) =>
            this.request<CaseDto>('PATCH', `/cases/${id}/`, { body: payload }),
        remove: (id: string) => this.request<null>('DELETE', `/cases/${id}/`),
        addNote: (id: string, content: string) =>
            this.request<CaseNoteDto>('POST', `/cases/${id}/add_note/`, { body: { content } }),
        assignToMe: (id: string) => this.request<StatusMessageDto>('POST', `/cases/${id}/assign_to_me/`),
        close: (id: string) => this.request<CaseDto>('POST', `/cases/${id}/close/`),
    };

    // ============================================
    // APPOINTMENTS
    // ============================================

    readonly appointments = {
        list: (params: AppointmentListParams = {}) =>
            this.request<Page<AppointmentDto>>('GET', '/appointments/', { query: params }),
        get: (id: string) => this.request<AppointmentDto>('GET', `/appointments/${id}/`),
        create: (payload: AppointmentPayload) => this.request<AppointmentDto>('POST', '/appointments/', { body: payload }),
        update: (id: string, payload: Partial<AppointmentPayload>) =>
            this.request<AppointmentDto>('PATCH', `/appointments/${id}/`, { body: payload }),
        remove: (id: string) => this.request<null>('DELETE', `/appointments/${id}/`),
        confirm: (id: string) => this.request<StatusMessageDto>('POST', `/appointments/${id}/confirm/`),
        cancel: (id: string) => this.request<StatusMessageDto>('POST', `/appointments/${id}/cancel/`),
        complete: (id: string) => this.request<StatusMessageDto>('POST', `/appointments/${id}/complete/`),
        upcoming: () => this.request<AppointmentDto[]>('GET', '/appointments/upcoming/'),
        today: () => this.request<AppointmentDto[]>('GET', '/appointments/today/'),
        calendar: (start: string, end: string) =>
            this.request<CalendarEntryDto[]>('GET', '/appointments/calendar/', { query: { start, end } }),
        stats: () => this.request<AppointmentStatsDto>('GET', '/appointments/stats/'),
    };

    // ============================================
    // BILLING
    // ============================================

    readonly invoices = {
        list: (params: InvoiceListParams = {}) =>
            this.request<Page<InvoiceDto>>('GET', '/billing/invoices/', { query: params }),
        get: (id: string) => this.request<InvoiceDto>('GET', `/billing/invoices/${id}/`),
        create: (payload: InvoicePayload) => this.request<InvoiceDto>('POST', '/billing/invoices/', { body: payload }),
        update: (id: string, payload: Partial<InvoicePayload>) =>
            this.request<InvoiceDto>('PATCH', `/billing/invoices/${id}/`, { body: payload }),
        remove: (id: string) => this.request<null>('DELETE', `/billing/invoices/${id}/`),
        markPaid: (id: string) => this.request<InvoiceDto>('POST', `/billing/invoices/${id}/mark_as_paid/`),
        send: (id: string) => this.request<StatusMessageDto>('POST', `/billing/invoices/${id}/send_to_client/`),
    };

    // ============================================
    // DASHBOARD
    // ============================================

    readonly dashboard = {
        overview: () => this.request<DashboardDto>('GET', '/dashboard/'),
        stats: () => this.request<DashboardStatsDto[]>('GET', '/dashboard/stats/'),
        activities: () => this.request<RecentActivityDto[]>('GET', '/dashboard/activities/'),
        logActivity: (payload: ActivityPayload) =>
            this.request<RecentActivityDto>('POST', '/dashboard/activities/', { body: payload }),
        activityChart: (days?: number) =>
            this.request<ActivityChartPointDto[]>('GET', '/dashboard/activity-chart/', { query: { days } }),
        clientGrowth: (days?: number) =>
            this.request<ClientGrowthPointDto[]>('GET', '/dashboard/client-growth/', { query: { days } }),
        profile: () => this.request<ProfileDto>('GET', '/dashboard/profile/'),
    };
}
