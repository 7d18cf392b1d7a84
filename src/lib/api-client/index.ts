export { ApiClient } from './client';
export type {
    ApiClientOptions, AppointmentListParams, CaseListParams, ClientListParams, HttpMethod,
    InvoiceListParams, QueryParams,
} from './client';
export { ApiError, NetworkError, messageFromBody } from './errors';
export { LocalStorageTokenStore, MemoryTokenStore, defaultTokenStore } from './token-store';
export type { TokenStore } from './token-store';
