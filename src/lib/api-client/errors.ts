/** Non-2xx answer from the API. `data` is the parsed JSON body, when there was one. */
export class ApiError extends Error {
    constructor(public status: number, message: string, public data: unknown = null) {
        super(message);
        this.name = 'ApiError';
    }

    get isUnauthorized(): boolean {
        return this.status === 401;
    }

    get isForbidden(): boolean {
        return this.status === 403;
    }

    get isNotFound(): boolean {
        return this.status === 404;
    }

    get isValidation(): boolean {
        return this.status === 400;
    }

    /** Field → messages map of a 400 answer; empty for any other body. */
    get fieldErrors(): Record<string, string[]> {
        if (!this.isValidation || !isRecord(this.data)) return {};
        const fields: Record<string, string[]> = {};
        for (const [key, value] of Object.entries(this.data)) {
            if (Array.isArray(value)) {
                fields[key] = value.filter((m): m is string => typeof m === 'string');
            }
        }
        return fields;
    }
}

/** The request never produced an HTTP answer (server unreachable or timed out). */
export class NetworkError extends Error {
    constructor(message: string, public timedOut = false, options?: ErrorOptions) {
        super(message, options);
        this.name = 'NetworkError';
    }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Human message for an error body: `detail` when present, else the first field message. */
export function messageFromBody(status: number, body: unknown): string {
    if (isRecord(body)) {
        if (typeof body.detail === 'string') return body.detail;
        for (const [field, value] of Object.entries(body)) {
            const first = Array.isArray(value) ? value[0] : value;
            if (typeof first === 'string') {
                return field === 'non_field_errors' ? first : `${field}: ${first}`;
            }
        }
    }
    return `Request failed with status ${status}`;
}
