import { ApiError, NetworkError } from '../api-client/errors';

const FALLBACK = 'Something went wrong. Please try again.';

function fieldLabel(field: string) {
    const words = field.replace(/[._]+/g, ' ').trim();
    return words.charAt(0).toUpperCase() + words.slice(1);
}

/** One line per field of a 400 answer, `non_field_errors` without a label. */
export function describeFieldErrors(fields: Record<string, string[]>): string[] {
    return Object.entries(fields)
        .filter(([, messages]) => messages.length > 0)
        .map(([field, messages]) => {
            const text = messages.join(' ');
            return field === 'non_field_errors' ? text : `${fieldLabel(field)}: ${text}`;
        });
}

/** Message shown in a toast for anything a view's API call threw. */
export function describeError(error: unknown): string {
    if (error instanceof NetworkError) {
        return error.message;
    }
    if (error instanceof ApiError) {
        const lines = describeFieldErrors(error.fieldErrors);
        if (lines.length > 0) return lines.join(' ');
        if (error.isNotFound) return 'That record no longer exists.';
        if (error.status >= 500) return 'The server hit an error. Please try again.';
        return error.message;
    }
    if (error instanceof Error && error.message) {
        return error.message;
    }
    return FALLBACK;
}
