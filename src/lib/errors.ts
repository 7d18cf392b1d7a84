import { ZodError } from 'zod';

export type FieldErrors = Record<string, string[]>;

export class HttpError extends Error {
    constructor(public status: number, message: string) {
        super(message);
        this.name = 'HttpError';
    }

    toBody(): Record<string, unknown> {
        return { detail: this.message };
    }
}

export class ValidationError extends HttpError {
    constructor(public fields: FieldErrors) {
        super(400, 'Invalid input.');
        this.name = 'ValidationError';
    }

    static field(field: string, message: string) {
        return new ValidationError({ [field]: [message] });
    }

    toBody(): Record<string, unknown> {
        return this.fields;
    }
}

export class AuthenticationError extends HttpError {
    constructor(message = 'Authentication credentials were not provided.') {
        super(401, message);
        this.name = 'AuthenticationError';
    }
}

export class PermissionDeniedError extends HttpError {
    constructor(message = 'You do not have permission to perform this action.') {
        super(403, message);
        this.name = 'PermissionDeniedError';
    }
}

export class NotFoundError extends HttpError {
    constructor(message = 'Not found.') {
        super(404, message);
        this.name = 'NotFoundError';
    }
}

export class MethodNotAllowedError extends HttpError {
    constructor(method: string) {
        super(405, `Method "${method}" not allowed.`);
        this.name = 'MethodNotAllowedError';
    }
}

/** Flattens zod issues into a field → messages map; object-level issues go under `non_field_errors`. */
export function fieldErrorsFromZod(error: ZodError): FieldErrors {
    const fields: FieldErrors = {};
    for (const issue of error.issues) {
        const key = issue.path.length > 0 ? issue.path.join('.') : 'non_field_errors';
        (fields[key] ??= []).push(issue.message);
    }
    return fields;
}
