import { isValid, parseISO } from 'date-fns';
import type { z, ZodTypeAny } from 'zod';
import { NotFoundError, ValidationError } from '../errors';
import type { ApiRequest, Reply } from './handler';

export const ok = (body: unknown): Reply => ({ status: 200, body });
export const created = (body: unknown): Reply => ({ status: 201, body });
export const noContent = (): Reply => ({ status: 204 });
export const resetContent = (): Reply => ({ status: 205 });

/** First value of a query parameter, trimmed; blank counts as absent. */
export function queryParam(req: ApiRequest, name: string): string | undefined {
    const raw = req.query[name];
    const value = Array.isArray(raw) ? raw[0] : raw;
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}

/** Dynamic route segment; a missing segment resolves to nothing, so 404. */
export function pathParam(req: ApiRequest, name: string): string {
    const value = req.query[name];
    if (typeof value !== 'string' || value.length === 0) {
        throw new NotFoundError();
    }
    return value;
}

export function parseBody<S extends ZodTypeAny>(schema: S, body: unknown): z.output<S> {
    return schema.parse(body ?? {});
}

export function parseBooleanParam(req: ApiRequest, name: string): boolean | undefined {
    const value = queryParam(req, name)?.toLowerCase();
    if (value === undefined) return undefined;
    if (value === 'true' || value === '1') return true;
    if (value === 'false' || value === '0') return false;
    throw ValidationError.field(name, 'Must be "true" or "false".');
}

export function parseIntParam(req: ApiRequest, name: string, fallback: number, max = Number.MAX_SAFE_INTEGER): number {
    const value = queryParam(req, name);
    if (value === undefined) return fallback;
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw ValidationError.field(name, 'A valid positive integer is required.');
    }
    return Math.min(parsed, max);
}

/** ISO date or date-time query parameter. */
export function dateParam(req: ApiRequest, name: string): Date | undefined {
    const value = queryParam(req, name);
    if (value === undefined) return undefined;
    const parsed = parseISO(value);
    if (!isValid(parsed)) {
        throw ValidationError.field(name, 'Enter a valid date/time.');
    }
    return parsed;
}

/** `Content-Disposition` for a download: an ASCII `filename` plus the exact name as `filename*`. */
export function attachmentDisposition(fileName: string): string {
    const fallback = fileName.replace(/[^\x20-\x7e]|["\\]/g, '_');
    return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(fileName)}`;
}
