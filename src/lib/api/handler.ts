import type { IncomingMessage } from 'http';
import { ZodError } from 'zod';
import { getDb, type Db } from '../database';
import type { User } from '../types';
import { authenticate } from '../auth/authenticate';
import { HttpError, MethodNotAllowedError, ValidationError, fieldErrorsFromZod } from '../errors';

// Structural subset of NextApiRequest / NextApiResponse, so route modules can be driven in tests.
export type ApiRequest = IncomingMessage & {
    query: Partial<Record<string, string | string[]>>;
    body: unknown;
};

export interface ApiResponse extends NodeJS.WritableStream {
    statusCode: number;
    headersSent: boolean;
    status(code: number): ApiResponse;
    json(body: unknown): void;
    setHeader(name: string, value: string | number | readonly string[]): unknown;
}

export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'] as const;
export type HttpMethod = (typeof HTTP_METHODS)[number];

export interface PublicContext {
    req: ApiRequest;
    res: ApiResponse;
    db: Db;
    user: User | null;
}

export interface AuthContext extends PublicContext {
    user: User;
}

/** What a method handler hands back; `undefined` means it already wrote the response itself. */
export type Reply = { status: number; body?: unknown } | undefined;

export type MethodHandler<C> = (ctx: C) => Promise<Reply> | Reply;
export type MethodHandlers<C> = Partial<Record<HttpMethod, MethodHandler<C>>>;

export type RouteHandler = (req: ApiRequest, res: ApiResponse) => Promise<void>;

function isHttpMethod(method: string): method is HttpMethod {
    return HTTP_METHODS.some((m) => m === method);
}

function logRequest(req: ApiRequest, status: number, user: User | null, startedAt: number, error?: unknown) {
    const line = `[api] ${req.method} ${req.url} ${status} user=${user?.id ?? '-'} ${Date.now() - startedAt}ms`;
    if (status >= 500) {
        console.error(line, error);
    } else if (status >= 400) {
        console.warn(line);
    } else {
        console.info(line);
    }
}

function toHttpError(error: unknown): HttpError | null {
    if (error instanceof HttpError) return error;
    if (error instanceof ZodError) return new ValidationError(fieldErrorsFromZod(error));
    return null;
}

function createRoute<C extends PublicContext>(
    handlers: MethodHandlers<C>,
    resolve: (base: PublicContext) => Promise<C>,
): RouteHandler {
    const allowed = HTTP_METHODS.filter((m) => handlers[m] !== undefined);

    return async function handler(req, res) {
        const startedAt = Date.now();
        let user: User | null = null;
        let failure: unknown;

        try {
            // 1. Method dispatch
            const method = (req.method ?? 'GET').toUpperCase();
            const fn = isHttpMethod(method) ? handlers[method] : undefined;
            if (!fn) {
                res.setHeader('Allow', allowed.join(', '));
                throw new MethodNotAllowedError(method);
            }

            // 2. Context (database, caller)
            const db = await getDb();
            const ctx = await resolve({ req, res, db, user: null });
            user = ctx.user;

            // 3. Handler
            const reply = await fn(ctx);
            if (reply) {
                if (reply.body === undefined) {
                    res.status(reply.status).end();
                } else {
                    res.status(reply.status).json(reply.body);
                }
            }
        } catch (error) {
            const httpError = toHttpError(error);
            if (!httpError) failure = error;
            if (res.headersSent) {
                res.end();
            } else if (httpError) {
                res.status(httpError.status).json(httpError.toBody());
            } else {
                res.status(500).json({ detail: 'Internal server error.' });
            }
        } finally {
            logRequest(req, res.statusCode, user, startedAt, failure);
        }
    };
}

/** Route open to anonymous callers (health, login, token refresh, register). */
export function publicRoute(handlers: MethodHandlers<PublicContext>): RouteHandler {
    return createRoute(handlers, async (base) => base);
}

/** Route behind the bearer-token check; handlers receive the active caller as `ctx.user`. */
export function authRoute(handlers: MethodHandlers<AuthContext>): RouteHandler {
    return createRoute(handlers, async (base) => ({
        ...base,
        user: await authenticate(base.req.headers.authorization, base.db),
    }));
}
