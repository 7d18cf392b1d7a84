import { getServerConfig } from './config';
import { NotFoundError } from './errors';
import type { ApiRequest } from './api/handler';
import { queryParam } from './api/http';

export interface Page<T> {
    count: number;
    next: string | null;
    previous: string | null;
    results: T[];
}

function positiveInt(value: string | undefined) {
    if (value === undefined) return null;
    const parsed = Number(value);
    return Number.isInteger(parsed) && parsed > 0 ? parsed : null;
}

function pageLink(req: ApiRequest, page: number) {
    const url = new URL(req.url ?? '/', 'http://localhost');
    if (page === 1) {
        url.searchParams.delete('page');
    } else {
        url.searchParams.set('page', String(page));
    }
    return `${url.pathname}${url.search}`;
}

/**
 * Slices an already filtered and ordered list into the `{count, next, previous, results}` envelope.
 * `page_size` falls back to PAGE_SIZE when invalid and is capped at MAX_PAGE_SIZE.
 */
export function paginate<T>(req: ApiRequest, items: T[]): Page<T> {
    const { pageSize, maxPageSize } = getServerConfig();
    const size = Math.min(positiveInt(queryParam(req, 'page_size')) ?? pageSize, maxPageSize);

    const rawPage = queryParam(req, 'page');
    const page = rawPage === 'last' ? Math.max(1, Math.ceil(items.length / size)) : positiveInt(rawPage ?? '1');
    const lastPage = Math.max(1, Math.ceil(items.length / size));
    if (page === null || page > lastPage) {
        throw new NotFoundError('Invalid page.');
    }

    const start = (page - 1) * size;
    return {
        count: items.length,
        next: page < lastPage ? pageLink(req, page + 1) : null,
        previous: page > 1 ? pageLink(req, page - 1) : null,
        results: items.slice(start, start + size),
    };
}
