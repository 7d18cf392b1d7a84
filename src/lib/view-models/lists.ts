// Local list updates applied after a successful write, so views skip a refetch.

interface Identified {
    id: string;
}

/** Replaces the row with the same id in place, or inserts it at the given end. */
export function upsertById<T extends Identified>(items: readonly T[], item: T, position: 'start' | 'end' = 'start'): T[] {
    const index = items.findIndex((existing) => existing.id === item.id);
    if (index === -1) {
        return position === 'start' ? [item, ...items] : [...items, item];
    }
    return items.map((existing, i) => (i === index ? item : existing));
}

/** Replaces the row with the same id; the list is unchanged when there is none. */
export function replaceById<T extends Identified>(items: readonly T[], item: T): T[] {
    return items.map((existing) => (existing.id === item.id ? item : existing));
}

export function patchById<T extends Identified>(items: readonly T[], id: string, patch: Partial<T>): T[] {
    return items.map((existing) => (existing.id === id ? { ...existing, ...patch } : existing));
}

export function removeById<T extends Identified>(items: readonly T[], id: string): T[] {
    return items.filter((existing) => existing.id !== id);
}

/**
 * Case-insensitive match over the fields `pick` returns. Every whitespace-separated term
 * of the query must appear in at least one field.
 */
export function filterByText<T>(
    items: readonly T[],
    query: string,
    pick: (item: T) => ReadonlyArray<string | null | undefined>,
): T[] {
    const terms = query.trim().toLowerCase().split(/\s+/).filter(Boolean);
    if (terms.length === 0) return [...items];

    return items.filter((item) => {
        const haystack = pick(item)
            .filter((value): value is string => typeof value === 'string')
            .join(' ')
            .toLowerCase();
        return terms.every((term) => haystack.includes(term));
    });
}
