import { differenceInCalendarDays, format, isSameDay, isValid, parseISO } from 'date-fns';

const EMPTY = '-';

const currencyFormatter = new Intl.NumberFormat('en-US', { style: 'currency', currency: 'USD' });

function toDate(value: string | Date): Date {
    return typeof value === 'string' ? parseISO(value) : value;
}

export function formatCurrency(amount: number | null | undefined): string {
    if (amount === null || amount === undefined || !Number.isFinite(amount)) return EMPTY;
    return currencyFormatter.format(amount);
}

/** `2030-01-16` → `Jan 16, 2030`. Date-only strings are read as local dates. */
export function formatDate(value: string | Date | null | undefined): string {
    if (!value) return EMPTY;
    const date = toDate(value);
    return isValid(date) ? format(date, 'MMM d, yyyy') : String(value);
}

export function formatDateTime(value: string | Date | null | undefined): string {
    if (!value) return EMPTY;
    const date = toDate(value);
    return isValid(date) ? format(date, 'MMM d, yyyy h:mm a') : String(value);
}

export function formatTime(value: string | Date): string {
    const date = toDate(value);
    return isValid(date) ? format(date, 'h:mm a') : String(value);
}

/** Same-day ranges show the date once: `Jan 16, 2030 10:00 AM - 11:00 AM`. */
export function formatTimeRange(start: string | Date, end: string | Date): string {
    const from = toDate(start);
    const to = toDate(end);
    if (!isValid(from) || !isValid(to)) return `${String(start)} - ${String(end)}`;
    if (isSameDay(from, to)) {
        return `${format(from, 'MMM d, yyyy h:mm a')} - ${format(to, 'h:mm a')}`;
    }
    return `${formatDateTime(from)} - ${formatDateTime(to)}`;
}

/** Today / Tomorrow / Yesterday, the weekday name within the coming week, else the date. */
export function relativeDayLabel(value: string | Date, now: Date = new Date()): string {
    const date = toDate(value);
    if (!isValid(date)) return String(value);

    const days = differenceInCalendarDays(date, now);
    if (days === 0) return 'Today';
    if (days === 1) return 'Tomorrow';
    if (days === -1) return 'Yesterday';
    if (days > 1 && days < 7) return format(date, 'EEEE');
    return formatDate(date);
}

/** ISO timestamp → value for `<input type="datetime-local">` in local time. */
export function toDateTimeInput(value: string | null | undefined): string {
    if (!value) return '';
    const date = parseISO(value);
    return isValid(date) ? format(date, "yyyy-MM-dd'T'HH:mm") : '';
}

/** `<input type="datetime-local">` value → ISO timestamp, or '' when unset or unreadable. */
export function fromDateTimeInput(value: string): string {
    if (!value) return '';
    const date = parseISO(value);
    return isValid(date) ? date.toISOString() : '';
}

export function initials(person: { first_name: string; last_name: string }): string {
    return `${person.first_name.charAt(0)}${person.last_name.charAt(0)}`.toUpperCase();
}
