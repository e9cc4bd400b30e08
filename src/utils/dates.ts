import { differenceInCalendarDays, isValid, parseISO } from 'date-fns';

const CALENDAR_DATE = /^(\d{4}-\d{2}-\d{2})(?:[T ].*)?$/;

/**
 * Reduce an ISO date or datetime to its calendar date (YYYY-MM-DD).
 * Returns null when the value is not a real date.
 */
export function toCalendarDate(value: string | null | undefined): string | null {
    if (!value) return null;
    const match = CALENDAR_DATE.exec(value.trim());
    if (!match) return null;
    const date = match[1];
    return isValid(parseISO(date)) ? date : null;
}

/** Whole calendar days from `from` to `to`, both YYYY-MM-DD */
export function calendarDaysBetween(from: string, to: string): number {
    return differenceInCalendarDays(parseISO(to), parseISO(from));
}
