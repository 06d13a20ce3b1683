/**
 * ISO-8601 date parsing and year filtering
 */
import { YEAR_FILTER_FIELDS } from './types.js';
import type { TournamentAttributes } from '../fetchers/types.js';

// date, optional time (hour, minute, second, fraction), optional offset as +hh, +hhmm or +hh:mm
const ISO_DATE_PATTERN =
    /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2})(?::?(\d{2})(?::?(\d{2})(?:[.,](\d+))?)?)?(?:([+-])(\d{2})(?::?(\d{2}))?)?)?$/;

export interface ParsedDate {
    /** Calendar year as written, before any offset is applied */
    year: number;
}

/**
 * Parse an ISO-8601 timestamp. A trailing `Z` is read as `+00:00`,
 * a timestamp without offset as UTC. Returns null for anything unparseable.
 */
export function parseDate(raw: unknown): ParsedDate | null {
    if (typeof raw !== 'string') return null;

    const sanitized = raw.trim().replace(/Z$/, '+00:00');
    const match = ISO_DATE_PATTERN.exec(sanitized);
    if (!match) return null;

    const [, y, mo, d, h = '0', mi = '0', s = '0', , , oh = '0', om = '0'] = match;
    const year = Number(y);
    const month = Number(mo);
    const day = Number(d);
    const hour = Number(h);
    const minute = Number(mi);
    const second = Number(s);
    const offsetHours = Number(oh);
    const offsetMinutes = Number(om);

    if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) return null;
    if (hour > 23 || minute > 59 || second > 59) return null;
    if (offsetHours > 23 || offsetMinutes > 59) return null;

    return { year };
}

function daysInMonth(year: number, month: number): number {
    if (month === 2) {
        const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
        return leap ? 29 : 28;
    }
    return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/**
 * True when any of started_at, starts_at or created_at falls in the given year.
 * Missing or unparseable fields are skipped.
 */
export function isInYear(attributes: TournamentAttributes, year: number): boolean {
    for (const field of YEAR_FILTER_FIELDS) {
        const parsed = parseDate(attributes[field]);
        if (parsed && parsed.year === year) {
            return true;
        }
    }
    return false;
}
