/**
 * Civil time helpers for IANA time zones, built on Intl.DateTimeFormat.
 */

export const DAY_MS = 24 * 60 * 60 * 1000;
export const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'] as const;

export interface ZonedParts {
    year: number;
    month: number;
    day: number;
    weekday: number;    // 0 = Sunday
    hour: number;
    minute: number;
    second: number;
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
    let formatter = formatterCache.get(timeZone);
    if (!formatter) {
        formatter = new Intl.DateTimeFormat('en-US', {
            timeZone,
            year: 'numeric',
            month: '2-digit',
            day: '2-digit',
            weekday: 'short',
            hour: '2-digit',
            minute: '2-digit',
            second: '2-digit',
            hourCycle: 'h23'
        });
        formatterCache.set(timeZone, formatter);
    }
    return formatter;
}

export function isValidTimeZone(timeZone: string): boolean {
    try {
        getFormatter(timeZone);
        return true;
    } catch {
        return false;
    }
}

export function getZonedParts(date: Date, timeZone: string): ZonedParts {
    const parts: Record<string, string> = {};
    for (const part of getFormatter(timeZone).formatToParts(date)) {
        if (part.type !== 'literal') {
            parts[part.type] = part.value;
        }
    }

    const weekday = WEEKDAYS.findIndex((name) => name === parts.weekday);

    return {
        year: Number(parts.year),
        month: Number(parts.month),
        day: Number(parts.day),
        weekday,
        hour: Number(parts.hour),
        minute: Number(parts.minute),
        second: Number(parts.second)
    };
}

export function getTimeZoneOffsetMs(date: Date, timeZone: string): number {
    const parts = getZonedParts(date, timeZone);
    const asUTC = Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second);
    return asUTC - Math.floor(date.getTime() / 1000) * 1000;
}

export function toUtcDate(
    year: number,
    month: number,
    day: number,
    hour: number,
    minute: number,
    second: number,
    timeZone: string
): Date {
    const assumedUtc = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
    const offsetMs = getTimeZoneOffsetMs(assumedUtc, timeZone);
    const candidate = new Date(assumedUtc.getTime() - offsetMs);

    // Offset can differ on the far side of a DST transition
    const correctedOffset = getTimeZoneOffsetMs(candidate, timeZone);
    if (correctedOffset !== offsetMs) {
        return new Date(assumedUtc.getTime() - correctedOffset);
    }
    return candidate;
}

export function toDateKey(parts: Pick<ZonedParts, 'year' | 'month' | 'day'>): string {
    const mm = String(parts.month).padStart(2, '0');
    const dd = String(parts.day).padStart(2, '0');
    return `${parts.year}-${mm}-${dd}`;
}

/** Local midnight of the civil day containing `date`, as a UTC instant. */
export function startOfLocalDay(date: Date, timeZone: string): Date {
    const parts = getZonedParts(date, timeZone);
    return toUtcDate(parts.year, parts.month, parts.day, 0, 0, 0, timeZone);
}
