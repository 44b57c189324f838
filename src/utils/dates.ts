/**
 * Calendar-date helpers. Dates travel through the system as `YYYY-MM-DD` strings.
 */

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parse a strict `YYYY-MM-DD` string.
 * Returns the same string when it names a real calendar day, otherwise null.
 * "2023-02-30" → null, "2023-2-3" → null
 */
export function parseIsoDate(value: string): string | null {
    const match = ISO_DATE.exec(value);
    if (!match) return null;

    const year = Number(match[1]);
    const month = Number(match[2]);
    const day = Number(match[3]);
    const date = new Date(Date.UTC(year, month - 1, day));

    if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
        return null;
    }

    return value;
}

/**
 * Year of a `YYYY-MM-DD` string.
 */
export function yearOf(isoDate: string): number {
    return Number(isoDate.slice(0, 4));
}

/**
 * Timestamp suitable for file names: `YYYYMMDD_HHMMSS` in UTC.
 */
export function fileTimestamp(date: Date = new Date()): string {
    const pad = (n: number): string => String(n).padStart(2, '0');
    return (
        `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
        `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
    );
}
