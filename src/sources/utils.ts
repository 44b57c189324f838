/**
 * Shared utilities for source adapters. Raw provider payloads are `unknown`
 * until these readers narrow them.
 */

export type RawRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is RawRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a trimmed, non-empty string field. Numbers are stringified.
 */
export function readString(record: RawRecord, key: string): string | null {
    const value = record[key];
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    if (typeof value !== 'string') return null;
    const trimmed = value.trim();
    return trimmed || null;
}

/**
 * Read a field that may hold one object or a list of objects.
 * Non-object items are dropped.
 */
export function readRecordList(record: RawRecord, key: string): RawRecord[] {
    const value = record[key];
    if (Array.isArray(value)) return value.filter(isRecord);
    if (isRecord(value)) return [value];
    return [];
}

/**
 * Parse a non-negative integer count. "42" → 42, "-1" → 0, "n/a" → 0
 */
export function parseCount(value: unknown): number {
    if (typeof value === 'number') {
        return Number.isInteger(value) && value >= 0 ? value : 0;
    }
    if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
        return Number(value.trim());
    }
    return 0;
}

/**
 * Strip DOI prefix URLs to get just the DOI identifier.
 * "https://doi.org/10.1234/test" → "10.1234/test"
 */
export function stripDoiPrefix(doi: string | null | undefined): string | null {
    if (!doi) return null;
    return doi
        .replace(/^https?:\/\/(dx\.)?doi\.org\//i, '')
        .replace(/^doi:/i, '')
        .trim() || null;
}

/**
 * Split a delimited keyword string, trimming and dropping empties.
 * Duplicates keep their first position.
 * "deep learning, graphs,, deep learning" → ["deep learning", "graphs"]
 */
export function splitKeywords(raw: string | null, separator = ','): string[] {
    if (!raw) return [];

    const seen = new Set<string>();
    for (const part of raw.split(separator)) {
        const keyword = part.trim();
        if (keyword) seen.add(keyword);
    }
    return [...seen];
}
