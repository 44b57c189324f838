import type { SourceName } from './config.js';
import type { FetchStatus } from './ingest.js';
import type { PaperBatch } from '../ingest/paper-batch.js';

/**
 * Options for one paginated search.
 */
export interface SearchFilters {
    /** Stop once this many raw entries have been fetched */
    maxResults?: number;

    /** Requested page size (capped by the provider's maximum) */
    pageSize?: number;

    /** Aborting stops pagination and keeps what was fetched */
    signal?: AbortSignal;
}

/**
 * A raw entry that could not be normalized.
 */
export interface MalformedEntry {
    /** Position in the fetched entry list */
    index: number;
    reason: string;
}

/**
 * Result of normalizing a list of raw entries.
 */
export interface NormalizeResult {
    batch: PaperBatch;
    malformed: MalformedEntry[];
}

/**
 * Result of a provider search: normalized papers plus how the fetch ended.
 */
export interface SearchOutcome extends NormalizeResult {
    /** Raw entries received from the provider */
    fetched: number;
    requests: number;
    status: FetchStatus;
    /** Message of the error that ended pagination early, if any */
    error?: string;
}

/**
 * Capability interface for search providers (Scopus, ...).
 * Each adapter normalizes results into the common Paper model.
 */
export interface SourceAdapter {
    /** Human-readable source name */
    readonly name: string;

    /** Source identifier for storage and the registry */
    readonly sourceId: SourceName;

    /**
     * Run a paginated search for a rendered provider query.
     * Fetch failures degrade to a partial outcome instead of throwing.
     */
    search(query: string, filters?: SearchFilters): Promise<SearchOutcome>;

    /**
     * Normalize raw API entries into papers. Malformed entries are skipped.
     */
    parseResults(entries: unknown[]): NormalizeResult;
}
