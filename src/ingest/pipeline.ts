import { QueryBuilder } from '../query/query-builder.js';
import { createSourceAdapter } from '../sources/registry.js';
import type { CatalogDatabase } from '../storage/database.js';
import { envelopeFromBatch, writeRequestExport } from '../exporters/export.js';
import type {
    BibHarvestConfig,
    FetchStatus,
    MalformedEntry,
    PersistSummary,
    SourceAdapter,
} from '../types/index.js';
import { ConfigurationError, ValidationError } from '../utils/errors.js';
import type { HttpClient } from '../utils/http-client.js';
import { fileTimestamp } from '../utils/dates.js';
import { getLogger } from '../utils/logger.js';
import { persistBatch } from './persistence.js';

/**
 * One ingestion run.
 */
export interface IngestRequest {
    source: string;
    /** Raw provider expression, used verbatim */
    query?: string;
    terms?: string[];
    inclusions?: string[];
    exclusions?: string[];
    constraints?: string[];
    /** Quote every term, inclusion and exclusion */
    exact?: boolean;
    startYear?: number;
    endYear?: number;
    maxResults?: number;
    pageSize?: number;
    /** Defaults to true */
    saveToDb?: boolean;
    /** Defaults to true */
    saveToJson?: boolean;
    signal?: AbortSignal;
}

export interface IngestDependencies {
    config: BibHarvestConfig;
    /** Required when saving to the database */
    db?: CatalogDatabase;
    /** Overrides the registry lookup */
    adapter?: SourceAdapter;
    httpClient?: HttpClient;
    now?: () => Date;
}

export interface IngestReport {
    query: string;
    timestamp: string;
    fetched: number;
    normalized: number;
    malformed: MalformedEntry[];
    fetchStatus: FetchStatus;
    fetchError: string | null;
    persist: PersistSummary | null;
    exportPath: string | null;
}

/**
 * Build the provider query from a request.
 */
export function buildQuery(request: IngestRequest): QueryBuilder {
    const exact = request.exact ?? false;
    const builder = new QueryBuilder()
        .addTerms(request.terms ?? [], exact)
        .addInclusions(request.inclusions ?? [], exact)
        .addExclusions(request.exclusions ?? [], exact)
        .addConstraints(request.constraints ?? []);

    if (request.query?.trim()) builder.addConstraint(request.query);
    if (request.startYear !== undefined) builder.after(request.startYear);
    if (request.endYear !== undefined) builder.before(request.endYear);

    return builder;
}

/**
 * Fetch, normalize, persist and export one search.
 *
 * Fetch failures and cancellation still persist and export whatever was
 * fetched; only configuration and query errors throw.
 */
export async function runIngestion(request: IngestRequest, deps: IngestDependencies): Promise<IngestReport> {
    const logger = getLogger();
    const { config } = deps;
    const saveToDb = request.saveToDb ?? true;
    const saveToJson = request.saveToJson ?? true;

    if (saveToDb && !deps.db) {
        throw new ConfigurationError('A catalog database is required to save results');
    }

    const adapter = deps.adapter ?? createSourceAdapter(request.source, config, deps.httpClient);

    const builder = buildQuery(request);
    if (builder.isEmpty()) {
        throw new ValidationError('Query is empty: give a query, terms, inclusions or constraints', 'query');
    }
    const query = builder.render();
    const now = deps.now?.() ?? new Date();

    logger.info({ source: adapter.sourceId, query }, 'Starting ingestion');

    const outcome = await adapter.search(query, {
        maxResults: request.maxResults ?? config.maxResults,
        pageSize: request.pageSize ?? config.pageSize,
        signal: request.signal,
    });

    let persist: PersistSummary | null = null;
    if (saveToDb && deps.db) {
        persist = persistBatch(deps.db, outcome.batch);
    }

    let exportPath: string | null = null;
    if (saveToJson) {
        const envelope = envelopeFromBatch(outcome.batch, {
            query,
            startYear: builder.startYear,
            endYear: builder.endYear,
            source: adapter.sourceId,
            date: now,
        });
        exportPath = writeRequestExport(envelope, config.requestsDir);
    }

    const report: IngestReport = {
        query,
        timestamp: fileTimestamp(now),
        fetched: outcome.fetched,
        normalized: outcome.batch.size,
        malformed: outcome.malformed,
        fetchStatus: outcome.status,
        fetchError: outcome.error ?? null,
        persist,
        exportPath,
    };

    logger.info(
        {
            fetched: report.fetched,
            normalized: report.normalized,
            malformed: report.malformed.length,
            status: report.fetchStatus,
            inserted: persist?.inserted ?? 0,
            merged: persist?.merged ?? 0,
            skipped: persist?.skipped ?? 0,
            failed: persist?.failed ?? 0,
        },
        'Ingestion finished'
    );

    return report;
}
