import type {
    NormalizeResult,
    ProviderConfig,
    SearchFilters,
    SearchOutcome,
    SourceAdapter,
} from '../types/index.js';
import { ConfigurationError, ValidationError } from '../utils/errors.js';
import { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { PaginatedFetcher } from './paginated-fetcher.js';
import { SCOPUS_SOURCE, isEmptyResultSentinel, normalizeScopusEntries } from './scopus-normalizer.js';
import { isRecord } from './utils.js';

const DEFAULT_MAX_RESULTS = 100;

/**
 * Scopus Search API adapter.
 *
 * @see https://dev.elsevier.com/documentation/ScopusSearchAPI.wadl
 */
export class ScopusAdapter implements SourceAdapter {
    readonly name = 'Scopus';
    readonly sourceId = 'scopus' as const;
    private readonly httpClient: HttpClient;
    private readonly apiKey: string;
    private readonly fetcher: PaginatedFetcher;

    constructor(
        private readonly config: ProviderConfig,
        httpClient?: HttpClient
    ) {
        if (!config.apiKey) {
            throw new ConfigurationError('Scopus API key is required (set SCOPUS_API_KEY)');
        }
        if (!config.apiUrl) {
            throw new ConfigurationError('Scopus API URL is required (set SCOPUS_API_URL)');
        }

        this.apiKey = config.apiKey;
        this.httpClient = httpClient ?? new HttpClient({
            connectTimeoutMs: config.connectTimeoutMs,
            requestTimeoutMs: config.requestTimeoutMs,
            userAgent: config.userAgent,
            retry: {
                retryCount: config.retryCount,
                baseDelayMs: config.retryBaseDelayMs,
                backoff: config.retryBackoff,
                maxBackoffMs: config.maxBackoffMs,
            },
        });
        this.fetcher = new PaginatedFetcher({
            maxPerPage: config.maxResultsPerRequest,
            rateLimitPauseMs: config.rateLimitPauseMs,
        });
    }

    async search(query: string, filters: SearchFilters = {}): Promise<SearchOutcome> {
        const logger = getLogger();
        if (!query.trim()) {
            throw new ValidationError('Search query cannot be empty', 'query');
        }

        const maxResults = filters.maxResults ?? DEFAULT_MAX_RESULTS;
        const pageSize = filters.pageSize ?? this.config.maxResultsPerRequest;
        logger.info({ query, maxResults }, 'Searching Scopus');

        const result = await this.fetcher.fetch(
            (offset, count, signal) => this.requestPage(query, offset, count, signal),
            { maxResults, pageSize, signal: filters.signal }
        );

        const { batch, malformed } = this.parseResults(result.entries);
        logger.info(
            { fetched: result.entries.length, normalized: batch.size, malformed: malformed.length, status: result.status },
            'Scopus search finished'
        );

        const outcome: SearchOutcome = {
            batch,
            malformed,
            fetched: result.entries.length,
            requests: result.requests,
            status: result.status,
        };
        if (result.error !== undefined) outcome.error = result.error;
        return outcome;
    }

    parseResults(entries: unknown[]): NormalizeResult {
        return normalizeScopusEntries(entries);
    }

    private async requestPage(query: string, offset: number, count: number, signal?: AbortSignal): Promise<unknown[]> {
        getLogger().debug({ start: offset + 1, end: offset + count }, 'Fetching Scopus results');

        const response = await this.httpClient.get(this.config.apiUrl, {
            headers: {
                'X-ELS-APIKey': this.apiKey,
                Accept: 'application/json',
            },
            params: { query, count, start: offset, view: 'COMPLETE' },
            signal,
            source: SCOPUS_SOURCE,
        });

        const entries = readEntries(response.data);
        return isEmptyResultSentinel(entries) ? [] : entries;
    }
}

/**
 * `search-results.entry`, or an empty list when the body has none.
 */
function readEntries(body: unknown): unknown[] {
    if (!isRecord(body)) return [];
    const results = body['search-results'];
    if (!isRecord(results)) return [];
    const entries = results['entry'];
    return Array.isArray(entries) ? entries : [];
}
