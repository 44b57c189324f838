import type { FetchStatus } from '../types/index.js';
import { FetchCancelledError, FetchError } from '../utils/errors.js';
import { sleep } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';

/**
 * Fetch one page of raw entries starting at `offset`.
 */
export type PageRequest = (offset: number, count: number, signal?: AbortSignal) => Promise<unknown[]>;

export interface PaginatedFetcherOptions {
    /** Largest page the provider serves */
    maxPerPage: number;
    /** Pause between successful page requests */
    rateLimitPauseMs: number;
}

export interface PaginationOptions {
    maxResults: number;
    pageSize: number;
    signal?: AbortSignal;
}

export interface FetchResult {
    /** Raw entries in fetch order, never more than `maxResults` */
    entries: unknown[];
    status: FetchStatus;
    /** Page requests issued (retries not included) */
    requests: number;
    error?: string;
}

/**
 * Drives successive page requests until a termination rule fires:
 * the requested total is reached, a page is empty, or a page comes back short.
 *
 * Fetch errors and cancellation end the loop with what was already fetched.
 */
export class PaginatedFetcher {
    constructor(private readonly options: PaginatedFetcherOptions) {}

    async fetch(requestPage: PageRequest, options: PaginationOptions): Promise<FetchResult> {
        const logger = getLogger();
        const { maxResults, signal } = options;
        const pageSize = Math.max(1, Math.min(options.pageSize, this.options.maxPerPage));

        const entries: unknown[] = [];
        let offset = 0;
        let requests = 0;
        let status: FetchStatus = 'complete';
        let error: string | undefined;

        while (offset < maxResults) {
            if (signal?.aborted) {
                status = 'cancelled';
                break;
            }

            let page: unknown[];
            try {
                requests++;
                page = await requestPage(offset, pageSize, signal);
            } catch (err) {
                if (err instanceof FetchCancelledError || signal?.aborted) {
                    status = 'cancelled';
                    logger.warn({ offset, fetched: entries.length }, 'Fetch cancelled, keeping partial results');
                    break;
                }
                if (err instanceof FetchError) {
                    status = 'partial';
                    error = err.message;
                    logger.warn(
                        { offset, fetched: entries.length, status: err.status, error: err.message },
                        'Fetch failed, keeping partial results'
                    );
                    break;
                }
                throw err;
            }

            entries.push(...page);
            offset += page.length;
            logger.debug({ offset, received: page.length }, 'Fetched page');

            if (page.length === 0 || page.length < pageSize || offset >= maxResults) break;

            await sleep(this.options.rateLimitPauseMs, signal);
        }

        const result: FetchResult = { entries: entries.slice(0, maxResults), status, requests };
        if (error !== undefined) result.error = error;
        return result;
    }
}

