import { describe, it, expect, vi } from 'vitest';
import { PaginatedFetcher, type PageRequest } from '../sources/paginated-fetcher.js';
import { NonRetryableFetchError, TransientFetchError } from '../utils/errors.js';

/**
 * A provider holding `total` entries, served by offset.
 */
function pool(total: number): PageRequest {
    return async (offset, count) =>
        Array.from({ length: Math.max(0, Math.min(count, total - offset)) }, (_, i) => ({ id: offset + i }));
}

describe('PaginatedFetcher', () => {
    const fetcher = new PaginatedFetcher({ maxPerPage: 25, rateLimitPauseMs: 0 });

    describe('termination', () => {
        it('should stop once maxResults entries are fetched', async () => {
            const result = await fetcher.fetch(pool(60), { maxResults: 50, pageSize: 25 });

            expect(result.entries).toHaveLength(50);
            expect(result.requests).toBe(2);
            expect(result.status).toBe('complete');
            expect(result.error).toBeUndefined();
        });

        it('should stop after a short page', async () => {
            const result = await fetcher.fetch(pool(30), { maxResults: 100, pageSize: 25 });

            expect(result.entries).toHaveLength(30);
            expect(result.requests).toBe(2);
        });

        it('should stop after an empty page', async () => {
            const result = await fetcher.fetch(pool(50), { maxResults: 100, pageSize: 25 });

            expect(result.entries).toHaveLength(50);
            expect(result.requests).toBe(3);
        });

        it('should truncate to maxResults keeping fetch order', async () => {
            const result = await fetcher.fetch(pool(100), { maxResults: 30, pageSize: 25 });

            expect(result.entries).toHaveLength(30);
            expect(result.entries[0]).toEqual({ id: 0 });
            expect(result.entries[29]).toEqual({ id: 29 });
            expect(result.requests).toBe(2);
        });
    });

    it('should take 150 results as a page of 100 then 50', async () => {
        const requestPage = vi.fn(pool(150));
        const wide = new PaginatedFetcher({ maxPerPage: 200, rateLimitPauseMs: 0 });

        const result = await wide.fetch(requestPage, { maxResults: 150, pageSize: 100 });

        expect(requestPage.mock.calls.map(([offset, count]) => [offset, count])).toEqual([
            [0, 100],
            [100, 100],
        ]);
        expect(result.entries).toHaveLength(150);
        expect(result.entries[149]).toEqual({ id: 149 });
        expect(result.status).toBe('complete');
    });

    describe('page size', () => {
        it('should cap the page size at the provider maximum', async () => {
            const requestPage = vi.fn(pool(40));

            await fetcher.fetch(requestPage, { maxResults: 100, pageSize: 100 });

            expect(requestPage.mock.calls.map(([offset, count]) => [offset, count])).toEqual([
                [0, 25],
                [25, 25],
            ]);
        });

        it('should advance the offset by the entries received', async () => {
            const requestPage = vi.fn(pool(25));
            const small = new PaginatedFetcher({ maxPerPage: 10, rateLimitPauseMs: 0 });

            await small.fetch(requestPage, { maxResults: 25, pageSize: 10 });

            expect(requestPage.mock.calls.map(([offset]) => offset)).toEqual([0, 10, 20]);
        });
    });

    describe('failures', () => {
        it('should return partial results on a non-retryable error', async () => {
            const source = pool(100);
            const requestPage: PageRequest = async (offset, count) => {
                if (offset > 0) throw new NonRetryableFetchError('HTTP 401: Unauthorized', 401);
                return source(offset, count);
            };

            const result = await fetcher.fetch(requestPage, { maxResults: 100, pageSize: 25 });

            expect(result.status).toBe('partial');
            expect(result.error).toBe('HTTP 401: Unauthorized');
            expect(result.entries).toHaveLength(25);
            expect(result.requests).toBe(2);
        });

        it('should return partial results once retries are exhausted', async () => {
            const requestPage: PageRequest = async () => {
                throw new TransientFetchError('HTTP 503: Service Unavailable', 503);
            };

            const result = await fetcher.fetch(requestPage, { maxResults: 100, pageSize: 25 });

            expect(result.status).toBe('partial');
            expect(result.entries).toEqual([]);
        });

        it('should rethrow errors that are not fetch errors', async () => {
            const requestPage: PageRequest = async () => {
                throw new Error('boom');
            };

            await expect(fetcher.fetch(requestPage, { maxResults: 10, pageSize: 5 })).rejects.toThrow('boom');
        });
    });

    describe('cancellation', () => {
        it('should keep fetched entries when aborted between pages', async () => {
            const controller = new AbortController();
            const source = pool(100);
            const requestPage: PageRequest = async (offset, count) => {
                const page = await source(offset, count);
                controller.abort();
                return page;
            };

            const result = await fetcher.fetch(requestPage, {
                maxResults: 100,
                pageSize: 25,
                signal: controller.signal,
            });

            expect(result.status).toBe('cancelled');
            expect(result.entries).toHaveLength(25);
            expect(result.requests).toBe(1);
        });

        it('should not request anything when aborted up front', async () => {
            const controller = new AbortController();
            controller.abort();
            const requestPage = vi.fn(pool(10));

            const result = await fetcher.fetch(requestPage, { maxResults: 10, pageSize: 5, signal: controller.signal });

            expect(result.status).toBe('cancelled');
            expect(requestPage).not.toHaveBeenCalled();
        });
    });
});
