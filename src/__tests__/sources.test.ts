import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ScopusAdapter } from '../sources/scopus.js';
import { createSourceAdapter, isSourceName, listSources } from '../sources/registry.js';
import { DEFAULT_CONFIG, type BibHarvestConfig, type ProviderConfig } from '../types/index.js';
import { ConfigurationError, ValidationError } from '../utils/errors.js';
import { jsonResponse, scopusEntry, searchBody } from './helpers.js';

const PROVIDER: ProviderConfig = {
    ...DEFAULT_CONFIG.scopus,
    apiKey: 'test-secret',
    apiUrl: 'https://api.test/search',
    maxResultsPerRequest: 2,
    retryCount: 0,
    rateLimitPauseMs: 0,
};

const CONFIG: BibHarvestConfig = { ...DEFAULT_CONFIG, scopus: PROVIDER };

function entries(count: number): Record<string, unknown>[] {
    return Array.from({ length: count }, (_, i) =>
        scopusEntry({ 'dc:title': `Paper ${i}`, 'prism:doi': `10.1000/p.${i}` })
    );
}

/**
 * Serve `pool` by the `start` and `count` query parameters.
 */
function servePool(pool: unknown[]) {
    return vi.fn(async (input: string) => {
        const params = new URL(input).searchParams;
        const start = Number(params.get('start'));
        const count = Number(params.get('count'));
        return jsonResponse(searchBody(pool.slice(start, start + count)));
    });
}

describe('ScopusAdapter', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    describe('construction', () => {
        it('should require an API key', () => {
            expect(() => new ScopusAdapter({ ...PROVIDER, apiKey: undefined })).toThrow(ConfigurationError);
        });

        it('should require an API URL', () => {
            expect(() => new ScopusAdapter({ ...PROVIDER, apiUrl: '' })).toThrow(ConfigurationError);
        });
    });

    describe('search', () => {
        let adapter: ScopusAdapter;

        beforeEach(() => {
            adapter = new ScopusAdapter(PROVIDER);
        });

        it('should page through results and normalize them', async () => {
            const fetchMock = servePool(entries(3));
            vi.stubGlobal('fetch', fetchMock);

            const outcome = await adapter.search('TITLE-ABS-KEY(graphs)', { maxResults: 10 });

            expect(outcome.status).toBe('complete');
            expect(outcome.fetched).toBe(3);
            expect(outcome.requests).toBe(2);
            expect(outcome.batch.papers.map((p) => p.title)).toEqual(['Paper 0', 'Paper 1', 'Paper 2']);
            expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
                'https://api.test/search?query=TITLE-ABS-KEY%28graphs%29&count=2&start=0&view=COMPLETE',
                'https://api.test/search?query=TITLE-ABS-KEY%28graphs%29&count=2&start=2&view=COMPLETE',
            ]);
        });

        it('should send the API key and accept JSON', async () => {
            const fetchMock = vi.fn(async (_input: string, _init?: RequestInit) => jsonResponse(searchBody([])));
            vi.stubGlobal('fetch', fetchMock);

            await adapter.search('graphs');

            expect(fetchMock.mock.calls[0]?.[1]?.headers).toMatchObject({
                'X-ELS-APIKey': 'test-secret',
                Accept: 'application/json',
            });
        });

        it('should treat the empty result entry as no results', async () => {
            vi.stubGlobal(
                'fetch',
                vi.fn(async () => jsonResponse(searchBody([{ '@_fa': 'true', error: 'Result set was empty' }])))
            );

            const outcome = await adapter.search('nothing');

            expect(outcome.fetched).toBe(0);
            expect(outcome.batch.size).toBe(0);
            expect(outcome.status).toBe('complete');
        });

        it('should report partial results when the provider rejects the key', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ error: 'bad key' }, 401, 'Unauthorized')));

            const outcome = await adapter.search('graphs');

            expect(outcome.status).toBe('partial');
            expect(outcome.error).toBe('HTTP 401: Unauthorized');
            expect(outcome.fetched).toBe(0);
        });

        it('should keep the first page when a later page fails', async () => {
            const pool = entries(4);
            vi.stubGlobal(
                'fetch',
                vi.fn(async (input: string) => {
                    const start = Number(new URL(input).searchParams.get('start'));
                    if (start > 0) return new Response('down', { status: 503, statusText: 'Service Unavailable' });
                    return jsonResponse(searchBody(pool.slice(0, 2)));
                })
            );

            const outcome = await adapter.search('graphs', { maxResults: 10 });

            expect(outcome.status).toBe('partial');
            expect(outcome.error).toBe('HTTP 503: Service Unavailable');
            expect(outcome.batch.size).toBe(2);
        });

        it('should report malformed entries alongside the batch', async () => {
            vi.stubGlobal('fetch', servePool([scopusEntry(), { 'dc:title': '' }]));

            const outcome = await adapter.search('graphs');

            expect(outcome.batch.size).toBe(1);
            expect(outcome.malformed).toEqual([{ index: 1, reason: 'Entry has no title' }]);
        });

        it('should reject an empty query', async () => {
            await expect(adapter.search('  ')).rejects.toBeInstanceOf(ValidationError);
        });
    });
});

describe('source registry', () => {
    it('should list registered sources', () => {
        expect(listSources().map((s) => s.name)).toEqual(['scopus']);
        expect(isSourceName('scopus')).toBe(true);
        expect(isSourceName('arxiv')).toBe(false);
    });

    it('should build the Scopus adapter', () => {
        const adapter = createSourceAdapter('scopus', CONFIG);

        expect(adapter).toBeInstanceOf(ScopusAdapter);
        expect(adapter.sourceId).toBe('scopus');
    });

    it('should reject unknown sources', () => {
        expect(() => createSourceAdapter('arxiv', CONFIG)).toThrow('Unknown source "arxiv". Available: scopus');
    });

    it('should surface missing credentials as configuration errors', () => {
        const config = { ...CONFIG, scopus: { ...PROVIDER, apiKey: undefined } };
        expect(() => createSourceAdapter('scopus', config)).toThrow(ConfigurationError);
    });
});
