import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { buildQuery, runIngestion, type IngestRequest } from '../ingest/pipeline.js';
import { normalizeScopusEntries } from '../sources/scopus-normalizer.js';
import { CatalogDatabase } from '../storage/database.js';
import type { ExportEnvelope } from '../exporters/export.js';
import {
    DEFAULT_CONFIG,
    type BibHarvestConfig,
    type SearchFilters,
    type SearchOutcome,
    type SourceAdapter,
} from '../types/index.js';
import { ConfigurationError, ValidationError } from '../utils/errors.js';
import { jsonResponse, makeTempDir, scopusEntry, searchBody } from './helpers.js';

const FIXED_NOW = new Date(Date.UTC(2024, 0, 2, 3, 4, 5));

const RAW_ENTRIES: unknown[] = [
    scopusEntry({ 'dc:title': 'First', 'prism:doi': '10.1000/first' }),
    scopusEntry({ 'dc:title': 'Second', 'prism:doi': '10.1000/second', 'citedby-count': '3' }),
    scopusEntry({ 'dc:title': 'No DOI', 'prism:doi': undefined }),
    'not an entry',
];

/**
 * Adapter that serves fixed entries and records what it was asked for.
 */
function fakeAdapter(raw: unknown[], extra: Partial<Pick<SearchOutcome, 'status' | 'error'>> = {}) {
    const search = vi.fn(async (_query: string, _filters?: SearchFilters): Promise<SearchOutcome> => ({
        ...normalizeScopusEntries(raw),
        fetched: raw.length,
        requests: 1,
        status: 'complete',
        ...extra,
    }));
    const adapter: SourceAdapter = {
        name: 'Fake',
        sourceId: 'scopus',
        search,
        parseResults: (entries) => normalizeScopusEntries(entries),
    };
    return { adapter, search };
}

function readEnvelope(file: string): ExportEnvelope {
    return JSON.parse(fs.readFileSync(file, 'utf-8'));
}

describe('buildQuery', () => {
    it('should combine a raw query with exclusions and year bounds', () => {
        const builder = buildQuery({
            source: 'scopus',
            query: 'TITLE-ABS-KEY(graphs)',
            exclusions: ['survey'],
            startYear: 2020,
            endYear: 2023,
        });

        expect(builder.render()).toBe('TITLE-ABS-KEY(graphs) AND NOT survey AND PUBYEAR > 2019 AND PUBYEAR < 2024');
    });

    it('should quote every term when exact', () => {
        const builder = buildQuery({ source: 'scopus', terms: ['graphs'], inclusions: ['gnn'], exact: true });
        expect(builder.render()).toBe('"graphs" AND "gnn"');
    });
});

describe('runIngestion', () => {
    let tmpDir: string;
    let config: BibHarvestConfig;
    let db: CatalogDatabase;

    beforeEach(() => {
        tmpDir = makeTempDir();
        config = {
            ...DEFAULT_CONFIG,
            dbPath: path.join(tmpDir, 'catalog.db'),
            requestsDir: path.join(tmpDir, 'requests'),
            scopus: {
                ...DEFAULT_CONFIG.scopus,
                apiKey: 'test-secret',
                apiUrl: 'https://api.test/search',
                maxResultsPerRequest: 2,
                retryCount: 0,
                rateLimitPauseMs: 0,
            },
        };
        db = new CatalogDatabase(config.dbPath);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
        db.close();
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    const request: IngestRequest = { source: 'scopus', query: 'TITLE-ABS-KEY(graphs)', maxResults: 10 };

    it('should fetch, persist and export a batch', async () => {
        const { adapter, search } = fakeAdapter(RAW_ENTRIES);

        const report = await runIngestion(request, { config, db, adapter, now: () => FIXED_NOW });

        expect(search).toHaveBeenCalledWith('TITLE-ABS-KEY(graphs)', {
            maxResults: 10,
            pageSize: DEFAULT_CONFIG.pageSize,
            signal: undefined,
        });
        expect(report).toMatchObject({
            query: 'TITLE-ABS-KEY(graphs)',
            timestamp: '20240102_030405',
            fetched: 4,
            normalized: 3,
            fetchStatus: 'complete',
            fetchError: null,
            exportPath: path.join(config.requestsDir, 'scopus_20240102_030405.json'),
        });
        expect(report.malformed).toEqual([{ index: 3, reason: 'Entry is not an object' }]);
        expect(report.persist).toMatchObject({ inserted: 2, merged: 0, skipped: 1, failed: 0 });
        expect(db.getPaperCount()).toBe(2);
    });

    it('should write the export envelope', async () => {
        const { adapter } = fakeAdapter(RAW_ENTRIES);

        const report = await runIngestion(
            { ...request, startYear: 2020 },
            { config, db, adapter, now: () => FIXED_NOW }
        );
        if (!report.exportPath) throw new Error('expected an export');
        const envelope = readEnvelope(report.exportPath);

        expect(envelope).toMatchObject({
            count: 3,
            query: 'TITLE-ABS-KEY(graphs) AND PUBYEAR > 2019',
            timestamp: '20240102_030405',
            start_year: 2020,
            end_year: null,
            source: 'scopus',
        });
        expect(envelope.papers.map((p) => p.title)).toEqual(['First', 'Second', 'No DOI']);
        expect(envelope.papers[0]?.authors.map((a) => a.name)).toEqual(['Doe J.', 'Roe R.']);
        expect(envelope.papers[0]?.publication_date).toBe('2023-05-17');
    });

    it('should merge a repeated run onto the stored papers', async () => {
        await runIngestion({ ...request, saveToJson: false }, { config, db, adapter: fakeAdapter(RAW_ENTRIES).adapter });
        const stored = db.getPaperByDoi('10.1000/first');

        const report = await runIngestion(request, {
            config,
            db,
            adapter: fakeAdapter(RAW_ENTRIES).adapter,
            now: () => FIXED_NOW,
        });

        expect(report.persist).toMatchObject({ inserted: 0, merged: 2, skipped: 1 });
        expect(db.getPaperCount()).toBe(2);
        if (!report.exportPath) throw new Error('expected an export');
        expect(readEnvelope(report.exportPath).papers[0]?.uuid).toBe(stored?.uuid);
    });

    it('should persist what was fetched before a fetch error', async () => {
        const { adapter } = fakeAdapter(RAW_ENTRIES.slice(0, 1), { status: 'partial', error: 'HTTP 503: Service Unavailable' });

        const report = await runIngestion({ ...request, saveToJson: false }, { config, db, adapter });

        expect(report.fetchStatus).toBe('partial');
        expect(report.fetchError).toBe('HTTP 503: Service Unavailable');
        expect(report.persist?.inserted).toBe(1);
        expect(report.exportPath).toBeNull();
    });

    it('should skip the database when asked', async () => {
        const { adapter } = fakeAdapter(RAW_ENTRIES);

        const report = await runIngestion({ ...request, saveToDb: false, saveToJson: false }, { config, adapter });

        expect(report.persist).toBeNull();
        expect(db.getPaperCount()).toBe(0);
    });

    it('should require a database when saving to it', async () => {
        const { adapter } = fakeAdapter(RAW_ENTRIES);
        await expect(runIngestion(request, { config, adapter })).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('should reject an empty query', async () => {
        const { adapter, search } = fakeAdapter(RAW_ENTRIES);

        await expect(runIngestion({ source: 'scopus', startYear: 2020 }, { config, db, adapter })).rejects.toBeInstanceOf(
            ValidationError
        );
        expect(search).not.toHaveBeenCalled();
    });

    it('should reject an unknown source', async () => {
        await expect(runIngestion({ ...request, source: 'arxiv' }, { config, db })).rejects.toBeInstanceOf(
            ConfigurationError
        );
    });

    it('should keep partial progress when cancelled', async () => {
        const controller = new AbortController();
        const pool = [
            scopusEntry({ 'dc:title': 'A', 'prism:doi': '10.1000/a' }),
            scopusEntry({ 'dc:title': 'B', 'prism:doi': '10.1000/b' }),
            scopusEntry({ 'dc:title': 'C', 'prism:doi': '10.1000/c' }),
        ];
        const fetchMock = vi.fn(async (input: string) => {
            const start = Number(new URL(input).searchParams.get('start'));
            controller.abort();
            return jsonResponse(searchBody(pool.slice(start, start + 2)));
        });
        vi.stubGlobal('fetch', fetchMock);

        const report = await runIngestion(
            { ...request, pageSize: 2, saveToJson: false, signal: controller.signal },
            { config, db }
        );

        expect(report.fetchStatus).toBe('cancelled');
        expect(report.fetched).toBe(2);
        expect(report.persist?.inserted).toBe(2);
        expect(fetchMock).toHaveBeenCalledTimes(1);
    });
});
