import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import type { Author, Paper } from '../types/index.js';

/**
 * Fresh temp directory per call.
 */
export function makeTempDir(prefix = 'bibharvest-test-'): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function makePaper(overrides: Partial<Paper> = {}): Paper {
    return {
        uuid: uuidv4(),
        title: 'Test Paper',
        abstract: null,
        publication_date: '2022-03-01',
        journal: 'Journal of Tests',
        doi: '10.1000/test.1',
        url: null,
        citations: 5,
        keywords: [],
        source: 'scopus',
        source_id: null,
        metadata: {},
        author_uuids: [],
        ...overrides,
    };
}

export function makeAuthor(name: string, overrides: Partial<Author> = {}): Author {
    return { uuid: uuidv4(), name, affiliation: null, orcid: null, ...overrides };
}

/**
 * A raw Scopus search entry with every field the normalizer reads.
 */
export function scopusEntry(overrides: Record<string, unknown> = {}): Record<string, unknown> {
    return {
        'dc:identifier': 'SCOPUS_ID:85000000001',
        eid: '2-s2.0-85000000001',
        'dc:title': 'Graph Methods for Testing',
        'dc:creator': 'Doe J.',
        'prism:publicationName': 'Journal of Tests',
        'prism:coverDate': '2023-05-17',
        'prism:doi': '10.1000/graph.1',
        'prism:url': 'https://api.test/abstract/85000000001',
        'dc:description': 'An abstract about graphs.',
        'citedby-count': '12',
        authkeywords: 'graphs, networks',
        author: [
            { authname: 'Doe J.', affilname: 'Test University', orcid: '0000-0000-0000-0001' },
            { authname: 'Roe R.' },
        ],
        ...overrides,
    };
}

export function jsonResponse(body: unknown, status = 200, statusText = ''): Response {
    return new Response(JSON.stringify(body), {
        status,
        statusText,
        headers: { 'content-type': 'application/json' },
    });
}

/**
 * A Scopus search body wrapping `entries`.
 */
export function searchBody(entries: unknown[]): Record<string, unknown> {
    return { 'search-results': { 'opensearch:totalResults': String(entries.length), entry: entries } };
}
