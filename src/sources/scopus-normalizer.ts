import { v4 as uuidv4 } from 'uuid';
import type { Author, MalformedEntry, NormalizeResult, Paper } from '../types/index.js';
import { PaperBatch } from '../ingest/paper-batch.js';
import { validatePaper } from '../ingest/validation.js';
import { parseIsoDate } from '../utils/dates.js';
import { MalformedEntryError, ValidationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import {
    isRecord,
    parseCount,
    readRecordList,
    readString,
    splitKeywords,
    stripDoiPrefix,
    type RawRecord,
} from './utils.js';

export const SCOPUS_SOURCE = 'scopus';

/**
 * Normalize raw Scopus search entries into a PaperBatch.
 *
 * Entries that are not objects, have no title, or break a Paper invariant
 * are skipped and reported with their index. Output keeps input order.
 */
export function normalizeScopusEntries(entries: readonly unknown[]): NormalizeResult {
    const logger = getLogger();
    const batch = new PaperBatch();
    const malformed: MalformedEntry[] = [];

    entries.forEach((entry, index) => {
        try {
            const { paper, authors } = normalizeEntry(entry, index);
            batch.addPaper(paper, authors);
        } catch (error) {
            if (!(error instanceof MalformedEntryError)) throw error;
            logger.warn({ index, reason: error.message }, 'Skipping malformed Scopus entry');
            malformed.push({ index, reason: error.message });
        }
    });

    return { batch, malformed };
}

function normalizeEntry(entry: unknown, index: number): { paper: Paper; authors: Author[] } {
    if (!isRecord(entry)) {
        throw new MalformedEntryError('Entry is not an object', index);
    }

    const title = readString(entry, 'dc:title');
    if (!title) {
        throw new MalformedEntryError('Entry has no title', index);
    }

    const authors = readAuthors(entry);
    const sourceId = readString(entry, 'dc:identifier');

    const paper: Paper = {
        uuid: uuidv4(),
        title,
        abstract: readString(entry, 'dc:description'),
        publication_date: readCoverDate(entry, index),
        journal: readString(entry, 'prism:publicationName'),
        doi: stripDoiPrefix(readString(entry, 'prism:doi')),
        url: readString(entry, 'prism:url'),
        citations: parseCount(entry['citedby-count']),
        keywords: splitKeywords(readString(entry, 'authkeywords')),
        source: SCOPUS_SOURCE,
        source_id: sourceId,
        metadata: {
            scopus_id: sourceId ? sourceId.replace('SCOPUS_ID:', '') : null,
            eid: readString(entry, 'eid'),
        },
        author_uuids: authors.map((author) => author.uuid),
    };

    try {
        validatePaper(paper);
    } catch (error) {
        if (error instanceof ValidationError) {
            throw new MalformedEntryError(error.message, index);
        }
        throw error;
    }

    return { paper, authors };
}

/**
 * `author` arrives as one object or a list. Without it, `dc:creator` names
 * the first author.
 */
function readAuthors(entry: RawRecord): Author[] {
    const items = readRecordList(entry, 'author');

    if (items.length > 0) {
        return items.map((item) => ({
            uuid: uuidv4(),
            name: readString(item, 'authname') ?? '',
            affiliation: readString(item, 'affilname'),
            orcid: readString(item, 'orcid'),
        }));
    }

    const creator = readString(entry, 'dc:creator');
    if (creator) {
        return [{ uuid: uuidv4(), name: creator, affiliation: null, orcid: null }];
    }

    return [];
}

function readCoverDate(entry: RawRecord, index: number): string | null {
    const raw = readString(entry, 'prism:coverDate');
    if (raw === null) return null;

    const date = parseIsoDate(raw);
    if (date === null) {
        getLogger().warn({ index, coverDate: raw }, 'Unparseable publication date');
    }
    return date;
}

/**
 * Scopus returns a single `{ error: "Result set was empty" }` entry for
 * searches with no hits.
 */
export function isEmptyResultSentinel(entries: readonly unknown[]): boolean {
    const [first] = entries;
    return entries.length === 1 && isRecord(first) && 'error' in first;
}
