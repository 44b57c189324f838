import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import type { Author, CatalogStats, Paper, PaperQuery } from '../types/index.js';
import { isRecord } from '../sources/utils.js';
import { getLogger } from '../utils/logger.js';

/**
 * Catalog schema. Created idempotently; never altered.
 */
const SCHEMA = `
-- Papers: one row per DOI-bearing record
CREATE TABLE IF NOT EXISTS papers (
  uuid TEXT PRIMARY KEY,
  title TEXT NOT NULL,
  abstract TEXT,
  publication_date TEXT,
  journal TEXT,
  doi TEXT UNIQUE,
  url TEXT,
  citations INTEGER NOT NULL DEFAULT 0,
  source TEXT NOT NULL,
  source_id TEXT,
  metadata_json TEXT NOT NULL DEFAULT '{}'
);

-- Authors: scoped to the paper they were ingested with
CREATE TABLE IF NOT EXISTS authors (
  uuid TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  affiliation TEXT,
  orcid TEXT,
  paper_id TEXT REFERENCES papers(uuid)
);

-- Keywords: repeated text across papers is expected
CREATE TABLE IF NOT EXISTS keywords (
  uuid TEXT PRIMARY KEY,
  keyword TEXT NOT NULL,
  paper_id TEXT NOT NULL REFERENCES papers(uuid)
);

-- Paper-Author junction
CREATE TABLE IF NOT EXISTS paper_author_links (
  paper_uuid TEXT NOT NULL REFERENCES papers(uuid),
  author_uuid TEXT NOT NULL REFERENCES authors(uuid),
  PRIMARY KEY (paper_uuid, author_uuid)
);

CREATE INDEX IF NOT EXISTS idx_papers_doi ON papers(doi);
CREATE INDEX IF NOT EXISTS idx_papers_source ON papers(source);
CREATE INDEX IF NOT EXISTS idx_keywords_keyword ON keywords(keyword);
CREATE INDEX IF NOT EXISTS idx_keywords_paper ON keywords(paper_id);
CREATE INDEX IF NOT EXISTS idx_authors_paper ON authors(paper_id);
`;

const DEFAULT_SEARCH_LIMIT = 100;
const TOP_KEYWORDS = 10;

interface PaperRow {
    uuid: string;
    title: string;
    abstract: string | null;
    publication_date: string | null;
    journal: string | null;
    doi: string | null;
    url: string | null;
    citations: number;
    source: string;
    source_id: string | null;
    metadata_json: string;
}

interface CountRow {
    count: number;
}

/**
 * Catalog database wrapper around better-sqlite3.
 * Handles schema creation, WAL mode, foreign keys, writes and read queries.
 */
export class CatalogDatabase {
    private db: Database.Database;

    constructor(dbPath: string) {
        if (dbPath !== ':memory:') {
            mkdirSync(dirname(dbPath), { recursive: true });
        }
        this.db = new Database(dbPath);

        // Set pragmas
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        this.db.exec(SCHEMA);

        getLogger().debug({ dbPath }, 'Database initialized');
    }

    // ─── Papers ───────────────────────────────────────────────

    /**
     * Write a paper with its authors, keywords and links.
     * Runs inside its own transaction; nested calls join the caller's.
     */
    insertPaper(paper: Paper, authors: readonly Author[]): void {
        const paperStmt = this.db.prepare(`
      INSERT INTO papers (uuid, title, abstract, publication_date, journal, doi, url, citations, source, source_id, metadata_json)
      VALUES (@uuid, @title, @abstract, @publication_date, @journal, @doi, @url, @citations, @source, @source_id, @metadata_json)
    `);
        const authorStmt = this.db.prepare(`
      INSERT INTO authors (uuid, name, affiliation, orcid, paper_id)
      VALUES (@uuid, @name, @affiliation, @orcid, @paper_id)
    `);
        const keywordStmt = this.db.prepare('INSERT INTO keywords (uuid, keyword, paper_id) VALUES (?, ?, ?)');
        const linkStmt = this.db.prepare('INSERT INTO paper_author_links (paper_uuid, author_uuid) VALUES (?, ?)');

        this.transaction(() => {
            paperStmt.run(toRow(paper));

            for (const author of authors) {
                authorStmt.run({ ...author, paper_id: paper.uuid });
                linkStmt.run(paper.uuid, author.uuid);
            }

            for (const keyword of paper.keywords) {
                keywordStmt.run(uuidv4(), keyword, paper.uuid);
            }
        });
    }

    /**
     * Raise the stored citation count when `citations` is higher.
     * Returns true when the row changed.
     */
    raiseCitations(uuid: string, citations: number): boolean {
        const result = this.db
            .prepare('UPDATE papers SET citations = ? WHERE uuid = ? AND citations < ?')
            .run(citations, uuid, citations);
        return result.changes > 0;
    }

    getPaperByUuid(uuid: string): Paper | undefined {
        const row = this.db.prepare<[string], PaperRow>('SELECT * FROM papers WHERE uuid = ?').get(uuid);
        return row ? this.hydrate(row) : undefined;
    }

    getPaperByDoi(doi: string): Paper | undefined {
        const row = this.db.prepare<[string], PaperRow>('SELECT * FROM papers WHERE doi = ?').get(doi);
        return row ? this.hydrate(row) : undefined;
    }

    /**
     * Catalog search. Text matches title, abstract or any keyword; papers
     * without a publication date pass the year filters.
     */
    searchPapers(filters: PaperQuery = {}): Paper[] {
        const clauses: string[] = [];
        const params: Record<string, string | number> = {
            limit: filters.limit ?? DEFAULT_SEARCH_LIMIT,
        };

        if (filters.query) {
            clauses.push(`(
        p.title LIKE @pattern OR p.abstract LIKE @pattern
        OR EXISTS (SELECT 1 FROM keywords k WHERE k.paper_id = p.uuid AND k.keyword LIKE @pattern)
      )`);
            params['pattern'] = `%${filters.query}%`;
        }
        if (filters.source) {
            clauses.push('p.source = @source');
            params['source'] = filters.source;
        }
        if (filters.startYear !== undefined) {
            clauses.push('(p.publication_date IS NULL OR p.publication_date >= @startDate)');
            params['startDate'] = `${filters.startYear}-01-01`;
        }
        if (filters.endYear !== undefined) {
            clauses.push('(p.publication_date IS NULL OR p.publication_date <= @endDate)');
            params['endDate'] = `${filters.endYear}-12-31`;
        }

        const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
        const rows = this.db
            .prepare<Record<string, string | number>, PaperRow>(`SELECT p.* FROM papers p ${where} ORDER BY p.rowid LIMIT @limit`)
            .all(params);

        return rows.map((row) => this.hydrate(row));
    }

    getPaperCount(): number {
        return this.count('SELECT COUNT(*) as count FROM papers');
    }

    // ─── Authors ──────────────────────────────────────────────

    /**
     * Authors linked to a paper, in the order they were written.
     */
    getAuthorsForPaper(paperUuid: string): Author[] {
        return this.db
            .prepare<[string], Author>(`
      SELECT a.uuid, a.name, a.affiliation, a.orcid
      FROM paper_author_links l
      JOIN authors a ON a.uuid = l.author_uuid
      WHERE l.paper_uuid = ?
      ORDER BY a.rowid
    `)
            .all(paperUuid);
    }

    getAuthorCount(): number {
        return this.count('SELECT COUNT(*) as count FROM authors');
    }

    // ─── Keywords ─────────────────────────────────────────────

    getKeywordsForPaper(paperUuid: string): string[] {
        return this.db
            .prepare<[string], { keyword: string }>('SELECT keyword FROM keywords WHERE paper_id = ? ORDER BY rowid')
            .all(paperUuid)
            .map((row) => row.keyword);
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): CatalogStats {
        const sourceRows = this.db
            .prepare<[], { source: string; count: number }>('SELECT source, COUNT(*) as count FROM papers GROUP BY source ORDER BY source')
            .all();
        const keywordRows = this.db
            .prepare<[number], { keyword: string; count: number }>(`
      SELECT keyword, COUNT(*) as count FROM keywords
      GROUP BY keyword
      ORDER BY count DESC, keyword ASC
      LIMIT ?
    `)
            .all(TOP_KEYWORDS);

        const papersBySource: Record<string, number> = {};
        for (const row of sourceRows) {
            papersBySource[row.source] = row.count;
        }

        const topKeywords: Record<string, number> = {};
        for (const row of keywordRows) {
            topKeywords[row.keyword] = row.count;
        }

        return {
            total_papers: this.getPaperCount(),
            total_authors: this.getAuthorCount(),
            papers_by_source: papersBySource,
            top_keywords: topKeywords,
        };
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Execute a function within a transaction. Rolls back when `fn` throws.
     */
    transaction<T>(fn: () => T): T {
        return this.db.transaction(fn)();
    }

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
        getLogger().debug('Database closed');
    }

    private count(sql: string): number {
        const row = this.db.prepare<[], CountRow>(sql).get();
        return row?.count ?? 0;
    }

    private hydrate(row: PaperRow): Paper {
        const { metadata_json, ...columns } = row;
        const authorUuids = this.db
            .prepare<[string], { author_uuid: string }>(`
      SELECT l.author_uuid FROM paper_author_links l
      JOIN authors a ON a.uuid = l.author_uuid
      WHERE l.paper_uuid = ?
      ORDER BY a.rowid
    `)
            .all(row.uuid)
            .map((link) => link.author_uuid);

        return {
            ...columns,
            keywords: this.getKeywordsForPaper(row.uuid),
            metadata: parseMetadata(metadata_json),
            author_uuids: authorUuids,
        };
    }
}

function toRow(paper: Paper): PaperRow {
    return {
        uuid: paper.uuid,
        title: paper.title,
        abstract: paper.abstract,
        publication_date: paper.publication_date,
        journal: paper.journal,
        doi: paper.doi,
        url: paper.url,
        citations: paper.citations,
        source: paper.source,
        source_id: paper.source_id,
        metadata_json: JSON.stringify(paper.metadata),
    };
}

function parseMetadata(json: string): Record<string, unknown> {
    const value: unknown = JSON.parse(json);
    return isRecord(value) ? value : {};
}
