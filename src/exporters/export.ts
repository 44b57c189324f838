import { existsSync, mkdirSync, readFileSync, readdirSync, statSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import type { PaperBatch } from '../ingest/paper-batch.js';
import { PaperSchema } from '../ingest/validation.js';
import type { CatalogDatabase } from '../storage/database.js';
import type { Author, Paper } from '../types/index.js';
import { fileTimestamp } from '../utils/dates.js';
import { ValidationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

// ─── Types ───────────────────────────────────────────────

export type ExportedPaper = Paper & { authors: Author[] };

/**
 * JSON envelope written for a batch of papers.
 */
export interface ExportEnvelope {
    papers: ExportedPaper[];
    count: number;
    query: string | null;
    /** `YYYYMMDD_HHMMSS`, UTC */
    timestamp: string;
    start_year: number | null;
    end_year: number | null;
    source: string;
}

export interface ExportContext {
    query?: string | null;
    startYear?: number | null;
    endYear?: number | null;
    source: string;
    /** Defaults to now */
    date?: Date;
}

// ─── Envelope ───────────────────────────────────────────

/**
 * Build the envelope. `authorsOf` resolves each paper's authors, from a
 * batch or from the catalog.
 */
export function buildEnvelope(
    papers: readonly Paper[],
    authorsOf: (paper: Paper) => Author[],
    context: ExportContext
): ExportEnvelope {
    const exported = papers.map((paper) => ({ ...paper, authors: authorsOf(paper) }));

    return {
        papers: exported,
        count: exported.length,
        query: context.query ?? null,
        timestamp: fileTimestamp(context.date),
        start_year: context.startYear ?? null,
        end_year: context.endYear ?? null,
        source: context.source,
    };
}

export function envelopeFromBatch(batch: PaperBatch, context: ExportContext): ExportEnvelope {
    return buildEnvelope(batch.papers, (paper) => batch.authorsOf(paper), context);
}

export function envelopeFromCatalog(db: CatalogDatabase, papers: readonly Paper[], context: ExportContext): ExportEnvelope {
    return buildEnvelope(papers, (paper) => db.getAuthorsForPaper(paper.uuid), context);
}

// ─── Files ──────────────────────────────────────────────

/**
 * Write the envelope to `outputPath`. The directory must exist.
 */
export function writeEnvelope(envelope: ExportEnvelope, outputPath: string): string {
    writeFileSync(outputPath, JSON.stringify(envelope, null, 2), 'utf-8');
    getLogger().info({ outputPath, papers: envelope.count }, 'Papers exported');
    return outputPath;
}

/**
 * Write the envelope as `<requestsDir>/<source>_<timestamp>.json`.
 */
export function writeRequestExport(envelope: ExportEnvelope, requestsDir: string): string {
    mkdirSync(requestsDir, { recursive: true });
    return writeEnvelope(envelope, join(requestsDir, `${envelope.source}_${envelope.timestamp}.json`));
}

// ─── Reading ────────────────────────────────────────────

const EnvelopeSchema = z.object({
    papers: z.array(
        PaperSchema.extend({
            authors: z.array(
                z.object({
                    uuid: z.string(),
                    name: z.string(),
                    affiliation: z.string().nullable(),
                    orcid: z.string().nullable(),
                })
            ),
        })
    ),
    count: z.number().int().nonnegative(),
    query: z.string().nullable(),
    timestamp: z.string(),
    start_year: z.number().int().nullable(),
    end_year: z.number().int().nullable(),
    source: z.string(),
});

/**
 * Read an envelope written by `writeEnvelope`.
 */
export function readEnvelope(inputPath: string): ExportEnvelope {
    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(inputPath, 'utf-8'));
    } catch (error) {
        if (!(error instanceof SyntaxError)) throw error;
        throw new ValidationError(`${inputPath} is not valid JSON`, 'file');
    }

    const result = EnvelopeSchema.safeParse(raw);
    if (!result.success) {
        const issue = result.error.issues[0];
        const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
        throw new ValidationError(`${inputPath} is not a paper export${where}: ${issue?.message ?? 'invalid'}`, 'file');
    }
    return result.data;
}

/**
 * Most recently written `.json` export in `requestsDir`, or null when there
 * is none.
 */
export function findLatestExport(requestsDir: string): string | null {
    if (!existsSync(requestsDir)) return null;

    const candidates = readdirSync(requestsDir)
        .filter((name) => name.endsWith('.json'))
        .map((name) => {
            const path = join(requestsDir, name);
            return { name, path, mtimeMs: statSync(path).mtimeMs };
        })
        .sort((a, b) => b.mtimeMs - a.mtimeMs || b.name.localeCompare(a.name));

    return candidates[0]?.path ?? null;
}
