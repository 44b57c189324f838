import Database from 'better-sqlite3';
import type { Paper, PaperOutcome, PersistSummary } from '../types/index.js';
import type { CatalogDatabase } from '../storage/database.js';
import { PersistenceConflictError, ValidationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import type { PaperBatch } from './paper-batch.js';
import { validatePaper } from './validation.js';

/**
 * Persist a batch against the catalog, one short transaction per paper.
 *
 * Per paper:
 * - invalid → failed, nothing written
 * - no DOI → skipped
 * - DOI already stored → merged: citations only ever rise, no author or
 *   keyword rows are written, and the batch paper takes the stored UUID
 * - otherwise → inserted with its authors, keywords and links; a constraint
 *   violation at commit rolls back that paper alone and counts as skipped
 * - any other SQLite error rolls back that paper alone and counts as failed
 */
export function persistBatch(db: CatalogDatabase, batch: PaperBatch): PersistSummary {
    const logger = getLogger();
    const summary: PersistSummary = { inserted: 0, merged: 0, skipped: 0, failed: 0, outcomes: [] };

    for (const paper of batch.papers) {
        const outcome = persistPaper(db, batch, paper);
        summary[outcome.outcome]++;
        summary.outcomes.push(outcome);

        logger.debug({ uuid: outcome.paper_uuid, doi: outcome.doi, outcome: outcome.outcome }, 'Persisted paper');
    }

    logger.info(
        { inserted: summary.inserted, merged: summary.merged, skipped: summary.skipped, failed: summary.failed },
        'Batch persisted'
    );
    return summary;
}

function persistPaper(db: CatalogDatabase, batch: PaperBatch, paper: Paper): PaperOutcome {
    const logger = getLogger();
    const base = { doi: paper.doi, title: paper.title };

    try {
        validatePaper(paper);
    } catch (error) {
        if (!(error instanceof ValidationError)) throw error;
        logger.warn({ uuid: paper.uuid, reason: error.message }, 'Paper failed validation');
        return { ...base, paper_uuid: paper.uuid, outcome: 'failed', reason: error.message };
    }

    if (!paper.doi) {
        return { ...base, paper_uuid: paper.uuid, outcome: 'skipped', reason: 'no DOI' };
    }
    const doi = paper.doi;

    try {
        return db.transaction((): PaperOutcome => {
            const existing = db.getPaperByDoi(doi);

            if (existing) {
                const raised = db.raiseCitations(existing.uuid, paper.citations);
                batch.reassignPaper(paper, existing.uuid);
                logger.debug({ doi, stored: existing.uuid, citationsRaised: raised }, 'Merged with stored paper');
                return { ...base, paper_uuid: existing.uuid, outcome: 'merged' };
            }

            try {
                db.insertPaper(paper, batch.authorsOf(paper));
            } catch (error) {
                if (isConstraintViolation(error)) {
                    throw new PersistenceConflictError(`Constraint violation storing DOI ${doi}`, doi, { cause: error });
                }
                throw error;
            }
            return { ...base, paper_uuid: paper.uuid, outcome: 'inserted' };
        });
    } catch (error) {
        if (error instanceof PersistenceConflictError) {
            logger.warn({ doi, reason: error.message }, 'Paper conflicted at commit, skipping');
            return { ...base, paper_uuid: paper.uuid, outcome: 'skipped', reason: error.message };
        }
        if (error instanceof Database.SqliteError) {
            logger.error({ doi, code: error.code, reason: error.message }, 'Failed to store paper');
            return { ...base, paper_uuid: paper.uuid, outcome: 'failed', reason: `${error.code}: ${error.message}` };
        }
        throw error;
    }
}

// Codes like SQLITE_CONSTRAINT_UNIQUE
function isConstraintViolation(error: unknown): boolean {
    return error instanceof Database.SqliteError && error.code.startsWith('SQLITE_CONSTRAINT');
}
