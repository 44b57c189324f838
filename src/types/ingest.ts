/**
 * How a paginated fetch ended.
 * - complete: a termination rule was reached normally
 * - partial: a fetch error ended pagination early
 * - cancelled: the caller aborted
 */
export type FetchStatus = 'complete' | 'partial' | 'cancelled';

/**
 * Terminal state of one paper in the persistence engine.
 */
export type PersistOutcome = 'inserted' | 'merged' | 'skipped' | 'failed';

export interface PaperOutcome {
    /** UUID after persistence (the stored one for merged papers) */
    paper_uuid: string;
    doi: string | null;
    title: string;
    outcome: PersistOutcome;
    reason?: string;
}

/**
 * Tallies of one persistence pass.
 */
export interface PersistSummary {
    inserted: number;
    merged: number;
    skipped: number;
    failed: number;
    /** One entry per paper, in batch order */
    outcomes: PaperOutcome[];
}

/**
 * Catalog statistics returned by the read side.
 */
export interface CatalogStats {
    total_papers: number;
    total_authors: number;
    papers_by_source: Record<string, number>;
    top_keywords: Record<string, number>;
}

/**
 * Filters for catalog searches.
 */
export interface PaperQuery {
    /** Substring matched against title, abstract and keywords */
    query?: string;
    source?: string;
    startYear?: number;
    endYear?: number;
    limit?: number;
}
