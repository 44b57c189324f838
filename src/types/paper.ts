/**
 * Paper interface: the canonical bibliographic record.
 * Normalized from any source into this common shape before persistence.
 */
export interface Paper {
    /** UUID v4, generated at normalization time (replaced by the stored UUID on merge) */
    uuid: string;

    /** Paper title (never empty) */
    title: string;

    abstract: string | null;

    /** Calendar date as `YYYY-MM-DD` */
    publication_date: string | null;

    /** Journal or venue name */
    journal: string | null;

    /** Digital Object Identifier, always starting with `10.` */
    doi: string | null;

    url: string | null;

    /** Citation count observed at the source */
    citations: number;

    /** Ordered, deduplicated per paper */
    keywords: string[];

    /** Source tag, e.g. "scopus" */
    source: string;

    /** Source-native identifier (e.g. "SCOPUS_ID:85012345678") */
    source_id: string | null;

    /** Provider-specific fields that have no column of their own */
    metadata: Record<string, unknown>;

    /** UUIDs of this paper's authors, in author order */
    author_uuids: string[];
}

/**
 * Author as seen on a single ingested paper. The same person appearing on two
 * papers yields two Author records.
 */
export interface Author {
    uuid: string;
    name: string;
    affiliation: string | null;
    orcid: string | null;
}

/**
 * Junction record: links a paper to an author.
 */
export interface PaperAuthorLink {
    paper_uuid: string;
    author_uuid: string;
}
