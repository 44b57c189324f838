/**
 * Barrel export for all shared types.
 */
export type { Paper, Author, PaperAuthorLink } from './paper.js';
export { DEFAULT_CONFIG } from './config.js';
export type { BibHarvestConfig, ProviderConfig, LogLevel, SourceName } from './config.js';
export type {
    FetchStatus,
    PersistOutcome,
    PaperOutcome,
    PersistSummary,
    CatalogStats,
    PaperQuery,
} from './ingest.js';
export type {
    SourceAdapter,
    SearchFilters,
    SearchOutcome,
    NormalizeResult,
    MalformedEntry,
} from './source-adapter.js';
