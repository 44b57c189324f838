/**
 * Library entry point.
 */
export * from './types/index.js';
export * from './utils/errors.js';
export { resolveConfig, type ConfigOverrides } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';
export { HttpClient, computeBackoff, parseRetryAfter, type RetryPolicy, type HttpClientOptions } from './utils/http-client.js';
export { QueryBuilder, formatPhrase, type DateInput, type QuerySnapshot } from './query/query-builder.js';
export { PaginatedFetcher, type FetchResult, type PageRequest } from './sources/paginated-fetcher.js';
export { normalizeScopusEntries } from './sources/scopus-normalizer.js';
export { ScopusAdapter } from './sources/scopus.js';
export { createSourceAdapter, isSourceName, listSources } from './sources/registry.js';
export { PaperBatch } from './ingest/paper-batch.js';
export { validatePaper, PaperSchema } from './ingest/validation.js';
export { persistBatch } from './ingest/persistence.js';
export { runIngestion, buildQuery, type IngestRequest, type IngestDependencies, type IngestReport } from './ingest/pipeline.js';
export { CatalogDatabase } from './storage/database.js';
export {
    buildEnvelope,
    envelopeFromBatch,
    envelopeFromCatalog,
    findLatestExport,
    readEnvelope,
    writeEnvelope,
    writeRequestExport,
    type ExportEnvelope,
    type ExportedPaper,
} from './exporters/export.js';
