/**
 * Log level options. `silent` turns logging off entirely.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Registered provider names.
 */
export type SourceName = 'scopus';

/**
 * Connection, retry and paging settings for one provider.
 */
export interface ProviderConfig {
    /** Sent as the provider's API key header */
    apiKey?: string;

    /** Search endpoint */
    apiUrl: string;

    /** Bound on the wait for response headers */
    connectTimeoutMs: number;

    /** Bound on the whole request, body included */
    requestTimeoutMs: number;

    /** Largest page the provider serves */
    maxResultsPerRequest: number;

    /** Retries after the first attempt */
    retryCount: number;

    /** Delay before the first retry */
    retryBaseDelayMs: number;

    /** Multiplier applied per retry attempt */
    retryBackoff: number;

    /** Upper bound on any single backoff delay */
    maxBackoffMs: number;

    /** Pause between successful page requests */
    rateLimitPauseMs: number;

    userAgent: string;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface BibHarvestConfig {
    /** SQLite catalog path */
    dbPath: string;

    /** Directory receiving JSON batch exports */
    requestsDir: string;

    // Fetch defaults
    maxResults: number;
    pageSize: number;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    scopus: ProviderConfig;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: BibHarvestConfig = {
    dbPath: './vault/bibharvest.db',
    requestsDir: './vault/requests',
    maxResults: 100,
    pageSize: 25,
    logLevel: 'info',
    jsonLogs: false,
    scopus: {
        apiUrl: 'https://api.elsevier.com/content/search/scopus',
        connectTimeoutMs: 10000,
        requestTimeoutMs: 30000,
        maxResultsPerRequest: 25,
        retryCount: 3,
        retryBaseDelayMs: 1000,
        retryBackoff: 1.5,
        maxBackoffMs: 30000,
        rateLimitPauseMs: 1000,
        userAgent: 'bibharvest/1.0.0',
    },
};
