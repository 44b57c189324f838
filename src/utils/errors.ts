/**
 * Base class for every error raised by bibharvest.
 */
export class BibHarvestError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'BibHarvestError';
    }
}

/**
 * Missing credentials, unknown provider, or invalid settings. Fatal to a run.
 */
export class ConfigurationError extends BibHarvestError {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/**
 * A value or paper breaks an invariant (malformed DOI, empty phrase, bad date).
 */
export class ValidationError extends BibHarvestError {
    constructor(
        message: string,
        public readonly field?: string
    ) {
        super(message);
        this.name = 'ValidationError';
    }
}

/**
 * HTTP error with classification.
 */
export class FetchError extends BibHarvestError {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'FetchError';
    }
}

/**
 * Network failure, timeout, rate limit or server error that outlived its retries.
 * `status` is 0 when no response was received.
 */
export class TransientFetchError extends FetchError {
    constructor(message: string, status = 0, response?: unknown, options?: { cause?: unknown }) {
        super(message, status, true, response, options);
        this.name = 'TransientFetchError';
    }
}

/**
 * Client or auth error from the provider. Never retried.
 */
export class NonRetryableFetchError extends FetchError {
    constructor(message: string, status: number, response?: unknown) {
        super(message, status, false, response);
        this.name = 'NonRetryableFetchError';
    }
}

/**
 * The caller aborted the request.
 */
export class FetchCancelledError extends BibHarvestError {
    constructor(url: string) {
        super(`Request cancelled: ${url}`);
        this.name = 'FetchCancelledError';
    }
}

/**
 * A single raw entry could not be normalized.
 */
export class MalformedEntryError extends BibHarvestError {
    constructor(
        message: string,
        public readonly index: number
    ) {
        super(message);
        this.name = 'MalformedEntryError';
    }
}

/**
 * Constraint violation when committing a paper.
 */
export class PersistenceConflictError extends BibHarvestError {
    constructor(
        message: string,
        public readonly doi: string | null,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'PersistenceConflictError';
    }
}

/**
 * Human-readable message for anything thrown.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
