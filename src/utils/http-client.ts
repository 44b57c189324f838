import { getLogger } from './logger.js';
import {
    FetchCancelledError,
    NonRetryableFetchError,
    TransientFetchError,
    describeError,
} from './errors.js';

/**
 * Error classification for HTTP responses.
 * 429 is the provider's quota signal; the rest are server-side hiccups.
 */
const RATE_LIMIT_STATUS_CODES = new Set([429]);
const RETRYABLE_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504]);

/**
 * Retry settings: `delay = baseDelayMs * backoff^attempt`, capped at `maxBackoffMs`.
 */
export interface RetryPolicy {
    retryCount: number;
    baseDelayMs: number;
    backoff: number;
    maxBackoffMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    retryCount: 3,
    baseDelayMs: 1000,
    backoff: 1.5,
    maxBackoffMs: 30000,
};

/**
 * HTTP client construction options.
 */
export interface HttpClientOptions {
    connectTimeoutMs?: number;
    requestTimeoutMs?: number;
    userAgent?: string;
    retry?: Partial<RetryPolicy>;
}

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    method?: 'GET' | 'POST';
    headers?: Record<string, string>;
    /** Query parameters appended to the URL */
    params?: Record<string, string | number>;
    signal?: AbortSignal;
    source?: string; // For per-source request counting
}

/**
 * HTTP response wrapper.
 */
export interface HttpResponse<T = unknown> {
    status: number;
    headers: Record<string, string>;
    data: T;
    ok: boolean;
}

type AttemptResult =
    | { kind: 'response'; response: Response; text: string }
    | { kind: 'network'; error: unknown; timedOut: 'connect' | 'request' | null };

/**
 * HTTP client issuing one request at a time with timeouts and retry.
 *
 * Transient failures (network errors, timeouts, 408/429/5xx) are retried up to
 * `retryCount` times and then raised as `TransientFetchError`. Other error
 * statuses and unparseable JSON bodies raise `NonRetryableFetchError` at once.
 * An aborted caller signal raises `FetchCancelledError`.
 */
export class HttpClient {
    private requestCounts = new Map<string, number>();
    private readonly connectTimeoutMs: number;
    private readonly requestTimeoutMs: number;
    private readonly userAgent: string;
    private readonly retry: RetryPolicy;

    constructor(options: HttpClientOptions = {}) {
        this.connectTimeoutMs = options.connectTimeoutMs ?? 10000;
        this.requestTimeoutMs = options.requestTimeoutMs ?? 30000;
        this.userAgent = options.userAgent ?? 'bibharvest/1.0.0';
        this.retry = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    }

    /**
     * Make an HTTP request with retry.
     */
    async request<T = unknown>(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<T>> {
        const { method = 'GET', headers = {}, params, signal, source = 'default' } = options;
        const logger = getLogger();
        const target = withParams(url, params);

        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            ...headers,
        };

        for (let attempt = 0; attempt <= this.retry.retryCount; attempt++) {
            if (signal?.aborted) throw new FetchCancelledError(url);

            // Track request count
            this.requestCounts.set(source, (this.requestCounts.get(source) ?? 0) + 1);

            const result = await this.attempt(target, { method, headers: requestHeaders }, signal);
            const canRetry = attempt < this.retry.retryCount;

            if (result.kind === 'network') {
                if (signal?.aborted) throw new FetchCancelledError(url);

                const reason = this.describeFailure(result);

                if (canRetry) {
                    const backoffMs = computeBackoff(attempt, this.retry);
                    logger.warn(
                        { attempt: attempt + 1, backoffMs, url, reason, errorCode: networkErrorCode(result.error) },
                        'Retryable network error, backing off'
                    );
                    await sleep(backoffMs, signal);
                    continue;
                }

                throw new TransientFetchError(`${reason}: ${url}`, 0, undefined, { cause: result.error });
            }

            const { response, text } = result;
            const body = parseBody(response, text);
            const responseHeaders: Record<string, string> = {};
            response.headers.forEach((value, key) => {
                responseHeaders[key] = value;
            });

            if (!response.ok) {
                const message = `HTTP ${response.status}: ${response.statusText}`;

                if (!RETRYABLE_STATUS_CODES.has(response.status)) {
                    throw new NonRetryableFetchError(message, response.status, body.value);
                }

                if (canRetry) {
                    const retryAfter = RATE_LIMIT_STATUS_CODES.has(response.status)
                        ? parseRetryAfter(response.headers.get('retry-after'))
                        : null;
                    const backoffMs = Math.min(retryAfter ?? computeBackoff(attempt, this.retry), this.retry.maxBackoffMs);

                    logger.warn(
                        { status: response.status, attempt: attempt + 1, backoffMs, url },
                        'Retryable HTTP error, backing off'
                    );
                    await sleep(backoffMs, signal);
                    continue;
                }

                throw new TransientFetchError(message, response.status, body.value);
            }

            if (body.invalid) {
                throw new NonRetryableFetchError(`Invalid JSON body from ${url}`, response.status, text);
            }

            // Generic at the call site; the body is whatever the server sent.
            return { status: response.status, headers: responseHeaders, data: body.value as T, ok: true };
        }

        // Should never reach here, but TypeScript needs it
        throw new TransientFetchError(`Max retries exceeded for ${url}`);
    }

    /**
     * Convenience method for GET requests.
     */
    async get<T = unknown>(url: string, options?: Omit<HttpRequestOptions, 'method'>): Promise<HttpResponse<T>> {
        return this.request<T>(url, { ...options, method: 'GET' });
    }

    /**
     * Get request count for a source.
     */
    getRequestCount(source: string): number {
        return this.requestCounts.get(source) ?? 0;
    }

    /**
     * Get all request counts.
     */
    getAllRequestCounts(): Record<string, number> {
        return Object.fromEntries(this.requestCounts.entries());
    }

    /**
     * Reset request counts.
     */
    resetCounts(): void {
        this.requestCounts.clear();
    }

    private describeFailure(result: Extract<AttemptResult, { kind: 'network' }>): string {
        switch (result.timedOut) {
            case 'connect':
                return `Connect timeout after ${this.connectTimeoutMs}ms`;
            case 'request':
                return `Request timeout after ${this.requestTimeoutMs}ms`;
            default:
                return `Network error: ${describeError(result.error)}`;
        }
    }

    /**
     * One fetch with both timeouts. The connect timer stops once headers arrive;
     * the request timer covers the body as well.
     */
    private async attempt(url: string, init: RequestInit, signal?: AbortSignal): Promise<AttemptResult> {
        const controller = new AbortController();
        let timedOut: 'connect' | 'request' | null = null;

        const onAbort = (): void => controller.abort();
        signal?.addEventListener('abort', onAbort, { once: true });

        const connectTimer = setTimeout(() => {
            timedOut = 'connect';
            controller.abort();
        }, this.connectTimeoutMs);
        const requestTimer = setTimeout(() => {
            timedOut ??= 'request';
            controller.abort();
        }, this.requestTimeoutMs);

        try {
            const response = await fetch(url, { ...init, signal: controller.signal });
            clearTimeout(connectTimer);

            const text = await response.text();
            return { kind: 'response', response, text };
        } catch (error) {
            return { kind: 'network', error, timedOut };
        } finally {
            clearTimeout(connectTimer);
            clearTimeout(requestTimer);
            signal?.removeEventListener('abort', onAbort);
        }
    }
}

/**
 * Exponential backoff for a zero-based retry attempt.
 */
export function computeBackoff(attempt: number, policy: Pick<RetryPolicy, 'baseDelayMs' | 'backoff' | 'maxBackoffMs'>): number {
    return Math.min(policy.maxBackoffMs, policy.baseDelayMs * Math.pow(policy.backoff, attempt));
}

/**
 * Parse a Retry-After header (seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(header: string | null): number | null {
    if (!header) return null;

    // Try parsing as seconds
    const seconds = Number(header);
    if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;

    // Try parsing as HTTP date
    const date = new Date(header);
    if (!isNaN(date.getTime())) {
        return Math.max(0, date.getTime() - Date.now());
    }

    return null;
}

/**
 * Sleep for the specified number of milliseconds. Resolves early when the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return Promise.resolve();

    return new Promise((resolve) => {
        const done = (): void => {
            clearTimeout(timer);
            signal?.removeEventListener('abort', done);
            resolve();
        };
        const timer = setTimeout(done, ms);
        signal?.addEventListener('abort', done, { once: true });
    });
}

// undici reports socket failures as TypeError('fetch failed') with the errno on `cause`
function networkErrorCode(error: unknown): string | undefined {
    return errorCode(error) ?? (error instanceof Error ? errorCode(error.cause) : undefined);
}

function errorCode(value: unknown): string | undefined {
    if (typeof value === 'object' && value !== null && 'code' in value && typeof value.code === 'string') {
        return value.code;
    }
    return undefined;
}

function parseBody(response: Response, text: string): { value: unknown; invalid: boolean } {
    const contentType = response.headers.get('content-type') ?? '';
    if (!contentType.includes('application/json') || text === '') {
        return { value: text, invalid: false };
    }

    try {
        return { value: JSON.parse(text), invalid: false };
    } catch {
        return { value: text, invalid: true };
    }
}

function withParams(url: string, params?: Record<string, string | number>): string {
    if (!params) return url;

    const search = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
        search.set(key, String(value));
    }
    return `${url}${url.includes('?') ? '&' : '?'}${search.toString()}`;
}
