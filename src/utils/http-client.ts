import { getLogger } from './logger.js';
import { sleep } from './time.js';

/**
 * Error classification for HTTP responses.
 * 429 is deliberately absent: rate limiting is surfaced to the caller, which
 * decides whether to halt.
 */
const RETRYABLE_STATUS_CODES = new Set([500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

export const RATE_LIMIT_STATUS = 429;

/**
 * Token bucket rate limiter.
 * Allows `tokensPerSecond` requests per second with burst capacity.
 */
class TokenBucket {
    private tokens: number;
    private lastRefill: number;

    constructor(
        private readonly tokensPerSecond: number,
        private readonly maxTokens: number
    ) {
        this.tokens = maxTokens;
        this.lastRefill = Date.now();
    }

    async acquire(): Promise<void> {
        this.refill();

        if (this.tokens >= 1) {
            this.tokens -= 1;
            return;
        }

        // Wait until a token is available
        const waitMs = ((1 - this.tokens) / this.tokensPerSecond) * 1000;
        await sleep(waitMs);
        this.refill();
        this.tokens -= 1;
    }

    private refill(): void {
        const now = Date.now();
        const elapsed = (now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.tokensPerSecond);
        this.lastRefill = now;
    }
}

/**
 * Per-source rate limit configurations.
 */
const RATE_LIMITS: Record<string, { tokensPerSecond: number; maxBurst: number }> = {
    openai: { tokensPerSecond: 5, maxBurst: 5 },
    ollama: { tokensPerSecond: 100, maxBurst: 100 },   // Local, effectively unlimited
    default: { tokensPerSecond: 5, maxBurst: 5 },
};

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    method?: 'GET' | 'POST' | 'PUT' | 'DELETE';
    headers?: Record<string, string>;
    body?: string | object;
    timeout?: number;
    source?: string;  // For per-source rate limiting
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

export interface HttpClientOptions {
    timeout?: number;
    version?: string;
    maxRetries?: number;
    initialBackoffMs?: number;
    maxBackoffMs?: number;
}

/**
 * HTTP error with classification.
 * `status` is 0 for network failures and timeouts.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown,
        public readonly retryAfterMs?: number
    ) {
        super(message);
        this.name = 'HttpError';
    }

    get isRateLimit(): boolean {
        return this.status === RATE_LIMIT_STATUS;
    }
}

/**
 * Centralized HTTP client with per-source rate limiting and retry logic.
 */
export class HttpClient {
    private buckets = new Map<string, TokenBucket>();
    private requestCounts = new Map<string, number>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;
    private readonly maxRetries: number;
    private readonly initialBackoff: number;
    private readonly maxBackoff: number;

    constructor(options?: HttpClientOptions) {
        this.defaultTimeout = options?.timeout ?? 30000;
        this.maxRetries = options?.maxRetries ?? 3;
        this.initialBackoff = options?.initialBackoffMs ?? 1000;
        this.maxBackoff = options?.maxBackoffMs ?? 30000;
        const version = options?.version ?? '1.0.0';
        this.userAgent = `grantmap/${version}`;
    }

    /**
     * Make an HTTP request with rate limiting and retry.
     */
    async request<T = unknown>(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<T>> {
        const logger = getLogger();
        const {
            method = 'GET',
            headers = {},
            body,
            timeout = this.defaultTimeout,
            source = 'default',
        } = options;

        // Acquire rate limit token
        const bucket = this.getBucket(source);
        await bucket.acquire();

        // Track request count
        this.requestCounts.set(source, (this.requestCounts.get(source) ?? 0) + 1);

        // Build request options
        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            ...headers,
        };

        let requestBody: string | undefined;
        if (body) {
            if (typeof body === 'object') {
                requestBody = JSON.stringify(body);
                requestHeaders['Content-Type'] = requestHeaders['Content-Type'] ?? 'application/json';
            } else {
                requestBody = body;
            }
        }

        for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
            const controller = new AbortController();
            const timeoutId = setTimeout(() => controller.abort(), timeout);

            try {
                const response = await fetch(url, {
                    method,
                    headers: requestHeaders,
                    body: requestBody,
                    signal: controller.signal,
                });

                // Parse response
                const contentType = response.headers.get('content-type') ?? '';
                let data: unknown;
                if (contentType.includes('application/json')) {
                    data = await response.json();
                } else {
                    data = await response.text();
                }

                // Build headers map
                const responseHeaders: Record<string, string> = {};
                response.headers.forEach((value, key) => {
                    responseHeaders[key] = value;
                });

                // Check for errors
                if (!response.ok) {
                    const retryable = RETRYABLE_STATUS_CODES.has(response.status);
                    const retryAfter = this.parseRetryAfter(response.headers.get('retry-after'));

                    if (retryable && attempt < this.maxRetries) {
                        const backoff = retryAfter ?? this.calculateBackoff(attempt);

                        logger.warn(
                            { status: response.status, attempt: attempt + 1, backoffMs: backoff, url },
                            'Retryable HTTP error, backing off'
                        );
                        await sleep(backoff);
                        continue;
                    }

                    throw new HttpError(
                        `HTTP ${response.status}: ${response.statusText}`,
                        response.status,
                        retryable,
                        data,
                        retryAfter ?? undefined
                    );
                }

                // Callers validate the payload shape
                return { status: response.status, headers: responseHeaders, data: data as T, ok: true };
            } catch (error) {
                if (error instanceof HttpError) throw error;

                if (error instanceof Error && error.name === 'AbortError') {
                    throw new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true);
                }

                const errorCode = errorCodeOf(error);
                const retryable = errorCode ? RETRYABLE_ERROR_CODES.has(errorCode) : false;

                if (retryable && attempt < this.maxRetries) {
                    const backoff = this.calculateBackoff(attempt);
                    logger.warn(
                        { errorCode, attempt: attempt + 1, backoffMs: backoff, url },
                        'Retryable network error, backing off'
                    );
                    await sleep(backoff);
                    continue;
                }

                throw new HttpError(
                    `Network error: ${error instanceof Error ? error.message : String(error)}`,
                    0,
                    retryable
                );
            } finally {
                clearTimeout(timeoutId);
            }
        }

        throw new HttpError(`Max retries exceeded for ${url}`, 0, false);
    }

    /**
     * Convenience method for GET requests.
     */
    async get<T = unknown>(url: string, options?: Omit<HttpRequestOptions, 'method'>): Promise<HttpResponse<T>> {
        return this.request<T>(url, { ...options, method: 'GET' });
    }

    /**
     * Convenience method for POST requests.
     */
    async post<T = unknown>(url: string, body: string | object, options?: Omit<HttpRequestOptions, 'method' | 'body'>): Promise<HttpResponse<T>> {
        return this.request<T>(url, { ...options, method: 'POST', body });
    }

    /**
     * Requests sent so far, per source.
     */
    getAllRequestCounts(): Record<string, number> {
        return Object.fromEntries(this.requestCounts.entries());
    }

    private getBucket(source: string): TokenBucket {
        let bucket = this.buckets.get(source);
        if (!bucket) {
            const config = RATE_LIMITS[source] ?? { tokensPerSecond: 5, maxBurst: 5 };
            bucket = new TokenBucket(config.tokensPerSecond, config.maxBurst);
            this.buckets.set(source, bucket);
        }
        return bucket;
    }

    private parseRetryAfter(header: string | null): number | null {
        if (!header) return null;

        // Try parsing as seconds
        const seconds = parseInt(header, 10);
        if (!isNaN(seconds)) return seconds * 1000;

        // Try parsing as HTTP date
        const date = new Date(header);
        if (!isNaN(date.getTime())) {
            return Math.max(0, date.getTime() - Date.now());
        }

        return null;
    }

    private calculateBackoff(attempt: number): number {
        // Exponential backoff with jitter
        const exponential = this.initialBackoff * Math.pow(2, attempt);
        const jitter = Math.random() * exponential * 0.5;
        return Math.min(this.maxBackoff, exponential + jitter);
    }
}

function errorCodeOf(error: unknown): string | undefined {
    if (typeof error !== 'object' || error === null) return undefined;
    const code = 'code' in error ? error.code : undefined;
    if (typeof code === 'string') return code;
    // undici wraps socket errors in `cause`
    const cause = 'cause' in error ? error.cause : undefined;
    return cause !== error ? errorCodeOf(cause) : undefined;
}

/**
 * Create a new HTTP client (for testing or custom configuration).
 */
export function createHttpClient(options?: HttpClientOptions): HttpClient {
    return new HttpClient(options);
}
