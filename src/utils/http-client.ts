import { failed, success, type DelayRange, type FailureKind, type Outcome } from '../types/index.js';
import type { Logger } from './logger.js';

/**
 * Suspends for `ms` milliseconds. Injected so tests never wait in real time.
 */
export type Sleep = (ms: number) => Promise<void>;

/**
 * Uniform random number in [0, 1), injected for deterministic backoff.
 */
export type RandomSource = () => number;

/**
 * Why a single attempt failed. `http-status` is any non-200 other than 429.
 */
export type AttemptFailure = 'rate-limited' | 'http-status' | 'transient-network';

/**
 * Retry policy consumed by HttpClient.
 */
export interface RetryPolicy {
    readonly maxAttempts: number;

    /**
     * Milliseconds to wait after `attempt` (1-based) failed with `failure`,
     * before the next attempt.
     */
    backoff(attempt: number, failure: AttemptFailure): number;
}

export interface BackoffOptions {
    /** Multiplied by the attempt number after an HTTP 429 */
    rateLimitCooldownMs: number;

    /** Range for every other failure */
    jitter: DelayRange;
}

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Random wait drawn from `range`.
 */
export function jitteredDelay(range: DelayRange, random: RandomSource = Math.random): number {
    return range.minMs + random() * (range.maxMs - range.minMs);
}

/**
 * Backoff as a pure function of attempt number and failure kind.
 * A 429 waits attempt × cooldown with no jitter; the server's cooldown is a floor.
 */
export function computeBackoff(
    attempt: number,
    failure: AttemptFailure,
    options: BackoffOptions,
    random: RandomSource = Math.random
): number {
    if (failure === 'rate-limited') {
        return attempt * options.rateLimitCooldownMs;
    }
    return jitteredDelay(options.jitter, random);
}

export function createRetryPolicy(
    options: BackoffOptions & { maxAttempts: number; random?: RandomSource }
): RetryPolicy {
    const random = options.random ?? Math.random;
    return {
        maxAttempts: Math.max(1, options.maxAttempts),
        backoff: (attempt, failure) => computeBackoff(attempt, failure, options, random),
    };
}

/**
 * "crossref=12, openalex=3" in first-request order; "none" when nothing was sent.
 */
export function formatRequestCounts(counts: Record<string, number>): string {
    const entries = Object.entries(counts);
    if (entries.length === 0) return 'none';
    return entries.map(([source, count]) => `${source}=${count}`).join(', ');
}

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    headers?: Record<string, string>;
    timeout?: number;
    source?: string;  // For per-source request counting
}

export interface HttpClientOptions {
    logger: Logger;
    retryPolicy: RetryPolicy;
    timeout?: number;

    /** Sent with every request; per-request headers override them */
    headers?: Record<string, string>;
    sleep?: Sleep;
}

type AttemptResult =
    | { ok: true; body: string }
    | { ok: false; failure: AttemptFailure; message: string; status?: number };

const FINAL_FAILURE: Record<AttemptFailure, FailureKind> = {
    'rate-limited': 'rate-limited',
    'http-status': 'permanent-page',
    'transient-network': 'transient-network',
};

/**
 * GET-only HTTP client with per-attempt timeout and a pluggable retry policy.
 * Never throws for network or HTTP problems: exhausting the attempt budget
 * yields a `failed` outcome that the caller treats as "no data for this URL".
 *
 * One instance per pass; Node's fetch pools connections behind it.
 */
export class HttpClient {
    private requestCounts = new Map<string, number>();
    private readonly logger: Logger;
    private readonly retryPolicy: RetryPolicy;
    private readonly defaultTimeout: number;
    private readonly defaultHeaders: Record<string, string>;
    private readonly sleep: Sleep;

    constructor(options: HttpClientOptions) {
        this.logger = options.logger;
        this.retryPolicy = options.retryPolicy;
        this.defaultTimeout = options.timeout ?? 30000;
        this.defaultHeaders = options.headers ?? {};
        this.sleep = options.sleep ?? sleep;
    }

    /**
     * GET a URL and return its body as text.
     */
    async getText(url: string, options: HttpRequestOptions = {}): Promise<Outcome<string>> {
        return this.request(url, options);
    }

    /**
     * GET a URL and parse its body as JSON. The value is unvalidated; callers
     * run it through their response schema.
     */
    async getJson(url: string, options: HttpRequestOptions = {}): Promise<Outcome<unknown>> {
        const outcome = await this.request(url, options);
        if (outcome.status !== 'success') return outcome;

        try {
            const data: unknown = JSON.parse(outcome.value);
            return success(data);
        } catch (error) {
            this.logger.warn({ url, error }, 'Response body is not valid JSON');
            return failed('permanent-page', `Invalid JSON from ${url}`);
        }
    }

    /** Attempts per source, retries included, for the run summary */
    getAllRequestCounts(): Record<string, number> {
        return Object.fromEntries(this.requestCounts);
    }

    private async request(url: string, options: HttpRequestOptions): Promise<Outcome<string>> {
        const { timeout = this.defaultTimeout, source = 'default' } = options;
        const headers = { ...this.defaultHeaders, ...options.headers };
        const { maxAttempts } = this.retryPolicy;

        let last: Extract<AttemptResult, { ok: false }> = {
            ok: false,
            failure: 'transient-network',
            message: 'No attempt made',
        };

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            this.requestCounts.set(source, (this.requestCounts.get(source) ?? 0) + 1);
            this.logger.debug({ url, attempt }, 'Requesting URL');

            const result = await this.attempt(url, headers, timeout);
            if (result.ok) {
                return success(result.body);
            }
            last = result;

            if (attempt < maxAttempts) {
                const backoffMs = this.retryPolicy.backoff(attempt, result.failure);
                this.logger.warn(
                    { url, status: result.status, failure: result.failure, attempt, backoffMs },
                    result.failure === 'rate-limited' ? 'Rate limited, waiting before retry' : `${result.message}, backing off`
                );
                await this.sleep(backoffMs);
            }
        }

        this.logger.warn(
            { url, status: last.status, failure: last.failure, attempts: maxAttempts },
            'Giving up on URL after exhausting attempts'
        );
        return failed(FINAL_FAILURE[last.failure], `${last.message} (${url})`, last.status);
    }

    private async attempt(url: string, headers: Record<string, string>, timeout: number): Promise<AttemptResult> {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeout);

        try {
            const response = await fetch(url, {
                method: 'GET',
                headers,
                signal: controller.signal,
            });

            if (response.status === 200) {
                return { ok: true, body: await response.text() };
            }

            // Release the connection back to the pool
            await response.body?.cancel();

            return {
                ok: false,
                failure: response.status === 429 ? 'rate-limited' : 'http-status',
                message: `HTTP ${response.status}`,
                status: response.status,
            };
        } catch (error) {
            if (error instanceof Error && error.name === 'AbortError') {
                return { ok: false, failure: 'transient-network', message: `Request timeout after ${timeout}ms` };
            }
            return {
                ok: false,
                failure: 'transient-network',
                message: `Network error: ${error instanceof Error ? error.message : String(error)}`,
            };
        } finally {
            clearTimeout(timeoutId);
        }
    }
}
