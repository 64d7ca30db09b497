/**
 * src/scraper/urlFetcher.ts
 *
 * One logical fetch = up to `maxRetries` attempts with exponential backoff,
 * then a single classification. Transport errors and transient responses
 * (408, 429, 5xx, …) are retried; the last one is what gets classified. Across calls the fetcher counts
 * consecutive `unknown` outcomes; reaching `maxConsecutiveFailures` trips the
 * breaker and every later call fails fast until reset().
 *
 *   "this URL is broken"         → bad      (counter reset, never retried)
 *   "the target site is degraded" → unknown  (counter grows, breaker trips)
 *   "all good"                   → good     (counter reset)
 */

import { log } from 'crawlee';
import { classifyOutcome, isPermanentError } from './outcome.js';
import { CircuitBreakerTrippedError, errorMessage, isAbortError } from './errors.js';
import type { FetchOutcome, HttpRequest, HttpResponse, HttpTransport } from './types.js';
import { sleep } from '../utils/sleep.js';

export interface UrlFetcherOptions {
    maxConsecutiveFailures: number;
    /** Base backoff between transport attempts (ms). */
    requestDelayMs: number;
    maxRetries: number;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface FetchResult {
    response?: HttpResponse;
    outcome: FetchOutcome;
    error?: string;
}

export type FetchInit = Omit<HttpRequest, 'url'>;

export class UrlFetcher {
    private consecutiveFailures = 0;
    private readonly pause: (ms: number, signal?: AbortSignal) => Promise<void>;

    constructor(
        private readonly transport: HttpTransport,
        private readonly options: UrlFetcherOptions
    ) {
        this.pause = options.sleep ?? sleep;
    }

    get consecutiveTransientFailures(): number {
        return this.consecutiveFailures;
    }

    get tripped(): boolean {
        return this.consecutiveFailures >= this.options.maxConsecutiveFailures;
    }

    reset(): void {
        this.consecutiveFailures = 0;
    }

    async fetch(url: string, init: FetchInit = {}): Promise<FetchResult> {
        if (this.tripped) {
            throw new CircuitBreakerTrippedError(this.consecutiveFailures, url);
        }
        init.signal?.throwIfAborted();

        let result: FetchResult;
        try {
            const response = await this.requestWithRetry({ ...init, url });
            const outcome = classifyOutcome(url, { response });
            result = {
                response,
                outcome,
                error: outcome === 'good' ? undefined : describeResponse(url, response),
            };
        } catch (err) {
            init.signal?.throwIfAborted();
            if (isAbortError(err)) throw err;
            result = { outcome: classifyOutcome(url, { error: err }), error: errorMessage(err) };
        }

        if (result.outcome === 'unknown') {
            this.consecutiveFailures++;
            if (this.tripped) {
                log.error(`[UrlFetcher] Circuit breaker tripped after ${this.consecutiveFailures} transient failures (${url})`);
                throw new CircuitBreakerTrippedError(this.consecutiveFailures, url, {
                    outcome: result.outcome,
                    error: result.error,
                });
            }
        } else {
            this.consecutiveFailures = 0;
        }

        return result;
    }

    private async requestWithRetry(req: HttpRequest): Promise<HttpResponse> {
        const attempts = Math.max(1, this.options.maxRetries);

        for (let attempt = 0; attempt < attempts; attempt++) {
            const isLast = attempt === attempts - 1;
            let reason: string;
            try {
                const response = await this.transport.request(req);
                if (isLast || classifyOutcome(req.url, { response }) !== 'unknown') return response;
                reason = describeResponse(req.url, response);
            } catch (err) {
                req.signal?.throwIfAborted();
                if (isAbortError(err) || isPermanentError(err) || isLast) throw err;
                reason = errorMessage(err);
            }

            const waitMs = this.options.requestDelayMs * 2 ** attempt;
            log.debug(`[UrlFetcher] ${req.url} failed (${reason}), retrying in ${waitMs}ms`);
            await this.pause(waitMs, req.signal);
        }

        throw new Error(`No attempt made for ${req.url}`);
    }
}

function describeResponse(url: string, response: HttpResponse): string {
    return response.url !== url
        ? `HTTP ${response.statusCode} (redirected to ${response.url})`
        : `HTTP ${response.statusCode}`;
}
