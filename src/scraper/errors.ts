/**
 * src/scraper/errors.ts
 *
 * Named failures that leave the scraper core. Everything retryable is absorbed
 * inside the fetcher / sources; what is thrown from here reaches the operator.
 */

import type { FetchOutcome } from './types.js';

/**
 * Raised by UrlFetcher once `maxConsecutiveFailures` transient outcomes have
 * been seen in a row. Fatal for the current propagate() call.
 */
export class CircuitBreakerTrippedError extends Error {
    readonly consecutiveFailures: number;
    readonly lastUrl: string | undefined;
    /** Classified result for `lastUrl` when the trip came from fetching it; absent on a fail-fast call. */
    readonly lastAttempt: { outcome: FetchOutcome; error?: string } | undefined;

    constructor(
        consecutiveFailures: number,
        lastUrl?: string,
        lastAttempt?: { outcome: FetchOutcome; error?: string }
    ) {
        super(
            `Circuit breaker tripped: ${consecutiveFailures} consecutive transient failures` +
            (lastUrl ? ` (last: ${lastUrl})` : '')
        );
        this.name = 'CircuitBreakerTrippedError';
        this.consecutiveFailures = consecutiveFailures;
        this.lastUrl = lastUrl;
        this.lastAttempt = lastAttempt;
    }
}

/** Too many API pages in a row failed for the single-phase source. */
export class BatchFailureLimitError extends Error {
    readonly failedBatches: number;

    constructor(failedBatches: number, lastOffset: number) {
        super(`${failedBatches} consecutive API batches failed (last offset ${lastOffset})`);
        this.name = 'BatchFailureLimitError';
        this.failedBatches = failedBatches;
    }
}

/** A fetched page could not be turned into a listing record. */
export class ListingParseError extends Error {
    readonly url: string;

    constructor(url: string, message: string) {
        super(`Could not parse ${url}: ${message}`);
        this.name = 'ListingParseError';
        this.url = url;
    }
}

export class UnknownCrawlerError extends Error {
    constructor(name: string, available: readonly string[]) {
        super(`Crawler '${name}' is not registered. Available: ${available.join(', ') || '(none)'}`);
        this.name = 'UnknownCrawlerError';
    }
}

/** True for the rejection produced by an aborted AbortSignal. */
export function isAbortError(err: unknown): boolean {
    return err instanceof Error && err.name === 'AbortError';
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
