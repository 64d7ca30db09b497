/**
 * src/scraper/types.ts
 *
 * Shared types for the scraper core: cache entries, fetch outcomes,
 * the HTTP transport seam and the batch-source contract the orchestrator
 * drives.
 */

import type { CacheStore } from './cacheStore.js';
import type { ListingRecord } from './listing.js';

// ─── Cache ────────────────────────────────────────────────────────────────────

export const CACHE_STATUSES = ['pending', 'success', 'failed', 'transient-failure'] as const;

export type CacheStatus = (typeof CACHE_STATUSES)[number];

export interface CacheEntry {
    status: CacheStatus;
    lastAttempt: string | null;  // ISO timestamp, null until first attempt
    attempts: number;
    error?: string;
}

// ─── Fetch Outcome ────────────────────────────────────────────────────────────

/**
 * good    → listing fetched
 * bad     → permanent (gone, forbidden, redirected away, malformed URL)
 * unknown → transient, worth another try in a later session
 */
export type FetchOutcome = 'good' | 'bad' | 'unknown';

// ─── HTTP Transport ───────────────────────────────────────────────────────────

export interface HttpRequest {
    url: string;
    method?: 'GET' | 'POST';
    headers?: Record<string, string>;
    body?: string;
    signal?: AbortSignal;
}

export interface HttpResponse {
    statusCode: number;
    /** Final URL after redirects. */
    url: string;
    body: string;
    headers: Record<string, string | string[] | undefined>;
}

/**
 * One network round-trip. Resolves with any HTTP status; rejects only for
 * transport-level failures (DNS, reset, timeout, redirect loop, bad URL).
 */
export interface HttpTransport {
    request(req: HttpRequest): Promise<HttpResponse>;
}

// ─── Batch Source ─────────────────────────────────────────────────────────────

export type CrawlState = 'discovering' | 'fetching' | 'complete';

export interface BatchContext {
    cache: CacheStore;
    batchSize: number;
    retryFailures: boolean;
    signal?: AbortSignal;
}

export interface BatchResult {
    /** URLs seen for the first time this round. */
    discovered: string[];
    /** Listings fetched this round, ready for the archive. */
    records: ListingRecord[];
    /** Set when the round was cut short (abort, circuit breaker); rethrown once the records are archived. */
    interruptedBy?: unknown;
}

/**
 * Fetch strategy plugged into the orchestrator. Two implementations:
 * TwoPhaseSource (directory scan → detail fetch) and SinglePhaseSource
 * (API pages).
 */
export interface BatchSource {
    readonly name: string;
    /** false once the source has walked its whole listing index. */
    readonly discovering: boolean;
    nextBatch(ctx: BatchContext): Promise<BatchResult>;
}
