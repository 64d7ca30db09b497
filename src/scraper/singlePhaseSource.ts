/**
 * src/scraper/singlePhaseSource.ts
 *
 * SINGLE-PHASE CRAWL: one API page per round, complete records included.
 *
 * Round n requests `offset = n * batchSize`. The page's URLs are registered,
 * the eligible ones are stamped and returned for the archive and marked
 * `success`. An empty page ends the crawl's discovery.
 *
 * A page that fails (bad/unknown fetch, unparseable body) marks whatever URLs
 * were already extracted as `failed` and the offset is skipped for this run.
 * That can drop listings on a transient error (e.g. one rate-limited page);
 * whether to retry the same offset instead is an open decision, so the skip
 * is logged with its offset. A circuit-breaker trip or an abort is never
 * absorbed here.
 */

import { log } from 'crawlee';
import type { UrlFetcher } from './urlFetcher.js';
import type { BatchContext, BatchResult, BatchSource, CacheEntry, HttpResponse } from './types.js';
import { stampListing } from './listing.js';
import type { ListingDetails, ListingRecord } from './listing.js';
import { BatchFailureLimitError, CircuitBreakerTrippedError, errorMessage, isAbortError } from './errors.js';

export type ApiListing = ListingDetails & { url: string };

export interface ApiPage {
    urls: string[];
    listings: ApiListing[];
}

/** Site-specific half of a single-phase crawl. */
export interface ApiCrawler {
    readonly name: string;
    pageUrl(offset: number, limit: number): string;
    parseApiResponse(response: HttpResponse): ApiPage;
}

export interface SinglePhaseOptions {
    fetcher: UrlFetcher;
    /** Consecutive failed pages tolerated before the run is aborted. */
    maxConsecutiveFailures: number;
}

export class SinglePhaseSource implements BatchSource {
    private round = 0;
    private exhausted = false;
    private failedInARow = 0;
    private skippedOffsets: number[] = [];

    constructor(
        private readonly crawler: ApiCrawler,
        private readonly options: SinglePhaseOptions
    ) {}

    get name(): string {
        return this.crawler.name;
    }

    get discovering(): boolean {
        return !this.exhausted;
    }

    get roundIndex(): number {
        return this.round;
    }

    /** Offsets given up on during this run. */
    get skipped(): readonly number[] {
        return this.skippedOffsets;
    }

    async nextBatch(ctx: BatchContext): Promise<BatchResult> {
        const { cache, batchSize, retryFailures, signal } = ctx;
        const offset = this.round * batchSize;
        let extracted: string[] = [];

        try {
            const pageUrl = this.crawler.pageUrl(offset, batchSize);
            const { response, outcome, error } = await this.options.fetcher.fetch(pageUrl, { signal });
            if (outcome !== 'good' || !response) {
                throw new Error(`${outcome} response for ${pageUrl}: ${error ?? 'no response'}`);
            }

            const page = this.crawler.parseApiResponse(response);
            extracted = page.urls;

            if (page.urls.length === 0) {
                log.info(`[SinglePhase] ${this.name}: empty page at offset ${offset}; listing exhausted.`);
                this.exhausted = true;
                return { discovered: [], records: [] };
            }

            const discovered = cache.registerDiscovered(page.urls);
            const records = this.collectEligible(ctx, page, cache.pickUrlsToFetch({ candidates: page.urls, retryFailures }));

            log.info(
                `[SinglePhase] ${this.name}: fetched ${page.urls.length} listings at offset ${offset}, ` +
                `${records.length} to archive`
            );
            this.round++;
            this.failedInARow = 0;
            return { discovered, records };
        } catch (err) {
            signal?.throwIfAborted();
            if (err instanceof CircuitBreakerTrippedError || isAbortError(err)) throw err;

            const message = errorMessage(err);
            if (extracted.length > 0) {
                cache.update(extracted.map((url): [string, CacheEntry] => [url, cache.recordOutcome(url, 'bad', message)]));
            }

            log.warning(
                `[SinglePhase] ${this.name}: failed to fetch batch at offset ${offset}: ${message}. ` +
                'Offset skipped for this run.'
            );
            this.skippedOffsets.push(offset);
            this.round++;
            this.failedInARow++;

            if (this.failedInARow >= this.options.maxConsecutiveFailures) {
                throw new BatchFailureLimitError(this.failedInARow, offset);
            }
            return { discovered: [], records: [] };
        }
    }

    private collectEligible(ctx: BatchContext, page: ApiPage, eligibleUrls: string[]): ListingRecord[] {
        const { cache } = ctx;
        const eligible = new Set(eligibleUrls);
        const updates = new Map<string, CacheEntry>();
        const records: ListingRecord[] = [];

        for (const listing of page.listings) {
            if (!eligible.has(listing.url) || updates.has(listing.url)) continue;
            try {
                records.push(stampListing(listing.url, listing, this.name));
                updates.set(listing.url, cache.recordOutcome(listing.url, 'good'));
            } catch (err) {
                updates.set(listing.url, cache.recordOutcome(listing.url, 'bad', errorMessage(err)));
            }
        }

        for (const url of eligible) {
            if (!updates.has(url)) {
                updates.set(url, cache.recordOutcome(url, 'bad', 'listed without a record in the API response'));
            }
        }

        cache.update(updates);
        return records;
    }
}
