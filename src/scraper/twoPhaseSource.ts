/**
 * src/scraper/twoPhaseSource.ts
 *
 * TWO-PHASE CRAWL: directory scan → detail fetch
 *
 * Phase 1 walks the site's paginated index from a resumable page cursor and
 * registers every listing URL it sees as `pending`. An empty page (or a page
 * the site says is gone) ends discovery for good. When more URLs are already
 * pending than one round can fetch, phase 1 sits the round out so the
 * backlog drains first.
 *
 * Phase 2 fetches up to `detailBatchSize` eligible URLs one at a time and
 * records one cache transition per URL:
 *
 *   good    → success            (listing parsed, stamped, validated)
 *   bad     → failed             (never retried unless asked to)
 *   unknown → transient-failure  (skipped for the rest of this run)
 *
 * All transitions of a round go to the cache in one update() call. An abort
 * or a circuit-breaker trip ends the round early: what was fetched so far is
 * recorded and returned together with the interruption, so the orchestrator
 * archives it before letting the error through.
 */

import { log } from 'crawlee';
import type { FetchResult, UrlFetcher } from './urlFetcher.js';
import type { BatchContext, BatchResult, BatchSource, CacheEntry, HttpResponse } from './types.js';
import { stampListing } from './listing.js';
import type { ListingDetails, ListingRecord } from './listing.js';
import { CircuitBreakerTrippedError, errorMessage } from './errors.js';
import { sleep } from '../utils/sleep.js';

/** Site-specific half of a two-phase crawl. */
export interface DirectoryCrawler {
    readonly name: string;
    directoryPageUrl(page: number): string;
    /** Listing URLs found on one directory page; empty means past the last page. */
    parseDirectoryPage(page: number, response: HttpResponse): string[];
    parseListingPage(url: string, response: HttpResponse): ListingDetails;
}

export interface TwoPhaseOptions {
    fetcher: UrlFetcher;
    /** Directory page to resume from. */
    startPage?: number;
    /** Directory pages per round; defaults to the batch size. */
    pagesPerRound?: number;
    /** Ceiling on detail fetches per round. */
    detailBatchSize: number;
    /** Politeness delay between requests (ms). */
    requestDelayMs: number;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export class TwoPhaseSource implements BatchSource {
    private page: number;
    private directoryDone = false;
    private readonly pause: (ms: number, signal?: AbortSignal) => Promise<void>;

    constructor(
        private readonly crawler: DirectoryCrawler,
        private readonly options: TwoPhaseOptions
    ) {
        this.page = options.startPage ?? 0;
        this.pause = options.sleep ?? sleep;
    }

    get name(): string {
        return this.crawler.name;
    }

    get discovering(): boolean {
        return !this.directoryDone;
    }

    /** Next directory page to scan. */
    get currentPage(): number {
        return this.page;
    }

    async nextBatch(ctx: BatchContext): Promise<BatchResult> {
        let discovered: string[] = [];

        if (!this.directoryDone) {
            const backlog = ctx.cache.filterByStatus(['pending']).length;
            if (backlog > this.options.detailBatchSize) {
                log.info(`[TwoPhase] ${this.name}: ${backlog} URLs pending, skipping directory scan this round.`);
            } else {
                discovered = await this.scanDirectory(ctx);
            }
        }

        const { records, interruptedBy } = await this.fetchDetails(ctx);
        log.info(`[TwoPhase] ${this.name}: ${discovered.length} new URLs, ${records.length} listings to archive`);
        return interruptedBy === undefined ? { discovered, records } : { discovered, records, interruptedBy };
    }

    // ── Phase 1 ─────────────────────────────────────────────────────────────

    private async scanDirectory(ctx: BatchContext): Promise<string[]> {
        const pages = this.options.pagesPerRound ?? ctx.batchSize;
        const discovered: string[] = [];

        for (let scanned = 0; scanned < pages; scanned++) {
            if (scanned > 0) await this.pause(this.options.requestDelayMs, ctx.signal);

            const pageUrl = this.crawler.directoryPageUrl(this.page);
            const { response, outcome, error } = await this.options.fetcher.fetch(pageUrl, { signal: ctx.signal });

            if (outcome === 'bad') {
                log.warning(`[TwoPhase] ${this.name}: directory page ${this.page} is gone (${error}); ending discovery.`);
                this.directoryDone = true;
                break;
            }
            if (outcome === 'unknown' || !response) {
                log.warning(`[TwoPhase] ${this.name}: directory page ${this.page} unavailable (${error}); will retry.`);
                break;
            }

            const urls = this.crawler.parseDirectoryPage(this.page, response);
            log.info(`[TwoPhase] ${this.name}: found ${urls.length} listings on page ${this.page}.`);
            if (urls.length === 0) {
                this.directoryDone = true;
                break;
            }

            discovered.push(...ctx.cache.registerDiscovered(urls));
            this.page++;
        }

        return discovered;
    }

    // ── Phase 2 ─────────────────────────────────────────────────────────────

    private async fetchDetails(ctx: BatchContext): Promise<{ records: ListingRecord[]; interruptedBy?: unknown }> {
        const { cache, retryFailures, signal } = ctx;
        const urls = cache.pickUrlsToFetch({ retryFailures, limit: this.options.detailBatchSize });
        const updates = new Map<string, CacheEntry>();
        const records: ListingRecord[] = [];
        let interruptedBy: unknown;

        for (const [index, url] of urls.entries()) {
            let fetched: FetchResult;
            try {
                if (index > 0) await this.pause(this.options.requestDelayMs, signal);
                fetched = await this.options.fetcher.fetch(url, { signal });
            } catch (err) {
                // the URL that tripped the breaker was fetched and classified
                if (err instanceof CircuitBreakerTrippedError && err.lastUrl === url && err.lastAttempt) {
                    updates.set(url, cache.recordOutcome(url, err.lastAttempt.outcome, err.lastAttempt.error));
                }
                interruptedBy = err;
                break;
            }

            const { response, outcome, error } = fetched;
            if (outcome !== 'good' || !response) {
                log.debug(`[TwoPhase] ${this.name}: ${outcome} ${url} (${error})`);
                updates.set(url, cache.recordOutcome(url, outcome, error));
                continue;
            }

            try {
                records.push(this.toRecord(url, response));
                updates.set(url, cache.recordOutcome(url, 'good'));
            } catch (err) {
                log.warning(`[TwoPhase] ${this.name}: failed to parse ${url}: ${errorMessage(err)}`);
                updates.set(url, cache.recordOutcome(url, 'bad', errorMessage(err)));
            }
        }

        cache.update(updates);

        const failed = [...updates.values()].filter((e) => e.status !== 'success').length;
        if (failed > 0) log.info(`[TwoPhase] ${this.name}: ${failed}/${updates.size} detail fetches failed this round.`);

        return { records, interruptedBy };
    }

    private toRecord(url: string, response: HttpResponse): ListingRecord {
        if (response.url.replace(/\/$/, '') !== url.replace(/\/$/, '')) {
            throw new Error(`${url} redirected to ${response.url}, listing is likely no longer available`);
        }
        return stampListing(url, this.crawler.parseListingPage(url, response), this.name);
    }
}
