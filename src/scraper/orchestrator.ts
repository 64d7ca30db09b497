/**
 * src/scraper/orchestrator.ts
 *
 * BATCH ORCHESTRATOR
 *
 * Drives one crawl run for one site:
 *
 *   discovering ──(source finished its index)──▶ fetching ──▶ complete
 *
 * Each round:
 *   1. ask the batch source for its next batch
 *   2. append the returned listings to the archive
 *   3. flush the cache if dirty
 *   4. complete when discovery is over, nothing new was seen and nothing is
 *      pending (or, when retrying failures, still due its one retry);
 *      otherwise sleep `batchDelayMs` and go again
 *
 * Whatever ends the loop early (circuit breaker, archive error, abort) the
 * dirty cache is flushed first, so an interrupted run resumes from the last
 * URL it actually archived.
 */

import { log } from 'crawlee';
import type { CacheStats, CacheStore } from './cacheStore.js';
import type { ListingArchive } from '../archive/types.js';
import type { BatchSource, CrawlState } from './types.js';
import { errorMessage } from './errors.js';
import { sleep } from '../utils/sleep.js';

export interface OrchestratorOptions {
    source: BatchSource;
    cache: CacheStore;
    archive: ListingArchive;
    /** Pause between rounds (ms). */
    batchDelayMs: number;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface PropagateOptions {
    batchSize: number;
    retryFailures?: boolean;
    signal?: AbortSignal;
}

export interface PropagateSummary {
    source: string;
    state: CrawlState;
    rounds: number;
    discovered: number;
    archived: number;
    /** URLs still due (pending, or failed awaiting a retry) when the run stopped making progress. */
    stranded: number;
    cache: CacheStats;
    durationMs: number;
}

export class ScrapeOrchestrator {
    private currentState: CrawlState;
    private readonly pause: (ms: number, signal?: AbortSignal) => Promise<void>;

    constructor(private readonly options: OrchestratorOptions) {
        this.pause = options.sleep ?? sleep;
        this.currentState = options.source.discovering ? 'discovering' : 'fetching';
    }

    get state(): CrawlState {
        return this.currentState;
    }

    async propagate(options: PropagateOptions): Promise<PropagateSummary> {
        const { source, cache, archive, batchDelayMs } = this.options;
        const { batchSize, retryFailures = false, signal } = options;
        const startedAt = Date.now();

        let rounds = 0;
        let discovered = 0;
        let archived = 0;
        let stranded = 0;

        log.info(
            `[Orchestrator] ${source.name}: starting (batchSize=${batchSize}, retryFailures=${retryFailures}, ` +
            `cached=${cache.size})`
        );

        try {
            while (this.currentState !== 'complete') {
                signal?.throwIfAborted();
                const revisionBefore = cache.revision;

                const batch = await source.nextBatch({ cache, batchSize, retryFailures, signal });
                rounds++;
                discovered += batch.discovered.length;

                if (batch.records.length > 0) {
                    let inserted: number;
                    try {
                        inserted = await archive.append(batch.records);
                    } catch (err) {
                        // not archived, so not done: the next run fetches them again
                        const reverted = cache.revertToPending(batch.records.map((r) => r.url));
                        log.warning(`[Orchestrator] ${source.name}: archive append failed; ${reverted} listings back to pending`);
                        throw err;
                    }
                    archived += inserted;
                    log.info(`[Orchestrator] ${source.name}: archived ${inserted}/${batch.records.length} listings`);
                }

                cache.flush();
                if (batch.interruptedBy !== undefined) throw batch.interruptedBy;

                const pending = cache.filterByStatus(['pending']).length;
                const outstanding = pending + (retryFailures ? cache.retryableFailures().length : 0);
                this.currentState = source.discovering ? 'discovering' : 'fetching';

                log.info(
                    `[Orchestrator] ${source.name}: round ${rounds}: ${batch.discovered.length} new, ` +
                    `${batch.records.length} fetched, ${pending} pending (${this.currentState})`
                );

                if (!source.discovering) {
                    if (batch.discovered.length === 0 && outstanding === 0) {
                        this.currentState = 'complete';
                        break;
                    }

                    const idle = batch.discovered.length === 0 && batch.records.length === 0 &&
                        cache.revision === revisionBefore;
                    if (idle) {
                        stranded = outstanding;
                        log.warning(
                            `[Orchestrator] ${source.name}: no progress possible; ${outstanding} URLs ` +
                            'are out of reach of this source and keep their status.'
                        );
                        this.currentState = 'complete';
                        break;
                    }
                }

                await this.pause(batchDelayMs, signal);
            }
        } catch (err) {
            this.flushAfterFailure(err);
            throw err;
        }

        const summary: PropagateSummary = {
            source: source.name,
            state: this.currentState,
            rounds,
            discovered,
            archived,
            stranded,
            cache: cache.stats(),
            durationMs: Date.now() - startedAt,
        };

        log.info(
            `[Orchestrator] ${source.name}: complete after ${rounds} rounds, ${archived} archived, ` +
            `${summary.cache.success} success / ${summary.cache.failed} failed / ` +
            `${summary.cache['transient-failure']} transient (${(summary.durationMs / 1000).toFixed(1)}s)`
        );
        return summary;
    }

    private flushAfterFailure(err: unknown): void {
        const { source, cache } = this.options;
        log.error(`[Orchestrator] ${source.name}: stopping: ${errorMessage(err)}`);
        try {
            if (cache.flush()) {
                log.info(`[Orchestrator] ${source.name}: cache flushed before exit.`);
            }
        } catch (flushErr) {
            log.error(`[Orchestrator] ${source.name}: cache flush failed: ${errorMessage(flushErr)}`);
        }
    }
}
