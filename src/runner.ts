/**
 * src/runner.ts
 *
 * SCRAPER RUNNER
 *
 * Builds everything one crawl needs from a crawler name (archive, fetcher,
 * batch source, cache) and drives it to completion. runScrapers() goes
 * through several names in order; one crawler failing does not stop the
 * next, an abort stops them all.
 *
 * Rows added are measured on the archive itself (URL count before and
 * after), so they also cover the rows appended before a crash.
 */

import * as path from 'path';
import { log } from 'crawlee';
import type { CrawlerRegistry } from './sources/registry.js';
import type { ListingArchive } from './archive/types.js';
import type { HttpTransport } from './scraper/types.js';
import { UrlFetcher } from './scraper/urlFetcher.js';
import { CacheStore } from './scraper/cacheStore.js';
import { ScrapeOrchestrator } from './scraper/orchestrator.js';
import type { PropagateSummary } from './scraper/orchestrator.js';
import { errorMessage, isAbortError } from './scraper/errors.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface RunnerSettings {
    cacheDir: string;
    batchSize: number;
    detailBatchSize: number;
    retryFailures: boolean;
    startPage?: number;
    requestDelayMs: number;
    batchDelayMs: number;
    maxRetries: number;
    maxConsecutiveFailures: number;
}

export interface RunnerDeps {
    registry: CrawlerRegistry;
    transport: HttpTransport;
    /** Opens (and if needed creates) the archive table for one crawler. */
    openArchive: (table: string) => Promise<ListingArchive>;
    settings: RunnerSettings;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface ScrapeResult {
    name: string;
    status: 'success' | 'failed';
    table: string;
    rowsAdded: number;
    elapsedMs: number;
    summary?: PropagateSummary;
    error?: string;
    stack?: string;
}

export function cachePathFor(cacheDir: string, name: string): string {
    return path.join(cacheDir, `${name}.json`);
}

async function countArchived(archive: ListingArchive): Promise<number> {
    return (await archive.getColumnValues(archive.table, 'url')).length;
}

// ─── Run one ──────────────────────────────────────────────────────────────────

export async function runScraper(name: string, deps: RunnerDeps, signal?: AbortSignal): Promise<ScrapeResult> {
    const { registry, transport, settings } = deps;
    const startedAt = Date.now();
    let table = name;
    let archive: ListingArchive | undefined;
    let before: number | undefined;

    try {
        table = registry.tableFor(name);
        archive = await deps.openArchive(table);
        before = await countArchived(archive);

        const fetcher = new UrlFetcher(transport, {
            maxConsecutiveFailures: settings.maxConsecutiveFailures,
            requestDelayMs: settings.requestDelayMs,
            maxRetries: settings.maxRetries,
            sleep: deps.sleep,
        });
        const source = registry.createSource(name, {
            fetcher,
            requestDelayMs: settings.requestDelayMs,
            detailBatchSize: settings.detailBatchSize,
            maxConsecutiveFailures: settings.maxConsecutiveFailures,
            startPage: settings.startPage,
            sleep: deps.sleep,
        });
        const cache = await CacheStore.load({ cachePath: cachePathFor(settings.cacheDir, name), archive });

        const orchestrator = new ScrapeOrchestrator({
            source,
            cache,
            archive,
            batchDelayMs: settings.batchDelayMs,
            sleep: deps.sleep,
        });
        const summary = await orchestrator.propagate({
            batchSize: settings.batchSize,
            retryFailures: settings.retryFailures,
            signal,
        });

        const rowsAdded = (await countArchived(archive)) - before;
        const elapsedMs = Date.now() - startedAt;
        log.info(`[Runner] ✓ ${name}: ${rowsAdded} rows added to ${table} in ${(elapsedMs / 1000).toFixed(1)}s`);
        return { name, status: 'success', table, rowsAdded, elapsedMs, summary };
    } catch (err) {
        if (signal?.aborted || isAbortError(err)) throw err;

        let rowsAdded = 0;
        if (archive && before !== undefined) {
            try {
                rowsAdded = (await countArchived(archive)) - before;
            } catch (countErr) {
                log.warning(`[Runner] ${name}: could not recount ${table}: ${errorMessage(countErr)}`);
            }
        }

        log.error(`[Runner] ✗ ${name} failed: ${errorMessage(err)}`);
        return {
            name,
            status: 'failed',
            table,
            rowsAdded,
            elapsedMs: Date.now() - startedAt,
            error: errorMessage(err),
            stack: err instanceof Error ? err.stack : undefined,
        };
    }
}

// ─── Run many ─────────────────────────────────────────────────────────────────

export async function runScrapers(names: readonly string[], deps: RunnerDeps, signal?: AbortSignal): Promise<ScrapeResult[]> {
    const results: ScrapeResult[] = [];

    for (const name of names) {
        signal?.throwIfAborted();
        log.info(`[Runner] ── ${name} (${results.length + 1}/${names.length}) ──`);
        results.push(await runScraper(name, deps, signal));
    }

    const succeeded = results.filter((r) => r.status === 'success').length;
    const rows = results.reduce((sum, r) => sum + r.rowsAdded, 0);
    log.info(`[Runner] Done: ${succeeded}/${results.length} crawlers succeeded, ${rows} rows added.`);
    for (const r of results.filter((r) => r.status === 'failed')) {
        log.warning(`[Runner]   ${r.name}: ${r.error}`);
    }
    return results;
}
