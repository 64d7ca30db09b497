#!/usr/bin/env node
/**
 * src/main.ts
 *
 * ENTRY POINT: listing-scout crawl CLI
 *
 *   npm run crawl                          every crawler in config/sites.json
 *   npm run crawl -- acme-jobs --retry-failures
 *   npm run crawl -- acme-jobs --dry-run   in-memory archive, no database
 *   npm start -- list                      registered crawlers
 *
 * SHUTDOWN
 * ────────
 *  SIGINT / SIGTERM abort the running crawl. The orchestrator flushes the
 *  cache before the abort surfaces, so the next run resumes where this one
 *  stopped. Exit codes: 0 done, 1 a crawler failed, 130 interrupted.
 *
 * LOGGING
 * ───────
 *  All stdout/stderr is mirrored to outs/logs/scraping_<timestamp>.txt.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { log } from 'crawlee';
import { z } from 'zod';
import { env } from './config/env.js';
import { initFileLogger, closeFileLogger } from './utils/fileLogger.js';
import { resolveLogLevel } from './utils/logLevel.js';
import { query, closeDb, pingDb } from './db/pool.js';
import { ensureListingsTable } from './db/migrate.js';
import { PostgresArchive } from './archive/postgresArchive.js';
import { MemoryArchive } from './archive/memoryArchive.js';
import type { ListingArchive } from './archive/types.js';
import { GotScrapingTransport } from './scraper/httpTransport.js';
import { CrawlerRegistry } from './sources/registry.js';
import { runScrapers } from './runner.js';
import { errorMessage, isAbortError } from './scraper/errors.js';

export const EXIT_INTERRUPTED = 130;

const pkg = z.object({ version: z.string() }).parse(
    JSON.parse(fs.readFileSync(new URL('../package.json', import.meta.url), 'utf-8'))
);

function parsePositiveInt(value: string): number {
    const n = Number(value);
    if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('Expected a positive integer.');
    return n;
}

function parseNonNegativeInt(value: string): number {
    const n = Number(value);
    if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError('Expected a non-negative integer.');
    return n;
}

interface CrawlOptions {
    batchSize?: number;
    retryFailures?: boolean;
    startPage?: number;
    dryRun?: boolean;
    verbose?: boolean;
}

// ─── crawl ────────────────────────────────────────────────────────────────────

async function runCrawlCommand(names: string[], opts: CrawlOptions): Promise<number> {
    log.setLevel(opts.verbose ? log.LEVELS.DEBUG : resolveLogLevel(env.CRAWLEE_LOG_LEVEL));
    initFileLogger(env.LOGS_PATH);

    const controller = new AbortController();
    const onSignal = (signal: NodeJS.Signals): void => {
        if (controller.signal.aborted) return;
        log.warning(`[Main] ${signal} received; finishing the current request and saving the cache…`);
        controller.abort();
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);

    try {
        const registry = CrawlerRegistry.fromFile(env.SITES_CONFIG);
        const selected = names.length > 0 ? names : registry.names();
        if (selected.length === 0) {
            log.warning(`[Main] No crawlers configured in ${env.SITES_CONFIG}.`);
            return 0;
        }

        let openArchive: (table: string) => Promise<ListingArchive>;
        if (opts.dryRun) {
            log.info('[Main] Dry run: listings are kept in memory only.');
            openArchive = async (table) => new MemoryArchive(table);
        } else {
            if (!(await pingDb())) {
                log.error('[Main] Cannot reach PostgreSQL. Check DATABASE_URL or PG* in .env, or use --dry-run.');
                return 1;
            }
            openArchive = async (table) => {
                await ensureListingsTable({ query }, table);
                return new PostgresArchive({ query }, table);
            };
        }

        const transport = new GotScrapingTransport({
            timeoutMs: env.REQUEST_TIMEOUT_MS,
            proxyUrl: env.PROXY_URL,
            userAgent: env.USER_AGENT,
        });

        const results = await runScrapers(selected, {
            registry,
            transport,
            openArchive,
            settings: {
                // a dry run must not mark URLs as archived for the real runs
                cacheDir: opts.dryRun ? path.join(env.CACHE_DIR, 'dry-run') : env.CACHE_DIR,
                batchSize: opts.batchSize ?? env.BATCH_SIZE,
                detailBatchSize: env.DETAIL_BATCH_SIZE,
                retryFailures: opts.retryFailures ?? false,
                startPage: opts.startPage,
                requestDelayMs: env.REQUEST_DELAY_MS,
                batchDelayMs: env.BATCH_DELAY_MS,
                maxRetries: env.MAX_RETRIES,
                maxConsecutiveFailures: env.MAX_CONSECUTIVE_FAILURES,
            },
        }, controller.signal);

        return results.every((r) => r.status === 'success') ? 0 : 1;
    } catch (err) {
        if (controller.signal.aborted || isAbortError(err)) {
            log.warning('[Main] Interrupted. Cache saved; rerun to resume.');
            return EXIT_INTERRUPTED;
        }
        log.error(`[Main] Fatal: ${errorMessage(err)}`);
        return 1;
    } finally {
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
        if (!opts.dryRun) await closeDb();
        closeFileLogger();
    }
}

// ─── list ─────────────────────────────────────────────────────────────────────

function runListCommand(): number {
    const crawlers = CrawlerRegistry.fromFile(env.SITES_CONFIG).list();
    if (crawlers.length === 0) {
        console.log(`No crawlers configured in ${env.SITES_CONFIG}.`);
        return 0;
    }
    const width = Math.max(...crawlers.map((c) => c.name.length));
    for (const c of crawlers) {
        console.log(`${c.name.padEnd(width)}  ${c.kind.padEnd(4)}  → ${c.table}`);
    }
    return 0;
}

// ─── Program ──────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
    const program = new Command();

    program
        .name('listing-scout')
        .description('Resumable job-listing crawler')
        .version(pkg.version);

    program
        .command('crawl')
        .description('Crawl the named sites (all configured sites when none given)')
        .argument('[names...]', 'Crawler names from the site config')
        .option('-b, --batch-size <n>', 'Directory pages / API records per round', parsePositiveInt)
        .option('--retry-failures', 'Also retry URLs that failed permanently before')
        .option('--start-page <n>', 'Directory page to start from (html sites)', parseNonNegativeInt)
        .option('--dry-run', 'Keep listings in memory instead of PostgreSQL')
        .option('-v, --verbose', 'Debug logging')
        .action(async (names: string[], opts: CrawlOptions) => {
            process.exitCode = await runCrawlCommand(names, opts);
        });

    program
        .command('list')
        .description('List registered crawlers')
        .action(() => {
            process.exitCode = runListCommand();
        });

    await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
    console.error(`[Main] CLI failed: ${errorMessage(err)}`);
    process.exit(1);
});
