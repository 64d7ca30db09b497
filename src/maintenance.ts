/**
 * src/maintenance.ts
 *
 * CLI entry-point for cache maintenance.
 *
 * USAGE
 * ──────
 *   # Per-status URL counts of every crawler's cache file:
 *   npm run cache:stats
 *
 *   # Just some crawlers:
 *   npm run cache:stats -- acme-jobs remote-api
 *
 *   # Force every archived URL to success in a crawler's cache and save it:
 *   npm run cache:reconcile -- acme-jobs
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { log } from 'crawlee';
import { env } from './config/env.js';
import { CacheStore } from './scraper/cacheStore.js';
import type { CacheStats } from './scraper/cacheStore.js';
import { CrawlerRegistry } from './sources/registry.js';
import { PostgresArchive } from './archive/postgresArchive.js';
import { query, closeDb, pingDb } from './db/pool.js';
import { cachePathFor } from './runner.js';
import { printCacheStatsTable } from './utils/display.js';
import type { CacheStatsRow } from './utils/display.js';
import { resolveLogLevel } from './utils/logLevel.js';
import { errorMessage } from './scraper/errors.js';

// ─── Commands ─────────────────────────────────────────────────────────────────

function collectCacheStats(cacheDir: string, names: readonly string[]): CacheStatsRow[] {
    return names.map((name) => {
        const cachePath = cachePathFor(cacheDir, name);
        const entries = CacheStore.readCacheFile(cachePath);
        return { name, stats: entries ? new CacheStore(cachePath, entries).stats() : null };
    });
}

function runCacheStatsCommand(names: string[]): void {
    const selected = names.length > 0 ? names : CrawlerRegistry.fromFile(env.SITES_CONFIG).names();
    log.info(`[Maintenance] Command: cache-stats (${selected.length} crawlers, dir=${env.CACHE_DIR})`);
    printCacheStatsTable(collectCacheStats(env.CACHE_DIR, selected));
}

function describeChange(before: CacheStats | null, after: CacheStats): string {
    const statuses = ['pending', 'success', 'failed'] as const;
    return statuses
        .map((status) => {
            const was = before?.[status] ?? 0;
            const delta = after[status] - was;
            const sign = delta > 0 ? '+' : '';
            return `${status} ${was} → ${after[status]} (${sign}${delta})`;
        })
        .join(', ');
}

async function runReconcileCommand(name: string): Promise<void> {
    const registry = CrawlerRegistry.fromFile(env.SITES_CONFIG);
    const table = registry.tableFor(name);
    const cachePath = cachePathFor(env.CACHE_DIR, name);
    log.info(`[Maintenance] Command: reconcile ${name} against ${table}`);

    try {
        if (!(await pingDb())) {
            throw new Error('Cannot reach PostgreSQL. Check DATABASE_URL or PG* in .env');
        }
        const [before] = collectCacheStats(env.CACHE_DIR, [name]);
        const store = await CacheStore.load({ cachePath, archive: new PostgresArchive({ query }, table) });
        const saved = store.flush();

        console.log(chalk.bold(`${name}: `) + describeChange(before?.stats ?? null, store.stats()));
        console.log(saved ? chalk.green(`✔ Saved ${cachePath}`) : chalk.dim('Cache already consistent with the archive.'));
    } finally {
        await closeDb();
    }
}

// ─── Program ──────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
    log.setLevel(resolveLogLevel(env.CRAWLEE_LOG_LEVEL));
    const program = new Command();

    program
        .name('listing-scout-maintenance')
        .description('Inspect and repair crawler cache files');

    program
        .command('cache-stats')
        .description('Show per-status URL counts of cache files')
        .argument('[names...]', 'Crawler names (default: all configured)')
        .action((names: string[]) => runCacheStatsCommand(names));

    program
        .command('reconcile')
        .description('Mark every archived URL as success in the cache file')
        .argument('<name>', 'Crawler name')
        .action((name: string) => runReconcileCommand(name));

    await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
    console.error(chalk.red(`[Maintenance] Failed: ${errorMessage(err)}`));
    process.exit(1);
});
