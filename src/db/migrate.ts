/**
 * src/db/migrate.ts
 *
 * Idempotent schema setup for the listing archive tables.
 *
 * Run:  npm run db:migrate            (every table in config/sites.json)
 *       npm run db:migrate -- acme    (just the named crawlers)
 *
 * Uses CREATE TABLE IF NOT EXISTS / CREATE INDEX IF NOT EXISTS, so running
 * it again never touches existing data. The crawl CLI calls
 * ensureListingsTable() itself before the first append.
 */

import * as path from 'path';
import { fileURLToPath } from 'url';
import type { Queryable } from '../archive/postgresArchive.js';
import { quoteIdentifier } from '../archive/postgresArchive.js';

// ─── Schema ─────────────────────────────────────────────────────────────────

export function listingsTableDdl(table: string): string[] {
    const t = quoteIdentifier(table);
    return [
        `
CREATE TABLE IF NOT EXISTS ${t} (
    id             BIGSERIAL PRIMARY KEY,
    url            TEXT        NOT NULL UNIQUE,
    title          TEXT        NOT NULL,
    company        TEXT        NOT NULL DEFAULT 'Unknown Company',
    location       TEXT,
    description    TEXT        NOT NULL DEFAULT '',
    salary         TEXT,
    posted_date    TEXT,
    source         TEXT        NOT NULL,
    status         TEXT        NOT NULL DEFAULT 'active',
    discovered_at  TIMESTAMPTZ NOT NULL,
    created_at     TIMESTAMPTZ NOT NULL DEFAULT NOW()
);`,
        `CREATE INDEX IF NOT EXISTS ${quoteIdentifier(`idx_${table}_discovered_at`)} ON ${t}(discovered_at DESC);`,
        `CREATE INDEX IF NOT EXISTS ${quoteIdentifier(`idx_${table}_company`)} ON ${t}(company);`,
    ];
}

export async function ensureListingsTable(db: Queryable, table: string): Promise<void> {
    for (const statement of listingsTableDdl(table)) {
        await db.query(statement);
    }
}

// ─── Runner ─────────────────────────────────────────────────────────────────

async function migrate(names: string[]): Promise<void> {
    const { env } = await import('../config/env.js');
    const { query, closeDb, pingDb } = await import('./pool.js');
    const { CrawlerRegistry } = await import('../sources/registry.js');

    console.log('[migrate] Checking database connectivity…');
    if (!(await pingDb())) {
        console.error('[migrate] ✗ Cannot reach PostgreSQL. Check DATABASE_URL or PGHOST / PGUSER / PGPASSWORD / PGDATABASE in .env');
        process.exit(1);
    }

    const registry = CrawlerRegistry.fromFile(env.SITES_CONFIG);
    const selected = names.length > 0 ? names : registry.names();
    try {
        for (const name of selected) {
            const table = registry.tableFor(name);
            await ensureListingsTable({ query }, table);
            console.log(`[migrate] ✓ ${table} ready (${name}).`);
        }
    } finally {
        await closeDb();
    }
    console.log('[migrate] Done. Database is ready for the crawler.');
}

if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
    migrate(process.argv.slice(2)).catch((err: unknown) => {
        console.error('[migrate] Fatal error:', err instanceof Error ? err.message : String(err));
        process.exit(1);
    });
}
