/**
 * src/archive/postgresArchive.ts
 *
 * Append-only listing archive in PostgreSQL.
 *
 * Design
 * ──────
 * • One table per crawler; the `url` column carries a UNIQUE constraint
 *   (see db/migrate.ts), so INSERT … ON CONFLICT (url) DO NOTHING makes an
 *   append after a crash-and-resume a no-op for rows already stored.
 * • Table and column names cannot be bound as parameters; they are checked
 *   against a plain-identifier pattern and double-quoted instead.
 * • Unlike the cache, archive errors are NOT swallowed: the orchestrator
 *   stops the run and flushes the cache.
 */

import { log } from 'crawlee';
import type { ListingRecord } from '../scraper/listing.js';
import { LISTING_COLUMNS, listingToRow } from '../scraper/listing.js';
import type { ArchiveRow, ListingArchive } from './types.js';

/** Anything that runs a parameterised query: a pg Pool, a client, a test stub. */
export interface Queryable {
    query(sql: string, values?: unknown[]): Promise<{ rows: ArchiveRow[]; rowCount: number | null }>;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

// Postgres caps a statement at 65535 bind parameters.
const ROWS_PER_INSERT = 500;

export function quoteIdentifier(name: string): string {
    if (!IDENTIFIER.test(name)) {
        throw new Error(`Invalid SQL identifier: ${JSON.stringify(name)}`);
    }
    return `"${name}"`;
}

export function buildInsertSql(table: string, rowCount: number): string {
    const columns = LISTING_COLUMNS.map(quoteIdentifier).join(', ');
    const width = LISTING_COLUMNS.length;
    const tuples: string[] = [];
    for (let row = 0; row < rowCount; row++) {
        const params = LISTING_COLUMNS.map((_, col) => `$${row * width + col + 1}`);
        tuples.push(`(${params.join(', ')})`);
    }
    return `INSERT INTO ${quoteIdentifier(table)} (${columns}) VALUES ${tuples.join(', ')} ON CONFLICT (url) DO NOTHING`;
}

export class PostgresArchive implements ListingArchive {
    readonly table: string;

    constructor(private readonly db: Queryable, table: string) {
        quoteIdentifier(table);
        this.table = table;
    }

    async append(records: readonly ListingRecord[]): Promise<number> {
        let inserted = 0;
        for (let start = 0; start < records.length; start += ROWS_PER_INSERT) {
            const chunk = records.slice(start, start + ROWS_PER_INSERT);
            const values = chunk.flatMap((record) => {
                const row = listingToRow(record);
                return LISTING_COLUMNS.map((column) => row[column]);
            });
            const result = await this.db.query(buildInsertSql(this.table, chunk.length), values);
            inserted += result.rowCount ?? 0;
        }

        if (inserted < records.length) {
            log.debug(`[Archive] ${this.table}: ${records.length - inserted} rows already archived, skipped`);
        }
        return inserted;
    }

    async exportAsTable(sql?: string): Promise<ArchiveRow[]> {
        const { rows } = await this.db.query(sql ?? `SELECT * FROM ${quoteIdentifier(this.table)}`);
        return rows;
    }

    async getColumnValues(table: string, column: string): Promise<string[]> {
        const col = quoteIdentifier(column);
        const { rows } = await this.db.query(
            `SELECT ${col}::text AS value FROM ${quoteIdentifier(table)} WHERE ${col} IS NOT NULL`
        );
        const values: string[] = [];
        for (const row of rows) {
            if (typeof row.value === 'string') values.push(row.value);
        }
        return values;
    }
}
