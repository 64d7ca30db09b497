/**
 * src/archive/memoryArchive.ts
 *
 * In-process archive. Backs `crawl --dry-run` and the test suites; keeps the
 * same append-only, skip-known-URL semantics as the Postgres archive.
 */

import type { ListingRecord } from '../scraper/listing.js';
import { listingToRow } from '../scraper/listing.js';
import type { ArchiveRow, ListingArchive } from './types.js';

export class MemoryArchive implements ListingArchive {
    private readonly rows = new Map<string, ArchiveRow>();
    readonly appendCalls: number[] = [];

    constructor(readonly table: string = 'listings', seedUrls: readonly string[] = []) {
        for (const url of seedUrls) this.rows.set(url, { url });
    }

    async append(records: readonly ListingRecord[]): Promise<number> {
        let inserted = 0;
        for (const record of records) {
            if (this.rows.has(record.url)) continue;
            this.rows.set(record.url, listingToRow(record));
            inserted++;
        }
        this.appendCalls.push(records.length);
        return inserted;
    }

    /** The query is ignored; every row is returned. */
    async exportAsTable(_query?: string): Promise<ArchiveRow[]> {
        return [...this.rows.values()].map((row) => ({ ...row }));
    }

    async getColumnValues(table: string, column: string): Promise<string[]> {
        if (table !== this.table) throw new Error(`relation "${table}" does not exist`);
        const values: string[] = [];
        for (const row of this.rows.values()) {
            const value = row[column];
            if (typeof value === 'string') values.push(value);
        }
        return values;
    }

    get size(): number {
        return this.rows.size;
    }
}
