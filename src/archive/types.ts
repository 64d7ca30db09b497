/**
 * src/archive/types.ts
 *
 * The narrow storage contract the scraper depends on. One archive instance is
 * bound to one listings table; the crawler only ever appends to it and reads
 * columns back.
 */

import type { ListingRecord } from '../scraper/listing.js';

export type ArchiveRow = Record<string, unknown>;

export interface ListingArchive {
    /** Table this archive appends to. */
    readonly table: string;

    /**
     * Append listings. Rows whose URL is already archived are skipped.
     * @returns number of rows actually inserted
     */
    append(records: readonly ListingRecord[]): Promise<number>;

    /** Run a read query; defaults to the whole table. */
    exportAsTable(query?: string): Promise<ArchiveRow[]>;

    getColumnValues(table: string, column: string): Promise<string[]>;
}
