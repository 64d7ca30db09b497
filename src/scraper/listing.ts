/**
 * src/scraper/listing.ts
 *
 * The archive row shape. Parsers return ListingDetails; the sources stamp
 * them (url, source, discoveredAt, default status) and validate with Zod
 * before anything reaches the archive.
 */

import { z } from 'zod';

export const ListingSchema = z.object({
    url: z.string().url(),
    title: z.string().trim().min(1),
    company: z.string().trim().min(1).default('Unknown Company'),
    location: z.string().optional(),
    description: z.string().default(''),
    salary: z.string().optional(),
    postedDate: z.string().optional(),
    source: z.string().min(1),
    status: z.string().default('active'),
    discoveredAt: z.string().datetime(),
});

export type ListingRecord = z.infer<typeof ListingSchema>;

/** Fields a site parser is responsible for. */
export interface ListingDetails {
    title: string;
    company?: string;
    location?: string;
    description?: string;
    salary?: string;
    postedDate?: string;
}

export const DEFAULT_LISTING_STATUS = 'active';

/**
 * Builds a validated record from parsed details. Throws ZodError on
 * invalid input; callers record that as a permanent failure.
 */
export function stampListing(
    url: string,
    details: ListingDetails,
    source: string,
    now: Date = new Date()
): ListingRecord {
    return ListingSchema.parse({
        ...details,
        company: details.company || undefined,
        url,
        source,
        status: DEFAULT_LISTING_STATUS,
        discoveredAt: now.toISOString(),
    });
}

/** Column order used by the archive. */
export const LISTING_COLUMNS = [
    'url',
    'title',
    'company',
    'location',
    'description',
    'salary',
    'posted_date',
    'source',
    'status',
    'discovered_at',
] as const;

export type ListingColumn = (typeof LISTING_COLUMNS)[number];

export function listingToRow(record: ListingRecord): Record<ListingColumn, string | null> {
    return {
        url: record.url,
        title: record.title,
        company: record.company,
        location: record.location ?? null,
        description: record.description,
        salary: record.salary ?? null,
        posted_date: record.postedDate ?? null,
        source: record.source,
        status: record.status,
        discovered_at: record.discoveredAt,
    };
}
