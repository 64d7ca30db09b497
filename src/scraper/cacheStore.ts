/**
 * src/scraper/cacheStore.ts
 *
 * Crash-recovery ledger: one status record per listing URL.
 *
 * SOURCES OF TRUTH
 * ────────────────
 *  • The archive (database) is the long-term truth. Every archived URL is
 *    `success`, whatever the cache file says.
 *  • The cache file is the crash-recovery truth for everything else
 *    (pending / failed URLs the archive cannot know about). If it is missing
 *    or corrupt it is rebuilt from the archive alone.
 *
 * STRUCTURE ON DISK (UTF-8 JSON):
 * {
 *   "<url>": { "status": "pending", "last_attempt": null, "attempts": 0 },
 *   "<url>": { "status": "failed", "last_attempt": "<ISO>", "attempts": 2, "error": "HTTP 404" },
 *   ...
 * }
 *
 * Writes are lazy: mutations only set the dirty flag and the orchestrator
 * calls flush() once per batch. `transient-failure` is a same-session state;
 * it is written to disk as `pending` so the next run retries it, while this
 * run keeps skipping it.
 */

import * as fs from 'fs';
import * as path from 'path';
import { log } from 'crawlee';
import { z } from 'zod';
import { CACHE_STATUSES } from './types.js';
import type { CacheEntry, CacheStatus, FetchOutcome } from './types.js';
import type { ListingArchive } from '../archive/types.js';
import { errorMessage } from './errors.js';

// ─── File Schema ──────────────────────────────────────────────────────────────

const CacheFileEntrySchema = z.object({
    status: z.enum(CACHE_STATUSES),
    last_attempt: z.string().nullable().optional(),
    attempts: z.number().int().nonnegative(),
    error: z.string().optional(),
});

const CacheFileSchema = z.record(z.string(), CacheFileEntrySchema);

type CacheFileEntry = z.infer<typeof CacheFileEntrySchema>;

const OUTCOME_STATUS: Record<FetchOutcome, CacheStatus> = {
    good: 'success',
    bad: 'failed',
    unknown: 'transient-failure',
};

// ─── Types ────────────────────────────────────────────────────────────────────

export interface CacheLoadOptions {
    cachePath: string;
    archive: ListingArchive;
    /** Archive column holding the listing URL. */
    idColumn?: string;
}

export interface PickOptions {
    /** Restrict eligibility to these URLs (registered as pending first). */
    candidates?: readonly string[];
    retryFailures: boolean;
    limit?: number;
}

export type CacheStats = Record<CacheStatus, number> & { total: number };

// ─── Store ────────────────────────────────────────────────────────────────────

export class CacheStore {
    private readonly entries = new Map<string, CacheEntry>();
    private isDirty = false;
    private mutationCount = 0;
    /** Failed URLs already handed out for a retry in this session. */
    private readonly retriedFailures = new Set<string>();

    constructor(readonly cachePath: string, initial?: Iterable<[string, CacheEntry]>) {
        if (initial) {
            for (const [url, entry] of initial) this.entries.set(url, { ...entry });
        }
    }

    /**
     * Load the cache file, read the archive and merge them with archive
     * precedence. Neither a missing nor a corrupt cache file is fatal.
     */
    static async load(options: CacheLoadOptions): Promise<CacheStore> {
        const { cachePath, archive, idColumn = 'url' } = options;
        const store = new CacheStore(cachePath, CacheStore.readCacheFile(cachePath) ?? undefined);

        let archived: string[] = [];
        try {
            archived = await archive.getColumnValues(archive.table, idColumn);
        } catch (err) {
            log.warning(
                `[CacheStore] Could not read archive ${archive.table}.${idColumn} (${errorMessage(err)}). ` +
                'Continuing with the cache file alone.'
            );
        }

        const forced = store.reconcile(archived);
        log.info(
            `[CacheStore] Loaded ${store.size} URLs for ${path.basename(cachePath)} ` +
            `(${archived.length} archived, ${forced} reconciled from archive).`
        );
        return store;
    }

    /**
     * @returns the parsed entries, or null when the file is absent or unusable
     */
    static readCacheFile(cachePath: string): Map<string, CacheEntry> | null {
        if (!fs.existsSync(cachePath)) {
            log.info(`[CacheStore] No cache at ${cachePath}; bootstrapping from archive.`);
            return null;
        }

        try {
            const raw: unknown = JSON.parse(fs.readFileSync(cachePath, 'utf-8'));
            const parsed = CacheFileSchema.parse(raw);
            const entries = new Map<string, CacheEntry>();
            for (const [url, entry] of Object.entries(parsed)) {
                entries.set(url, fromFileEntry(entry));
            }
            return entries;
        } catch (err) {
            log.warning(`[CacheStore] Cache file corrupted, rebuilding from archive. (${errorMessage(err)})`);
            return null;
        }
    }

    // ── Reconciliation ──────────────────────────────────────────────────────

    /**
     * Force every archived URL to `success`. URLs absent from the archive keep
     * their cached status. Running it twice on the same input is a no-op.
     *
     * @returns how many entries changed
     */
    reconcile(archivedUrls: Iterable<string>): number {
        let changed = 0;
        for (const url of archivedUrls) {
            const current = this.entries.get(url);
            if (current?.status === 'success' && current.attempts >= 1) continue;

            this.entries.set(url, {
                status: 'success',
                lastAttempt: current?.lastAttempt ?? null,
                attempts: Math.max(current?.attempts ?? 0, 1),
            });
            changed++;
        }
        if (changed > 0) this.touch();
        return changed;
    }

    // ── Mutation ────────────────────────────────────────────────────────────

    /**
     * Eager pending assignment: every URL not yet known gets `pending` with
     * zero attempts before anything fetches it.
     *
     * @returns the URLs that were new
     */
    registerDiscovered(urls: Iterable<string>): string[] {
        const added: string[] = [];
        for (const url of urls) {
            if (this.entries.has(url)) continue;
            this.entries.set(url, { status: 'pending', lastAttempt: null, attempts: 0 });
            added.push(url);
        }
        if (added.length > 0) this.touch();
        return added;
    }

    /** Merge status records in memory. Persisting is left to flush(). */
    update(updates: Iterable<[string, CacheEntry]>): void {
        let changed = 0;
        for (const [url, next] of updates) {
            const current = this.entries.get(url);
            if (current?.status === 'success' && next.status !== 'success') {
                log.debug(`[CacheStore] Ignoring ${next.status} for archived URL ${url}`);
                continue;
            }
            this.entries.set(url, { ...next, attempts: Math.max(next.attempts, current?.attempts ?? 0) });
            changed++;
        }
        if (changed > 0) this.touch();
    }

    /**
     * Put `success` entries back to `pending`, keeping their attempt count.
     * Only for URLs whose records never reached the archive; archived URLs
     * go through reconcile().
     *
     * @returns how many entries changed
     */
    revertToPending(urls: Iterable<string>): number {
        let changed = 0;
        for (const url of urls) {
            const current = this.entries.get(url);
            if (current?.status !== 'success') continue;
            this.entries.set(url, { status: 'pending', lastAttempt: current.lastAttempt, attempts: current.attempts });
            changed++;
        }
        if (changed > 0) this.touch();
        return changed;
    }

    /** Next entry for `url` after one classified attempt. Does not mutate. */
    recordOutcome(url: string, outcome: FetchOutcome, error?: string, now: Date = new Date()): CacheEntry {
        const entry: CacheEntry = {
            status: OUTCOME_STATUS[outcome],
            lastAttempt: now.toISOString(),
            attempts: (this.entries.get(url)?.attempts ?? 0) + 1,
        };
        if (error !== undefined && outcome !== 'good') entry.error = error;
        return entry;
    }

    // ── Persistence ─────────────────────────────────────────────────────────

    /**
     * Write to disk if dirty (temp file + rename, so a crash mid-write leaves
     * the previous file intact).
     *
     * @returns true when a write happened
     */
    flush(): boolean {
        if (!this.isDirty) return false;

        fs.mkdirSync(path.dirname(this.cachePath), { recursive: true });
        const tmp = this.cachePath + '.tmp';
        fs.writeFileSync(tmp, JSON.stringify(this.toFileObject(), null, 2), 'utf-8');
        fs.renameSync(tmp, this.cachePath);
        this.isDirty = false;

        log.debug(`[CacheStore] Flushed ${this.size} URLs to ${this.cachePath}`);
        return true;
    }

    /** On-disk form: transient failures are demoted to pending. */
    toFileObject(): Record<string, CacheFileEntry> {
        const out: Record<string, CacheFileEntry> = {};
        for (const [url, entry] of this.entries) {
            const fileEntry: CacheFileEntry = {
                status: entry.status === 'transient-failure' ? 'pending' : entry.status,
                last_attempt: entry.lastAttempt,
                attempts: entry.attempts,
            };
            if (entry.error !== undefined) fileEntry.error = entry.error;
            out[url] = fileEntry;
        }
        return out;
    }

    // ── Queries ─────────────────────────────────────────────────────────────

    filterByStatus(statuses: readonly CacheStatus[]): string[] {
        const wanted = new Set(statuses);
        const urls: string[] = [];
        for (const [url, entry] of this.entries) {
            if (wanted.has(entry.status)) urls.push(url);
        }
        return urls;
    }

    /**
     * URLs eligible for a fetch this round: pending ones first, then, when
     * retrying failures, failed ones not yet retried in this session. A failed
     * URL is handed out at most once per session. Transient failures of this
     * session are never eligible.
     */
    pickUrlsToFetch(options: PickOptions): string[] {
        let pool: string[];
        if (options.candidates) {
            this.registerDiscovered(options.candidates);
            pool = [...new Set(options.candidates)];
        } else {
            pool = [...this.entries.keys()];
        }

        const pending = pool.filter((url) => this.entries.get(url)?.status === 'pending');
        const failed = options.retryFailures
            ? pool.filter((url) => this.entries.get(url)?.status === 'failed' && !this.retriedFailures.has(url))
            : [];

        const eligible = [...pending, ...failed];
        const picked = options.limit !== undefined ? eligible.slice(0, options.limit) : eligible;
        for (const url of picked) {
            if (this.entries.get(url)?.status === 'failed') this.retriedFailures.add(url);
        }
        return picked;
    }

    /** Failed URLs a retrying session has not handed out yet. */
    retryableFailures(): string[] {
        return this.filterByStatus(['failed']).filter((url) => !this.retriedFailures.has(url));
    }

    get(url: string): CacheEntry | undefined {
        const entry = this.entries.get(url);
        return entry ? { ...entry } : undefined;
    }

    has(url: string): boolean {
        return this.entries.has(url);
    }

    get size(): number {
        return this.entries.size;
    }

    get dirty(): boolean {
        return this.isDirty;
    }

    /** Increases on every in-memory mutation. */
    get revision(): number {
        return this.mutationCount;
    }

    stats(): CacheStats {
        const stats: CacheStats = { pending: 0, success: 0, failed: 0, 'transient-failure': 0, total: 0 };
        for (const entry of this.entries.values()) {
            stats[entry.status]++;
            stats.total++;
        }
        return stats;
    }

    /** Copy of the in-memory state, keyed by URL. */
    snapshot(): Record<string, CacheEntry> {
        const out: Record<string, CacheEntry> = {};
        for (const [url, entry] of this.entries) out[url] = { ...entry };
        return out;
    }

    private touch(): void {
        this.isDirty = true;
        this.mutationCount++;
    }
}

/** A transient failure from an earlier session is pending again. */
function fromFileEntry(entry: CacheFileEntry): CacheEntry {
    const out: CacheEntry = {
        status: entry.status === 'transient-failure' ? 'pending' : entry.status,
        lastAttempt: entry.last_attempt ?? null,
        attempts: entry.attempts,
    };
    if (entry.error !== undefined) out.error = entry.error;
    return out;
}
