import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ScrapeOrchestrator } from './orchestrator.js';
import { CacheStore } from './cacheStore.js';
import { UrlFetcher } from './urlFetcher.js';
import { TwoPhaseSource } from './twoPhaseSource.js';
import type { DirectoryCrawler } from './twoPhaseSource.js';
import { CircuitBreakerTrippedError } from './errors.js';
import { stampListing } from './listing.js';
import { MemoryArchive } from '../archive/memoryArchive.js';
import type { ListingArchive } from '../archive/types.js';
import type { BatchSource, HttpRequest, HttpResponse } from './types.js';

const BOARD = 'https://board.test';
const job = (id: string): string => `${BOARD}/jobs/${id}`;
const PAGES = [[job('a1'), job('a2'), job('a3')], [job('b1'), job('b2')], []];

const crawler: DirectoryCrawler = {
    name: 'test-board',
    directoryPageUrl: (page) => `${BOARD}/list?page=${page}`,
    parseDirectoryPage: (_page, response) => response.body.split('\n').filter((line) => line.length > 0),
    parseListingPage: (_url, response) => ({ title: response.body, company: 'Acme' }),
};

type DetailHandler = (req: HttpRequest) => Promise<HttpResponse>;

const okDetail: DetailHandler = async (req) => ({
    statusCode: 200,
    url: req.url,
    body: `Listing ${req.url.split('/').pop()}`,
    headers: {},
});

function boardTransport(detail: DetailHandler = okDetail) {
    return {
        request: vi.fn(async (req: HttpRequest): Promise<HttpResponse> => {
            const page = new URL(req.url).searchParams.get('page');
            if (page !== null) {
                return { statusCode: 200, url: req.url, body: (PAGES[Number(page)] ?? []).join('\n'), headers: {} };
            }
            return detail(req);
        }),
    };
}

const noSleep = async (): Promise<void> => {};

let tmpDir: string;
let cachePath: string;

beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'orchestrator-'));
    cachePath = path.join(tmpDir, 'test-board.json');
});

afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
});

async function boardRun(
    archive: ListingArchive,
    transport: ReturnType<typeof boardTransport>,
    options: { maxConsecutiveFailures?: number; batchSleep?: (ms: number, signal?: AbortSignal) => Promise<void> } = {}
) {
    const fetcher = new UrlFetcher(transport, {
        maxConsecutiveFailures: options.maxConsecutiveFailures ?? 5,
        requestDelayMs: 0,
        maxRetries: 1,
        sleep: noSleep,
    });
    const source = new TwoPhaseSource(crawler, { fetcher, detailBatchSize: 10, requestDelayMs: 0, sleep: noSleep });
    const cache = await CacheStore.load({ cachePath, archive });
    const orchestrator = new ScrapeOrchestrator({
        source,
        cache,
        archive,
        batchDelayMs: 250,
        sleep: options.batchSleep ?? noSleep,
    });
    return { orchestrator, cache };
}

function readCacheFile(): Record<string, unknown> {
    return JSON.parse(fs.readFileSync(cachePath, 'utf-8'));
}

describe('ScrapeOrchestrator.propagate with a two-phase source', () => {
    it('crawls directory pages of 3, 2 and 0 listings to completion in two rounds', async () => {
        const archive = new MemoryArchive('test_board');
        const transport = boardTransport();
        const batchSleep = vi.fn(noSleep);
        const { orchestrator } = await boardRun(archive, transport, { batchSleep });

        const summary = await orchestrator.propagate({ batchSize: 10 });

        expect(summary).toMatchObject({
            source: 'test-board',
            state: 'complete',
            rounds: 2,
            discovered: 5,
            archived: 5,
            stranded: 0,
            cache: { pending: 0, success: 5, failed: 0, 'transient-failure': 0, total: 5 },
        });
        expect(orchestrator.state).toBe('complete');
        expect(transport.request).toHaveBeenCalledTimes(8);
        expect(batchSleep.mock.calls).toEqual([[250, undefined]]);

        expect(archive.size).toBe(5);
        const rows = await archive.exportAsTable();
        expect(rows.find((row) => row.url === job('b2'))).toMatchObject({
            title: 'Listing b2',
            company: 'Acme',
            source: 'test-board',
            status: 'active',
        });

        const onDisk = readCacheFile();
        expect(Object.keys(onDisk)).toHaveLength(5);
        expect(onDisk).toMatchObject({ [job('a1')]: { status: 'success', attempts: 1 } });
    });

    it('converges: a second run over the same cache and archive fetches no listing', async () => {
        const archive = new MemoryArchive('test_board');
        const first = await boardRun(archive, boardTransport());
        await first.orchestrator.propagate({ batchSize: 10 });

        const transport = boardTransport();
        const second = await boardRun(archive, transport);
        const summary = await second.orchestrator.propagate({ batchSize: 10 });

        expect(summary).toMatchObject({ state: 'complete', rounds: 1, discovered: 0, archived: 0 });
        expect(transport.request).toHaveBeenCalledTimes(3);
        expect(archive.appendCalls).toEqual([5]);
    });

    it('skips permanent failures unless asked to retry them', async () => {
        const archive = new MemoryArchive('test_board');
        const goneOnce: DetailHandler = async (req) =>
            req.url === job('a2') ? { statusCode: 404, url: req.url, body: '', headers: {} } : okDetail(req);

        const first = await (await boardRun(archive, boardTransport(goneOnce))).orchestrator.propagate({ batchSize: 10 });
        expect(first.archived).toBe(4);
        expect(first.cache.failed).toBe(1);

        const noRetry = boardTransport();
        await (await boardRun(archive, noRetry)).orchestrator.propagate({ batchSize: 10 });
        expect(noRetry.request.mock.calls.map(([req]) => req.url)).not.toContain(job('a2'));

        const retry = await boardRun(archive, boardTransport());
        const third = await retry.orchestrator.propagate({ batchSize: 10, retryFailures: true });
        expect(third.archived).toBe(1);
        expect(retry.cache.get(job('a2'))).toMatchObject({ status: 'success', attempts: 2 });
    });

    it('serves pending URLs before failed ones and retries each failure once', async () => {
        const gone = (n: number): string => `${BOARD}/gone/${n}`;
        const failedEntry = { status: 'failed' as const, lastAttempt: '2025-01-10T08:00:00.000Z', attempts: 1, error: 'HTTP 404' };
        const cache = new CacheStore(cachePath, [
            [gone(1), failedEntry],
            [gone(2), failedEntry],
            [gone(3), failedEntry],
            [job('p1'), { status: 'pending', lastAttempt: null, attempts: 0 }],
        ]);
        const transport = {
            request: vi.fn(async (req: HttpRequest): Promise<HttpResponse> => {
                if (req.url.includes('/list?page=')) return { statusCode: 200, url: req.url, body: '', headers: {} };
                if (req.url.includes('/gone/')) return { statusCode: 404, url: req.url, body: '', headers: {} };
                return okDetail(req);
            }),
        };
        const fetcher = new UrlFetcher(transport, { maxConsecutiveFailures: 5, requestDelayMs: 0, maxRetries: 1, sleep: noSleep });
        const source = new TwoPhaseSource(crawler, { fetcher, detailBatchSize: 2, requestDelayMs: 0, sleep: noSleep });
        const archive = new MemoryArchive('test_board');
        const orchestrator = new ScrapeOrchestrator({ source, cache, archive, batchDelayMs: 0, sleep: noSleep });

        const summary = await orchestrator.propagate({ batchSize: 5, retryFailures: true });

        expect(summary).toMatchObject({ state: 'complete', rounds: 2, archived: 1, stranded: 0 });
        expect(transport.request.mock.calls.map(([req]) => req.url)).toEqual([
            `${BOARD}/list?page=0`,
            job('p1'),
            gone(1),
            gone(2),
            gone(3),
        ]);
        expect(cache.get(gone(1))).toMatchObject({ status: 'failed', attempts: 2 });
        expect(cache.get(job('p1'))).toMatchObject({ status: 'success', attempts: 1 });
    });

    it('flushes the cache and propagates a circuit-breaker trip', async () => {
        const archive = new MemoryArchive('test_board');
        const unavailable: DetailHandler = async (req) => ({ statusCode: 503, url: req.url, body: '', headers: {} });
        const { orchestrator, cache } = await boardRun(archive, boardTransport(unavailable), { maxConsecutiveFailures: 2 });

        await expect(orchestrator.propagate({ batchSize: 10 })).rejects.toBeInstanceOf(CircuitBreakerTrippedError);

        expect(cache.get(job('a2'))).toMatchObject({ status: 'transient-failure', attempts: 1, error: 'HTTP 503' });
        expect(readCacheFile()).toEqual({
            [job('a1')]: { status: 'pending', last_attempt: expect.any(String), attempts: 1, error: 'HTTP 503' },
            [job('a2')]: { status: 'pending', last_attempt: expect.any(String), attempts: 1, error: 'HTTP 503' },
            [job('a3')]: { status: 'pending', last_attempt: null, attempts: 0 },
            [job('b1')]: { status: 'pending', last_attempt: null, attempts: 0 },
            [job('b2')]: { status: 'pending', last_attempt: null, attempts: 0 },
        });
        expect(archive.size).toBe(0);
    });

    it('archives what was fetched before an abort, flushes, then rethrows the abort', async () => {
        const archive = new MemoryArchive('test_board');
        const controller = new AbortController();
        const abortOnB1: DetailHandler = async (req) => {
            if (req.url === job('b1')) {
                controller.abort();
                throw Object.assign(new Error('This operation was aborted'), { name: 'AbortError' });
            }
            return okDetail(req);
        };
        const { orchestrator } = await boardRun(archive, boardTransport(abortOnB1));

        await expect(orchestrator.propagate({ batchSize: 10, signal: controller.signal }))
            .rejects.toMatchObject({ name: 'AbortError' });

        expect(archive.size).toBe(3);
        expect(readCacheFile()).toMatchObject({
            [job('a3')]: { status: 'success', attempts: 1 },
            [job('b1')]: { status: 'pending', attempts: 0 },
        });
    });
});

describe('ScrapeOrchestrator.propagate with a stub source', () => {
    const A = 'https://board.test/jobs/stuck';

    it('completes with the unreachable pending URLs counted as stranded', async () => {
        const nextBatch = vi.fn(async () => ({ discovered: [], records: [] }));
        const source: BatchSource = { name: 'stuck', discovering: false, nextBatch };
        const cache = new CacheStore(cachePath, [[A, { status: 'pending', lastAttempt: null, attempts: 0 }]]);
        const orchestrator = new ScrapeOrchestrator({ source, cache, archive: new MemoryArchive(), batchDelayMs: 0, sleep: noSleep });

        expect(orchestrator.state).toBe('fetching');
        const summary = await orchestrator.propagate({ batchSize: 5 });

        expect(summary).toMatchObject({ state: 'complete', rounds: 1, stranded: 1 });
        expect(nextBatch).toHaveBeenCalledTimes(1);
    });

    it('puts listings back to pending when the archive append fails', async () => {
        const cache = new CacheStore(cachePath, [[A, { status: 'pending', lastAttempt: null, attempts: 0 }]]);
        const source: BatchSource = {
            name: 'stuck',
            discovering: false,
            nextBatch: async () => {
                cache.update([[A, cache.recordOutcome(A, 'good')]]);
                return { discovered: [], records: [stampListing(A, { title: 'Platform Engineer' }, 'stuck')] };
            },
        };
        const archive: ListingArchive = {
            table: 'listings',
            append: async () => {
                throw new Error('connection terminated');
            },
            exportAsTable: async () => [],
            getColumnValues: async () => [],
        };
        const orchestrator = new ScrapeOrchestrator({ source, cache, archive, batchDelayMs: 0, sleep: noSleep });

        await expect(orchestrator.propagate({ batchSize: 5 })).rejects.toThrow('connection terminated');

        expect(cache.get(A)).toMatchObject({ status: 'pending', attempts: 1 });
        expect(readCacheFile()).toMatchObject({ [A]: { status: 'pending', attempts: 1 } });
    });
});
