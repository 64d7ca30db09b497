import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { runScraper, runScrapers, cachePathFor } from './runner.js';
import type { RunnerDeps } from './runner.js';
import { CrawlerRegistry } from './sources/registry.js';
import { parseSites } from './sources/siteConfig.js';
import { MemoryArchive } from './archive/memoryArchive.js';
import { CacheStore } from './scraper/cacheStore.js';
import type { HttpRequest, HttpResponse } from './scraper/types.js';

const registry = new CrawlerRegistry(parseSites({
    sites: [
        {
            name: 'remote-api',
            kind: 'api',
            endpoint: 'https://api.test/v1/jobs',
            itemsPath: 'jobs',
            fields: { url: 'link', title: 'title', company: 'company' },
        },
    ],
}));

const JOBS = [
    { link: '/jobs/1', title: 'Backend Engineer', company: 'Acme' },
    { link: '/jobs/2', title: 'Data Engineer', company: 'Globex' },
];

function apiTransport(statusCode = 200) {
    return {
        request: vi.fn(async (req: HttpRequest): Promise<HttpResponse> => {
            const offset = Number(new URL(req.url).searchParams.get('offset'));
            const limit = Number(new URL(req.url).searchParams.get('limit'));
            const body = JSON.stringify({ jobs: JOBS.slice(offset, offset + limit) });
            return { statusCode, url: req.url, body, headers: {} };
        }),
    };
}

const noSleep = async (): Promise<void> => {};

let cacheDir: string;
let archives: Map<string, MemoryArchive>;

beforeEach(() => {
    cacheDir = fs.mkdtempSync(path.join(os.tmpdir(), 'runner-'));
    archives = new Map();
});

afterEach(() => {
    fs.rmSync(cacheDir, { recursive: true, force: true });
});

function makeDeps(transport: ReturnType<typeof apiTransport>): RunnerDeps {
    return {
        registry,
        transport,
        openArchive: async (table) => {
            const archive = archives.get(table) ?? new MemoryArchive(table);
            archives.set(table, archive);
            return archive;
        },
        settings: {
            cacheDir,
            batchSize: 2,
            detailBatchSize: 10,
            retryFailures: false,
            requestDelayMs: 0,
            batchDelayMs: 0,
            maxRetries: 1,
            maxConsecutiveFailures: 3,
        },
        sleep: noSleep,
    };
}

describe('runScraper', () => {
    it('crawls a site into its table and saves the cache', async () => {
        const result = await runScraper('remote-api', makeDeps(apiTransport()));

        expect(result).toMatchObject({ name: 'remote-api', status: 'success', table: 'remote_api', rowsAdded: 2 });
        expect(result.summary?.stranded).toBe(0);
        expect(await archives.get('remote_api')?.getColumnValues('remote_api', 'url')).toEqual([
            'https://api.test/jobs/1',
            'https://api.test/jobs/2',
        ]);

        const saved = CacheStore.readCacheFile(cachePathFor(cacheDir, 'remote-api'));
        expect(saved ? [...saved.keys()] : null).toEqual(['https://api.test/jobs/1', 'https://api.test/jobs/2']);
    });

    it('adds nothing on a second run', async () => {
        const deps = makeDeps(apiTransport());
        await runScraper('remote-api', deps);

        const again = await runScraper('remote-api', deps);

        expect(again).toMatchObject({ status: 'success', rowsAdded: 0 });
        expect(archives.get('remote_api')?.appendCalls).toEqual([2]);
    });

    it('reports a crawl that gives up as failed instead of throwing', async () => {
        const result = await runScraper('remote-api', makeDeps(apiTransport(503)));

        expect(result.status).toBe('failed');
        expect(result.rowsAdded).toBe(0);
        expect(result.error).toEqual(expect.any(String));
    });
});

describe('runScrapers', () => {
    it('keeps going after an unknown crawler', async () => {
        const results = await runScrapers(['nope', 'remote-api'], makeDeps(apiTransport()));

        expect(results.map((r) => [r.name, r.status])).toEqual([
            ['nope', 'failed'],
            ['remote-api', 'success'],
        ]);
        expect(results[0]?.error).toBe("Crawler 'nope' is not registered. Available: remote-api");
    });

    it('stops before the next crawler once aborted', async () => {
        const controller = new AbortController();
        controller.abort();
        const transport = apiTransport();

        await expect(runScrapers(['remote-api'], makeDeps(transport), controller.signal)).rejects.toThrow();
        expect(transport.request).not.toHaveBeenCalled();
    });
});
