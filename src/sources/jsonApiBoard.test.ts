import { describe, it, expect } from 'vitest';
import { JsonApiCrawler, readPath } from './jsonApiBoard.js';
import { ApiSiteSchema } from './siteConfig.js';
import { ListingParseError } from '../scraper/errors.js';
import type { HttpResponse } from '../scraper/types.js';

const site = ApiSiteSchema.parse({
    name: 'remote-api',
    kind: 'api',
    endpoint: 'https://api.test/v1/jobs?lang=en',
    offsetParam: 'start',
    limitParam: 'count',
    itemsPath: 'result.items',
    fields: { url: 'links.self', title: 'title', company: 'company.name', salary: 'pay.max' },
});

const response = (body: unknown): HttpResponse => ({
    statusCode: 200,
    url: 'https://api.test/v1/jobs?lang=en&start=0&count=10',
    body: typeof body === 'string' ? body : JSON.stringify(body),
    headers: {},
});

describe('readPath', () => {
    it('walks dot paths and returns undefined for missing keys', () => {
        const value = { a: { b: { c: 1 } }, list: [1, 2] };
        expect(readPath(value, 'a.b.c')).toBe(1);
        expect(readPath(value, 'a.x.c')).toBeUndefined();
        expect(readPath(value, 'list.0')).toBeUndefined();
        expect(readPath(value, '')).toBe(value);
    });
});

describe('JsonApiCrawler', () => {
    const crawler = new JsonApiCrawler(site);

    it('adds the offset and limit parameters to the endpoint', () => {
        expect(crawler.pageUrl(20, 10)).toBe('https://api.test/v1/jobs?lang=en&start=20&count=10');
    });

    it('maps records through the field paths', () => {
        const page = crawler.parseApiResponse(response({
            result: {
                items: [
                    { links: { self: '/v1/jobs/7' }, title: ' Backend Dev ', company: { name: 'Globex' }, pay: { max: 120000 } },
                    { title: 'No link at all' },
                    { links: { self: 'https://other.test/j/8' }, title: 'Frontend' },
                ],
            },
        }));

        expect(page.urls).toEqual(['https://api.test/v1/jobs/7', 'https://other.test/j/8']);
        expect(page.listings).toEqual([
            { url: 'https://api.test/v1/jobs/7', title: 'Backend Dev', company: 'Globex', salary: '120000' },
            { url: 'https://other.test/j/8', title: 'Frontend' },
        ]);
    });

    it('reads a bare array when itemsPath is empty', () => {
        const bare = new JsonApiCrawler(ApiSiteSchema.parse({ ...site, itemsPath: '' }));

        const page = bare.parseApiResponse(response([{ links: { self: 'https://api.test/j/1' }, title: 'Ops' }]));

        expect(page.urls).toEqual(['https://api.test/j/1']);
    });

    it('rejects a body that is not JSON or has no record array', () => {
        expect(() => crawler.parseApiResponse(response('<html></html>'))).toThrow(ListingParseError);
        expect(() => crawler.parseApiResponse(response({ result: { items: 'none' } })))
            .toThrow("no array at 'result.items'");
    });
});
