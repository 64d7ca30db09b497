import { describe, it, expect } from 'vitest';
import { HtmlBoardCrawler } from './htmlBoard.js';
import { HtmlSiteSchema } from './siteConfig.js';
import { ListingParseError } from '../scraper/errors.js';
import type { HttpResponse } from '../scraper/types.js';

const site = HtmlSiteSchema.parse({
    name: 'acme-jobs',
    kind: 'html',
    directoryUrl: 'https://acme.test/jobs?page={page}',
    selectors: {
        listingLink: 'a.job-link',
        title: 'h1.title',
        company: '.company',
        location: '.location',
        description: '.description',
        salary: '.salary',
    },
});

const page = (url: string, body: string): HttpResponse => ({ statusCode: 200, url, body, headers: {} });

describe('HtmlBoardCrawler', () => {
    const crawler = new HtmlBoardCrawler(site);

    it('substitutes the page number into the directory URL', () => {
        expect(crawler.directoryPageUrl(3)).toBe('https://acme.test/jobs?page=3');
    });

    it('collects absolute, de-duplicated listing links without fragments', () => {
        const html = `
            <ul>
                <li><a class="job-link" href="/jobs/1">One</a></li>
                <li><a class="job-link" href="https://acme.test/jobs/2#apply">Two</a></li>
                <li><a class="job-link" href="/jobs/1">One again</a></li>
                <li><a class="job-link">No href</a></li>
                <li><a class="promo" href="/pricing">Pricing</a></li>
            </ul>`;

        const urls = crawler.parseDirectoryPage(0, page('https://acme.test/jobs?page=0', html));

        expect(urls).toEqual(['https://acme.test/jobs/1', 'https://acme.test/jobs/2']);
    });

    it('returns no URLs for a page past the end', () => {
        expect(crawler.parseDirectoryPage(9, page('https://acme.test/jobs?page=9', '<p>No more jobs</p>'))).toEqual([]);
    });

    it('reads listing fields with collapsed whitespace', () => {
        const html = `
            <h1 class="title">  Senior
                Engineer </h1>
            <div class="company">Acme Corp</div>
            <div class="location">Remote</div>
            <div class="description"><p>Build things.</p>
            <p>Ship them.</p></div>`;

        const details = crawler.parseListingPage('https://acme.test/jobs/1', page('https://acme.test/jobs/1', html));

        expect(details).toEqual({
            title: 'Senior Engineer',
            company: 'Acme Corp',
            location: 'Remote',
            description: 'Build things. Ship them.',
            salary: undefined,
            postedDate: undefined,
        });
    });

    it('throws a ListingParseError when the title selector matches nothing', () => {
        const url = 'https://acme.test/jobs/404';
        const parse = () => crawler.parseListingPage(url, page(url, '<h2>Job not found</h2>'));

        expect(parse).toThrow(ListingParseError);
        expect(parse).toThrow(`Could not parse ${url}: no title matched 'h1.title'`);
    });
});
