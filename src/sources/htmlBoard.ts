/**
 * src/sources/htmlBoard.ts
 *
 * Config-driven HTML job board (two-phase crawl).
 *
 * Directory pages are addressed by substituting the page number into
 * `directoryUrl`; every element matching `selectors.listingLink` contributes
 * its href. Detail pages are read with the remaining selectors, first match
 * wins, whitespace collapsed.
 */

import * as cheerio from 'cheerio';
import type { DirectoryCrawler } from '../scraper/twoPhaseSource.js';
import type { HttpResponse } from '../scraper/types.js';
import type { ListingDetails } from '../scraper/listing.js';
import { ListingParseError } from '../scraper/errors.js';
import type { HtmlSite } from './siteConfig.js';

const DESCRIPTION_MAX_CHARS = 5000;

export class HtmlBoardCrawler implements DirectoryCrawler {
    readonly name: string;

    constructor(private readonly site: HtmlSite) {
        this.name = site.name;
    }

    directoryPageUrl(page: number): string {
        return this.site.directoryUrl.replace('{page}', String(page));
    }

    parseDirectoryPage(_page: number, response: HttpResponse): string[] {
        const $ = cheerio.load(response.body);
        const urls = new Set<string>();

        $(this.site.selectors.listingLink).each((_, el) => {
            const href = $(el).attr('href')?.trim();
            if (!href) return;
            try {
                const absolute = new URL(href, response.url);
                absolute.hash = '';
                urls.add(absolute.toString());
            } catch {
                // unparseable href, not a listing
            }
        });

        return [...urls];
    }

    parseListingPage(url: string, response: HttpResponse): ListingDetails {
        const $ = cheerio.load(response.body);
        const { selectors } = this.site;

        const text = (selector: string | undefined): string | undefined => {
            if (!selector) return undefined;
            const value = $(selector).first().text().replace(/\s+/g, ' ').trim();
            return value || undefined;
        };

        const title = text(selectors.title);
        if (!title) {
            throw new ListingParseError(url, `no title matched '${selectors.title}'`);
        }

        return {
            title,
            company: text(selectors.company),
            location: text(selectors.location),
            description: text(selectors.description)?.slice(0, DESCRIPTION_MAX_CHARS),
            salary: text(selectors.salary),
            postedDate: text(selectors.postedDate),
        };
    }
}
