/**
 * src/sources/jsonApiBoard.ts
 *
 * Config-driven JSON API board (single-phase crawl). One request per
 * offset/limit window; the records are mapped through the site's field
 * paths (dot notation, e.g. "company.name").
 */

import type { ApiCrawler, ApiListing, ApiPage } from '../scraper/singlePhaseSource.js';
import type { HttpResponse } from '../scraper/types.js';
import { ListingParseError, errorMessage } from '../scraper/errors.js';
import type { ApiSite } from './siteConfig.js';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Walks a dot path; an empty path returns the value itself. */
export function readPath(value: unknown, dotPath: string): unknown {
    if (!dotPath) return value;
    let current = value;
    for (const key of dotPath.split('.')) {
        if (!isRecord(current)) return undefined;
        current = current[key];
    }
    return current;
}

function readText(item: unknown, dotPath: string | undefined): string | undefined {
    if (!dotPath) return undefined;
    const value = readPath(item, dotPath);
    if (typeof value === 'number') return String(value);
    if (typeof value !== 'string') return undefined;
    return value.trim() || undefined;
}

export class JsonApiCrawler implements ApiCrawler {
    readonly name: string;

    constructor(private readonly site: ApiSite) {
        this.name = site.name;
    }

    pageUrl(offset: number, limit: number): string {
        const url = new URL(this.site.endpoint);
        url.searchParams.set(this.site.offsetParam, String(offset));
        url.searchParams.set(this.site.limitParam, String(limit));
        return url.toString();
    }

    parseApiResponse(response: HttpResponse): ApiPage {
        let body: unknown;
        try {
            body = JSON.parse(response.body);
        } catch (err) {
            throw new ListingParseError(response.url, `response is not JSON (${errorMessage(err)})`);
        }

        const items = readPath(body, this.site.itemsPath);
        if (!Array.isArray(items)) {
            throw new ListingParseError(response.url, `no array at '${this.site.itemsPath || '(root)'}'`);
        }

        const { fields } = this.site;
        const urls: string[] = [];
        const listings: ApiListing[] = [];

        for (const item of items) {
            const href = readText(item, fields.url);
            if (!href) continue;

            let url: string;
            try {
                url = new URL(href, this.site.endpoint).toString();
            } catch {
                continue;
            }

            urls.push(url);
            listings.push({
                url,
                title: readText(item, fields.title) ?? '',
                company: readText(item, fields.company),
                location: readText(item, fields.location),
                description: readText(item, fields.description),
                salary: readText(item, fields.salary),
                postedDate: readText(item, fields.postedDate),
            });
        }

        return { urls, listings };
    }
}
