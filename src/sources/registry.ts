/**
 * src/sources/registry.ts
 *
 * Name → crawler lookup. Sites come from the site config; each kind maps to
 * the constructor that turns its definition into a batch source.
 */

import type { UrlFetcher } from '../scraper/urlFetcher.js';
import type { BatchSource } from '../scraper/types.js';
import { TwoPhaseSource } from '../scraper/twoPhaseSource.js';
import { SinglePhaseSource } from '../scraper/singlePhaseSource.js';
import { UnknownCrawlerError } from '../scraper/errors.js';
import { HtmlBoardCrawler } from './htmlBoard.js';
import { JsonApiCrawler } from './jsonApiBoard.js';
import { loadSites, tableFor } from './siteConfig.js';
import type { ApiSite, HtmlSite, SiteDefinition, SiteKind } from './siteConfig.js';

export interface SourceDeps {
    fetcher: UrlFetcher;
    requestDelayMs: number;
    detailBatchSize: number;
    maxConsecutiveFailures: number;
    /** Directory page to resume from (html sites). */
    startPage?: number;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export const SOURCE_FACTORIES = {
    html: (site: HtmlSite, deps: SourceDeps): BatchSource =>
        new TwoPhaseSource(new HtmlBoardCrawler(site), {
            fetcher: deps.fetcher,
            startPage: deps.startPage,
            detailBatchSize: deps.detailBatchSize,
            requestDelayMs: deps.requestDelayMs,
            sleep: deps.sleep,
        }),
    api: (site: ApiSite, deps: SourceDeps): BatchSource =>
        new SinglePhaseSource(new JsonApiCrawler(site), {
            fetcher: deps.fetcher,
            maxConsecutiveFailures: deps.maxConsecutiveFailures,
        }),
} satisfies Record<SiteKind, unknown>;

export interface RegisteredCrawler {
    name: string;
    kind: SiteKind;
    table: string;
}

export class CrawlerRegistry {
    private readonly sites = new Map<string, SiteDefinition>();

    constructor(sites: readonly SiteDefinition[]) {
        for (const site of sites) this.sites.set(site.name, site);
    }

    static fromFile(filePath: string): CrawlerRegistry {
        return new CrawlerRegistry(loadSites(filePath));
    }

    names(): string[] {
        return [...this.sites.keys()];
    }

    list(): RegisteredCrawler[] {
        return [...this.sites.values()].map((site) => ({ name: site.name, kind: site.kind, table: tableFor(site) }));
    }

    get(name: string): SiteDefinition {
        const site = this.sites.get(name);
        if (!site) throw new UnknownCrawlerError(name, this.names());
        return site;
    }

    tableFor(name: string): string {
        return tableFor(this.get(name));
    }

    createSource(name: string, deps: SourceDeps): BatchSource {
        const site = this.get(name);
        switch (site.kind) {
            case 'html':
                return SOURCE_FACTORIES.html(site, deps);
            case 'api':
                return SOURCE_FACTORIES.api(site, deps);
        }
    }
}
