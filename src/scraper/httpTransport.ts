/**
 * src/scraper/httpTransport.ts
 *
 * got-scraping backed transport. got's own retry is disabled (UrlFetcher owns
 * retry and backoff) and HTTP error statuses resolve instead of throwing, so
 * the classifier sees the status code and the final URL.
 */

import { gotScraping } from 'got-scraping';
import type { HttpRequest, HttpResponse, HttpTransport } from './types.js';

export interface GotTransportOptions {
    timeoutMs: number;
    proxyUrl?: string;
    userAgent?: string;
    maxRedirects?: number;
}

const DEFAULT_HEADERS: Record<string, string> = {
    'Accept': 'text/html,application/xhtml+xml,application/json;q=0.9,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.9',
};

export class GotScrapingTransport implements HttpTransport {
    constructor(private readonly options: GotTransportOptions) {}

    async request(req: HttpRequest): Promise<HttpResponse> {
        // Throws TypeError [ERR_INVALID_URL] before any socket is opened.
        new URL(req.url);

        const headers: Record<string, string> = { ...DEFAULT_HEADERS, ...(req.headers ?? {}) };
        if (this.options.userAgent) headers['User-Agent'] = this.options.userAgent;

        const response = await gotScraping({
            url: req.url,
            method: req.method ?? 'GET',
            headers,
            body: req.body,
            proxyUrl: this.options.proxyUrl,
            timeout: { request: this.options.timeoutMs },
            retry: { limit: 0 },
            throwHttpErrors: false,
            followRedirect: true,
            maxRedirects: this.options.maxRedirects ?? 10,
            signal: req.signal,
        });

        return {
            statusCode: response.statusCode,
            url: response.url,
            body: response.body,
            headers: response.headers,
        };
    }
}
