/**
 * src/scraper/outcome.ts
 *
 * Maps one fetch attempt to good / bad / unknown.
 *
 *   response 2xx                                → good
 *   response redirected elsewhere, 401/403/404/410 → bad
 *   any other response (408, 425, 429, 5xx, …)  → unknown
 *   no response, malformed URL / redirect loop  → bad
 *   no response, any other transport error      → unknown
 *   nothing at all                              → unknown
 */

import type { FetchOutcome } from './types.js';

export const PERMANENT_STATUS_CODES: ReadonlySet<number> = new Set([401, 403, 404, 410]);

/** Statuses that mean "try again later"; any other non-2xx, non-permanent status is treated the same. */
export const TRANSIENT_STATUS_CODES: ReadonlySet<number> = new Set([408, 425, 429, 500, 502, 503, 504]);

/** Error codes used by Node's URL parser and got for non-retryable failures. */
export const PERMANENT_ERROR_CODES: ReadonlySet<string> = new Set(['ERR_INVALID_URL', 'ERR_TOO_MANY_REDIRECTS']);

export interface ResponseLike {
    statusCode: number;
    url: string;
}

export interface AttemptResult {
    response?: ResponseLike;
    error?: unknown;
}

function stripTrailingSlash(url: string): string {
    return url.endsWith('/') ? url.slice(0, -1) : url;
}

function isResponseLike(value: unknown): value is ResponseLike {
    return (
        typeof value === 'object' &&
        value !== null &&
        'statusCode' in value &&
        typeof value.statusCode === 'number' &&
        'url' in value &&
        typeof value.url === 'string'
    );
}

export function errorCode(err: unknown): string | undefined {
    if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
        return err.code;
    }
    return undefined;
}

/** Response carried by an HTTP error (got's HTTPError has one). */
function attachedResponse(err: unknown): ResponseLike | undefined {
    if (typeof err === 'object' && err !== null && 'response' in err && isResponseLike(err.response)) {
        return err.response;
    }
    return undefined;
}

export function isPermanentError(err: unknown): boolean {
    const code = errorCode(err);
    return code !== undefined && PERMANENT_ERROR_CODES.has(code);
}

export function classifyOutcome(url: string, attempt: AttemptResult): FetchOutcome {
    const response = attempt.response ?? attachedResponse(attempt.error);

    if (response) {
        const { statusCode } = response;
        if (statusCode >= 200 && statusCode < 300) return 'good';

        const redirectedAway = stripTrailingSlash(response.url) !== stripTrailingSlash(url);
        if (redirectedAway || PERMANENT_STATUS_CODES.has(statusCode)) return 'bad';

        return 'unknown';
    }

    if (attempt.error !== undefined) {
        return isPermanentError(attempt.error) ? 'bad' : 'unknown';
    }

    return 'unknown';
}
