// Shared adapter plumbing: browser-like requests, bounded retry, result finalization

import type { Capabilities, RawResult, Result, SourceContext } from '../interfaces';
import { createResult } from '../results';
import { retryWithBackoff } from '../../../utils/retry';
import { SourceFetchError, errorMessage } from '../../../utils/errors';
import { SEARCH_CONFIG } from '../../../config/searchConfig';
import Logger from '../../../utils/logger';

export const NO_CAPABILITIES: Capabilities = {
    preview: false,
    download: false,
    duration: false,
    views: false,
    rating: false,
    quality: false,
    uploadDate: false,
};

export const HTML_ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8';
export const JSON_ACCEPT = 'application/json,text/plain;q=0.9,*/*;q=0.8';

export function browserHeaders(userAgent: string, accept = HTML_ACCEPT): Record<string, string> {
    return {
        'User-Agent': userAgent,
        'Accept': accept,
        'Accept-Language': 'en-US,en;q=0.9',
    };
}

/** `+` joined by default, matching form encoding of the search box. */
export function encodeQuery(query: string, separator: '+' | '-' | '%20' = '+'): string {
    return query
        .trim()
        .split(/\s+/)
        .filter(Boolean)
        .map(word => encodeURIComponent(word))
        .join(separator);
}

export function fillTemplate(template: string, values: Record<string, string>): string {
    return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}

/**
 * GETs `url` through the client the coordinator handed over. Non-2xx and
 * network failures become SourceFetchError; retries are bounded by
 * `context.maxAttempts` and stop as soon as the signal fires.
 */
export async function fetchText(
    sourceName: string,
    url: string,
    context: SourceContext,
    accept = HTML_ACCEPT,
): Promise<string> {
    return retryWithBackoff(async (attempt) => {
        if (attempt > 1) {
            Logger.debug(`[${sourceName}] retry ${attempt}/${context.maxAttempts}: ${url}`);
        }

        const response = await context.client(url, {
            headers: browserHeaders(context.userAgent, accept),
            signal: context.signal,
        }).catch((error: unknown) => {
            throw new SourceFetchError(`${sourceName} request failed: ${errorMessage(error)}`, {
                source: sourceName,
                kind: context.signal.aborted ? 'aborted' : 'network',
                cause: error,
            });
        });

        if (!response.ok) {
            throw new SourceFetchError(`${sourceName} returned ${response.status}: ${response.statusText}`, {
                source: sourceName,
                kind: 'http',
                status: response.status,
            });
        }

        try {
            return await response.text();
        } catch (error) {
            throw new SourceFetchError(`${sourceName} response could not be read: ${errorMessage(error)}`, {
                source: sourceName,
                kind: context.signal.aborted ? 'aborted' : 'decode',
                cause: error,
            });
        }
    }, {
        maxAttempts: context.maxAttempts,
        baseDelayMs: SEARCH_CONFIG.retryBaseDelayMs,
        maxDelayMs: SEARCH_CONFIG.retryMaxDelayMs,
        signal: context.signal,
        shouldRetry: error => error instanceof SourceFetchError && error.retryable,
    });
}

export async function fetchJson(sourceName: string, url: string, context: SourceContext): Promise<unknown> {
    const body = await fetchText(sourceName, url, context, JSON_ACCEPT);
    try {
        return JSON.parse(body);
    } catch (error) {
        throw new SourceFetchError(`${sourceName} returned invalid JSON`, {
            source: sourceName,
            kind: 'decode',
            cause: error,
        });
    }
}

/** Validates raw items, assigns IDs and drops repeats of the same URL. */
export function finalizeResults(
    items: Iterable<RawResult>,
    source: { name: string; displayName: string },
): Result[] {
    const results: Result[] = [];
    const seen = new Set<string>();
    for (const item of items) {
        const result = createResult(item, source);
        if (result && !seen.has(result.id)) {
            seen.add(result.id);
            results.push(result);
        }
    }
    return results;
}
