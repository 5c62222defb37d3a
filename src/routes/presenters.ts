// Response presenters - text/plain listings and server-sent event frames

import type { Result, SearchEnvelope, SearchSourceResult } from '../services/search/interfaces';
import type { SourceStatus } from '../services/search/SearchOrchestrator';
import type { BangListing } from '../services/query/bangs';
import { proxyResultMedia, type ThumbnailProxy } from '../services/thumbnails/ThumbnailProxy';

export type ResponseFormat = 'json' | 'text' | 'stream';

export function presentResults(results: Result[], thumbnails: ThumbnailProxy): Result[] {
    return results.map(result => proxyResultMedia(result, thumbnails));
}

export function presentEnvelope(envelope: SearchEnvelope, thumbnails: ThumbnailProxy): SearchEnvelope {
    return { ...envelope, results: presentResults(envelope.results, thumbnails) };
}

export function presentBatch(batch: SearchSourceResult, thumbnails: ThumbnailProxy): SearchSourceResult {
    return { ...batch, results: presentResults(batch.results, thumbnails) };
}

export function formatSseFrame(event: string, data: unknown): string {
    return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

export function formatSearchText(envelope: SearchEnvelope): string {
    let out = `query: ${envelope.query}\nresults: ${envelope.results.length}\n---\n`;
    envelope.results.forEach((result, index) => {
        out += `${index + 1}. ${result.title}\n`;
        out += `   url: ${result.url}\n`;
        out += `   source: ${result.sourceDisplay}\n`;
        if (result.duration) out += `   duration: ${result.duration}\n`;
        if (result.views) out += `   views: ${result.views}\n`;
        out += '\n';
    });
    for (const failure of envelope.failedSources) {
        out += `failed: ${failure.source} (${failure.error})\n`;
    }
    if (envelope.relatedSearches.length > 0) {
        out += `related: ${envelope.relatedSearches.join(', ')}\n`;
    }
    return out;
}

export function formatBangsText(bangs: BangListing[]): string {
    return `bangs: ${bangs.length}\n---\n${bangs.map(bang => `${bang.bang} - ${bang.displayName}\n`).join('')}`;
}

export function formatEnginesText(engines: SourceStatus[]): string {
    const lines = engines.map(engine =>
        `${engine.name} (${engine.displayName}) - tier ${engine.tier} [${engine.enabled ? 'enabled' : 'disabled'}]\n`);
    return `engines: ${engines.length}\n---\n${lines.join('')}`;
}
