// Result normalization - every adapter funnels its items through createResult

import { createHash } from 'crypto';
import type { RawResult, Result } from './interfaces';

export const MIN_TAG_LENGTH = 2;
export const MAX_TAG_LENGTH = 49;

/**
 * Canonical form used for IDs and cross-source dedupe: lowercase scheme and
 * host, no fragment, no trailing slash. Path and query keep their case.
 */
export function normalizeResultUrl(url: string): string {
    try {
        const parsed = new URL(url);
        const path = parsed.pathname.replace(/\/+$/, '');
        return `${parsed.protocol.toLowerCase()}//${parsed.host.toLowerCase()}${path}${parsed.search}`;
    } catch {
        return url.trim().replace(/#.*$/, '').replace(/\/+$/, '');
    }
}

export function generateResultId(url: string, source: string): string {
    return createHash('sha256')
        .update(normalizeResultUrl(url) + source)
        .digest('hex')
        .slice(0, 16);
}

export function normalizeTags(tags: Iterable<string>): string[] {
    const seen = new Set<string>();
    for (const tag of tags) {
        const value = tag.trim().toLowerCase();
        if (value.length >= MIN_TAG_LENGTH && value.length <= MAX_TAG_LENGTH) {
            seen.add(value);
        }
    }
    return Array.from(seen);
}

/** Returns null when the item lacks a title or URL. */
export function createResult(raw: RawResult, source: { name: string; displayName: string }): Result | null {
    const title = raw.title?.trim();
    const url = raw.url?.trim();
    if (!title || !url) {
        return null;
    }

    const result: Result = {
        id: generateResultId(url, source.name),
        title,
        url,
        thumbnail: raw.thumbnail ?? '',
        tags: normalizeTags(raw.tags ?? []),
        source: source.name,
        sourceDisplay: source.displayName,
    };

    if (raw.previewUrl) result.previewUrl = raw.previewUrl;
    if (raw.downloadUrl) result.downloadUrl = raw.downloadUrl;
    if (raw.duration && raw.durationSeconds) {
        result.duration = raw.duration;
        result.durationSeconds = raw.durationSeconds;
    }
    if (raw.views) result.views = raw.views;
    if (raw.viewsCount !== undefined && raw.viewsCount > 0) result.viewsCount = raw.viewsCount;
    if (raw.rating !== undefined && raw.rating > 0) result.rating = raw.rating;
    if (raw.quality) result.quality = raw.quality;
    if (raw.published) result.published = raw.published;
    if (raw.performer) result.performer = raw.performer;

    return result;
}
