// xHamster Source - search state embedded as window.initials JSON

import { z } from 'zod';
import type { ISearchSource, RawResult, Result, SourceContext, SourceDescriptor, SourceFeature } from '../interfaces';
import { extractJsonObject } from '../../extraction/jsonExtract';
import { formatDuration, formatViewCount, makeAbsoluteUrl } from '../../extraction/parsers';
import { SourceFetchError } from '../../../utils/errors';
import { encodeQuery, fetchText, finalizeResults, NO_CAPABILITIES } from './shared';

const INITIALS_MARKER = 'window.initials=';

const videoThumbSchema = z.object({
    title: z.string().min(1),
    pageURL: z.string().min(1),
    thumbURL: z.string().optional(),
    duration: z.number().nonnegative().optional(),
    views: z.number().nonnegative().optional(),
    created: z.number().positive().optional(),
});

const initialsSchema = z.object({
    searchResult: z.object({
        videoThumbProps: z.array(z.unknown()).default([]),
    }).optional(),
});

export class XHamsterSource implements ISearchSource {
    readonly name = 'xhamster';
    readonly displayName = 'xHamster';
    readonly baseUrl = 'https://xhamster.com';
    readonly tier = 2;
    private readonly features: SourceFeature[] = ['pagination'];

    buildSearchUrl(query: string, page: number): string {
        const base = `${this.baseUrl}/search/${encodeQuery(query)}`;
        return page > 1 ? `${base}/${page}` : base;
    }

    async search(query: string, page: number, context: SourceContext): Promise<Result[]> {
        const html = await fetchText(this.name, this.buildSearchUrl(query, page), context);
        return finalizeResults(this.parse(html), this);
    }

    parse(html: string): RawResult[] {
        const json = extractJsonObject(html, INITIALS_MARKER);
        if (json === undefined) {
            throw new SourceFetchError('xhamster page carried no search state', { source: this.name, kind: 'decode' });
        }

        let state: unknown;
        try {
            state = JSON.parse(json);
        } catch (error) {
            throw new SourceFetchError('xhamster search state is not valid JSON', {
                source: this.name,
                kind: 'decode',
                cause: error,
            });
        }

        const initials = initialsSchema.safeParse(state);
        if (!initials.success) {
            throw new SourceFetchError('xhamster search state has an unexpected shape', { source: this.name, kind: 'decode' });
        }

        const items: RawResult[] = [];
        for (const candidate of initials.data.searchResult?.videoThumbProps ?? []) {
            const parsed = videoThumbSchema.safeParse(candidate);
            if (!parsed.success) continue;

            const video = parsed.data;
            items.push({
                title: video.title,
                url: makeAbsoluteUrl(video.pageURL, this.baseUrl),
                thumbnail: video.thumbURL ? makeAbsoluteUrl(video.thumbURL, this.baseUrl) : '',
                duration: video.duration ? formatDuration(video.duration) : undefined,
                durationSeconds: video.duration || undefined,
                views: video.views ? formatViewCount(video.views) : undefined,
                viewsCount: video.views || undefined,
                published: video.created ? new Date(video.created * 1000).toISOString() : undefined,
            });
        }
        return items;
    }

    supportsFeature(feature: SourceFeature): boolean {
        return this.features.includes(feature);
    }

    capabilities(): SourceDescriptor {
        return {
            name: this.name,
            displayName: this.displayName,
            baseUrl: this.baseUrl,
            tier: this.tier,
            capabilities: { ...NO_CAPABILITIES, duration: true, views: true, uploadDate: true },
            extraction: 'json_extraction',
            features: [...this.features],
        };
    }
}
