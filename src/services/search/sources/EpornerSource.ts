// Eporner Source - vendor JSON API (v2)

import { z } from 'zod';
import type { ISearchSource, RawResult, Result, SourceContext, SourceDescriptor, SourceFeature } from '../interfaces';
import { formatDuration, formatViewCount, parseRating } from '../../extraction/parsers';
import { SourceFetchError } from '../../../utils/errors';
import { fetchJson, finalizeResults, NO_CAPABILITIES } from './shared';

const PER_PAGE = 50;

const videoSchema = z.object({
    title: z.string().min(1),
    url: z.string().url(),
    keywords: z.string().optional(),
    views: z.coerce.number().nonnegative().optional(),
    rate: z.union([z.string(), z.number()]).optional(),
    added: z.string().optional(),
    length_sec: z.coerce.number().nonnegative().optional(),
    default_thumb: z.object({ src: z.string() }).partial().optional(),
});

const responseSchema = z.object({
    videos: z.array(z.unknown()).default([]),
});

export class EpornerSource implements ISearchSource {
    readonly name = 'eporner';
    readonly displayName = 'Eporner';
    readonly baseUrl = 'https://www.eporner.com';
    readonly tier = 1;
    private readonly features: SourceFeature[] = ['pagination', 'sorting'];

    buildSearchUrl(query: string, page: number): string {
        const params = new URLSearchParams({
            query,
            per_page: String(PER_PAGE),
            page: String(page),
            thumbsize: 'big',
            order: 'top-rated',
            format: 'json',
        });
        return `${this.baseUrl}/api/v2/video/search/?${params.toString()}`;
    }

    async search(query: string, page: number, context: SourceContext): Promise<Result[]> {
        const body = await fetchJson(this.name, this.buildSearchUrl(query, page), context);
        return finalizeResults(this.parse(body), this);
    }

    parse(body: unknown): RawResult[] {
        const response = responseSchema.safeParse(body);
        if (!response.success) {
            throw new SourceFetchError('eporner API returned an unexpected payload', { source: this.name, kind: 'decode' });
        }

        const items: RawResult[] = [];
        for (const candidate of response.data.videos) {
            const parsed = videoSchema.safeParse(candidate);
            if (!parsed.success) continue;

            const video = parsed.data;
            items.push({
                title: video.title,
                url: video.url,
                thumbnail: video.default_thumb?.src ?? '',
                duration: video.length_sec ? formatDuration(video.length_sec) : undefined,
                durationSeconds: video.length_sec || undefined,
                views: video.views ? formatViewCount(video.views) : undefined,
                viewsCount: video.views || undefined,
                rating: video.rate === undefined ? undefined : parseRating(String(video.rate)),
                published: video.added,
                tags: video.keywords ? video.keywords.split(',') : [],
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
            capabilities: { ...NO_CAPABILITIES, duration: true, views: true, rating: true, uploadDate: true },
            extraction: 'api',
            features: [...this.features],
        };
    }
}
