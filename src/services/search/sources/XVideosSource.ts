// XVideos Source - thumb-block listing with quality badges

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import type { ISearchSource, RawResult, Result, SourceContext, SourceDescriptor, SourceFeature } from '../interfaces';
import { attrOf } from '../../extraction/genericExtractor';
import { cleanText, extractQuality, isPremiumContent, makeAbsoluteUrl, parseDuration, parseViews } from '../../extraction/parsers';
import { encodeQuery, fetchText, finalizeResults, NO_CAPABILITIES } from './shared';

const ITEM_SELECTORS = ['div.thumb-block', 'div.mozaique div.thumb'];

export class XVideosSource implements ISearchSource {
    readonly name = 'xvideos';
    readonly displayName = 'XVideos';
    readonly baseUrl = 'https://www.xvideos.com';
    readonly tier = 1;
    private readonly features: SourceFeature[] = ['pagination', 'thumbnail_preview'];

    // Pages are zero-based upstream
    buildSearchUrl(query: string, page: number): string {
        return `${this.baseUrl}/?k=${encodeQuery(query)}&p=${Math.max(0, page - 1)}`;
    }

    async search(query: string, page: number, context: SourceContext): Promise<Result[]> {
        const html = await fetchText(this.name, this.buildSearchUrl(query, page), context);
        return finalizeResults(this.parse(html, context.filterPremium), this);
    }

    parse(html: string, filterPremium: boolean): RawResult[] {
        const $ = cheerio.load(html);
        for (const selector of ITEM_SELECTORS) {
            const items: RawResult[] = [];
            $<Element, string>(selector).each((_, element) => {
                const item = this.parseItem($, element, filterPremium);
                if (item) items.push(item);
            });
            if (items.length > 0) return items;
        }
        return [];
    }

    private parseItem($: CheerioAPI, element: Element, filterPremium: boolean): RawResult | undefined {
        const container = $(element);
        const titleLink = container.find('p.title a').first();
        const link = titleLink.length > 0 ? titleLink : container.find('a').first();

        const url = makeAbsoluteUrl(link.attr('href'), this.baseUrl);
        if (!url) return undefined;
        if (filterPremium && isPremiumContent(url, container.attr('class'))) return undefined;

        const image = container.find('img').first();
        const title = attrOf(titleLink, 'title')
            || cleanText(titleLink.text())
            || attrOf(container.find('a[title]').first(), 'title')
            || attrOf(image, 'alt');
        if (!title) return undefined;

        const thumbnail = attrOf(image, 'data-src') ?? attrOf(image, 'src');
        const preview = attrOf(image, 'data-preview') ?? attrOf(container, 'data-preview');
        const duration = parseDuration(container.find('.duration').first().text());
        const views = parseViews(container.find('.views, span.views').first().text());

        return {
            title,
            url,
            thumbnail: thumbnail ? makeAbsoluteUrl(thumbnail, this.baseUrl) : '',
            previewUrl: preview ? makeAbsoluteUrl(preview, this.baseUrl) : undefined,
            duration: duration?.display,
            durationSeconds: duration?.seconds,
            views: views?.display,
            viewsCount: views?.count,
            quality: extractQuality(container.find('.video-hd-mark, .video-sd-mark').first().text()),
            performer: cleanText(container.find('.metadata a .name, .metadata a').first().text()) || undefined,
        };
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
            capabilities: { ...NO_CAPABILITIES, preview: true, duration: true, quality: true },
            previewSource: 'data-preview',
            extraction: 'html',
            features: [...this.features],
        };
    }
}
