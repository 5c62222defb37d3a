// PornHub Source - bespoke HTML parsing with mediabook hover previews

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import type { ISearchSource, RawResult, Result, SourceContext, SourceDescriptor, SourceFeature } from '../interfaces';
import { attrOf } from '../../extraction/genericExtractor';
import { cleanText, isPremiumContent, makeAbsoluteUrl, parseDuration, parseRating, parseViews } from '../../extraction/parsers';
import { encodeQuery, fetchText, finalizeResults, NO_CAPABILITIES } from './shared';

const ITEM_SELECTORS = ['li.pcVideoListItem, li.videoBox', 'div.phimage'];
const THUMBNAIL_ATTRIBUTES = ['data-thumb_url', 'data-src', 'data-mediumthumb', 'src'];

export class PornHubSource implements ISearchSource {
    readonly name = 'pornhub';
    readonly displayName = 'PornHub';
    readonly baseUrl = 'https://www.pornhub.com';
    readonly tier = 1;
    private readonly features: SourceFeature[] = ['pagination', 'sorting', 'thumbnail_preview'];

    buildSearchUrl(query: string, page: number): string {
        return `${this.baseUrl}/video/search?search=${encodeQuery(query)}&page=${page}`;
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
        let link = container.find('a.linkVideoThumb, a.videoPreviewBg').first();
        if (link.length === 0) link = container.find('a').first();

        const url = makeAbsoluteUrl(link.attr('href'), this.baseUrl);
        if (!url) return undefined;

        if (filterPremium) {
            const markers = `${container.attr('class') ?? ''} ${container.find('.premiumIcon, .premium-icon').length > 0 ? 'premium' : ''}`;
            if (isPremiumContent(url, markers)) return undefined;
        }

        const image = container.find('img').first();
        const titleLink = container.find('span.title a').first();
        const title = cleanText(titleLink.text())
            || attrOf(titleLink, 'title')
            || attrOf(container.find('a[title]').first(), 'title')
            || attrOf(image, 'alt');
        if (!title) return undefined;

        const thumbnail = THUMBNAIL_ATTRIBUTES
            .map(name => attrOf(image, name))
            .find(value => value !== undefined && !value.startsWith('data:'));
        const preview = attrOf(image, 'data-mediabook') ?? attrOf(link, 'data-mediabook');
        const duration = parseDuration(container.find('var.duration, .duration, .time').first().text());
        const views = parseViews(container.find('var.views, .views, span.views').first().text());

        return {
            title,
            url,
            thumbnail: thumbnail ? makeAbsoluteUrl(thumbnail, this.baseUrl) : '',
            previewUrl: preview ? makeAbsoluteUrl(preview, this.baseUrl) : undefined,
            duration: duration?.display,
            durationSeconds: duration?.seconds,
            views: views?.display,
            viewsCount: views?.count,
            rating: parseRating(container.find('.rating-container .value').first().text()),
            performer: cleanText(container.find('.usernameWrap a, .videoUploaderBlock a').first().text()) || undefined,
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
            capabilities: { ...NO_CAPABILITIES, preview: true, duration: true, views: true },
            previewSource: 'data-mediabook',
            extraction: 'html',
            features: [...this.features],
        };
    }
}
