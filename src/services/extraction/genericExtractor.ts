// Generic DOM extraction - ordered strategy lists per field, first non-empty value wins

import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import type { RawResult } from '../search/interfaces';
import {
    cleanText,
    extractQuality,
    makeAbsoluteUrl,
    parseDuration,
    parseRating,
    parseViews,
    type ParsedDuration,
    type ParsedViews,
} from './parsers';

export interface ExtractionTarget {
    $: CheerioAPI;
    container: Cheerio<Element>;
    link: Cheerio<Element>;
    image: Cheerio<Element>;
    baseUrl: string;
}

export type Strategy<T> = (target: ExtractionTarget) => T | undefined;

export const TITLE_SELECTORS = [
    '.title', '.name', '.video-title', 'a.video-title', 'h4', 'h3',
    'span > em', 'strong span', 'strong em',
];

export const THUMBNAIL_ATTRIBUTES = ['data-src', 'data-original', 'data-lazy-src', 'src'];

export const PREVIEW_ATTRIBUTES = [
    'data-mediabook', 'data-preview', 'data-video-preview', 'data-rollover',
    'data-preview-url', 'data-gif', 'data-webm', 'data-mp4', 'data-thumb-url',
    'data-trailer', 'data-teaser',
];

export const DURATION_SELECTORS = [
    '.duration', '.dur', '.time', '.length', '.video-duration', 'var.duration',
    'span.duration', '.thumb-icon.video-duration', 'em.time_thumb em', '.time_thumb',
    '.video_duration', '.video__time', '.thumb__time', '.thumb-time', '.thumb-duration',
    '.video-time', 'time', '[data-duration]', '.meta-duration', '.card-duration',
];

export const VIEWS_SELECTORS = [
    '.views', '.view', '.cnt', 'span.views', '.video-views', '.video__views',
    '.thumb__views', '.meta-views', '.stats', '.view-count', '.viewCount',
    '.video-count', '.added-views',
];

export const RATING_SELECTORS = [
    '.rating', '.rate', '.video-rating', '.thumb__rating', '.score', '.likes', '.percent',
];

export const QUALITY_SELECTORS = [
    '.quality', '.hd-badge', '.quality-badge', "[class*='quality']", "[class*='hd']", "[class*='4k']",
];

export const TAG_SELECTORS = [
    '.tags a', '.tag a', '.categories a', '.category a', 'a.tag', 'a.category',
    '.video-tags a', '.video-categories a', '.thumb-tags a', '.card-tags a',
    '.keywords a', '.labels a', '.label', '.badge', '.chip',
];

export const TAG_ATTRIBUTES = ['data-tags', 'data-category', 'data-categories'];

export const PERFORMER_SELECTORS = [
    '.pornstar', '.model', '.performer', '.actor', '.actress', '.uploader', '.author',
    '.channel', '.studio', 'a.pornstar', 'a.model', '.video-pornstar', '.video-model',
    '[data-pornstar]', '[data-model]', '[data-performer]',
];

export const PERFORMER_ATTRIBUTES = ['data-pornstar', 'data-model', 'data-performer'];

export function firstOf<T>(strategies: readonly Strategy<T>[], target: ExtractionTarget): T | undefined {
    for (const strategy of strategies) {
        const value = strategy(target);
        if (value !== undefined && value !== '') {
            return value;
        }
    }
    return undefined;
}

export function attrOf(node: Cheerio<Element>, name: string): string | undefined {
    if (node.length === 0) return undefined;
    const value = cleanText(node.attr(name));
    return value || undefined;
}

/** Text of the first element matching each selector, in selector order. */
export function textOf(selectors: readonly string[]): Strategy<string> {
    return ({ container }) => {
        for (const selector of selectors) {
            const text = cleanText(container.find(selector).first().text());
            if (text) return text;
        }
        return undefined;
    };
}

const titleStrategies: Strategy<string>[] = [
    ({ link }) => attrOf(link, 'title'),
    ({ image }) => attrOf(image, 'alt'),
    textOf(TITLE_SELECTORS),
    ({ link }) => cleanText(link.text()) || undefined,
];

const thumbnailStrategies: Strategy<string>[] = THUMBNAIL_ATTRIBUTES.map(name => ({ image, baseUrl }) => {
    const value = attrOf(image, name);
    if (!value || value.startsWith('data:')) return undefined;
    return makeAbsoluteUrl(value, baseUrl) || undefined;
});

const previewStrategies: Strategy<string>[] = (['container', 'image', 'link'] as const).map(
    which => (target: ExtractionTarget) => {
        for (const name of PREVIEW_ATTRIBUTES) {
            const value = attrOf(target[which], name);
            if (value) {
                return makeAbsoluteUrl(value, target.baseUrl) || undefined;
            }
        }
        return undefined;
    },
);

const durationStrategies: Strategy<ParsedDuration>[] = [
    ({ container }) => {
        for (const selector of DURATION_SELECTORS) {
            const node = container.find(selector).first();
            if (node.length === 0) continue;
            const parsed = parseDuration(node.attr('data-content'))
                ?? parseDuration(node.attr('data-duration'))
                ?? parseDuration(node.text());
            if (parsed) return parsed;
        }
        return undefined;
    },
    ({ container }) => parseDuration(container.attr('data-duration')),
];

const viewsStrategies: Strategy<ParsedViews>[] = [
    ({ container }) => {
        for (const selector of VIEWS_SELECTORS) {
            const parsed = parseViews(container.find(selector).first().text());
            if (parsed) return parsed;
        }
        return undefined;
    },
];

const ratingStrategies: Strategy<number>[] = [
    ({ container }) => {
        for (const selector of RATING_SELECTORS) {
            const node = container.find(selector).first();
            if (node.length === 0) continue;
            const rating = parseRating(node.attr('data-rating')) ?? parseRating(node.text());
            if (rating !== undefined) return rating;
        }
        return undefined;
    },
];

const qualityStrategies: Strategy<string>[] = [
    ({ container }) => {
        for (const selector of QUALITY_SELECTORS) {
            const node = container.find(selector).first();
            if (node.length === 0) continue;
            const quality = extractQuality(node.text(), node.attr('class'));
            if (quality) return quality;
        }
        return undefined;
    },
];

const performerStrategies: Strategy<string>[] = [
    textOf(PERFORMER_SELECTORS),
    ({ container }) => PERFORMER_ATTRIBUTES.map(name => attrOf(container, name)).find(Boolean),
];

function collectTags({ $, container }: ExtractionTarget): string[] {
    const tags: string[] = [];
    for (const selector of TAG_SELECTORS) {
        container.find(selector).each((_, el) => {
            const text = cleanText($(el).text());
            if (text) tags.push(text);
        });
    }
    for (const name of TAG_ATTRIBUTES) {
        const value = attrOf(container, name);
        if (value) tags.push(...value.split(',').map(tag => tag.trim()));
    }
    return tags;
}

export function buildTarget($: CheerioAPI, element: Element, baseUrl: string): ExtractionTarget | undefined {
    const container = $(element);
    const link = container.is('a') ? container : container.find('a').first();
    if (link.length === 0) return undefined;
    return { $, container, link, image: container.find('img').first(), baseUrl };
}

/** Maps one candidate item node to a raw result; undefined means skip. */
export function extractItem($: CheerioAPI, element: Element, baseUrl: string): RawResult | undefined {
    const target = buildTarget($, element, baseUrl);
    if (!target) return undefined;

    const url = makeAbsoluteUrl(target.link.attr('href'), baseUrl);
    if (!url) return undefined;

    const title = firstOf(titleStrategies, target);
    if (!title) return undefined;

    const duration = firstOf(durationStrategies, target);
    const views = firstOf(viewsStrategies, target);

    return {
        title,
        url,
        thumbnail: firstOf(thumbnailStrategies, target) ?? '',
        previewUrl: firstOf(previewStrategies, target),
        duration: duration?.display,
        durationSeconds: duration?.seconds,
        views: views?.display,
        viewsCount: views?.count,
        rating: firstOf(ratingStrategies, target),
        quality: firstOf(qualityStrategies, target),
        tags: collectTags(target),
        performer: firstOf(performerStrategies, target),
    };
}

/**
 * Tries each item selector in order and returns the items of the first one
 * that yields anything.
 */
export function extractItems(html: string, itemSelectors: readonly string[], baseUrl: string): RawResult[] {
    const $ = cheerio.load(html);
    for (const selector of itemSelectors) {
        const items: RawResult[] = [];
        $<Element, string>(selector).each((_, element) => {
            const item = extractItem($, element, baseUrl);
            if (item) items.push(item);
        });
        if (items.length > 0) return items;
    }
    return [];
}
