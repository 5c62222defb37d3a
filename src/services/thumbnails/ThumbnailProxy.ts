// Thumbnail proxy - rewrites upstream image/preview URLs to a locally served path

import type { Result } from '../search/interfaces';

export interface ThumbnailProxy {
    rewrite(url: string): string;
}

export const passthroughThumbnails: ThumbnailProxy = {
    rewrite: url => url,
};

/** Appends the encoded upstream URL to a prefix such as `/thumbs?url=`. */
export class PrefixThumbnailProxy implements ThumbnailProxy {
    constructor(private readonly prefix: string) {}

    rewrite(url: string): string {
        if (!url || url.startsWith(this.prefix)) return url;
        return `${this.prefix}${encodeURIComponent(url)}`;
    }
}

export function createThumbnailProxy(prefix?: string): ThumbnailProxy {
    return prefix ? new PrefixThumbnailProxy(prefix) : passthroughThumbnails;
}

export function proxyResultMedia(result: Result, proxy: ThumbnailProxy): Result {
    return {
        ...result,
        thumbnail: proxy.rewrite(result.thumbnail),
        ...(result.previewUrl ? { previewUrl: proxy.rewrite(result.previewUrl) } : {}),
    };
}
