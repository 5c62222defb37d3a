// Text parsers shared by the generic extractor and the bespoke adapters

export interface ParsedDuration {
    seconds: number;
    display: string;
}

export interface ParsedViews {
    count: number;
    display: string;
}

const PREMIUM_MARKERS = ['premium', 'gold', 'vip', 'paid', 'exclusive', 'members-only'];

export function cleanText(text: string | undefined | null): string {
    if (!text) return '';
    return text.replace(/\s+/g, ' ').trim();
}

export function formatDuration(totalSeconds: number): string {
    const seconds = Math.max(0, Math.floor(totalSeconds));
    const h = Math.floor(seconds / 3600);
    const m = Math.floor((seconds % 3600) / 60);
    const s = seconds % 60;
    const ss = String(s).padStart(2, '0');
    if (h > 0) {
        return `${h}:${String(m).padStart(2, '0')}:${ss}`;
    }
    return `${m}:${ss}`;
}

/**
 * Accepts clock notation (`M:SS`, `H:MM:SS`), bare seconds, and unit
 * notation (`12 min`, `1h 20m`, `45 sec`).
 */
export function parseDuration(text: string | undefined | null): ParsedDuration | undefined {
    const value = cleanText(text).toLowerCase();
    if (!value) return undefined;

    let seconds = 0;
    const clock = value.match(/(\d+):(\d{1,2})(?::(\d{1,2}))?/);
    if (clock) {
        const [, first, second, third] = clock;
        seconds = third === undefined
            ? Number(first) * 60 + Number(second)
            : Number(first) * 3600 + Number(second) * 60 + Number(third);
    } else if (/^\d+$/.test(value)) {
        seconds = Number(value);
    } else {
        const hours = value.match(/(\d+)\s*(?:h|hr|hrs|hours?)\b/);
        const minutes = value.match(/(\d+)\s*(?:m|min|mins|minutes?)\b/);
        const secs = value.match(/(\d+)\s*(?:s|sec|secs|seconds?)\b/);
        if (hours) seconds += Number(hours[1]) * 3600;
        if (minutes) seconds += Number(minutes[1]) * 60;
        if (secs) seconds += Number(secs[1]);
    }

    if (!Number.isFinite(seconds) || seconds <= 0) return undefined;
    return { seconds, display: formatDuration(seconds) };
}

const VIEW_MULTIPLIERS: Record<string, number> = { k: 1_000, m: 1_000_000, b: 1_000_000_000 };

export function parseViews(text: string | undefined | null): ParsedViews | undefined {
    const display = cleanText(text);
    const match = display.match(/(\d[\d,]*(?:\.\d+)?)\s*([kmb])?\b/i);
    if (!match) return undefined;

    const [, digits, suffix] = match;
    const base = Number(digits.replace(/,/g, ''));
    const multiplier = suffix ? VIEW_MULTIPLIERS[suffix.toLowerCase()] : 1;
    const count = Math.round(base * multiplier);
    if (!Number.isFinite(count) || count <= 0) return undefined;

    return { count, display };
}

export function formatViewCount(count: number): string {
    if (count >= 1_000_000_000) return `${trimFraction(count / 1_000_000_000)}B`;
    if (count >= 1_000_000) return `${trimFraction(count / 1_000_000)}M`;
    if (count >= 1_000) return `${trimFraction(count / 1_000)}K`;
    return String(count);
}

function trimFraction(value: number): string {
    return value.toFixed(1).replace(/\.0$/, '');
}

/**
 * Normalizes a rating to 0-100: percentages as-is, `x/y` as a ratio, bare
 * numbers on a 5 or 10 point scale scaled up.
 */
export function parseRating(text: string | undefined | null): number | undefined {
    const value = cleanText(text);
    if (!value) return undefined;

    let rating: number;
    const percent = value.match(/(\d+(?:\.\d+)?)\s*%/);
    const ratio = value.match(/(\d+(?:\.\d+)?)\s*\/\s*(\d+(?:\.\d+)?)/);
    const bare = value.match(/\d+(?:\.\d+)?/);

    if (percent) {
        rating = Number(percent[1]);
    } else if (ratio && Number(ratio[2]) > 0) {
        rating = (Number(ratio[1]) / Number(ratio[2])) * 100;
    } else if (bare) {
        const n = Number(bare[0]);
        rating = n <= 5 ? n * 20 : n <= 10 ? n * 10 : n;
    } else {
        return undefined;
    }

    if (!Number.isFinite(rating) || rating <= 0) return undefined;
    return Math.round(Math.min(rating, 100) * 10) / 10;
}

export function extractQuality(text: string | undefined | null, className = ''): string | undefined {
    const value = cleanText(text);
    const match = value.match(/\b(4k|uhd|2160p|1440p|1080p|720p|480p|360p|fhd|hd)\b/i);
    if (match) {
        const quality = match[1].toLowerCase();
        return quality.endsWith('p') ? quality : quality.toUpperCase();
    }

    const classes = className.toLowerCase();
    if (classes.includes('4k')) return '4K';
    if (classes.includes('hd')) return 'HD';
    return undefined;
}

/**
 * Resolves an href against the source's base URL. Non-navigable values
 * (fragments, javascript:, data:, mailto:) resolve to an empty string.
 */
export function makeAbsoluteUrl(href: string | undefined | null, baseUrl: string): string {
    const value = (href ?? '').trim();
    if (!value || /^(#|javascript:|data:|mailto:)/i.test(value)) {
        return '';
    }
    if (/^https?:\/\//i.test(value)) {
        return value;
    }
    if (value.startsWith('//')) {
        return `https:${value}`;
    }
    const base = baseUrl.replace(/\/+$/, '');
    if (value.startsWith('/')) {
        return `${base}${value}`;
    }
    return `${base}/${value}`;
}

export function isPremiumContent(url: string, markup = ''): boolean {
    const haystack = `${url} ${markup}`.toLowerCase();
    return PREMIUM_MARKERS.some(marker => haystack.includes(marker));
}
