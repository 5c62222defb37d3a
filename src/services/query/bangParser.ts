// Query router - splits raw input into bangs, phrases, exclusions, performers and plain words

export interface BangResolver {
    resolve(alias: string): string | undefined;
}

export interface ParsedQuery {
    raw: string;
    cleaned: string;
    targets: string[];
    exactPhrases: string[];
    exclusions: string[];
    performers: string[];
    hasBang: boolean;
    invalidBang?: string;
}

/**
 * Pulls matched `"..."` pairs out of the text, splicing the two sides
 * together; an unpaired quote stays put.
 */
function extractPhrases(text: string): { phrases: string[]; remainder: string } {
    const phrases: string[] = [];
    let remainder = text;

    while (true) {
        const open = remainder.indexOf('"');
        if (open === -1) break;
        const close = remainder.indexOf('"', open + 1);
        if (close === -1) break;

        const phrase = remainder.slice(open + 1, close).trim();
        if (phrase) phrases.push(phrase);
        remainder = remainder.slice(0, open) + remainder.slice(close + 1);
    }

    return { phrases, remainder };
}

/**
 * Any `!token` that resolves in the bang table is treated as a directive,
 * even when the token is also an ordinary word.
 */
export function parseQuery(raw: string, bangs: BangResolver): ParsedQuery {
    const { phrases, remainder } = extractPhrases(raw);

    const words: string[] = [];
    const targets: string[] = [];
    const performers: string[] = [];
    const exclusions: string[] = [];
    let invalidBang: string | undefined;

    for (const token of remainder.split(/\s+/)) {
        if (!token) continue;

        const prefix = token[0];
        const body = token.slice(1).toLowerCase();

        if (prefix === '!' && token.length > 1) {
            const engine = bangs.resolve(body);
            if (engine) {
                if (!targets.includes(engine)) targets.push(engine);
            } else {
                words.push(token);
                invalidBang = token;
            }
        } else if (prefix === '@' && token.length > 1) {
            if (!performers.includes(body)) performers.push(body);
        } else if (prefix === '-' && token.length > 1) {
            exclusions.push(body);
        } else {
            words.push(token);
        }
    }

    return {
        raw,
        cleaned: words.join(' ').trim(),
        targets,
        exactPhrases: phrases,
        exclusions,
        performers,
        hasBang: targets.length > 0,
        invalidBang,
    };
}

/** Performer filters are single tokens, so names are compacted before matching. */
export function compactName(name: string): string {
    return name.toLowerCase().replace(/[^a-z0-9]/g, '');
}

/**
 * The term sent upstream: plain words, then the quoted phrases, then the
 * performer names. Exclusions are applied locally.
 */
export function buildUpstreamQuery(parsed: ParsedQuery): string {
    return [
        parsed.cleaned,
        ...parsed.exactPhrases.map(phrase => `"${phrase}"`),
        ...parsed.performers,
    ].filter(Boolean).join(' ').trim();
}
