// Suggestion Service - bang, performer and term autocomplete plus related searches over immutable tables

import { z } from 'zod';
import { loadDataFile } from '../../config/dataFiles';
import type { BangTable } from '../query/bangs';
import { compactName } from '../query/bangParser';
import { rankByWords, rankCandidates } from './SuggestionRanker';
import { Taxonomy, loadTaxonomy, type TaxonomyCategory } from './Taxonomy';

export const MIN_BANG_INPUT = 1;
export const MIN_TEXT_INPUT = 2;
export const MIN_RELATED_WORD = 3;

const QUALITY_MODIFIERS = ['hd', '4k', 'amateur', 'homemade', 'pov'];

export interface BangSuggestion {
    bang: string;
    engine: string;
    displayName: string;
    shortCode: string;
}

export type SuggestionKind = 'bang' | 'performer' | 'term' | 'popular';

export interface Suggestion {
    kind: SuggestionKind;
    value: string;
    /** Full query text to put in the search box when the suggestion is picked. */
    replace: string;
    displayName?: string;
    shortCode?: string;
}

export interface SuggestionTables {
    terms: readonly string[];
    popular: readonly string[];
    performers: readonly string[];
    taxonomy: readonly TaxonomyCategory[];
}

const termsFileSchema = z.object({
    popular: z.array(z.string().min(1)),
    terms: z.array(z.string().min(1)),
});

const performersFileSchema = z.array(z.string().min(1));

export function loadSuggestionTables(): SuggestionTables {
    const { terms, popular } = loadDataFile('terms.json', termsFileSchema);
    return {
        terms,
        popular,
        performers: loadDataFile('performers.json', performersFileSchema),
        taxonomy: loadTaxonomy(),
    };
}

/** Case-insensitive union keeping first spellings and order. */
export function mergeTerms(base: readonly string[], extra: readonly string[]): readonly string[] {
    const seen = new Set<string>();
    const merged: string[] = [];
    for (const term of [...base, ...extra]) {
        const value = term.trim();
        const key = value.toLowerCase();
        if (value && !seen.has(key)) {
            seen.add(key);
            merged.push(value);
        }
    }
    return Object.freeze(merged);
}

export class SuggestionService {
    private terms: readonly string[];
    private readonly taxonomy: Taxonomy;

    constructor(
        private readonly bangs: BangTable,
        private readonly tables: SuggestionTables,
        customTerms: readonly string[] = [],
    ) {
        this.terms = mergeTerms(tables.terms, customTerms);
        this.taxonomy = new Taxonomy(tables.taxonomy);
    }

    /** Swaps in a freshly merged term list; requests holding the old one are unaffected. */
    setCustomTerms(customTerms: readonly string[]): void {
        this.terms = mergeTerms(this.tables.terms, customTerms);
    }

    termCount(): number {
        return this.terms.length;
    }

    suggestBangs(prefix: string, limit: number): BangSuggestion[] {
        const input = prefix.trim().toLowerCase();
        if (input.length < MIN_BANG_INPUT) return [];

        return rankCandidates(this.bangs.all(), input, entry => [...entry.aliases, entry.engine], limit)
            .map(({ item }) => ({
                bang: `!${item.engine}`,
                engine: item.engine,
                displayName: item.displayName,
                shortCode: `!${this.bangs.shortCode(item.engine)}`,
            }));
    }

    suggestPerformers(prefix: string, limit: number): string[] {
        const input = prefix.trim();
        if (input.length < MIN_TEXT_INPUT) return [];
        return rankCandidates(this.tables.performers, input, name => [name], limit).map(({ item }) => item);
    }

    suggestTerms(prefix: string, limit: number): string[] {
        const input = prefix.trim();
        if (input.length < MIN_TEXT_INPUT) return [];
        return rankCandidates(this.terms, input, term => [term], limit).map(({ item }) => item);
    }

    popular(limit: number): string[] {
        return this.tables.popular.slice(0, Math.max(0, limit));
    }

    /**
     * Completes the last token of the input: `!x` against bangs, `@x`
     * against performers, anything else against the term table.
     */
    autocomplete(input: string, limit: number): Suggestion[] {
        if (!input.trim()) {
            return this.popular(limit).map((term): Suggestion => ({ kind: 'popular', value: term, replace: term }));
        }
        if (/\s$/.test(input)) return [];

        const tokens = input.trimStart().split(/\s+/);
        const last = tokens.pop() ?? '';
        const head = tokens.length > 0 ? `${tokens.join(' ')} ` : '';

        if (last.startsWith('!')) {
            return this.suggestBangs(last.slice(1), limit).map((suggestion): Suggestion => ({
                kind: 'bang',
                value: suggestion.bang,
                replace: `${head}${suggestion.bang} `,
                displayName: suggestion.displayName,
                shortCode: suggestion.shortCode,
            }));
        }

        if (last.startsWith('@')) {
            return this.suggestPerformers(last.slice(1), limit).map((name): Suggestion => ({
                kind: 'performer',
                value: name,
                replace: `${head}@${compactName(name)} `,
            }));
        }

        return this.suggestTerms(last, limit).map((term): Suggestion => ({
            kind: 'term',
            value: term,
            replace: `${head}${term}`,
        }));
    }

    /**
     * Searches to offer next to a result set. Taxonomy variations of the query
     * fill at most half the list; terms sharing words with the query fill the rest.
     */
    relatedSearches(query: string, limit: number): string[] {
        const words = query.replace(/"/g, ' ').trim().toLowerCase().split(/\s+/).filter(Boolean);
        if (words.length === 0 || limit <= 0) return [];

        const variations = this.queryVariations(words, Math.floor(limit / 2));
        const seen = new Set([words.join(' '), ...variations]);
        const candidates = this.terms.filter(term => !seen.has(term.toLowerCase()));
        const significant = words.filter(word => word.length >= MIN_RELATED_WORD);

        const matches = rankByWords(candidates, significant, limit - variations.length).map(({ item }) => item);
        return [...variations, ...matches];
    }

    private queryVariations(words: readonly string[], max: number): string[] {
        if (max <= 0) return [];

        const phrase = words.join(' ');
        const seen = new Set([phrase]);
        const variations: string[] = [];
        const add = (term: string) => {
            const value = term.trim();
            if (value && !seen.has(value)) {
                seen.add(value);
                variations.push(value);
            }
        };

        for (const word of words) {
            if (word.length >= MIN_RELATED_WORD) add(word);
        }

        for (const word of words) {
            for (const related of this.taxonomy.related(word)) {
                add(related);
                for (const other of words) {
                    if (other !== word && other !== related) {
                        add(`${related} ${other}`);
                        add(`${other} ${related}`);
                    }
                }
            }
        }

        // A modifier already offered on its own is not appended
        for (const modifier of QUALITY_MODIFIERS) {
            if (!seen.has(modifier)) add(`${phrase} ${modifier}`);
        }

        words.forEach((word, index) => {
            for (const synonym of this.taxonomy.synonyms(word)) {
                if (synonym !== word) {
                    add(words.map((current, position) => (position === index ? synonym : current)).join(' '));
                }
            }
        });

        if (words.length >= 3) {
            for (let i = 0; i < words.length - 1; i++) {
                for (let j = i + 1; j < words.length; j++) {
                    add(`${words[i]} ${words[j]}`);
                }
            }
        }

        return variations.slice(0, max);
    }
}
