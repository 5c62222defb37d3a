// Result Aggregator - local filters, cross-source dedupe and merge

import type { Result, SearchFilters, SearchSourceResult } from './interfaces';
import { compactName } from '../query/bangParser';
import { normalizeResultUrl } from './results';

export interface FilterOptions extends SearchFilters {
    minDurationSeconds: number;
}

export class ResultAggregator {

    /**
     * Applies the directives the upstream search can't express: exact phrases
     * in the title, excluded words in title or tags, performer filters and a
     * minimum duration (items without a known duration pass).
     */
    applyFilters(results: Result[], options: FilterOptions): Result[] {
        const phrases = options.exactPhrases.map(phrase => phrase.toLowerCase());
        const exclusions = options.exclusions.map(term => term.toLowerCase());
        const performers = options.performers.map(compactName).filter(Boolean);

        return results.filter(result => {
            const title = result.title.toLowerCase();

            if (phrases.some(phrase => !title.includes(phrase))) return false;

            if (exclusions.some(term => title.includes(term) || result.tags.some(tag => tag.includes(term)))) {
                return false;
            }

            if (performers.length > 0) {
                const performer = compactName(result.performer ?? '');
                const compactTitle = compactName(result.title);
                const matches = performers.some(name => performer.includes(name) || compactTitle.includes(name));
                if (!matches) return false;
            }

            if (options.minDurationSeconds > 0 && result.durationSeconds !== undefined) {
                return result.durationSeconds >= options.minDurationSeconds;
            }
            return true;
        });
    }

    /** Concatenates batches in the order given, optionally deduplicating by URL. */
    mergeResults(sourceResults: SearchSourceResult[], dedupe = false): Result[] {
        const allResults: Result[] = [];
        for (const source of sourceResults) {
            allResults.push(...source.results);
        }
        return dedupe ? this.deduplicateByUrl(allResults) : allResults;
    }

    /** Keeps the first occurrence of each normalized URL. */
    deduplicateByUrl(results: Result[], seen: Set<string> = new Set()): Result[] {
        const unique: Result[] = [];
        for (const result of results) {
            const key = this.normalizeUrl(result.url);
            if (!seen.has(key)) {
                seen.add(key);
                unique.push(result);
            }
        }
        return unique;
    }

    /**
     * Dedupe key: the canonical URL without its scheme or a leading `www.`.
     * Path and query stay case-sensitive.
     */
    normalizeUrl(url: string): string {
        return normalizeResultUrl(url)
            .replace(/^[a-z][a-z0-9+.-]*:\/\//, '')
            .replace(/^www\./, '');
    }
}
