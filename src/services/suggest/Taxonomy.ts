// Taxonomy - synonym and related-term lookup for related searches

import { z } from 'zod';
import { loadDataFile } from '../../config/dataFiles';

export interface TaxonomyCategory {
    name: string;
    synonyms: readonly string[];
    related: readonly string[];
}

const taxonomyFileSchema = z.array(z.object({
    name: z.string().min(1),
    synonyms: z.array(z.string().min(1)),
    related: z.array(z.string().min(1)),
}));

export function loadTaxonomy(): TaxonomyCategory[] {
    return loadDataFile('taxonomy.json', taxonomyFileSchema);
}

/** Maps a category name and each of its synonyms back to the category; the first category listing a term owns it. */
export class Taxonomy {
    private readonly lookup = new Map<string, TaxonomyCategory>();

    constructor(categories: readonly TaxonomyCategory[]) {
        for (const category of categories) {
            for (const term of [category.name, ...category.synonyms]) {
                const key = term.toLowerCase();
                if (!this.lookup.has(key)) {
                    this.lookup.set(key, category);
                }
            }
        }
    }

    /** Synonyms of the term's category, or just the term when it is unknown. */
    synonyms(term: string): readonly string[] {
        const key = term.trim().toLowerCase();
        return this.lookup.get(key)?.synonyms ?? [key];
    }

    related(term: string): readonly string[] {
        return this.lookup.get(term.trim().toLowerCase())?.related ?? [];
    }
}
