// Generic HTML Source - any engine described by a selector/URL template entry

import type { ISearchSource, Result, SourceContext, SourceDescriptor, SourceFeature } from '../interfaces';
import type { EngineDefinition } from '../../../config/engines';
import { extractItems } from '../../extraction/genericExtractor';
import { encodeQuery, fetchText, fillTemplate, finalizeResults } from './shared';

export class GenericHtmlSource implements ISearchSource {
    readonly name: string;
    readonly displayName: string;
    readonly baseUrl: string;
    readonly tier: number;
    private readonly features: SourceFeature[];

    constructor(private readonly definition: EngineDefinition) {
        this.name = definition.name;
        this.displayName = definition.displayName;
        this.baseUrl = definition.baseUrl.replace(/\/+$/, '');
        this.tier = definition.tier;
        this.features = definition.searchPath.includes('{page}') ? ['pagination'] : [];
    }

    buildSearchUrl(query: string, page: number): string {
        const path = fillTemplate(this.definition.searchPath, {
            query: encodeQuery(query, this.definition.querySeparator),
            page: String(page),
        });
        return `${this.baseUrl}${path}`;
    }

    async search(query: string, page: number, context: SourceContext): Promise<Result[]> {
        const html = await fetchText(this.name, this.buildSearchUrl(query, page), context);
        return finalizeResults(extractItems(html, this.definition.itemSelectors, this.baseUrl), this);
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
            capabilities: { ...this.definition.capabilities },
            extraction: 'html',
            features: [...this.features],
        };
    }
}
