// Search interfaces and types

import type { HttpClient } from '../transport/TransportProvider';
import type { SourceFailureKind } from '../../utils/errors';

export interface Result {
    id: string;
    title: string;
    url: string;
    thumbnail: string;
    previewUrl?: string;
    downloadUrl?: string;
    duration?: string;
    durationSeconds?: number;
    views?: string;
    viewsCount?: number;
    rating?: number;
    quality?: string;
    published?: string;
    tags: string[];
    performer?: string;
    source: string;
    sourceDisplay: string;
}

/** Adapter output before validation and ID assignment. */
export type RawResult = Omit<Partial<Result>, 'id' | 'source' | 'sourceDisplay' | 'tags'> & {
    tags?: string[];
};

export type ExtractionMethod = 'api' | 'json_extraction' | 'html';

export type SourceFeature = 'pagination' | 'sorting' | 'filtering' | 'thumbnail_preview';

export interface Capabilities {
    preview: boolean;
    download: boolean;
    duration: boolean;
    views: boolean;
    rating: boolean;
    quality: boolean;
    uploadDate: boolean;
}

export interface SourceDescriptor {
    name: string;
    displayName: string;
    baseUrl: string;
    tier: number;
    capabilities: Capabilities;
    previewSource?: string;
    extraction: ExtractionMethod;
    features: SourceFeature[];
}

export interface SourceContext {
    signal: AbortSignal;
    client: HttpClient;
    userAgent: string;
    maxAttempts: number;
    filterPremium: boolean;
}

export interface ISearchSource {
    readonly name: string;
    readonly displayName: string;
    readonly baseUrl: string;
    readonly tier: number;
    search(query: string, page: number, context: SourceContext): Promise<Result[]>;
    supportsFeature(feature: SourceFeature): boolean;
    capabilities(): SourceDescriptor;
}

export interface SourceFailure {
    source: string;
    error: string;
    kind: SourceFailureKind;
}

export interface SearchSourceResult {
    source: string;
    sourceDisplay: string;
    results: Result[];
    error?: SourceFailure;
    latencyMs: number;
}

export interface BangMeta {
    hasBang: boolean;
    engines: string[];
    invalidBang?: string;
}

export interface SearchFilters {
    exactPhrases: string[];
    exclusions: string[];
    performers: string[];
}

export interface SearchRequest {
    query: string;
    page?: number;
    engines?: string[];
    dedupe?: boolean;
    signal?: AbortSignal;
}

export interface SearchSummary {
    query: string;
    searchQuery: string;
    page: number;
    sources: string[];
    successfulSources: string[];
    failedSources: SourceFailure[];
    totalResults: number;
    totalLatencyMs: number;
    bang: BangMeta;
    filters: SearchFilters;
    dedupe: boolean;
    anonymized: boolean;
    relatedSearches: string[];
}

export interface RelatedSearchProvider {
    relatedSearches(query: string, limit: number): string[];
}

export interface SearchEnvelope extends SearchSummary {
    results: Result[];
}

export type StreamEvent =
    | { event: 'result'; data: SearchSourceResult }
    | { event: 'done'; data: SearchSummary };
