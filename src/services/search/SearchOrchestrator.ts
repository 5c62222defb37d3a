// Search Orchestrator - Main coordinator for fan-out searches across sources

import { ResultAggregator } from './ResultAggregator';
import type { SourceRegistry } from './SourceRegistry';
import type {
    ISearchSource,
    RelatedSearchProvider,
    Result,
    SearchEnvelope,
    SearchFilters,
    SearchRequest,
    SearchSourceResult,
    SearchSummary,
    SourceContext,
    SourceDescriptor,
    SourceFailure,
    StreamEvent,
} from './interfaces';
import { SEARCH_CONFIG, type ConfigSnapshot, type SearchSettings } from '../../config/searchConfig';
import type { HttpClient, TransportProvider } from '../transport/TransportProvider';
import { buildUpstreamQuery, parseQuery, type BangResolver, type ParsedQuery } from '../query/bangParser';
import { createAbortScope, raceAbort } from '../../utils/abort';
import { ConfigurationError, SourceFetchError, ValidationError, errorMessage } from '../../utils/errors';
import Logger from '../../utils/logger';

export interface OrchestratorDeps {
    registry: SourceRegistry;
    bangs: BangResolver;
    config: { current(): ConfigSnapshot };
    transport: TransportProvider;
    aggregator?: ResultAggregator;
    /** Fills `relatedSearches` in every summary; left empty without one. */
    related?: RelatedSearchProvider;
}

export interface PreparedSearch {
    parsed: ParsedQuery;
    searchQuery: string;
    page: number;
    sources: ISearchSource[];
    filters: SearchFilters;
    dedupe: boolean;
    settings: SearchSettings;
    client: HttpClient;
    anonymized: boolean;
}

export interface SourceStatus extends SourceDescriptor {
    enabled: boolean;
}

export class SearchOrchestrator {
    private readonly registry: SourceRegistry;
    private readonly bangs: BangResolver;
    private readonly config: { current(): ConfigSnapshot };
    private readonly transport: TransportProvider;
    private readonly aggregator: ResultAggregator;
    private readonly related?: RelatedSearchProvider;

    constructor(deps: OrchestratorDeps) {
        this.registry = deps.registry;
        this.bangs = deps.bangs;
        this.config = deps.config;
        this.transport = deps.transport;
        this.aggregator = deps.aggregator ?? new ResultAggregator();
        this.related = deps.related;
    }

    /**
     * Validates the request, parses bangs and resolves the effective source
     * set. Bangs take priority over an explicit `engines` list.
     */
    prepare(request: SearchRequest): PreparedSearch {
        const raw = request.query.trim();
        if (!raw) {
            throw new ValidationError('Query must not be empty', 'EMPTY_QUERY');
        }

        const page = request.page ?? 1;
        if (!Number.isInteger(page) || page < 1) {
            throw new ValidationError('Page must be an integer greater than or equal to 1', 'INVALID_PAGE');
        }

        const parsed = parseQuery(raw, this.bangs);
        const searchQuery = buildUpstreamQuery(parsed);
        if (!searchQuery) {
            throw new ValidationError('Query has no searchable terms after removing directives', 'EMPTY_QUERY');
        }

        const snapshot = this.config.current();
        const targets = parsed.hasBang ? parsed.targets : this.validateEngines(request.engines ?? []);
        const candidates = targets.length > 0
            ? targets.flatMap(name => this.registry.get(name) ?? [])
            : this.registry.all();
        const sources = candidates.filter(source => snapshot.enabledSources.has(source.name));

        if (sources.length === 0) {
            throw new ConfigurationError(
                targets.length > 0
                    ? `None of the requested engines are enabled: ${targets.join(', ')}`
                    : 'No search engines are enabled',
                'NO_ENGINES',
            );
        }

        return {
            parsed,
            searchQuery,
            page,
            sources,
            filters: {
                exactPhrases: parsed.exactPhrases,
                exclusions: parsed.exclusions,
                performers: parsed.performers,
            },
            dedupe: request.dedupe ?? false,
            settings: snapshot.settings,
            client: this.transport.getClient(snapshot.settings.anonymize),
            anonymized: this.transport.isAnonymized(),
        };
    }

    /**
     * Buffered mode - waits for every source (or the request deadline) and
     * returns one merged list in source-completion order.
     */
    async search(request: SearchRequest): Promise<SearchEnvelope> {
        const prepared = this.prepare(request);
        const startTime = Date.now();
        const deadline = this.createDeadline(prepared.settings, request.signal);

        Logger.info(`🔍 Starting search: "${prepared.searchQuery}" (page ${prepared.page}, ${prepared.sources.length} sources)`);

        // Coordinator-owned sink, appended in completion order
        const completed: SearchSourceResult[] = [];
        try {
            const tasks = prepared.sources.map(source =>
                this.runSource(source, prepared, deadline.signal).then(outcome => {
                    completed.push(outcome);
                }));
            await Promise.allSettled(tasks);
        } finally {
            deadline.dispose();
        }

        const results = this.aggregator.mergeResults(completed, prepared.dedupe);
        const summary = this.summarize(prepared, completed, results.length, startTime);
        Logger.info(`✅ Search completed in ${summary.totalLatencyMs}ms: ${results.length} results, ${summary.failedSources.length} failed sources`);

        return { ...summary, results };
    }

    /**
     * Streaming mode - validation errors are thrown synchronously; the
     * returned generator yields one `result` event per completed source and
     * a final `done` event. Stopping the generator early cancels the rest.
     */
    stream(request: SearchRequest): AsyncGenerator<StreamEvent, void, undefined> {
        const prepared = this.prepare(request);
        return this.streamPrepared(prepared, request.signal);
    }

    private async *streamPrepared(
        prepared: PreparedSearch,
        signal: AbortSignal | undefined,
    ): AsyncGenerator<StreamEvent, void, undefined> {
        const startTime = Date.now();
        const deadline = this.createDeadline(prepared.settings, signal);

        const pending = new Map<string, Promise<{ name: string; outcome: SearchSourceResult }>>();
        for (const source of prepared.sources) {
            pending.set(
                source.name,
                this.runSource(source, prepared, deadline.signal).then(outcome => ({ name: source.name, outcome })),
            );
        }

        const seen = new Set<string>();
        const completed: SearchSourceResult[] = [];
        let totalResults = 0;

        try {
            while (pending.size > 0) {
                const { name, outcome } = await Promise.race(pending.values());
                pending.delete(name);

                const batch = prepared.dedupe
                    ? { ...outcome, results: this.aggregator.deduplicateByUrl(outcome.results, seen) }
                    : outcome;
                completed.push(batch);
                totalResults += batch.results.length;

                yield { event: 'result', data: batch };
            }

            yield { event: 'done', data: this.summarize(prepared, completed, totalResults, startTime) };
        } finally {
            if (pending.size > 0) {
                deadline.abort(new SourceFetchError('search stream closed', { source: 'coordinator', kind: 'aborted' }));
            }
            deadline.dispose();
        }
    }

    /**
     * One isolated task per source. Never rejects: failures and timeouts
     * become an empty batch with a failure marker.
     */
    private async runSource(
        source: ISearchSource,
        prepared: PreparedSearch,
        parent: AbortSignal,
    ): Promise<SearchSourceResult> {
        const startTime = Date.now();
        const { settings } = prepared;
        const scope = createAbortScope(parent, settings.sourceTimeoutMs, () => new SourceFetchError(
            `${source.name} timed out after ${settings.sourceTimeoutMs}ms`,
            { source: source.name, kind: 'timeout' },
        ));

        const context: SourceContext = {
            signal: scope.signal,
            client: prepared.client,
            userAgent: settings.userAgent,
            maxAttempts: settings.maxAttempts,
            filterPremium: settings.filterPremium,
        };

        try {
            const work = Promise.resolve().then(() => source.search(prepared.searchQuery, prepared.page, context));
            const results: Result[] = await raceAbort(work, scope.signal);
            const filtered = this.aggregator.applyFilters(results, {
                ...prepared.filters,
                minDurationSeconds: settings.minDurationSeconds,
            });

            Logger.debug(`[${source.name}] ${filtered.length}/${results.length} results in ${Date.now() - startTime}ms`);
            return {
                source: source.name,
                sourceDisplay: source.displayName,
                results: filtered,
                latencyMs: Date.now() - startTime,
            };
        } catch (error) {
            const failure = toFailure(source.name, error);
            Logger.warn(`⚠️ [${source.name}] ${failure.kind}: ${failure.error}`);
            return {
                source: source.name,
                sourceDisplay: source.displayName,
                results: [],
                error: failure,
                latencyMs: Date.now() - startTime,
            };
        } finally {
            scope.dispose();
        }
    }

    private createDeadline(settings: SearchSettings, signal: AbortSignal | undefined) {
        return createAbortScope(signal, settings.requestTimeoutMs, () => new SourceFetchError(
            `request deadline of ${settings.requestTimeoutMs}ms exceeded`,
            { source: 'coordinator', kind: 'timeout' },
        ));
    }

    private validateEngines(engines: readonly string[]): string[] {
        const names: string[] = [];
        for (const engine of engines) {
            const name = engine.trim().toLowerCase();
            if (!name) continue;
            if (!this.registry.has(name)) {
                throw new ValidationError(`Unknown engine: ${name}`, 'UNKNOWN_ENGINE', { engine: name });
            }
            if (!names.includes(name)) names.push(name);
        }
        return names;
    }

    private summarize(
        prepared: PreparedSearch,
        completed: SearchSourceResult[],
        totalResults: number,
        startTime: number,
    ): SearchSummary {
        const successfulSources: string[] = [];
        const failedSources: SourceFailure[] = [];
        for (const outcome of completed) {
            if (outcome.error) {
                failedSources.push(outcome.error);
            } else {
                successfulSources.push(outcome.source);
            }
        }

        return {
            query: prepared.parsed.raw,
            searchQuery: prepared.searchQuery,
            page: prepared.page,
            sources: prepared.sources.map(source => source.name),
            successfulSources,
            failedSources,
            totalResults,
            totalLatencyMs: Date.now() - startTime,
            bang: {
                hasBang: prepared.parsed.hasBang,
                engines: prepared.parsed.targets,
                invalidBang: prepared.parsed.invalidBang,
            },
            filters: prepared.filters,
            dedupe: prepared.dedupe,
            anonymized: prepared.anonymized,
            relatedSearches: this.related?.relatedSearches(prepared.searchQuery, SEARCH_CONFIG.relatedSearchLimit) ?? [],
        };
    }

    /**
     * Get list of available sources and their status
     */
    getSourceStatus(): SourceStatus[] {
        const snapshot = this.config.current();
        return this.registry.all().map(source => ({
            ...source.capabilities(),
            enabled: snapshot.enabledSources.has(source.name),
        }));
    }

    describeSource(name: string): SourceStatus | undefined {
        const descriptor = this.registry.describe(name.toLowerCase());
        if (!descriptor) return undefined;
        return { ...descriptor, enabled: this.config.current().enabledSources.has(descriptor.name) };
    }
}

function toFailure(source: string, error: unknown): SourceFailure {
    if (error instanceof SourceFetchError) {
        return { source, error: error.message, kind: error.kind };
    }
    if (typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError') {
        return { source, error: 'search cancelled', kind: 'aborted' };
    }
    return { source, error: errorMessage(error), kind: 'decode' };
}
