// Shared fixtures: a small bang table, stub HTTP clients and in-memory sources

import { BangTable } from '../src/services/query/bangs';
import type { HttpClient, HttpResponse } from '../src/services/transport/TransportProvider';
import type {
    ISearchSource,
    Result,
    SourceContext,
    SourceDescriptor,
    SourceFeature,
} from '../src/services/search/interfaces';
import type { ConfigSnapshot, SearchSettings } from '../src/config/searchConfig';
import { createResult } from '../src/services/search/results';
import { NO_CAPABILITIES } from '../src/services/search/sources/shared';

export function createBangTable(): BangTable {
    return new BangTable([
        { engine: 'pornhub', displayName: 'PornHub', aliases: ['ph'] },
        { engine: 'redtube', displayName: 'RedTube', aliases: ['rt'] },
        { engine: 'porntube', displayName: 'PornTube', aliases: ['pt'] },
        { engine: 'xvideos', displayName: 'XVideos', aliases: ['xv'] },
    ]);
}

export function textResponse(body: string, status = 200, statusText = 'OK'): HttpResponse {
    return {
        ok: status >= 200 && status < 300,
        status,
        statusText,
        text: async () => body,
    };
}

export interface RecordedRequest {
    url: string;
    headers: Record<string, string>;
}

/** Replays the given responses in order and records every request. */
export function createStubClient(responses: Array<HttpResponse | Error>, recorder: RecordedRequest[] = []): HttpClient {
    let index = 0;
    return async (url, init) => {
        recorder.push({ url, headers: init.headers });
        const next = responses[Math.min(index, responses.length - 1)];
        index += 1;
        if (next instanceof Error) {
            throw next;
        }
        return next;
    };
}

export function createContext(client: HttpClient, overrides: Partial<SourceContext> = {}): SourceContext {
    return {
        signal: new AbortController().signal,
        client,
        userAgent: 'test-agent',
        maxAttempts: 1,
        filterPremium: true,
        ...overrides,
    };
}

export function createSettings(overrides: Partial<SearchSettings> = {}): SearchSettings {
    return {
        port: 0,
        env: 'test',
        enabledEngines: [],
        sourceTimeoutMs: 200,
        requestTimeoutMs: 1000,
        maxAttempts: 1,
        minDurationSeconds: 0,
        filterPremium: true,
        anonymize: false,
        userAgent: 'test-agent',
        customTerms: [],
        rateLimit: { windowMs: 60_000, limit: 1000 },
        ...overrides,
    };
}

export function createSnapshot(names: readonly string[], overrides: Partial<SearchSettings> = {}): ConfigSnapshot {
    return { settings: createSettings(overrides), enabledSources: new Set(names) };
}

export interface FakeSourceOptions {
    delayMs?: number;
    titles?: string[];
    error?: Error;
    /** Ignore the abort signal, to exercise the coordinator's own cut-off. */
    ignoreAbort?: boolean;
    /** Host for result URLs; defaults to `<name>.test`. */
    host?: string;
}

/** An in-memory source that answers after a delay with one result per title. */
export class FakeSource implements ISearchSource {
    readonly baseUrl: string;
    readonly tier = 1;
    readonly displayName: string;
    readonly calls: Array<{ query: string; page: number }> = [];
    readonly signals: AbortSignal[] = [];

    constructor(readonly name: string, private readonly options: FakeSourceOptions = {}) {
        this.displayName = name.toUpperCase();
        this.baseUrl = `https://${options.host ?? `${name}.test`}`;
    }

    async search(query: string, page: number, context: SourceContext): Promise<Result[]> {
        this.calls.push({ query, page });
        this.signals.push(context.signal);
        await wait(this.options.delayMs ?? 0, this.options.ignoreAbort ? undefined : context.signal);
        if (this.options.error) {
            throw this.options.error;
        }
        return (this.options.titles ?? ['clip']).flatMap(title => {
            const result = createResult({
                title,
                url: `${this.baseUrl}/video/${title.replace(/\s+/g, '-')}`,
                durationSeconds: 300,
                duration: '5:00',
            }, this);
            return result ? [result] : [];
        });
    }

    supportsFeature(feature: SourceFeature): boolean {
        return feature === 'pagination';
    }

    capabilities(): SourceDescriptor {
        return {
            name: this.name,
            displayName: this.displayName,
            baseUrl: this.baseUrl,
            tier: this.tier,
            capabilities: { ...NO_CAPABILITIES, duration: true },
            extraction: 'api',
            features: ['pagination'],
        };
    }
}

export function wait(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(signal.reason);
            return;
        }
        const timer = setTimeout(resolve, ms);
        signal?.addEventListener('abort', () => {
            clearTimeout(timer);
            reject(signal.reason);
        }, { once: true });
    });
}

/** Resolves with the rejection reason, failing when the promise fulfils. */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
    try {
        await promise;
    } catch (error) {
        return error;
    }
    throw new Error('expected the promise to reject');
}
