// API routes - search, bangs, autocomplete and engine listing

import { Router, type Request, type Response } from 'express';
import type { SearchOrchestrator } from '../services/search/SearchOrchestrator';
import type { SuggestionService } from '../services/suggest/SuggestionService';
import type { BangTable } from '../services/query/bangs';
import type { ConfigSnapshot } from '../config/searchConfig';
import { SEARCH_CONFIG } from '../config/searchConfig';
import { createThumbnailProxy, type ThumbnailProxy } from '../services/thumbnails/ThumbnailProxy';
import { NotFoundError, ValidationError } from '../utils/errors';
import Logger from '../utils/logger';
import {
    formatBangsText,
    formatEnginesText,
    formatSearchText,
    formatSseFrame,
    presentBatch,
    presentEnvelope,
    type ResponseFormat,
} from './presenters';

export interface ApiServices {
    orchestrator: SearchOrchestrator;
    suggestions: SuggestionService;
    bangs: BangTable;
    config: { current(): ConfigSnapshot };
    /** Overrides the proxy derived from THUMBNAIL_PROXY_PREFIX. */
    thumbnails?: ThumbnailProxy;
}

type QueryValue = Request['query'][string];

function singleParam(value: QueryValue): string | undefined {
    if (typeof value === 'string') return value;
    if (Array.isArray(value)) {
        const first: unknown = value[0];
        if (typeof first === 'string') return first;
    }
    return undefined;
}

function listParam(value: QueryValue): string[] {
    const raw: unknown[] = Array.isArray(value) ? value : [value];
    return raw
        .filter((item): item is string => typeof item === 'string')
        .flatMap(item => item.split(','))
        .map(item => item.trim())
        .filter(Boolean);
}

export function parsePage(value: QueryValue): number {
    const raw = singleParam(value);
    if (raw === undefined || raw === '') return 1;
    if (!/^\d+$/.test(raw) || Number(raw) < 1) {
        throw new ValidationError(`Invalid page: ${raw}`, 'INVALID_PAGE');
    }
    return Number(raw);
}

export function parseLimit(value: QueryValue): number {
    const raw = singleParam(value);
    if (raw === undefined || raw === '') return SEARCH_CONFIG.defaultSuggestionLimit;
    const limit = Number(raw);
    if (!Number.isInteger(limit) || limit < 1 || limit > SEARCH_CONFIG.maxSuggestionLimit) {
        throw new ValidationError(`Limit must be between 1 and ${SEARCH_CONFIG.maxSuggestionLimit}`, 'INVALID_LIMIT');
    }
    return limit;
}

function parseFlag(value: QueryValue): boolean {
    const raw = singleParam(value)?.toLowerCase();
    return raw === 'true' || raw === '1' || raw === 'yes';
}

/** An explicit `format` parameter wins over the Accept header. */
export function negotiateFormat(req: Request): ResponseFormat {
    const format = singleParam(req.query.format)?.toLowerCase();
    if (format === 'json' || format === 'text' || format === 'stream') return format;

    const accepted = req.accepts(['application/json', 'text/event-stream', 'text/plain']);
    if (accepted === 'text/event-stream') return 'stream';
    if (accepted === 'text/plain') return 'text';
    return 'json';
}

export function createApiRouter(services: ApiServices): Router {
    const router = Router();
    const { orchestrator, suggestions, bangs, config } = services;
    const thumbnails = () => services.thumbnails ?? createThumbnailProxy(config.current().settings.thumbnailProxyPrefix);

    router.get('/search', async (req, res, next) => {
        try {
            const query = singleParam(req.query.q);
            if (query === undefined || !query.trim()) {
                throw new ValidationError("Missing required parameter 'q'", 'MISSING_QUERY');
            }

            const format = negotiateFormat(req);
            const controller = new AbortController();
            res.on('close', () => {
                if (!res.writableEnded) controller.abort();
            });

            const request = {
                query,
                page: parsePage(req.query.page),
                engines: listParam(req.query.engines),
                dedupe: parseFlag(req.query.dedupe),
                signal: controller.signal,
            };

            if (format === 'stream') {
                await streamSearch(res, orchestrator.stream(request), thumbnails());
                return;
            }

            const envelope = presentEnvelope(await orchestrator.search(request), thumbnails());
            if (format === 'text') {
                res.type('text/plain').send(formatSearchText(envelope));
            } else {
                res.json(envelope);
            }
        } catch (err) {
            next(err);
        }
    });

    // Full table, or ranked suggestions when a prefix is given
    router.get('/bangs', (req, res, next) => {
        try {
            const prefix = singleParam(req.query.q);
            if (prefix !== undefined) {
                const limit = parseLimit(req.query.limit);
                res.json({ query: prefix, bangs: suggestions.suggestBangs(prefix.replace(/^!/, ''), limit) });
                return;
            }

            const listing = bangs.list();
            if (negotiateFormat(req) === 'text') {
                res.type('text/plain').send(formatBangsText(listing));
            } else {
                res.json({ bangs: listing, total: listing.length });
            }
        } catch (err) {
            next(err);
        }
    });

    router.get('/autocomplete', (req, res, next) => {
        try {
            const input = singleParam(req.query.q) ?? '';
            const limit = parseLimit(req.query.limit);
            res.json({ query: input, suggestions: suggestions.autocomplete(input, limit) });
        } catch (err) {
            next(err);
        }
    });

    router.get('/engines', (req, res) => {
        const engines = orchestrator.getSourceStatus();
        if (negotiateFormat(req) === 'text') {
            res.type('text/plain').send(formatEnginesText(engines));
            return;
        }
        res.json({
            engines,
            total: engines.length,
            enabled: engines.filter(engine => engine.enabled).length,
        });
    });

    router.get('/engines/:name', (req, res, next) => {
        const engine = orchestrator.describeSource(req.params.name);
        if (!engine) {
            next(new NotFoundError(`Engine not found: ${req.params.name}`, 'ENGINE_NOT_FOUND'));
            return;
        }
        res.json(engine);
    });

    return router;
}

async function streamSearch(
    res: Response,
    events: ReturnType<SearchOrchestrator['stream']>,
    thumbnails: ThumbnailProxy,
): Promise<void> {
    res.status(200);
    res.set({
        'Content-Type': 'text/event-stream',
        'Cache-Control': 'no-cache',
        'Connection': 'keep-alive',
        'X-Accel-Buffering': 'no',
    });
    res.flushHeaders();

    for await (const event of events) {
        if (res.writableEnded || res.destroyed) {
            Logger.debug('Search stream closed by client');
            break;
        }
        const data = event.event === 'result' ? presentBatch(event.data, thumbnails) : event.data;
        res.write(formatSseFrame(event.event, data));
    }
    res.end();
}
