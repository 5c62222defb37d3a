import { expect } from 'chai';
import { once } from 'events';
import type { Server } from 'http';

import { createApp } from '../../src/app';
import { SearchOrchestrator } from '../../src/services/search/SearchOrchestrator';
import { SourceRegistry } from '../../src/services/search/SourceRegistry';
import { BangTable } from '../../src/services/query/bangs';
import { SuggestionService } from '../../src/services/suggest/SuggestionService';
import type { TransportProvider } from '../../src/services/transport/TransportProvider';
import { FakeSource, createSnapshot, createStubClient, textResponse } from '../helpers';

describe('routes/api', () => {
    let server: Server;
    let baseUrl = '';

    before(async () => {
        const registry = new SourceRegistry([
            new FakeSource('alpha', { delayMs: 5, titles: ['a1'] }),
            new FakeSource('beta', { delayMs: 40, titles: ['b1'] }),
        ]);
        const bangs = new BangTable([
            { engine: 'alpha', displayName: 'ALPHA', aliases: ['al'] },
            { engine: 'beta', displayName: 'BETA', aliases: ['be'] },
        ]);
        const snapshot = createSnapshot(registry.names());
        const config = { current: () => snapshot };
        const transport: TransportProvider = {
            getClient: () => createStubClient([textResponse('')]),
            isAnonymized: () => false,
        };
        const suggestions = new SuggestionService(bangs, {
            terms: ['massage', 'oil massage', 'romantic'],
            popular: ['romantic'],
            performers: ['Jane Doeling'],
            taxonomy: [],
        });

        const app = createApp({
            orchestrator: new SearchOrchestrator({ registry, bangs, config, transport, related: suggestions }),
            suggestions,
            bangs,
            config,
        });
        server = app.listen(0, '127.0.0.1');
        await once(server, 'listening');

        const address = server.address();
        if (typeof address !== 'object' || address === null) {
            throw new Error('server did not bind to a port');
        }
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    after(async () => {
        server.closeAllConnections();
        server.close();
        await once(server, 'close');
    });

    const get = (path: string, accept?: string) =>
        fetch(`${baseUrl}${path}`, accept ? { headers: { Accept: accept } } : {});

    describe('GET /api/v1/search', () => {
        it('answers 400 when q is missing', async () => {
            const response = await get('/api/v1/search');

            expect(response.status).to.equal(400);
            expect(await response.json()).to.deep.equal({
                error: "Missing required parameter 'q'",
                code: 'MISSING_QUERY',
            });
        });

        it('answers plain-text clients with a plain-text error', async () => {
            const response = await get('/api/v1/search?q=%20', 'text/plain');

            expect(response.status).to.equal(400);
            expect(await response.text()).to.equal("error: Missing required parameter 'q'\n");
        });

        it('rejects an invalid page and an unknown engine', async () => {
            const page = await get('/api/v1/search?q=cats&page=abc');
            expect(page.status).to.equal(400);
            expect(await page.json()).to.have.property('code', 'INVALID_PAGE');

            const engine = await get('/api/v1/search?q=cats&engines=nope');
            expect(engine.status).to.equal(400);
            expect(await engine.json()).to.deep.equal({
                error: 'Unknown engine: nope',
                code: 'UNKNOWN_ENGINE',
                details: { engine: 'nope' },
            });
        });

        it('returns the buffered envelope as JSON by default', async () => {
            const response = await get('/api/v1/search?q=cats');
            const body: unknown = await response.json();

            expect(response.status).to.equal(200);
            expect(body).to.include({ query: 'cats', searchQuery: 'cats', page: 1, totalResults: 2 });
            expect(body).to.have.nested.property('results[0].title', 'a1');
            expect(body).to.have.nested.property('results[1].title', 'b1');
            expect(body).to.have.deep.property('relatedSearches', ['cats hd', 'cats 4k', 'cats amateur', 'cats homemade']);
        });

        it('narrows the search to the engines parameter', async () => {
            const response = await get('/api/v1/search?q=cats&engines=beta');
            const body: unknown = await response.json();

            expect(body).to.have.deep.property('sources', ['beta']);
        });

        it('streams one event per source followed by done', async () => {
            const response = await get('/api/v1/search?q=cats', 'text/event-stream');
            const frames = (await response.text()).split('\n\n').filter(Boolean);

            expect(response.headers.get('content-type')).to.equal('text/event-stream; charset=utf-8');
            expect(frames.map(frame => frame.split('\n')[0])).to.deep.equal([
                'event: result',
                'event: result',
                'event: done',
            ]);

            const first: unknown = JSON.parse(frames[0].split('\n')[1].slice('data: '.length));
            expect(first).to.include({ source: 'alpha' });
            const done: unknown = JSON.parse(frames[2].split('\n')[1].slice('data: '.length));
            expect(done).to.include({ totalResults: 2 });
            expect(done).to.have.deep.property('successfulSources', ['alpha', 'beta']);
            expect(done).to.have.deep.property('relatedSearches', ['cats hd', 'cats 4k', 'cats amateur', 'cats homemade']);
        });

        it('renders a plain-text listing', async () => {
            const response = await get('/api/v1/search?q=cats', 'text/plain');

            expect(response.headers.get('content-type')).to.equal('text/plain; charset=utf-8');
            expect(await response.text()).to.equal([
                'query: cats',
                'results: 2',
                '---',
                '1. a1',
                '   url: https://alpha.test/video/a1',
                '   source: ALPHA',
                '   duration: 5:00',
                '',
                '2. b1',
                '   url: https://beta.test/video/b1',
                '   source: BETA',
                '   duration: 5:00',
                '',
                'related: cats hd, cats 4k, cats amateur, cats homemade',
                '',
            ].join('\n'));
        });

        it('lets the format parameter override the Accept header', async () => {
            const response = await get('/api/v1/search?q=cats&format=json', 'text/plain');
            expect(response.headers.get('content-type')).to.equal('application/json; charset=utf-8');
        });
    });

    describe('GET /api/v1/bangs', () => {
        it('lists the whole table', async () => {
            const response = await get('/api/v1/bangs');

            expect(await response.json()).to.deep.equal({
                bangs: [
                    { bang: '!alpha', engine: 'alpha', displayName: 'ALPHA', shortCode: '!al', aliases: ['!al'] },
                    { bang: '!beta', engine: 'beta', displayName: 'BETA', shortCode: '!be', aliases: ['!be'] },
                ],
                total: 2,
            });
        });

        it('lists the table as text', async () => {
            const response = await get('/api/v1/bangs?format=text');
            expect(await response.text()).to.equal('bangs: 2\n---\n!alpha - ALPHA\n!beta - BETA\n');
        });

        it('ranks bangs for a prefix', async () => {
            const response = await get('/api/v1/bangs?q=!al');

            expect(await response.json()).to.deep.equal({
                query: '!al',
                bangs: [{ bang: '!alpha', engine: 'alpha', displayName: 'ALPHA', shortCode: '!al' }],
            });
        });
    });

    describe('GET /api/v1/autocomplete', () => {
        it('completes the last token', async () => {
            const response = await get('/api/v1/autocomplete?q=hot%20mas&limit=1');

            expect(await response.json()).to.deep.equal({
                query: 'hot mas',
                suggestions: [{ kind: 'term', value: 'massage', replace: 'hot massage' }],
            });
        });

        it('rejects an out of range limit', async () => {
            const response = await get('/api/v1/autocomplete?q=mas&limit=0');

            expect(response.status).to.equal(400);
            expect(await response.json()).to.have.property('code', 'INVALID_LIMIT');
        });
    });

    describe('GET /api/v1/engines', () => {
        it('lists engines with their enabled flag', async () => {
            const body: unknown = await (await get('/api/v1/engines')).json();

            expect(body).to.include({ total: 2, enabled: 2 });
            expect(body).to.have.nested.property('engines[0].name', 'alpha');
            expect(body).to.have.nested.property('engines[1].enabled', true);
        });

        it('lists engines as text', async () => {
            const response = await get('/api/v1/engines', 'text/plain');
            expect(await response.text()).to.equal(
                'engines: 2\n---\nalpha (ALPHA) - tier 1 [enabled]\nbeta (BETA) - tier 1 [enabled]\n',
            );
        });

        it('describes a single engine', async () => {
            const body: unknown = await (await get('/api/v1/engines/beta')).json();
            expect(body).to.include({ name: 'beta', displayName: 'BETA', extraction: 'api', enabled: true });
        });

        it('answers 404 for an unknown engine', async () => {
            const response = await get('/api/v1/engines/nope');

            expect(response.status).to.equal(404);
            expect(await response.json()).to.deep.equal({ error: 'Engine not found: nope', code: 'ENGINE_NOT_FOUND' });
        });
    });

    it('reports health', async () => {
        const body: unknown = await (await get('/api/health')).json();
        expect(body).to.include({ status: 'healthy', engines: 2, anonymized: false });
    });

    it('answers 404 for unknown API routes', async () => {
        const response = await get('/api/v2/search');

        expect(response.status).to.equal(404);
        expect(await response.json()).to.deep.equal({ error: 'Route not found: GET /v2/search', code: 'NOT_FOUND' });
    });
});
