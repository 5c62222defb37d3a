import { expect } from 'chai';

import { ResultAggregator } from '../../src/services/search/ResultAggregator';
import { createResult } from '../../src/services/search/results';
import type { RawResult, Result, SearchSourceResult } from '../../src/services/search/interfaces';

function make(raw: RawResult, source = 'alpha'): Result {
    const result = createResult(raw, { name: source, displayName: source.toUpperCase() });
    if (!result) throw new Error('fixture rejected');
    return result;
}

function batch(source: string, results: Result[]): SearchSourceResult {
    return { source, sourceDisplay: source.toUpperCase(), results, latencyMs: 1 };
}

describe('search/ResultAggregator', () => {
    const aggregator = new ResultAggregator();
    const noFilters = { exactPhrases: [], exclusions: [], performers: [], minDurationSeconds: 0 };

    const nap = make({
        title: 'Big Cat Nap',
        url: 'https://a.test/1',
        tags: ['outdoor'],
        duration: '10:00',
        durationSeconds: 600,
        performer: 'Jane Doeling',
    });
    const park = make({ title: 'Dog Park', url: 'https://a.test/2', duration: '10:00', durationSeconds: 600 });
    const jump = make({ title: 'big cat jump', url: 'https://a.test/3', tags: ['dog'], duration: '1:00', durationSeconds: 60 });
    const other = make({ title: 'Another big cat', url: 'https://a.test/4' });
    const beach = make({ title: 'Jane Doeling at the beach', url: 'https://a.test/5' });

    it('requires phrases, rejects exclusions and applies the minimum duration', () => {
        const filtered = aggregator.applyFilters([nap, park, jump, other], {
            ...noFilters,
            exactPhrases: ['Big Cat'],
            exclusions: ['dog'],
            minDurationSeconds: 120,
        });

        expect(filtered).to.deep.equal([nap, other]);
    });

    it('matches performers against the uploader or the title', () => {
        const filtered = aggregator.applyFilters([nap, other, beach], { ...noFilters, performers: ['janedoeling'] });
        expect(filtered).to.deep.equal([nap, beach]);
    });

    it('passes everything through without filters', () => {
        expect(aggregator.applyFilters([nap, park], noFilters)).to.deep.equal([nap, park]);
    });

    it('merges batches in the given order and deduplicates only on request', () => {
        const repost = make({ title: 'Big Cat Nap', url: 'https://www.a.test/1/' }, 'beta');
        const batches = [batch('alpha', [nap, park]), batch('beta', [repost, jump])];

        expect(aggregator.mergeResults(batches)).to.deep.equal([nap, park, repost, jump]);
        expect(aggregator.mergeResults(batches, true)).to.deep.equal([nap, park, jump]);
    });

    it('shares a seen set across calls', () => {
        const seen = new Set<string>();
        expect(aggregator.deduplicateByUrl([nap], seen)).to.deep.equal([nap]);
        expect(aggregator.deduplicateByUrl([make({ title: 'Again', url: 'https://a.test/1' }, 'beta')], seen))
            .to.deep.equal([]);
    });

    it('ignores scheme, www, host case and trailing slashes when comparing URLs', () => {
        expect(aggregator.normalizeUrl('https://www.A.test/V/1/?x=1')).to.equal('a.test/V/1?x=1');
        expect(aggregator.normalizeUrl('http://a.test/V/1')).to.equal('a.test/V/1');
    });

    it('keeps results whose IDs differ only by case', () => {
        const upper = make({ title: 'Upper', url: 'https://x.test/v?id=AbC' });
        const lower = make({ title: 'Lower', url: 'https://x.test/v?id=abc' }, 'beta');

        expect(aggregator.deduplicateByUrl([upper, lower])).to.deep.equal([upper, lower]);
    });
});
