import { expect } from 'chai';

import {
    createResult,
    generateResultId,
    normalizeResultUrl,
    normalizeTags,
} from '../../src/services/search/results';

describe('search/results', () => {
    it('normalizes scheme, host, trailing slash and fragment', () => {
        expect(normalizeResultUrl('HTTPS://Example.TEST/Path/#frag')).to.equal('https://example.test/Path');
        expect(normalizeResultUrl('https://example.test/a?b=1')).to.equal('https://example.test/a?b=1');
    });

    it('derives a stable 16 character id from the URL and source', () => {
        const id = generateResultId('https://example.test/path', 'alpha');

        expect(id).to.match(/^[0-9a-f]{16}$/);
        expect(generateResultId('https://EXAMPLE.test/path/#x', 'alpha')).to.equal(id);
        expect(generateResultId('https://example.test/path', 'beta')).to.not.equal(id);
    });

    it('treats URLs differing only in path or query case as different videos', () => {
        expect(generateResultId('https://a.test/video-AbCd12/', 'alpha'))
            .to.not.equal(generateResultId('https://a.test/video-abcd12/', 'alpha'));
        expect(normalizeResultUrl('https://a.test/v?id=AbC')).to.equal('https://a.test/v?id=AbC');
    });

    it('keeps tags of a sensible length, lowercased and unique', () => {
        expect(normalizeTags(['HD', 'hd', 'x', 'Beach ', 'y'.repeat(50)])).to.deep.equal(['hd', 'beach']);
    });

    it('builds a result and drops incomplete metadata', () => {
        const source = { name: 'alpha', displayName: 'Alpha' };
        const result = createResult({
            title: ' Clip ',
            url: 'https://a.test/v/1',
            tags: ['HD', 'hd'],
            duration: '5:00',
            viewsCount: 0,
            rating: 0,
        }, source);

        expect(result).to.deep.equal({
            id: generateResultId('https://a.test/v/1', 'alpha'),
            title: 'Clip',
            url: 'https://a.test/v/1',
            thumbnail: '',
            tags: ['hd'],
            source: 'alpha',
            sourceDisplay: 'Alpha',
        });
    });

    it('rejects items without a title or URL', () => {
        const source = { name: 'alpha', displayName: 'Alpha' };
        expect(createResult({ title: '   ', url: 'https://a.test/v/1' }, source)).to.equal(null);
        expect(createResult({ title: 'Clip' }, source)).to.equal(null);
    });
});
