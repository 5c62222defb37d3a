import { expect } from 'chai';

import { Taxonomy, loadTaxonomy } from '../../src/services/suggest/Taxonomy';

describe('suggest/Taxonomy', () => {
    const taxonomy = new Taxonomy([
        { name: 'massage', synonyms: ['massage', 'Rubdown'], related: ['oil'] },
        { name: 'spa', synonyms: ['spa', 'rubdown'], related: ['sauna'] },
    ]);

    it('maps synonyms back to the first category listing them', () => {
        expect(taxonomy.synonyms(' RUBDOWN ')).to.deep.equal(['massage', 'Rubdown']);
        expect(taxonomy.related('rubdown')).to.deep.equal(['oil']);
        expect(taxonomy.related('spa')).to.deep.equal(['sauna']);
    });

    it('treats an unknown term as its own only synonym', () => {
        expect(taxonomy.synonyms('Beach')).to.deep.equal(['beach']);
        expect(taxonomy.related('beach')).to.deep.equal([]);
    });

    it('ships categories that list their own name as a synonym', () => {
        for (const category of loadTaxonomy()) {
            expect(category.synonyms, category.name).to.include(category.name);
        }
    });
});
