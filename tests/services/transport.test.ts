import { expect } from 'chai';

import { ProxyTransportProvider, directClient } from '../../src/services/transport/TransportProvider';
import { ConfigurationError } from '../../src/utils/errors';

describe('services/transport', () => {
    it('hands out the direct client when anonymization is off', () => {
        const provider = new ProxyTransportProvider({ anonymize: false });

        expect(provider.getClient(false)).to.equal(directClient);
        expect(provider.isAnonymized()).to.equal(false);
        expect(() => provider.getClient(true)).to.throw(ConfigurationError, 'Anonymized transport requested without a proxy');
    });

    it('refuses to anonymize without a proxy', () => {
        expect(() => new ProxyTransportProvider({ anonymize: true })).to.throw(ConfigurationError);
    });

    it('checks options without touching the active transport', () => {
        const provider = new ProxyTransportProvider({ anonymize: false });

        expect(() => provider.validate({ anonymize: true })).to.throw(ConfigurationError, 'ANONYMIZE_OUTBOUND is set');
        expect(provider.isAnonymized()).to.equal(false);
        expect(provider.getClient(false)).to.equal(directClient);
    });

    it('routes anonymized requests through the proxy and swaps it on reload', async () => {
        const provider = new ProxyTransportProvider({ anonymize: true, proxyUrl: 'http://127.0.0.1:9050' });

        expect(provider.isAnonymized()).to.equal(true);
        expect(provider.getClient(true)).to.not.equal(directClient);
        expect(provider.getClient(false)).to.equal(directClient);

        provider.apply({ anonymize: false });
        expect(provider.isAnonymized()).to.equal(false);
        expect(() => provider.getClient(true)).to.throw(ConfigurationError);

        await provider.close();
    });
});
