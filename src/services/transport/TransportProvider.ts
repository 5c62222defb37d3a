// Outbound transport - hands adapters a direct or anonymized HTTP client

import { fetch as undiciFetch, ProxyAgent } from 'undici';
import Logger from '../../utils/logger';
import { ConfigurationError, errorMessage } from '../../utils/errors';

export interface HttpRequestInit {
    headers: Record<string, string>;
    signal: AbortSignal;
}

export interface HttpResponse {
    ok: boolean;
    status: number;
    statusText: string;
    text(): Promise<string>;
}

export type HttpClient = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

export interface TransportProvider {
    /** Client for one request; anonymized clients route through the proxy. */
    getClient(anonymized: boolean): HttpClient;
    isAnonymized(): boolean;
}

export interface TransportOptions {
    proxyUrl?: string;
    anonymize: boolean;
}

export const directClient: HttpClient = (url, init) => fetch(url, init);

/**
 * Direct requests use the global fetch. Anonymized requests tunnel through an
 * HTTP CONNECT proxy (for example a Tor HTTPTunnelPort).
 */
export class ProxyTransportProvider implements TransportProvider {
    private agent?: ProxyAgent;
    private anonymizedClient?: HttpClient;
    private anonymize = false;
    private proxyUrl?: string;

    constructor(options: TransportOptions) {
        this.apply(options);
    }

    validate(options: TransportOptions): void {
        if (options.anonymize && !options.proxyUrl) {
            throw new ConfigurationError(
                'ANONYMIZE_OUTBOUND is set but no ANONYMIZER_PROXY_URL was configured',
                'ANONYMIZER_UNAVAILABLE',
            );
        }
    }

    /** Swaps the proxy in place; called on startup and on config reload. */
    apply(options: TransportOptions): void {
        this.validate(options);

        if (options.proxyUrl !== this.proxyUrl) {
            const previous = this.agent;
            this.agent = undefined;
            this.anonymizedClient = undefined;

            if (options.proxyUrl) {
                const agent = new ProxyAgent(options.proxyUrl);
                this.agent = agent;
                this.anonymizedClient = (url, init) => undiciFetch(url, { ...init, dispatcher: agent });
            }
            this.proxyUrl = options.proxyUrl;

            if (previous) {
                previous.close().catch((error: unknown) => {
                    Logger.warn(`Failed to close previous proxy agent: ${errorMessage(error)}`);
                });
            }
        }

        this.anonymize = options.anonymize;
    }

    getClient(anonymized: boolean): HttpClient {
        if (!anonymized) {
            return directClient;
        }
        if (!this.anonymizedClient) {
            throw new ConfigurationError('Anonymized transport requested without a proxy', 'ANONYMIZER_UNAVAILABLE');
        }
        return this.anonymizedClient;
    }

    isAnonymized(): boolean {
        return this.anonymize && this.anonymizedClient !== undefined;
    }

    async close(): Promise<void> {
        if (this.agent) {
            await this.agent.close();
            Logger.debug('Proxy agent closed');
        }
    }
}
