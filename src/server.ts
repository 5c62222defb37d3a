import dotenv from 'dotenv';
import Logger from './utils/logger';
import { errorMessage } from './utils/errors';
import { createApp } from './app';
import { ConfigStore, type ConfigSnapshot } from './config/searchConfig';
import { createSourceRegistry } from './services/search/sources';
import { SearchOrchestrator } from './services/search/SearchOrchestrator';
import { BangTable } from './services/query/bangs';
import { SuggestionService, loadSuggestionTables } from './services/suggest/SuggestionService';
import { ProxyTransportProvider } from './services/transport/TransportProvider';

dotenv.config();

function bootstrap(): void {
    const registry = createSourceRegistry();
    const config = new ConfigStore(registry.names());
    const bangs = BangTable.load(registry);
    const { settings } = config.current();

    const suggestions = new SuggestionService(bangs, loadSuggestionTables(), settings.customTerms);
    const transport = new ProxyTransportProvider({ proxyUrl: settings.proxyUrl, anonymize: settings.anonymize });

    const transportOptions = (snapshot: ConfigSnapshot) => ({
        proxyUrl: snapshot.settings.proxyUrl,
        anonymize: snapshot.settings.anonymize,
    });

    // Nothing is applied unless the transport accepts the new snapshot
    config.onReload({
        validate: snapshot => transport.validate(transportOptions(snapshot)),
        apply: snapshot => {
            transport.apply(transportOptions(snapshot));
            suggestions.setCustomTerms(snapshot.settings.customTerms);
        },
    });

    const orchestrator = new SearchOrchestrator({ registry, bangs, config, transport, related: suggestions });
    const app = createApp({ orchestrator, suggestions, bangs, config });

    const server = app.listen(settings.port, () => {
        Logger.info(`🚀 Server running on port ${settings.port}`);
        Logger.info(`📚 ${registry.size} engines registered, ${config.current().enabledSources.size} enabled, ${bangs.all().length} bangs`);
    });

    process.on('SIGHUP', () => {
        Logger.info('SIGHUP received, reloading configuration');
        config.tryReload();
    });

    const shutdown = (signal: string) => {
        Logger.info(`${signal} received, shutting down`);
        server.close(() => {
            transport.close().catch((error: unknown) => {
                Logger.warn(`Failed to close transport: ${errorMessage(error)}`);
            });
        });
    };
    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
}

try {
    bootstrap();
} catch (error) {
    Logger.error(`❌ Startup failed: ${errorMessage(error)}`);
    process.exitCode = 1;
}
