import 'dotenv/config';
import type { Server } from 'http';

import { createApp } from './app';
import { loadSettings } from './config/settings';
import { connectRedis, createRedisClient, disconnectRedis, type RedisClient } from './config/redis';
import { ConnectorRegistry } from './connectors/connectorRegistry';
import { ConfigurationError, describeError } from './errors';
import { MarketDataService } from './services/MarketDataService';
import { SymbolDirectoryClient, readSymbolDirectoryTables } from './services/SymbolDirectoryClient';
import { TickerFeedService } from './services/TickerFeedService';
import { TickerFileSink } from './services/TickerFileSink';
import { RedisTickerPublisher } from './services/TickerPublisher';
import { logger } from './utils/logger';

function closeServer(server: Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
    });
}

async function bootstrap() {
    const settings = await loadSettings();
    const registry = ConnectorRegistry.fromSettings(settings);
    const sink = new TickerFileSink({ outputDir: settings.outputDir, formats: settings.outputFormats });

    let redis: RedisClient | null = null;
    if (settings.redisUrl) {
        redis = createRedisClient(settings.redisUrl);
        await connectRedis(redis);
    }

    const directory = new SymbolDirectoryClient(settings.symbolDirectoryUrl, await readSymbolDirectoryTables());
    const feed = new TickerFeedService({
        settings,
        registry,
        sink,
        publisher: redis ? new RedisTickerPublisher(redis) : null,
    });
    const service = new MarketDataService({ settings, registry, directory });

    await feed.start();
    const server = createApp(service, feed).listen(settings.port, () => {
        logger.info(`[Bootstrap] HTTP server listening on port ${settings.port}`);
    });

    let shutdown: Promise<void> | null = null;
    const stop = (signal: NodeJS.Signals) => {
        if (!shutdown) {
            logger.info(`[Bootstrap] ${signal} received, shutting down`);
            shutdown = (async () => {
                await closeServer(server);
                await feed.stop();
                await registry.closeAll();
                if (redis) {
                    await disconnectRedis(redis);
                }
            })();
            shutdown.then(
                () => process.exit(0),
                (error) => {
                    logger.error(`[Bootstrap] shutdown failed: ${describeError(error)}`);
                    process.exit(1);
                },
            );
        }
    };
    process.on('SIGINT', stop);
    process.on('SIGTERM', stop);
}

bootstrap().catch((error) => {
    if (error instanceof ConfigurationError) {
        logger.error(`[Bootstrap] ${error.message}`);
    } else {
        logger.error(`[Bootstrap] failed to start: ${describeError(error)}`);
    }
    process.exit(1);
});
