import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { createExchangesRouter, errorHandler } from './routes/exchangesRouter';
import type { MarketDataService } from './services/MarketDataService';
import type { TickerFeedService } from './services/TickerFeedService';

export function createApp(service: MarketDataService, feed?: TickerFeedService): express.Express {
    const app = express();

    app.use(helmet());
    app.use(cors({ methods: ['GET'] }));
    app.use(express.json());

    app.get('/health', (_req, res) => {
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
            sources: service.listConfiguredSources(),
            targets: feed ? feed.snapshot() : [],
        });
    });

    app.use('/api/v1/exchanges', createExchangesRouter(service));
    app.use(errorHandler);

    return app;
}
