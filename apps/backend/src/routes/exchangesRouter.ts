import { Router } from 'express';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { ConnectorError, NormalizationError, UnknownSourceError, describeError } from '../errors';
import type { MarketDataService } from '../services/MarketDataService';
import { logger } from '../utils/logger';

const INSTRUMENT_TYPE_RE = /^[a-z0-9_]{1,40}$/i;
const ASSET_RE = /^[a-z0-9]{1,20}$/i;

export interface InstrumentTypeOption {
    value: string;
    label: string;
}

export function instrumentTypeLabel(value: string): string {
    return value
        .split('_')
        .filter((part) => part.length > 0)
        .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
        .join(' ');
}

export function errorStatus(error: unknown): number {
    if (error instanceof UnknownSourceError) {
        return 404;
    }
    if (error instanceof ConnectorError || error instanceof NormalizationError) {
        return 502;
    }
    return 500;
}

function queryText(value: unknown): string | undefined {
    if (typeof value !== 'string') {
        return undefined;
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
}

function queryFlag(value: unknown): boolean {
    const text = queryText(value)?.toLowerCase();
    return text === 'true' || text === '1';
}

function badRequest(res: Response, message: string): void {
    res.status(400).json({ error: 'BadRequest', message });
}

// Express 4 does not forward rejected handler promises to the error middleware.
function asyncRoute(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
    return (req, res, next) => {
        handler(req, res).catch(next);
    };
}

export function createExchangesRouter(service: MarketDataService): Router {
    const router = Router();

    router.get('/configured', (_req, res) => {
        res.json({ exchanges: service.listConfiguredSources() });
    });

    router.get('/available', (_req, res) => {
        res.json({
            exchanges: service.listAvailableSources().map((source) => ({
                id: source.id,
                vendor_supported: source.vendorSupported,
                configured: source.configured,
                directory_supported: source.directorySupported,
            })),
        });
    });

    router.get('/:exchange/instrument-types', asyncRoute(async (req, res) => {
        const types = await service.listInstrumentTypes(req.params.exchange);
        const options: InstrumentTypeOption[] = types.map((value) => ({ value, label: instrumentTypeLabel(value) }));
        res.json({ exchange: req.params.exchange, instrument_types: options });
    }));

    router.get('/:exchange/symbols', asyncRoute(async (req, res) => {
        if (queryFlag(req.query.all_types)) {
            res.json(await service.listAllSymbols(req.params.exchange));
            return;
        }
        const instrumentType = queryText(req.query.instrument_type) ?? 'spot';
        if (!INSTRUMENT_TYPE_RE.test(instrumentType)) {
            badRequest(res, `invalid instrument_type "${instrumentType}"`);
            return;
        }
        res.json(await service.listSymbols(req.params.exchange, instrumentType.toLowerCase()));
    }));

    router.get('/:exchange/native-symbol', asyncRoute(async (req, res) => {
        const base = queryText(req.query.base);
        const quote = queryText(req.query.quote);
        const instrumentType = queryText(req.query.instrument_type) ?? 'spot';
        if (!base || !quote || !ASSET_RE.test(base) || !ASSET_RE.test(quote)) {
            badRequest(res, 'base and quote are required alphanumeric assets');
            return;
        }
        if (!INSTRUMENT_TYPE_RE.test(instrumentType)) {
            badRequest(res, `invalid instrument_type "${instrumentType}"`);
            return;
        }
        const symbol = await service.resolveNativeSymbol(req.params.exchange, base, quote, instrumentType.toLowerCase());
        if (!symbol) {
            res.status(404).json({ error: 'SymbolNotFound', message: `no ${base}/${quote} ${instrumentType} listing on ${req.params.exchange}` });
            return;
        }
        res.json({ exchange: req.params.exchange, base, quote, instrument_type: instrumentType.toLowerCase(), symbol });
    }));

    router.get('/:exchange/market-data/:symbol', asyncRoute(async (req, res) => {
        res.json(await service.queryMarketData(req.params.exchange, req.params.symbol));
    }));

    router.get('/:exchange/ticker/:symbol', asyncRoute(async (req, res) => {
        res.json(await service.triggerFetch(req.params.exchange, req.params.symbol));
    }));

    return router;
}

export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
    const status = errorStatus(error);
    if (status >= 500) {
        logger.error(`[HTTP] ${req.method} ${req.originalUrl} -> ${status}: ${describeError(error)}`);
    }
    if (status === 500) {
        res.status(500).json({ error: 'InternalError', message: 'Internal server error' });
        return;
    }
    const name = error instanceof Error ? error.name : 'Error';
    res.status(status).json({ error: name, message: describeError(error) });
}
