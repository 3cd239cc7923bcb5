import { VendorSourceConnector } from './VendorSourceConnector';
import { SimulatedExchange } from './SimulatedExchange';
import type { VendorExchange } from './interfaces';
import { ConnectorError, NormalizationError } from '../errors';
import { logger } from '../utils/logger';

const NOW_MS = 1_700_000_000_000;

class NetworkError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'NetworkError';
    }
}

function fakeExchange(overrides: Partial<VendorExchange> = {}): VendorExchange {
    return {
        id: 'fake',
        fetchTicker: async () => ({ last: 1 }),
        fetchOrderBook: async () => ({ bids: [], asks: [] }),
        fetchTrades: async () => [],
        loadMarkets: async () => ({}),
        ...overrides,
    };
}

describe('VendorSourceConnector over the simulated exchange', () => {
    const connector = () => new VendorSourceConnector('simulated', new SimulatedExchange(['BTC/USDT', 'ETH/USDT'], () => NOW_MS));

    it('normalizes tickers', async () => {
        await expect(connector().fetchTicker('BTC/USDT')).resolves.toEqual({
            source: 'simulated',
            symbol: 'BTC/USDT',
            timestamp: '2023-11-14T22:13:20.000Z',
            last: 35001,
            bid: 35000.5,
            ask: 35001.5,
            high: 35026,
            low: 34976,
            volume: 101,
            percentage: -0.2,
        });
    });

    it('prices ETH pairs apart from BTC pairs', async () => {
        const ticker = await connector().fetchTicker('ETH/USDT');
        expect(ticker.last).toBe(2001);
    });

    it('returns sorted order book levels at the requested depth', async () => {
        const simulated = connector();
        await simulated.fetchTicker('BTC/USDT');
        const book = await simulated.fetchOrderBook('BTC/USDT', 3);

        expect(book.sequence).toBe(1);
        expect(book.bids.map(([price]) => price)).toEqual([35000.5, 34999.5, 34998.5]);
        expect(book.asks.map(([price]) => price)).toEqual([35001.5, 35002.5, 35003.5]);
    });

    it('returns canonical trades', async () => {
        const trades = await connector().fetchTrades('BTC/USDT', 2);
        expect(trades).toEqual([
            { source: 'simulated', symbol: 'BTC/USDT', tradeId: '1', price: 35001, size: 0.01, side: 'sell', timestamp: '2023-11-14T22:13:20.000Z' },
            { source: 'simulated', symbol: 'BTC/USDT', tradeId: '2', price: 35002, size: 0.011, side: 'buy', timestamp: '2023-11-14T22:13:20.000Z' },
        ]);
    });

    it('lists its configured symbols as spot instruments', async () => {
        await expect(connector().listSymbols('spot')).resolves.toEqual([
            { symbol: 'BTC/USDT', base: 'BTC', quote: 'USDT', type: 'spot', active: true },
            { symbol: 'ETH/USDT', base: 'ETH', quote: 'USDT', type: 'spot', active: true },
        ]);
        await expect(connector().listSymbols('swap')).resolves.toEqual([]);
    });
});

describe('VendorSourceConnector error handling', () => {
    beforeEach(() => {
        jest.spyOn(logger, 'debug').mockImplementation(() => logger);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('wraps vendor failures with the vendor error class as reason', async () => {
        const connector = new VendorSourceConnector('okx', fakeExchange({
            fetchTicker: async () => {
                throw new NetworkError('request timed out');
            },
        }));

        const failure = connector.fetchTicker('BTC/USDT');
        await expect(failure).rejects.toBeInstanceOf(ConnectorError);
        await expect(failure).rejects.toMatchObject({
            source: 'okx',
            operation: 'fetchTicker(BTC/USDT)',
            reason: 'NetworkError: request timed out',
            message: 'okx fetchTicker(BTC/USDT) failed: NetworkError: request timed out',
        });
    });

    it('truncates long vendor messages', async () => {
        const connector = new VendorSourceConnector('okx', fakeExchange({
            fetchOrderBook: async () => {
                throw new Error('x'.repeat(400));
            },
        }));

        const error = await connector.fetchOrderBook('BTC/USDT', 5).catch((caught: unknown) => caught);
        expect(error).toBeInstanceOf(ConnectorError);
        expect(error instanceof ConnectorError ? error.reason.length : 0).toBe(303);
    });

    it('keeps the raw ticker payload for the polling path', async () => {
        const connector = new VendorSourceConnector('okx', fakeExchange({ fetchTicker: async () => ({ last: '7' }) }));
        await expect(connector.fetchRawTicker('BTC/USDT')).resolves.toEqual({ last: '7' });
    });

    it('rejects trade payloads that are not arrays', async () => {
        const connector = new VendorSourceConnector('okx', fakeExchange({ fetchTrades: async () => ({ trades: [] }) }));
        await expect(connector.fetchTrades('BTC/USDT', 10)).rejects.toBeInstanceOf(NormalizationError);
    });

    it('filters markets by type and skips malformed entries', async () => {
        const connector = new VendorSourceConnector('okx', fakeExchange({
            loadMarkets: async () => ({
                'ETH/USDT:USDT': { symbol: 'ETH/USDT:USDT', type: 'swap', base: 'ETH', quote: 'USDT' },
                'BTC/USDT': { symbol: 'BTC/USDT', type: 'spot', base: 'BTC', quote: 'USDT' },
                broken: { id: 'no-symbol' },
            }),
        }));

        await expect(connector.listSymbols('SWAP')).resolves.toEqual([
            { symbol: 'ETH/USDT:USDT', base: 'ETH', quote: 'USDT', type: 'swap', active: true },
        ]);
        const all = await connector.listSymbols('all');
        expect(all.map((entry) => entry.symbol)).toEqual(['BTC/USDT', 'ETH/USDT:USDT']);
        expect(logger.debug).toHaveBeenCalledWith('[Connector:okx] skipped 1 malformed market entries');
    });

    it('closes the vendor when it supports closing', async () => {
        const close = jest.fn(async () => undefined);
        await new VendorSourceConnector('okx', fakeExchange({ close })).close();
        expect(close).toHaveBeenCalledTimes(1);

        await expect(new VendorSourceConnector('okx', fakeExchange()).close()).resolves.toBeUndefined();

        const failing = new VendorSourceConnector('okx', fakeExchange({
            close: async () => {
                throw new Error('socket busy');
            },
        }));
        await expect(failing.close()).rejects.toThrow('okx close(*) failed: Error: socket busy');
    });
});
