import type {
    InstrumentDirectoryEntry,
    OrderBook,
    SourceId,
    Ticker,
    Trade,
} from '@marketfeed/shared';
import { ConnectorError, NormalizationError } from '../errors';
import {
    toInstrumentEntry,
    toOrderBook,
    toTicker,
    toTrade,
} from '../modules/normalize/normalizer';
import { logger } from '../utils/logger';
import type { ISourceConnector, VendorExchange } from './interfaces';

const MAX_REASON_LENGTH = 300;

function vendorReason(error: unknown): string {
    const reason = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
    return reason.length > MAX_REASON_LENGTH ? `${reason.slice(0, MAX_REASON_LENGTH)}...` : reason;
}

/**
 * Binds one configured source to its vendor exchange. Every variant goes
 * through this class; they differ only in the VendorExchange behind it.
 */
export class VendorSourceConnector implements ISourceConnector {
    constructor(
        public readonly source: SourceId,
        private readonly exchange: VendorExchange,
        private readonly now: () => Date = () => new Date(),
    ) {}

    public fetchRawTicker(symbol: string): Promise<unknown> {
        return this.call('fetchTicker', symbol, () => this.exchange.fetchTicker(symbol));
    }

    public async fetchTicker(symbol: string): Promise<Ticker> {
        const raw = await this.fetchRawTicker(symbol);
        return toTicker(raw, this.source, symbol, this.now);
    }

    public async fetchOrderBook(symbol: string, depth: number): Promise<OrderBook> {
        const raw = await this.call('fetchOrderBook', symbol, () => this.exchange.fetchOrderBook(symbol, depth));
        return toOrderBook(raw, this.source, symbol, this.now);
    }

    public async fetchTrades(symbol: string, limit: number): Promise<Trade[]> {
        const raw = await this.call('fetchTrades', symbol, () => this.exchange.fetchTrades(symbol, undefined, limit));
        if (!Array.isArray(raw)) {
            throw new NormalizationError(this.source, 'trades', 'expected an array of trades');
        }
        return raw.map((trade) => toTrade(trade, this.source, symbol));
    }

    public async listSymbols(instrumentType?: string): Promise<InstrumentDirectoryEntry[]> {
        const markets = await this.call('loadMarkets', '*', () => this.exchange.loadMarkets());
        if (!markets || typeof markets !== 'object') {
            throw new NormalizationError(this.source, 'markets', 'expected a market map');
        }
        const wanted = instrumentType?.trim().toLowerCase();
        const entries: InstrumentDirectoryEntry[] = [];
        let skipped = 0;
        for (const market of Object.values(markets)) {
            try {
                const entry = toInstrumentEntry(market, this.source, 'spot');
                if (!wanted || wanted === 'all' || entry.type === wanted) {
                    entries.push(entry);
                }
            } catch (error) {
                if (!(error instanceof NormalizationError)) {
                    throw error;
                }
                skipped += 1;
            }
        }
        if (skipped > 0) {
            logger.debug(`[Connector:${this.source}] skipped ${skipped} malformed market entries`);
        }
        return entries.sort((a, b) => a.symbol.localeCompare(b.symbol));
    }

    public async close(): Promise<void> {
        const close = this.exchange.close?.bind(this.exchange);
        if (close) {
            await this.call('close', '*', close);
        }
    }

    private async call<T>(operation: string, symbol: string, task: () => Promise<T>): Promise<T> {
        try {
            return await task();
        } catch (error) {
            throw new ConnectorError(this.source, `${operation}(${symbol})`, vendorReason(error), error);
        }
    }
}
