import type {
    InstrumentDirectoryEntry,
    OrderBook,
    SourceId,
    Ticker,
    Trade,
} from '@marketfeed/shared';

/**
 * The slice of a ccxt exchange the connectors use. Payloads stay `unknown`
 * until they go through the normalizer.
 */
export interface VendorExchange {
    readonly id: string;
    fetchTicker(symbol: string): Promise<unknown>;
    fetchOrderBook(symbol: string, limit?: number): Promise<unknown>;
    fetchTrades(symbol: string, since?: number, limit?: number): Promise<unknown>;
    loadMarkets(): Promise<unknown>;
    close?(): Promise<unknown>;
}

export interface VendorExchangeOptions {
    apiKey?: string;
    secret?: string;
    sandbox: boolean;
}

export interface ISourceConnector {
    readonly source: SourceId;
    /** Vendor ticker payload, before normalization. */
    fetchRawTicker(symbol: string): Promise<unknown>;
    fetchTicker(symbol: string): Promise<Ticker>;
    fetchOrderBook(symbol: string, depth: number): Promise<OrderBook>;
    fetchTrades(symbol: string, limit: number): Promise<Trade[]>;
    /** All instruments, or only those of `instrumentType` when given. */
    listSymbols(instrumentType?: string): Promise<InstrumentDirectoryEntry[]>;
    close(): Promise<void>;
}
