export type SourceId = string;

export type TradeSide = 'buy' | 'sell';

export interface Ticker {
    readonly source: SourceId;
    readonly symbol: string;
    readonly last?: number;
    readonly bid?: number;
    readonly ask?: number;
    readonly high?: number;
    readonly low?: number;
    readonly open?: number;
    readonly close?: number;
    readonly volume?: number; // base volume
    readonly quoteVolume?: number;
    readonly change?: number;
    readonly percentage?: number;
    readonly vwap?: number;
    readonly timestamp: string; // ISO-8601 UTC, millisecond precision
}

export interface Trade {
    readonly source: SourceId;
    readonly symbol: string;
    readonly tradeId: string;
    readonly price: number;
    readonly size: number;
    readonly side: TradeSide;
    readonly timestamp: string;
}

export type BookLevel = readonly [price: number, size: number];

export interface OrderBook {
    readonly source: SourceId;
    readonly symbol: string;
    readonly sequence?: number;
    readonly bids: readonly BookLevel[]; // descending by price
    readonly asks: readonly BookLevel[]; // ascending by price
    readonly timestamp: string;
}

export interface InstrumentDirectoryEntry {
    readonly symbol: string;
    readonly base?: string;
    readonly quote?: string;
    readonly type: string;
    readonly active: boolean;
}

/** Persisted form of a ticker, one CSV row or JSON object. */
export interface TickerRow {
    readonly timestamp: string;
    readonly exchange: SourceId;
    readonly symbol: string;
    readonly price: string;
}

export const TICKER_ROW_FIELDS = ['timestamp', 'exchange', 'symbol', 'price'] as const;

export type MarketDataFacet = 'ticker' | 'orderbook' | 'trades' | 'market_info';

export interface MarketDataResult {
    exchange: SourceId;
    symbol: string;
    timestamp: string;
    ticker?: Ticker;
    orderbook?: OrderBook;
    trades?: Trade[];
    market_info?: InstrumentDirectoryEntry;
    errors: Partial<Record<MarketDataFacet, string>>;
}

export interface SourceAvailability {
    id: SourceId;
    vendorSupported: boolean;
    configured: boolean;
    directorySupported: boolean;
}

export interface SymbolListResult {
    exchange: SourceId;
    instrument_type: string;
    total_symbols: number;
    symbols: InstrumentDirectoryEntry[];
}

export interface SymbolGroup {
    count: number;
    symbols: InstrumentDirectoryEntry[];
}

export interface GroupedSymbolListResult {
    exchange: SourceId;
    total_symbols: number;
    instrument_types: Record<string, SymbolGroup>;
}
