import type {
    BookLevel,
    InstrumentDirectoryEntry,
    OrderBook,
    SourceId,
    Ticker,
    TickerRow,
    Trade,
    TradeSide,
} from '@marketfeed/shared';
import { NormalizationError } from '../../errors';

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

type OptionalTickerField =
    | 'last'
    | 'bid'
    | 'ask'
    | 'high'
    | 'low'
    | 'open'
    | 'close'
    | 'volume'
    | 'quoteVolume'
    | 'change'
    | 'percentage'
    | 'vwap';

const TICKER_FIELDS: ReadonlyArray<readonly [OptionalTickerField, readonly string[]]> = [
    ['last', ['last']],
    ['bid', ['bid']],
    ['ask', ['ask']],
    ['high', ['high']],
    ['low', ['low']],
    ['open', ['open']],
    ['close', ['close']],
    ['volume', ['baseVolume', 'volume']],
    ['quoteVolume', ['quoteVolume']],
    ['change', ['change']],
    ['percentage', ['percentage']],
    ['vwap', ['vwap']],
];

// Below this an epoch number is read as seconds, above as milliseconds.
const EPOCH_MILLIS_THRESHOLD = 1e12;
const NUMERIC_TEXT_RE = /^-?\d+(\.\d+)?$/;
const ISO_WITHOUT_ZONE_RE = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

function asRecord(input: unknown): Record<string, unknown> | null {
    if (!input || typeof input !== 'object' || Array.isArray(input)) {
        return null;
    }
    return input as Record<string, unknown>;
}

function asNumber(input: unknown): number | undefined {
    if (input === null || input === undefined || input === '' || typeof input === 'boolean') {
        return undefined;
    }
    const parsed = Number(input);
    return Number.isFinite(parsed) ? parsed : undefined;
}

function asString(input: unknown): string | undefined {
    if (typeof input === 'number' && Number.isFinite(input)) {
        return String(input);
    }
    return typeof input === 'string' && input.trim().length > 0 ? input.trim() : undefined;
}

function firstPresent(record: Record<string, unknown>, keys: readonly string[]): unknown {
    for (const key of keys) {
        const value = record[key];
        if (value !== undefined && value !== null && value !== '') {
            return value;
        }
    }
    return undefined;
}

function requireRecord(raw: unknown, source: SourceId, kind: string): Record<string, unknown> {
    const record = asRecord(raw);
    if (!record) {
        throw new NormalizationError(source, kind, `expected an object, received ${Array.isArray(raw) ? 'array' : typeof raw}`);
    }
    return record;
}

/**
 * Coerces epoch seconds, epoch milliseconds, numeric strings, ISO-8601 strings
 * and Date values to an ISO-8601 UTC string with millisecond precision.
 * Returns null when the value carries no usable instant.
 */
export function toIsoTimestamp(value: unknown): string | null {
    if (value instanceof Date) {
        return Number.isNaN(value.getTime()) ? null : value.toISOString();
    }
    if (typeof value === 'number') {
        if (!Number.isFinite(value)) {
            return null;
        }
        const millis = Math.abs(value) > EPOCH_MILLIS_THRESHOLD ? value : value * 1000;
        const date = new Date(millis);
        return Number.isNaN(date.getTime()) ? null : date.toISOString();
    }
    if (typeof value === 'string') {
        const trimmed = value.trim();
        if (trimmed.length === 0) {
            return null;
        }
        if (NUMERIC_TEXT_RE.test(trimmed)) {
            return toIsoTimestamp(Number(trimmed));
        }
        // Zone-less ISO text is UTC, not host-local time.
        const text = ISO_WITHOUT_ZONE_RE.test(trimmed) ? `${trimmed.replace(' ', 'T')}Z` : trimmed;
        const parsed = Date.parse(text);
        return Number.isNaN(parsed) ? null : new Date(parsed).toISOString();
    }
    return null;
}

function captureTimestamp(record: Record<string, unknown>, now: () => Date): string {
    return toIsoTimestamp(firstPresent(record, ['timestamp', 'datetime'])) ?? now().toISOString();
}

export function parseTradeSide(raw: unknown, source: SourceId): TradeSide {
    const side = typeof raw === 'string' ? raw.trim().toLowerCase() : '';
    if (side === 'buy' || side === 'sell') {
        return side;
    }
    throw new NormalizationError(source, 'side', `unrecognized trade side ${JSON.stringify(raw ?? null)}`);
}

export function toTicker(raw: unknown, source: SourceId, symbol: string, now: () => Date = () => new Date()): Ticker {
    const record = requireRecord(raw, source, 'ticker');
    const ticker: Mutable<Ticker> = {
        source,
        symbol,
        timestamp: captureTimestamp(record, now),
    };
    for (const [field, aliases] of TICKER_FIELDS) {
        const value = asNumber(firstPresent(record, aliases));
        if (value !== undefined) {
            ticker[field] = value;
        }
    }
    return Object.freeze(ticker);
}

export function toTrade(raw: unknown, source: SourceId, symbol: string): Trade {
    const record = requireRecord(raw, source, 'trade');
    const tradeId = asString(firstPresent(record, ['id', 'trade_id', 'tid']));
    if (!tradeId) {
        throw new NormalizationError(source, 'tradeId', 'missing trade id');
    }
    const price = asNumber(record.price);
    if (price === undefined) {
        throw new NormalizationError(source, 'price', `trade ${tradeId} has no numeric price`);
    }
    const size = asNumber(firstPresent(record, ['amount', 'qty', 'size']));
    if (size === undefined) {
        throw new NormalizationError(source, 'size', `trade ${tradeId} has no numeric size`);
    }
    const timestamp = toIsoTimestamp(firstPresent(record, ['timestamp', 'datetime']));
    if (!timestamp) {
        throw new NormalizationError(source, 'timestamp', `trade ${tradeId} has no usable timestamp`);
    }
    return Object.freeze({
        source,
        symbol,
        tradeId,
        price,
        size,
        side: parseTradeSide(record.side, source),
        timestamp,
    });
}

function toBookLevel(level: unknown, source: SourceId, side: 'bids' | 'asks'): BookLevel {
    let price: number | undefined;
    let size: number | undefined;
    if (Array.isArray(level)) {
        price = asNumber(level[0]);
        size = asNumber(level[1]);
    } else {
        const record = asRecord(level);
        if (record) {
            price = asNumber(record.price);
            size = asNumber(firstPresent(record, ['amount', 'size', 'qty']));
        }
    }
    if (price === undefined || size === undefined) {
        throw new NormalizationError(source, side, `malformed level ${JSON.stringify(level ?? null)}`);
    }
    return Object.freeze([price, size] as const);
}

function toBookSide(levels: unknown, source: SourceId, side: 'bids' | 'asks'): BookLevel[] {
    if (levels === undefined || levels === null) {
        return [];
    }
    if (!Array.isArray(levels)) {
        throw new NormalizationError(source, side, 'expected an array of levels');
    }
    const parsed = levels.map((level) => toBookLevel(level, source, side));
    return side === 'bids'
        ? parsed.sort((a, b) => b[0] - a[0])
        : parsed.sort((a, b) => a[0] - b[0]);
}

export function toOrderBook(raw: unknown, source: SourceId, symbol: string, now: () => Date = () => new Date()): OrderBook {
    const record = requireRecord(raw, source, 'orderbook');
    const book: Mutable<OrderBook> = {
        source,
        symbol,
        bids: Object.freeze(toBookSide(record.bids, source, 'bids')),
        asks: Object.freeze(toBookSide(record.asks, source, 'asks')),
        timestamp: captureTimestamp(record, now),
    };
    const sequence = asNumber(firstPresent(record, ['nonce', 'sequence', 'seq']));
    if (sequence !== undefined) {
        book.sequence = sequence;
    }
    return Object.freeze(book);
}

export function toInstrumentEntry(raw: unknown, source: SourceId, fallbackType: string): InstrumentDirectoryEntry {
    const record = requireRecord(raw, source, 'instrument');
    const symbol = asString(firstPresent(record, ['symbol', 'name']));
    if (!symbol) {
        throw new NormalizationError(source, 'symbol', 'instrument has no symbol');
    }
    const entry: Mutable<InstrumentDirectoryEntry> = {
        symbol,
        type: asString(record.type)?.toLowerCase() ?? fallbackType,
        active: record.active !== false,
    };
    const base = asString(record.base);
    const quote = asString(record.quote);
    if (base) {
        entry.base = base;
    }
    if (quote) {
        entry.quote = quote;
    }
    return Object.freeze(entry);
}

/** Decimal text without exponent notation. */
export function formatDecimal(value: number): string {
    const text = String(value);
    if (!/e/i.test(text)) {
        return text;
    }
    return value.toFixed(20).replace(/\.?0+$/, '');
}

export function toTickerRow(ticker: Ticker): TickerRow {
    if (ticker.last === undefined) {
        throw new NormalizationError(ticker.source, 'last', `${ticker.symbol} ticker has no last price`);
    }
    return Object.freeze({
        timestamp: ticker.timestamp,
        exchange: ticker.source,
        symbol: ticker.symbol,
        price: formatDecimal(ticker.last),
    });
}
