import type { SourceId } from '../types/market-data';

/**
 * Source ids are matched case-insensitively and with `-` and `_` interchangeable,
 * so `Binance-Spot`, `binance_spot` and `BINANCE_SPOT` name the same source.
 */
export function normalizeSourceId(input: string): SourceId {
    return input.trim().toLowerCase().replace(/-/g, '_');
}

export function sourceEnvPrefix(source: SourceId): string {
    return normalizeSourceId(source).toUpperCase();
}
