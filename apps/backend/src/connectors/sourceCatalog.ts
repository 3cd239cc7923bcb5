import * as ccxt from 'ccxt';
import type { SourceId } from '@marketfeed/shared';
import type { VendorExchange, VendorExchangeOptions } from './interfaces';
import { SimulatedExchange } from './SimulatedExchange';

export interface SourceVariant {
    readonly id: SourceId;
    /** Exchange id inside the vendor library, or null for non-vendor variants. */
    readonly vendorId: string | null;
    create(options: VendorExchangeOptions, symbols: readonly string[]): VendorExchange;
}

type CcxtConfig = {
    apiKey?: string;
    secret?: string;
    enableRateLimit: boolean;
};

function ccxtVariant(id: SourceId, vendorId: string, construct: (config: CcxtConfig) => ccxt.Exchange): SourceVariant {
    return {
        id,
        vendorId,
        create: (options) => {
            const exchange = construct({
                apiKey: options.apiKey,
                secret: options.secret,
                enableRateLimit: true,
            });
            if (options.sandbox) {
                // Throws NotSupported for exchanges without a testnet.
                exchange.setSandboxMode(true);
            }
            return exchange;
        },
    };
}

const VARIANTS: SourceVariant[] = [
    ccxtVariant('binance_spot', 'binance', (config) => new ccxt.binance(config)),
    ccxtVariant('binance_usdm', 'binanceusdm', (config) => new ccxt.binanceusdm(config)),
    ccxtVariant('binance_coinm', 'binancecoinm', (config) => new ccxt.binancecoinm(config)),
    ccxtVariant('bitfinex', 'bitfinex', (config) => new ccxt.bitfinex(config)),
    ccxtVariant('bitget', 'bitget', (config) => new ccxt.bitget(config)),
    ccxtVariant('bitmex', 'bitmex', (config) => new ccxt.bitmex(config)),
    ccxtVariant('bitso', 'bitso', (config) => new ccxt.bitso(config)),
    ccxtVariant('bitstamp', 'bitstamp', (config) => new ccxt.bitstamp(config)),
    ccxtVariant('blofin', 'blofin', (config) => new ccxt.blofin(config)),
    ccxtVariant('bybit', 'bybit', (config) => new ccxt.bybit(config)),
    ccxtVariant('coinbase', 'coinbase', (config) => new ccxt.coinbase(config)),
    ccxtVariant('cryptocom', 'cryptocom', (config) => new ccxt.cryptocom(config)),
    ccxtVariant('deribit', 'deribit', (config) => new ccxt.deribit(config)),
    ccxtVariant('gate', 'gate', (config) => new ccxt.gate(config)),
    ccxtVariant('gemini', 'gemini', (config) => new ccxt.gemini(config)),
    ccxtVariant('kraken_spot', 'kraken', (config) => new ccxt.kraken(config)),
    ccxtVariant('kraken_futures', 'krakenfutures', (config) => new ccxt.krakenfutures(config)),
    ccxtVariant('kucoin_spot', 'kucoin', (config) => new ccxt.kucoin(config)),
    ccxtVariant('kucoin_futures', 'kucoinfutures', (config) => new ccxt.kucoinfutures(config)),
    ccxtVariant('okx', 'okx', (config) => new ccxt.okx(config)),
    {
        id: 'simulated',
        vendorId: null,
        create: (_options, symbols) => new SimulatedExchange(symbols),
    },
];

export type SourceCatalog = ReadonlyMap<SourceId, SourceVariant>;

export const SOURCE_CATALOG: SourceCatalog = new Map(VARIANTS.map((variant) => [variant.id, variant]));

/** Every exchange id the vendor library ships, configured or not. */
export const VENDOR_EXCHANGE_IDS: readonly string[] = ccxt.exchanges;
