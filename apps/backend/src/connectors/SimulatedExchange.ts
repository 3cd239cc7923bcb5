import type { VendorExchange } from './interfaces';

const BASE_PRICE = 35_000;

/**
 * Offline vendor producing ccxt-shaped payloads with deterministic prices,
 * so the feed can run without network access.
 */
export class SimulatedExchange implements VendorExchange {
    public readonly id = 'simulated';
    private tradeSeq = 0;
    private tickSeq = 0;

    constructor(
        private readonly symbols: readonly string[],
        private readonly nowMs: () => number = () => Date.now(),
    ) {}

    public async fetchTicker(symbol: string): Promise<unknown> {
        this.tickSeq += 1;
        const last = this.priceFor(symbol, this.tickSeq);
        return {
            symbol,
            timestamp: this.nowMs(),
            last,
            bid: last - 0.5,
            ask: last + 0.5,
            high: last + 25,
            low: last - 25,
            baseVolume: 100 + (this.tickSeq % 10),
            percentage: ((this.tickSeq % 7) - 3) / 10,
        };
    }

    public async fetchOrderBook(symbol: string, limit = 5): Promise<unknown> {
        const mid = this.priceFor(symbol, this.tickSeq);
        const depth = Math.max(1, Math.min(limit, 50));
        return {
            symbol,
            nonce: this.tickSeq,
            timestamp: this.nowMs(),
            bids: Array.from({ length: depth }, (_, i) => [mid - 0.5 - i, 0.1 + i * 0.01]),
            asks: Array.from({ length: depth }, (_, i) => [mid + 0.5 + i, 0.1 + i * 0.01]),
        };
    }

    public async fetchTrades(symbol: string, _since?: number, limit = 5): Promise<unknown> {
        const now = this.nowMs();
        return Array.from({ length: Math.max(0, limit) }, (_, i) => {
            this.tradeSeq += 1;
            return {
                id: String(this.tradeSeq),
                symbol,
                timestamp: now,
                price: this.priceFor(symbol, this.tradeSeq),
                amount: 0.01 + i * 0.001,
                side: this.tradeSeq % 2 === 0 ? 'buy' : 'sell',
            };
        });
    }

    public async loadMarkets(): Promise<unknown> {
        const markets: Record<string, unknown> = {};
        for (const symbol of this.symbols) {
            const [base, quote] = symbol.split('/');
            markets[symbol] = { symbol, base, quote, type: 'spot', active: true };
        }
        return markets;
    }

    private priceFor(symbol: string, seq: number): number {
        const offset = symbol.startsWith('ETH') ? -33_000 : 0;
        return BASE_PRICE + offset + (seq % 50);
    }
}
