import type {
    GroupedSymbolListResult,
    InstrumentDirectoryEntry,
    MarketDataFacet,
    MarketDataResult,
    SourceAvailability,
    SourceId,
    SymbolGroup,
    SymbolListResult,
    Ticker,
} from '@marketfeed/shared';
import type { FeedSettings } from '../config/settings';
import type { ConnectorRegistry } from '../connectors/connectorRegistry';
import type { ISourceConnector } from '../connectors/interfaces';
import { SOURCE_CATALOG, VENDOR_EXCHANGE_IDS, type SourceCatalog } from '../connectors/sourceCatalog';
import { ConnectorError, describeError } from '../errors';
import { logger } from '../utils/logger';
import { TimeoutError, withTimeout } from '../utils/withTimeout';
import { matchNativeSymbol, type ISymbolDirectory } from './SymbolDirectoryClient';

export interface MarketDataServiceDeps {
    settings: Pick<FeedSettings, 'queryTimeoutMs' | 'orderBookDepth' | 'tradesLimit'>;
    registry: ConnectorRegistry;
    directory?: ISymbolDirectory | null;
    catalog?: SourceCatalog;
    vendorExchangeIds?: readonly string[];
    now?: () => Date;
}

const DEFAULT_INSTRUMENT_TYPE = 'spot';

/**
 * On-demand reads. Each facet of an aggregated query is isolated: a failure
 * or timeout becomes an entry in `errors` and the other facets still return.
 */
export class MarketDataService {
    private readonly catalog: SourceCatalog;
    private readonly vendorExchangeIds: ReadonlySet<string>;
    private readonly now: () => Date;

    constructor(private readonly deps: MarketDataServiceDeps) {
        this.catalog = deps.catalog ?? SOURCE_CATALOG;
        this.vendorExchangeIds = new Set(deps.vendorExchangeIds ?? VENDOR_EXCHANGE_IDS);
        this.now = deps.now ?? (() => new Date());
    }

    public async triggerFetch(source: string, symbol: string): Promise<Ticker> {
        const connector = this.deps.registry.get(source);
        try {
            return await withTimeout(`fetchTicker(${symbol})`, this.deps.settings.queryTimeoutMs, () => connector.fetchTicker(symbol));
        } catch (error) {
            if (error instanceof TimeoutError) {
                throw new ConnectorError(connector.source, `fetchTicker(${symbol})`, error.message, error);
            }
            throw error;
        }
    }

    public async queryMarketData(source: string, symbol: string): Promise<MarketDataResult> {
        const connector = this.deps.registry.get(source);
        const { queryTimeoutMs, orderBookDepth, tradesLimit } = this.deps.settings;

        const [ticker, orderbook, trades, marketInfo] = await Promise.allSettled([
            withTimeout('ticker', queryTimeoutMs, () => connector.fetchTicker(symbol)),
            withTimeout('orderbook', queryTimeoutMs, () => connector.fetchOrderBook(symbol, orderBookDepth)),
            withTimeout('trades', queryTimeoutMs, () => connector.fetchTrades(symbol, tradesLimit)),
            withTimeout('market_info', queryTimeoutMs, () => this.marketInfo(connector, symbol)),
        ]);

        const result: MarketDataResult = {
            exchange: connector.source,
            symbol,
            timestamp: this.now().toISOString(),
            errors: {},
        };
        if (ticker.status === 'fulfilled') {
            result.ticker = ticker.value;
        } else {
            this.recordFacetError(result, 'ticker', ticker.reason);
        }
        if (orderbook.status === 'fulfilled') {
            result.orderbook = orderbook.value;
        } else {
            this.recordFacetError(result, 'orderbook', orderbook.reason);
        }
        if (trades.status === 'fulfilled') {
            result.trades = trades.value;
        } else {
            this.recordFacetError(result, 'trades', trades.reason);
        }
        if (marketInfo.status === 'fulfilled') {
            result.market_info = marketInfo.value;
        } else {
            this.recordFacetError(result, 'market_info', marketInfo.reason);
        }
        return result;
    }

    public listConfiguredSources(): SourceId[] {
        return this.deps.registry.sources();
    }

    public listAvailableSources(): SourceAvailability[] {
        const ids = new Set<SourceId>([
            ...this.catalog.keys(),
            ...this.vendorExchangeIds,
            ...this.deps.registry.sources(),
        ]);
        return Array.from(ids).sort().map((id) => {
            const vendorId = this.catalog.get(id)?.vendorId;
            return {
                id,
                vendorSupported: this.vendorExchangeIds.has(id) || (vendorId ? this.vendorExchangeIds.has(vendorId) : false),
                configured: this.deps.registry.has(id),
                directorySupported: this.deps.directory?.supports(id) ?? false,
            };
        });
    }

    public async listInstrumentTypes(source: string): Promise<string[]> {
        const connector = this.deps.registry.get(source);
        if (this.deps.directory?.supports(connector.source)) {
            return this.deps.directory.instrumentTypes(connector.source);
        }
        const entries = await connector.listSymbols();
        const types = Array.from(new Set(entries.map((entry) => entry.type))).sort();
        return types.length > 0 ? types : [DEFAULT_INSTRUMENT_TYPE];
    }

    public async listSymbols(source: string, instrumentType = DEFAULT_INSTRUMENT_TYPE): Promise<SymbolListResult> {
        const connector = this.deps.registry.get(source);
        const symbols = await this.symbolsFor(connector, instrumentType);
        return {
            exchange: connector.source,
            instrument_type: instrumentType,
            total_symbols: symbols.length,
            symbols,
        };
    }

    /** Every instrument type of the source, grouped; a failing type yields an empty group. */
    public async listAllSymbols(source: string): Promise<GroupedSymbolListResult> {
        const connector = this.deps.registry.get(source);
        const types = await this.listInstrumentTypes(connector.source);
        const settled = await Promise.allSettled(types.map((type) => this.symbolsFor(connector, type)));

        const groups: Record<string, SymbolGroup> = {};
        let total = 0;
        settled.forEach((outcome, index) => {
            const type = types[index];
            if (outcome.status === 'rejected') {
                logger.warn(`[MarketData] ${connector.source} ${type} symbols failed: ${describeError(outcome.reason)}`);
                groups[type] = { count: 0, symbols: [] };
                return;
            }
            groups[type] = { count: outcome.value.length, symbols: outcome.value };
            total += outcome.value.length;
        });
        return {
            exchange: connector.source,
            total_symbols: total,
            instrument_types: groups,
        };
    }

    public async resolveNativeSymbol(
        source: string,
        base: string,
        quote: string,
        instrumentType = DEFAULT_INSTRUMENT_TYPE,
    ): Promise<string | null> {
        const connector = this.deps.registry.get(source);
        if (this.deps.directory?.supports(connector.source)) {
            return this.deps.directory.findNativeSymbol(connector.source, base, quote, instrumentType);
        }
        return matchNativeSymbol(await connector.listSymbols(instrumentType), base, quote);
    }

    private symbolsFor(connector: ISourceConnector, instrumentType: string): Promise<InstrumentDirectoryEntry[]> {
        if (this.deps.directory?.supports(connector.source)) {
            return this.deps.directory.listSymbols(connector.source, instrumentType);
        }
        return connector.listSymbols(instrumentType);
    }

    private async marketInfo(connector: ISourceConnector, symbol: string): Promise<InstrumentDirectoryEntry> {
        const entries = await connector.listSymbols();
        const entry = entries.find((candidate) => candidate.symbol === symbol);
        if (!entry) {
            throw new Error(`${symbol} is not listed by ${connector.source}`);
        }
        return entry;
    }

    private recordFacetError(result: MarketDataResult, facet: MarketDataFacet, reason: unknown): void {
        const message = describeError(reason);
        result.errors[facet] = message;
        logger.warn(`[MarketData] ${result.exchange} ${result.symbol} ${facet} failed: ${message}`);
    }
}
