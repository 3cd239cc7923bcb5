import axios from 'axios';
import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { normalizeSourceId, type InstrumentDirectoryEntry, type SourceId } from '@marketfeed/shared';
import { formatIssues } from '../config/settings';
import { ConfigurationError, ConnectorError, NormalizationError, describeError } from '../errors';
import { toInstrumentEntry } from '../modules/normalize/normalizer';
import { logger } from '../utils/logger';

export const DEFAULT_SYMBOL_DIRECTORY_FILE = path.resolve(__dirname, '..', '..', 'config', 'symbol-directory.json');

const REQUEST_TIMEOUT_MS = 10_000;

// Tried in order when the requested quote has no listing.
const QUOTE_FALLBACKS: Readonly<Record<string, string>> = {
    USDT: 'USDC',
    USDC: 'USDT',
};

const tablesSchema = z.object({
    instrumentTypes: z.record(z.array(z.string().trim().min(1)).min(1)),
    typeAliases: z.record(z.record(z.string().trim().min(1))).default({}),
    routes: z.record(z.string().trim().min(1)).default({}),
    derivativeBaseAliases: z.record(z.record(z.string().trim().min(1))).default({}),
});

export type SymbolDirectoryTables = z.infer<typeof tablesSchema>;

export interface DirectoryHttpClient {
    get(url: string, config?: { timeout?: number }): Promise<{ data: unknown }>;
}

export interface ISymbolDirectory {
    supports(source: string): boolean;
    instrumentTypes(source: string): string[];
    listSymbols(source: string, instrumentType?: string): Promise<InstrumentDirectoryEntry[]>;
    findNativeSymbol(source: string, base: string, quote: string, instrumentType: string): Promise<string | null>;
}

function lookup<V>(table: Readonly<Record<string, V>>, key: string): V | undefined {
    return Object.hasOwn(table, key) ? table[key] : undefined;
}

export async function readSymbolDirectoryTables(filePath: string = DEFAULT_SYMBOL_DIRECTORY_FILE): Promise<SymbolDirectoryTables> {
    let payload: unknown;
    try {
        payload = JSON.parse(await fs.readFile(filePath, 'utf8'));
    } catch (error) {
        throw new ConfigurationError(`Cannot load symbol directory tables from ${filePath}: ${describeError(error)}`);
    }
    const parsed = tablesSchema.safeParse(payload);
    if (!parsed.success) {
        throw new ConfigurationError(`Symbol directory tables ${filePath} are invalid`, formatIssues(parsed.error));
    }
    return parsed.data;
}

/**
 * First listing whose base and quote match, retrying with the paired
 * stablecoin quote when the requested one is not listed.
 */
export function matchNativeSymbol(
    entries: readonly InstrumentDirectoryEntry[],
    base: string,
    quote: string,
): string | null {
    const wantedBase = base.trim().toUpperCase();
    const wantedQuote = quote.trim().toUpperCase();
    const quotes = [wantedQuote];
    const fallback = lookup(QUOTE_FALLBACKS, wantedQuote);
    if (fallback) {
        quotes.push(fallback);
    }
    for (const candidate of quotes) {
        const match = entries.find((entry) =>
            entry.base?.toUpperCase() === wantedBase && entry.quote?.toUpperCase() === candidate);
        if (match) {
            return match.symbol;
        }
    }
    return null;
}

/**
 * Secondary instrument directory reached over HTTP. Source ids are routed to
 * the provider's exchange names and instrument types through alias tables.
 */
export class SymbolDirectoryClient implements ISymbolDirectory {
    constructor(
        private readonly baseUrl: string,
        private readonly tables: SymbolDirectoryTables,
        private readonly http: DirectoryHttpClient = axios,
    ) {}

    public providerExchange(source: string): string {
        const id = normalizeSourceId(source);
        return lookup(this.tables.routes, id) ?? id;
    }

    public supports(source: string): boolean {
        return lookup(this.tables.instrumentTypes, this.providerExchange(source)) !== undefined;
    }

    public instrumentTypes(source: string): string[] {
        return [...(lookup(this.tables.instrumentTypes, this.providerExchange(source)) ?? ['spot'])];
    }

    /** The provider's name for `instrumentType`, or the exchange's first type when it has none. */
    public resolveInstrumentType(source: string, instrumentType: string): string {
        const exchange = this.providerExchange(source);
        const types = lookup(this.tables.instrumentTypes, exchange);
        if (!types) {
            return 'spot';
        }
        const wanted = instrumentType.trim().toLowerCase();
        if (types.includes(wanted)) {
            return wanted;
        }
        const aliases = lookup(this.tables.typeAliases, exchange);
        return (aliases ? lookup(aliases, wanted) : undefined) ?? types[0];
    }

    public async listSymbols(source: string, instrumentType = 'spot'): Promise<InstrumentDirectoryEntry[]> {
        const id: SourceId = normalizeSourceId(source);
        const exchange = this.providerExchange(id);
        const type = this.resolveInstrumentType(id, instrumentType);
        const url = `${this.baseUrl}/api/symbols/${encodeURIComponent(exchange)}/${encodeURIComponent(type)}`;

        let payload: unknown;
        try {
            const response = await this.http.get(url, { timeout: REQUEST_TIMEOUT_MS });
            payload = response.data;
        } catch (error) {
            throw new ConnectorError(id, `listSymbols(${exchange}/${type})`, describeError(error), error);
        }

        const symbols = typeof payload === 'object' && payload !== null && 'symbols' in payload
            ? payload.symbols
            : [];
        if (!Array.isArray(symbols)) {
            throw new NormalizationError(id, 'symbols', 'expected an array of instruments');
        }

        const entries: InstrumentDirectoryEntry[] = [];
        let skipped = 0;
        for (const raw of symbols) {
            try {
                entries.push(toInstrumentEntry(raw, id, type));
            } catch (error) {
                if (!(error instanceof NormalizationError)) {
                    throw error;
                }
                skipped += 1;
            }
        }
        if (skipped > 0) {
            logger.debug(`[SymbolDirectory] ${exchange}/${type}: skipped ${skipped} malformed entries`);
        }
        return entries;
    }

    public async findNativeSymbol(source: string, base: string, quote: string, instrumentType: string): Promise<string | null> {
        if (instrumentType.trim().length === 0) {
            return null;
        }
        let wantedBase = base.trim().toUpperCase();
        if (instrumentType.trim().toLowerCase() !== 'spot') {
            const aliases = lookup(this.tables.derivativeBaseAliases, this.providerExchange(source));
            wantedBase = (aliases ? lookup(aliases, wantedBase) : undefined) ?? wantedBase;
        }
        const entries = await this.listSymbols(source, instrumentType);
        return matchNativeSymbol(entries, wantedBase, quote);
    }
}
