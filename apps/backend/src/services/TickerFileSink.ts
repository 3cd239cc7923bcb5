import fs from 'fs/promises';
import path from 'path';
import { TICKER_ROW_FIELDS, type SourceId, type Ticker, type TickerRow } from '@marketfeed/shared';
import type { OutputFormat } from '../config/settings';
import { PersistenceError } from '../errors';
import { toTickerRow } from '../modules/normalize/normalizer';
import { KeyedWriteLock } from '../utils/keyedWriteLock';
import { logger } from '../utils/logger';

export interface ITickerSink {
    reset(source: SourceId): Promise<void>;
    appendTicker(ticker: Ticker): Promise<TickerRow>;
    flush(): Promise<void>;
}

export interface TickerFileSinkConfig {
    outputDir: string;
    formats: readonly OutputFormat[];
}

export const CSV_HEADER = `${TICKER_ROW_FIELDS.join(',')}\n`;

const CSV_NEEDS_QUOTES_RE = /[",\r\n]/;

export function escapeCsvField(value: string): string {
    if (!CSV_NEEDS_QUOTES_RE.test(value)) {
        return value;
    }
    return `"${value.replace(/"/g, '""')}"`;
}

export function formatCsvRow(row: TickerRow): string {
    return `${TICKER_ROW_FIELDS.map((field) => escapeCsvField(row[field])).join(',')}\n`;
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function tickerFilePath(outputDir: string, source: SourceId, format: OutputFormat): string {
    return path.join(outputDir, `${source}_ticker.${format}`);
}

/**
 * Flat-file ticker log: `{source}_ticker.csv` and/or `{source}_ticker.json`.
 * The JSON destination is one array rewritten on every append, through a
 * temporary file renamed over the target.
 */
export class TickerFileSink implements ITickerSink {
    private readonly lock = new KeyedWriteLock();
    private dirReady: Promise<void> | null = null;

    constructor(private readonly config: TickerFileSinkConfig) {}

    public async reset(source: SourceId): Promise<void> {
        await this.ensureOutputDir();
        for (const format of this.config.formats) {
            const filePath = tickerFilePath(this.config.outputDir, source, format);
            await this.lock.runExclusive(filePath, async () => {
                await this.replaceFile(filePath, format === 'csv' ? CSV_HEADER : '[]\n', 'reset');
            });
        }
        logger.info(`[TickerFileSink] reset ${source} (${this.config.formats.join(', ')})`);
    }

    public async appendTicker(ticker: Ticker): Promise<TickerRow> {
        const row = toTickerRow(ticker);
        await this.ensureOutputDir();
        for (const format of this.config.formats) {
            const filePath = tickerFilePath(this.config.outputDir, ticker.source, format);
            await this.lock.runExclusive(filePath, () => (
                format === 'csv' ? this.appendCsv(filePath, row) : this.appendJson(filePath, row)
            ));
        }
        return row;
    }

    public async flush(): Promise<void> {
        await this.lock.drain();
    }

    private ensureOutputDir(): Promise<void> {
        if (!this.dirReady) {
            this.dirReady = fs.mkdir(this.config.outputDir, { recursive: true })
                .then(() => undefined)
                .catch((error: unknown) => {
                    this.dirReady = null;
                    throw new PersistenceError(this.config.outputDir, 'mkdir', error);
                });
        }
        return this.dirReady;
    }

    private async appendCsv(filePath: string, row: TickerRow): Promise<void> {
        let size = 0;
        try {
            size = (await fs.stat(filePath)).size;
        } catch (error) {
            if (!isMissingFile(error)) {
                throw new PersistenceError(filePath, 'stat', error);
            }
        }
        const content = size === 0 ? `${CSV_HEADER}${formatCsvRow(row)}` : formatCsvRow(row);
        try {
            await fs.appendFile(filePath, content, { encoding: 'utf8' });
        } catch (error) {
            throw new PersistenceError(filePath, 'append', error);
        }
    }

    private async appendJson(filePath: string, row: TickerRow): Promise<void> {
        const rows = await this.readJsonArray(filePath);
        rows.push({
            timestamp: row.timestamp,
            exchange: row.exchange,
            symbol: row.symbol,
            price: row.price,
        });
        await this.replaceFile(filePath, `${JSON.stringify(rows, null, 2)}\n`, 'rewrite');
    }

    private async readJsonArray(filePath: string): Promise<unknown[]> {
        let content: string;
        try {
            content = await fs.readFile(filePath, 'utf8');
        } catch (error) {
            if (isMissingFile(error)) {
                return [];
            }
            throw new PersistenceError(filePath, 'read', error);
        }
        if (content.trim().length === 0) {
            return [];
        }
        let parsed: unknown;
        try {
            parsed = JSON.parse(content);
        } catch (error) {
            throw new PersistenceError(filePath, 'parse', error);
        }
        if (!Array.isArray(parsed)) {
            throw new PersistenceError(filePath, 'parse', new Error('top-level value is not an array'));
        }
        return parsed;
    }

    private async replaceFile(filePath: string, content: string, operation: string): Promise<void> {
        const tempPath = `${filePath}.${process.pid}.tmp`;
        try {
            await fs.writeFile(tempPath, content, { encoding: 'utf8' });
            await fs.rename(tempPath, filePath);
        } catch (error) {
            await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
                logger.debug(`[TickerFileSink] temp cleanup failed path=${tempPath} error=${String(cleanupError)}`);
            });
            throw new PersistenceError(filePath, operation, error);
        }
    }
}
