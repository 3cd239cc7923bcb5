import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { Ticker } from '@marketfeed/shared';
import { CSV_HEADER, TickerFileSink, escapeCsvField, formatCsvRow, tickerFilePath } from './TickerFileSink';
import { NormalizationError, PersistenceError } from '../errors';
import { logger } from '../utils/logger';

function ticker(symbol: string, last: number | undefined, second = 0): Ticker {
    const base = {
        source: 'simulated',
        symbol,
        timestamp: new Date(Date.UTC(2024, 0, 1, 0, 0, second)).toISOString(),
    };
    return last === undefined ? base : { ...base, last };
}

describe('CSV formatting', () => {
    it('quotes only fields that need it', () => {
        expect(escapeCsvField('BTC/USDT')).toBe('BTC/USDT');
        expect(escapeCsvField('ODD,PAIR')).toBe('"ODD,PAIR"');
        expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
        expect(escapeCsvField('two\nlines')).toBe('"two\nlines"');
    });

    it('writes fields in header order', () => {
        expect(CSV_HEADER).toBe('timestamp,exchange,symbol,price\n');
        expect(formatCsvRow({ timestamp: 't', exchange: 'okx', symbol: 'A,B', price: '1.5' })).toBe('t,okx,"A,B",1.5\n');
    });

    it('names files per source and format', () => {
        expect(tickerFilePath('/data', 'okx', 'csv')).toBe(path.join('/data', 'okx_ticker.csv'));
    });
});

describe('TickerFileSink', () => {
    let dir: string;
    let outputDir: string;

    beforeEach(async () => {
        jest.spyOn(logger, 'info').mockImplementation(() => logger);
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ticker-sink-'));
        outputDir = path.join(dir, 'nested', 'raw');
    });

    afterEach(async () => {
        jest.restoreAllMocks();
        await fs.rm(dir, { recursive: true, force: true });
    });

    const readText = (source: string, format: 'csv' | 'json') => fs.readFile(tickerFilePath(outputDir, source, format), 'utf8');

    it('reset creates the directory and writes empty destinations', async () => {
        const sink = new TickerFileSink({ outputDir, formats: ['csv', 'json'] });
        await sink.reset('simulated');

        expect(await readText('simulated', 'csv')).toBe(CSV_HEADER);
        expect(await readText('simulated', 'json')).toBe('[]\n');
    });

    it('appends rows to both destinations and reset clears them', async () => {
        const sink = new TickerFileSink({ outputDir, formats: ['csv', 'json'] });
        await sink.reset('simulated');

        const row = await sink.appendTicker(ticker('BTC/USDT', 35001.5, 1));
        await sink.appendTicker(ticker('ODD,PAIR', 2, 2));

        expect(row).toEqual({ timestamp: '2024-01-01T00:00:01.000Z', exchange: 'simulated', symbol: 'BTC/USDT', price: '35001.5' });
        expect(await readText('simulated', 'csv')).toBe(
            'timestamp,exchange,symbol,price\n'
            + '2024-01-01T00:00:01.000Z,simulated,BTC/USDT,35001.5\n'
            + '2024-01-01T00:00:02.000Z,simulated,"ODD,PAIR",2\n',
        );
        expect(JSON.parse(await readText('simulated', 'json'))).toEqual([
            { timestamp: '2024-01-01T00:00:01.000Z', exchange: 'simulated', symbol: 'BTC/USDT', price: '35001.5' },
            { timestamp: '2024-01-01T00:00:02.000Z', exchange: 'simulated', symbol: 'ODD,PAIR', price: '2' },
        ]);

        await sink.reset('simulated');
        await sink.reset('simulated');
        expect(await readText('simulated', 'csv')).toBe(CSV_HEADER);
        expect(await readText('simulated', 'json')).toBe('[]\n');
    });

    it('writes the CSV header before the first row when the file is missing', async () => {
        const sink = new TickerFileSink({ outputDir, formats: ['csv'] });
        await sink.appendTicker(ticker('ETH/USDT', 2001, 3));

        expect(await readText('simulated', 'csv')).toBe(`${CSV_HEADER}2024-01-01T00:00:03.000Z,simulated,ETH/USDT,2001\n`);
        await expect(readText('simulated', 'json')).rejects.toMatchObject({ code: 'ENOENT' });
    });

    it('serializes concurrent appends to the same destination', async () => {
        const sink = new TickerFileSink({ outputDir, formats: ['csv', 'json'] });
        await sink.reset('simulated');

        await Promise.all(Array.from({ length: 20 }, (_, i) => sink.appendTicker(ticker('BTC/USDT', 100 + i, i))));
        await sink.flush();

        const lines = (await readText('simulated', 'csv')).trimEnd().split('\n');
        expect(lines).toHaveLength(21);
        const rows: unknown = JSON.parse(await readText('simulated', 'json'));
        expect(Array.isArray(rows) ? rows.length : -1).toBe(20);
        expect((await fs.readdir(outputDir)).sort()).toEqual(['simulated_ticker.csv', 'simulated_ticker.json']);
    });

    it('reports a corrupt JSON destination as a persistence failure', async () => {
        const sink = new TickerFileSink({ outputDir, formats: ['json'] });
        await sink.reset('simulated');
        await fs.writeFile(tickerFilePath(outputDir, 'simulated', 'json'), '{"not":"an array"', 'utf8');

        const failure = sink.appendTicker(ticker('BTC/USDT', 1));
        await expect(failure).rejects.toBeInstanceOf(PersistenceError);
        await expect(failure).rejects.toMatchObject({ operation: 'parse' });
    });

    it('reports a non-array JSON destination as a persistence failure', async () => {
        const sink = new TickerFileSink({ outputDir, formats: ['json'] });
        await sink.reset('simulated');
        await fs.writeFile(tickerFilePath(outputDir, 'simulated', 'json'), '{"rows":[]}', 'utf8');

        await expect(sink.appendTicker(ticker('BTC/USDT', 1))).rejects.toThrow('top-level value is not an array');
    });

    it('rejects a ticker without a last price before touching the files', async () => {
        const sink = new TickerFileSink({ outputDir, formats: ['csv'] });
        await sink.reset('simulated');

        await expect(sink.appendTicker(ticker('BTC/USDT', undefined))).rejects.toBeInstanceOf(NormalizationError);
        expect(await readText('simulated', 'csv')).toBe(CSV_HEADER);
    });

    it('fails reset with a persistence error when the directory cannot be created', async () => {
        const blocker = path.join(dir, 'blocker');
        await fs.writeFile(blocker, 'x', 'utf8');
        const sink = new TickerFileSink({ outputDir: path.join(blocker, 'raw'), formats: ['csv'] });

        await expect(sink.reset('simulated')).rejects.toMatchObject({ name: 'PersistenceError', operation: 'mkdir' });
    });
});
