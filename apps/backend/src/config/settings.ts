import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { normalizeSourceId, sourceEnvPrefix, type SourceId } from '@marketfeed/shared';
import { ConfigurationError } from '../errors';

export type OutputFormat = 'csv' | 'json';

export interface SourceCredentials {
    apiKey: string;
    secret: string;
}

export interface SourceSettings {
    readonly id: SourceId;
    readonly symbols: readonly string[];
    readonly intervalMs: number;
    readonly sandbox: boolean;
    readonly credentials: SourceCredentials | null;
}

export interface FeedSettings {
    readonly sources: readonly SourceSettings[];
    readonly defaultIntervalMs: number;
    readonly sandboxMode: boolean;
    readonly outputDir: string;
    readonly outputFormats: readonly OutputFormat[];
    readonly queryTimeoutMs: number;
    readonly orderBookDepth: number;
    readonly tradesLimit: number;
    readonly symbolDirectoryUrl: string;
    readonly redisUrl: string | null;
    readonly port: number;
}

type Env = Record<string, string | undefined>;

const BACKEND_ROOT = path.resolve(__dirname, '..', '..');
export const DEFAULT_SOURCES_FILE = path.join(BACKEND_ROOT, 'config', 'sources.json');
export const DEFAULT_SYMBOL_DIRECTORY_URL = 'https://gomarket-api.goquant.io';

function boundedNumber(name: string, fallback: number, bounds: { min: number; max: number; integer?: boolean }) {
    return z.string().optional().transform((input, ctx) => {
        const trimmed = (input || '').trim();
        if (trimmed.length === 0) {
            return fallback;
        }
        const parsed = Number(trimmed);
        if (!Number.isFinite(parsed)) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be a finite number (got "${trimmed}")` });
            return z.NEVER;
        }
        if (bounds.integer && !Number.isInteger(parsed)) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be an integer (got ${parsed})` });
            return z.NEVER;
        }
        if (parsed < bounds.min || parsed > bounds.max) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: `${name} out of range [${bounds.min}, ${bounds.max}] (got ${parsed})`,
            });
            return z.NEVER;
        }
        return parsed;
    });
}

const booleanFlag = z.string().optional().transform((input) => (input || '').trim().toLowerCase() === 'true');

const optionalText = z.string().optional().transform((input) => {
    const trimmed = (input || '').trim();
    return trimmed.length > 0 ? trimmed : null;
});

const envSchema = z.object({
    ENABLED_SOURCES: optionalText,
    SOURCES_FILE: optionalText,
    REFRESH_INTERVAL: boundedNumber('REFRESH_INTERVAL', 5, { min: 0.01, max: 86_400 }),
    SANDBOX_MODE: booleanFlag,
    OUTPUT_DIR: optionalText,
    OUTPUT_FORMATS: optionalText,
    QUERY_TIMEOUT_MS: boundedNumber('QUERY_TIMEOUT_MS', 10_000, { min: 500, max: 120_000, integer: true }),
    ORDERBOOK_DEPTH: boundedNumber('ORDERBOOK_DEPTH', 20, { min: 1, max: 5_000, integer: true }),
    TRADES_LIMIT: boundedNumber('TRADES_LIMIT', 50, { min: 1, max: 1_000, integer: true }),
    SYMBOL_DIRECTORY_URL: optionalText,
    REDIS_URL: optionalText,
    PORT: boundedNumber('PORT', 8000, { min: 1, max: 65_535, integer: true }),
});

const sourceEntrySchema = z.object({
    symbols: z.array(z.string().trim().min(1)),
    intervalSeconds: z.number().positive().max(86_400).optional(),
    sandbox: z.boolean().optional(),
});

const sourcesFileSchema = z.object({
    enabled: z.array(z.string().trim().min(1)).default([]),
    sources: z.record(sourceEntrySchema),
});

export type SourcesFile = z.infer<typeof sourcesFileSchema>;

export function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => {
        const issuePath = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
        return `${issuePath}${issue.message}`;
    });
}

function parseOutputFormats(raw: string | null, issues: string[]): OutputFormat[] {
    if (!raw) {
        return ['csv', 'json'];
    }
    const formats = new Set<OutputFormat>();
    for (const token of raw.split(',').map((part) => part.trim().toLowerCase()).filter((part) => part.length > 0)) {
        if (token === 'csv' || token === 'json') {
            formats.add(token);
        } else {
            issues.push(`OUTPUT_FORMATS: unsupported format "${token}"`);
        }
    }
    if (formats.size === 0) {
        issues.push('OUTPUT_FORMATS: at least one of csv, json is required');
    }
    return Array.from(formats);
}

function credentialsFor(env: Env, source: SourceId): SourceCredentials | null {
    const prefix = sourceEnvPrefix(source);
    const apiKey = (env[`${prefix}_API_KEY`] || '').trim();
    const secret = (env[`${prefix}_API_SECRET`] || '').trim();
    if (apiKey.length === 0 || secret.length === 0) {
        return null;
    }
    return { apiKey, secret };
}

export async function readSourcesFile(filePath: string): Promise<SourcesFile> {
    let content: string;
    try {
        content = await fs.readFile(filePath, 'utf8');
    } catch (error) {
        throw new ConfigurationError(`Cannot read sources file ${filePath}: ${String(error)}`);
    }
    let payload: unknown;
    try {
        payload = JSON.parse(content);
    } catch (error) {
        throw new ConfigurationError(`Sources file ${filePath} is not valid JSON: ${String(error)}`);
    }
    const parsed = sourcesFileSchema.safeParse(payload);
    if (!parsed.success) {
        throw new ConfigurationError(`Sources file ${filePath} is invalid`, formatIssues(parsed.error));
    }
    return parsed.data;
}

/**
 * Builds the immutable settings snapshot for the run. Every problem found is
 * reported at once in a single ConfigurationError.
 */
export function buildSettings(env: Env, sourcesFile: SourcesFile): FeedSettings {
    const parsedEnv = envSchema.safeParse(env);
    if (!parsedEnv.success) {
        throw new ConfigurationError('Startup config validation failed', formatIssues(parsedEnv.error));
    }
    const values = parsedEnv.data;
    const issues: string[] = [];

    const fileSources = new Map<SourceId, SourcesFile['sources'][string]>();
    for (const [rawId, entry] of Object.entries(sourcesFile.sources)) {
        fileSources.set(normalizeSourceId(rawId), entry);
    }

    const enabledRaw = values.ENABLED_SOURCES
        ? values.ENABLED_SOURCES.split(',')
        : sourcesFile.enabled;
    const enabled = Array.from(new Set(
        enabledRaw.map((id) => normalizeSourceId(id)).filter((id) => id.length > 0),
    ));

    const defaultIntervalMs = Math.round(values.REFRESH_INTERVAL * 1000);
    const sources: SourceSettings[] = [];
    for (const id of enabled) {
        const entry = fileSources.get(id);
        if (!entry) {
            issues.push(`${id}: enabled but has no entry in the sources file`);
            continue;
        }
        const symbols = Array.from(new Set(entry.symbols.map((symbol) => symbol.trim())));
        sources.push(Object.freeze({
            id,
            symbols: Object.freeze(symbols),
            intervalMs: entry.intervalSeconds !== undefined
                ? Math.round(entry.intervalSeconds * 1000)
                : defaultIntervalMs,
            sandbox: entry.sandbox ?? values.SANDBOX_MODE,
            credentials: credentialsFor(env, id),
        }));
    }

    const outputFormats = parseOutputFormats(values.OUTPUT_FORMATS, issues);

    if (issues.length > 0) {
        throw new ConfigurationError('Startup config validation failed', issues);
    }

    return Object.freeze({
        sources: Object.freeze(sources),
        defaultIntervalMs,
        sandboxMode: values.SANDBOX_MODE,
        outputDir: path.resolve(values.OUTPUT_DIR || path.join('data', 'raw')),
        outputFormats: Object.freeze(outputFormats),
        queryTimeoutMs: values.QUERY_TIMEOUT_MS,
        orderBookDepth: values.ORDERBOOK_DEPTH,
        tradesLimit: values.TRADES_LIMIT,
        symbolDirectoryUrl: (values.SYMBOL_DIRECTORY_URL || DEFAULT_SYMBOL_DIRECTORY_URL).replace(/\/+$/, ''),
        redisUrl: values.REDIS_URL,
        port: values.PORT,
    });
}

export async function loadSettings(env: Env = process.env): Promise<FeedSettings> {
    const configuredFile = (env.SOURCES_FILE || '').trim();
    const filePath = configuredFile.length > 0 ? path.resolve(configuredFile) : DEFAULT_SOURCES_FILE;
    const sourcesFile = await readSourcesFile(filePath);
    return buildSettings(env, sourcesFile);
}
