export type MarketFeedErrorCode =
    | 'CONFIGURATION'
    | 'UNKNOWN_SOURCE'
    | 'CONNECTOR'
    | 'NORMALIZATION'
    | 'PERSISTENCE';

export abstract class MarketFeedError extends Error {
    public abstract readonly code: MarketFeedErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Fatal at startup: unknown source id, malformed interval, invalid env or sources file.
 */
export class ConfigurationError extends MarketFeedError {
    public readonly code = 'CONFIGURATION';
    public readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super(issues.length > 0 ? `${message}:\n${issues.map((issue) => `- ${issue}`).join('\n')}` : message);
        this.issues = issues;
    }
}

export class UnknownSourceError extends MarketFeedError {
    public readonly code = 'UNKNOWN_SOURCE';

    constructor(public readonly source: string) {
        super(`Source "${source}" is not configured`);
    }
}

export class ConnectorError extends MarketFeedError {
    public readonly code = 'CONNECTOR';

    constructor(
        public readonly source: string,
        public readonly operation: string,
        public readonly reason: string,
        cause?: unknown,
    ) {
        super(`${source} ${operation} failed: ${reason}`, { cause });
    }
}

export class NormalizationError extends MarketFeedError {
    public readonly code = 'NORMALIZATION';

    constructor(
        public readonly source: string,
        public readonly field: string,
        detail: string,
    ) {
        super(`${source} payload rejected at "${field}": ${detail}`);
    }
}

export class PersistenceError extends MarketFeedError {
    public readonly code = 'PERSISTENCE';

    constructor(
        public readonly path: string,
        public readonly operation: string,
        cause?: unknown,
    ) {
        super(`${operation} ${path} failed: ${describeError(cause)}`, { cause });
    }
}

export function describeError(error: unknown): string {
    if (error instanceof MarketFeedError) {
        return error.message;
    }
    if (error instanceof Error) {
        const code = 'code' in error && typeof error.code === 'string' ? error.code : null;
        return code ? `${code} ${error.message}` : error.message;
    }
    return String(error);
}
