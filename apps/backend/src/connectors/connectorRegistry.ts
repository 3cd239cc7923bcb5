import { normalizeSourceId, type SourceId } from '@marketfeed/shared';
import type { FeedSettings } from '../config/settings';
import { ConfigurationError, UnknownSourceError, describeError } from '../errors';
import { logger } from '../utils/logger';
import type { ISourceConnector } from './interfaces';
import { SOURCE_CATALOG, type SourceCatalog } from './sourceCatalog';
import { VendorSourceConnector } from './VendorSourceConnector';

/**
 * Source id → connector, built once at startup and read-only afterwards.
 */
export class ConnectorRegistry {
    private readonly connectors: ReadonlyMap<SourceId, ISourceConnector>;

    private constructor(connectors: ISourceConnector[]) {
        this.connectors = new Map(connectors.map((connector) => [connector.source, connector]));
    }

    public static fromSettings(settings: FeedSettings, catalog: SourceCatalog = SOURCE_CATALOG): ConnectorRegistry {
        const issues: string[] = [];
        const connectors: ISourceConnector[] = [];
        for (const source of settings.sources) {
            const variant = catalog.get(source.id);
            if (!variant) {
                issues.push(`${source.id}: unsupported source (known: ${Array.from(catalog.keys()).join(', ')})`);
                continue;
            }
            try {
                const exchange = variant.create({
                    apiKey: source.credentials?.apiKey,
                    secret: source.credentials?.secret,
                    sandbox: source.sandbox,
                }, source.symbols);
                connectors.push(new VendorSourceConnector(source.id, exchange));
                logger.info(
                    `[ConnectorRegistry] ${source.id} -> ${variant.vendorId ?? 'built-in'}`
                    + ` (sandbox=${source.sandbox ? 'true' : 'false'}, credentials=${source.credentials ? 'yes' : 'no'})`,
                );
            } catch (error) {
                issues.push(`${source.id}: cannot construct connector: ${describeError(error)}`);
            }
        }
        if (issues.length > 0) {
            throw new ConfigurationError('Connector registry construction failed', issues);
        }
        return new ConnectorRegistry(connectors);
    }

    public static fromConnectors(connectors: ISourceConnector[]): ConnectorRegistry {
        return new ConnectorRegistry(connectors);
    }

    public has(source: string): boolean {
        return this.connectors.has(normalizeSourceId(source));
    }

    public get(source: string): ISourceConnector {
        const connector = this.connectors.get(normalizeSourceId(source));
        if (!connector) {
            throw new UnknownSourceError(source);
        }
        return connector;
    }

    public sources(): SourceId[] {
        return Array.from(this.connectors.keys());
    }

    /** Closes every connector; failures are logged, not thrown. */
    public async closeAll(): Promise<void> {
        const results = await Promise.allSettled(Array.from(this.connectors.values()).map((connector) => connector.close()));
        results.forEach((result) => {
            if (result.status === 'rejected') {
                logger.warn(`[ConnectorRegistry] close failed: ${describeError(result.reason)}`);
            }
        });
    }
}
