import type { Ticker } from '@marketfeed/shared';
import type { FeedSettings } from '../config/settings';
import type { ConnectorRegistry } from '../connectors/connectorRegistry';
import { PersistenceError, describeError, ConnectorError, NormalizationError } from '../errors';
import { toTicker, toTickerRow } from '../modules/normalize/normalizer';
import {
    PollingScheduler,
    pollTargetKey,
    type PollStage,
    type PollTarget,
    type PollTargetSnapshot,
} from '../modules/runtime/scheduler';
import { logger } from '../utils/logger';
import type { ITickerPublisher } from './TickerPublisher';
import type { ITickerSink } from './TickerFileSink';

// Consecutive persistence failures per source before logging turns to error.
export const PERSISTENCE_ESCALATION_THRESHOLD = 3;

export interface TickerFeedDeps {
    settings: FeedSettings;
    registry: ConnectorRegistry;
    sink: ITickerSink;
    publisher?: ITickerPublisher | null;
    now?: () => number;
}

/**
 * Continuous path: one poll target per configured (source, symbol), each tick
 * fetching a ticker, normalizing it and appending it to the source's files.
 */
export class TickerFeedService {
    private readonly scheduler: PollingScheduler<unknown, Ticker>;
    private readonly persistenceFailures = new Map<string, number>();
    private starting: Promise<void> | null = null;
    private stopping: Promise<void> | null = null;

    constructor(private readonly deps: TickerFeedDeps) {
        this.scheduler = new PollingScheduler<unknown, Ticker>({
            fetch: (target) => this.deps.registry.get(target.source).fetchRawTicker(target.symbol),
            normalize: (raw, target) => {
                const ticker = toTicker(raw, target.source, target.symbol);
                // A ticker that cannot become a row fails here, not in the sink.
                toTickerRow(ticker);
                return ticker;
            },
            persist: (ticker, target) => this.persist(ticker, target),
        }, {
            onError: (target, stage, error) => this.handleTickError(target, stage, error),
            now: deps.now,
        });
    }

    /**
     * Resets every configured source's files once, then starts polling.
     * A source whose reset fails is left unscheduled.
     */
    public start(): Promise<void> {
        if (!this.starting) {
            this.starting = this.resetAndSchedule();
        }
        return this.starting;
    }

    /**
     * Waits for a start in progress, then stops polling and flushes the sink.
     * Nothing is scheduled once stop has been requested.
     */
    public stop(): Promise<void> {
        if (!this.stopping) {
            this.stopping = this.shutdown();
        }
        return this.stopping;
    }

    public snapshot(): PollTargetSnapshot[] {
        return this.scheduler.snapshot();
    }

    private async shutdown(): Promise<void> {
        if (this.starting) {
            try {
                await this.starting;
            } catch (error) {
                logger.warn(`[TickerFeed] start did not complete before stop: ${describeError(error)}`);
            }
        }
        await this.scheduler.stop();
        await this.deps.sink.flush();
    }

    private async resetAndSchedule(): Promise<void> {
        let targets = 0;
        for (const source of this.deps.settings.sources) {
            if (this.stopping) {
                logger.info('[TickerFeed] stop requested during startup, not polling');
                return;
            }
            try {
                await this.deps.sink.reset(source.id);
            } catch (error) {
                logger.error(`[TickerFeed] reset failed for ${source.id}, not polling it: ${describeError(error)}`);
                continue;
            }
            for (const symbol of source.symbols) {
                this.scheduler.register({ source: source.id, symbol, intervalMs: source.intervalMs });
                targets += 1;
            }
        }
        if (this.stopping) {
            logger.info('[TickerFeed] stop requested during startup, not polling');
            return;
        }
        this.scheduler.start();
        logger.info(`[TickerFeed] polling ${targets} target(s) across ${this.deps.settings.sources.length} source(s)`);
    }

    private async persist(ticker: Ticker, target: PollTarget): Promise<void> {
        const row = await this.deps.sink.appendTicker(ticker);
        this.persistenceFailures.delete(target.source);
        logger.debug(`[TickerFeed] ${pollTargetKey(target)} last=${row.price} at ${row.timestamp}`);
        // Fire and forget: a slow subscriber fan-out must not hold the target in `persisting`.
        void this.deps.publisher?.publish(row).catch((error: unknown) => {
            logger.error(`[TickerFeed] ${pollTargetKey(target)} publish failed: ${describeError(error)}`);
        });
    }

    private handleTickError(target: PollTarget, stage: PollStage, error: unknown): void {
        const key = pollTargetKey(target);
        if (error instanceof PersistenceError) {
            const failures = (this.persistenceFailures.get(target.source) ?? 0) + 1;
            this.persistenceFailures.set(target.source, failures);
            const message = `[TickerFeed] ${key} persist failed (${failures} consecutive for ${target.source}): ${error.message}`;
            if (failures >= PERSISTENCE_ESCALATION_THRESHOLD) {
                logger.error(message);
            } else {
                logger.warn(message);
            }
            return;
        }
        if (error instanceof ConnectorError || error instanceof NormalizationError) {
            logger.warn(`[TickerFeed] ${key} ${stage} failed: ${error.message}`);
            return;
        }
        logger.error(`[TickerFeed] ${key} ${stage} failed unexpectedly: ${describeError(error)}`);
    }
}
