import type { SourceId, TickerRow } from '@marketfeed/shared';
import { describeError } from '../errors';
import { logger } from '../utils/logger';
import { withTimeout } from '../utils/withTimeout';

export interface TickerPublisherRedisLike {
    // False while the client is connecting or reconnecting; commands sent then sit in the offline queue.
    isReady: boolean;
    publish: (channel: string, message: string) => Promise<number>;
}

export interface ITickerPublisher {
    publish(row: TickerRow): Promise<void>;
}

export const TICKER_CHANNEL_PREFIX = 'market_data:ticker:';

export const DEFAULT_PUBLISH_TIMEOUT_MS = 2_000;

export function tickerChannel(source: SourceId): string {
    return `${TICKER_CHANNEL_PREFIX}${source}`;
}

/**
 * Fans persisted ticker rows out over Redis pub/sub. Publishing is best
 * effort: failures and slow publishes are logged, never thrown.
 */
export class RedisTickerPublisher implements ITickerPublisher {
    constructor(
        private readonly redis: TickerPublisherRedisLike,
        private readonly timeoutMs: number = DEFAULT_PUBLISH_TIMEOUT_MS,
    ) {}

    public async publish(row: TickerRow): Promise<void> {
        const channel = tickerChannel(row.exchange);
        if (!this.redis.isReady) {
            logger.debug(`[TickerPublisher] redis not ready, dropped ${channel}`);
            return;
        }
        try {
            await withTimeout(`publish ${channel}`, this.timeoutMs, () => this.redis.publish(channel, JSON.stringify(row)));
        } catch (error) {
            logger.error(`[TickerPublisher] failed to publish ${channel}: ${describeError(error)}`);
        }
    }
}
