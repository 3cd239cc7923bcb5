import { createClient } from 'redis';
import { logger } from '../utils/logger';

export type RedisClient = ReturnType<typeof createClient>;

export function createRedisClient(redisUrl: string): RedisClient {
    const client = createClient({
        url: redisUrl,
    });

    client.on('error', (err) => logger.error(`Redis client error: ${String(err)}`));
    client.on('connect', () => logger.info('Redis client connected'));
    return client;
}

export const connectRedis = async (client: RedisClient) => {
    if (!client.isOpen) {
        await client.connect();
    }
};

export const disconnectRedis = async (client: RedisClient) => {
    if (client.isOpen) {
        await client.quit();
    }
};
