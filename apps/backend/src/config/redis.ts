import { createClient } from 'redis';
import dotenv from 'dotenv';
import path from 'path';
import { logger } from '../utils/logger';
import type { StateStoreRedisLike } from '../services/RedisStateStore';

dotenv.config({ path: path.join(__dirname, '../../../../.env') });

const redisUrl = process.env.REDIS_URL || 'redis://localhost:6379';

export const redisClient = createClient({
    url: redisUrl
});

redisClient.on('error', (err) => logger.error(`Redis client error: ${String(err)}`));
redisClient.on('connect', () => logger.info('Redis client connected'));

export const connectRedis = async () => {
    if (!redisClient.isOpen) {
        await redisClient.connect();
    }
};

export const disconnectRedis = async () => {
    if (redisClient.isOpen) {
        await redisClient.quit();
    }
};

export function createStateStoreRedis(client: typeof redisClient): StateStoreRedisLike {
    return {
        get isOpen() {
            return client.isOpen;
        },
        get: async (key) => {
            const value = await client.get(key);
            return typeof value === 'string' ? value : null;
        },
        set: async (key, value) => {
            await client.set(key, value);
        },
        del: async (keys) => {
            if (keys.length > 0) {
                await client.del(keys);
            }
        },
        sAdd: async (key, member) => {
            await client.sAdd(key, member);
        },
        sRem: async (key, member) => {
            await client.sRem(key, member);
        },
        sMembers: async (key) => (await client.sMembers(key)).map(String),
        rPush: async (key, value) => {
            await client.rPush(key, value);
        },
        lTrim: async (key, start, stop) => {
            await client.lTrim(key, start, stop);
        },
        lRange: async (key, start, stop) => (await client.lRange(key, start, stop)).map(String),
    };
}
