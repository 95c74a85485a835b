import Redis from 'ioredis';
import type { Clock } from '../clock';
import { MemoryStore } from './memory-store';
import { RedisStore } from './redis-store';
import type { Store } from './types';

export { MemoryStore } from './memory-store';
export { RedisStore } from './redis-store';
export type { RedisClient } from './redis-store';
export type { Store } from './types';

/**
 * Connect to Redis. The offline queue is disabled so that a lost
 * connection fails commands at once instead of buffering them.
 */
export function createRedisStore(url: string): RedisStore {
    const client = new Redis(url, {
        enableOfflineQueue: false,
        maxRetriesPerRequest: 1,
    });
    return new RedisStore(client);
}

/** RedisStore when REDIS_URL is set, MemoryStore otherwise. */
export function createStore(env: NodeJS.ProcessEnv = process.env, clock?: Clock): Store {
    const url = env.REDIS_URL?.trim();
    if (url) {
        return createRedisStore(url);
    }
    return new MemoryStore(clock);
}
