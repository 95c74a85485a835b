import { StoreUnavailableError, describeError } from '../errors';
import { createLogger } from '../logger';
import type { Store } from './types';

// =================================================================
// REDIS STORE
// =================================================================
//
// Shared backend for limiters running in many processes.
//
// compareAndSwap and increment run as Lua scripts: Redis executes a
// script without interleaving any other command, so GET + compare +
// SET is one atomic round-trip. Locking is per key by construction;
// nothing spans keys.
//
// Every client failure (connection refused, timeout, script error)
// is rethrown as StoreUnavailableError so the limiter's failure
// policy can decide what happens next.
// =================================================================

/** The subset of an ioredis client this store talks to. */
export interface RedisClient {
    get(key: string): Promise<string | null>;
    set(key: string, value: string, mode: 'PX', ttlMs: number): Promise<unknown>;
    eval(script: string, numKeys: number, ...args: string[]): Promise<unknown>;
    del(key: string): Promise<number>;
    quit(): Promise<unknown>;
}

// KEYS[1] key; ARGV: expectAbsent ('1'|'0'), expected, next, ttlMs
export const COMPARE_AND_SWAP_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if ARGV[1] == '1' then
  if current then return 0 end
elseif current ~= ARGV[2] then
  return 0
end
redis.call('SET', KEYS[1], ARGV[3], 'PX', ARGV[4])
return 1
`;

// KEYS[1] key; ARGV: by, ttlMs
export const INCREMENT_SCRIPT = `
local value = redis.call('INCRBY', KEYS[1], ARGV[1])
if redis.call('PTTL', KEYS[1]) == -1 then
  redis.call('PEXPIRE', KEYS[1], ARGV[2])
end
return value
`;

const log = createLogger('redis-store');

export class RedisStore implements Store {
    constructor(private client: RedisClient) {}

    async get(key: string): Promise<string | null> {
        return this.run('GET', key, () => this.client.get(key));
    }

    async set(key: string, value: string, ttlMs: number): Promise<void> {
        await this.run('SET', key, () => this.client.set(key, value, 'PX', toTtl(ttlMs)));
    }

    async compareAndSwap(key: string, expected: string | null, next: string, ttlMs: number): Promise<boolean> {
        const reply = await this.run('CAS', key, () =>
            this.client.eval(
                COMPARE_AND_SWAP_SCRIPT,
                1,
                key,
                expected === null ? '1' : '0',
                expected ?? '',
                next,
                String(toTtl(ttlMs))
            )
        );
        return Number(reply) === 1;
    }

    async increment(key: string, by: number, ttlMs: number): Promise<number> {
        const reply = await this.run('INCR', key, () =>
            this.client.eval(INCREMENT_SCRIPT, 1, key, String(by), String(toTtl(ttlMs)))
        );
        const value = Number(reply);
        if (!Number.isInteger(value)) {
            throw new StoreUnavailableError(`unexpected INCRBY reply for "${key}": ${String(reply)}`);
        }
        return value;
    }

    async delete(key: string): Promise<void> {
        await this.run('DEL', key, () => this.client.del(key));
    }

    async close(): Promise<void> {
        await this.run('QUIT', '', () => this.client.quit());
    }

    private async run<T>(op: string, key: string, call: () => Promise<T>): Promise<T> {
        try {
            return await call();
        } catch (err) {
            log.debug('redis command failed', { op, key, error: describeError(err) });
            throw new StoreUnavailableError(`redis ${op} failed: ${describeError(err)}`, err);
        }
    }
}

// PX rejects 0 and fractions.
function toTtl(ttlMs: number): number {
    return Math.max(1, Math.ceil(ttlMs));
}
