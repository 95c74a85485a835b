import { type Clock, SystemClock } from './clock';
import { type FailurePolicy, type LimiterConfig, type LimiterConfigInput, parseLimiterConfig } from './config';
import { StoreUnavailableError, describeError } from './errors';
import { createLogger } from './logger';
import { FixedWindowRateLimiter } from './rate-limiters/fixed-window';
import { LeakyBucketRateLimiter } from './rate-limiters/leaky-bucket';
import { SlidingCounterRateLimiter } from './rate-limiters/sliding-counter';
import { SlidingLogRateLimiter } from './rate-limiters/sliding-log';
import type { StoredLimiterOptions } from './rate-limiters/stored-limiter';
import { TokenBucketRateLimiter } from './rate-limiters/token-bucket';
import type { AlgorithmName, Decision, RateLimiter } from './rate-limiters/types';
import { MemoryStore } from './stores/memory-store';
import type { Store } from './stores/types';

// =================================================================
// LIMITER — the object callers embed
// =================================================================
//
// Binds one validated config to a Store and a Clock. Picks the
// algorithm once, here, and forwards every decide() to it.
//
// Store trouble (unreachable, erroring, too slow, too contended) is
// never thrown to the caller. failurePolicy turns it into a Decision:
//
//   fail_open   → allowed, remaining -1 (unknown)
//   fail_closed → denied, retry in a second
//
// ConfigurationError is always thrown: retrying can't fix it.
// =================================================================

export interface DecideOptions {
    /** Overrides config.timeoutMs for this call. */
    timeoutMs?: number;
}

export interface LimiterDeps {
    store?: Store;
    clock?: Clock;
}

const FAIL_CLOSED_RETRY_MS = 1000;

const log = createLogger('limiter');

export class Limiter {
    readonly config: LimiterConfig;
    private readonly store: Store;
    private readonly clock: Clock;
    private readonly limiter: RateLimiter;

    constructor(config: LimiterConfigInput, deps: LimiterDeps = {}) {
        this.config = parseLimiterConfig(config);
        this.clock = deps.clock ?? new SystemClock();
        this.store = deps.store ?? new MemoryStore(this.clock);
        this.limiter = createRateLimiter(this.config, {
            store: this.store,
            clock: this.clock,
            keyPrefix: this.config.keyPrefix,
            maxRetries: this.config.maxRetries,
        });
    }

    get algorithm(): AlgorithmName {
        return this.limiter.name;
    }

    get failurePolicy(): FailurePolicy {
        return this.config.failurePolicy;
    }

    async decide(key: string, cost: number = 1, options: DecideOptions = {}): Promise<Decision> {
        try {
            return await this.withTimeout(
                (signal) => this.limiter.consume(key, cost, signal),
                options.timeoutMs
            );
        } catch (err) {
            if (err instanceof StoreUnavailableError) {
                return this.onStoreFailure(key, err);
            }
            throw err;
        }
    }

    /** Forget a key's state. Store errors propagate. */
    async reset(key: string): Promise<void> {
        await this.withTimeout(() => this.limiter.reset(key));
    }

    async close(): Promise<void> {
        await this.store.close();
    }

    private onStoreFailure(key: string, err: StoreUnavailableError): Decision {
        const now = this.clock.now();
        const { capacity, failurePolicy } = this.config;

        log.warn('store unavailable, applying failure policy', {
            key,
            algorithm: this.algorithm,
            failurePolicy,
            errorType: err.type,
            error: describeError(err),
        });

        if (failurePolicy === 'fail_open') {
            return { allowed: true, limit: capacity, remaining: -1, resetAt: now };
        }
        return {
            allowed: false,
            limit: capacity,
            remaining: 0,
            resetAt: now + FAIL_CLOSED_RETRY_MS,
            retryAfter: FAIL_CLOSED_RETRY_MS,
        };
    }

    /**
     * Runs `work` against a deadline. When it passes, the caller gets a
     * StoreUnavailableError and `work` sees its signal abort, so it
     * stops before writing anything more.
     */
    private withTimeout<T>(
        work: (signal?: AbortSignal) => Promise<T>,
        timeoutMs = this.config.timeoutMs
    ): Promise<T> {
        if (timeoutMs === undefined) {
            return work();
        }

        const controller = new AbortController();
        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                const err = new StoreUnavailableError(`store did not answer within ${timeoutMs}ms`);
                controller.abort(err);
                reject(err);
            }, timeoutMs);
        });
        return Promise.race([work(controller.signal), timeout]).finally(() => clearTimeout(timer));
    }
}

export function createRateLimiter(config: LimiterConfig, options: StoredLimiterOptions): RateLimiter {
    switch (config.algorithm) {
        case 'token_bucket':
            return new TokenBucketRateLimiter(config.capacity, config.refillRate, options);
        case 'leaky_bucket':
            return new LeakyBucketRateLimiter(config.capacity, config.refillRate, options);
        case 'fixed_window':
            return new FixedWindowRateLimiter(config.capacity, config.windowMs, options);
        case 'sliding_log':
            return new SlidingLogRateLimiter(config.capacity, config.windowMs, options);
        case 'sliding_counter':
            return new SlidingCounterRateLimiter(config.capacity, config.windowMs, options);
    }
}
