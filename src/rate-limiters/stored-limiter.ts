import type { ZodType } from 'zod';
import type { Clock } from '../clock';
import { ConfigurationError, ContentionError, StoreUnavailableError } from '../errors';
import { createLogger } from '../logger';
import type { Store } from '../stores/types';
import type { AlgorithmName, Decision, RateLimiter, Transition } from './types';

// =================================================================
// STORED RATE LIMITER — shared read / compute / compare-and-swap loop
// =================================================================
//
// Every algorithm keeps its per-key state in the Store, never in
// memory. One consume() call:
//
//   1. GET the encoded state (absent → algorithm's initial state)
//   2. apply(state, now, cost) → new state + Decision   (pure math)
//   3. CAS the new encoding, expecting exactly the bytes from step 1
//   4. CAS lost to a concurrent caller → back to 1, at most maxRetries
//
// An aborted signal stops the loop before the next GET or CAS, so a
// caller that has already been answered never spends quota.
//
// There are no timers. Anything a "reset every minute" timer would
// do is recomputed in apply() from the stored timestamps.
// =================================================================

export const DEFAULT_MAX_RETRIES = 10;

export interface StoredLimiterOptions {
    store: Store;
    clock: Clock;
    keyPrefix?: string;
    maxRetries?: number;
}

const log = createLogger('rate-limiter');

export abstract class StoredRateLimiter<S> implements RateLimiter {
    abstract readonly name: AlgorithmName;

    protected readonly store: Store;
    protected readonly clock: Clock;
    private readonly keyPrefix: string;
    private readonly maxRetries: number;

    constructor(
        protected readonly capacity: number,
        options: StoredLimiterOptions
    ) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new ConfigurationError(`capacity must be a positive integer, got ${capacity}`);
        }
        this.store = options.store;
        this.clock = options.clock;
        this.keyPrefix = options.keyPrefix ?? 'ratelimit';
        this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
        if (!Number.isInteger(this.maxRetries) || this.maxRetries < 1) {
            throw new ConfigurationError(`maxRetries must be a positive integer, got ${this.maxRetries}`);
        }
    }

    /** Fresh state for a key seen for the first time (or after expiry). */
    abstract initialState(now: number): S;

    /** Pure transition: admit or deny `cost` units at `now`. */
    abstract apply(state: S, now: number, cost: number): Transition<S>;

    /** How long an untouched record stays meaningful. */
    abstract ttlMs(): number;

    /** Validates what comes back from the store. */
    protected abstract readonly schema: ZodType<S>;

    async consume(key: string, cost: number = 1, signal?: AbortSignal): Promise<Decision> {
        this.checkCost(cost);
        const storeKey = this.storeKey(key);

        for (let attempt = 0; attempt < this.maxRetries; attempt++) {
            this.checkSignal(storeKey, signal);
            const raw = await this.store.get(storeKey);
            const now = this.clock.now();
            const state = this.decode(raw, storeKey, now);
            const { state: next, decision } = this.apply(state, now, cost);

            this.checkSignal(storeKey, signal);
            if (await this.store.compareAndSwap(storeKey, raw, this.encode(next), this.ttlMs())) {
                return decision;
            }
        }

        throw new ContentionError(storeKey, this.maxRetries);
    }

    async reset(key: string): Promise<void> {
        await this.store.delete(this.storeKey(key));
    }

    /** Read back the persisted state for a key, if any. */
    async inspect(key: string): Promise<S | null> {
        const storeKey = this.storeKey(key);
        const raw = await this.store.get(storeKey);
        return raw === null ? null : this.decode(raw, storeKey, this.clock.now());
    }

    encode(state: S): string {
        return JSON.stringify(state);
    }

    decode(raw: string | null, storeKey: string, now: number): S {
        if (raw === null) {
            return this.initialState(now);
        }

        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch (err) {
            log.warn('discarding unreadable state', { key: storeKey, algorithm: this.name, error: String(err) });
            return this.initialState(now);
        }

        const parsed = this.schema.safeParse(json);
        if (!parsed.success) {
            log.warn('discarding invalid state', { key: storeKey, algorithm: this.name, issues: parsed.error.issues });
            return this.initialState(now);
        }
        return parsed.data;
    }

    protected storeKey(key: string): string {
        return `${this.keyPrefix}:${this.name}:${key}`;
    }

    private checkSignal(storeKey: string, signal: AbortSignal | undefined): void {
        if (signal?.aborted) {
            throw new StoreUnavailableError(`abandoned update of "${storeKey}"`, signal.reason);
        }
    }

    private checkCost(cost: number): void {
        if (!Number.isInteger(cost) || cost <= 0) {
            throw new ConfigurationError(`cost must be a positive integer, got ${cost}`);
        }
        if (cost > this.capacity) {
            throw new ConfigurationError(
                `cost ${cost} exceeds capacity ${this.capacity}; the request can never be admitted`
            );
        }
    }
}
