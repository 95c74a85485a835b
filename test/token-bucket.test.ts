import { beforeEach, describe, expect, it } from 'vitest';
import { ManualClock } from '../src/clock';
import { ConfigurationError } from '../src/errors';
import { TokenBucketRateLimiter } from '../src/rate-limiters/token-bucket';
import { MemoryStore } from '../src/stores/memory-store';
import { seededRandom } from './helpers';

describe('TokenBucketRateLimiter', () => {
    let clock: ManualClock;
    let store: MemoryStore;
    let limiter: TokenBucketRateLimiter;

    beforeEach(() => {
        clock = new ManualClock(0);
        store = new MemoryStore(clock);
        limiter = new TokenBucketRateLimiter(10, 2, { store, clock });
    });

    it('admits a full burst of capacity, then denies with a half-second retry', async () => {
        for (let i = 0; i < 10; i++) {
            const decision = await limiter.consume('user-1');
            expect(decision.allowed).toBe(true);
            expect(decision.remaining).toBe(9 - i);
        }

        const denied = await limiter.consume('user-1');
        expect(denied).toEqual({
            allowed: false,
            limit: 10,
            remaining: 0,
            resetAt: 5000,
            retryAfter: 500,
        });
    });

    it('refills lazily at refillRate', async () => {
        for (let i = 0; i < 10; i++) {
            await limiter.consume('user-1');
        }

        clock.advance(500);
        const decision = await limiter.consume('user-1');
        expect(decision.allowed).toBe(true);
        expect(decision.remaining).toBe(0);
        expect((await limiter.consume('user-1')).allowed).toBe(false);
    });

    it('caps refilled tokens at capacity', async () => {
        await limiter.consume('user-1');
        clock.advance(3_600_000);

        const decision = await limiter.consume('user-1');
        expect(decision.remaining).toBe(9);
        expect(await limiter.inspect('user-1')).toEqual({ tokens: 9, lastRefillAt: 3_600_000 });
    });

    it('charges multi-unit costs and reports fractional tokens floored', async () => {
        expect((await limiter.consume('user-1', 4)).remaining).toBe(6);
        clock.advance(250); // +0.5 token

        const decision = await limiter.consume('user-1', 3);
        expect(decision.allowed).toBe(true);
        expect(decision.remaining).toBe(3);
        expect(await limiter.inspect('user-1')).toEqual({ tokens: 3.5, lastRefillAt: 250 });
    });

    it('denies without decrementing and persists the refilled amount', async () => {
        await limiter.consume('user-1', 9);
        clock.advance(100); // 1 + 0.2 tokens

        const denied = await limiter.consume('user-1', 2);
        expect(denied.allowed).toBe(false);
        expect(denied.retryAfter).toBe(400);
        expect(await limiter.inspect('user-1')).toEqual({ tokens: 1.2, lastRefillAt: 100 });
    });

    it('rejects a cost above capacity as a permanent configuration error', async () => {
        await expect(limiter.consume('user-1', 11)).rejects.toBeInstanceOf(ConfigurationError);
        await expect(limiter.consume('user-1', 0)).rejects.toBeInstanceOf(ConfigurationError);
        await expect(limiter.consume('user-1', 1.5)).rejects.toBeInstanceOf(ConfigurationError);
        expect(await limiter.inspect('user-1')).toBeNull();
    });

    it('treats a clock that steps backwards as zero elapsed time', async () => {
        clock.set(10_000);
        await limiter.consume('user-1');

        clock.set(5_000);
        const decision = await limiter.consume('user-1');
        expect(decision.remaining).toBe(8);
        expect(await limiter.inspect('user-1')).toEqual({ tokens: 8, lastRefillAt: 10_000 });
    });

    it('keeps keys independent', async () => {
        for (let i = 0; i < 10; i++) {
            await limiter.consume('user-1');
        }
        expect((await limiter.consume('user-1')).allowed).toBe(false);
        expect((await limiter.consume('user-2')).allowed).toBe(true);
    });

    it('expires an idle bucket after a full refill period', async () => {
        expect(limiter.ttlMs()).toBe(5000);
        await limiter.consume('user-1');

        clock.advance(5000);
        expect(await store.get('ratelimit:token_bucket:user-1')).toBeNull();
    });

    it('never holds more than capacity or fewer than zero tokens', async () => {
        const random = seededRandom(7);
        for (let i = 0; i < 500; i++) {
            clock.advance(Math.floor(random() * 400));
            await limiter.consume('user-1', 1 + Math.floor(random() * 3));

            const state = await limiter.inspect('user-1');
            expect(state).not.toBeNull();
            expect(state?.tokens).toBeGreaterThanOrEqual(0);
            expect(state?.tokens).toBeLessThanOrEqual(10);
        }
    });

    it('rejects a non-positive refill rate', () => {
        expect(() => new TokenBucketRateLimiter(10, 0, { store, clock })).toThrow(ConfigurationError);
        expect(() => new TokenBucketRateLimiter(0, 1, { store, clock })).toThrow(ConfigurationError);
    });
});
