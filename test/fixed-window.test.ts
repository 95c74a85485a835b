import { beforeEach, describe, expect, it } from 'vitest';
import { ManualClock } from '../src/clock';
import { FixedWindowRateLimiter } from '../src/rate-limiters/fixed-window';
import { MemoryStore } from '../src/stores/memory-store';

describe('FixedWindowRateLimiter', () => {
    let clock: ManualClock;
    let limiter: FixedWindowRateLimiter;

    beforeEach(() => {
        clock = new ManualClock(0);
        limiter = new FixedWindowRateLimiter(100, 60_000, { store: new MemoryStore(clock), clock });
    });

    async function burst(count: number): Promise<number> {
        let admitted = 0;
        for (let i = 0; i < count; i++) {
            if ((await limiter.consume('client')).allowed) {
                admitted++;
            }
        }
        return admitted;
    }

    it('admits at most capacity within one window', async () => {
        clock.set(10_000);
        expect(await burst(150)).toBe(100);

        clock.set(59_999);
        expect(await limiter.consume('client')).toEqual({
            allowed: false,
            limit: 100,
            remaining: 0,
            resetAt: 60_000,
            retryAfter: 1,
        });
    });

    it('admits twice the capacity across a window boundary (known trade-off)', async () => {
        clock.set(59_900);
        expect(await burst(100)).toBe(100);

        const denied = await limiter.consume('client');
        expect(denied.allowed).toBe(false);
        expect(denied.retryAfter).toBe(100);

        clock.set(60_100);
        expect(await burst(100)).toBe(100);
        // 200 admitted within 0.2s
    });

    it('resets the counter in place on a new window', async () => {
        clock.set(1_000);
        await limiter.consume('client', 30);

        clock.set(61_000);
        const decision = await limiter.consume('client', 5);
        expect(decision.remaining).toBe(95);
        expect(decision.resetAt).toBe(120_000);
        expect(await limiter.inspect('client')).toEqual({ count: 5, windowStart: 60_000 });
    });

    it('keeps the recorded window when the clock steps back across a boundary', async () => {
        clock.set(60_500);
        await limiter.consume('client', 10);

        clock.set(59_800);
        const decision = await limiter.consume('client');
        expect(decision.remaining).toBe(89);
        expect(await limiter.inspect('client')).toEqual({ count: 11, windowStart: 60_000 });
    });
});
