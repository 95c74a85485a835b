import { z } from 'zod';
import { ConfigurationError } from '../errors';
import { type StoredLimiterOptions, StoredRateLimiter } from './stored-limiter';
import type { Transition } from './types';

// =================================================================
// SLIDING WINDOW COUNTER RATE LIMITER
// =================================================================
//
// HOW IT WORKS:
//   Combines fixed window simplicity with sliding window accuracy.
//   Uses a WEIGHTED AVERAGE of current and previous windows.
//
//   Previous window (10:00-10:01): 80 requests
//   Current window  (10:01-10:02): 20 requests
//   Current time: 10:01:45 (75% into current window)
//
//   Estimate = previous × (1 - elapsed%) + current
//            = 80 × 0.25 + 20
//            = 20 + 20 = 40
//
//   Limit is 100, so 40 + 1 ≤ 100 → allowed, 59 remaining
//
// ROLLING:
//   One window elapsed      → current becomes previous.
//   Two or more elapsed     → previous is 0: an idle key's old
//                             traffic has fully slid out of view.
//
// PROS: O(1) state, no boundary burst beyond the interpolation error
// CONS: An estimate; assumes the previous window's traffic was even
// =================================================================

export interface DualWindowCounter {
    previousCount: number;
    previousWindowStart: number;
    currentCount: number;
    currentWindowStart: number;
}

const dualCounterSchema = z.object({
    previousCount: z.number().int().min(0),
    previousWindowStart: z.number(),
    currentCount: z.number().int().min(0),
    currentWindowStart: z.number(),
});

export class SlidingCounterRateLimiter extends StoredRateLimiter<DualWindowCounter> {
    readonly name = 'sliding_counter';
    protected readonly schema = dualCounterSchema;

    constructor(
        capacity: number,
        private windowMs: number,
        options: StoredLimiterOptions,
    ) {
        super(capacity, options);
        if (!Number.isFinite(windowMs) || windowMs <= 0) {
            throw new ConfigurationError(`windowMs must be positive, got ${windowMs}`);
        }
    }

    initialState(now: number): DualWindowCounter {
        const currentWindowStart = Math.floor(now / this.windowMs) * this.windowMs;
        return {
            previousCount: 0,
            previousWindowStart: currentWindowStart - this.windowMs,
            currentCount: 0,
            currentWindowStart,
        };
    }

    // The previous window still weighs in until the current one ends.
    ttlMs(): number {
        return this.windowMs * 2;
    }

    apply(state: DualWindowCounter, now: number, cost: number): Transition<DualWindowCounter> {
        const windows = this.roll(state, now);
        const elapsedInCurrent = Math.min(this.windowMs, Math.max(0, now - windows.currentWindowStart));
        const resetAt = windows.currentWindowStart + this.windowMs;

        // Everything below is scaled by windowMs so the weight
        // (windowMs - elapsed) / windowMs never leaves integer math.
        const scaledEstimate =
            (this.windowMs - elapsedInCurrent) * windows.previousCount + windows.currentCount * this.windowMs;
        const scaledRoom = this.capacity * this.windowMs - scaledEstimate;
        const scaledCost = cost * this.windowMs;

        if (scaledCost > scaledRoom) {
            return {
                state: windows,
                decision: {
                    allowed: false,
                    limit: this.capacity,
                    remaining: Math.max(0, Math.floor(scaledRoom / this.windowMs)),
                    resetAt,
                    retryAfter: this.retryAfter(windows, elapsedInCurrent, cost),
                },
            };
        }

        const next = { ...windows, currentCount: windows.currentCount + cost };
        return {
            state: next,
            decision: {
                allowed: true,
                limit: this.capacity,
                remaining: Math.floor((scaledRoom - scaledCost) / this.windowMs),
                resetAt,
            },
        };
    }

    private roll(state: DualWindowCounter, now: number): DualWindowCounter {
        const elapsed = now - state.currentWindowStart;
        if (elapsed < this.windowMs) {
            return state;
        }

        const windowsPassed = Math.floor(elapsed / this.windowMs);
        const currentWindowStart = state.currentWindowStart + windowsPassed * this.windowMs;
        return {
            previousCount: windowsPassed === 1 ? state.currentCount : 0,
            previousWindowStart: currentWindowStart - this.windowMs,
            currentCount: 0,
            currentWindowStart,
        };
    }

    /**
     * Time until weight × previous + current + cost fits in capacity.
     * When the current window alone is too full, that point lies in the
     * next window, where today's current count becomes the previous one.
     */
    private retryAfter(windows: DualWindowCounter, elapsedInCurrent: number, cost: number): number {
        const room = this.capacity - cost;
        const untilWindowEnd = this.windowMs - elapsedInCurrent;

        if (windows.currentCount <= room) {
            // previousCount > 0 here, otherwise the request would fit.
            const unelapsedAllowed = Math.floor(((room - windows.currentCount) * this.windowMs) / windows.previousCount);
            return Math.max(0, untilWindowEnd - unelapsedAllowed);
        }

        const unelapsedAllowed = Math.floor((room * this.windowMs) / windows.currentCount);
        return untilWindowEnd + this.windowMs - unelapsedAllowed;
    }
}
