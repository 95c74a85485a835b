import { z } from 'zod';
import { ConfigurationError } from '../errors';
import { type StoredLimiterOptions, StoredRateLimiter } from './stored-limiter';
import type { Transition } from './types';

// =================================================================
// FIXED WINDOW RATE LIMITER
// =================================================================
//
// HOW IT WORKS:
//   Divide time into fixed windows (e.g., 1-minute windows).
//   Count units per window. Reset at window boundary.
//
//   Window 10:00-10:01: [■■■■■■■■] 80/100 → allowed
//   Window 10:01-10:02: [■■       ] 20/100 → allowed
//
// IMPLEMENTATION:
//   windowStart = Math.floor(now / windowMs) * windowMs
//   The stored counter is reset (not deleted) the first time a call
//   lands in a later window than the one recorded.
//
// PROBLEM — BOUNDARY BURST:
//   Client sends 100 requests at 10:00:59.9 (end of window).
//   Window resets at 10:01:00.
//   Client sends 100 more at 10:01:00.1.
//   Result: 200 requests in 0.2 seconds with a limit of 100/min.
//   That is the price of O(1) state. Use sliding_counter or
//   sliding_log when the bound has to hold over every span.
//
// STATE: { count, windowStart }
// =================================================================

export interface WindowCounter {
    count: number;
    windowStart: number;
}

const counterSchema = z.object({
    count: z.number().int().min(0),
    windowStart: z.number(),
});

export class FixedWindowRateLimiter extends StoredRateLimiter<WindowCounter> {
    readonly name = 'fixed_window';
    protected readonly schema = counterSchema;

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

    initialState(now: number): WindowCounter {
        return { count: 0, windowStart: this.windowOf(now) };
    }

    ttlMs(): number {
        return this.windowMs;
    }

    apply(state: WindowCounter, now: number, cost: number): Transition<WindowCounter> {
        let window = state;

        // Rolled into a new window. A clock that stepped back keeps the
        // window already on record.
        const currentWindowStart = this.windowOf(now);
        if (currentWindowStart > state.windowStart) {
            window = { count: 0, windowStart: currentWindowStart };
        }

        const resetAt = window.windowStart + this.windowMs;

        if (window.count + cost > this.capacity) {
            return {
                state: window,
                decision: {
                    allowed: false,
                    limit: this.capacity,
                    remaining: this.capacity - window.count,
                    resetAt,
                    retryAfter: Math.max(0, resetAt - now),
                },
            };
        }

        const next = { count: window.count + cost, windowStart: window.windowStart };
        return {
            state: next,
            decision: {
                allowed: true,
                limit: this.capacity,
                remaining: this.capacity - next.count,
                resetAt,
            },
        };
    }

    private windowOf(now: number): number {
        return Math.floor(now / this.windowMs) * this.windowMs;
    }
}
