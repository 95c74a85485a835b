import { z } from 'zod';
import { ConfigurationError } from '../errors';
import { type StoredLimiterOptions, StoredRateLimiter } from './stored-limiter';
import type { Transition } from './types';

// =================================================================
// SLIDING WINDOW LOG RATE LIMITER
// =================================================================
//
// HOW IT WORKS:
//   Store the TIMESTAMP of every admitted request.
//   To check: sum what was admitted in the last N seconds.
//
//   Timestamps: [10:00:01, 10:00:15, 10:00:30, 10:00:45, 10:01:02]
//   Now = 10:01:10, window = 60s
//   Remove timestamps at or before 10:00:10 → [10:00:15, 10:00:30, 10:00:45, 10:01:02]
//   Used = 4, limit = 100 → allowed
//
// WEIGHTED ENTRIES:
//   Each entry is [timestamp, weight]. A request costing 3 is one
//   entry of weight 3, not three entries. Requests landing on the
//   same millisecond as the newest entry merge into it.
//
// PROS: Exact. Every (now - window, now] span holds ≤ capacity
// CONS: O(capacity) memory and pruning work per key
//
// USED BY: When you need exact precision and have few clients
// =================================================================

export type LogEntry = [timestamp: number, weight: number];

export interface TimestampLog {
    entries: LogEntry[];
}

const logSchema = z.object({
    entries: z.array(z.tuple([z.number(), z.number().int().positive()])),
});

export class SlidingLogRateLimiter extends StoredRateLimiter<TimestampLog> {
    readonly name = 'sliding_log';
    protected readonly schema = logSchema;

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

    initialState(): TimestampLog {
        return { entries: [] };
    }

    ttlMs(): number {
        return this.windowMs;
    }

    apply(state: TimestampLog, now: number, cost: number): Transition<TimestampLog> {
        const windowStart = now - this.windowMs;

        // Remove timestamps outside the window
        const entries = state.entries.filter(([at]) => at > windowStart);
        const used = entries.reduce((sum, [, weight]) => sum + weight, 0);

        if (used + cost > this.capacity) {
            const retryAt = this.retryAt(entries, used, cost);
            return {
                state: { entries },
                decision: {
                    allowed: false,
                    limit: this.capacity,
                    remaining: this.capacity - used,
                    resetAt: this.resetAt(entries, now),
                    retryAfter: Math.max(0, retryAt - now),
                },
            };
        }

        // A clock that stepped back still appends in order.
        const newest = entries[entries.length - 1];
        const at = newest ? Math.max(now, newest[0]) : now;
        if (newest && newest[0] === at) {
            entries[entries.length - 1] = [at, newest[1] + cost];
        } else {
            entries.push([at, cost]);
        }

        return {
            state: { entries },
            decision: {
                allowed: true,
                limit: this.capacity,
                remaining: this.capacity - used - cost,
                resetAt: this.resetAt(entries, now),
            },
        };
    }

    /** When enough of the oldest entries have aged out to fit `cost`. */
    private retryAt(entries: LogEntry[], used: number, cost: number): number {
        let freed = 0;
        for (const [at, weight] of entries) {
            freed += weight;
            if (used - freed + cost <= this.capacity) {
                return at + this.windowMs;
            }
        }
        // cost <= capacity, so the loop always returns before this.
        return entries.length > 0 ? entries[entries.length - 1][0] + this.windowMs : 0;
    }

    /** When the whole log will have aged out. */
    private resetAt(entries: LogEntry[], now: number): number {
        const newest = entries[entries.length - 1];
        return newest ? newest[0] + this.windowMs : now;
    }
}
