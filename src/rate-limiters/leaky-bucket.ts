import { z } from 'zod';
import { ConfigurationError } from '../errors';
import { type StoredLimiterOptions, StoredRateLimiter } from './stored-limiter';
import type { Transition } from './types';

// =================================================================
// LEAKY BUCKET RATE LIMITER
// =================================================================
//
// HOW IT WORKS:
//   Requests enter a queue (the "bucket").
//   The bucket "leaks" (processes) at a FIXED rate.
//   If adding the request would overflow → request rejected.
//
//   ┌────────────┐
//   │ ■■■■■■     │ ← level 6 (capacity: 10)
//   │            │
//   └─────┬──────┘
//         │ drip (leakRate units per second, constant)
//         ▼
//      processed
//
// KEY DIFFERENCE FROM TOKEN BUCKET:
//   Admitted requests fill the bucket; only the leak empties it.
//   However bursty the input, sustained throughput is capped at
//   leakRate. The bounded queue absorbs a burst, nothing more.
//
// IMPLEMENTATION:
//   Track queue level and last leak time.
//   On each request, subtract what has leaked since last check.
//
// STATE: { level, lastLeakAt }
// =================================================================

export interface QueueState {
    level: number;
    lastLeakAt: number;
}

const queueSchema = z.object({
    level: z.number().min(0),
    lastLeakAt: z.number(),
});

export class LeakyBucketRateLimiter extends StoredRateLimiter<QueueState> {
    readonly name = 'leaky_bucket';
    protected readonly schema = queueSchema;

    constructor(
        capacity: number, // Max units in queue
        private leakRate: number, // Units processed per second
        options: StoredLimiterOptions,
    ) {
        super(capacity, options);
        if (!Number.isFinite(leakRate) || leakRate <= 0) {
            throw new ConfigurationError(`leakRate must be positive, got ${leakRate}`);
        }
    }

    initialState(now: number): QueueState {
        return { level: 0, lastLeakAt: now };
    }

    ttlMs(): number {
        return Math.ceil((this.capacity / this.leakRate) * 1000);
    }

    apply(state: QueueState, now: number, cost: number): Transition<QueueState> {
        const elapsed = Math.max(0, now - state.lastLeakAt) / 1000;
        const at = Math.max(now, state.lastLeakAt);
        const level = Math.max(0, state.level - elapsed * this.leakRate);

        if (level + cost > this.capacity) {
            // Queue would overflow
            return {
                state: { level, lastLeakAt: at },
                decision: {
                    allowed: false,
                    limit: this.capacity,
                    remaining: Math.floor(this.capacity - level),
                    resetAt: this.emptyAt(level, at),
                    retryAfter: Math.ceil(((level + cost - this.capacity) / this.leakRate) * 1000),
                },
            };
        }

        const filled = level + cost;
        return {
            state: { level: filled, lastLeakAt: at },
            decision: {
                allowed: true,
                limit: this.capacity,
                remaining: Math.floor(this.capacity - filled),
                resetAt: this.emptyAt(filled, at),
            },
        };
    }

    private emptyAt(level: number, at: number): number {
        return at + Math.ceil((level / this.leakRate) * 1000);
    }
}
