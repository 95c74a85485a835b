import { z } from 'zod';
import { ConfigurationError } from '../errors';
import { type StoredLimiterOptions, StoredRateLimiter } from './stored-limiter';
import type { Transition } from './types';

// =================================================================
// TOKEN BUCKET RATE LIMITER
// =================================================================
//
// HOW IT WORKS:
//   Imagine a bucket that holds tokens.
//   - Tokens are ADDED at a constant rate (e.g., 2/second)
//   - Each request REMOVES `cost` tokens
//   - If the bucket holds fewer than `cost` → request rejected
//   - Bucket has a MAX capacity (can't accumulate forever)
//
//   ┌────────────┐
//   │ ●●●●●●●●   │ ← 8 tokens available
//   │ capacity:10 │
//   └────────────┘
//         │
//     +2/second refill
//
//   10 requests at once → all 10 use tokens → allowed (burst!)
//   11th request → no tokens → rejected, retry in 0.5s
//
// LAZY REFILL:
//   No timer adds tokens. On each request we CALCULATE how many
//   tokens accrued since lastRefillAt. Tokens are kept as a real
//   number so repeated small refills don't round away; only the
//   reported `remaining` is floored.
//
// STATE: { tokens, lastRefillAt } — expires after a full refill's
//   worth of inactivity, since a re-created bucket starts full anyway.
// =================================================================

export interface BucketState {
    tokens: number;
    lastRefillAt: number;
}

const bucketSchema = z.object({
    tokens: z.number().min(0),
    lastRefillAt: z.number(),
});

export class TokenBucketRateLimiter extends StoredRateLimiter<BucketState> {
    readonly name = 'token_bucket';
    protected readonly schema = bucketSchema;

    constructor(
        capacity: number,
        private refillRate: number, // Tokens added per second
        options: StoredLimiterOptions,
    ) {
        super(capacity, options);
        if (!Number.isFinite(refillRate) || refillRate <= 0) {
            throw new ConfigurationError(`refillRate must be positive, got ${refillRate}`);
        }
    }

    initialState(now: number): BucketState {
        // New client gets a full bucket
        return { tokens: this.capacity, lastRefillAt: now };
    }

    ttlMs(): number {
        return Math.ceil((this.capacity / this.refillRate) * 1000);
    }

    apply(state: BucketState, now: number, cost: number): Transition<BucketState> {
        // Clock went backwards? No free tokens, and keep the later stamp.
        const elapsed = Math.max(0, now - state.lastRefillAt) / 1000;
        const at = Math.max(now, state.lastRefillAt);
        const tokens = Math.min(this.capacity, state.tokens + elapsed * this.refillRate);

        if (tokens < cost) {
            return {
                state: { tokens, lastRefillAt: at },
                decision: {
                    allowed: false,
                    limit: this.capacity,
                    remaining: Math.floor(tokens),
                    resetAt: this.fullAt(tokens, at),
                    retryAfter: Math.ceil(((cost - tokens) / this.refillRate) * 1000),
                },
            };
        }

        const left = tokens - cost;
        return {
            state: { tokens: left, lastRefillAt: at },
            decision: {
                allowed: true,
                limit: this.capacity,
                remaining: Math.floor(left),
                resetAt: this.fullAt(left, at),
            },
        };
    }

    private fullAt(tokens: number, at: number): number {
        return at + Math.ceil(((this.capacity - tokens) / this.refillRate) * 1000);
    }
}
