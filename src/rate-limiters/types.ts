// =================================================================
// Rate Limiter Interface — all 5 algorithms implement this
// =================================================================

export type AlgorithmName =
    | 'token_bucket'
    | 'leaky_bucket'
    | 'fixed_window'
    | 'sliding_log'
    | 'sliding_counter';

export interface Decision {
    allowed: boolean;
    limit: number;  // Max units allowed (capacity)
    remaining: number; // Units left, -1 when unknown (fail-open)
    resetAt: number; // Epoch ms when quota meaningfully refreshes
    retryAfter?: number; // Ms until client can retry (if blocked)
}

export interface RateLimiter {
    /**
     * Check if a request from this key (IP, API key, etc.) is allowed.
     * Once `signal` aborts, no further state is written for this call.
     */
    consume(key: string, cost?: number, signal?: AbortSignal): Promise<Decision>;

    /** Forget all state held for this key */
    reset(key: string): Promise<void>;

    /** Algorithm name (for headers and logs) */
    readonly name: AlgorithmName;
}

/** Outcome of applying one request to a state snapshot. */
export interface Transition<S> {
    state: S;
    decision: Decision;
}
