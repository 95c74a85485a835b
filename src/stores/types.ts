/**
 * Key/value backend holding every per-key limiter record.
 *
 * Values are opaque strings. All methods are async so that an in-process
 * map and a networked cache share one contract; failures to reach the
 * backend surface as `StoreUnavailableError`.
 */
export interface Store {
    /** Current value, or null when absent or expired. */
    get(key: string): Promise<string | null>;

    /** Unconditional write; the TTL restarts. */
    set(key: string, value: string, ttlMs: number): Promise<void>;

    /**
     * Write `next` only if the stored value still equals `expected`
     * (`null` means "only if absent"). Atomic; returns whether it wrote.
     */
    compareAndSwap(key: string, expected: string | null, next: string, ttlMs: number): Promise<boolean>;

    /**
     * Atomically add `by` to an integer counter, creating it at 0 first.
     * The TTL is applied only when the counter is created.
     */
    increment(key: string, by: number, ttlMs: number): Promise<number>;

    delete(key: string): Promise<void>;

    /** Release timers, connections and the like. */
    close(): Promise<void>;
}
