import { type Clock, SystemClock } from '../clock';
import { StoreUnavailableError } from '../errors';
import type { Store } from './types';

// =================================================================
// MEMORY STORE
// =================================================================
//
// Single-process backend: a Map of value + expiry.
//
// Atomicity comes from the event loop. Every method reads and writes
// the Map synchronously before its promise resolves, so no other
// caller can interleave inside a compareAndSwap. Two callers CAN
// interleave between a get() and the following compareAndSwap(),
// which is exactly the conflict CAS detects.
//
// Expiry is lazy: an expired entry is dropped when it is next read.
// Keys that are never read again go in sweep(), which write() runs
// at most once per sweepIntervalMs of clock time.
// =================================================================

export const DEFAULT_SWEEP_INTERVAL_MS = 60_000;

interface Entry {
    value: string;
    expiresAt: number;
}

export class MemoryStore implements Store {
    private entries: Map<string, Entry> = new Map();
    private closed = false;
    private nextSweepAt: number;

    constructor(
        private clock: Clock = new SystemClock(),
        private sweepIntervalMs: number = DEFAULT_SWEEP_INTERVAL_MS
    ) {
        this.nextSweepAt = clock.now() + sweepIntervalMs;
    }

    async get(key: string): Promise<string | null> {
        return this.read(key)?.value ?? null;
    }

    async set(key: string, value: string, ttlMs: number): Promise<void> {
        this.ensureOpen();
        this.write(key, value, ttlMs);
    }

    async compareAndSwap(key: string, expected: string | null, next: string, ttlMs: number): Promise<boolean> {
        const current = this.read(key)?.value ?? null;
        if (current !== expected) {
            return false;
        }
        this.write(key, next, ttlMs);
        return true;
    }

    async increment(key: string, by: number, ttlMs: number): Promise<number> {
        const entry = this.read(key);
        if (!entry) {
            this.write(key, String(by), ttlMs);
            return by;
        }

        const current = Number.parseInt(entry.value, 10);
        if (!Number.isInteger(current)) {
            throw new StoreUnavailableError(`value at "${key}" is not an integer`);
        }
        entry.value = String(current + by);
        return current + by;
    }

    async delete(key: string): Promise<void> {
        this.ensureOpen();
        this.entries.delete(key);
    }

    async close(): Promise<void> {
        this.entries.clear();
        this.closed = true;
    }

    /** Drop every expired entry; returns how many were removed. */
    sweep(): number {
        const now = this.clock.now();
        let removed = 0;
        for (const [key, entry] of this.entries) {
            if (now >= entry.expiresAt) {
                this.entries.delete(key);
                removed++;
            }
        }
        return removed;
    }

    get size(): number {
        return this.entries.size;
    }

    private read(key: string): Entry | undefined {
        this.ensureOpen();
        const entry = this.entries.get(key);
        if (entry && this.clock.now() >= entry.expiresAt) {
            this.entries.delete(key);
            return undefined;
        }
        return entry;
    }

    private write(key: string, value: string, ttlMs: number): void {
        const now = this.clock.now();
        if (now >= this.nextSweepAt) {
            this.sweep();
            this.nextSweepAt = now + this.sweepIntervalMs;
        }
        this.entries.set(key, { value, expiresAt: now + ttlMs });
    }

    private ensureOpen(): void {
        if (this.closed) {
            throw new StoreUnavailableError('memory store is closed');
        }
    }
}
