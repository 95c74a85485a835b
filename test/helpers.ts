import { StoreUnavailableError } from '../src/errors';
import type { Store } from '../src/stores/types';

// Deterministic PRNG (mulberry32) so randomized tests replay identically.
export function seededRandom(seed: number): () => number {
    let a = seed >>> 0;
    return () => {
        a = (a + 0x6d2b79f5) >>> 0;
        let t = a;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/** Wraps a store; while `down` every call rejects like a lost connection. */
export class FlakyStore implements Store {
    down = false;

    constructor(private inner: Store) {}

    async get(key: string): Promise<string | null> {
        this.check();
        return this.inner.get(key);
    }

    async set(key: string, value: string, ttlMs: number): Promise<void> {
        this.check();
        return this.inner.set(key, value, ttlMs);
    }

    async compareAndSwap(key: string, expected: string | null, next: string, ttlMs: number): Promise<boolean> {
        this.check();
        return this.inner.compareAndSwap(key, expected, next, ttlMs);
    }

    async increment(key: string, by: number, ttlMs: number): Promise<number> {
        this.check();
        return this.inner.increment(key, by, ttlMs);
    }

    async delete(key: string): Promise<void> {
        this.check();
        return this.inner.delete(key);
    }

    async close(): Promise<void> {
        return this.inner.close();
    }

    private check(): void {
        if (this.down) {
            throw new StoreUnavailableError('connection refused');
        }
    }
}

/**
 * Yields to the event loop before every read and write, so concurrent
 * callers interleave between their get() and compareAndSwap().
 */
export class InterleavingStore implements Store {
    casConflicts = 0;

    constructor(private inner: Store) {}

    async get(key: string): Promise<string | null> {
        await tick();
        return this.inner.get(key);
    }

    async set(key: string, value: string, ttlMs: number): Promise<void> {
        await tick();
        return this.inner.set(key, value, ttlMs);
    }

    async compareAndSwap(key: string, expected: string | null, next: string, ttlMs: number): Promise<boolean> {
        await tick();
        const swapped = await this.inner.compareAndSwap(key, expected, next, ttlMs);
        if (!swapped) {
            this.casConflicts++;
        }
        return swapped;
    }

    async increment(key: string, by: number, ttlMs: number): Promise<number> {
        await tick();
        return this.inner.increment(key, by, ttlMs);
    }

    async delete(key: string): Promise<void> {
        return this.inner.delete(key);
    }

    async close(): Promise<void> {
        return this.inner.close();
    }
}

function tick(): Promise<void> {
    return new Promise((resolve) => setImmediate(resolve));
}
