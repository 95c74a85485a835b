export type ErrorType = 'invalid_config' | 'store_unavailable' | 'contention';

export class RateLimiterError extends Error {
    readonly type: ErrorType;
    readonly cause: unknown;

    constructor(type: ErrorType, message: string, cause: unknown = null) {
        super(message);
        this.name = 'RateLimiterError';
        this.type = type;
        this.cause = cause;
    }
}

/**
 * Invalid quota parameters, or a request cost that can never be admitted.
 * Never retried and never converted by the failure policy.
 */
export class ConfigurationError extends RateLimiterError {
    constructor(message: string, cause: unknown = null) {
        super('invalid_config', message, cause);
        this.name = 'ConfigurationError';
    }
}

/** The backing store could not be reached, failed, or timed out. */
export class StoreUnavailableError extends RateLimiterError {
    constructor(message: string, cause: unknown = null, type: ErrorType = 'store_unavailable') {
        super(type, message, cause);
        this.name = 'StoreUnavailableError';
    }
}

/** Compare-and-swap retry budget exhausted; transient like a store outage. */
export class ContentionError extends StoreUnavailableError {
    readonly attempts: number;

    constructor(key: string, attempts: number) {
        super(`gave up on "${key}" after ${attempts} conflicting updates`, null, 'contention');
        this.name = 'ContentionError';
        this.attempts = attempts;
    }
}

export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
