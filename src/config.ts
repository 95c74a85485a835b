import { z } from 'zod';
import { ConfigurationError } from './errors';

// =================================================================
// LIMITER CONFIGURATION
// =================================================================
// One schema per algorithm family. Window algorithms take windowMs,
// bucket algorithms take refillRate (units per second; the leak rate
// for leaky_bucket). Parsed once, when the Limiter is built.
// =================================================================

export const failurePolicySchema = z.enum(['fail_open', 'fail_closed']);
export type FailurePolicy = z.infer<typeof failurePolicySchema>;

const common = {
    capacity: z.number().int().positive(),
    failurePolicy: failurePolicySchema.default('fail_closed'),
    timeoutMs: z.number().int().positive().optional(),
    maxRetries: z.number().int().positive().optional(),
    keyPrefix: z.string().min(1).optional(),
};

const bucketConfig = {
    ...common,
    refillRate: z.number().positive().finite(),
};

const windowConfig = {
    ...common,
    windowMs: z.number().int().positive(),
};

export const limiterConfigSchema = z.discriminatedUnion('algorithm', [
    z.object({ algorithm: z.literal('token_bucket'), ...bucketConfig }),
    z.object({ algorithm: z.literal('leaky_bucket'), ...bucketConfig }),
    z.object({ algorithm: z.literal('fixed_window'), ...windowConfig }),
    z.object({ algorithm: z.literal('sliding_log'), ...windowConfig }),
    z.object({ algorithm: z.literal('sliding_counter'), ...windowConfig }),
]);

/** What callers write; failurePolicy may be left out. */
export type LimiterConfigInput = z.input<typeof limiterConfigSchema>;
/** What the Limiter runs with. */
export type LimiterConfig = z.output<typeof limiterConfigSchema>;

export function parseLimiterConfig(input: unknown): LimiterConfig {
    const result = limiterConfigSchema.safeParse(input);
    if (!result.success) {
        const details = result.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ConfigurationError(`invalid limiter config: ${details}`, result.error);
    }
    return result.data;
}

function numberFrom(value: string | undefined): number | undefined {
    const trimmed = value?.trim();
    return trimmed ? Number(trimmed) : undefined;
}

function stringFrom(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed || undefined;
}

/**
 * Build a config from RATE_LIMIT_* environment variables:
 * ALGORITHM, CAPACITY, WINDOW_MS, REFILL_RATE, FAILURE_POLICY,
 * TIMEOUT_MS, MAX_RETRIES, KEY_PREFIX.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): LimiterConfig {
    return parseLimiterConfig({
        algorithm: stringFrom(env.RATE_LIMIT_ALGORITHM),
        capacity: numberFrom(env.RATE_LIMIT_CAPACITY),
        windowMs: numberFrom(env.RATE_LIMIT_WINDOW_MS),
        refillRate: numberFrom(env.RATE_LIMIT_REFILL_RATE),
        failurePolicy: stringFrom(env.RATE_LIMIT_FAILURE_POLICY),
        timeoutMs: numberFrom(env.RATE_LIMIT_TIMEOUT_MS),
        maxRetries: numberFrom(env.RATE_LIMIT_MAX_RETRIES),
        keyPrefix: stringFrom(env.RATE_LIMIT_KEY_PREFIX),
    });
}
