import type { NextFunction, Request } from 'express';
import type { Limiter } from '../limiter';
import { createLogger } from '../logger';
import type { Decision } from '../rate-limiters/types';

// =================================================================
// RATE LIMIT MIDDLEWARE
// =================================================================
// Asks the limiter about every request. Always sets the rate limit
// headers; on denial answers 429 and does NOT call next(), which
// stops the Express chain right here.
// =================================================================

/** The slice of an Express response the middleware writes to. */
export interface RateLimitResponse {
    setHeader(name: string, value: string | number): unknown;
    status(code: number): { json(body: unknown): unknown };
}

/** The parts of an Express request keys and costs are derived from. */
export type RateLimitRequest = Pick<Request, 'ip' | 'method' | 'path' | 'headers'>;

export interface RateLimitMiddlewareOptions {
    /** Defaults to the client IP. */
    keyGenerator?: (req: RateLimitRequest) => string;
    /** Units charged per request; defaults to 1. */
    cost?: (req: RateLimitRequest) => number;
}

/** Accepted by app.use(); narrower than RequestHandler on what it reads. */
export type RateLimitHandler = (req: RateLimitRequest, res: RateLimitResponse, next: NextFunction) => void;

const log = createLogger('rate-limit-middleware');

/**
 * X-RateLimit-* headers for a decision. Reset is in epoch seconds,
 * Retry-After in whole seconds (at least 1) and only on denial.
 */
export function rateLimitHeaders(decision: Decision): Record<string, string> {
    const headers: Record<string, string> = {
        'X-RateLimit-Limit': String(decision.limit),
        'X-RateLimit-Remaining': String(decision.remaining),
        'X-RateLimit-Reset': String(Math.ceil(decision.resetAt / 1000)),
    };
    if (!decision.allowed) {
        headers['Retry-After'] = String(Math.max(1, Math.ceil((decision.retryAfter ?? 0) / 1000)));
    }
    return headers;
}

export class RateLimitMiddleware {
    name = 'rate-limit';

    constructor(
        private limiter: Limiter,
        private options: RateLimitMiddlewareOptions = {},
    ) {}

    /** Plug into Express: app.use(new RateLimitMiddleware(limiter).handler()) */
    handler(): RateLimitHandler {
        return (req, res, next) => {
            Promise.resolve()
                .then(() => {
                    const { key, cost } = this.resolve(req);
                    return this.handle(key, cost, res, next);
                })
                .catch(next);
        };
    }

    resolve(req: RateLimitRequest): { key: string; cost: number } {
        return {
            key: this.options.keyGenerator?.(req) ?? req.ip ?? 'unknown',
            cost: this.options.cost?.(req) ?? 1,
        };
    }

    async handle(key: string, cost: number, res: RateLimitResponse, next: NextFunction): Promise<void> {
        const decision = await this.limiter.decide(key, cost);

        // Always set rate limit headers (industry standard)
        for (const [name, value] of Object.entries(rateLimitHeaders(decision))) {
            res.setHeader(name, value);
        }
        res.setHeader('X-RateLimit-Algorithm', this.limiter.algorithm);

        if (!decision.allowed) {
            log.info('rate limited', { key, algorithm: this.limiter.algorithm, retryAfter: decision.retryAfter });

            res.status(429).json({
                error: 'Too Many Requests',
                algorithm: this.limiter.algorithm,
                retryAfter: decision.retryAfter,
            });
            return; // STOP — don't call next()
        }

        next();
    }
}
