export { Limiter, createRateLimiter } from './limiter';
export type { DecideOptions, LimiterDeps } from './limiter';
export { configFromEnv, limiterConfigSchema, parseLimiterConfig } from './config';
export type { FailurePolicy, LimiterConfig, LimiterConfigInput } from './config';
export { ManualClock, SystemClock } from './clock';
export type { Clock } from './clock';
export { ConfigurationError, ContentionError, RateLimiterError, StoreUnavailableError } from './errors';
export type { ErrorType } from './errors';
export { createLogger } from './logger';
export { MemoryStore, RedisStore, createRedisStore, createStore } from './stores';
export type { RedisClient, Store } from './stores';
export { TokenBucketRateLimiter } from './rate-limiters/token-bucket';
export { LeakyBucketRateLimiter } from './rate-limiters/leaky-bucket';
export { FixedWindowRateLimiter } from './rate-limiters/fixed-window';
export { SlidingLogRateLimiter } from './rate-limiters/sliding-log';
export { SlidingCounterRateLimiter } from './rate-limiters/sliding-counter';
export { StoredRateLimiter } from './rate-limiters/stored-limiter';
export type { StoredLimiterOptions } from './rate-limiters/stored-limiter';
export type { AlgorithmName, Decision, RateLimiter } from './rate-limiters/types';
export { RateLimitMiddleware, rateLimitHeaders } from './middleware/rate-limit';
export type {
    RateLimitHandler,
    RateLimitMiddlewareOptions,
    RateLimitRequest,
    RateLimitResponse,
} from './middleware/rate-limit';
