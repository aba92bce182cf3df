/**
 * Rate Limit Module
 */

// Type-only exports
export type { RateLimiterConfig, RateBudget, ThrottleSignal } from './rate-limiter.js';

// Value exports
export { RateLimiter, RateLimitError, DEFAULT_RATE_LIMITER_CONFIG } from './rate-limiter.js';
