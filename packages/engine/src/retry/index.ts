/**
 * Retry Module
 */

// Type-only exports
export type { AttemptOutcome, ExecuteOptions } from './retry-policy.js';

// Value exports
export { RetryExecutor, classifyFailure, classifyThrown, calculateBackoff } from './retry-policy.js';
