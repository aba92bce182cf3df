/**
 * Observability Module
 */

// Type-only exports
export type { WorkflowMetrics, RateLimitWaitReason } from './metrics.js';

// Value exports
export { NoOpMetrics, ConsoleMetrics } from './metrics.js';
