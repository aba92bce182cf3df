/**
 * Execution Module
 */

// Type-only exports
export type { TimeoutConfig } from './timeout.js';

// Value exports
export { DEFAULT_TIMEOUT_CONFIG, CallTimeoutError, getCallTimeout, withTimeout } from './timeout.js';
