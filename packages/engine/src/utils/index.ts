/**
 * Utilities Module
 */

// Type-only exports (interfaces)
export type { Logger, LogContext, LogLevel } from './logger.js';
export type { Clock } from './clock.js';

// Value exports (classes and functions)
export { JsonLogger, SilentLogger, createLogger, LOG_LEVELS } from './logger.js';
export { systemClock, RunCancelledError, throwIfCancelled } from './clock.js';
