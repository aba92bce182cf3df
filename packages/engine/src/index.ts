/**
 * Milestone Engine
 *
 * Public API for embedding the engine; the CLI lives in cli.ts.
 */

export type {
  EngineDependencies,
  RunOptions,
  RunReport,
  WorkflowStatusLine,
} from './app.js';
export { MilestoneEngine, formatStatusLine } from './app.js';

export * from './config/index.js';
export * from './credentials/index.js';
export * from './execution/index.js';
export * from './observability/index.js';
export * from './progress/index.js';
export * from './ratelimit/index.js';
export * from './remote/index.js';
export * from './retry/index.js';
export * from './utils/index.js';
export * from './workflows/index.js';
