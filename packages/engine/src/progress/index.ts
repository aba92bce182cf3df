/**
 * Progress Module
 */

// Type-only exports
export type {
  JsonValue,
  JsonObject,
  StepCheckpoint,
  ProgressError,
  ProgressRecord,
  ProgressMutation,
  ProgressDocument,
} from './types.js';
export type { ProgressStore } from './store.js';
export type {
  ProgressQueryable,
  ProgressPool,
  ProgressPoolClient,
  PostgresProgressStoreOptions,
} from './postgres-store.js';

// Value exports
export { applyMutation, emptyRecord, ProgressInvariantError } from './record.js';
export { InMemoryProgressStore, ProgressStoreError } from './store.js';
export { FileProgressStore } from './file-store.js';
export { PostgresProgressStore } from './postgres-store.js';
export { KeyedLock } from './keyed-lock.js';
