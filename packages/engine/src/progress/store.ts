/**
 * Progress Store
 *
 * Durable, crash-safe record per workflow.
 *
 * Guarantees:
 * - commit is the only way progress changes
 * - commits for the same workflow are strictly ordered
 * - a crash leaves either the previous or the new record, never a mix
 */

import { systemClock, type Clock } from '../utils/clock.js';
import { KeyedLock } from './keyed-lock.js';
import { applyMutation } from './record.js';
import type { ProgressMutation, ProgressRecord } from './types.js';

// =============================================================================
// STORE INTERFACE
// =============================================================================

export interface ProgressStore {
  /**
   * Open the backing storage. Called once before any other method.
   */
  open(): Promise<void>;

  /**
   * Load a workflow's record.
   * Returns null if the workflow has never committed.
   */
  load(workflow: string): Promise<ProgressRecord | null>;

  loadAll(): Promise<ProgressRecord[]>;

  /**
   * Apply a mutation atomically and durably.
   * The first commit for a workflow creates its record.
   */
  commit(workflow: string, mutation: ProgressMutation): Promise<ProgressRecord>;

  close(): Promise<void>;
}

export class ProgressStoreError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'ProgressStoreError';
  }
}

// =============================================================================
// IN-MEMORY IMPLEMENTATION (for testing and dry runs)
// =============================================================================

export class InMemoryProgressStore implements ProgressStore {
  private records: Map<string, ProgressRecord> = new Map();
  private lock = new KeyedLock();
  private clock: Clock;

  constructor(clock: Clock = systemClock) {
    this.clock = clock;
  }

  /**
   * Start from existing records (e.g. a dry run resuming real progress
   * without touching it).
   */
  seed(records: ProgressRecord[]): void {
    for (const record of records) {
      this.records.set(record.workflow, structuredClone(record));
    }
  }

  async open(): Promise<void> {}

  async load(workflow: string): Promise<ProgressRecord | null> {
    const record = this.records.get(workflow);
    return record ? structuredClone(record) : null;
  }

  async loadAll(): Promise<ProgressRecord[]> {
    return [...this.records.values()]
      .map((record) => structuredClone(record))
      .sort((a, b) => a.workflow.localeCompare(b.workflow));
  }

  async commit(workflow: string, mutation: ProgressMutation): Promise<ProgressRecord> {
    return this.lock.run(workflow, async () => {
      const next = applyMutation(this.records.get(workflow) ?? null, workflow, mutation, this.clock.now());
      this.records.set(workflow, next);
      return structuredClone(next);
    });
  }

  async close(): Promise<void> {}

  // For testing
  clear(): void {
    this.records.clear();
  }
}
