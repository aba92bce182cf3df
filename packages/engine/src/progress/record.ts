/**
 * Progress Record Rules
 *
 * The single place counters, thresholds, checkpoints and completion
 * change. Every backend commits through applyMutation.
 *
 * Invariants:
 * 1. counter never decreases
 * 2. crossed_thresholds only grows, stays ascending and never exceeds counter
 * 3. completed never returns to false
 */

import type { ProgressMutation, ProgressRecord } from './types.js';

export class ProgressInvariantError extends Error {
  constructor(
    public readonly workflow: string,
    message: string
  ) {
    super(`Progress invariant violated for ${workflow}: ${message}`);
    this.name = 'ProgressInvariantError';
  }
}

export function emptyRecord(workflow: string, now: number): ProgressRecord {
  return {
    workflow,
    counter: 0,
    crossed_thresholds: [],
    last_completed_step_id: null,
    completed: false,
    created_at: now,
    updated_at: now,
    checkpoint: null,
    attributes: {},
    last_error: null,
  };
}

/**
 * Apply a mutation to a record (or to an empty record on first commit).
 * Returns a new record; the input is not modified.
 */
export function applyMutation(
  current: ProgressRecord | null,
  workflow: string,
  mutation: ProgressMutation,
  now: number
): ProgressRecord {
  const next = current ? structuredClone(current) : emptyRecord(workflow, now);

  if (mutation.counterDelta !== undefined) {
    const delta = mutation.counterDelta;
    if (!Number.isInteger(delta) || delta < 0) {
      throw new ProgressInvariantError(workflow, `counter delta must be a non-negative integer, got ${delta}`);
    }
    next.counter += delta;
  }

  if (mutation.crossed !== undefined && mutation.crossed.length > 0) {
    for (const threshold of mutation.crossed) {
      if (!Number.isInteger(threshold) || threshold <= 0) {
        throw new ProgressInvariantError(workflow, `threshold must be a positive integer, got ${threshold}`);
      }
      if (threshold > next.counter) {
        throw new ProgressInvariantError(workflow, `threshold ${threshold} exceeds counter ${next.counter}`);
      }
    }
    const merged = new Set([...next.crossed_thresholds, ...mutation.crossed]);
    next.crossed_thresholds = [...merged].sort((a, b) => a - b);
  }

  if (mutation.lastCompletedStepId !== undefined) {
    next.last_completed_step_id = mutation.lastCompletedStepId;
  }

  if (mutation.completed !== undefined) {
    if (next.completed && !mutation.completed) {
      throw new ProgressInvariantError(workflow, 'a completed workflow cannot be reopened');
    }
    next.completed = mutation.completed;
  }

  if (mutation.checkpoint !== undefined) {
    next.checkpoint = mutation.checkpoint === null ? null : structuredClone(mutation.checkpoint);
  }

  if (mutation.attributes !== undefined) {
    next.attributes = { ...next.attributes, ...structuredClone(mutation.attributes) };
  }

  if (mutation.lastError !== undefined) {
    next.last_error = mutation.lastError;
  }

  next.updated_at = now;
  return next;
}
