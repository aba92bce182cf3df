/**
 * Progress Record Types
 *
 * One record per workflow, persisted after every completed step
 * and after every sub-step checkpoint.
 *
 * Field names are snake_case: this is the persisted shape.
 */

import type { FailureCategory } from '../workflows/types.js';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Sub-step results of the in-flight step.
 * Cleared when the step completes.
 */
export interface StepCheckpoint {
  step_id: string;
  data: JsonObject;
}

/**
 * Most recent fatal failure, kept for status reporting.
 */
export interface ProgressError {
  step_id: string;
  category: FailureCategory;
  code: string;
  message: string;
  at: number;
}

export interface ProgressRecord {
  workflow: string;

  /** Monotonically non-decreasing. */
  counter: number;

  /** Ascending, only grows. */
  crossed_thresholds: number[];

  last_completed_step_id: string | null;

  /** Never returns to false once true. */
  completed: boolean;

  created_at: number;
  updated_at: number;

  checkpoint: StepCheckpoint | null;

  /** Small variant state (alternation turn, setup flags). */
  attributes: JsonObject;

  last_error: ProgressError | null;
}

/**
 * Declarative change applied by ProgressStore.commit.
 *
 * `undefined` fields leave the record untouched;
 * `null` clears checkpoint / last_error.
 */
export interface ProgressMutation {
  counterDelta?: number;
  crossed?: number[];
  lastCompletedStepId?: string;
  completed?: boolean;
  checkpoint?: StepCheckpoint | null;
  attributes?: JsonObject;
  lastError?: ProgressError | null;
}

/**
 * On-disk layout of the file backend.
 * Unknown top-level keys are preserved on rewrite.
 */
export interface ProgressDocument {
  version: number;
  workflows: Record<string, ProgressRecord>;
  [key: string]: unknown;
}
