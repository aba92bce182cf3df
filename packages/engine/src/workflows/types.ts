/**
 * Workflow Types
 *
 * Shared vocabulary of the engine: failure taxonomy, retry policy,
 * step results and the workflow contract every variant implements.
 */

import type { CredentialRole, Credential, Identity } from '../credentials/registry.js';
import type { JsonObject, ProgressRecord } from '../progress/types.js';
import type { RemoteClient, RemoteOperation, RemoteResult, RepositoryRef } from '../remote/client.js';
import type { Clock } from '../utils/clock.js';
import type { Logger } from '../utils/logger.js';

// =============================================================================
// WORKFLOW KINDS
// =============================================================================

export type WorkflowKind =
  | 'batch-counter'
  | 'time-boxed'
  | 'co-attribution'
  | 'question-answer'
  | 'review-bypass';

export const WORKFLOW_KINDS: readonly WorkflowKind[] = [
  'batch-counter',
  'time-boxed',
  'co-attribution',
  'question-answer',
  'review-bypass',
];

// =============================================================================
// FAILURE CATEGORIES
// =============================================================================

export const FAILURE_CATEGORIES = [
  'THROTTLED',          // Budget exhausted or secondary limit - wait, retry uncapped
  'TRANSIENT',          // Network, timeout, 5xx - bounded backoff
  'FATAL_AUTH',         // Credential rejected
  'FATAL_VALIDATION',   // Request rejected as invalid
  'FATAL_DEADLINE',     // Time-boxed step finished too late
  'FATAL_PRECONDITION', // Missing resource, feature or credential
  'FATAL_EXHAUSTED',    // Transient retries used up
  'FATAL_INTERNAL',     // Unexpected exception inside a step
] as const;

export type FailureCategory = (typeof FAILURE_CATEGORIES)[number];

export type FatalCategory = Exclude<FailureCategory, 'THROTTLED' | 'TRANSIENT'>;

export interface ClassifiedError {
  category: FailureCategory;
  message: string;
  code: string;
  status?: number;
  originalError?: Error;
}

export function isFatal(category: FailureCategory): category is FatalCategory {
  return category !== 'THROTTLED' && category !== 'TRANSIENT';
}

// =============================================================================
// RETRY POLICY
// =============================================================================

export interface RetryPolicy {
  max_attempts: number;
  initial_delay_ms: number;
  max_delay_ms: number;
  backoff_multiplier: number;
  jitter: boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  max_attempts: 5,
  initial_delay_ms: 1000,
  max_delay_ms: 60000,
  backoff_multiplier: 2.0,
  jitter: true,
};

// =============================================================================
// STEP EXECUTION
// =============================================================================

export type CallResult<T> =
  | { type: 'SUCCESS'; value: T; attempts: number }
  | { type: 'FATAL'; error: ClassifiedError; attempts: number };

export type RemoteInvocation<T> = (
  client: RemoteClient,
  credential: Credential
) => Promise<RemoteResult<T>>;

/**
 * Everything a step may touch.
 * `call` is the only route to the remote API.
 */
export interface StepContext {
  readonly workflow: string;
  readonly stepId: string;
  readonly repository: RepositoryRef;
  /** Checkpoint data left by an interrupted attempt of this same step. */
  readonly checkpoint: JsonObject | null;
  readonly clock: Clock;
  readonly signal: AbortSignal;
  readonly logger: Logger;

  hasIdentity(role: CredentialRole): boolean;
  identity(role: CredentialRole): Identity;

  call<T>(
    role: CredentialRole,
    operation: RemoteOperation,
    invoke: RemoteInvocation<T>
  ): Promise<CallResult<T>>;

  /** Persist sub-step results; `null` clears them. */
  saveCheckpoint(data: JsonObject | null): Promise<void>;
}

export type StepResult =
  | { type: 'SUCCESS'; delta: number; attributes?: JsonObject }
  | { type: 'BLOCKED'; reason: string }
  | { type: 'FAILED'; error: ClassifiedError };

export interface WorkflowStep {
  /** Deterministic: `<workflow>#<index>` or `<workflow>#setup`. */
  id: string;
  index: number;
  description: string;
  /** Pacing delay applied by the runner before the step. */
  pauseBeforeMs: number;
  run(ctx: StepContext): Promise<StepResult>;
}

export type NextStep =
  | { type: 'STEP'; step: WorkflowStep }
  | { type: 'DONE' }
  | { type: 'BLOCKED'; reason: string };

/**
 * Contract shared by every workflow variant.
 */
export interface WorkflowBase<K extends WorkflowKind> {
  readonly name: string;
  readonly kind: K;
  /** Sorted ascending, distinct, positive. */
  readonly thresholds: readonly number[];
  /** Credentials the workflow cannot run without. */
  readonly roles: readonly CredentialRole[];
  nextStep(record: ProgressRecord): NextStep;
}

// =============================================================================
// REPORTS
// =============================================================================

export type WorkflowStatus = 'completed' | 'blocked' | 'failed' | 'cancelled';

/**
 * resumable: fix the cause and run again.
 * unachievable: the attempt cannot succeed this run (deadline missed).
 */
export type FailureDisposition = 'resumable' | 'unachievable';

export interface WorkflowReport {
  workflow: string;
  kind: WorkflowKind;
  status: WorkflowStatus;
  counter: number;
  crossedThresholds: number[];
  newlyCrossed: number[];
  stepsCompleted: number;
  durationMs: number;
  stepId?: string;
  reason?: string;
  error?: ClassifiedError;
  disposition?: FailureDisposition;
}

export function dispositionOf(category: FailureCategory): FailureDisposition {
  return category === 'FATAL_DEADLINE' ? 'unachievable' : 'resumable';
}
