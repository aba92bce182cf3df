/**
 * Workflow Engine
 *
 * Variants, runner and the contract between them.
 *
 * Design invariants:
 * - A step's counter delta is committed before the next step is chosen
 * - A threshold is crossed at most once per workflow
 * - A fatal error stops only the workflow that raised it
 * - Steps name the credential role of every call they make
 */

// Types
export type {
  WorkflowKind,
  FailureCategory,
  FatalCategory,
  ClassifiedError,
  RetryPolicy,
  CallResult,
  RemoteInvocation,
  StepContext,
  StepResult,
  WorkflowStep,
  NextStep,
  WorkflowBase,
  WorkflowStatus,
  FailureDisposition,
  WorkflowReport,
} from './types.js';
export {
  WORKFLOW_KINDS,
  FAILURE_CATEGORIES,
  DEFAULT_RETRY_POLICY,
  isFatal,
  dispositionOf,
} from './types.js';

// Thresholds
export {
  InvalidThresholdsError,
  validateThresholds,
  highestThreshold,
  newlyCrossed,
  isFinished,
  nextThreshold,
} from './thresholds.js';

// Variants
export type { BatchCounterOptions } from './batch-counter.js';
export { BatchCounterWorkflow, BATCH_COUNTER_DEFAULTS } from './batch-counter.js';
export type { TimeBoxedOptions } from './time-boxed.js';
export { TimeBoxedWorkflow, TIME_BOXED_DEFAULTS } from './time-boxed.js';
export type { CoAttributionOptions } from './co-attribution.js';
export { CoAttributionWorkflow, CO_ATTRIBUTION_DEFAULTS } from './co-attribution.js';
export type { QuestionAnswerOptions } from './question-answer.js';
export { QuestionAnswerWorkflow, QUESTION_ANSWER_DEFAULTS } from './question-answer.js';
export type { ReviewBypassOptions } from './review-bypass.js';
export { ReviewBypassWorkflow, REVIEW_BYPASS_DEFAULTS } from './review-bypass.js';

// Factory
export type { Workflow, WorkflowOptions } from './factory.js';
export { createWorkflow, DEFAULT_WORKFLOWS } from './factory.js';

// Runner
export type { RunnerEvent, RunnerEventHandler, RunnerDependencies } from './runner.js';
export { WorkflowRunner } from './runner.js';
