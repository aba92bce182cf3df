/**
 * Workflow Factory
 *
 * The variant set is closed: a workflow is built from its tagged options
 * by an exhaustive switch. There is no registry to look names up in.
 */

import { BatchCounterWorkflow, type BatchCounterOptions } from './batch-counter.js';
import { CoAttributionWorkflow, type CoAttributionOptions } from './co-attribution.js';
import { QuestionAnswerWorkflow, type QuestionAnswerOptions } from './question-answer.js';
import { ReviewBypassWorkflow, type ReviewBypassOptions } from './review-bypass.js';
import { TimeBoxedWorkflow, type TimeBoxedOptions } from './time-boxed.js';

export type Workflow =
  | BatchCounterWorkflow
  | TimeBoxedWorkflow
  | CoAttributionWorkflow
  | QuestionAnswerWorkflow
  | ReviewBypassWorkflow;

export type WorkflowOptions =
  | ({ kind: 'batch-counter' } & BatchCounterOptions)
  | ({ kind: 'time-boxed' } & TimeBoxedOptions)
  | ({ kind: 'co-attribution' } & CoAttributionOptions)
  | ({ kind: 'question-answer' } & QuestionAnswerOptions)
  | ({ kind: 'review-bypass' } & ReviewBypassOptions);

export function createWorkflow(name: string, options: WorkflowOptions): Workflow {
  switch (options.kind) {
    case 'batch-counter':
      return new BatchCounterWorkflow(name, options);
    case 'time-boxed':
      return new TimeBoxedWorkflow(name, options);
    case 'co-attribution':
      return new CoAttributionWorkflow(name, options);
    case 'question-answer':
      return new QuestionAnswerWorkflow(name, options);
    case 'review-bypass':
      return new ReviewBypassWorkflow(name, options);
    default: {
      const unknownKind: never = options;
      throw new Error(`Unknown workflow kind: ${JSON.stringify(unknownKind)}`);
    }
  }
}

/**
 * Workflows run when the configuration names none.
 */
export const DEFAULT_WORKFLOWS: Record<string, WorkflowOptions> = {
  'merged-changes': { kind: 'batch-counter' },
  'quick-close': { kind: 'time-boxed' },
  'co-authored-commits': { kind: 'co-attribution' },
  'accepted-answers': { kind: 'question-answer' },
  'review-bypass': { kind: 'review-bypass' },
};
