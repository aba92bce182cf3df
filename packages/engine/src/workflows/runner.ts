/**
 * Workflow Runner
 *
 * Drives one workflow's state machine to a terminal outcome.
 *
 * Invariants:
 * 1. Every remote call goes through the retry policy and the rate limiter
 * 2. A step's counter delta is committed before the next step is asked for
 * 3. Cancellation is honored only at suspend points that precede a remote
 *    call; a successful call is always followed by its commit
 * 4. A fatal error stops only the owning workflow
 * 5. run() never rejects; every outcome is a report
 */

import {
  CredentialNotFoundError,
  type Credential,
  type CredentialRegistry,
  type CredentialRole,
} from '../credentials/registry.js';
import { NoOpMetrics, type WorkflowMetrics } from '../observability/metrics.js';
import type { ProgressStore } from '../progress/store.js';
import type { JsonObject, ProgressRecord } from '../progress/types.js';
import type { RemoteClient, RemoteOperation, RepositoryRef } from '../remote/client.js';
import type { RetryExecutor } from '../retry/retry-policy.js';
import { RunCancelledError, type Clock } from '../utils/clock.js';
import type { Logger } from '../utils/logger.js';
import type { Workflow } from './factory.js';
import { newlyCrossed } from './thresholds.js';
import {
  dispositionOf,
  type CallResult,
  type ClassifiedError,
  type FailureDisposition,
  type RemoteInvocation,
  type StepContext,
  type StepResult,
  type WorkflowReport,
  type WorkflowStatus,
  type WorkflowStep,
} from './types.js';

// =============================================================================
// RUNNER EVENTS
// =============================================================================

export type RunnerEvent =
  | { type: 'WORKFLOW_STARTED'; workflow: string; resumed: boolean; counter: number }
  | { type: 'STEP_STARTED'; workflow: string; stepId: string }
  | { type: 'STEP_COMPLETED'; workflow: string; stepId: string; counter: number; durationMs: number }
  | { type: 'CHECKPOINT_SAVED'; workflow: string; stepId: string }
  | { type: 'THRESHOLD_CROSSED'; workflow: string; threshold: number }
  | { type: 'CALL_RETRIED'; workflow: string; stepId: string; operation: RemoteOperation; attempt: number; delayMs: number; error: ClassifiedError }
  | { type: 'WORKFLOW_BLOCKED'; workflow: string; reason: string }
  | { type: 'WORKFLOW_FAILED'; workflow: string; stepId: string; error: ClassifiedError; disposition: FailureDisposition }
  | { type: 'WORKFLOW_COMPLETED'; workflow: string; counter: number }
  | { type: 'WORKFLOW_CANCELLED'; workflow: string };

export type RunnerEventHandler = (event: RunnerEvent) => void;

export interface RunnerDependencies {
  store: ProgressStore;
  executor: RetryExecutor;
  client: RemoteClient;
  credentials: CredentialRegistry;
  repository: RepositoryRef;
  clock: Clock;
  logger: Logger;
  metrics?: WorkflowMetrics;
}

// =============================================================================
// WORKFLOW RUNNER
// =============================================================================

export class WorkflowRunner {
  private deps: RunnerDependencies;
  private metrics: WorkflowMetrics;
  private eventHandlers: RunnerEventHandler[] = [];

  constructor(deps: RunnerDependencies) {
    this.deps = deps;
    this.metrics = deps.metrics ?? new NoOpMetrics();
  }

  /**
   * Subscribe to runner events.
   */
  onEvent(handler: RunnerEventHandler): void {
    this.eventHandlers.push(handler);
  }

  private emit(event: RunnerEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (e) {
        this.deps.logger.error({ error: e, event: event.type }, 'Event handler error');
      }
    }
  }

  /**
   * Run a workflow until it completes, blocks, fails or is cancelled.
   */
  async run(workflow: Workflow, signal: AbortSignal): Promise<WorkflowReport> {
    const { store, clock } = this.deps;
    const logger = this.deps.logger.child({ workflow: workflow.name, kind: workflow.kind });
    const startedAt = clock.now();

    let record: ProgressRecord;
    let resumed: boolean;
    try {
      const existing = await store.load(workflow.name);
      record = existing ?? (await store.commit(workflow.name, {}));

      resumed = existing !== null;
      if (resumed) {
        this.metrics.workflowResumed(workflow.kind);
      } else {
        this.metrics.workflowStarted(workflow.kind);
      }
      this.emit({ type: 'WORKFLOW_STARTED', workflow: workflow.name, resumed, counter: record.counter });
    } catch (error) {
      const classified = internalError(error);
      logger.error({ stepId: `${workflow.name}#load`, category: classified.category, error: classified.originalError ?? classified.message }, 'Workflow failed');
      this.metrics.workflowFailed(workflow.kind, classified.category);
      this.emit({ type: 'WORKFLOW_FAILED', workflow: workflow.name, stepId: `${workflow.name}#load`, error: classified, disposition: 'resumable' });
      return {
        workflow: workflow.name,
        kind: workflow.kind,
        status: 'failed',
        counter: 0,
        crossedThresholds: [],
        newlyCrossed: [],
        stepsCompleted: 0,
        durationMs: clock.now() - startedAt,
        stepId: `${workflow.name}#load`,
        error: classified,
        disposition: 'resumable',
      };
    }

    const initialCrossed = new Set(record.crossed_thresholds);
    let stepsCompleted = 0;

    const report = (status: WorkflowStatus, extra: Partial<WorkflowReport> = {}): WorkflowReport => ({
      workflow: workflow.name,
      kind: workflow.kind,
      status,
      counter: record.counter,
      crossedThresholds: [...record.crossed_thresholds],
      newlyCrossed: record.crossed_thresholds.filter((t) => !initialCrossed.has(t)),
      stepsCompleted,
      durationMs: clock.now() - startedAt,
      ...extra,
    });

    const cancelled = (): WorkflowReport => {
      logger.warn({ counter: record.counter }, 'Workflow cancelled');
      this.metrics.workflowCancelled(workflow.kind);
      this.emit({ type: 'WORKFLOW_CANCELLED', workflow: workflow.name });
      return report('cancelled');
    };

    const failed = async (stepId: string, error: ClassifiedError): Promise<WorkflowReport> => {
      const disposition = dispositionOf(error.category);
      try {
        record = await store.commit(workflow.name, {
          lastError: { step_id: stepId, category: error.category, code: error.code, message: error.message, at: clock.now() },
        });
      } catch (commitError) {
        logger.error({ error: commitError, stepId }, 'Failed to record workflow error');
      }
      logger.error({ stepId, category: error.category, code: error.code, disposition, error: error.originalError ?? error.message }, 'Workflow failed');
      this.metrics.workflowFailed(workflow.kind, error.category);
      this.emit({ type: 'WORKFLOW_FAILED', workflow: workflow.name, stepId, error, disposition });
      return report('failed', { stepId, error, disposition });
    };

    // Required credentials (a finished workflow needs none)
    const missing = workflow.roles.filter((role) => !this.deps.credentials.has(role));
    if (missing.length > 0 && !record.completed) {
      return failed(`${workflow.name}#preflight`, {
        category: 'FATAL_PRECONDITION',
        code: 'CREDENTIAL_MISSING',
        message: `Missing ${missing.join(', ')} credential`,
      });
    }

    logger.info({ counter: record.counter, crossed: record.crossed_thresholds }, resumed ? 'Workflow resumed' : 'Workflow started');

    try {
      for (;;) {
        if (signal.aborted) return cancelled();

        const next = workflow.nextStep(record);

        if (next.type === 'DONE') {
          if (!record.completed) {
            record = await store.commit(workflow.name, { completed: true });
          }
          logger.info({ counter: record.counter }, 'Workflow completed');
          this.metrics.workflowCompleted(workflow.kind, clock.now() - startedAt);
          this.emit({ type: 'WORKFLOW_COMPLETED', workflow: workflow.name, counter: record.counter });
          return report('completed');
        }

        if (next.type === 'BLOCKED') {
          return this.blocked(workflow, logger, next.reason, () => report('blocked', { reason: next.reason }));
        }

        const { step } = next;
        if (step.pauseBeforeMs > 0) {
          await clock.sleep(step.pauseBeforeMs, signal);
        }

        const stepStartedAt = clock.now();
        logger.debug({ stepId: step.id }, 'Step started');
        this.emit({ type: 'STEP_STARTED', workflow: workflow.name, stepId: step.id });

        let result: StepResult;
        try {
          result = await step.run(this.createContext(workflow, step, record, signal, logger));
        } catch (error) {
          if (error instanceof RunCancelledError) throw error;
          result = { type: 'FAILED', error: internalError(error) };
        }

        switch (result.type) {
          case 'SUCCESS': {
            const counter = record.counter + result.delta;
            const crossed = newlyCrossed(workflow.thresholds, record, counter);

            record = await store.commit(workflow.name, {
              counterDelta: result.delta,
              crossed,
              lastCompletedStepId: step.id,
              checkpoint: null,
              attributes: result.attributes,
              lastError: null,
            });
            stepsCompleted++;

            const durationMs = clock.now() - stepStartedAt;
            logger.info({ stepId: step.id, counter: record.counter, durationMs }, 'Step completed');
            this.metrics.stepCompleted(workflow.kind, durationMs);
            this.emit({ type: 'STEP_COMPLETED', workflow: workflow.name, stepId: step.id, counter: record.counter, durationMs });

            for (const threshold of crossed) {
              logger.info({ threshold, counter: record.counter }, 'Threshold crossed');
              this.metrics.thresholdCrossed(workflow.kind, threshold);
              this.emit({ type: 'THRESHOLD_CROSSED', workflow: workflow.name, threshold });
            }
            break;
          }

          case 'BLOCKED': {
            const { reason } = result;
            return this.blocked(workflow, logger, reason, () => report('blocked', { stepId: step.id, reason }));
          }

          case 'FAILED':
            return failed(step.id, result.error);
        }
      }
    } catch (error) {
      if (error instanceof RunCancelledError) return cancelled();
      return failed(record.checkpoint?.step_id ?? `${workflow.name}#${record.counter + 1}`, internalError(error));
    }
  }

  // ===========================================================================
  // PRIVATE
  // ===========================================================================

  private blocked(
    workflow: Workflow,
    logger: Logger,
    reason: string,
    report: () => WorkflowReport
  ): WorkflowReport {
    logger.warn({ reason }, 'Workflow blocked');
    this.metrics.workflowBlocked(workflow.kind, reason);
    this.emit({ type: 'WORKFLOW_BLOCKED', workflow: workflow.name, reason });
    return report();
  }

  private createContext(
    workflow: Workflow,
    step: WorkflowStep,
    record: ProgressRecord,
    signal: AbortSignal,
    logger: Logger
  ): StepContext {
    const { store, executor, client, credentials, repository, clock } = this.deps;
    const checkpoint: JsonObject | null =
      record.checkpoint?.step_id === step.id ? structuredClone(record.checkpoint.data) : null;
    const stepLogger = logger.child({ stepId: step.id });

    return {
      workflow: workflow.name,
      stepId: step.id,
      repository,
      checkpoint,
      clock,
      signal,
      logger: stepLogger,

      hasIdentity: (role: CredentialRole) => credentials.has(role),
      identity: (role: CredentialRole) => credentials.identity(role),

      call: async <T>(
        role: CredentialRole,
        operation: RemoteOperation,
        invoke: RemoteInvocation<T>
      ): Promise<CallResult<T>> => {
        let credential: Credential;
        try {
          credential = credentials.get(role);
        } catch (error) {
          if (!(error instanceof CredentialNotFoundError)) throw error;
          return {
            type: 'FATAL',
            attempts: 0,
            error: { category: 'FATAL_PRECONDITION', code: 'CREDENTIAL_MISSING', message: error.message },
          };
        }

        const issuer = credential;
        return executor.execute(role, () => invoke(client, issuer), {
          operation,
          signal,
          onRetry: (attempt, error, delayMs) => {
            stepLogger.warn({ operation, attempt, delayMs, category: error.category, code: error.code }, 'Retrying call');
            this.emit({ type: 'CALL_RETRIED', workflow: workflow.name, stepId: step.id, operation, attempt, delayMs, error });
          },
        });
      },

      saveCheckpoint: async (data: JsonObject | null) => {
        await store.commit(workflow.name, {
          checkpoint: data === null ? null : { step_id: step.id, data },
        });
        stepLogger.debug({}, 'Checkpoint saved');
        this.metrics.checkpointSaved(workflow.kind);
        this.emit({ type: 'CHECKPOINT_SAVED', workflow: workflow.name, stepId: step.id });
      },
    };
  }
}

function internalError(error: unknown): ClassifiedError {
  if (error instanceof Error) {
    return { category: 'FATAL_INTERNAL', code: error.name, message: error.message, originalError: error };
  }
  return { category: 'FATAL_INTERNAL', code: 'UNKNOWN', message: String(error) };
}
