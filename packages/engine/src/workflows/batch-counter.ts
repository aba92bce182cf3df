/**
 * Batch-Counter Workflow
 *
 * Counts merged changes. Step n writes `n` to a counter file on its own
 * branch, opens a pull request and merges it.
 *
 * Pacing: stepDelayMs between steps, batchDelayMs instead when a step
 * starts a new batch. Independent of the rate limiter.
 */

import type { CredentialRole } from '../credentials/registry.js';
import type { ProgressRecord } from '../progress/types.js';
import { isFinished, validateThresholds } from './thresholds.js';
import type { NextStep, StepContext, StepResult, WorkflowBase } from './types.js';

// =============================================================================
// OPTIONS
// =============================================================================

export interface BatchCounterOptions {
  thresholds?: number[];
  batchSize?: number;
  stepDelayMs?: number;
  batchDelayMs?: number;
  filePath?: string;
  /** Branches are `<prefix>/<n>`; defaults to the workflow name. */
  branchPrefix?: string;
}

export const BATCH_COUNTER_DEFAULTS = {
  thresholds: [2, 16, 128, 1024],
  batchSize: 10,
  stepDelayMs: 2_000,
  batchDelayMs: 30_000,
  filePath: 'counter.txt',
} as const;

// =============================================================================
// WORKFLOW
// =============================================================================

export class BatchCounterWorkflow implements WorkflowBase<'batch-counter'> {
  readonly kind = 'batch-counter' as const;
  readonly roles: readonly CredentialRole[] = ['primary'];
  readonly thresholds: readonly number[];

  private batchSize: number;
  private stepDelayMs: number;
  private batchDelayMs: number;
  private filePath: string;
  private branchPrefix: string;

  constructor(
    readonly name: string,
    options: BatchCounterOptions = {}
  ) {
    this.thresholds = validateThresholds(name, options.thresholds ?? BATCH_COUNTER_DEFAULTS.thresholds);
    this.batchSize = Math.max(1, options.batchSize ?? BATCH_COUNTER_DEFAULTS.batchSize);
    this.stepDelayMs = options.stepDelayMs ?? BATCH_COUNTER_DEFAULTS.stepDelayMs;
    this.batchDelayMs = options.batchDelayMs ?? BATCH_COUNTER_DEFAULTS.batchDelayMs;
    this.filePath = options.filePath ?? BATCH_COUNTER_DEFAULTS.filePath;
    this.branchPrefix = options.branchPrefix ?? name;
  }

  nextStep(record: ProgressRecord): NextStep {
    if (isFinished(this.thresholds, record)) {
      return { type: 'DONE' };
    }

    const n = record.counter + 1;
    return {
      type: 'STEP',
      step: {
        id: `${this.name}#${n}`,
        index: n,
        description: `Merge counter change ${n}`,
        pauseBeforeMs: this.pauseBefore(n),
        run: (ctx) => this.mergeChange(ctx, n),
      },
    };
  }

  /**
   * Delay before step n. The first step of a batch waits the batch delay.
   */
  pauseBefore(n: number): number {
    if (n <= 1) return 0;
    return (n - 1) % this.batchSize === 0 ? this.batchDelayMs : this.stepDelayMs;
  }

  branchFor(n: number): string {
    return `${this.branchPrefix}/${n}`;
  }

  private async mergeChange(ctx: StepContext, n: number): Promise<StepResult> {
    const title = `Update counter to ${n}`;

    const result = await ctx.call('primary', 'createAndMergeChange', (client, credential) =>
      client.createAndMergeChange(credential, ctx.repository, {
        branch: this.branchFor(n),
        path: this.filePath,
        content: `${n}\n`,
        message: title,
        title,
        body: `Counter change ${n}.`,
      })
    );

    if (result.type === 'FATAL') {
      return { type: 'FAILED', error: result.error };
    }

    ctx.logger.debug({ pullNumber: result.value.pullNumber, mergeSha: result.value.mergeSha }, 'Counter change merged');
    return { type: 'SUCCESS', delta: 1 };
  }
}
