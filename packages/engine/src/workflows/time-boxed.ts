/**
 * Time-Boxed Workflow
 *
 * One-shot: open an issue, then close it within a deadline.
 *
 * Elapsed time is measured on the engine clock from the moment the open
 * call returned to the moment the close call returned. The open is
 * checkpointed, so a resumed step only closes.
 *
 * A close past the deadline is FATAL_DEADLINE: the workflow stops as
 * unachievable for this run and the next run starts over with a fresh issue.
 */

import type { CredentialRole } from '../credentials/registry.js';
import type { ProgressRecord } from '../progress/types.js';
import { numberField } from './checkpoint.js';
import { isFinished } from './thresholds.js';
import type { NextStep, StepContext, StepResult, WorkflowBase } from './types.js';

export interface TimeBoxedOptions {
  deadlineMs?: number;
}

export const TIME_BOXED_DEFAULTS = {
  deadlineMs: 5 * 60_000,
} as const;

export class TimeBoxedWorkflow implements WorkflowBase<'time-boxed'> {
  readonly kind = 'time-boxed' as const;
  readonly roles: readonly CredentialRole[] = ['primary'];
  readonly thresholds: readonly number[] = [1];

  readonly deadlineMs: number;

  constructor(
    readonly name: string,
    options: TimeBoxedOptions = {}
  ) {
    this.deadlineMs = options.deadlineMs ?? TIME_BOXED_DEFAULTS.deadlineMs;
  }

  nextStep(record: ProgressRecord): NextStep {
    if (isFinished(this.thresholds, record)) {
      return { type: 'DONE' };
    }

    return {
      type: 'STEP',
      step: {
        id: `${this.name}#1`,
        index: 1,
        description: `Open and close an issue within ${this.deadlineMs}ms`,
        pauseBeforeMs: 0,
        run: (ctx) => this.openAndClose(ctx),
      },
    };
  }

  private async openAndClose(ctx: StepContext): Promise<StepResult> {
    let issueNumber = numberField(ctx.checkpoint, 'issue_number');
    let openedAt = numberField(ctx.checkpoint, 'opened_at');

    if (issueNumber === undefined || openedAt === undefined) {
      const opened = await ctx.call('primary', 'createIssue', (client, credential) =>
        client.createIssue(credential, ctx.repository, {
          title: 'Timed issue',
          body: `Opened to be closed within ${Math.round(this.deadlineMs / 1000)} seconds.`,
        })
      );
      if (opened.type === 'FATAL') {
        return { type: 'FAILED', error: opened.error };
      }

      issueNumber = opened.value.number;
      openedAt = ctx.clock.now();
      await ctx.saveCheckpoint({ issue_number: issueNumber, opened_at: openedAt });
    }

    const closing = issueNumber;
    const closed = await ctx.call('primary', 'closeIssue', (client, credential) =>
      client.closeIssue(credential, ctx.repository, closing)
    );
    if (closed.type === 'FATAL') {
      return { type: 'FAILED', error: closed.error };
    }

    const elapsed = ctx.clock.now() - openedAt;
    if (elapsed <= this.deadlineMs) {
      ctx.logger.info({ issueNumber, elapsedMs: elapsed }, 'Issue closed within deadline');
      return { type: 'SUCCESS', delta: 1 };
    }

    // Start over with a fresh issue next run
    await ctx.saveCheckpoint(null);
    return {
      type: 'FAILED',
      error: {
        category: 'FATAL_DEADLINE',
        code: 'DEADLINE_EXCEEDED',
        message: `Issue #${issueNumber} closed after ${elapsed}ms, deadline is ${this.deadlineMs}ms`,
      },
    };
  }
}
