/**
 * Review-Bypass Workflow
 *
 * One-shot: open a pull request (optionally requesting a review), then
 * merge it without waiting for the review. The pull request number is
 * checkpointed so a resumed step only merges.
 */

import type { CredentialRole } from '../credentials/registry.js';
import type { ProgressRecord } from '../progress/types.js';
import { numberField } from './checkpoint.js';
import { isFinished } from './thresholds.js';
import type { NextStep, StepContext, StepResult, WorkflowBase } from './types.js';

export interface ReviewBypassOptions {
  /** Login asked for review; defaults to the secondary identity when configured. */
  reviewer?: string;
  branch?: string;
  filePath?: string;
}

export const REVIEW_BYPASS_DEFAULTS = {
  filePath: 'review-bypass.txt',
} as const;

export class ReviewBypassWorkflow implements WorkflowBase<'review-bypass'> {
  readonly kind = 'review-bypass' as const;
  readonly roles: readonly CredentialRole[] = ['primary'];
  readonly thresholds: readonly number[] = [1];

  private reviewer?: string;
  private branch: string;
  private filePath: string;

  constructor(
    readonly name: string,
    options: ReviewBypassOptions = {}
  ) {
    this.reviewer = options.reviewer;
    this.branch = options.branch ?? `${name}/change`;
    this.filePath = options.filePath ?? REVIEW_BYPASS_DEFAULTS.filePath;
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
        description: 'Merge a pull request without review',
        pauseBeforeMs: 0,
        run: (ctx) => this.openAndMerge(ctx),
      },
    };
  }

  private async openAndMerge(ctx: StepContext): Promise<StepResult> {
    let pullNumber = numberField(ctx.checkpoint, 'pull_number');

    if (pullNumber === undefined) {
      const reviewer =
        this.reviewer ?? (ctx.hasIdentity('secondary') ? ctx.identity('secondary').login : undefined);

      const opened = await ctx.call('primary', 'createBypassPullRequest', (client, credential) =>
        client.createBypassPullRequest(credential, ctx.repository, {
          branch: this.branch,
          path: this.filePath,
          content: 'Merged without waiting for review.\n',
          message: 'Add review bypass file',
          title: 'Merge without review',
          body: reviewer ? `Review requested from @${reviewer}.` : 'No reviewer requested.',
          reviewer,
        })
      );
      if (opened.type === 'FATAL') {
        return { type: 'FAILED', error: opened.error };
      }
      pullNumber = opened.value.pullNumber;
      await ctx.saveCheckpoint({ pull_number: pullNumber });
    }

    const merging = pullNumber;
    const merged = await ctx.call('primary', 'mergePullRequest', (client, credential) =>
      client.mergePullRequest(credential, ctx.repository, merging, { deleteBranch: this.branch })
    );
    if (merged.type === 'FATAL') {
      return { type: 'FAILED', error: merged.error };
    }

    ctx.logger.info({ pullNumber, mergeSha: merged.value.mergeSha }, 'Pull request merged without review');
    return { type: 'SUCCESS', delta: 1 };
  }
}
