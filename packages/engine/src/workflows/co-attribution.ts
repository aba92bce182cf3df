/**
 * Co-Attribution Workflow
 *
 * Counts commits attributed to both identities. Each step commits one
 * file carrying a `Co-authored-by` trailer for the other identity.
 *
 * By default the primary credential issues every commit and tags the
 * secondary. With alternateAuthors the issuing credential alternates per
 * step; the turn lives in the record's attributes so it survives restarts.
 * Alternation needs the secondary to have push access to the repository.
 */

import type { CredentialRole } from '../credentials/registry.js';
import type { ProgressRecord } from '../progress/types.js';
import { isFinished, validateThresholds } from './thresholds.js';
import type { NextStep, StepContext, StepResult, WorkflowBase } from './types.js';

export interface CoAttributionOptions {
  thresholds?: number[];
  alternateAuthors?: boolean;
  stepDelayMs?: number;
  directory?: string;
}

export const CO_ATTRIBUTION_DEFAULTS = {
  thresholds: [10, 24, 48],
  alternateAuthors: false,
  stepDelayMs: 1_000,
  directory: 'pair-commits',
} as const;

function otherRole(role: CredentialRole): CredentialRole {
  return role === 'primary' ? 'secondary' : 'primary';
}

export class CoAttributionWorkflow implements WorkflowBase<'co-attribution'> {
  readonly kind = 'co-attribution' as const;
  readonly roles: readonly CredentialRole[] = ['primary', 'secondary'];
  readonly thresholds: readonly number[];

  private alternateAuthors: boolean;
  private stepDelayMs: number;
  private directory: string;

  constructor(
    readonly name: string,
    options: CoAttributionOptions = {}
  ) {
    this.thresholds = validateThresholds(name, options.thresholds ?? CO_ATTRIBUTION_DEFAULTS.thresholds);
    this.alternateAuthors = options.alternateAuthors ?? CO_ATTRIBUTION_DEFAULTS.alternateAuthors;
    this.stepDelayMs = options.stepDelayMs ?? CO_ATTRIBUTION_DEFAULTS.stepDelayMs;
    this.directory = options.directory ?? CO_ATTRIBUTION_DEFAULTS.directory;
  }

  nextStep(record: ProgressRecord): NextStep {
    if (isFinished(this.thresholds, record)) {
      return { type: 'DONE' };
    }

    const n = record.counter + 1;
    const author = this.authorFor(record);

    return {
      type: 'STEP',
      step: {
        id: `${this.name}#${n}`,
        index: n,
        description: `Co-attributed commit ${n} by ${author}`,
        pauseBeforeMs: n === 1 ? 0 : this.stepDelayMs,
        run: (ctx) => this.commit(ctx, n, author),
      },
    };
  }

  authorFor(record: ProgressRecord): CredentialRole {
    if (!this.alternateAuthors) return 'primary';
    return record.attributes.turn === 'secondary' ? 'secondary' : 'primary';
  }

  private async commit(ctx: StepContext, n: number, author: CredentialRole): Promise<StepResult> {
    const coAuthor = otherRole(author);
    const coAuthorIdentity = ctx.identity(coAuthor);

    const result = await ctx.call(author, 'createCommit', (client, credential) =>
      client.createCommit(credential, ctx.repository, {
        path: `${this.directory}/commit-${n}.txt`,
        content: `Pair commit ${n}\n`,
        message: `Add pair commit ${n}`,
        coAuthors: [coAuthorIdentity],
      })
    );

    if (result.type === 'FATAL') {
      return { type: 'FAILED', error: result.error };
    }

    ctx.logger.debug({ sha: result.value.sha, author, coAuthor: coAuthorIdentity.login }, 'Co-attributed commit created');
    return {
      type: 'SUCCESS',
      delta: 1,
      attributes: this.alternateAuthors ? { turn: coAuthor } : undefined,
    };
  }
}
