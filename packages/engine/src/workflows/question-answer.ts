/**
 * Question/Answer Workflow
 *
 * Counts accepted answers. One cycle:
 *   primary creates a discussion → secondary answers → primary accepts
 *
 * Every sub-call is checkpointed, so a resumed cycle never opens a
 * second discussion or posts a second answer.
 *
 * A setup step (not counted) invites the secondary as a collaborator and
 * accepts the invitation with the secondary credential.
 */

import type { CredentialRole } from '../credentials/registry.js';
import type { ProgressRecord } from '../progress/types.js';
import type { DiscussionTarget } from '../remote/client.js';
import { hasField, numberField, stringField } from './checkpoint.js';
import { isFinished, validateThresholds } from './thresholds.js';
import type { NextStep, StepContext, StepResult, WorkflowBase } from './types.js';

export interface QuestionAnswerOptions {
  thresholds?: number[];
  inviteCollaborator?: boolean;
  stepDelayMs?: number;
}

export const QUESTION_ANSWER_DEFAULTS = {
  thresholds: [8, 16, 32, 64],
  inviteCollaborator: true,
  stepDelayMs: 2_000,
} as const;

type TargetLookup =
  | { type: 'FOUND'; target: DiscussionTarget }
  | { type: 'STOP'; result: StepResult };

export class QuestionAnswerWorkflow implements WorkflowBase<'question-answer'> {
  readonly kind = 'question-answer' as const;
  readonly roles: readonly CredentialRole[] = ['primary', 'secondary'];
  readonly thresholds: readonly number[];

  private inviteCollaborator: boolean;
  private stepDelayMs: number;
  private target: DiscussionTarget | null = null;

  constructor(
    readonly name: string,
    options: QuestionAnswerOptions = {}
  ) {
    this.thresholds = validateThresholds(name, options.thresholds ?? QUESTION_ANSWER_DEFAULTS.thresholds);
    this.inviteCollaborator = options.inviteCollaborator ?? QUESTION_ANSWER_DEFAULTS.inviteCollaborator;
    this.stepDelayMs = options.stepDelayMs ?? QUESTION_ANSWER_DEFAULTS.stepDelayMs;
  }

  nextStep(record: ProgressRecord): NextStep {
    if (isFinished(this.thresholds, record)) {
      return { type: 'DONE' };
    }

    if (this.inviteCollaborator && record.attributes.collaborator_ready !== true) {
      return {
        type: 'STEP',
        step: {
          id: `${this.name}#setup`,
          index: 0,
          description: 'Add the secondary identity as collaborator',
          pauseBeforeMs: 0,
          run: (ctx) => this.setupCollaborator(ctx),
        },
      };
    }

    const n = record.counter + 1;
    return {
      type: 'STEP',
      step: {
        id: `${this.name}#${n}`,
        index: n,
        description: `Question/answer cycle ${n}`,
        pauseBeforeMs: n === 1 ? 0 : this.stepDelayMs,
        run: (ctx) => this.cycle(ctx, n),
      },
    };
  }

  // ===========================================================================
  // SETUP
  // ===========================================================================

  private async setupCollaborator(ctx: StepContext): Promise<StepResult> {
    let invitationId: number | null;

    if (hasField(ctx.checkpoint, 'invitation_id')) {
      invitationId = numberField(ctx.checkpoint, 'invitation_id') ?? null;
    } else {
      const login = ctx.identity('secondary').login;
      const invited = await ctx.call('primary', 'inviteCollaborator', (client, credential) =>
        client.inviteCollaborator(credential, ctx.repository, login)
      );
      if (invited.type === 'FATAL') {
        return { type: 'FAILED', error: invited.error };
      }
      invitationId = invited.value.invitationId;
      await ctx.saveCheckpoint({ invitation_id: invitationId });
    }

    if (invitationId !== null) {
      const pending = invitationId;
      const accepted = await ctx.call('secondary', 'acceptInvitation', (client, credential) =>
        client.acceptInvitation(credential, pending)
      );
      if (accepted.type === 'FATAL') {
        return { type: 'FAILED', error: accepted.error };
      }
    }

    ctx.logger.info({ invitationId }, 'Secondary identity is a collaborator');
    return { type: 'SUCCESS', delta: 0, attributes: { collaborator_ready: true } };
  }

  // ===========================================================================
  // CYCLE
  // ===========================================================================

  private async cycle(ctx: StepContext, n: number): Promise<StepResult> {
    const lookup = await this.resolveTarget(ctx);
    if (lookup.type === 'STOP') return lookup.result;
    const { target } = lookup;

    let discussionId = stringField(ctx.checkpoint, 'discussion_id');
    let commentId = stringField(ctx.checkpoint, 'comment_id');

    if (discussionId === undefined) {
      const created = await ctx.call('primary', 'createDiscussion', (client, credential) =>
        client.createDiscussion(credential, target, {
          title: `Question ${n}: how should this module be structured?`,
          body: `Looking for a recommended approach for question ${n}.`,
        })
      );
      if (created.type === 'FATAL') {
        return { type: 'FAILED', error: created.error };
      }
      discussionId = created.value.discussionId;
      await ctx.saveCheckpoint({ discussion_id: discussionId });
    }

    if (commentId === undefined) {
      const question = discussionId;
      const answered = await ctx.call('secondary', 'postDiscussionComment', (client, credential) =>
        client.postDiscussionComment(
          credential,
          question,
          `Answer to question ${n}: split it into small modules with explicit interfaces and test each one.`
        )
      );
      if (answered.type === 'FATAL') {
        return { type: 'FAILED', error: answered.error };
      }
      commentId = answered.value.commentId;
      await ctx.saveCheckpoint({ discussion_id: discussionId, comment_id: commentId });
    }

    const answer = commentId;
    const accepted = await ctx.call('primary', 'markCommentAccepted', (client, credential) =>
      client.markCommentAccepted(credential, answer)
    );
    if (accepted.type === 'FATAL') {
      return { type: 'FAILED', error: accepted.error };
    }

    ctx.logger.debug({ discussionId, commentId }, 'Answer accepted');
    return { type: 'SUCCESS', delta: 1 };
  }

  /**
   * Discussion target is looked up once per process.
   */
  private async resolveTarget(ctx: StepContext): Promise<TargetLookup> {
    if (this.target) {
      return { type: 'FOUND', target: this.target };
    }

    const result = await ctx.call('primary', 'getDiscussionTarget', (client, credential) =>
      client.getDiscussionTarget(credential, ctx.repository)
    );
    if (result.type === 'FATAL') {
      return { type: 'STOP', result: { type: 'FAILED', error: result.error } };
    }
    if (result.value === null) {
      return {
        type: 'STOP',
        result: {
          type: 'BLOCKED',
          reason: `Discussions are not enabled on ${ctx.repository.owner}/${ctx.repository.name}`,
        },
      };
    }

    this.target = result.value;
    return { type: 'FOUND', target: result.value };
  }
}
