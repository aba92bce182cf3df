/**
 * Remote Client Contract
 *
 * The engine depends only on this interface.
 * Every operation takes the issuing credential explicitly and returns
 * a value-typed result: API errors are data, not exceptions.
 *
 * Thrown errors mean something outside the contract broke
 * (a bug, a dropped connection the implementation did not map).
 */

import type { Credential, Identity } from '../credentials/registry.js';
import { attributionEmail } from '../credentials/registry.js';

// =============================================================================
// RESULT TYPES
// =============================================================================

/**
 * Server-reported budget for the issuing credential.
 */
export interface RateSnapshot {
  remaining: number;
  limit: number;
  /** Epoch ms at which the window resets. */
  resetAt: number;
  /** Budget the numbers belong to (x-ratelimit-resource), e.g. core or graphql. */
  resource?: string;
}

/** Budgets the engine paces separately per credential. */
export type RateResource = 'core' | 'graphql';

export const RATE_RESOURCES: readonly RateResource[] = ['core', 'graphql'];

export function isRateResource(value: string): value is RateResource {
  return value === 'core' || value === 'graphql';
}

export type RemoteErrorCode =
  | 'RATE_LIMITED'
  | 'SECONDARY_RATE_LIMIT'
  | 'NETWORK_ERROR'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'UNPROCESSABLE'
  | 'SERVER_ERROR'
  | 'BAD_RESPONSE'
  | 'GRAPHQL_ERROR';

export interface RemoteFailure {
  /** HTTP status; 0 when no response was received. */
  status: number;
  code: RemoteErrorCode;
  message: string;
  rate?: RateSnapshot;
  retryAfterMs?: number;
}

export type RemoteResult<T> =
  | { ok: true; value: T; rate?: RateSnapshot }
  | { ok: false; failure: RemoteFailure };

export function success<T>(value: T, rate?: RateSnapshot): RemoteResult<T> {
  return { ok: true, value, rate };
}

export function failure<T>(f: RemoteFailure): RemoteResult<T> {
  return { ok: false, failure: f };
}

// =============================================================================
// DOMAIN TYPES
// =============================================================================

export interface RepositoryRef {
  owner: string;
  name: string;
}

export interface RepositorySpec extends RepositoryRef {
  private: boolean;
  description?: string;
}

export interface RepositoryInfo {
  fullName: string;
  defaultBranch: string;
  created: boolean;
}

export interface FileChange {
  branch: string;
  path: string;
  content: string;
  message: string;
}

export interface MergedChange {
  pullNumber: number;
  mergeSha: string;
}

export interface IssueRef {
  number: number;
}

export interface CommitRef {
  sha: string;
}

export interface DiscussionTarget {
  repositoryId: string;
  categoryId: string;
  categoryName: string;
}

export interface DiscussionRef {
  discussionId: string;
  number: number;
}

export interface CommentRef {
  commentId: string;
}

export interface InvitationRef {
  /** null when the login is already a collaborator. */
  invitationId: number | null;
}

export interface PullRequestRef {
  pullNumber: number;
}

// =============================================================================
// CLIENT INTERFACE
// =============================================================================

export interface RemoteClient {
  getRateBudget(credential: Credential): Promise<RemoteResult<RateSnapshot>>;

  /** Create the repository when missing. */
  ensureRepository(credential: Credential, spec: RepositorySpec): Promise<RemoteResult<RepositoryInfo>>;

  /** Branch, write file, open pull request, merge, delete branch. */
  createAndMergeChange(
    credential: Credential,
    repo: RepositoryRef,
    change: FileChange & { title: string; body: string }
  ): Promise<RemoteResult<MergedChange>>;

  createIssue(
    credential: Credential,
    repo: RepositoryRef,
    issue: { title: string; body: string }
  ): Promise<RemoteResult<IssueRef>>;

  closeIssue(credential: Credential, repo: RepositoryRef, issueNumber: number): Promise<RemoteResult<IssueRef>>;

  /** Commit on the default branch carrying a co-author trailer per identity. */
  createCommit(
    credential: Credential,
    repo: RepositoryRef,
    commit: Omit<FileChange, 'branch'> & { coAuthors: Identity[] }
  ): Promise<RemoteResult<CommitRef>>;

  /** null when discussions are disabled or no usable category exists. */
  getDiscussionTarget(credential: Credential, repo: RepositoryRef): Promise<RemoteResult<DiscussionTarget | null>>;

  createDiscussion(
    credential: Credential,
    target: DiscussionTarget,
    discussion: { title: string; body: string }
  ): Promise<RemoteResult<DiscussionRef>>;

  postDiscussionComment(
    credential: Credential,
    discussionId: string,
    body: string
  ): Promise<RemoteResult<CommentRef>>;

  markCommentAccepted(credential: Credential, commentId: string): Promise<RemoteResult<CommentRef>>;

  inviteCollaborator(credential: Credential, repo: RepositoryRef, login: string): Promise<RemoteResult<InvitationRef>>;

  acceptInvitation(credential: Credential, invitationId: number): Promise<RemoteResult<InvitationRef>>;

  /** Branch, write file, open pull request, optionally request a review. Not merged. */
  createBypassPullRequest(
    credential: Credential,
    repo: RepositoryRef,
    change: FileChange & { title: string; body: string; reviewer?: string }
  ): Promise<RemoteResult<PullRequestRef>>;

  mergePullRequest(
    credential: Credential,
    repo: RepositoryRef,
    pullNumber: number,
    options?: { deleteBranch?: string }
  ): Promise<RemoteResult<MergedChange>>;
}

export type RemoteOperation = keyof RemoteClient;

/**
 * Worst-case number of HTTP requests each operation issues against its budget,
 * counting the lookups made when an interrupted attempt is resumed.
 */
export const REMOTE_CALL_COSTS: Record<RemoteOperation, number> = {
  getRateBudget: 1,
  ensureRepository: 2,
  // repo, ref, create ref, contents, write, open (+ list), pull, merge, delete ref
  createAndMergeChange: 10,
  createIssue: 1,
  closeIssue: 1,
  createCommit: 2,
  getDiscussionTarget: 1,
  createDiscussion: 1,
  postDiscussionComment: 1,
  markCommentAccepted: 1,
  inviteCollaborator: 1,
  acceptInvitation: 1,
  // repo, ref, create ref, contents, write, open (+ list), review request
  createBypassPullRequest: 8,
  // pull, merge, delete ref
  mergePullRequest: 3,
};

/**
 * Budget each operation spends from.
 */
export const REMOTE_CALL_RESOURCES: Record<RemoteOperation, RateResource> = {
  getRateBudget: 'core',
  ensureRepository: 'core',
  createAndMergeChange: 'core',
  createIssue: 'core',
  closeIssue: 'core',
  createCommit: 'core',
  getDiscussionTarget: 'graphql',
  createDiscussion: 'graphql',
  postDiscussionComment: 'graphql',
  markCommentAccepted: 'graphql',
  inviteCollaborator: 'core',
  acceptInvitation: 'core',
  createBypassPullRequest: 'core',
  mergePullRequest: 'core',
};

/**
 * Append one `Co-authored-by` trailer per identity.
 */
export function withCoAuthorTrailers(message: string, coAuthors: Identity[]): string {
  if (coAuthors.length === 0) return message;
  const trailers = coAuthors.map(
    (identity) =>
      `Co-authored-by: ${identity.name ?? identity.login} <${attributionEmail(identity)}>`
  );
  return `${message}\n\n${trailers.join('\n')}`;
}
