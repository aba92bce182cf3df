/**
 * Dry-Run Remote Client
 *
 * Answers every operation with a synthetic success and touches nothing.
 * Ids are deterministic so two dry runs log the same transitions.
 */

import type { Credential, Identity } from '../credentials/registry.js';
import {
  success,
  type CommentRef,
  type CommitRef,
  type DiscussionRef,
  type DiscussionTarget,
  type FileChange,
  type InvitationRef,
  type IssueRef,
  type MergedChange,
  type PullRequestRef,
  type RateSnapshot,
  type RemoteClient,
  type RemoteResult,
  type RepositoryInfo,
  type RepositoryRef,
  type RepositorySpec,
} from './client.js';

export class DryRunRemoteClient implements RemoteClient {
  private sequence = 0;
  private calls = 0;

  /** Number of operations answered. */
  get callCount(): number {
    return this.calls;
  }

  async getRateBudget(_credential: Credential): Promise<RemoteResult<RateSnapshot>> {
    this.calls++;
    return success({ remaining: 5000, limit: 5000, resetAt: Date.now() + 60 * 60_000 });
  }

  async ensureRepository(_credential: Credential, spec: RepositorySpec): Promise<RemoteResult<RepositoryInfo>> {
    this.calls++;
    return success({ fullName: `${spec.owner}/${spec.name}`, defaultBranch: 'main', created: false });
  }

  async createAndMergeChange(
    _credential: Credential,
    _repo: RepositoryRef,
    _change: FileChange & { title: string; body: string }
  ): Promise<RemoteResult<MergedChange>> {
    this.calls++;
    const id = this.next();
    return success({ pullNumber: id, mergeSha: this.sha(id) });
  }

  async createIssue(
    _credential: Credential,
    _repo: RepositoryRef,
    _issue: { title: string; body: string }
  ): Promise<RemoteResult<IssueRef>> {
    this.calls++;
    return success({ number: this.next() });
  }

  async closeIssue(_credential: Credential, _repo: RepositoryRef, issueNumber: number): Promise<RemoteResult<IssueRef>> {
    this.calls++;
    return success({ number: issueNumber });
  }

  async createCommit(
    _credential: Credential,
    _repo: RepositoryRef,
    _commit: Omit<FileChange, 'branch'> & { coAuthors: Identity[] }
  ): Promise<RemoteResult<CommitRef>> {
    this.calls++;
    return success({ sha: this.sha(this.next()) });
  }

  async getDiscussionTarget(_credential: Credential, repo: RepositoryRef): Promise<RemoteResult<DiscussionTarget | null>> {
    this.calls++;
    return success({ repositoryId: `dry-run-repo-${repo.name}`, categoryId: 'dry-run-category', categoryName: 'Q&A' });
  }

  async createDiscussion(
    _credential: Credential,
    _target: DiscussionTarget,
    _discussion: { title: string; body: string }
  ): Promise<RemoteResult<DiscussionRef>> {
    this.calls++;
    const id = this.next();
    return success({ discussionId: `dry-run-discussion-${id}`, number: id });
  }

  async postDiscussionComment(
    _credential: Credential,
    _discussionId: string,
    _body: string
  ): Promise<RemoteResult<CommentRef>> {
    this.calls++;
    return success({ commentId: `dry-run-comment-${this.next()}` });
  }

  async markCommentAccepted(_credential: Credential, commentId: string): Promise<RemoteResult<CommentRef>> {
    this.calls++;
    return success({ commentId });
  }

  async inviteCollaborator(_credential: Credential, _repo: RepositoryRef, _login: string): Promise<RemoteResult<InvitationRef>> {
    this.calls++;
    return success({ invitationId: this.next() });
  }

  async acceptInvitation(_credential: Credential, invitationId: number): Promise<RemoteResult<InvitationRef>> {
    this.calls++;
    return success({ invitationId });
  }

  async createBypassPullRequest(
    _credential: Credential,
    _repo: RepositoryRef,
    _change: FileChange & { title: string; body: string; reviewer?: string }
  ): Promise<RemoteResult<PullRequestRef>> {
    this.calls++;
    return success({ pullNumber: this.next() });
  }

  async mergePullRequest(
    _credential: Credential,
    _repo: RepositoryRef,
    pullNumber: number,
    _options?: { deleteBranch?: string }
  ): Promise<RemoteResult<MergedChange>> {
    this.calls++;
    return success({ pullNumber, mergeSha: this.sha(pullNumber) });
  }

  private next(): number {
    this.sequence++;
    return this.sequence;
  }

  private sha(id: number): string {
    return `dryrun${id.toString(16)}`.padEnd(40, '0');
  }
}
