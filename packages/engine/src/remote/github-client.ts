/**
 * GitHub Remote Client
 *
 * REST v3 + GraphQL over fetch. Every response body is validated with zod;
 * every failure comes back as a RemoteFailure carrying the rate snapshot
 * from the x-ratelimit-* headers.
 *
 * Multi-request operations tolerate being re-run after an interruption:
 * an existing branch or pull request is reused, an already merged pull
 * request is reported as merged.
 */

import { z } from 'zod';

import type { Credential, Identity } from '../credentials/registry.js';
import {
  failure,
  success,
  withCoAuthorTrailers,
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
  type RemoteErrorCode,
  type RemoteFailure,
  type RemoteResult,
  type RepositoryInfo,
  type RepositoryRef,
  type RepositorySpec,
} from './client.js';

// =============================================================================
// CONFIG
// =============================================================================

export interface GitHubClientConfig {
  /** Per-request timeout in ms */
  timeoutMs?: number;
  userAgent?: string;
  /** Injectable for tests */
  fetch?: typeof fetch;
}

const API_VERSION = '2022-11-28';

// =============================================================================
// RESPONSE SCHEMAS
// =============================================================================

const RateLimitResponse = z.object({
  resources: z.object({
    core: z.object({ limit: z.number(), remaining: z.number(), reset: z.number() }),
  }),
});

const RepositoryResponse = z.object({
  full_name: z.string(),
  default_branch: z.string().default('main'),
});

const RefResponse = z.object({
  object: z.object({ sha: z.string() }),
});

const ContentResponse = z.object({ sha: z.string() });

const PutContentResponse = z.object({
  commit: z.object({ sha: z.string() }),
});

const PullResponse = z.object({
  number: z.number(),
  merged: z.boolean().optional(),
  merge_commit_sha: z.string().nullable().optional(),
});

const PullListResponse = z.array(PullResponse);

const MergeResponse = z.object({ sha: z.string() });

const IssueResponse = z.object({ number: z.number() });

const InvitationResponse = z
  .object({ id: z.number() })
  .nullable();

const NoContent = z.unknown();

const ErrorBody = z.object({ message: z.string() }).passthrough();

const GraphQLEnvelope = z.object({
  data: z.unknown().optional(),
  errors: z
    .array(z.object({ type: z.string().optional(), message: z.string() }))
    .optional(),
});

const DiscussionTargetData = z.object({
  repository: z
    .object({
      id: z.string(),
      hasDiscussionsEnabled: z.boolean(),
      discussionCategories: z.object({
        nodes: z.array(
          z.object({
            id: z.string(),
            name: z.string(),
            slug: z.string(),
            isAnswerable: z.boolean().optional(),
          })
        ),
      }),
    })
    .nullable(),
});

const CreateDiscussionData = z.object({
  createDiscussion: z.object({
    discussion: z.object({ id: z.string(), number: z.number() }),
  }),
});

const AddCommentData = z.object({
  addDiscussionComment: z.object({
    comment: z.object({ id: z.string() }),
  }),
});

const MarkAnswerData = z.object({
  markDiscussionCommentAsAnswer: z.object({
    discussion: z.object({ id: z.string() }),
  }),
});

// =============================================================================
// GRAPHQL DOCUMENTS
// =============================================================================

const DISCUSSION_TARGET_QUERY = `
  query($owner: String!, $name: String!) {
    repository(owner: $owner, name: $name) {
      id
      hasDiscussionsEnabled
      discussionCategories(first: 25) {
        nodes { id name slug isAnswerable }
      }
    }
  }
`;

const CREATE_DISCUSSION_MUTATION = `
  mutation($repositoryId: ID!, $categoryId: ID!, $title: String!, $body: String!) {
    createDiscussion(input: { repositoryId: $repositoryId, categoryId: $categoryId, title: $title, body: $body }) {
      discussion { id number }
    }
  }
`;

const ADD_COMMENT_MUTATION = `
  mutation($discussionId: ID!, $body: String!) {
    addDiscussionComment(input: { discussionId: $discussionId, body: $body }) {
      comment { id }
    }
  }
`;

const MARK_ANSWER_MUTATION = `
  mutation($commentId: ID!) {
    markDiscussionCommentAsAnswer(input: { id: $commentId }) {
      discussion { id }
    }
  }
`;

// =============================================================================
// HEADER / ERROR MAPPING
// =============================================================================

export function parseRateHeaders(headers: Headers): RateSnapshot | undefined {
  const remaining = headers.get('x-ratelimit-remaining');
  const limit = headers.get('x-ratelimit-limit');
  const reset = headers.get('x-ratelimit-reset');
  if (remaining === null || limit === null || reset === null) return undefined;

  const snapshot: RateSnapshot = {
    remaining: Number(remaining),
    limit: Number(limit),
    resetAt: Number(reset) * 1000,
  };
  if (!Number.isFinite(snapshot.remaining) || !Number.isFinite(snapshot.limit) || !Number.isFinite(snapshot.resetAt)) {
    return undefined;
  }

  const resource = headers.get('x-ratelimit-resource');
  if (resource !== null) {
    snapshot.resource = resource;
  }
  return snapshot;
}

function parseRetryAfter(headers: Headers): number | undefined {
  const value = headers.get('retry-after');
  if (value === null) return undefined;
  const seconds = Number(value);
  return Number.isFinite(seconds) ? seconds * 1000 : undefined;
}

const SECONDARY_LIMIT_PATTERN = /secondary rate limit|abuse detection/i;

/**
 * Map an HTTP error response onto the remote failure vocabulary.
 */
export function toRemoteFailure(
  status: number,
  message: string,
  rate?: RateSnapshot,
  retryAfterMs?: number
): RemoteFailure {
  let code: RemoteErrorCode;

  if ((status === 403 || status === 429) && (retryAfterMs !== undefined || SECONDARY_LIMIT_PATTERN.test(message))) {
    code = 'SECONDARY_RATE_LIMIT';
  } else if (status === 429 || (status === 403 && rate?.remaining === 0)) {
    code = 'RATE_LIMITED';
  } else if (status === 401) {
    code = 'UNAUTHORIZED';
  } else if (status === 403) {
    code = 'FORBIDDEN';
  } else if (status === 404) {
    code = 'NOT_FOUND';
  } else if (status === 409) {
    code = 'CONFLICT';
  } else if (status >= 500) {
    code = 'SERVER_ERROR';
  } else {
    code = 'UNPROCESSABLE';
  }

  return { status, code, message, rate, retryAfterMs };
}

function graphQLFailure(
  errors: Array<{ type?: string; message: string }>,
  rate?: RateSnapshot
): RemoteFailure {
  const [first] = errors;
  const message = errors.map((e) => e.message).join('; ');

  if (SECONDARY_LIMIT_PATTERN.test(message)) {
    return { status: 403, code: 'SECONDARY_RATE_LIMIT', message, rate };
  }

  switch (first?.type) {
    case 'RATE_LIMITED':
      return { status: 403, code: 'RATE_LIMITED', message, rate };
    case 'NOT_FOUND':
      return { status: 404, code: 'NOT_FOUND', message, rate };
    case 'FORBIDDEN':
      return { status: 403, code: 'FORBIDDEN', message, rate };
    case 'INTERNAL':
    case 'SERVICE_UNAVAILABLE':
      return { status: 502, code: 'SERVER_ERROR', message, rate };
    default:
      return { status: 422, code: 'GRAPHQL_ERROR', message, rate };
  }
}

function encodePath(path: string): string {
  return path.split('/').map(encodeURIComponent).join('/');
}

function toBase64(content: string): string {
  return Buffer.from(content, 'utf8').toString('base64');
}

// =============================================================================
// CLIENT
// =============================================================================

type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export class GitHubRemoteClient implements RemoteClient {
  private timeoutMs: number;
  private userAgent: string;
  private fetchImpl: typeof fetch;

  constructor(config: GitHubClientConfig = {}) {
    this.timeoutMs = config.timeoutMs ?? 30_000;
    this.userAgent = config.userAgent ?? 'milestone-runner';
    this.fetchImpl = config.fetch ?? fetch;
  }

  // ===========================================================================
  // RATE BUDGET / REPOSITORY
  // ===========================================================================

  async getRateBudget(credential: Credential): Promise<RemoteResult<RateSnapshot>> {
    const result = await this.request(credential, 'GET', '/rate_limit', RateLimitResponse);
    if (!result.ok) return result;

    const { core } = result.value.resources;
    const snapshot = { remaining: core.remaining, limit: core.limit, resetAt: core.reset * 1000, resource: 'core' };
    return success(snapshot, snapshot);
  }

  async ensureRepository(credential: Credential, spec: RepositorySpec): Promise<RemoteResult<RepositoryInfo>> {
    const existing = await this.request(credential, 'GET', this.repoPath(spec), RepositoryResponse);
    if (existing.ok) {
      return success(
        { fullName: existing.value.full_name, defaultBranch: existing.value.default_branch, created: false },
        existing.rate
      );
    }
    if (existing.failure.status !== 404) return existing;

    const createPath = spec.owner === credential.login ? '/user/repos' : `/orgs/${encodeURIComponent(spec.owner)}/repos`;
    const created = await this.request(credential, 'POST', createPath, RepositoryResponse, {
      name: spec.name,
      description: spec.description ?? '',
      private: spec.private,
      auto_init: true,
    });
    if (!created.ok) return created;

    return success(
      { fullName: created.value.full_name, defaultBranch: created.value.default_branch, created: true },
      created.rate
    );
  }

  // ===========================================================================
  // PULL REQUESTS
  // ===========================================================================

  async createAndMergeChange(
    credential: Credential,
    repo: RepositoryRef,
    change: FileChange & { title: string; body: string }
  ): Promise<RemoteResult<MergedChange>> {
    const branch = await this.prepareBranch(credential, repo, change);
    if (!branch.ok) return branch;

    const pull = await this.openPullRequest(credential, repo, change.branch, branch.value.base, change);
    if (!pull.ok) return pull;

    return this.mergePullRequest(credential, repo, pull.value.number, { deleteBranch: change.branch });
  }

  async createBypassPullRequest(
    credential: Credential,
    repo: RepositoryRef,
    change: FileChange & { title: string; body: string; reviewer?: string }
  ): Promise<RemoteResult<PullRequestRef>> {
    const branch = await this.prepareBranch(credential, repo, change);
    if (!branch.ok) return branch;

    const pull = await this.openPullRequest(credential, repo, change.branch, branch.value.base, change);
    if (!pull.ok) return pull;

    if (change.reviewer && !pull.value.merged) {
      const review = await this.request(
        credential,
        'POST',
        `${this.repoPath(repo)}/pulls/${pull.value.number}/requested_reviewers`,
        NoContent,
        { reviewers: [change.reviewer] }
      );
      // Review requests are advisory; a reviewer without access is not a reason to stop.
      if (!review.ok && review.failure.status !== 422) return review;
    }

    return success({ pullNumber: pull.value.number }, pull.rate);
  }

  async mergePullRequest(
    credential: Credential,
    repo: RepositoryRef,
    pullNumber: number,
    options: { deleteBranch?: string } = {}
  ): Promise<RemoteResult<MergedChange>> {
    const pullPath = `${this.repoPath(repo)}/pulls/${pullNumber}`;

    const current = await this.request(credential, 'GET', pullPath, PullResponse);
    if (!current.ok) return current;

    let mergeSha: string;
    let rate = current.rate;
    if (current.value.merged) {
      mergeSha = current.value.merge_commit_sha ?? '';
    } else {
      const merged = await this.request(credential, 'PUT', `${pullPath}/merge`, MergeResponse, {
        merge_method: 'squash',
      });
      if (!merged.ok) return merged;
      mergeSha = merged.value.sha;
      rate = merged.rate;
    }

    if (options.deleteBranch) {
      const deleted = await this.request(
        credential,
        'DELETE',
        `${this.repoPath(repo)}/git/refs/heads/${encodePath(options.deleteBranch)}`,
        NoContent
      );
      // 422: branch already gone
      if (!deleted.ok && deleted.failure.status !== 422 && deleted.failure.status !== 404) return deleted;
      rate = deleted.ok ? deleted.rate : deleted.failure.rate ?? rate;
    }

    return success({ pullNumber, mergeSha }, rate);
  }

  // ===========================================================================
  // ISSUES / COMMITS
  // ===========================================================================

  async createIssue(
    credential: Credential,
    repo: RepositoryRef,
    issue: { title: string; body: string }
  ): Promise<RemoteResult<IssueRef>> {
    const result = await this.request(credential, 'POST', `${this.repoPath(repo)}/issues`, IssueResponse, issue);
    if (!result.ok) return result;
    return success({ number: result.value.number }, result.rate);
  }

  async closeIssue(credential: Credential, repo: RepositoryRef, issueNumber: number): Promise<RemoteResult<IssueRef>> {
    const result = await this.request(
      credential,
      'PATCH',
      `${this.repoPath(repo)}/issues/${issueNumber}`,
      IssueResponse,
      { state: 'closed' }
    );
    if (!result.ok) return result;
    return success({ number: result.value.number }, result.rate);
  }

  async createCommit(
    credential: Credential,
    repo: RepositoryRef,
    commit: Omit<FileChange, 'branch'> & { coAuthors: Identity[] }
  ): Promise<RemoteResult<CommitRef>> {
    const contentPath = `${this.repoPath(repo)}/contents/${encodePath(commit.path)}`;

    const existing = await this.request(credential, 'GET', contentPath, ContentResponse);
    if (!existing.ok && existing.failure.status !== 404) return existing;

    const result = await this.request(credential, 'PUT', contentPath, PutContentResponse, {
      message: withCoAuthorTrailers(commit.message, commit.coAuthors),
      content: toBase64(commit.content),
      ...(existing.ok ? { sha: existing.value.sha } : {}),
    });
    if (!result.ok) return result;
    return success({ sha: result.value.commit.sha }, result.rate);
  }

  // ===========================================================================
  // DISCUSSIONS (GraphQL)
  // ===========================================================================

  async getDiscussionTarget(credential: Credential, repo: RepositoryRef): Promise<RemoteResult<DiscussionTarget | null>> {
    const result = await this.graphql(credential, DISCUSSION_TARGET_QUERY, { owner: repo.owner, name: repo.name }, DiscussionTargetData);
    if (!result.ok) return result;

    const repository = result.value.repository;
    if (!repository || !repository.hasDiscussionsEnabled) {
      return success(null, result.rate);
    }

    const categories = repository.discussionCategories.nodes;
    const category =
      categories.find((c) => c.slug === 'q-a' || c.slug === 'qa') ??
      categories.find((c) => c.isAnswerable === true) ??
      categories.find((c) => c.slug === 'general') ??
      categories[0];

    if (!category) {
      return success(null, result.rate);
    }

    return success(
      { repositoryId: repository.id, categoryId: category.id, categoryName: category.name },
      result.rate
    );
  }

  async createDiscussion(
    credential: Credential,
    target: DiscussionTarget,
    discussion: { title: string; body: string }
  ): Promise<RemoteResult<DiscussionRef>> {
    const result = await this.graphql(
      credential,
      CREATE_DISCUSSION_MUTATION,
      { repositoryId: target.repositoryId, categoryId: target.categoryId, ...discussion },
      CreateDiscussionData
    );
    if (!result.ok) return result;

    const { id, number } = result.value.createDiscussion.discussion;
    return success({ discussionId: id, number }, result.rate);
  }

  async postDiscussionComment(
    credential: Credential,
    discussionId: string,
    body: string
  ): Promise<RemoteResult<CommentRef>> {
    const result = await this.graphql(credential, ADD_COMMENT_MUTATION, { discussionId, body }, AddCommentData);
    if (!result.ok) return result;
    return success({ commentId: result.value.addDiscussionComment.comment.id }, result.rate);
  }

  async markCommentAccepted(credential: Credential, commentId: string): Promise<RemoteResult<CommentRef>> {
    const result = await this.graphql(credential, MARK_ANSWER_MUTATION, { commentId }, MarkAnswerData);
    if (!result.ok) return result;
    return success({ commentId }, result.rate);
  }

  // ===========================================================================
  // COLLABORATORS
  // ===========================================================================

  async inviteCollaborator(credential: Credential, repo: RepositoryRef, login: string): Promise<RemoteResult<InvitationRef>> {
    const result = await this.request(
      credential,
      'PUT',
      `${this.repoPath(repo)}/collaborators/${encodeURIComponent(login)}`,
      InvitationResponse,
      { permission: 'push' }
    );
    if (!result.ok) return result;
    // 204: already a collaborator
    return success({ invitationId: result.value?.id ?? null }, result.rate);
  }

  async acceptInvitation(credential: Credential, invitationId: number): Promise<RemoteResult<InvitationRef>> {
    const result = await this.request(
      credential,
      'PATCH',
      `/user/repository_invitations/${invitationId}`,
      NoContent
    );
    if (!result.ok) return result;
    return success({ invitationId }, result.rate);
  }

  // ===========================================================================
  // PRIVATE: multi-request helpers
  // ===========================================================================

  /**
   * Create `change.branch` from the default branch and write the file on it.
   */
  private async prepareBranch(
    credential: Credential,
    repo: RepositoryRef,
    change: FileChange
  ): Promise<RemoteResult<{ base: string }>> {
    const repoPath = this.repoPath(repo);

    const info = await this.request(credential, 'GET', repoPath, RepositoryResponse);
    if (!info.ok) return info;
    const base = info.value.default_branch;

    const head = await this.request(credential, 'GET', `${repoPath}/git/ref/heads/${encodePath(base)}`, RefResponse);
    if (!head.ok) return head;

    const ref = await this.request(credential, 'POST', `${repoPath}/git/refs`, NoContent, {
      ref: `refs/heads/${change.branch}`,
      sha: head.value.object.sha,
    });
    // 422: branch left behind by an interrupted attempt
    if (!ref.ok && ref.failure.status !== 422) return ref;

    const contentPath = `${repoPath}/contents/${encodePath(change.path)}`;
    const existing = await this.request(
      credential,
      'GET',
      `${contentPath}?ref=${encodeURIComponent(change.branch)}`,
      ContentResponse
    );
    if (!existing.ok && existing.failure.status !== 404) return existing;

    const written = await this.request(credential, 'PUT', contentPath, PutContentResponse, {
      message: change.message,
      content: toBase64(change.content),
      branch: change.branch,
      ...(existing.ok ? { sha: existing.value.sha } : {}),
    });
    if (!written.ok) return written;

    return success({ base }, written.rate);
  }

  /**
   * Open a pull request, or find the one an interrupted attempt opened.
   */
  private async openPullRequest(
    credential: Credential,
    repo: RepositoryRef,
    branch: string,
    base: string,
    change: { title: string; body: string }
  ): Promise<RemoteResult<{ number: number; merged: boolean }>> {
    const repoPath = this.repoPath(repo);

    const created = await this.request(credential, 'POST', `${repoPath}/pulls`, PullResponse, {
      title: change.title,
      body: change.body,
      head: branch,
      base,
    });
    if (created.ok) {
      return success({ number: created.value.number, merged: false }, created.rate);
    }
    if (created.failure.status !== 422) return created;

    const listed = await this.request(
      credential,
      'GET',
      `${repoPath}/pulls?state=all&head=${encodeURIComponent(`${repo.owner}:${branch}`)}`,
      PullListResponse
    );
    if (!listed.ok) return listed;

    const [existing] = listed.value;
    if (!existing) return created;

    return success({ number: existing.number, merged: existing.merged ?? false }, listed.rate);
  }

  private repoPath(repo: RepositoryRef): string {
    return `/repos/${encodeURIComponent(repo.owner)}/${encodeURIComponent(repo.name)}`;
  }

  // ===========================================================================
  // PRIVATE: HTTP
  // ===========================================================================

  private async request<S extends z.ZodTypeAny>(
    credential: Credential,
    method: HttpMethod,
    path: string,
    schema: S,
    body?: unknown
  ): Promise<RemoteResult<z.output<S>>> {
    const url = `${credential.apiUrl.replace(/\/+$/, '')}${path}`;
    return this.send(credential, url, method, schema, body);
  }

  private async graphql<S extends z.ZodTypeAny>(
    credential: Credential,
    query: string,
    variables: Record<string, unknown>,
    dataSchema: S
  ): Promise<RemoteResult<z.output<S>>> {
    const envelope = await this.send(credential, credential.graphqlUrl, 'POST', GraphQLEnvelope, { query, variables });
    if (!envelope.ok) return envelope;

    const { data, errors } = envelope.value;
    if (errors && errors.length > 0) {
      return failure(graphQLFailure(errors, envelope.rate));
    }

    const parsed = dataSchema.safeParse(data);
    if (!parsed.success) {
      return failure({
        status: 200,
        code: 'BAD_RESPONSE',
        message: `Unexpected GraphQL response: ${parsed.error.message}`,
        rate: envelope.rate,
      });
    }
    return success(parsed.data, envelope.rate);
  }

  private async send<S extends z.ZodTypeAny>(
    credential: Credential,
    url: string,
    method: HttpMethod,
    schema: S,
    body: unknown
  ): Promise<RemoteResult<z.output<S>>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let status: number;
    let headers: Headers;
    let text: string;
    try {
      const response = await this.fetchImpl(url, {
        method,
        headers: {
          Accept: 'application/vnd.github+json',
          Authorization: `Bearer ${credential.token}`,
          'User-Agent': this.userAgent,
          'X-GitHub-Api-Version': API_VERSION,
          ...(body !== undefined ? { 'Content-Type': 'application/json' } : {}),
        },
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: controller.signal,
      });
      status = response.status;
      headers = response.headers;
      text = await response.text();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return failure({ status: 0, code: 'NETWORK_ERROR', message: `${method} ${url}: ${message}` });
    } finally {
      clearTimeout(timeout);
    }

    const rate = parseRateHeaders(headers);

    let payload: unknown = null;
    if (text.length > 0) {
      try {
        payload = JSON.parse(text);
      } catch {
        payload = { message: text };
      }
    }

    if (status < 200 || status >= 300) {
      const error = ErrorBody.safeParse(payload);
      const message = error.success ? error.data.message : `HTTP ${status}`;
      return failure(toRemoteFailure(status, message, rate, parseRetryAfter(headers)));
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      return failure({
        status,
        code: 'BAD_RESPONSE',
        message: `Unexpected response from ${method} ${url}: ${parsed.error.message}`,
        rate,
      });
    }
    return success(parsed.data, rate);
  }
}
