/**
 * GitHub Client Tests
 *
 * Requests go to a scripted fetch; each route answers once.
 */

import { describe, it, expect } from 'vitest';
import { GitHubRemoteClient, parseRateHeaders, toRemoteFailure } from '../../src/remote/github-client.js';
import { REMOTE_CALL_COSTS, type RateSnapshot, type RemoteErrorCode } from '../../src/remote/client.js';
import { PRIMARY, REPOSITORY } from '../mocks.js';

const BASE = 'https://api.example.test';

interface Route {
  method: string;
  path: string;
  status?: number;
  body?: unknown;
  headers?: Record<string, string>;
}

interface SeenRequest {
  method: string;
  path: string;
  body: unknown;
  headers: Headers;
}

/**
 * A fetch that answers from `routes`; unmatched requests get a 404.
 */
function scriptedFetch(routes: Route[]) {
  const pending = [...routes];
  const requests: SeenRequest[] = [];

  const fetchImpl: typeof fetch = async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const method = init?.method ?? 'GET';
    const path = url.startsWith(BASE) ? url.slice(BASE.length) : url;
    const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
    requests.push({ method, path, body, headers: new Headers(init?.headers) });

    const index = pending.findIndex((route) => route.method === method && route.path === path);
    if (index === -1) {
      return new Response(JSON.stringify({ message: 'Not Found' }), { status: 404 });
    }
    const [route] = pending.splice(index, 1);
    const status = route?.status ?? 200;
    return new Response(route?.body === undefined ? null : JSON.stringify(route.body), {
      status,
      headers: route?.headers,
    });
  };

  return { fetchImpl, requests, routes: (): string[] => requests.map((r) => `${r.method} ${r.path}`) };
}

function clientFor(routes: Route[]) {
  const scripted = scriptedFetch(routes);
  return { client: new GitHubRemoteClient({ fetch: scripted.fetchImpl }), ...scripted };
}

const REPO_PATH = '/repos/primary-user/sandbox';

// =============================================================================
// ERROR MAPPING
// =============================================================================

describe('parseRateHeaders', () => {
  it('reads the x-ratelimit headers', () => {
    const headers = new Headers({
      'x-ratelimit-remaining': '4999',
      'x-ratelimit-limit': '5000',
      'x-ratelimit-reset': '1700003600',
    });

    expect(parseRateHeaders(headers)).toEqual({ remaining: 4999, limit: 5000, resetAt: 1_700_003_600_000 });
  });

  it('names the budget the numbers belong to', () => {
    const headers = new Headers({
      'x-ratelimit-remaining': '4990',
      'x-ratelimit-limit': '5000',
      'x-ratelimit-reset': '1700003600',
      'x-ratelimit-resource': 'graphql',
    });

    expect(parseRateHeaders(headers)).toEqual({
      remaining: 4990,
      limit: 5000,
      resetAt: 1_700_003_600_000,
      resource: 'graphql',
    });
  });

  it('returns undefined when a header is missing or malformed', () => {
    expect(parseRateHeaders(new Headers({ 'x-ratelimit-remaining': '1' }))).toBeUndefined();
    expect(
      parseRateHeaders(
        new Headers({ 'x-ratelimit-remaining': 'many', 'x-ratelimit-limit': '5000', 'x-ratelimit-reset': '1' })
      )
    ).toBeUndefined();
  });
});

describe('toRemoteFailure', () => {
  const exhausted = { remaining: 0, limit: 5000, resetAt: 0 };

  it.each<[number, string, RateSnapshot | undefined, number | undefined, RemoteErrorCode]>([
    [403, 'You have exceeded a secondary rate limit', undefined, undefined, 'SECONDARY_RATE_LIMIT'],
    [429, 'Too many requests', undefined, 60_000, 'SECONDARY_RATE_LIMIT'],
    [429, 'Too many requests', undefined, undefined, 'RATE_LIMITED'],
    [403, 'API rate limit exceeded', exhausted, undefined, 'RATE_LIMITED'],
    [401, 'Bad credentials', undefined, undefined, 'UNAUTHORIZED'],
    [403, 'Resource not accessible', undefined, undefined, 'FORBIDDEN'],
    [404, 'Not Found', undefined, undefined, 'NOT_FOUND'],
    [409, 'Merge conflict', undefined, undefined, 'CONFLICT'],
    [502, 'Bad gateway', undefined, undefined, 'SERVER_ERROR'],
    [422, 'Validation Failed', undefined, undefined, 'UNPROCESSABLE'],
  ])('maps %i "%s" to %s', (status, message, rate, retryAfterMs, code) => {
    expect(toRemoteFailure(status, message, rate, retryAfterMs).code).toBe(code);
  });
});

// =============================================================================
// REST
// =============================================================================

describe('GitHubRemoteClient', () => {
  it('reads the core rate budget', async () => {
    const { client, requests } = clientFor([
      { method: 'GET', path: '/rate_limit', body: { resources: { core: { limit: 5000, remaining: 4000, reset: 1700003600 } } } },
    ]);

    const result = await client.getRateBudget(PRIMARY);

    expect(result).toEqual({
      ok: true,
      value: { remaining: 4000, limit: 5000, resetAt: 1_700_003_600_000, resource: 'core' },
      rate: { remaining: 4000, limit: 5000, resetAt: 1_700_003_600_000, resource: 'core' },
    });
    expect(requests[0]?.headers.get('authorization')).toBe('Bearer test-secret');
    expect(requests[0]?.headers.get('x-github-api-version')).toBe('2022-11-28');
    expect(requests[0]?.headers.get('accept')).toBe('application/vnd.github+json');
  });

  it('returns an existing repository', async () => {
    const { client } = clientFor([
      { method: 'GET', path: REPO_PATH, body: { full_name: 'primary-user/sandbox', default_branch: 'trunk' } },
    ]);

    const result = await client.ensureRepository(PRIMARY, { ...REPOSITORY, private: false });

    expect(result).toMatchObject({ ok: true, value: { fullName: 'primary-user/sandbox', defaultBranch: 'trunk', created: false } });
  });

  it('creates a missing repository under the user', async () => {
    const { client, requests } = clientFor([
      { method: 'POST', path: '/user/repos', status: 201, body: { full_name: 'primary-user/sandbox' } },
    ]);

    const result = await client.ensureRepository(PRIMARY, { ...REPOSITORY, private: true, description: 'Sandbox' });

    expect(result).toMatchObject({ ok: true, value: { defaultBranch: 'main', created: true } });
    expect(requests[1]?.body).toEqual({ name: 'sandbox', description: 'Sandbox', private: true, auto_init: true });
  });

  it('creates a missing repository under an organization', async () => {
    const { client, routes } = clientFor([
      { method: 'POST', path: '/orgs/an-org/repos', status: 201, body: { full_name: 'an-org/sandbox' } },
    ]);

    await client.ensureRepository(PRIMARY, { owner: 'an-org', name: 'sandbox', private: false });

    expect(routes()).toEqual(['GET /repos/an-org/sandbox', 'POST /orgs/an-org/repos']);
  });

  it('maps an error response with its rate headers', async () => {
    const { client } = clientFor([
      {
        method: 'POST',
        path: `${REPO_PATH}/issues`,
        status: 401,
        body: { message: 'Bad credentials' },
        headers: { 'x-ratelimit-remaining': '10', 'x-ratelimit-limit': '60', 'x-ratelimit-reset': '1700000100' },
      },
    ]);

    const result = await client.createIssue(PRIMARY, REPOSITORY, { title: 't', body: 'b' });

    expect(result).toEqual({
      ok: false,
      failure: {
        status: 401,
        code: 'UNAUTHORIZED',
        message: 'Bad credentials',
        rate: { remaining: 10, limit: 60, resetAt: 1_700_000_100_000 },
        retryAfterMs: undefined,
      },
    });
  });

  it('reads retry-after on a secondary limit', async () => {
    const { client } = clientFor([
      {
        method: 'PATCH',
        path: `${REPO_PATH}/issues/7`,
        status: 403,
        body: { message: 'You have exceeded a secondary rate limit' },
        headers: { 'retry-after': '30' },
      },
    ]);

    const result = await client.closeIssue(PRIMARY, REPOSITORY, 7);

    expect(result).toMatchObject({ ok: false, failure: { code: 'SECONDARY_RATE_LIMIT', retryAfterMs: 30_000 } });
  });

  it('reports a thrown fetch as a network error', async () => {
    const client = new GitHubRemoteClient({
      fetch: async () => {
        throw new Error('socket hang up');
      },
    });

    const result = await client.createIssue(PRIMARY, REPOSITORY, { title: 't', body: 'b' });

    expect(result).toEqual({
      ok: false,
      failure: {
        status: 0,
        code: 'NETWORK_ERROR',
        message: `POST ${BASE}${REPO_PATH}/issues: socket hang up`,
      },
    });
  });

  it('rejects a response that does not match its schema', async () => {
    const { client } = clientFor([{ method: 'POST', path: `${REPO_PATH}/issues`, status: 201, body: { id: 1 } }]);

    const result = await client.createIssue(PRIMARY, REPOSITORY, { title: 't', body: 'b' });

    expect(result).toMatchObject({ ok: false, failure: { status: 201, code: 'BAD_RESPONSE' } });
  });

  it('creates, merges and cleans up a change', async () => {
    const { client, routes, requests } = clientFor([
      { method: 'GET', path: REPO_PATH, body: { full_name: 'primary-user/sandbox', default_branch: 'main' } },
      { method: 'GET', path: `${REPO_PATH}/git/ref/heads/main`, body: { object: { sha: 'base-sha' } } },
      { method: 'POST', path: `${REPO_PATH}/git/refs`, status: 201, body: {} },
      { method: 'PUT', path: `${REPO_PATH}/contents/counter.txt`, body: { commit: { sha: 'commit-sha' } } },
      { method: 'POST', path: `${REPO_PATH}/pulls`, status: 201, body: { number: 12 } },
      { method: 'GET', path: `${REPO_PATH}/pulls/12`, body: { number: 12, merged: false } },
      { method: 'PUT', path: `${REPO_PATH}/pulls/12/merge`, body: { sha: 'merge-sha' } },
      { method: 'DELETE', path: `${REPO_PATH}/git/refs/heads/merged/1`, status: 204 },
    ]);

    const result = await client.createAndMergeChange(PRIMARY, REPOSITORY, {
      branch: 'merged/1',
      path: 'counter.txt',
      content: '1\n',
      message: 'Update counter to 1',
      title: 'Update counter to 1',
      body: 'Counter change 1.',
    });

    expect(result).toMatchObject({ ok: true, value: { pullNumber: 12, mergeSha: 'merge-sha' } });
    expect(routes()).toEqual([
      `GET ${REPO_PATH}`,
      `GET ${REPO_PATH}/git/ref/heads/main`,
      `POST ${REPO_PATH}/git/refs`,
      `GET ${REPO_PATH}/contents/counter.txt?ref=merged%2F1`,
      `PUT ${REPO_PATH}/contents/counter.txt`,
      `POST ${REPO_PATH}/pulls`,
      `GET ${REPO_PATH}/pulls/12`,
      `PUT ${REPO_PATH}/pulls/12/merge`,
      `DELETE ${REPO_PATH}/git/refs/heads/merged/1`,
    ]);
    expect(requests[2]?.body).toEqual({ ref: 'refs/heads/merged/1', sha: 'base-sha' });
    expect(requests[4]?.body).toEqual({ message: 'Update counter to 1', content: 'MQo=', branch: 'merged/1' });
    expect(requests[6]?.body).toBeUndefined();
    expect(requests[7]?.body).toEqual({ merge_method: 'squash' });
  });

  // ===========================================================================
  // REQUEST COSTS
  // ===========================================================================

  describe('declared request costs', () => {
    const change = {
      branch: 'merged/1',
      path: 'counter.txt',
      content: '1\n',
      message: 'Update counter to 1',
      title: 'Update counter to 1',
      body: '',
    };

    /** Every lookup of a resumed attempt: branch, file and pull request already exist. */
    const resumedBranch = (): Route[] => [
      { method: 'GET', path: REPO_PATH, body: { full_name: 'primary-user/sandbox', default_branch: 'main' } },
      { method: 'GET', path: `${REPO_PATH}/git/ref/heads/main`, body: { object: { sha: 'base-sha' } } },
      { method: 'POST', path: `${REPO_PATH}/git/refs`, status: 422, body: { message: 'Reference already exists' } },
      { method: 'GET', path: `${REPO_PATH}/contents/counter.txt?ref=merged%2F1`, body: { sha: 'file-sha' } },
      { method: 'PUT', path: `${REPO_PATH}/contents/counter.txt`, body: { commit: { sha: 'commit-sha' } } },
      { method: 'POST', path: `${REPO_PATH}/pulls`, status: 422, body: { message: 'A pull request already exists' } },
      {
        method: 'GET',
        path: `${REPO_PATH}/pulls?state=all&head=primary-user%3Amerged%2F1`,
        body: [{ number: 12, merged: false }],
      },
    ];

    it('covers a resumed create-and-merge', async () => {
      const { client, requests } = clientFor([
        ...resumedBranch(),
        { method: 'GET', path: `${REPO_PATH}/pulls/12`, body: { number: 12, merged: false } },
        { method: 'PUT', path: `${REPO_PATH}/pulls/12/merge`, body: { sha: 'merge-sha' } },
        { method: 'DELETE', path: `${REPO_PATH}/git/refs/heads/merged/1`, status: 204 },
      ]);

      const result = await client.createAndMergeChange(PRIMARY, REPOSITORY, change);

      expect(result).toMatchObject({ ok: true, value: { pullNumber: 12, mergeSha: 'merge-sha' } });
      expect(requests).toHaveLength(REMOTE_CALL_COSTS.createAndMergeChange);
    });

    it('covers a resumed review-bypass pull request with a reviewer', async () => {
      const { client, requests } = clientFor([
        ...resumedBranch(),
        { method: 'POST', path: `${REPO_PATH}/pulls/12/requested_reviewers`, status: 201, body: {} },
      ]);

      const result = await client.createBypassPullRequest(PRIMARY, REPOSITORY, { ...change, reviewer: 'secondary-user' });

      expect(result).toMatchObject({ ok: true, value: { pullNumber: 12 } });
      expect(requests).toHaveLength(REMOTE_CALL_COSTS.createBypassPullRequest);
    });

    it('covers a merge that deletes its branch', async () => {
      const { client, requests } = clientFor([
        { method: 'GET', path: `${REPO_PATH}/pulls/12`, body: { number: 12, merged: false } },
        { method: 'PUT', path: `${REPO_PATH}/pulls/12/merge`, body: { sha: 'merge-sha' } },
        { method: 'DELETE', path: `${REPO_PATH}/git/refs/heads/merged/1`, status: 204 },
      ]);

      await client.mergePullRequest(PRIMARY, REPOSITORY, 12, { deleteBranch: 'merged/1' });

      expect(requests).toHaveLength(REMOTE_CALL_COSTS.mergePullRequest);
    });

    it('covers a commit over an existing file', async () => {
      const { client, requests } = clientFor([
        { method: 'GET', path: `${REPO_PATH}/contents/counter.txt`, body: { sha: 'file-sha' } },
        { method: 'PUT', path: `${REPO_PATH}/contents/counter.txt`, body: { commit: { sha: 'commit-sha' } } },
      ]);

      await client.createCommit(PRIMARY, REPOSITORY, { path: 'counter.txt', content: '1\n', message: 'm', coAuthors: [] });

      expect(requests).toHaveLength(REMOTE_CALL_COSTS.createCommit);
    });
  });

  it('reports an already merged pull request without merging again', async () => {
    const { client, routes } = clientFor([
      { method: 'GET', path: `${REPO_PATH}/pulls/5`, body: { number: 5, merged: true, merge_commit_sha: 'earlier-sha' } },
    ]);

    const result = await client.mergePullRequest(PRIMARY, REPOSITORY, 5);

    expect(result).toMatchObject({ ok: true, value: { pullNumber: 5, mergeSha: 'earlier-sha' } });
    expect(routes()).toEqual([`GET ${REPO_PATH}/pulls/5`]);
  });

  it('updates an existing file with co-author trailers', async () => {
    const { client, requests } = clientFor([
      { method: 'GET', path: `${REPO_PATH}/contents/pair-commits/commit-1.txt`, body: { sha: 'old-sha' } },
      { method: 'PUT', path: `${REPO_PATH}/contents/pair-commits/commit-1.txt`, body: { commit: { sha: 'new-sha' } } },
    ]);

    const result = await client.createCommit(PRIMARY, REPOSITORY, {
      path: 'pair-commits/commit-1.txt',
      content: 'Pair commit 1\n',
      message: 'Add pair commit 1',
      coAuthors: [{ login: 'secondary-user' }],
    });

    expect(result).toMatchObject({ ok: true, value: { sha: 'new-sha' } });
    expect(requests[1]?.body).toEqual({
      message: 'Add pair commit 1\n\nCo-authored-by: secondary-user <secondary-user@users.noreply.github.com>',
      content: 'UGFpciBjb21taXQgMQo=',
      sha: 'old-sha',
    });
  });

  it('reads a pending invitation and an existing collaborator', async () => {
    const { client } = clientFor([
      { method: 'PUT', path: `${REPO_PATH}/collaborators/secondary-user`, status: 201, body: { id: 42 } },
      { method: 'PUT', path: `${REPO_PATH}/collaborators/secondary-user`, status: 204 },
    ]);

    const invited = await client.inviteCollaborator(PRIMARY, REPOSITORY, 'secondary-user');
    const existing = await client.inviteCollaborator(PRIMARY, REPOSITORY, 'secondary-user');

    expect(invited).toMatchObject({ ok: true, value: { invitationId: 42 } });
    expect(existing).toMatchObject({ ok: true, value: { invitationId: null } });
  });

  // ===========================================================================
  // GRAPHQL
  // ===========================================================================

  describe('GraphQL', () => {
    const categories = {
      nodes: [
        { id: 'C1', name: 'General', slug: 'general' },
        { id: 'C2', name: 'Q&A', slug: 'q-a', isAnswerable: true },
      ],
    };

    it('prefers the Q&A discussion category', async () => {
      const { client, requests } = clientFor([
        {
          method: 'POST',
          path: '/graphql',
          body: { data: { repository: { id: 'R1', hasDiscussionsEnabled: true, discussionCategories: categories } } },
        },
      ]);

      const result = await client.getDiscussionTarget(PRIMARY, REPOSITORY);

      expect(result).toMatchObject({ ok: true, value: { repositoryId: 'R1', categoryId: 'C2', categoryName: 'Q&A' } });
      expect(requests[0]?.body).toMatchObject({ variables: { owner: 'primary-user', name: 'sandbox' } });
    });

    it('returns null when discussions are disabled', async () => {
      const { client } = clientFor([
        {
          method: 'POST',
          path: '/graphql',
          body: { data: { repository: { id: 'R1', hasDiscussionsEnabled: false, discussionCategories: categories } } },
        },
      ]);

      expect(await client.getDiscussionTarget(PRIMARY, REPOSITORY)).toMatchObject({ ok: true, value: null });
    });

    it('maps GraphQL errors', async () => {
      const { client } = clientFor([
        { method: 'POST', path: '/graphql', body: { errors: [{ type: 'NOT_FOUND', message: 'Could not resolve to a node' }] } },
        { method: 'POST', path: '/graphql', body: { errors: [{ message: 'You have exceeded a secondary rate limit' }] } },
      ]);

      const missing = await client.markCommentAccepted(PRIMARY, 'comment-1');
      const limited = await client.markCommentAccepted(PRIMARY, 'comment-1');

      expect(missing).toMatchObject({ ok: false, failure: { status: 404, code: 'NOT_FOUND', message: 'Could not resolve to a node' } });
      expect(limited).toMatchObject({ ok: false, failure: { code: 'SECONDARY_RATE_LIMIT' } });
    });

    it('creates a discussion and answers it', async () => {
      const { client } = clientFor([
        { method: 'POST', path: '/graphql', body: { data: { createDiscussion: { discussion: { id: 'D1', number: 3 } } } } },
        { method: 'POST', path: '/graphql', body: { data: { addDiscussionComment: { comment: { id: 'DC1' } } } } },
      ]);
      const target = { repositoryId: 'R1', categoryId: 'C2', categoryName: 'Q&A' };

      const created = await client.createDiscussion(PRIMARY, target, { title: 'Question', body: 'Body' });
      const answered = await client.postDiscussionComment(PRIMARY, 'D1', 'Answer');

      expect(created).toMatchObject({ ok: true, value: { discussionId: 'D1', number: 3 } });
      expect(answered).toMatchObject({ ok: true, value: { commentId: 'DC1' } });
    });
  });
});
