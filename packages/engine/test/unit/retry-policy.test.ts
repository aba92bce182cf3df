/**
 * Retry Policy Tests
 *
 * Proves:
 * - Failures are classified into THROTTLED / TRANSIENT / FATAL_*
 * - Transient failures back off exponentially and are bounded
 * - Throttling never consumes retry attempts
 * - Fatal failures return immediately
 * - Cancellation propagates instead of being classified
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  RetryExecutor,
  calculateBackoff,
  classifyFailure,
  classifyThrown,
} from '../../src/retry/retry-policy.js';
import { RateLimiter } from '../../src/ratelimit/rate-limiter.js';
import { REMOTE_CALL_COSTS, success } from '../../src/remote/client.js';
import { CallTimeoutError } from '../../src/execution/timeout.js';
import { RunCancelledError } from '../../src/utils/clock.js';
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from '../../src/workflows/types.js';
import {
  FakeRemoteClient,
  ManualClock,
  PRIMARY,
  REPOSITORY,
  START_TIME,
  networkError,
  rateLimited,
  secondaryLimited,
  serverError,
  unauthorized,
  unprocessable,
} from '../mocks.js';

// =============================================================================
// CLASSIFICATION
// =============================================================================

describe('classifyFailure', () => {
  it.each([
    [{ status: 429, code: 'RATE_LIMITED' as const, message: 'slow down' }, 'THROTTLED'],
    [{ status: 403, code: 'SECONDARY_RATE_LIMIT' as const, message: 'abuse' }, 'THROTTLED'],
    [{ status: 403, code: 'FORBIDDEN' as const, message: 'limit', rate: { remaining: 0, limit: 5000, resetAt: 0 } }, 'THROTTLED'],
    [{ status: 0, code: 'NETWORK_ERROR' as const, message: 'reset' }, 'TRANSIENT'],
    [{ status: 503, code: 'SERVER_ERROR' as const, message: 'unavailable' }, 'TRANSIENT'],
    [{ status: 401, code: 'UNAUTHORIZED' as const, message: 'bad token' }, 'FATAL_AUTH'],
    [{ status: 403, code: 'FORBIDDEN' as const, message: 'no access' }, 'FATAL_AUTH'],
    [{ status: 404, code: 'NOT_FOUND' as const, message: 'missing' }, 'FATAL_PRECONDITION'],
    [{ status: 422, code: 'UNPROCESSABLE' as const, message: 'invalid' }, 'FATAL_VALIDATION'],
    [{ status: 409, code: 'CONFLICT' as const, message: 'conflict' }, 'FATAL_VALIDATION'],
  ])('classifies %o as %s', (failure, category) => {
    expect(classifyFailure(failure).category).toBe(category);
  });

  it('keeps status, code and message', () => {
    expect(classifyFailure({ status: 422, code: 'UNPROCESSABLE', message: 'Validation Failed' })).toEqual({
      category: 'FATAL_VALIDATION',
      code: 'UNPROCESSABLE',
      status: 422,
      message: 'Validation Failed',
    });
  });
});

describe('classifyThrown', () => {
  it('treats a call timeout as transient', () => {
    const error = classifyThrown(new CallTimeoutError('createIssue', 50));
    expect(error.category).toBe('TRANSIENT');
    expect(error.code).toBe('TIMEOUT');
  });

  it('treats unexpected exceptions as transient', () => {
    const error = classifyThrown(new TypeError('fetch failed'));
    expect(error).toMatchObject({ category: 'TRANSIENT', code: 'UNEXPECTED_ERROR', message: 'fetch failed' });
  });
});

// =============================================================================
// BACKOFF
// =============================================================================

describe('calculateBackoff', () => {
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, jitter: false };

  it('doubles from the initial delay', () => {
    expect(calculateBackoff(policy, 1)).toBe(1000);
    expect(calculateBackoff(policy, 2)).toBe(2000);
    expect(calculateBackoff(policy, 3)).toBe(4000);
  });

  it('caps at the maximum delay', () => {
    expect(calculateBackoff(policy, 10)).toBe(60_000);
  });

  it('jitters within ±25%', () => {
    const jittered = { ...policy, jitter: true };
    expect(calculateBackoff(jittered, 2, () => 0)).toBe(1500);
    expect(calculateBackoff(jittered, 2, () => 1)).toBe(2500);
    expect(calculateBackoff(jittered, 2, () => 0.5)).toBe(2000);
  });
});

// =============================================================================
// EXECUTOR
// =============================================================================

describe('RetryExecutor', () => {
  let clock: ManualClock;
  let client: FakeRemoteClient;
  let limiter: RateLimiter;

  const executor = (policy: Partial<RetryPolicy> = {}) =>
    new RetryExecutor(limiter, clock, { policy: { ...DEFAULT_RETRY_POLICY, ...policy }, random: () => 0.5 });

  const openIssue = () => client.createIssue(PRIMARY, REPOSITORY, { title: 'Timed issue', body: '' });

  beforeEach(() => {
    clock = new ManualClock();
    client = new FakeRemoteClient();
    limiter = new RateLimiter(clock);
  });

  it('returns the value of a first-try success', async () => {
    const result = await executor().execute('primary', openIssue, { operation: 'createIssue' });

    expect(result).toEqual({ type: 'SUCCESS', value: { number: 1 }, attempts: 1 });
    expect(clock.sleeps).toEqual([]);
  });

  it('spends the operation cost from the budget', async () => {
    await executor().execute(
      'primary',
      () => client.createAndMergeChange(PRIMARY, REPOSITORY, { branch: 'b', path: 'p', content: 'c', message: 'm', title: 't', body: '' }),
      { operation: 'createAndMergeChange' }
    );

    expect(limiter.snapshot('primary').remaining).toBe(5000 - REMOTE_CALL_COSTS.createAndMergeChange);
  });

  it('spends and observes GraphQL calls against the GraphQL budget', async () => {
    limiter.prime('primary', { remaining: 105, limit: 5000, resetAt: START_TIME + 60_000, resource: 'core' });

    const result = await executor().execute(
      'primary',
      async () =>
        success(
          { discussionId: 'D1', number: 1 },
          { remaining: 4990, limit: 5000, resetAt: START_TIME + 60_000, resource: 'graphql' }
        ),
      { operation: 'createDiscussion' }
    );

    expect(result.type).toBe('SUCCESS');
    expect(limiter.snapshot('primary').remaining).toBe(105);
    expect(limiter.snapshot('primary', 'graphql').remaining).toBe(4990);
  });

  it('backs off exponentially on transient failures', async () => {
    client.failNext('createIssue', serverError(), networkError());
    const onRetry = vi.fn();

    const result = await executor().execute('primary', openIssue, { operation: 'createIssue', onRetry });

    expect(result).toMatchObject({ type: 'SUCCESS', attempts: 3 });
    expect(clock.sleeps).toEqual([1000, 2000]);
    expect(onRetry).toHaveBeenNthCalledWith(1, 1, expect.objectContaining({ category: 'TRANSIENT', code: 'SERVER_ERROR' }), 1000);
    expect(onRetry).toHaveBeenNthCalledWith(2, 2, expect.objectContaining({ category: 'TRANSIENT', code: 'NETWORK_ERROR' }), 2000);
  });

  it('gives up after max_attempts transient failures', async () => {
    client.failNext('createIssue', serverError(), serverError(), serverError(), serverError());

    const result = await executor({ max_attempts: 3 }).execute('primary', openIssue, { operation: 'createIssue' });

    expect(result.type).toBe('FATAL');
    if (result.type !== 'FATAL') return;
    expect(result.attempts).toBe(3);
    expect(result.error).toMatchObject({
      category: 'FATAL_EXHAUSTED',
      code: 'SERVER_ERROR',
      message: 'createIssue failed after 3 attempts: Bad gateway',
    });
    expect(client.callsOf('createIssue')).toHaveLength(3);
  });

  it('does not count throttling against max_attempts', async () => {
    const resetAt = START_TIME + 10_000;
    client.failNext('createIssue', rateLimited(resetAt), rateLimited(resetAt), rateLimited(resetAt));
    const onRetry = vi.fn();

    const result = await executor({ max_attempts: 1 }).execute('primary', openIssue, { operation: 'createIssue', onRetry });

    expect(result).toMatchObject({ type: 'SUCCESS', attempts: 4 });
    expect(onRetry).toHaveBeenCalledTimes(3);
    expect(onRetry).toHaveBeenCalledWith(1, expect.objectContaining({ category: 'THROTTLED' }), 0);
    // First wait runs to the reported reset; later ones to the one-second floor
    expect(clock.sleeps).toEqual([10_000, 1_000, 1_000]);
  });

  it('honors retry-after on a secondary limit', async () => {
    client.failNext('createIssue', secondaryLimited(30_000));

    const result = await executor().execute('primary', openIssue, { operation: 'createIssue' });

    expect(result).toMatchObject({ type: 'SUCCESS', attempts: 2 });
    expect(clock.sleeps).toEqual([30_000]);
  });

  it('returns authorization failures immediately', async () => {
    client.failNext('createIssue', unauthorized());

    const result = await executor().execute('primary', openIssue, { operation: 'createIssue' });

    expect(result).toMatchObject({ type: 'FATAL', attempts: 1, error: { category: 'FATAL_AUTH', status: 401 } });
    expect(clock.sleeps).toEqual([]);
  });

  it('returns validation failures immediately', async () => {
    client.failNext('createIssue', unprocessable());

    const result = await executor().execute('primary', openIssue, { operation: 'createIssue' });

    expect(result).toMatchObject({ type: 'FATAL', attempts: 1, error: { category: 'FATAL_VALIDATION' } });
  });

  it('retries an exception thrown by the client', async () => {
    client.throwNext('createIssue', new Error('socket closed'));

    const result = await executor().execute('primary', openIssue, { operation: 'createIssue' });

    expect(result).toMatchObject({ type: 'SUCCESS', attempts: 2 });
    expect(clock.sleeps).toEqual([1000]);
  });

  it('retries an attempt that exceeds its timeout', async () => {
    let slow = true;
    client.onCall('createIssue', async () => {
      if (slow) {
        slow = false;
        await new Promise((resolve) => setTimeout(resolve, 50));
      }
    });

    const result = await new RetryExecutor(limiter, clock, {
      timeouts: { defaultCallTimeoutMs: 10 },
      random: () => 0.5,
    }).execute('primary', openIssue, { operation: 'createIssue' });

    expect(result).toMatchObject({ type: 'SUCCESS', attempts: 2 });
  });

  it('propagates cancellation from the limiter', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      executor().execute('primary', openIssue, { operation: 'createIssue', signal: controller.signal })
    ).rejects.toThrow(RunCancelledError);
    expect(client.calls).toHaveLength(0);
  });

  it('propagates cancellation during backoff', async () => {
    const controller = new AbortController();
    client.failNext('createIssue', serverError());

    await expect(
      executor().execute('primary', openIssue, {
        operation: 'createIssue',
        signal: controller.signal,
        onRetry: () => controller.abort(),
      })
    ).rejects.toThrow(RunCancelledError);
    expect(client.calls).toHaveLength(1);
  });
});
