/**
 * Retry Policy
 *
 * Wraps a single remote operation:
 *   reserve budget → call (with timeout) → observe budget → classify
 *
 * - THROTTLED: wait on the rate limiter, retry without an attempt cap
 * - TRANSIENT: exponential backoff with jitter, bounded by max_attempts
 * - FATAL: returned immediately
 *
 * Cancellation is never classified; RunCancelledError propagates.
 */

import type { CredentialRole } from '../credentials/registry.js';
import { CallTimeoutError, DEFAULT_TIMEOUT_CONFIG, getCallTimeout, withTimeout, type TimeoutConfig } from '../execution/timeout.js';
import { NoOpMetrics, type WorkflowMetrics } from '../observability/metrics.js';
import type { RateLimiter, ThrottleSignal } from '../ratelimit/rate-limiter.js';
import {
  REMOTE_CALL_COSTS,
  REMOTE_CALL_RESOURCES,
  type RateSnapshot,
  type RemoteFailure,
  type RemoteOperation,
  type RemoteResult,
} from '../remote/client.js';
import { RunCancelledError, type Clock } from '../utils/clock.js';
import {
  DEFAULT_RETRY_POLICY,
  type CallResult,
  type ClassifiedError,
  type RetryPolicy,
} from '../workflows/types.js';

// =============================================================================
// TYPES
// =============================================================================

export type AttemptOutcome<T> =
  | { type: 'SUCCESS'; value: T; rate?: RateSnapshot }
  | { type: 'RETRYABLE'; error: ClassifiedError; throttle?: ThrottleSignal }
  | { type: 'FATAL'; error: ClassifiedError };

export interface ExecuteOptions {
  operation: RemoteOperation;
  /** Defaults to the operation's declared cost. */
  cost?: number;
  signal?: AbortSignal;
  onRetry?: (attempt: number, error: ClassifiedError, delayMs: number) => void;
}

// =============================================================================
// CLASSIFICATION
// =============================================================================

/**
 * Map a value-typed remote failure onto the failure taxonomy.
 */
export function classifyFailure(failure: RemoteFailure): ClassifiedError {
  const base = { message: failure.message, code: failure.code, status: failure.status };

  if (
    failure.status === 429 ||
    failure.code === 'RATE_LIMITED' ||
    failure.code === 'SECONDARY_RATE_LIMIT' ||
    (failure.status === 403 && failure.rate?.remaining === 0)
  ) {
    return { ...base, category: 'THROTTLED' };
  }

  if (failure.status === 0 || failure.status >= 500) {
    return { ...base, category: 'TRANSIENT' };
  }

  if (failure.status === 401 || failure.status === 403) {
    return { ...base, category: 'FATAL_AUTH' };
  }

  if (failure.status === 404) {
    return { ...base, category: 'FATAL_PRECONDITION' };
  }

  if (failure.status >= 400) {
    return { ...base, category: 'FATAL_VALIDATION' };
  }

  return { ...base, category: 'TRANSIENT' };
}

/**
 * Anything thrown by an operation (other than cancellation) is treated
 * as transient: the contract reports API errors as values.
 */
export function classifyThrown(error: unknown): ClassifiedError {
  if (error instanceof CallTimeoutError) {
    return { category: 'TRANSIENT', code: 'TIMEOUT', message: error.message, originalError: error };
  }
  if (error instanceof Error) {
    return { category: 'TRANSIENT', code: 'UNEXPECTED_ERROR', message: error.message, originalError: error };
  }
  return { category: 'TRANSIENT', code: 'UNEXPECTED_ERROR', message: String(error) };
}

/**
 * Exponential backoff: initial * multiplier^(attempt-1), capped, ±25% jitter.
 */
export function calculateBackoff(
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random
): number {
  const { initial_delay_ms, max_delay_ms, backoff_multiplier, jitter } = policy;

  let delay = initial_delay_ms * Math.pow(backoff_multiplier, attempt - 1);
  delay = Math.min(delay, max_delay_ms);

  if (jitter) {
    // Add ±25% jitter
    const jitterRange = delay * 0.25;
    delay = delay - jitterRange + (random() * jitterRange * 2);
  }

  return Math.floor(delay);
}

// =============================================================================
// RETRY EXECUTOR
// =============================================================================

export class RetryExecutor {
  private limiter: RateLimiter;
  private clock: Clock;
  private policy: RetryPolicy;
  private timeouts: TimeoutConfig;
  private metrics: WorkflowMetrics;
  private random: () => number;

  constructor(
    limiter: RateLimiter,
    clock: Clock,
    options: {
      policy?: RetryPolicy;
      timeouts?: TimeoutConfig;
      metrics?: WorkflowMetrics;
      random?: () => number;
    } = {}
  ) {
    this.limiter = limiter;
    this.clock = clock;
    this.policy = options.policy ?? DEFAULT_RETRY_POLICY;
    this.timeouts = options.timeouts ?? DEFAULT_TIMEOUT_CONFIG;
    this.metrics = options.metrics ?? new NoOpMetrics();
    this.random = options.random ?? Math.random;
  }

  /**
   * Run `invoke` until it succeeds or fails fatally.
   * Never returns a retryable outcome.
   */
  async execute<T>(
    role: CredentialRole,
    invoke: () => Promise<RemoteResult<T>>,
    options: ExecuteOptions
  ): Promise<CallResult<T>> {
    const cost = options.cost ?? REMOTE_CALL_COSTS[options.operation];
    const resource = REMOTE_CALL_RESOURCES[options.operation];
    let attempts = 0;
    let transientFailures = 0;

    for (;;) {
      await this.limiter.reserve(role, cost, options.signal, resource);
      attempts++;

      const outcome = await this.attempt(role, invoke, options.operation);

      if (outcome.type === 'SUCCESS') {
        return { type: 'SUCCESS', value: outcome.value, attempts };
      }

      if (outcome.type === 'FATAL') {
        this.metrics.callFailed(options.operation, outcome.error.category);
        return { type: 'FATAL', error: outcome.error, attempts };
      }

      const { error } = outcome;

      if (error.category === 'THROTTLED') {
        this.limiter.throttled(role, outcome.throttle ?? { secondary: false }, resource);
        this.metrics.callRetried(options.operation, error.category, attempts);
        options.onRetry?.(attempts, error, 0);
        continue;
      }

      transientFailures++;
      if (transientFailures >= this.policy.max_attempts) {
        const exhausted: ClassifiedError = {
          category: 'FATAL_EXHAUSTED',
          code: error.code,
          status: error.status,
          message: `${options.operation} failed after ${transientFailures} attempts: ${error.message}`,
          originalError: error.originalError,
        };
        this.metrics.callFailed(options.operation, exhausted.category);
        return { type: 'FATAL', error: exhausted, attempts };
      }

      const delay = calculateBackoff(this.policy, transientFailures, this.random);
      this.metrics.callRetried(options.operation, error.category, attempts);
      options.onRetry?.(attempts, error, delay);
      await this.clock.sleep(delay, options.signal);
    }
  }

  private async attempt<T>(
    role: CredentialRole,
    invoke: () => Promise<RemoteResult<T>>,
    operation: RemoteOperation
  ): Promise<AttemptOutcome<T>> {
    let result: RemoteResult<T>;
    try {
      result = await withTimeout(invoke, getCallTimeout(this.timeouts, operation), operation);
    } catch (error) {
      if (error instanceof RunCancelledError) throw error;
      return { type: 'RETRYABLE', error: classifyThrown(error) };
    }

    const resource = REMOTE_CALL_RESOURCES[operation];

    if (result.ok) {
      this.limiter.observe(role, result.rate, resource);
      return { type: 'SUCCESS', value: result.value, rate: result.rate };
    }

    const { failure } = result;
    this.limiter.observe(role, failure.rate, resource);

    const error = classifyFailure(failure);
    switch (error.category) {
      case 'THROTTLED':
        return {
          type: 'RETRYABLE',
          error,
          throttle: {
            secondary: failure.code === 'SECONDARY_RATE_LIMIT',
            resetAt: failure.rate?.resetAt,
            retryAfterMs: failure.retryAfterMs,
          },
        };
      case 'TRANSIENT':
        return { type: 'RETRYABLE', error };
      default:
        return { type: 'FATAL', error };
    }
  }
}
