/**
 * Rate Limiter
 *
 * One budget per credential and resource (REST core, GraphQL). `reserve`
 * is the single backpressure point of the engine: every remote call waits
 * here before it is issued.
 *
 * Invariants:
 * 1. A call of cost c is issued only when remaining - c >= buffer
 * 2. remaining never goes below 0
 * 3. Budgets are independent; waiting on one never blocks another
 * 4. Server-reported numbers replace local predictions, in the budget
 *    of the resource they were reported for
 * 5. A secondary (abuse-detection) pause holds every budget of the credential
 */

import type { CredentialRole } from '../credentials/registry.js';
import { NoOpMetrics, type WorkflowMetrics, type RateLimitWaitReason } from '../observability/metrics.js';
import { isRateResource, RATE_RESOURCES, type RateResource, type RateSnapshot } from '../remote/client.js';
import { throwIfCancelled, type Clock } from '../utils/clock.js';
import { SilentLogger, type Logger } from '../utils/logger.js';

// =============================================================================
// CONFIG
// =============================================================================

export interface RateLimiterConfig {
  /** Calls kept in reserve; never spent. */
  buffer: number;
  /** Window length assumed when the server has not told us. */
  windowMs: number;
  /** Budget assumed before the first observation. */
  initialLimit: number;
  /** Wait applied to a throttle signal that carries no timing. */
  defaultPenaltyMs: number;
}

export const DEFAULT_RATE_LIMITER_CONFIG: RateLimiterConfig = {
  buffer: 100,
  windowMs: 60 * 60_000,
  initialLimit: 5000,
  defaultPenaltyMs: 60_000,
};

/** Floor for throttle waits so a stale reset time cannot spin. */
const MIN_THROTTLE_WAIT_MS = 1000;

// =============================================================================
// TYPES
// =============================================================================

export interface RateBudget {
  remaining: number;
  limit: number;
  /** Epoch ms at which `remaining` refills to `limit`. */
  resetAt: number;
  /** Forced pause from a secondary (abuse-detection) signal. */
  notBefore: number;
}

export interface ThrottleSignal {
  /** Secondary limits pause the credential without touching the budget. */
  secondary: boolean;
  resetAt?: number;
  retryAfterMs?: number;
}

export class RateLimitError extends Error {
  constructor(
    public readonly role: CredentialRole,
    public readonly cost: number,
    public readonly usable: number,
    public readonly resource: RateResource = 'core'
  ) {
    super(`Call cost ${cost} can never fit the ${role} ${resource} budget (usable: ${usable})`);
    this.name = 'RateLimitError';
  }
}

// =============================================================================
// RATE LIMITER
// =============================================================================

export class RateLimiter {
  private budgets: Map<string, RateBudget> = new Map();
  private clock: Clock;
  private config: RateLimiterConfig;
  private metrics: WorkflowMetrics;
  private logger: Logger;

  constructor(
    clock: Clock,
    config: RateLimiterConfig = DEFAULT_RATE_LIMITER_CONFIG,
    metrics: WorkflowMetrics = new NoOpMetrics(),
    logger: Logger = new SilentLogger()
  ) {
    this.clock = clock;
    this.config = config;
    this.metrics = metrics;
    this.logger = logger;
  }

  /**
   * Wait until a call of `cost` may proceed, then spend it.
   *
   * Throws RunCancelledError if the signal aborts while waiting.
   */
  async reserve(
    role: CredentialRole,
    cost = 1,
    signal?: AbortSignal,
    resource: RateResource = 'core'
  ): Promise<void> {
    for (;;) {
      throwIfCancelled(signal);

      const budget = this.budget(role, resource);
      const now = this.clock.now();

      if (now < budget.notBefore) {
        await this.wait(role, resource, budget.notBefore - now, 'secondary', signal);
        continue;
      }

      if (now >= budget.resetAt) {
        budget.remaining = budget.limit;
        budget.resetAt = now + this.config.windowMs;
      }

      const usable = budget.limit - this.config.buffer;
      if (cost > usable) {
        throw new RateLimitError(role, cost, usable, resource);
      }

      if (budget.remaining - cost >= this.config.buffer) {
        budget.remaining -= cost;
        return;
      }

      await this.wait(role, resource, budget.resetAt - now, 'budget', signal);
    }
  }

  /**
   * Replace the local prediction with what the server reported.
   *
   * A snapshot naming its resource updates that resource's budget;
   * resources the engine does not pace (search and the like) are ignored.
   */
  observe(role: CredentialRole, snapshot?: RateSnapshot, resource: RateResource = 'core'): void {
    if (!snapshot) return;

    const reported = snapshot.resource ?? resource;
    if (!isRateResource(reported)) return;

    const budget = this.budget(role, reported);
    budget.remaining = Math.max(0, snapshot.remaining);
    budget.limit = snapshot.limit;
    budget.resetAt = snapshot.resetAt;
  }

  /**
   * Seed a budget, typically from the rate-limit endpoint at startup.
   */
  prime(role: CredentialRole, snapshot: RateSnapshot, resource: RateResource = 'core'): void {
    this.observe(role, snapshot, resource);
    this.logger.info(
      { role, resource: snapshot.resource ?? resource, remaining: snapshot.remaining, limit: snapshot.limit, resetAt: new Date(snapshot.resetAt).toISOString() },
      'Rate budget primed'
    );
  }

  /**
   * Record a throttling response.
   */
  throttled(role: CredentialRole, signal: ThrottleSignal, resource: RateResource = 'core'): void {
    const now = this.clock.now();
    const penalty = signal.retryAfterMs ?? this.config.defaultPenaltyMs;

    if (signal.secondary) {
      const notBefore = now + Math.max(penalty, MIN_THROTTLE_WAIT_MS);
      for (const each of RATE_RESOURCES) {
        const paused = this.budget(role, each);
        paused.notBefore = Math.max(paused.notBefore, notBefore);
      }
      this.logger.warn({ role, notBefore: new Date(notBefore).toISOString() }, 'Secondary rate limit hit');
      return;
    }

    const budget = this.budget(role, resource);
    const resetAt = signal.resetAt ?? now + penalty;
    budget.remaining = 0;
    budget.resetAt = Math.max(resetAt, now + MIN_THROTTLE_WAIT_MS);
    this.logger.warn({ role, resource, resetAt: new Date(budget.resetAt).toISOString() }, 'Rate budget exhausted');
  }

  /**
   * Read-only copy of a budget.
   */
  snapshot(role: CredentialRole, resource: RateResource = 'core'): RateBudget {
    return { ...this.budget(role, resource) };
  }

  get buffer(): number {
    return this.config.buffer;
  }

  // ===========================================================================
  // PRIVATE
  // ===========================================================================

  private budget(role: CredentialRole, resource: RateResource): RateBudget {
    const key = `${role}:${resource}`;
    let budget = this.budgets.get(key);
    if (!budget) {
      budget = {
        remaining: this.config.initialLimit,
        limit: this.config.initialLimit,
        resetAt: this.clock.now() + this.config.windowMs,
        notBefore: 0,
      };
      this.budgets.set(key, budget);
    }
    return budget;
  }

  private async wait(
    role: CredentialRole,
    resource: RateResource,
    ms: number,
    reason: RateLimitWaitReason,
    signal?: AbortSignal
  ): Promise<void> {
    this.metrics.rateLimitWait(role, ms, reason);
    this.logger.debug({ role, resource, waitMs: ms, reason }, 'Waiting for rate budget');
    await this.clock.sleep(ms, signal);
  }
}
