/**
 * Call Timeout Enforcement
 *
 * A timed-out attempt is a TRANSIENT failure, never a fatal one.
 * The retry policy decides what happens next.
 */

import type { RemoteOperation } from '../remote/client.js';

// =============================================================================
// TIMEOUT CONFIG
// =============================================================================

export interface TimeoutConfig {
  /**
   * Default timeout for one remote call attempt (ms).
   */
  defaultCallTimeoutMs: number;

  /**
   * Per-operation overrides (ms).
   */
  callTimeouts?: Partial<Record<RemoteOperation, number>>;
}

export const DEFAULT_TIMEOUT_CONFIG: TimeoutConfig = {
  defaultCallTimeoutMs: 30_000,

  // Multi-request operations
  callTimeouts: {
    createAndMergeChange: 120_000,
    createBypassPullRequest: 90_000,
    ensureRepository: 60_000,
  },
};

// =============================================================================
// TIMEOUT ERROR
// =============================================================================

export class CallTimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`Call timed out: ${operation} after ${timeoutMs}ms`);
    this.name = 'CallTimeoutError';
  }
}

// =============================================================================
// TIMEOUT WRAPPER
// =============================================================================

export function getCallTimeout(config: TimeoutConfig, operation: RemoteOperation): number {
  return config.callTimeouts?.[operation] ?? config.defaultCallTimeoutMs;
}

/**
 * Execute a function with timeout.
 *
 * Does NOT cancel the underlying operation.
 * The operation may still complete after timeout; the remote side
 * must tolerate the retried call.
 */
export async function withTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new CallTimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(), timeoutPromise]);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}
