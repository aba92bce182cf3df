/**
 * Metrics Interface
 *
 * Write-only signals for observability.
 *
 * HARD CONSTRAINT: the engine and workflows must NEVER read metrics or act on them.
 * Metrics are purely for external monitoring.
 *
 * Default implementation is no-op.
 */

import type { CredentialRole } from '../credentials/registry.js';
import type { FailureCategory, WorkflowKind } from '../workflows/types.js';

// =============================================================================
// METRICS INTERFACE
// =============================================================================

export type RateLimitWaitReason = 'budget' | 'secondary';

/**
 * Write-only metrics sink.
 *
 * All methods are fire-and-forget.
 * Implementations must never throw.
 */
export interface WorkflowMetrics {
  // =========================================================================
  // Workflow lifecycle
  // =========================================================================

  workflowStarted(kind: WorkflowKind): void;

  /**
   * Workflow picked up an existing progress record.
   */
  workflowResumed(kind: WorkflowKind): void;

  workflowCompleted(kind: WorkflowKind, durationMs: number): void;

  workflowFailed(kind: WorkflowKind, category: FailureCategory): void;

  workflowBlocked(kind: WorkflowKind, reason: string): void;

  workflowCancelled(kind: WorkflowKind): void;

  // =========================================================================
  // Step lifecycle
  // =========================================================================

  stepCompleted(kind: WorkflowKind, durationMs: number): void;

  checkpointSaved(kind: WorkflowKind): void;

  thresholdCrossed(kind: WorkflowKind, threshold: number): void;

  // =========================================================================
  // Remote calls
  // =========================================================================

  callRetried(operation: string, category: FailureCategory, attempt: number): void;

  callFailed(operation: string, category: FailureCategory): void;

  rateLimitWait(role: CredentialRole, waitMs: number, reason: RateLimitWaitReason): void;
}

// =============================================================================
// NO-OP IMPLEMENTATION (Default)
// =============================================================================

export class NoOpMetrics implements WorkflowMetrics {
  workflowStarted(_kind: WorkflowKind): void {}
  workflowResumed(_kind: WorkflowKind): void {}
  workflowCompleted(_kind: WorkflowKind, _durationMs: number): void {}
  workflowFailed(_kind: WorkflowKind, _category: FailureCategory): void {}
  workflowBlocked(_kind: WorkflowKind, _reason: string): void {}
  workflowCancelled(_kind: WorkflowKind): void {}

  stepCompleted(_kind: WorkflowKind, _durationMs: number): void {}
  checkpointSaved(_kind: WorkflowKind): void {}
  thresholdCrossed(_kind: WorkflowKind, _threshold: number): void {}

  callRetried(_operation: string, _category: FailureCategory, _attempt: number): void {}
  callFailed(_operation: string, _category: FailureCategory): void {}
  rateLimitWait(_role: CredentialRole, _waitMs: number, _reason: RateLimitWaitReason): void {}
}

// =============================================================================
// CONSOLE METRICS (for development)
// =============================================================================

/**
 * Logs every metric as a JSON line.
 */
export class ConsoleMetrics implements WorkflowMetrics {
  private log(category: string, event: string, data: Record<string, unknown>): void {
    console.log(JSON.stringify({
      timestamp: new Date().toISOString(),
      category,
      event,
      ...data,
    }));
  }

  workflowStarted(kind: WorkflowKind): void {
    this.log('workflow', 'started', { kind });
  }

  workflowResumed(kind: WorkflowKind): void {
    this.log('workflow', 'resumed', { kind });
  }

  workflowCompleted(kind: WorkflowKind, durationMs: number): void {
    this.log('workflow', 'completed', { kind, durationMs });
  }

  workflowFailed(kind: WorkflowKind, category: FailureCategory): void {
    this.log('workflow', 'failed', { kind, failureCategory: category });
  }

  workflowBlocked(kind: WorkflowKind, reason: string): void {
    this.log('workflow', 'blocked', { kind, reason });
  }

  workflowCancelled(kind: WorkflowKind): void {
    this.log('workflow', 'cancelled', { kind });
  }

  stepCompleted(kind: WorkflowKind, durationMs: number): void {
    this.log('step', 'completed', { kind, durationMs });
  }

  checkpointSaved(kind: WorkflowKind): void {
    this.log('step', 'checkpoint', { kind });
  }

  thresholdCrossed(kind: WorkflowKind, threshold: number): void {
    this.log('step', 'threshold', { kind, threshold });
  }

  callRetried(operation: string, category: FailureCategory, attempt: number): void {
    this.log('call', 'retried', { operation, failureCategory: category, attempt });
  }

  callFailed(operation: string, category: FailureCategory): void {
    this.log('call', 'failed', { operation, failureCategory: category });
  }

  rateLimitWait(role: CredentialRole, waitMs: number, reason: RateLimitWaitReason): void {
    this.log('ratelimit', 'wait', { role, waitMs, reason });
  }
}
