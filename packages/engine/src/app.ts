/**
 * Milestone Engine
 *
 * Bootstrap + lifecycle management for one run.
 *
 * Lifecycle:
 * - open the progress store (a seeded in-memory copy in dry runs)
 * - prime each credential's rate budget
 * - ensure the target repository exists
 * - run the selected workflows concurrently, each resuming its own record
 * - close the store
 */

import { v4 as uuidv4 } from 'uuid';

import {
  ConfigError,
  repositoryOwner,
  toCredentials,
  toRateLimiterConfig,
  toRetryPolicy,
  toTimeoutConfig,
  type EngineConfig,
} from './config/index.js';
import { InMemoryCredentialRegistry, type CredentialRegistry } from './credentials/registry.js';
import { DEFAULT_TIMEOUT_CONFIG } from './execution/timeout.js';
import { NoOpMetrics, type WorkflowMetrics } from './observability/metrics.js';
import { FileProgressStore } from './progress/file-store.js';
import { PostgresProgressStore } from './progress/postgres-store.js';
import { InMemoryProgressStore, type ProgressStore } from './progress/store.js';
import type { ProgressError, ProgressRecord } from './progress/types.js';
import type { RemoteClient, RepositoryRef } from './remote/client.js';
import { DryRunRemoteClient } from './remote/dry-run-client.js';
import { GitHubRemoteClient } from './remote/github-client.js';
import { RateLimiter } from './ratelimit/rate-limiter.js';
import { RetryExecutor } from './retry/retry-policy.js';
import { RunCancelledError, systemClock, type Clock } from './utils/clock.js';
import { createLogger, type Logger } from './utils/logger.js';
import { createWorkflow, DEFAULT_WORKFLOWS, type Workflow, type WorkflowOptions } from './workflows/factory.js';
import { WorkflowRunner } from './workflows/runner.js';
import { nextThreshold } from './workflows/thresholds.js';
import type { ClassifiedError, WorkflowKind, WorkflowReport, WorkflowStatus } from './workflows/types.js';

// =============================================================================
// TYPES
// =============================================================================

export interface EngineDependencies {
  /** Replaces the GitHub client; ignored in dry runs. */
  client?: RemoteClient;
  /** Replaces the store named by the configuration. */
  store?: ProgressStore;
  clock?: Clock;
  logger?: Logger;
  metrics?: WorkflowMetrics;
  fetch?: typeof fetch;
}

export interface RunOptions {
  /** Workflow names; defaults to every enabled workflow. */
  workflows?: string[];
  signal?: AbortSignal;
}

export interface RunReport {
  runId: string;
  dryRun: boolean;
  durationMs: number;
  workflows: WorkflowReport[];
  /** True when any workflow failed. */
  failed: boolean;
  /** True when any workflow was cancelled. */
  cancelled: boolean;
}

export interface WorkflowStatusLine {
  workflow: string;
  kind: WorkflowKind | null;
  counter: number;
  crossedThresholds: number[];
  nextThreshold: number | null;
  completed: boolean;
  lastError: ProgressError | null;
  updatedAt: number | null;
}

// =============================================================================
// MILESTONE ENGINE
// =============================================================================

export class MilestoneEngine {
  private config: EngineConfig;
  private deps: EngineDependencies;
  private clock: Clock;
  private logger: Logger;
  private metrics: WorkflowMetrics;

  constructor(config: EngineConfig, deps: EngineDependencies = {}) {
    this.config = config;
    this.deps = deps;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createLogger({ level: config.logLevel });
    this.metrics = deps.metrics ?? new NoOpMetrics();
  }

  /**
   * Build the selected workflows. Unknown names are a configuration error.
   */
  resolveWorkflows(names?: string[]): Workflow[] {
    const configured = this.configuredWorkflows();

    if (!names || names.length === 0) {
      return configured
        .filter((entry) => entry.enabled)
        .map((entry) => createWorkflow(entry.name, entry.options));
    }

    const byName = new Map(configured.map((entry) => [entry.name, entry]));
    const unknown = names.filter((name) => !byName.has(name));
    if (unknown.length > 0) {
      throw new ConfigError('Unknown workflows', unknown.map((name) => `${name}: not configured`));
    }

    return names.flatMap((name) => {
      const entry = byName.get(name);
      return entry ? [createWorkflow(entry.name, entry.options)] : [];
    });
  }

  /**
   * Run the selected workflows to their terminal outcomes.
   *
   * Never rejects once the store is open; failures are in the report.
   */
  async run(options: RunOptions = {}): Promise<RunReport> {
    const runId = uuidv4();
    const logger = this.logger.child({ runId });
    const startedAt = this.clock.now();
    const signal = options.signal ?? new AbortController().signal;
    const dryRun = this.config.dryRun;

    const workflows = this.resolveWorkflows(options.workflows);
    logger.info({ workflows: workflows.map((w) => w.name), dryRun }, 'Starting run');

    const store = await this.openStore(logger);
    try {
      const client = dryRun ? new DryRunRemoteClient() : this.remoteClient();
      const credentials = new InMemoryCredentialRegistry(toCredentials(this.config));
      const limiter = new RateLimiter(this.clock, toRateLimiterConfig(this.config), this.metrics, logger);
      const executor = new RetryExecutor(limiter, this.clock, {
        policy: toRetryPolicy(this.config),
        timeouts: toTimeoutConfig(this.config, DEFAULT_TIMEOUT_CONFIG),
        metrics: this.metrics,
      });

      if (!dryRun) {
        await this.primeBudgets(client, credentials, limiter, logger);
      }

      const repository: RepositoryRef = { owner: repositoryOwner(this.config), name: this.config.repository.name };

      let reports: WorkflowReport[];
      const ensured = await this.ensureRepository(client, credentials, executor, repository, signal, logger);
      if (ensured.type === 'READY') {
        const runner = new WorkflowRunner({
          store,
          executor,
          client,
          credentials,
          repository,
          clock: this.clock,
          logger,
          metrics: this.metrics,
        });
        reports = await Promise.all(workflows.map((workflow) => runner.run(workflow, signal)));
      } else {
        reports = await Promise.all(
          workflows.map((workflow) =>
            this.notStartedReport(store, workflow, ensured.type === 'CANCELLED' ? 'cancelled' : 'failed', startedAt, ensured.error)
          )
        );
      }

      const report: RunReport = {
        runId,
        dryRun,
        durationMs: this.clock.now() - startedAt,
        workflows: reports,
        failed: reports.some((r) => r.status === 'failed'),
        cancelled: reports.some((r) => r.status === 'cancelled'),
      };

      logger.info(
        {
          durationMs: report.durationMs,
          outcomes: Object.fromEntries(reports.map((r) => [r.workflow, r.status])),
          ...(dryRun && client instanceof DryRunRemoteClient ? { simulatedCalls: client.callCount } : {}),
        },
        'Run finished'
      );
      return report;
    } finally {
      await store.close();
    }
  }

  /**
   * Progress of every configured workflow, plus any stored record
   * no longer in the configuration.
   */
  async status(): Promise<WorkflowStatusLine[]> {
    const store = this.deps.store ?? this.createProgressStore();
    await store.open();
    try {
      const records = new Map((await store.loadAll()).map((record) => [record.workflow, record]));
      const lines: WorkflowStatusLine[] = [];

      for (const entry of this.configuredWorkflows()) {
        const workflow = createWorkflow(entry.name, entry.options);
        const record = records.get(entry.name) ?? null;
        records.delete(entry.name);
        lines.push(statusLine(entry.name, workflow.kind, record, workflow.thresholds));
      }
      for (const record of records.values()) {
        lines.push(statusLine(record.workflow, null, record, []));
      }
      return lines;
    } finally {
      await store.close();
    }
  }

  /**
   * The store the configuration names, not opened.
   */
  createProgressStore(): ProgressStore {
    const progress = this.config.progress;
    switch (progress.backend) {
      case 'file':
        return new FileProgressStore(progress.path, this.clock);
      case 'postgres':
        return new PostgresProgressStore({
          connectionString: progress.databaseUrl,
          tableName: progress.tableName,
          clock: this.clock,
        });
      case 'memory':
        return new InMemoryProgressStore(this.clock);
    }
  }

  // ===========================================================================
  // PRIVATE
  // ===========================================================================

  private configuredWorkflows(): Array<{ name: string; enabled: boolean; options: WorkflowOptions }> {
    const workflows = this.config.workflows;
    if (!workflows || Object.keys(workflows).length === 0) {
      return Object.entries(DEFAULT_WORKFLOWS).map(([name, options]) => ({ name, enabled: true, options }));
    }
    return Object.entries(workflows).map(([name, options]) => ({ name, enabled: options.enabled, options }));
  }

  private remoteClient(): RemoteClient {
    return (
      this.deps.client ??
      new GitHubRemoteClient({
        timeoutMs: this.config.retry.attemptTimeoutMs,
        fetch: this.deps.fetch,
      })
    );
  }

  /**
   * A dry run reads real progress once, then works on an in-memory copy.
   */
  private async openStore(logger: Logger): Promise<ProgressStore> {
    const configured = this.deps.store ?? this.createProgressStore();
    await configured.open();

    if (!this.config.dryRun) {
      logger.info({ backend: this.deps.store ? 'custom' : this.config.progress.backend }, 'Progress store opened');
      return configured;
    }

    const records = await configured.loadAll();
    await configured.close();

    const copy = new InMemoryProgressStore(this.clock);
    copy.seed(records);
    await copy.open();
    logger.info({ records: records.length }, 'Dry run: progress copied to memory');
    return copy;
  }

  private async primeBudgets(
    client: RemoteClient,
    credentials: CredentialRegistry,
    limiter: RateLimiter,
    logger: Logger
  ): Promise<void> {
    for (const role of credentials.roles()) {
      const credential = credentials.get(role);
      try {
        const result = await client.getRateBudget(credential);
        if (result.ok) {
          limiter.prime(role, result.value);
        } else {
          logger.warn({ role, code: result.failure.code, error: result.failure.message }, 'Could not read rate budget');
        }
      } catch (error) {
        logger.warn({ role, error }, 'Could not read rate budget');
      }
    }
  }

  private async ensureRepository(
    client: RemoteClient,
    credentials: CredentialRegistry,
    executor: RetryExecutor,
    repository: RepositoryRef,
    signal: AbortSignal,
    logger: Logger
  ): Promise<{ type: 'READY' } | { type: 'FAILED'; error: ClassifiedError } | { type: 'CANCELLED'; error?: undefined }> {
    const credential = credentials.get('primary');
    try {
      const result = await executor.execute(
        'primary',
        () =>
          client.ensureRepository(credential, {
            ...repository,
            private: this.config.repository.private,
            description: this.config.repository.description,
          }),
        { operation: 'ensureRepository', signal }
      );

      if (result.type === 'FATAL') {
        logger.error({ repository, code: result.error.code, error: result.error.message }, 'Repository unavailable');
        return { type: 'FAILED', error: result.error };
      }

      logger.info(
        { repository: result.value.fullName, created: result.value.created },
        result.value.created ? 'Repository created' : 'Repository ready'
      );
      return { type: 'READY' };
    } catch (error) {
      if (error instanceof RunCancelledError) {
        return { type: 'CANCELLED' };
      }
      const message = error instanceof Error ? error.message : String(error);
      return {
        type: 'FAILED',
        error: {
          category: 'FATAL_INTERNAL',
          code: 'UNEXPECTED_ERROR',
          message,
          originalError: error instanceof Error ? error : undefined,
        },
      };
    }
  }

  private async notStartedReport(
    store: ProgressStore,
    workflow: Workflow,
    status: Extract<WorkflowStatus, 'failed' | 'cancelled'>,
    startedAt: number,
    error?: ClassifiedError
  ): Promise<WorkflowReport> {
    const record = await store.load(workflow.name);
    const report: WorkflowReport = {
      workflow: workflow.name,
      kind: workflow.kind,
      status,
      counter: record?.counter ?? 0,
      crossedThresholds: record?.crossed_thresholds ?? [],
      newlyCrossed: [],
      stepsCompleted: 0,
      durationMs: this.clock.now() - startedAt,
    };
    if (error) {
      report.stepId = 'repository';
      report.error = error;
      report.disposition = 'resumable';
    }
    return report;
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function statusLine(
  workflow: string,
  kind: WorkflowKind | null,
  record: ProgressRecord | null,
  thresholds: readonly number[]
): WorkflowStatusLine {
  const counter = record?.counter ?? 0;
  const completed = record?.completed ?? false;
  return {
    workflow,
    kind,
    counter,
    crossedThresholds: record?.crossed_thresholds ?? [],
    nextThreshold: completed ? null : nextThreshold(thresholds, counter),
    completed,
    lastError: record?.last_error ?? null,
    updatedAt: record?.updated_at ?? null,
  };
}

export function formatStatusLine(line: WorkflowStatusLine): string {
  const parts = [
    line.workflow,
    line.kind ?? 'unconfigured',
    `counter=${line.counter}`,
    `crossed=[${line.crossedThresholds.join(',')}]`,
    `next=${line.nextThreshold ?? '-'}`,
    line.completed ? 'completed' : 'in-progress',
  ];
  if (line.lastError) {
    parts.push(`last_error=${line.lastError.category}:${line.lastError.code} (${line.lastError.message})`);
  }
  return parts.join(' ');
}
