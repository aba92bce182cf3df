/**
 * Configuration Schema
 *
 * Validated shape of milestones.yaml after environment substitution.
 */

import { z } from 'zod';

import { DEFAULT_RATE_LIMITER_CONFIG } from '../ratelimit/rate-limiter.js';
import { DEFAULT_RETRY_POLICY } from '../workflows/types.js';

const DEFAULT_API_URL = 'https://api.github.com';

const Thresholds = z
  .array(z.number().int().positive())
  .min(1)
  .refine((values) => values.every((v, i) => i === 0 || v > values[i - 1]), {
    message: 'thresholds must be strictly ascending',
  });

export const CredentialSchema = z.object({
  login: z.string().min(1),
  token: z.string().min(1),
  email: z.string().email().optional(),
  name: z.string().optional(),
  apiUrl: z.string().url().default(DEFAULT_API_URL),
  graphqlUrl: z.string().url().optional(),
});

export const RepositorySchema = z.object({
  owner: z.string().min(1).optional(),
  name: z.string().min(1),
  private: z.boolean().default(false),
  description: z.string().default('Milestone workflow repository'),
});

export const RateLimitSchema = z.object({
  buffer: z.number().int().nonnegative().default(DEFAULT_RATE_LIMITER_CONFIG.buffer),
  windowMs: z.number().int().positive().default(DEFAULT_RATE_LIMITER_CONFIG.windowMs),
  initialLimit: z.number().int().positive().default(DEFAULT_RATE_LIMITER_CONFIG.initialLimit),
  defaultPenaltyMs: z.number().int().positive().default(DEFAULT_RATE_LIMITER_CONFIG.defaultPenaltyMs),
});

export const RetrySchema = z.object({
  maxAttempts: z.number().int().positive().default(DEFAULT_RETRY_POLICY.max_attempts),
  initialDelayMs: z.number().int().nonnegative().default(DEFAULT_RETRY_POLICY.initial_delay_ms),
  maxDelayMs: z.number().int().positive().default(DEFAULT_RETRY_POLICY.max_delay_ms),
  backoffMultiplier: z.number().min(1).default(DEFAULT_RETRY_POLICY.backoff_multiplier),
  jitter: z.boolean().default(DEFAULT_RETRY_POLICY.jitter),
  attemptTimeoutMs: z.number().int().positive().default(30_000),
});

export const ProgressSchema = z.object({
  backend: z.enum(['file', 'postgres', 'memory']).default('file'),
  path: z.string().min(1).default('progress/progress.json'),
  databaseUrl: z.string().optional(),
  tableName: z.string().default('workflow_progress'),
});

const Common = { enabled: z.boolean().default(true) };

export const WorkflowConfigSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('batch-counter'),
    ...Common,
    thresholds: Thresholds.optional(),
    batchSize: z.number().int().positive().optional(),
    stepDelayMs: z.number().int().nonnegative().optional(),
    batchDelayMs: z.number().int().nonnegative().optional(),
    filePath: z.string().min(1).optional(),
    branchPrefix: z.string().min(1).optional(),
  }),
  z.object({
    kind: z.literal('time-boxed'),
    ...Common,
    deadlineMs: z.number().int().positive().optional(),
  }),
  z.object({
    kind: z.literal('co-attribution'),
    ...Common,
    thresholds: Thresholds.optional(),
    alternateAuthors: z.boolean().optional(),
    stepDelayMs: z.number().int().nonnegative().optional(),
    directory: z.string().min(1).optional(),
  }),
  z.object({
    kind: z.literal('question-answer'),
    ...Common,
    thresholds: Thresholds.optional(),
    inviteCollaborator: z.boolean().optional(),
    stepDelayMs: z.number().int().nonnegative().optional(),
  }),
  z.object({
    kind: z.literal('review-bypass'),
    ...Common,
    reviewer: z.string().min(1).optional(),
    branch: z.string().min(1).optional(),
    filePath: z.string().min(1).optional(),
  }),
]);

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const EngineConfigSchema = z
  .object({
    credentials: z.object({
      primary: CredentialSchema,
      secondary: CredentialSchema.optional(),
    }),
    repository: RepositorySchema,
    rateLimit: RateLimitSchema.default({}),
    retry: RetrySchema.default({}),
    progress: ProgressSchema.default({}),
    dryRun: z.boolean().default(false),
    logLevel: LogLevelSchema.default('info'),
    workflows: z.record(WorkflowConfigSchema).optional(),
  })
  .superRefine((config, ctx) => {
    if (config.progress.backend === 'postgres' && !config.progress.databaseUrl) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['progress', 'databaseUrl'],
        message: 'databaseUrl is required for the postgres backend',
      });
    }
  });

export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
export type EngineConfig = z.output<typeof EngineConfigSchema>;
export type CredentialConfig = z.output<typeof CredentialSchema>;
export type WorkflowConfig = z.output<typeof WorkflowConfigSchema>;
