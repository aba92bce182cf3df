/**
 * Configuration Loading
 *
 * Sources, in order of precedence:
 *   1. command-line overrides
 *   2. the YAML file, with ${VAR} and ${VAR:-default} placeholders
 *      filled from the environment
 *   3. environment variables alone, when no file is given
 *
 * Every source ends in EngineConfigSchema; nothing unvalidated
 * reaches the engine.
 */

import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import type { ZodError } from 'zod';

import type { Credential, CredentialRole } from '../credentials/registry.js';
import type { TimeoutConfig } from '../execution/timeout.js';
import type { RateLimiterConfig } from '../ratelimit/rate-limiter.js';
import type { RetryPolicy } from '../workflows/types.js';
import type { LogLevel } from '../utils/logger.js';
import { EngineConfigSchema, type CredentialConfig, type EngineConfig } from './schema.js';

export type Environment = Record<string, string | undefined>;

export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

// =============================================================================
// ENVIRONMENT SUBSTITUTION
// =============================================================================

const PLACEHOLDER = /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g;

/**
 * Replace placeholders in every string of a parsed document.
 * A placeholder without a default must be set.
 */
export function substituteEnv(value: unknown, env: Environment, path: string[] = []): unknown {
  if (typeof value === 'string') {
    return value.replace(PLACEHOLDER, (_match, name: string, fallback: string | undefined) => {
      const resolved = env[name];
      if (resolved !== undefined && resolved !== '') return resolved;
      if (fallback !== undefined) return fallback;
      throw new ConfigError('Missing environment variable', [`${path.join('.') || '<root>'}: ${name} is not set`]);
    });
  }
  if (Array.isArray(value)) {
    return value.map((item, i) => substituteEnv(item, env, [...path, String(i)]));
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, substituteEnv(item, env, [...path, key])])
    );
  }
  return value;
}

// =============================================================================
// PARSING
// =============================================================================

export function parseConfig(raw: unknown, source = 'configuration'): EngineConfig {
  const parsed = EngineConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${source}`, formatIssues(parsed.error));
  }
  return parsed.data;
}

export async function loadConfigFile(path: string, env: Environment = process.env): Promise<EngineConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (error) {
    throw new ConfigError(`Cannot parse config file ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }

  return parseConfig(substituteEnv(document ?? {}, env), path);
}

export function loadConfigFromEnv(env: Environment = process.env): EngineConfig {
  const apiUrl = env.GITHUB_API_URL;
  const credential = (prefix: 'PRIMARY' | 'SECONDARY') => ({
    login: env[`${prefix}_LOGIN`],
    token: env[`${prefix}_TOKEN`],
    email: env[`${prefix}_EMAIL`],
    apiUrl,
  });

  const raw = {
    credentials: {
      primary: credential('PRIMARY'),
      secondary: env.SECONDARY_LOGIN ? credential('SECONDARY') : undefined,
    },
    repository: {
      owner: env.REPOSITORY_OWNER,
      name: env.REPOSITORY_NAME,
    },
    rateLimit: {
      buffer: optionalNumber(env.RATE_LIMIT_BUFFER),
    },
    progress: env.DATABASE_URL
      ? { backend: 'postgres', databaseUrl: env.DATABASE_URL }
      : { backend: 'file', path: env.PROGRESS_FILE },
    dryRun: env.DRY_RUN === 'true' || env.DRY_RUN === '1',
    logLevel: env.LOG_LEVEL,
  };

  return parseConfig(raw, 'environment configuration');
}

// =============================================================================
// OVERRIDES
// =============================================================================

export interface ConfigOverrides {
  dryRun?: boolean;
  progressFile?: string;
  logLevel?: LogLevel;
}

export function applyOverrides(config: EngineConfig, overrides: ConfigOverrides): EngineConfig {
  return {
    ...config,
    dryRun: overrides.dryRun ?? config.dryRun,
    logLevel: overrides.logLevel ?? config.logLevel,
    progress: overrides.progressFile
      ? { ...config.progress, backend: 'file', path: overrides.progressFile }
      : config.progress,
  };
}

// =============================================================================
// DERIVED SETTINGS
// =============================================================================

export function toCredentials(config: EngineConfig): Credential[] {
  const credentials = [toCredential('primary', config.credentials.primary)];
  if (config.credentials.secondary) {
    credentials.push(toCredential('secondary', config.credentials.secondary));
  }
  return credentials;
}

/**
 * api.github.com serves GraphQL at /graphql; Enterprise servers move
 * /api/v3 to /api/graphql.
 */
export function graphqlUrlFor(apiUrl: string): string {
  const base = apiUrl.replace(/\/+$/, '');
  return base.endsWith('/api/v3') ? `${base.slice(0, -'/v3'.length)}/graphql` : `${base}/graphql`;
}

export function toRetryPolicy(config: EngineConfig): RetryPolicy {
  return {
    max_attempts: config.retry.maxAttempts,
    initial_delay_ms: config.retry.initialDelayMs,
    max_delay_ms: config.retry.maxDelayMs,
    backoff_multiplier: config.retry.backoffMultiplier,
    jitter: config.retry.jitter,
  };
}

export function toTimeoutConfig(config: EngineConfig, base: TimeoutConfig): TimeoutConfig {
  return { ...base, defaultCallTimeoutMs: config.retry.attemptTimeoutMs };
}

export function toRateLimiterConfig(config: EngineConfig): RateLimiterConfig {
  return { ...config.rateLimit };
}

export function repositoryOwner(config: EngineConfig): string {
  return config.repository.owner ?? config.credentials.primary.login;
}

// =============================================================================
// HELPERS
// =============================================================================

function toCredential(role: CredentialRole, config: CredentialConfig): Credential {
  return {
    role,
    login: config.login,
    token: config.token,
    email: config.email,
    name: config.name,
    apiUrl: config.apiUrl,
    graphqlUrl: config.graphqlUrl ?? graphqlUrlFor(config.apiUrl),
  };
}

function optionalNumber(value: string | undefined): number | string | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? value : parsed;
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
}
