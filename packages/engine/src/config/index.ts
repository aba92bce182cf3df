/**
 * Configuration module exports
 */

export type { ConfigOverrides, Environment } from './loader.js';
export type { CredentialConfig, EngineConfig, EngineConfigInput, WorkflowConfig } from './schema.js';

export {
  ConfigError,
  applyOverrides,
  graphqlUrlFor,
  loadConfigFile,
  loadConfigFromEnv,
  parseConfig,
  repositoryOwner,
  substituteEnv,
  toCredentials,
  toRateLimiterConfig,
  toRetryPolicy,
  toTimeoutConfig,
} from './loader.js';
export { EngineConfigSchema, WorkflowConfigSchema } from './schema.js';
