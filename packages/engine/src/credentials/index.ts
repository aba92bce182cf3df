/**
 * Credentials Module
 */

// Type-only exports
export type { CredentialRole, Identity, Credential, CredentialRegistry } from './registry.js';

// Value exports
export {
  CREDENTIAL_ROLES,
  CredentialNotFoundError,
  InMemoryCredentialRegistry,
  attributionEmail,
} from './registry.js';
