/**
 * Credential Registry
 *
 * Holds the primary and secondary identities for a run.
 *
 * HARD CONSTRAINT: the registry never chooses a credential.
 * Each step names the role it issues calls as; the registry only
 * validates that the role is configured.
 */

// =============================================================================
// TYPES
// =============================================================================

export type CredentialRole = 'primary' | 'secondary';

export const CREDENTIAL_ROLES: readonly CredentialRole[] = ['primary', 'secondary'];

/**
 * Public identity of an account, used for attribution
 * (co-author trailers, review requests, invitations).
 */
export interface Identity {
  login: string;
  email?: string;
  name?: string;
}

export interface Credential extends Identity {
  readonly role: CredentialRole;
  readonly token: string;
  /** REST base URL, e.g. https://api.github.com */
  readonly apiUrl: string;
  /** GraphQL endpoint, e.g. https://api.github.com/graphql */
  readonly graphqlUrl: string;
}

export interface CredentialRegistry {
  has(role: CredentialRole): boolean;

  /**
   * Get the credential for a role.
   * Throws CredentialNotFoundError when the role is not configured.
   */
  get(role: CredentialRole): Credential;

  /**
   * Public identity for a role (no token).
   */
  identity(role: CredentialRole): Identity;

  roles(): CredentialRole[];
}

// =============================================================================
// ERRORS
// =============================================================================

export class CredentialNotFoundError extends Error {
  constructor(public readonly role: CredentialRole) {
    super(`Credential not configured: ${role}`);
    this.name = 'CredentialNotFoundError';
  }
}

// =============================================================================
// IN-MEMORY IMPLEMENTATION
// =============================================================================

export class InMemoryCredentialRegistry implements CredentialRegistry {
  private credentials: Map<CredentialRole, Credential> = new Map();

  constructor(credentials: Credential[] = []) {
    for (const credential of credentials) {
      this.register(credential);
    }
  }

  /**
   * Register a credential. Credentials are frozen on registration.
   */
  register(credential: Credential): void {
    if (this.credentials.has(credential.role)) {
      throw new Error(`Credential already registered: ${credential.role}`);
    }
    this.credentials.set(credential.role, Object.freeze({ ...credential }));
  }

  has(role: CredentialRole): boolean {
    return this.credentials.has(role);
  }

  get(role: CredentialRole): Credential {
    const credential = this.credentials.get(role);
    if (!credential) {
      throw new CredentialNotFoundError(role);
    }
    return credential;
  }

  identity(role: CredentialRole): Identity {
    const { login, email, name } = this.get(role);
    return { login, email, name };
  }

  roles(): CredentialRole[] {
    return CREDENTIAL_ROLES.filter((role) => this.credentials.has(role));
  }
}

/**
 * Noreply address used when an identity has no public email.
 */
export function attributionEmail(identity: Identity): string {
  return identity.email ?? `${identity.login}@users.noreply.github.com`;
}
