/**
 * Credential Registry Tests
 */

import { describe, it, expect } from 'vitest';
import {
  attributionEmail,
  CredentialNotFoundError,
  InMemoryCredentialRegistry,
} from '../../src/credentials/registry.js';
import { PRIMARY, SECONDARY } from '../mocks.js';

describe('InMemoryCredentialRegistry', () => {
  it('looks credentials up by role', () => {
    const registry = new InMemoryCredentialRegistry([SECONDARY, PRIMARY]);

    expect(registry.get('primary').login).toBe('primary-user');
    expect(registry.roles()).toEqual(['primary', 'secondary']);
  });

  it('throws for a role that is not configured', () => {
    const registry = new InMemoryCredentialRegistry([PRIMARY]);

    expect(registry.has('secondary')).toBe(false);
    expect(() => registry.get('secondary')).toThrow(CredentialNotFoundError);
    expect(() => registry.identity('secondary')).toThrow('Credential not configured: secondary');
  });

  it('exposes identities without tokens', () => {
    const registry = new InMemoryCredentialRegistry([PRIMARY]);

    expect(registry.identity('primary')).toEqual({
      login: 'primary-user',
      email: 'primary@example.com',
      name: 'Primary User',
    });
    expect(registry.identity('primary')).not.toHaveProperty('token');
  });

  it('refuses a second credential for a role', () => {
    const registry = new InMemoryCredentialRegistry([PRIMARY]);

    expect(() => registry.register(PRIMARY)).toThrow('Credential already registered: primary');
  });

  it('freezes registered credentials', () => {
    const registry = new InMemoryCredentialRegistry([PRIMARY]);

    expect(Object.isFrozen(registry.get('primary'))).toBe(true);
  });
});

describe('attributionEmail', () => {
  it('uses the public email or the noreply address', () => {
    expect(attributionEmail({ login: 'primary-user', email: 'primary@example.com' })).toBe('primary@example.com');
    expect(attributionEmail({ login: 'secondary-user' })).toBe('secondary-user@users.noreply.github.com');
  });
});
