import { describe, it, expect } from 'vitest';
import { checkLoginMembership } from '../../../src/modules/auth/policies/login-membership-gating.policy';

describe('checkLoginMembership', () => {
  it('allows an ACTIVE membership and hands it back', () => {
    const membership = { id: 'm1', role: 'PROVIDER', status: 'ACTIVE' } as const;
    expect(checkLoginMembership(membership)).toEqual({ allowed: true, membership });
  });

  it('rejects a missing membership with no_membership', () => {
    const verdict = checkLoginMembership(undefined);

    expect(verdict.allowed).toBe(false);
    if (verdict.allowed) return;
    expect(verdict.reason).toBe('no_membership');
    expect(verdict.error.status).toBe(403);
    expect(verdict.error.message).toBe("You don't have access to this provider.");
  });

  it('rejects a SUSPENDED membership with suspended', () => {
    const verdict = checkLoginMembership({ id: 'm1', role: 'CLIENT', status: 'SUSPENDED' });

    expect(verdict.allowed).toBe(false);
    if (verdict.allowed) return;
    expect(verdict.reason).toBe('suspended');
    expect(verdict.error.message).toBe('Your account has been suspended.');
  });
});
