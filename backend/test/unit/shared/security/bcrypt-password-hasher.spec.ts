import { describe, it, expect } from 'vitest';
import { BcryptPasswordHasher } from '../../../../src/shared/security/bcrypt-password-hasher';

describe('BcryptPasswordHasher', () => {
  const hasher = new BcryptPasswordHasher({ cost: 4 });

  it('verifies the password it hashed and rejects another', async () => {
    const hash = await hasher.hash('test-password');

    expect(hash).not.toBe('test-password');
    await expect(hasher.verify('test-password', hash)).resolves.toBe(true);
    await expect(hasher.verify('other-password', hash)).resolves.toBe(false);
  });

  it('needsRehash is false for a hash made at the configured cost', async () => {
    const hash = await hasher.hash('test-password');
    expect(hasher.needsRehash(hash)).toBe(false);
  });

  it('needsRehash is true for a hash made at another cost', async () => {
    const older = await new BcryptPasswordHasher({ cost: 5 }).hash('test-password');
    expect(hasher.needsRehash(older)).toBe(true);
  });

  it('needsRehash is true for something that is not a bcrypt hash', () => {
    expect(hasher.needsRehash('not-a-hash')).toBe(true);
  });
});
