import { describe, it, expect } from 'vitest';
import { profileUserFormSchema } from '../../../src/modules/profile/profile.schemas';

const valid = { username: 'jane.doe+ops@acme', email: 'jane@example.com' };

describe('profileUserFormSchema', () => {
  it('accepts letters, digits and @.+-_ in usernames', () => {
    const parsed = profileUserFormSchema.parse(valid);
    expect(parsed).toEqual({
      username: 'jane.doe+ops@acme',
      firstName: '',
      lastName: '',
      email: 'jane@example.com',
      password1: '',
      password2: '',
      referrer: null,
    });
  });

  it('rejects usernames with spaces or slashes', () => {
    expect(profileUserFormSchema.safeParse({ ...valid, username: 'jane doe' }).success).toBe(false);
    expect(profileUserFormSchema.safeParse({ ...valid, username: 'jane/doe' }).success).toBe(false);
  });

  it('rejects an empty username', () => {
    const res = profileUserFormSchema.safeParse({ ...valid, username: '' });
    expect(res.error?.issues[0]?.message).toBe('Username is required');
  });

  it('rejects mismatched passwords', () => {
    const res = profileUserFormSchema.safeParse({
      ...valid,
      password1: 'new-password-1',
      password2: 'new-password-2',
    });
    expect(res.error?.issues[0]?.message).toBe('Passwords do not match.');
  });
});
