import { describe, it, expect } from 'vitest';
import { readSessionId } from '../../../../src/shared/session/session.middleware';

describe('readSessionId', () => {
  it('returns null without a cookie header', () => {
    expect(readSessionId(undefined)).toBeNull();
    expect(readSessionId('')).toBeNull();
  });

  it('finds sid among other cookies', () => {
    expect(readSessionId('theme=dark; sid=abc123; lang=en')).toBe('abc123');
  });

  it('keeps "=" inside the value', () => {
    expect(readSessionId('sid=abc=def')).toBe('abc=def');
  });

  it('ignores cookies whose name only contains sid', () => {
    expect(readSessionId('xsid=abc; sidx=def')).toBeNull();
  });

  it('treats an empty sid as absent', () => {
    expect(readSessionId('sid=; theme=dark')).toBeNull();
  });
});
