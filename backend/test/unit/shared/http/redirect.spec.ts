import { describe, it, expect } from 'vitest';
import { resolveRedirectTarget } from '../../../../src/shared/http/redirect';

const HOST = 'acme.localhost';
const FALLBACK = '/';

describe('resolveRedirectTarget', () => {
  it('falls back when no candidate is given', () => {
    expect(resolveRedirectTarget(null, HOST, FALLBACK)).toBe('/');
    expect(resolveRedirectTarget(undefined, HOST, FALLBACK)).toBe('/');
    expect(resolveRedirectTarget('', HOST, FALLBACK)).toBe('/');
  });

  it('keeps a local path', () => {
    expect(resolveRedirectTarget('/accounts?page=2', HOST, FALLBACK)).toBe('/accounts?page=2');
  });

  it('rejects protocol-relative paths', () => {
    expect(resolveRedirectTarget('//evil.example/x', HOST, FALLBACK)).toBe('/');
    expect(resolveRedirectTarget('/\\evil.example/x', HOST, FALLBACK)).toBe('/');
  });

  it('rejects paths that browsers would turn into another host', () => {
    expect(resolveRedirectTarget('/\t/evil.example/x', HOST, FALLBACK)).toBe('/');
    expect(resolveRedirectTarget('/\n/evil.example/x', HOST, FALLBACK)).toBe('/');
    expect(resolveRedirectTarget('/accounts\\..\\x', HOST, FALLBACK)).toBe('/');
  });

  it('rejects CR and LF so the Location header stays intact', () => {
    expect(resolveRedirectTarget('/a\r\nX-Injected: 1', HOST, FALLBACK)).toBe('/');
    expect(resolveRedirectTarget('http://acme.localhost/a\r\nX: 1', HOST, FALLBACK)).toBe('/');
  });

  it('returns the path of the resolved URL', () => {
    expect(resolveRedirectTarget('/accounts/../profile', HOST, FALLBACK)).toBe('/profile');
    expect(resolveRedirectTarget('/caf\u00e9', HOST, FALLBACK)).toBe('/caf%C3%A9');
  });

  it('keeps a local path when the request host is unknown', () => {
    expect(resolveRedirectTarget('/accounts', null, FALLBACK)).toBe('/accounts');
  });

  it('keeps path, query and hash of a same-host absolute URL', () => {
    expect(
      resolveRedirectTarget('http://acme.localhost:3000/accounts/1?tab=people#top', HOST, FALLBACK),
    ).toBe('/accounts/1?tab=people#top');
  });

  it('rejects another host', () => {
    expect(resolveRedirectTarget('https://evil.example/accounts', HOST, FALLBACK)).toBe('/');
    expect(resolveRedirectTarget('http://other.localhost/accounts', HOST, FALLBACK)).toBe('/');
  });

  it('rejects non-http schemes and garbage', () => {
    expect(resolveRedirectTarget('javascript:alert(1)', HOST, FALLBACK)).toBe('/');
    expect(resolveRedirectTarget('not a url', HOST, FALLBACK)).toBe('/');
  });

  it('rejects absolute URLs when the request host is unknown', () => {
    expect(resolveRedirectTarget('http://acme.localhost/x', null, '/home')).toBe('/home');
  });
});
