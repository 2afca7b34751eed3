/**
 * backend/src/shared/http/redirect.ts
 *
 * WHY:
 * - Form submissions answer with a redirect to the next page.
 * - Clients that follow redirects use Location; JSON clients read { redirectTo }.
 *
 * RULES:
 * - Only same-site targets are followed when the target comes from the client
 *   (Referer header, hidden form field). Anything else falls back.
 */

import type { FastifyReply } from 'fastify';

export type RedirectBody = { redirectTo: string };

export function sendRedirect(reply: FastifyReply, location: string) {
  const body: RedirectBody = { redirectTo: location };
  return reply.status(302).header('Location', location).send(body);
}

// Browsers drop tab/CR/LF inside URLs and read "\" as "/", so "/\t/evil.example"
// would leave the site; CR/LF would also break the Location header.
const hasUnsafeChar = (value: string) =>
  [...value].some((ch) => ch <= '\u001f' || ch === '\u007f' || ch === '\\');
const ABSOLUTE_HTTP = /^https?:\/\//i;
// Stands in for the host when none was sent; a local path resolves onto it.
const NO_HOST = 'host.invalid';

/**
 * Returns a safe local redirect target for a client-supplied URL.
 *
 * Accepted:
 * - a path starting with "/" that still resolves onto the request host
 * - an absolute http(s) URL whose hostname equals the request host
 *
 * Either way only the path, query and hash of the resolved URL are returned,
 * so the result is always an ASCII, site-relative path.
 */
export function resolveRedirectTarget(
  candidate: string | null | undefined,
  requestHost: string | null,
  fallback: string,
): string {
  if (!candidate || hasUnsafeChar(candidate)) return fallback;

  const isPath = candidate.startsWith('/');
  if (!isPath && (requestHost === null || !ABSOLUTE_HTTP.test(candidate))) return fallback;

  const host = (requestHost ?? NO_HOST).toLowerCase();
  let url: URL;
  try {
    url = new URL(candidate, `http://${host}`);
  } catch {
    return fallback;
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') return fallback;
  if (url.hostname !== host) return fallback;

  return `${url.pathname}${url.search}${url.hash}`;
}
