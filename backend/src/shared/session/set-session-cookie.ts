/**
 * backend/src/shared/session/set-session-cookie.ts
 *
 * Session cookie writers for login and logout. Flags are always
 * HttpOnly + SameSite=Strict, plus Secure in production.
 */

import type { FastifyReply } from 'fastify';
import { SESSION_COOKIE_NAME } from './session.types';

function sessionCookie(value: string, isProduction: boolean, extra: string[] = []): string {
  return [
    `${SESSION_COOKIE_NAME}=${value}`,
    'Path=/',
    'HttpOnly',
    'SameSite=Strict',
    ...extra,
    ...(isProduction ? ['Secure'] : []),
  ].join('; ');
}

export function setSessionCookie(
  reply: FastifyReply,
  sessionId: string,
  isProduction: boolean,
): void {
  reply.header('Set-Cookie', sessionCookie(sessionId, isProduction));
}

/** Max-Age=0 makes the browser drop the cookie immediately. */
export function clearSessionCookie(reply: FastifyReply, isProduction: boolean): void {
  reply.header('Set-Cookie', sessionCookie('', isProduction, ['Max-Age=0']));
}
