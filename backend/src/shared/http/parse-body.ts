/**
 * backend/src/shared/http/parse-body.ts
 *
 * WHY:
 * - Form endpoints answer an invalid submission with 400 and the first
 *   problem found, so the form can be shown again with that message.
 *
 * RULES:
 * - Zod issues travel in meta (logged, never sent to clients).
 */

import type { z } from 'zod';
import { AppError } from './errors';

export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw AppError.validationError(first?.message ?? 'Invalid request body', {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}
