/**
 * src/modules/_shared/password-pair.schema.ts
 *
 * WHY:
 * - The account-user add form and the profile form take a new password
 *   twice (password1 / password2) with the same rules.
 *
 * RULES:
 * - Both empty: no password given.
 * - Otherwise they must match and be at least MIN_PASSWORD_LENGTH long.
 */

import { z } from 'zod';

export const MIN_PASSWORD_LENGTH = 8;

export function refinePasswordPair(
  value: { password1: string; password2: string },
  ctx: z.RefinementCtx,
): void {
  if (!value.password1 && !value.password2) return;

  if (value.password1 !== value.password2) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['password2'],
      message: 'Passwords do not match.',
    });
    return;
  }

  if (value.password1.length < MIN_PASSWORD_LENGTH) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['password1'],
      message: `Password must be at least ${MIN_PASSWORD_LENGTH} characters`,
    });
  }
}
