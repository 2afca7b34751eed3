/**
 * backend/src/modules/profile/profile.schemas.ts
 *
 * WHY:
 * - Validation for the signed-in user's own profile form.
 *
 * RULES:
 * - Usernames: 1..150 of letters, digits and @ . + - _ (users/user.constants.ts)
 * - An empty password pair leaves the stored credential unchanged.
 */

import { z } from 'zod';
import { refinePasswordPair } from '../_shared/password-pair.schema';
import { USERNAME_MAX_LENGTH, USERNAME_PATTERN } from '../users';

export const profileUserFormSchema = z
  .object({
    username: z
      .string()
      .trim()
      .min(1, 'Username is required')
      .max(USERNAME_MAX_LENGTH)
      .regex(
        USERNAME_PATTERN,
        'Enter a valid username. It may contain only letters, numbers and @/./+/-/_ characters.',
      ),
    firstName: z.string().trim().max(150).default(''),
    lastName: z.string().trim().max(150).default(''),
    email: z.string().trim().email('Invalid email address'),
    password1: z.string().default(''),
    password2: z.string().default(''),
    referrer: z.string().nullable().default(null),
  })
  .superRefine(refinePasswordPair);

export type ProfileUserFormInput = z.infer<typeof profileUserFormSchema>;
