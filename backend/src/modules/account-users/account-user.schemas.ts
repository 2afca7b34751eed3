/**
 * backend/src/modules/account-users/account-user.schemas.ts
 *
 * WHY:
 * - Form validation for account-user pages.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Emails are lowercased in services, not here.
 * - Password fields are optional as a pair; when either is filled in, both
 *   must match and be 8+ characters.
 */

import { z } from 'zod';
import { refinePasswordPair } from '../_shared/password-pair.schema';

export const accountUserListParamsSchema = z.object({
  accountId: z.string().uuid(),
});

export const accountUserParamsSchema = z.object({
  accountId: z.string().uuid(),
  accountUserId: z.string().uuid(),
});

const nameField = z.string().trim().max(150).default('');

export const accountUserFormSchema = z.object({
  email: z.string().trim().email('Invalid email address'),
  firstName: nameField,
  lastName: nameField,
  isAdmin: z.boolean(),
});

export type AccountUserFormInput = z.infer<typeof accountUserFormSchema>;

export const accountUserAddFormSchema = z
  .object({
    email: z.string().trim().email('Invalid email address'),
    firstName: nameField,
    lastName: nameField,
    isAdmin: z.boolean().default(false),
    password1: z.string().default(''),
    password2: z.string().default(''),
  })
  .superRefine(refinePasswordPair);

export type AccountUserAddFormInput = z.infer<typeof accountUserAddFormSchema>;

export const ACCOUNT_USER_ADD_FORM_INITIAL = {
  email: '',
  firstName: '',
  lastName: '',
  isAdmin: false,
} as const;
