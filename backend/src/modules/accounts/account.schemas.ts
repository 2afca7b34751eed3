/**
 * backend/src/modules/accounts/account.schemas.ts
 *
 * WHY:
 * - Form validation for account pages.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Names are trimmed before length checks.
 */

import { z } from 'zod';

export const accountParamsSchema = z.object({
  accountId: z.string().uuid(),
});

export const accountFormSchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(200),
  isActive: z.boolean(),
});

export type AccountFormInput = z.infer<typeof accountFormSchema>;

/**
 * The add form can also name the account's first owner. The owner becomes
 * an admin account user of the new account.
 */
export const accountAddFormSchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(200),
  isActive: z.boolean().default(true),
  ownerEmail: z.string().trim().email('Invalid email address').optional(),
  ownerFirstName: z.string().trim().max(150).optional(),
  ownerLastName: z.string().trim().max(150).optional(),
});

export type AccountAddFormInput = z.infer<typeof accountAddFormSchema>;

export const ACCOUNT_ADD_FORM_INITIAL = { name: '', isActive: true } as const;
