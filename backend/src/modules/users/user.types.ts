/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - Users are global identities (not tenant-scoped).
 * - One email = one user across all providers.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 */

export type UserId = string;

export type User = {
  id: UserId;
  email: string;
  username: string;
  firstName: string;
  lastName: string;

  createdAt: Date;
  updatedAt: Date;
};

/**
 * The slice of a user that account-user pages show.
 */
export type UserSummary = Pick<User, 'id' | 'username' | 'email' | 'firstName' | 'lastName'>;
