/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module (principals).
 * - One email = one user; one username = one user.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 */

export type UserId = string;

export type User = {
  id: UserId;
  username: string;
  /** Always lowercase. */
  email: string;
  isAdmin: boolean;
  isPremium: boolean;

  createdAt: Date;
  updatedAt: Date;
};

export type NewUser = {
  username: string;
  email: string;
  isAdmin?: boolean;
  isPremium?: boolean;
};
