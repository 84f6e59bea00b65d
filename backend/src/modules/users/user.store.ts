/**
 * backend/src/modules/users/user.store.ts
 *
 * WHY:
 * - The auth service depends on this narrow contract, not on Kysely.
 * - Tests substitute an in-memory implementation.
 *
 * RULES:
 * - Lookups return undefined on a miss; a miss is not an error.
 * - Failures surface as StoreError (reason 'conflict' on unique violations).
 */

import type { NewUser, User } from './user.types';

export interface UserStore {
  insertUser(input: NewUser): Promise<User>;
  deleteUser(userId: string): Promise<void>;
  getUserById(userId: string): Promise<User | undefined>;
  getUserByEmail(email: string): Promise<User | undefined>;
  getUserByUsername(username: string): Promise<User | undefined>;
}
