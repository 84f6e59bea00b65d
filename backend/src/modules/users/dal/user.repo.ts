/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for users (mutations).
 *
 * RULES:
 * - No transactions started here.
 * - No AppError. Driver errors become StoreError.
 * - No policies.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { toStoreError } from '../../../shared/db/store-error';
import type { UserRow } from './user.query-sql';
import type { NewUser } from '../user.types';

export class UserRepo {
  constructor(private readonly db: DbExecutor) {}

  /**
   * Email and username must be unique (DB constraints).
   * A duplicate surfaces as StoreError with reason 'conflict'.
   */
  async insertUser(params: NewUser): Promise<UserRow> {
    try {
      return await this.db
        .insertInto('users')
        .values({
          username: params.username,
          email: params.email.toLowerCase(),
          is_admin: params.isAdmin ?? false,
          is_premium: params.isPremium ?? false,
        })
        .returningAll()
        .executeTakeFirstOrThrow();
    } catch (err) {
      throw toStoreError(err, 'users.insert');
    }
  }

  /** Credentials go with it (ON DELETE CASCADE). */
  async deleteUser(userId: string): Promise<void> {
    try {
      await this.db.deleteFrom('users').where('id', '=', userId).execute();
    } catch (err) {
      throw toStoreError(err, 'users.delete');
    }
  }
}
