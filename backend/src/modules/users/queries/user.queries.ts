/**
 * backend/src/modules/users/queries/user.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into User domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError. Driver errors become StoreError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { toStoreError } from '../../../shared/db/store-error';
import {
  selectUserByEmailSql,
  selectUserByIdSql,
  selectUserByUsernameSql,
  type UserRow,
} from '../dal/user.query-sql';
import type { User } from '../user.types';

export function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    isAdmin: row.is_admin,
    isPremium: row.is_premium,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

async function read(op: string, run: () => Promise<UserRow | undefined>): Promise<User | undefined> {
  let row: UserRow | undefined;
  try {
    row = await run();
  } catch (err) {
    throw toStoreError(err, op);
  }
  return row ? toUser(row) : undefined;
}

export function getUserByEmail(db: DbExecutor, email: string): Promise<User | undefined> {
  return read('users.by_email', () => selectUserByEmailSql(db, email));
}

export function getUserById(db: DbExecutor, userId: string): Promise<User | undefined> {
  return read('users.by_id', () => selectUserByIdSql(db, userId));
}

export function getUserByUsername(db: DbExecutor, username: string): Promise<User | undefined> {
  return read('users.by_username', () => selectUserByUsernameSql(db, username));
}
