/**
 * backend/src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring.
 * - Users module is a support module (no routes of its own).
 *   The auth module consumes its UserStore.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { DbExecutor } from '../../shared/db/db';
import { UserRepo } from './dal/user.repo';
import { getUserByEmail, getUserById, getUserByUsername, toUser } from './queries/user.queries';
import type { UserStore } from './user.store';

export type UserModule = ReturnType<typeof createUserModule>;

export function createKyselyUserStore(db: DbExecutor): UserStore {
  const repo = new UserRepo(db);

  return {
    insertUser: async (input) => toUser(await repo.insertUser(input)),
    deleteUser: (userId) => repo.deleteUser(userId),
    getUserById: (userId) => getUserById(db, userId),
    getUserByEmail: (email) => getUserByEmail(db, email),
    getUserByUsername: (username) => getUserByUsername(db, username),
  };
}

export function createUserModule(deps: { db: DbExecutor }) {
  return {
    userStore: createKyselyUserStore(deps.db),
  };
}
