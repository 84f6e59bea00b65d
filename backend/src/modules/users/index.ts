/**
 * backend/src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent cross-module coupling via deep imports into /queries or /dal.
 */

export { createUserModule, type UserModule } from './user.module';
export type { UserStore } from './user.store';
export type { NewUser, User, UserId } from './user.types';
