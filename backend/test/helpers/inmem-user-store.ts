import { randomUUID } from 'node:crypto';

import type { NewUser, User, UserStore } from '../../src/modules/users';
import { StoreError } from '../../src/shared/db/store-error';

/**
 * WHY:
 * - UserStore without Postgres, for unit + E2E tests.
 * - Mirrors the unique constraints on username and email so conflicts behave
 *   like the real table.
 *
 * HOW TO USE:
 * - failOn('insertUser') makes the next matching call throw StoreError('unavailable').
 */
export class InMemUserStore implements UserStore {
  readonly users = new Map<string, User>();
  private readonly failing = new Set<keyof UserStore>();

  failOn(op: keyof UserStore): void {
    this.failing.add(op);
  }

  private maybeFail(op: keyof UserStore): void {
    if (this.failing.delete(op)) {
      throw new StoreError('unavailable', op, new Error('injected failure'));
    }
  }

  async insertUser(input: NewUser): Promise<User> {
    this.maybeFail('insertUser');

    for (const u of this.users.values()) {
      if (u.email === input.email || u.username === input.username) {
        throw new StoreError('conflict', 'insertUser');
      }
    }

    const now = new Date();
    const user: User = {
      id: randomUUID(),
      username: input.username,
      email: input.email,
      isAdmin: input.isAdmin ?? false,
      isPremium: input.isPremium ?? false,
      createdAt: now,
      updatedAt: now,
    };
    this.users.set(user.id, user);
    return user;
  }

  async deleteUser(userId: string): Promise<void> {
    this.maybeFail('deleteUser');
    this.users.delete(userId);
  }

  async getUserById(userId: string): Promise<User | undefined> {
    this.maybeFail('getUserById');
    return this.users.get(userId);
  }

  async getUserByEmail(email: string): Promise<User | undefined> {
    this.maybeFail('getUserByEmail');
    for (const u of this.users.values()) {
      if (u.email === email) return u;
    }
    return undefined;
  }

  async getUserByUsername(username: string): Promise<User | undefined> {
    this.maybeFail('getUserByUsername');
    for (const u of this.users.values()) {
      if (u.username === username) return u;
    }
    return undefined;
  }
}
