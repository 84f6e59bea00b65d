/**
 * src/modules/auth/helpers/to-public-user.ts
 *
 * WHY:
 * - The user shape returned by register/login/refresh/me is built identically everywhere.
 * - The token subject is derived from the same record, so claims and response never disagree.
 *
 * RULES:
 * - Pure functions. No I/O.
 */

import type { User } from '../../users';
import type { TokenSubject } from '../../../shared/security/token-issuer';
import type { PublicUser } from '../auth.types';

export function toPublicUser(user: User): PublicUser {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    isAdmin: user.isAdmin,
    isPremium: user.isPremium,
    createdAt: user.createdAt,
  };
}

export function toTokenSubject(user: User): TokenSubject {
  return {
    userId: user.id,
    username: user.username,
    email: user.email,
    isAdmin: user.isAdmin,
    isPremium: user.isPremium,
  };
}
