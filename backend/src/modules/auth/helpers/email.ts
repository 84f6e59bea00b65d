/**
 * backend/src/modules/auth/helpers/email.ts
 *
 * WHY:
 * - Every flow that takes an email looks it up the same way (trimmed, lowercased).
 * - Logs carry the domain only, never the full address.
 *
 * RULES:
 * - Pure functions.
 */

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

/** '' when there is no '@' or nothing after it. */
export function emailDomain(email: string): string {
  const at = email.lastIndexOf('@');
  return at >= 0 ? normalizeEmail(email.slice(at + 1)) : '';
}
