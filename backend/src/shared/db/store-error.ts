/**
 * backend/src/shared/db/store-error.ts
 *
 * WHY:
 * - Services must not know about pg error codes.
 * - Repos wrap every driver failure into StoreError; the only distinction callers
 *   care about is "unique violation" vs "store is unhealthy".
 */

export type StoreErrorReason = 'conflict' | 'unavailable';

const PG_UNIQUE_VIOLATION = '23505';

export class StoreError extends Error {
  constructor(
    readonly reason: StoreErrorReason,
    readonly op: string,
    readonly cause?: unknown,
  ) {
    super(`Store operation failed: ${op} (${reason})`);
    this.name = 'StoreError';
  }
}

function pgCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function toStoreError(err: unknown, op: string): StoreError {
  if (err instanceof StoreError) return err;
  const reason: StoreErrorReason = pgCode(err) === PG_UNIQUE_VIOLATION ? 'conflict' : 'unavailable';
  return new StoreError(reason, op, err);
}
