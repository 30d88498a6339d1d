/**
 * SQLSTATE codes the application reacts to.
 * https://www.postgresql.org/docs/current/errcodes-appendix.html
 */
export const PG_ERROR_CODES = {
  UNIQUE_VIOLATION: '23505',
  SERIALIZATION_FAILURE: '40001',
  DEADLOCK_DETECTED: '40P01',
  LOCK_NOT_AVAILABLE: '55P03',
} as const;

/**
 * Reads the SQLSTATE from a driver error, following `cause` when the
 * error was wrapped on the way up.
 */
export function getPgErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  if ('cause' in error) {
    return getPgErrorCode(error.cause);
  }
  return undefined;
}

export function isUniqueViolation(error: unknown): boolean {
  return getPgErrorCode(error) === PG_ERROR_CODES.UNIQUE_VIOLATION;
}

/**
 * Errors that mean another transaction won the race for the same rows.
 */
export function isConcurrencyFailure(error: unknown): boolean {
  const code = getPgErrorCode(error);
  return (
    code === PG_ERROR_CODES.SERIALIZATION_FAILURE ||
    code === PG_ERROR_CODES.DEADLOCK_DETECTED ||
    code === PG_ERROR_CODES.LOCK_NOT_AVAILABLE
  );
}
