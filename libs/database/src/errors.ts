import { QueryFailedError } from 'typeorm';

/** Postgres SQLSTATE for a unique constraint violation. */
export const PG_UNIQUE_VIOLATION = '23505';

/** Whether `error` is a failed query rejected by a unique constraint. */
export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const driverError: unknown = error.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    driverError.code === PG_UNIQUE_VIOLATION
  );
}
