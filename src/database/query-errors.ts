import { QueryFailedError } from 'typeorm';

const POSTGRES_UNIQUE_VIOLATION = '23505';
// sql.js reports constraint failures by message only.
const SQLITE_UNIQUE_VIOLATION = 'UNIQUE constraint failed';

export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const driverError: unknown = error.driverError;
  if (typeof driverError !== 'object' || driverError === null) {
    return false;
  }
  if ('code' in driverError && driverError.code === POSTGRES_UNIQUE_VIOLATION) {
    return true;
  }
  return (
    'message' in driverError &&
    typeof driverError.message === 'string' &&
    driverError.message.includes(SQLITE_UNIQUE_VIOLATION)
  );
}
