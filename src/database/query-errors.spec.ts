import { QueryFailedError } from 'typeorm';
import { isUniqueViolation } from './query-errors';

const driverError = (message: string, code?: string) =>
  Object.assign(new Error(message), code === undefined ? {} : { code });

describe('isUniqueViolation', () => {
  it('should recognise the postgres unique-violation code', () => {
    const error = new QueryFailedError('INSERT INTO "students"', [], driverError('duplicate key value', '23505'));

    expect(isUniqueViolation(error)).toBe(true);
  });

  it('should recognise the sqlite unique-constraint message', () => {
    const error = new QueryFailedError(
      'INSERT INTO "students"',
      [],
      driverError('UNIQUE constraint failed: students.rollNumber'),
    );

    expect(isUniqueViolation(error)).toBe(true);
  });

  it('should ignore other constraint failures', () => {
    const error = new QueryFailedError('INSERT INTO "grades"', [], driverError('FOREIGN KEY constraint failed'));

    expect(isUniqueViolation(error)).toBe(false);
  });

  it('should ignore errors that did not come from a query', () => {
    expect(isUniqueViolation(driverError('UNIQUE constraint failed: students.rollNumber', '23505'))).toBe(false);
    expect(isUniqueViolation('23505')).toBe(false);
  });
});
