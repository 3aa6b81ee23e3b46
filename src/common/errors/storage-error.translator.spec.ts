import { QueryFailedError } from 'typeorm';
import {
  ConstraintViolationError,
  RecordNotFoundError,
  StorageFailureError,
  UniquenessViolationError,
} from './record-errors';
import { translateStorageError } from './storage-error.translator';

const failed = (driverError: Error) => new QueryFailedError('INSERT ...', [], driverError);

const pgError = (code: string, message: string, constraint?: string) =>
  Object.assign(new Error(message), { code, constraint });

const sqliteError = (code: string, message: string) => {
  const error = Object.assign(new Error(message), { code });
  error.name = 'SqliteError';
  return error;
};

describe('translateStorageError', () => {
  it('maps a PostgreSQL unique violation to UniquenessViolationError naming the constraint', () => {
    const result = translateStorageError(
      'Enrollment',
      failed(
        pgError(
          '23505',
          'duplicate key value violates unique constraint "UQ_enrollments_student_course"',
          'UQ_enrollments_student_course',
        ),
      ),
    );

    expect(result).toBeInstanceOf(UniquenessViolationError);
    expect(result.message).toBe(
      'Enrollment failed: duplicate key value violates unique constraint "UQ_enrollments_student_course"',
    );
    expect(result).toMatchObject({ target: 'UQ_enrollments_student_course' });
    expect(result.getStatus()).toBe(409);
  });

  it('reads the column list out of a SQLite unique violation', () => {
    const result = translateStorageError(
      'Student registration',
      failed(sqliteError('SQLITE_CONSTRAINT_UNIQUE', 'UNIQUE constraint failed: students.email')),
    );

    expect(result).toBeInstanceOf(UniquenessViolationError);
    expect(result).toMatchObject({
      target: 'students.email',
      driverMessage: 'UNIQUE constraint failed: students.email',
    });
    expect(result.message).toBe(
      'Student registration failed: UNIQUE constraint failed: students.email',
    );
  });

  it('maps check and not-null failures to ConstraintViolationError', () => {
    const check = translateStorageError(
      'Payment recording',
      failed(pgError('23514', 'new row violates check constraint "CHK_payments_amount"', 'CHK_payments_amount')),
    );
    const notNull = translateStorageError(
      'Student registration',
      failed(sqliteError('SQLITE_CONSTRAINT_NOTNULL', 'NOT NULL constraint failed: students.lastName')),
    );

    expect(check).toBeInstanceOf(ConstraintViolationError);
    expect(check).toMatchObject({ constraint: 'CHK_payments_amount' });
    expect(check.getStatus()).toBe(400);
    expect(notNull).toBeInstanceOf(ConstraintViolationError);
    expect(notNull).toMatchObject({ constraint: 'students.lastName' });
  });

  it('resolves a foreign-key failure to the referenced record by constraint name', () => {
    const result = translateStorageError(
      'Enrollment',
      failed(
        pgError(
          '23503',
          'insert or update on table "enrollments" violates foreign key constraint "FK_enrollments_course"',
          'FK_enrollments_course',
        ),
      ),
      [
        { entity: 'Student', id: 7, constraint: 'FK_enrollments_student' },
        { entity: 'Course', id: 42, constraint: 'FK_enrollments_course' },
      ],
    );

    expect(result).toBeInstanceOf(RecordNotFoundError);
    expect(result).toMatchObject({ entity: 'Course', recordId: 42 });
    expect(result.message).toBe('Course not found: id 42 does not exist');
  });

  it('falls back to the only reference when SQLite does not name the constraint', () => {
    const result = translateStorageError(
      'Payment recording',
      failed(sqliteError('SQLITE_CONSTRAINT_FOREIGNKEY', 'FOREIGN KEY constraint failed')),
      [{ entity: 'Student', id: 9, constraint: 'FK_payments_student' }],
    );

    expect(result).toBeInstanceOf(RecordNotFoundError);
    expect(result).toMatchObject({ entity: 'Student', recordId: 9 });
  });

  it('reports an unattributable foreign-key failure as a constraint violation', () => {
    const result = translateStorageError(
      'Enrollment',
      failed(sqliteError('SQLITE_CONSTRAINT_FOREIGNKEY', 'FOREIGN KEY constraint failed')),
      [
        { entity: 'Student', id: 7, constraint: 'FK_enrollments_student' },
        { entity: 'Course', id: 42, constraint: 'FK_enrollments_course' },
      ],
    );

    expect(result).toBeInstanceOf(ConstraintViolationError);
    expect(result.message).toBe('Enrollment failed: FOREIGN KEY constraint failed');
  });

  it('wraps other engine failures as StorageFailureError with the operation', () => {
    const result = translateStorageError(
      'Course creation',
      failed(pgError('57P01', 'terminating connection due to administrator command')),
    );

    expect(result).toBeInstanceOf(StorageFailureError);
    expect(result).toMatchObject({
      operation: 'Course creation',
      driverMessage: 'terminating connection due to administrator command',
    });
    expect(result.getStatus()).toBe(500);
  });

  it('wraps non-query errors too', () => {
    const result = translateStorageError('Student update', new Error('connection lost'));

    expect(result).toBeInstanceOf(StorageFailureError);
    expect(result.message).toBe('Student update failed: connection lost');
  });

  it('passes taxonomy errors through unchanged', () => {
    const notFound = new RecordNotFoundError('Student', 3);

    expect(translateStorageError('Enrollment', notFound)).toBe(notFound);
  });
});
