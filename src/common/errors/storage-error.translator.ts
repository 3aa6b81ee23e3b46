import { QueryFailedError } from 'typeorm';
import {
  ConstraintViolationError,
  isRecordError,
  RecordEntity,
  RecordError,
  RecordNotFoundError,
  StorageFailureError,
  UniquenessViolationError,
} from './record-errors';

/** A record an insert points at, keyed by the foreign-key constraint guarding it. */
export interface ForeignReference {
  entity: RecordEntity;
  id: number;
  constraint: string;
}

interface DriverFailure {
  code: string;
  constraint?: string;
  message: string;
}

// PostgreSQL SQLSTATE codes and better-sqlite3 extended result codes
const UNIQUE_CODES = new Set(['23505', 'SQLITE_CONSTRAINT_UNIQUE', 'SQLITE_CONSTRAINT_PRIMARYKEY']);
const CHECK_CODES = new Set([
  '23514',
  '23502',
  '22001',
  '22003',
  'SQLITE_CONSTRAINT_CHECK',
  'SQLITE_CONSTRAINT_NOTNULL',
]);
const FOREIGN_KEY_CODES = new Set(['23503', 'SQLITE_CONSTRAINT_FOREIGNKEY']);

function readDriverFailure(error: QueryFailedError): DriverFailure {
  const driverError: unknown = error.driverError;
  const failure: DriverFailure = { code: '', message: error.message };
  if (typeof driverError !== 'object' || driverError === null) return failure;

  if ('code' in driverError && typeof driverError.code === 'string') {
    failure.code = driverError.code;
  }
  if ('constraint' in driverError && typeof driverError.constraint === 'string') {
    failure.constraint = driverError.constraint;
  }
  if ('message' in driverError && typeof driverError.message === 'string') {
    failure.message = driverError.message;
  }
  return failure;
}

/**
 * PostgreSQL names the violated constraint; SQLite only lists the columns
 * ("UNIQUE constraint failed: students.email").
 */
function constraintTarget(failure: DriverFailure): string {
  if (failure.constraint) return failure.constraint;
  const match = /constraint failed: (.+)$/.exec(failure.message);
  return match ? match[1] : 'unknown';
}

/**
 * Maps a failure raised while writing into the record error taxonomy. The
 * message is prefixed with the operation; the engine's own text is kept on
 * `driverMessage`. Errors already in the taxonomy pass through untouched.
 */
export function translateStorageError(
  operation: string,
  error: unknown,
  references: ForeignReference[] = [],
): RecordError {
  if (isRecordError(error)) return error;

  if (!(error instanceof QueryFailedError)) {
    const detail = error instanceof Error ? error.message : String(error);
    return new StorageFailureError(operation, `${operation} failed: ${detail}`, detail, {
      cause: error,
    });
  }

  const failure = readDriverFailure(error);
  const message = `${operation} failed: ${failure.message}`;

  if (UNIQUE_CODES.has(failure.code)) {
    return new UniquenessViolationError(message, constraintTarget(failure), failure.message, {
      cause: error,
    });
  }
  if (CHECK_CODES.has(failure.code)) {
    return new ConstraintViolationError(message, constraintTarget(failure), failure.message, {
      cause: error,
    });
  }
  if (FOREIGN_KEY_CODES.has(failure.code)) {
    const reference =
      references.find((ref) => ref.constraint === failure.constraint) ??
      (references.length === 1 ? references[0] : undefined);
    if (reference) {
      return new RecordNotFoundError(reference.entity, reference.id, { cause: error });
    }
    return new ConstraintViolationError(message, constraintTarget(failure), failure.message, {
      cause: error,
    });
  }
  return new StorageFailureError(operation, message, failure.message, { cause: error });
}
