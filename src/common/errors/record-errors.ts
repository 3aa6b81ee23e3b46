import {
  BadRequestException,
  ConflictException,
  HttpExceptionOptions,
  InternalServerErrorException,
  NotFoundException,
} from '@nestjs/common';

export type RecordEntity = 'Student' | 'Course' | 'Faculty' | 'Enrollment' | 'Payment';

/**
 * A referenced record does not exist. Raised by existence pre-checks before
 * any write is attempted, and by foreign-key failures the store reports.
 */
export class RecordNotFoundError extends NotFoundException {
  constructor(
    readonly entity: RecordEntity,
    readonly recordId: number,
    options?: HttpExceptionOptions,
  ) {
    super(`${entity} not found: id ${recordId} does not exist`, options);
  }
}

/** A unique column or column set already holds the value. */
export class UniquenessViolationError extends ConflictException {
  constructor(
    message: string,
    /** Constraint name (PostgreSQL) or the offending column list (SQLite). */
    readonly target: string,
    readonly driverMessage: string,
    options?: HttpExceptionOptions,
  ) {
    super(message, options);
  }
}

/** A range, enumeration, length or not-null check rejected a value. */
export class ConstraintViolationError extends BadRequestException {
  constructor(
    message: string,
    readonly constraint: string,
    readonly driverMessage: string,
    options?: HttpExceptionOptions,
  ) {
    super(message, options);
  }
}

/** Anything else the storage engine reported. */
export class StorageFailureError extends InternalServerErrorException {
  constructor(
    readonly operation: string,
    message: string,
    readonly driverMessage: string,
    options?: HttpExceptionOptions,
  ) {
    super(message, options);
  }
}

export type RecordError =
  | RecordNotFoundError
  | UniquenessViolationError
  | ConstraintViolationError
  | StorageFailureError;

export function isRecordError(error: unknown): error is RecordError {
  return (
    error instanceof RecordNotFoundError ||
    error instanceof UniquenessViolationError ||
    error instanceof ConstraintViolationError ||
    error instanceof StorageFailureError
  );
}
