import { Logger } from '@nestjs/common';
import { DataSource, EntityManager } from 'typeorm';
import { ForeignReference, translateStorageError } from '../common/errors/storage-error.translator';

export interface WriteTransactionOptions {
  logger?: Logger;
  /** Records the write points at, used to name the missing one on a foreign-key failure. */
  references?: ForeignReference[];
}

/**
 * Runs `work` in a single transaction. Whatever it throws is rolled back
 * first and then rethrown as a record error named after `operation`.
 */
export async function writeTransaction<T>(
  dataSource: DataSource,
  operation: string,
  work: (manager: EntityManager) => Promise<T>,
  options: WriteTransactionOptions = {},
): Promise<T> {
  try {
    return await dataSource.transaction(work);
  } catch (error) {
    const translated = translateStorageError(operation, error, options.references);
    options.logger?.warn(translated.message);
    throw translated;
  }
}
