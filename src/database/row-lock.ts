import { EntityManager, FindOneOptions } from 'typeorm';

const ROW_LOCKING_DRIVERS: ReadonlySet<string> = new Set(['postgres', 'cockroachdb', 'mysql', 'mariadb']);

/**
 * `SELECT ... FOR UPDATE` for reads that feed a later write in the same
 * transaction. SQLite has no row locks; its single writer already
 * serialises the transaction.
 */
export function writeLockFor(manager: EntityManager): FindOneOptions['lock'] {
  return ROW_LOCKING_DRIVERS.has(manager.connection.options.type)
    ? { mode: 'pessimistic_write' }
    : undefined;
}
