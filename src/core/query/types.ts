/**
 * Query classification types.
 */

/**
 * How an operation relates to the write lock.
 *
 * - `transaction-start`: opens a transaction, lock is held until commit/rollback
 * - `write`: anything that may change the file, lock is held for the statement
 * - `read`: row retrieval or plan explanation, runs without the lock
 */
export type QueryKind = 'transaction-start' | 'write' | 'read';
