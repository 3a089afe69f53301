/**
 * Lock store exports.
 */
export type { LockRecord, LockStore } from './types.js';
export type { LockTableRow } from './kysely.js';

export { MemoryLockStore } from './memory.js';
export { KyselyLockStore } from './kysely.js';
