/**
 * Lock module exports.
 *
 * Serializes writes to a shared SQLite file through a lease held in a
 * remote lock store.
 *
 * @example
 * ```typescript
 * import {
 *     LockManager,
 *     LockBusyError,
 *     KyselyLockStore,
 * } from './lock'
 *
 * const lock = new LockManager({
 *     resource: '/mnt/shared/app.db',
 *     store: new KyselyLockStore(storeDb, 'netlite_locks'),
 *     settings: { expiration: 30 },
 * })
 *
 * const [, err] = await attempt(() => lock.guard(sql, () => run(sql)))
 * if (err instanceof LockBusyError) {
 *     console.log(`Gave up after ${err.attempts} attempts`)
 * }
 * ```
 */

// Types
export type {
    LockSettings,
    LockSettingsInput,
    LockManagerOptions,
    LockPhase,
    LockState,
} from './types.js';

// Errors
export {
    LockConfigError,
    LockBusyError,
    LockRequiredError,
    LockStoreError,
} from './errors.js';

// Clock and crash marker
export { systemClock, type Clock } from './clock.js';
export { journalMarker, journalPath, type CrashMarker } from './marker.js';

// Stores
export * from './store/index.js';

// Manager
export { LockManager, lockKey } from './manager.js';
