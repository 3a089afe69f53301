/**
 * SDK Types.
 *
 * Options and results of the locked database factory.
 */
import type { Kysely, SqliteDatabase } from 'kysely';

import type { ConfigInput, NetliteConfig } from '../core/config/types.js';
import type { Clock } from '../core/lock/clock.js';
import type { CrashMarker } from '../core/lock/marker.js';
import type { LockManager } from '../core/lock/manager.js';
import type { LockStore } from '../core/lock/store/types.js';
import type { Logger, LoggerOptions } from '../core/logger/logger.js';

// ─────────────────────────────────────────────────────────────
// Factory Options
// ─────────────────────────────────────────────────────────────

/**
 * Options for creating a locked database.
 *
 * @example
 * ```typescript
 * // Everything from NETLITE_* env vars
 * const locked = await createLockedDatabase<AppDatabase>()
 *
 * // Explicit config, overriding env vars
 * const locked = await createLockedDatabase<AppDatabase>({
 *     config: {
 *         database: '/mnt/shared/app.db',
 *         lock: { expiration: 30, table: 'netlite_locks' },
 *         store: { dialect: 'postgres', host: 'locks.internal', database: 'locks' },
 *     },
 *     logger: {},
 * })
 *
 * // Bring your own lock store
 * const locked = await createLockedDatabase<AppDatabase>({
 *     config: { database: './app.db', lock: { expiration: 30, table: 'locks' } },
 *     store: new MemoryLockStore(),
 * })
 * ```
 */
export interface CreateLockedDatabaseOptions {

    /** Explicit config, merged over NETLITE_* env vars */
    config?: ConfigInput;

    /** Environment to read NETLITE_* vars from. Defaults to process.env */
    env?: NodeJS.ProcessEnv;

    /** Lock store to use instead of connecting to `config.store` */
    store?: LockStore;

    /** Time source for the lock manager */
    clock?: Clock;

    /** Crash marker, defaults to the database's rollback journal */
    marker?: CrashMarker;

    /** Opens the protected database. Defaults to better-sqlite3 on `config.database` */
    database?: () => Promise<SqliteDatabase>;

    /** Start a logger with these options. The level defaults to `config.logging.level` */
    logger?: LoggerOptions;
}

// ─────────────────────────────────────────────────────────────
// Result
// ─────────────────────────────────────────────────────────────

/**
 * A Kysely instance over the protected database, with its lock.
 */
export interface LockedDatabase<DB> {

    /** Query builder; every statement goes through `lock` */
    db: Kysely<DB>;

    /** Lock manager for the protected database */
    lock: LockManager;

    /** Lock store holding the lease records */
    store: LockStore;

    /** Resolved configuration */
    config: NetliteConfig;

    /** Logger, when one was requested */
    logger: Logger | null;

    /** Close the protected database, then the lock store connection */
    destroy: () => Promise<void>;
}
