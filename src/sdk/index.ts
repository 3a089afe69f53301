/**
 * netlite SDK
 *
 * A Kysely database over a SQLite file on a network filesystem, with every
 * write serialized through a distributed lease.
 *
 * @example
 * ```typescript
 * import { createLockedDatabase } from 'netlite'
 *
 * const { db, destroy } = await createLockedDatabase<AppDatabase>({
 *     config: {
 *         database: '/mnt/shared/app.db',
 *         lock: { expiration: 30, table: 'netlite_locks' },
 *         store: { dialect: 'postgres', host: 'locks.internal', database: 'locks' },
 *     },
 * })
 *
 * // Takes and releases the lease around the insert
 * await db.insertInto('jobs').values({ name: 'sync' }).execute()
 *
 * // Holds the lease from BEGIN until COMMIT
 * await db.transaction().execute(async (trx) => {
 *     await trx.updateTable('jobs').set({ done: 1 }).execute()
 * })
 *
 * await destroy()
 * ```
 */
import Database from 'better-sqlite3';
import { Kysely } from 'kysely';
import { attempt } from '@logosdx/utils';

import { resolveConfig } from '../core/config/resolver.js';
import { createStoreConnection } from '../core/connection/factory.js';
import type { ConnectionResult, StoreConnectionConfig } from '../core/connection/types.js';
import { LockConfigError } from '../core/lock/errors.js';
import { LockManager } from '../core/lock/manager.js';
import { KyselyLockStore } from '../core/lock/store/kysely.js';
import type { LockStore } from '../core/lock/store/types.js';
import { Logger } from '../core/logger/logger.js';
import { LockedSqliteDialect } from '../core/session/dialect.js';

import type { CreateLockedDatabaseOptions, LockedDatabase } from './types.js';

// ─────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────

/**
 * Connect to the configured lock store and make sure its table exists.
 */
async function openLockStore(
    connectionConfig: StoreConnectionConfig,
    table: string,
): Promise<{ store: KyselyLockStore; connection: ConnectionResult }> {

    const connection = await createStoreConnection(connectionConfig);
    const store = new KyselyLockStore(connection.db, table);

    const [, err] = await attempt(() => store.ensureTable());

    if (err) {

        await connection.destroy();
        throw err;

    }

    return { store, connection };

}

// ─────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────

/**
 * Create a Kysely database whose statements follow the locking protocol.
 *
 * Configuration is resolved from defaults, NETLITE_* env vars and
 * `options.config`, in rising priority. The protected database opens
 * lazily on the first query.
 *
 * @throws LockConfigError before any connection opens when config is incomplete
 */
export async function createLockedDatabase<DB = unknown>(
    options: CreateLockedDatabaseOptions = {},
): Promise<LockedDatabase<DB>> {

    const config = resolveConfig(options.config ?? {}, options.env);

    if (!options.store && !config.store) {

        throw new LockConfigError('Lock store connection is required', 'store');

    }

    let logger: Logger | null = null;

    if (options.logger) {

        logger = new Logger({
            ...options.logger,
            config: { level: config.logging.level, ...options.logger.config },
        });

        await logger.start();

    }

    let store: LockStore;
    let connection: ConnectionResult | null = null;

    if (options.store) {

        store = options.store;

    }
    else if (config.store) {

        const storeConfig = config.store;
        const [opened, err] = await attempt(
            () => openLockStore(storeConfig, config.lock.table),
        );

        if (err || !opened) {

            // Drop the logger's observer subscription before rethrowing
            await logger?.stop();
            throw err ?? new Error(`Could not open lock store table ${config.lock.table}`);

        }

        store = opened.store;
        connection = opened.connection;

    }
    else {

        throw new LockConfigError('Lock store connection is required', 'store');

    }

    const lock = new LockManager({
        resource: config.database,
        store,
        settings: config.lock,
        clock: options.clock,
        marker: options.marker,
    });

    const database = options.database ?? (async () => new Database(config.database));

    const db = new Kysely<DB>({
        dialect: new LockedSqliteDialect({
            lock,
            sqlite: { database },
            pragmas: config.pragmas,
        }),
    });

    const destroy = async (): Promise<void> => {

        await db.destroy();

        if (connection) {

            await connection.destroy();

        }

        if (logger) {

            await logger.stop();

        }

    };

    return { db, lock, store, config, logger, destroy };

}

// ─────────────────────────────────────────────────────────────
// Re-exports
// ─────────────────────────────────────────────────────────────

// Types
export type { CreateLockedDatabaseOptions, LockedDatabase } from './types.js';

// Errors, building blocks and the observer
export * from '../core/index.js';
