/**
 * Kysely dialect for a SQLite file guarded by a distributed lock.
 *
 * @example
 * ```typescript
 * import Database from 'better-sqlite3'
 * import { Kysely } from 'kysely'
 *
 * const db = new Kysely<AppDatabase>({
 *     dialect: new LockedSqliteDialect({
 *         lock,
 *         sqlite: { database: async () => new Database('/mnt/shared/app.db') },
 *     }),
 * })
 * ```
 */
import {
    SqliteDialect,
    type DatabaseIntrospector,
    type Dialect,
    type DialectAdapter,
    type Driver,
    type Kysely,
    type QueryCompiler,
    type SqliteDialectConfig,
} from 'kysely';

import type { LockManager } from '../lock/manager.js';
import { LockedSqliteDriver } from './driver.js';
import { DEFAULT_PRAGMAS, applyPragmas } from './pragmas.js';

/**
 * Options for LockedSqliteDialect.
 */
export interface LockedSqliteDialectConfig {

    /** Lock manager guarding the database file */
    lock: LockManager;

    /** Underlying SQLite dialect config */
    sqlite: SqliteDialectConfig;

    /** Pragmas run on connect, DEFAULT_PRAGMAS when omitted */
    pragmas?: readonly string[];
}

/**
 * SqliteDialect whose driver routes every call through a LockManager.
 */
export class LockedSqliteDialect implements Dialect {

    readonly #lock: LockManager;
    readonly #sqlite: SqliteDialect;

    constructor(config: LockedSqliteDialectConfig) {

        const pragmas = config.pragmas ?? DEFAULT_PRAGMAS;
        const onCreateConnection = config.sqlite.onCreateConnection;

        this.#lock = config.lock;
        this.#sqlite = new SqliteDialect({
            ...config.sqlite,
            onCreateConnection: async (connection) => {

                await applyPragmas(connection, pragmas);

                if (onCreateConnection) {

                    await onCreateConnection(connection);

                }

            },
        });

    }

    createAdapter(): DialectAdapter {

        return this.#sqlite.createAdapter();

    }

    createDriver(): Driver {

        return new LockedSqliteDriver(this.#sqlite.createDriver(), this.#lock);

    }

    createQueryCompiler(): QueryCompiler {

        return this.#sqlite.createQueryCompiler();

    }

    createIntrospector(db: Kysely<unknown>): DatabaseIntrospector {

        return this.#sqlite.createIntrospector(db);

    }

}
