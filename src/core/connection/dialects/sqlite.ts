/**
 * SQLite lock store adapter.
 *
 * A SQLite lock store only coordinates processes that can open the same
 * file safely, so it suits single-host deployments and tests, not the
 * shared network filesystem the lock protects.
 */
import { Kysely, SqliteDialect } from 'kysely'
import Database from 'better-sqlite3'
import type { StoreConnectionConfig, ConnectionResult } from '../types.js'


/**
 * Create a SQLite lock store connection.
 *
 * @example
 * ```typescript
 * const conn = createSqliteConnection({ dialect: 'sqlite', database: ':memory:' })
 * ```
 */
export function createSqliteConnection(config: StoreConnectionConfig): ConnectionResult {

    const db = new Kysely<unknown>({
        dialect: new SqliteDialect({
            database: new Database(config.database),
        }),
    })

    return {
        db,
        dialect: 'sqlite',
        destroy: () => db.destroy(),
    }
}
