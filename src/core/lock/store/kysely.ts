/**
 * Table-backed lock store.
 *
 * Keeps one row per protected resource in a table of a strongly-consistent
 * SQL database reached through Kysely. The conditional put is a single
 * upsert whose `WHERE` clause only lets it overwrite a stale row, so the
 * database serializes competing acquirers.
 *
 * Works with any dialect that supports `INSERT ... ON CONFLICT ... DO UPDATE
 * ... WHERE` (PostgreSQL, SQLite).
 *
 * @example
 * ```typescript
 * const conn = await createStoreConnection({ dialect: 'postgres', host, database })
 * const store = new KyselyLockStore(conn.db, 'netlite_locks')
 * await store.ensureTable()
 * ```
 */
import { sql, type Kysely } from 'kysely'
import { attempt } from '@logosdx/utils'

import { LockStoreError } from '../errors.js'
import type { LockRecord, LockStore } from './types.js'


/**
 * Row shape of the lock table.
 */
export interface LockTableRow {
    lock_key: string
    owner_id: string
    expires_at: number
}


export class KyselyLockStore implements LockStore {

    readonly #db: Kysely<unknown>
    readonly #table: string

    constructor(db: Kysely<unknown>, table: string) {

        this.#db = db
        this.#table = table
    }

    get table(): string {

        return this.#table
    }

    /**
     * Create the lock table if it does not exist.
     */
    async ensureTable(): Promise<void> {

        const [, err] = await attempt(() =>
            this.#db.schema
                .createTable(this.#table)
                .ifNotExists()
                .addColumn('lock_key', 'varchar(1024)', (col) => col.primaryKey())
                .addColumn('owner_id', 'varchar(64)', (col) => col.notNull())
                .addColumn('expires_at', 'double precision', (col) => col.notNull())
                .execute()
        )

        if (err) {

            throw new LockStoreError('setup', this.#table, err)
        }
    }

    async conditionalPut(record: LockRecord, now: number): Promise<boolean> {

        const table = sql.table(this.#table)
        const existingExpiry = sql.ref(`${this.#table}.expires_at`)

        const [result, err] = await attempt(() =>
            sql`
                insert into ${table} (lock_key, owner_id, expires_at)
                values (${record.key}, ${record.ownerId}, ${record.expiresAt})
                on conflict (lock_key) do update set
                    owner_id = excluded.owner_id,
                    expires_at = excluded.expires_at
                where ${existingExpiry} < ${now}
            `.execute(this.#db)
        )

        if (err) {

            throw new LockStoreError('put', record.key, err)
        }

        return (result?.numAffectedRows ?? 0n) > 0n
    }

    async conditionalDelete(key: string, ownerId: string): Promise<boolean> {

        const [result, err] = await attempt(() =>
            sql`
                delete from ${sql.table(this.#table)}
                where lock_key = ${key}
                  and owner_id = ${ownerId}
            `.execute(this.#db)
        )

        if (err) {

            throw new LockStoreError('delete', key, err)
        }

        return (result?.numAffectedRows ?? 0n) > 0n
    }

    /**
     * Read the current row for a key, regardless of expiry.
     *
     * Diagnostic only; acquisition never reads before writing.
     */
    async get(key: string): Promise<LockRecord | null> {

        const [result, err] = await attempt(() =>
            sql<LockTableRow>`
                select lock_key, owner_id, expires_at
                from ${sql.table(this.#table)}
                where lock_key = ${key}
            `.execute(this.#db)
        )

        if (err) {

            throw new LockStoreError('get', key, err)
        }

        const row = result?.rows[0]

        if (!row) {

            return null
        }

        return {
            key: row.lock_key,
            ownerId: row.owner_id,
            expiresAt: Number(row.expires_at),
        }
    }
}
