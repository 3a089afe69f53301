/**
 * PostgreSQL lock store adapter.
 *
 * Uses the 'pg' package. The lock row upsert relies on PostgreSQL's
 * `ON CONFLICT ... DO UPDATE ... WHERE`, which runs atomically per row.
 */
import { Kysely, PostgresDialect } from 'kysely';
import type { StoreConnectionConfig, ConnectionResult } from '../types.js';

/**
 * Create a PostgreSQL lock store connection.
 *
 * Short statement timeout: a stalled lock call should fail and be retried
 * by the lock manager rather than hang the session.
 *
 * @example
 * ```typescript
 * const conn = await createPostgresConnection({
 *     dialect: 'postgres',
 *     host: 'locks.internal',
 *     database: 'locks',
 *     user: 'netlite',
 *     password: 'test-secret',
 * })
 * ```
 */
export async function createPostgresConnection(
    config: StoreConnectionConfig,
): Promise<ConnectionResult> {

    const pg = await import('pg');
    const Pool = pg.default?.Pool ?? pg.Pool;

    const pool = new Pool({
        host: config.host ?? 'localhost',
        port: config.port ?? 5432,
        user: config.user,
        password: config.password,
        database: config.database,
        min: config.pool?.min ?? 0,
        max: config.pool?.max ?? 4,
        ssl: config.ssl,
        connectionTimeoutMillis: 1000,
        statement_timeout: 1000,
    });

    const db = new Kysely<unknown>({
        dialect: new PostgresDialect({ pool }),
    });

    return {
        db,
        dialect: 'postgres',
        destroy: () => db.destroy(),
    };

}
