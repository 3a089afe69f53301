/**
 * Lock store connection factory with retry logic.
 *
 * Creates connections with automatic retry for transient failures.
 * Uses lazy imports so pg is only loaded when a postgres store is used.
 */
import { sql } from 'kysely'
import { retry, attempt } from '@logosdx/utils'
import type { StoreConnectionConfig, ConnectionResult, StoreDialect } from './types.js'
import { observer } from '../observer.js'


type DialectFactory = (config: StoreConnectionConfig) => ConnectionResult | Promise<ConnectionResult>


/**
 * Get the dialect factory function.
 */
async function getDialectFactory(dialect: StoreDialect): Promise<DialectFactory> {

    switch (dialect) {

        case 'sqlite':
            return (await import('./dialects/sqlite.js')).createSqliteConnection

        case 'postgres':
            return (await import('./dialects/postgres.js')).createPostgresConnection

        default:
            throw new Error(`Unsupported lock store dialect: ${String(dialect)}`)
    }
}


/**
 * Get the install command for a dialect's driver.
 */
function getInstallCommand(dialect: StoreDialect): string {

    const commands: Record<StoreDialect, string> = {
        postgres: 'npm install pg',
        sqlite: 'npm install better-sqlite3',
    }
    return commands[dialect]
}


/**
 * Human-readable name of a store for events.
 */
export function describeStore(config: StoreConnectionConfig): string {

    if (config.dialect === 'sqlite') {

        return `sqlite:${config.database}`
    }

    return `postgres://${config.host ?? 'localhost'}:${config.port ?? 5432}/${config.database}`
}


/**
 * Create a lock store connection with retry logic.
 *
 * Retries connection refusals and timeouts. Authentication failures and
 * missing drivers fail immediately.
 *
 * @example
 * ```typescript
 * const conn = await createStoreConnection({
 *     dialect: 'postgres',
 *     host: 'locks.internal',
 *     database: 'locks',
 *     user: 'netlite',
 *     password: 'test-secret',
 * })
 *
 * const store = new KyselyLockStore(conn.db, 'netlite_locks')
 * ```
 */
export async function createStoreConnection(
    config: StoreConnectionConfig,
): Promise<ConnectionResult> {

    const store = describeStore(config)

    const [conn, err] = await attempt(() =>
        retry(
            async () => {

                const [createFn, importErr] = await attempt(() => getDialectFactory(config.dialect))

                if (importErr || !createFn) {

                    const message = importErr?.message ?? ''
                    if (message.includes('Cannot find module') || message.includes('Cannot find package')) {

                        throw new Error(
                            `Missing driver for ${config.dialect}. Install it with:\n` +
                            getInstallCommand(config.dialect)
                        )
                    }
                    throw importErr ?? new Error(`No factory for ${config.dialect}`)
                }

                const conn = await createFn(config)

                // Test connection with simple query
                await sql`SELECT 1`.execute(conn.db)

                return conn
            },
            {
                retries: 3,
                delay: 250,
                backoff: 2,  // 250ms, 500ms, 1s
                jitterFactor: 0.1,
                shouldRetry: (err) => {

                    const msg = err.message.toLowerCase()

                    if (msg.includes('authentication')) return false
                    if (msg.includes('password')) return false
                    if (msg.includes('missing driver')) return false

                    return msg.includes('econnrefused') ||
                           msg.includes('etimedout') ||
                           msg.includes('too many connections') ||
                           msg.includes('connection reset')
                }
            }
        )
    )

    if (err || !conn) {

        const error = err ?? new Error(`Could not connect to ${store}`)
        observer.emit('connection:error', { store, error: error.message })
        throw error
    }

    observer.emit('connection:open', { store, dialect: config.dialect })
    return conn
}
