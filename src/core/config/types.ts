/**
 * Configuration types.
 *
 * A config names the protected SQLite file, the lease settings that guard
 * it, and the remote lock store the leases live in. Every value can come
 * from NETLITE_* environment variables or explicit options.
 */
import type { StoreConnectionConfig } from '../connection/types.js'
import type { LockSettings } from '../lock/types.js'
import type { LogLevel } from '../logger/types.js'


/**
 * Lease settings plus the lock-store table name.
 */
export interface LockConfig extends LockSettings {

    table: string
}


/**
 * Full configuration object.
 *
 * @example
 * ```typescript
 * const config: NetliteConfig = {
 *     database: '/mnt/shared/app.db',
 *     lock: {
 *         expiration: 30,
 *         attempts: 10,
 *         wait: 3,
 *         delay: 50,
 *         table: 'netlite_locks',
 *     },
 *     store: {
 *         dialect: 'postgres',
 *         host: 'locks.internal',
 *         database: 'locks',
 *         user: 'netlite',
 *         password: 'test-secret',
 *     },
 *     logging: { level: 'info' },
 * }
 * ```
 */
export interface NetliteConfig {

    database: string
    lock: LockConfig

    // Absent when the caller supplies its own LockStore
    store?: StoreConnectionConfig

    // Replaces the default network-filesystem pragmas when set
    pragmas?: string[]

    logging: {
        level: LogLevel
    }
}


/**
 * Partial config for explicit options or environment overrides.
 */
export interface ConfigInput {

    database?: string
    lock?: Partial<LockConfig>
    store?: Partial<StoreConnectionConfig>
    pragmas?: string[]
    logging?: {
        level?: LogLevel
    }
}
