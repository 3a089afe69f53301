/**
 * Environment variable configuration.
 *
 * Every config property can be set through a NETLITE_* environment
 * variable. makeNestedConfig turns the flat variables into a nested
 * ConfigInput object, one underscore per level.
 *
 * @example
 * ```bash
 * NETLITE_DATABASE=/mnt/shared/app.db
 *
 * NETLITE_LOCK_EXPIRATION=30
 * NETLITE_LOCK_ATTEMPTS=10
 * NETLITE_LOCK_WAIT=3
 * NETLITE_LOCK_DELAY=50
 * NETLITE_LOCK_TABLE=netlite_locks
 *
 * NETLITE_STORE_DIALECT=postgres
 * NETLITE_STORE_HOST=locks.internal
 * NETLITE_STORE_PORT=5432
 * NETLITE_STORE_DATABASE=locks
 * NETLITE_STORE_USER=netlite
 * NETLITE_STORE_PASSWORD=secret
 * NETLITE_STORE_SSL=true
 *
 * NETLITE_LOGGING_LEVEL=verbose
 * ```
 */
import { makeNestedConfig } from '@logosdx/utils'

import { LockConfigError } from '../lock/errors.js'
import type { ConfigInput } from './types.js'
import { StoreDialectSchema } from './schema.js'


/**
 * Env vars that toggle runtime behavior rather than config values.
 */
const META_ENV_VARS = new Set([
    'NETLITE_DEBUG',     // Observer spy output
    'NETLITE_HEADLESS',  // Force compact log lines
])


/**
 * Keys whose values stay strings even when they look numeric.
 */
const STRING_KEYS = ['password', 'database', 'table', 'user', 'host']


/**
 * Read config values from environment variables.
 *
 * @example
 * ```typescript
 * // NETLITE_LOCK_EXPIRATION=30
 * // NETLITE_STORE_DIALECT=sqlite
 * // NETLITE_STORE_DATABASE=/var/lib/netlite/locks.db
 *
 * const envConfig = getEnvConfig()
 * // {
 * //   lock: { expiration: 30 },
 * //   store: { dialect: 'sqlite', database: '/var/lib/netlite/locks.db' }
 * // }
 * ```
 */
export function getEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigInput {

    const flat: Record<string, string> = {}

    for (const [key, value] of Object.entries(env)) {

        if (value !== undefined) {

            flat[key] = value
        }
    }

    const { allConfigs } = makeNestedConfig<ConfigInput>(
        flat,
        {
            filter: (key) => key.startsWith('NETLITE_') && !META_ENV_VARS.has(key),
            stripPrefix: 'NETLITE_',
            forceAllCapToLower: true,
            skipConversion: (key) => {

                const lower = key.toLowerCase()
                return STRING_KEYS.some((name) => lower.includes(name))
            },
        }
    )

    const config = allConfigs()

    if (config.store?.dialect) {

        const result = StoreDialectSchema.safeParse(config.store.dialect)
        if (!result.success) {

            throw new LockConfigError(
                `Invalid NETLITE_STORE_DIALECT: must be one of ${StoreDialectSchema.options.join(', ')}`,
                'store.dialect',
                result.error.issues,
            )
        }
    }

    return config
}
