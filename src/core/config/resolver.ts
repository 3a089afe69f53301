/**
 * Config resolver - merges configuration from multiple sources.
 *
 * Priority order (highest to lowest):
 * 1. Explicit options
 * 2. Environment variables
 * 3. Defaults
 */
import { merge, clone } from '@logosdx/utils'

import { observer } from '../observer.js'
import type { ConfigInput, NetliteConfig } from './types.js'
import { getEnvConfig } from './env.js'
import { parseConfig, DEFAULT_ATTEMPTS, DEFAULT_DELAY } from './schema.js'


/**
 * Default config values.
 */
const DEFAULTS: ConfigInput = {

    lock: {
        attempts: DEFAULT_ATTEMPTS,
        delay: DEFAULT_DELAY,
    },
    logging: {
        level: 'info',
    },
}


/**
 * Copy a plain object, dropping keys whose value is undefined.
 *
 * An explicit `undefined` in options must not erase an env value.
 */
function definedOnly(input: object): Record<string, unknown> {

    const output: Record<string, unknown> = {}
    const entries: [string, unknown][] = Object.entries(input)

    for (const [key, value] of entries) {

        if (value === undefined) {

            continue
        }

        output[key] = typeof value === 'object' && value !== null && !Array.isArray(value)
            ? definedOnly(value)
            : value
    }

    return output
}


/**
 * Resolve the config from defaults, environment and explicit options.
 *
 * `pragmas` is taken from the options as a whole list, never merged.
 *
 * @throws LockConfigError when a required value is missing or invalid
 *
 * @example
 * ```typescript
 * const config = resolveConfig({
 *     database: '/mnt/shared/app.db',
 *     lock: { expiration: 30, table: 'netlite_locks' },
 *     store: { dialect: 'postgres', host: 'locks.internal', database: 'locks' },
 * })
 * ```
 */
export function resolveConfig(
    options: ConfigInput = {},
    env: NodeJS.ProcessEnv = process.env
): NetliteConfig {

    const { pragmas, ...rest } = options

    const merged = merge(
        merge(clone(DEFAULTS), getEnvConfig(env)),
        definedOnly(rest)
    )

    const config = parseConfig(pragmas ? { ...merged, pragmas } : merged)

    observer.emit('config:resolved', {
        database: config.database,
        table: config.lock.table,
        dialect: config.store?.dialect ?? 'custom',
    })

    return config
}
