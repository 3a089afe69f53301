/**
 * Config module - configuration for the protected database and its lock.
 *
 * Handles validation, defaults and merging of environment variables
 * with explicit options.
 */

// Types
export * from './types.js';

// Schema & Validation
export {
    NetliteConfigSchema,
    LockSettingsSchema,
    StoreConnectionSchema,
    StoreDialectSchema,
    TableNameSchema,
    LogLevelSchema,
    DEFAULT_ATTEMPTS,
    DEFAULT_WAIT,
    DEFAULT_DELAY,
    parseConfig,
    parseLockSettings,
} from './schema.js';

// Resolver
export { resolveConfig } from './resolver.js';

// Environment variables
export { getEnvConfig } from './env.js';
