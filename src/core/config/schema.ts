/**
 * Configuration Zod schemas and validation.
 *
 * Every failure surfaces as a LockConfigError naming the first invalid
 * field, before any connection or lock manager exists.
 */
import { z } from 'zod';

import { LockConfigError } from '../lock/errors.js';
import type { LockSettings } from '../lock/types.js';
import type { NetliteConfig } from './types.js';

/**
 * Lease defaults.
 */
export const DEFAULT_ATTEMPTS = 10;
export const DEFAULT_WAIT = 3;
export const DEFAULT_DELAY = 50;

/**
 * Valid lock store dialects.
 */
export const StoreDialectSchema = z.enum(['postgres', 'sqlite']);

/**
 * Log levels accepted in config.
 */
export const LogLevelSchema = z.enum(['silent', 'error', 'warn', 'info', 'verbose']);

/**
 * Lease settings.
 *
 * `wait` below one second falls back to the default rather than failing.
 */
export const LockSettingsSchema = z.object({
    expiration: z
        .number({
            required_error: 'Lock expiration is required',
            invalid_type_error: 'Lock expiration must be a number',
        })
        .positive('Lock expiration must be greater than 0'),
    attempts: z
        .number()
        .int('Lock attempts must be an integer')
        .min(1, 'Lock attempts must be at least 1')
        .default(DEFAULT_ATTEMPTS),
    wait: z
        .number()
        .optional()
        .transform((wait) => (wait !== undefined && wait >= 1 ? wait : DEFAULT_WAIT)),
    delay: z
        .number()
        .min(0, 'Lock delay must not be negative')
        .default(DEFAULT_DELAY),
});

/**
 * Lock-store table name, optionally schema-qualified.
 */
export const TableNameSchema = z
    .string({ required_error: 'Lock table is required' })
    .min(1, 'Lock table is required')
    .regex(
        /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/,
        'Lock table must be a SQL identifier',
    );

/**
 * Port number validation.
 */
const PortSchema = z
    .number()
    .int()
    .min(1, 'Port must be at least 1')
    .max(65535, 'Port must be at most 65535');

/**
 * Connection pool configuration.
 */
const PoolSchema = z.object({
    min: z.number().int().min(0).optional(),
    max: z.number().int().min(1).optional(),
});

/**
 * SSL configuration - can be boolean or detailed config.
 */
const SSLSchema = z.union([
    z.boolean(),
    z.object({
        rejectUnauthorized: z.boolean().optional(),
        ca: z.string().optional(),
        cert: z.string().optional(),
        key: z.string().optional(),
    }),
]);

/**
 * Lock store connection schema.
 *
 * SQLite only needs a database path. PostgreSQL needs a host.
 */
export const StoreConnectionSchema = z
    .object({
        dialect: StoreDialectSchema,
        host: z.string().optional(),
        port: PortSchema.optional(),
        database: z.string().min(1, 'Lock store database is required'),
        user: z.string().optional(),
        password: z.string().optional(),
        ssl: SSLSchema.optional(),
        pool: PoolSchema.optional(),
    })
    .refine((conn) => conn.dialect === 'sqlite' || conn.host, {
        message: 'Host is required for a postgres lock store',
        path: ['host'],
    });

/**
 * Full config schema.
 */
export const NetliteConfigSchema = z.object({
    database: z
        .string({ required_error: 'Database path is required' })
        .min(1, 'Database path is required'),
    lock: LockSettingsSchema.extend({ table: TableNameSchema }),
    store: StoreConnectionSchema.optional(),
    pragmas: z.array(z.string().min(1)).optional(),
    logging: z
        .object({ level: LogLevelSchema.default('info') })
        .default({}),
});

// ─────────────────────────────────────────────────────────────
// Validation Functions
// ─────────────────────────────────────────────────────────────

/**
 * Turn a zod failure into a LockConfigError for its first issue.
 */
function toConfigError(error: z.ZodError, prefix?: string): LockConfigError {

    const firstIssue = error.issues[0];
    const path = firstIssue?.path.join('.') || 'unknown';

    return new LockConfigError(
        firstIssue?.message ?? 'Validation failed',
        prefix ? `${prefix}.${path}` : path,
        error.issues,
    );

}

/**
 * Validate lease settings and apply defaults.
 *
 * @throws LockConfigError if validation fails
 *
 * @example
 * ```typescript
 * parseLockSettings({ expiration: 30 })
 * // { expiration: 30, attempts: 10, wait: 3, delay: 50 }
 *
 * parseLockSettings({ expiration: 30, wait: 0.5 }).wait
 * // 3
 * ```
 */
export function parseLockSettings(input: unknown): LockSettings {

    const result = LockSettingsSchema.safeParse(input);

    if (!result.success) {

        throw toConfigError(result.error, 'lock');

    }

    return result.data;

}

/**
 * Parse and validate a full config, returning defaults for missing fields.
 *
 * @throws LockConfigError if validation fails
 *
 * @example
 * ```typescript
 * const config = parseConfig({
 *     database: '/mnt/shared/app.db',
 *     lock: { expiration: 30, table: 'netlite_locks' },
 * })
 * // config.lock.attempts === 10
 * // config.logging.level === 'info'
 * ```
 */
export function parseConfig(config: unknown): NetliteConfig {

    const result = NetliteConfigSchema.safeParse(config);

    if (!result.success) {

        throw toConfigError(result.error);

    }

    return result.data;

}
