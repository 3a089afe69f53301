/**
 * Lock store connection types.
 *
 * The lock store is a strongly-consistent SQL database reached through
 * Kysely. Only dialects with conditional upserts qualify.
 */
import type { Kysely } from 'kysely';

/**
 * Supported lock store dialects.
 */
export type StoreDialect = 'postgres' | 'sqlite';

/**
 * Lock store connection configuration.
 *
 * @example
 * ```typescript
 * const postgresConfig: StoreConnectionConfig = {
 *     dialect: 'postgres',
 *     host: 'locks.internal',
 *     port: 5432,
 *     database: 'locks',
 *     user: 'netlite',
 *     password: 'test-secret',
 * }
 *
 * // Single host or tests
 * const sqliteConfig: StoreConnectionConfig = {
 *     dialect: 'sqlite',
 *     database: ':memory:',
 * }
 * ```
 */
export interface StoreConnectionConfig {
    dialect: StoreDialect;

    // Network (postgres)
    host?: string;
    port?: number;

    // Auth
    user?: string;
    password?: string;

    // Database name, or file path for sqlite
    database: string;

    pool?: {
        min?: number;
        max?: number;
    };

    ssl?:
        | boolean
        | {
              rejectUnauthorized?: boolean;
              ca?: string;
              cert?: string;
              key?: string;
          };
}

/**
 * Result of creating a connection.
 */
export interface ConnectionResult {
    db: Kysely<unknown>;
    dialect: StoreDialect;
    destroy: () => Promise<void>;
}
