/**
 * Session module - Kysely integration for the protected database.
 */
export {
    LockedSqliteDialect,
    type LockedSqliteDialectConfig,
} from './dialect.js';

export { LockedSqliteDriver } from './driver.js';
export { LockedConnection, unwrapConnection } from './connection.js';
export { DEFAULT_PRAGMAS, applyPragmas } from './pragmas.js';
