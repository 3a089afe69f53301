/**
 * Connection pragmas for a database file on a network filesystem.
 *
 * Keeps hot pages and temp tables in memory so the shared file sees as
 * little I/O as possible, and syncs as strictly as SQLite allows.
 */
import { CompiledQuery, type DatabaseConnection } from 'kysely';

/**
 * Pragmas run on every new connection unless overridden.
 */
export const DEFAULT_PRAGMAS: readonly string[] = [
    'PRAGMA synchronous = EXTRA',
    'PRAGMA temp_store = MEMORY',
    'PRAGMA cache_spill = FALSE',
    'PRAGMA cache_size = -262144',   // KiB, 256 MiB
    'PRAGMA mmap_size = 268435456',  // bytes, 256 MiB
];

/**
 * Run each pragma on a freshly opened connection.
 *
 * Pragmas go straight to the underlying connection, outside the lock.
 */
export async function applyPragmas(
    connection: DatabaseConnection,
    pragmas: readonly string[],
): Promise<void> {

    for (const pragma of pragmas) {

        await connection.executeQuery(CompiledQuery.raw(pragma));

    }

}
