/**
 * Crash recovery marker.
 *
 * SQLite leaves a rollback journal next to the database while a write
 * transaction is open. Seeing one when connecting or closing means some
 * process may be mid-transaction, or died in one.
 */
import { existsSync } from 'node:fs';

/**
 * Boundary check for an interrupted transaction.
 */
export interface CrashMarker {
    exists(): Promise<boolean>;
}

/**
 * Path of the rollback journal for a database file.
 */
export function journalPath(databasePath: string): string {

    return `${databasePath}-journal`;

}

/**
 * Marker backed by the database's rollback journal.
 *
 * @example
 * ```typescript
 * const marker = journalMarker('/mnt/shared/app.db')
 * if (await marker.exists()) {
 *     // '/mnt/shared/app.db-journal' is present
 * }
 * ```
 */
export function journalMarker(databasePath: string): CrashMarker {

    const path = journalPath(databasePath);

    return {
        exists: async () => existsSync(path),
    };

}
