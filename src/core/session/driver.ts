/**
 * Driver wrapper tying connection lifecycle and transactions to the lock.
 */
import type { DatabaseConnection, Driver, TransactionSettings } from 'kysely';

import { observer } from '../observer.js';
import type { LockManager } from '../lock/manager.js';
import { LockedConnection, unwrapConnection } from './connection.js';

/**
 * Wraps a SQLite driver so Kysely sessions follow the locking protocol.
 *
 * - init: acquire first when a crash marker exists, open, release
 * - destroy: keep the lease for an open transaction, skip closing when a
 *   crash marker shows another process mid-transaction
 * - transactions: BEGIN takes the lease, COMMIT and ROLLBACK release it
 */
export class LockedSqliteDriver implements Driver {

    readonly #driver: Driver;
    readonly #lock: LockManager;
    readonly #connections = new WeakMap<DatabaseConnection, LockedConnection>();

    constructor(driver: Driver, lock: LockManager) {

        this.#driver = driver;
        this.#lock = lock;

    }

    async init(): Promise<void> {

        const resource = this.#lock.resource;

        if (await this.#lock.crashRecoveryCheck()) {

            observer.emit('session:recovery:warning', { resource, phase: 'connect' });
            await this.#lock.acquire();

        }

        try {

            await this.#driver.init();

        }
        finally {

            await this.#lock.release();

        }

        observer.emit('session:open', { resource });

    }

    async acquireConnection(): Promise<DatabaseConnection> {

        const connection = await this.#driver.acquireConnection();
        let locked = this.#connections.get(connection);

        if (!locked) {

            locked = new LockedConnection(connection, this.#lock);
            this.#connections.set(connection, locked);

        }

        return locked;

    }

    async beginTransaction(
        connection: DatabaseConnection,
        settings: TransactionSettings,
    ): Promise<void> {

        await this.#lock.guard(
            'BEGIN',
            () => this.#driver.beginTransaction(unwrapConnection(connection), settings),
        );

    }

    async commitTransaction(connection: DatabaseConnection): Promise<void> {

        await this.#lock.commit(
            () => this.#driver.commitTransaction(unwrapConnection(connection)),
        );

    }

    async rollbackTransaction(connection: DatabaseConnection): Promise<void> {

        await this.#lock.rollback(
            () => this.#driver.rollbackTransaction(unwrapConnection(connection)),
        );

    }

    async releaseConnection(connection: DatabaseConnection): Promise<void> {

        await this.#driver.releaseConnection(unwrapConnection(connection));

    }

    async destroy(): Promise<void> {

        const resource = this.#lock.resource;

        if (this.#lock.inTransaction) {

            await this.#lock.acquire();

        }
        else if (await this.#lock.crashRecoveryCheck()) {

            observer.emit('session:recovery:warning', { resource, phase: 'close' });
            observer.emit('session:close:skip', {
                resource,
                reason: 'rollback journal present, another process may be mid-transaction',
            });
            return;

        }

        await this.#driver.destroy();
        await this.#lock.release();

        observer.emit('session:close', { resource });

    }

}
