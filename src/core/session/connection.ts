/**
 * Connection wrapper that runs every statement inside the lock's guard.
 */
import type { CompiledQuery, DatabaseConnection, QueryResult } from 'kysely';

import type { LockManager } from '../lock/manager.js';

/**
 * A DatabaseConnection whose queries pass through a LockManager.
 *
 * Writes acquire the lease before executing and release it after, unless
 * a transaction holds it. Reads run without touching the lock store.
 */
export class LockedConnection implements DatabaseConnection {

    readonly #inner: DatabaseConnection;
    readonly #lock: LockManager;

    constructor(inner: DatabaseConnection, lock: LockManager) {

        this.#inner = inner;
        this.#lock = lock;

    }

    /**
     * The wrapped connection.
     */
    get inner(): DatabaseConnection {

        return this.#inner;

    }

    async executeQuery<R>(compiledQuery: CompiledQuery): Promise<QueryResult<R>> {

        return this.#lock.guard(
            compiledQuery.sql,
            () => this.#inner.executeQuery<R>(compiledQuery),
        );

    }

    /**
     * Stream results while holding one guard for the whole iteration.
     */
    async *streamQuery<R>(
        compiledQuery: CompiledQuery,
        chunkSize?: number,
    ): AsyncIterableIterator<QueryResult<R>> {

        await this.#lock.enter(compiledQuery.sql);

        try {

            yield* this.#inner.streamQuery<R>(compiledQuery, chunkSize);

        }
        finally {

            await this.#lock.exit();

        }

    }

}

/**
 * Get the underlying connection of a possibly wrapped one.
 */
export function unwrapConnection(connection: DatabaseConnection): DatabaseConnection {

    return connection instanceof LockedConnection ? connection.inner : connection;

}
