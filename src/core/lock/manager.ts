/**
 * Lock manager for a SQLite file shared over a network filesystem.
 *
 * Every write to the protected database is serialized through a lease
 * held in a remote LockStore. The store's conditional put is the only
 * serialization point; this class keeps what it believes it holds and
 * decides which operations need the lease at all.
 *
 * One instance per protected session. State is never shared.
 *
 * @example
 * ```typescript
 * const lock = new LockManager({
 *     resource: '/mnt/shared/app.db',
 *     store,
 *     settings: { expiration: 30 },
 * })
 *
 * // Writes acquire before and release after
 * await lock.guard('INSERT INTO jobs VALUES (1)', () => run(sql))
 *
 * // Transactions keep the lease until finalized
 * await lock.guard('BEGIN', () => run('BEGIN'))
 * await lock.guard('UPDATE jobs SET done = 1', () => run(sql))
 * await lock.commit(() => run('COMMIT'))
 * ```
 */
import { randomUUID } from 'node:crypto'

import { attempt } from '@logosdx/utils'

import { observer } from '../observer.js'
import { parseLockSettings } from '../config/schema.js'
import { classifyQuery, normalizeQuery } from '../query/index.js'
import type { QueryKind } from '../query/index.js'
import type { LockStore } from './store/types.js'
import type { LockManagerOptions, LockPhase, LockSettings, LockState } from './types.js'
import { systemClock, type Clock } from './clock.js'
import { journalMarker, type CrashMarker } from './marker.js'
import { LockBusyError, LockRequiredError, LockStoreError } from './errors.js'


/**
 * Build the lock-store key for a protected resource.
 */
export function lockKey(resource: string): string {

    return `database#${resource}`
}


function describeError(err: unknown): string {

    return err instanceof Error ? err.message : String(err)
}


/**
 * Lease state machine for one protected resource.
 */
export class LockManager {

    readonly #resource: string
    readonly #key: string
    readonly #store: LockStore
    readonly #settings: LockSettings
    readonly #clock: Clock
    readonly #marker: CrashMarker
    readonly #generateId: () => string

    #lockId: string | null = null
    #acquiredAt: number | null = null
    #expiresAt: number | null = null
    #inTransaction = false
    #pendingQuery: string | null = null

    /**
     * @throws LockConfigError when `expiration` is missing or a setting is invalid
     */
    constructor(options: LockManagerOptions) {

        this.#settings = parseLockSettings(options.settings)
        this.#resource = options.resource
        this.#key = lockKey(options.resource)
        this.#store = options.store
        this.#clock = options.clock ?? systemClock
        this.#marker = options.marker ?? journalMarker(options.resource)
        this.#generateId = options.generateId ?? randomUUID
    }

    get resource(): string {

        return this.#resource
    }

    get key(): string {

        return this.#key
    }

    get settings(): Readonly<LockSettings> {

        return this.#settings
    }

    /**
     * True while a lease is held and has not expired by the local clock.
     */
    get isActive(): boolean {

        return this.#lockId !== null
            && this.#expiresAt !== null
            && this.#expiresAt > this.#clock.now()
    }

    get inTransaction(): boolean {

        return this.#inTransaction
    }

    get phase(): LockPhase {

        if (!this.isActive) {

            return 'unlocked'
        }

        return this.#inTransaction ? 'locked-in-transaction' : 'locked'
    }

    /**
     * Snapshot of the in-memory state.
     */
    get state(): LockState {

        return {
            lockId: this.#lockId,
            acquiredAt: this.#acquiredAt,
            expiresAt: this.#expiresAt,
            inTransaction: this.#inTransaction,
            pendingQuery: this.#pendingQuery,
        }
    }

    /**
     * Acquire the lease.
     *
     * No-op while an unexpired lease is held. Otherwise retries the
     * conditional put until the attempt budget or the wait deadline runs
     * out, backing off `delay * attempt` milliseconds between tries.
     *
     * @throws LockBusyError when neither budget yields the lease
     */
    async acquire(): Promise<void> {

        if (this.isActive) {

            return
        }

        const { expiration, attempts: maxAttempts, wait, delay } = this.#settings
        const resource = this.#resource
        const key = this.#key
        const deadline = this.#clock.now() + wait

        observer.emit('lock:acquiring', { resource, key })

        let attempts = 0

        while (attempts < maxAttempts && this.#clock.now() < deadline) {

            const lockId = this.#generateId()
            const now = this.#clock.now()
            const expiresAt = now + expiration

            const [written, err] = await attempt(
                () => this.#store.conditionalPut({ key, ownerId: lockId, expiresAt }, now)
            )

            if (!err && written) {

                this.#lockId = lockId
                this.#acquiredAt = now
                this.#expiresAt = expiresAt

                observer.emit('lock:acquired', {
                    resource,
                    lockId,
                    acquiredAt: now,
                    expiresAt,
                    attempts: attempts + 1,
                })

                return
            }

            const attemptNumber = attempts + 1

            if (!err) {

                observer.emit('lock:blocked', { resource, key, attempt: attemptNumber })
            }
            else if (err instanceof LockStoreError && attemptNumber < maxAttempts) {

                observer.emit('lock:store:warning', {
                    resource,
                    key,
                    attempt: attemptNumber,
                    error: err.message,
                })
            }
            else {

                observer.emit('lock:store:error', {
                    resource,
                    key,
                    attempt: attemptNumber,
                    error: describeError(err),
                })
            }

            this.#clearLock()
            attempts = attemptNumber

            await this.#clock.sleep(delay * attempts)
        }

        observer.emit('lock:failed', { resource, attempts, waitSeconds: wait })

        throw new LockBusyError(resource, attempts, wait)
    }

    /**
     * Release the lease.
     *
     * Store failures are reported and swallowed; the record's own expiry
     * frees the resource eventually. Local state is always cleared.
     */
    async release(): Promise<void> {

        const lockId = this.#lockId

        if (!this.isActive || lockId === null) {

            observer.emit('lock:idle', { resource: this.#resource })
            return
        }

        const resource = this.#resource
        const heldSeconds = this.#clock.now() - (this.#acquiredAt ?? this.#clock.now())

        const [deleted, err] = await attempt(
            () => this.#store.conditionalDelete(this.#key, lockId)
        )

        if (err) {

            observer.emit('lock:release:error', { resource, lockId, error: err.message })
        }
        else if (!deleted) {

            observer.emit('lock:release:error', {
                resource,
                lockId,
                error: 'lock record was taken over or already removed',
            })
        }

        this.#clearLock()
        this.#inTransaction = false

        observer.emit('lock:released', { resource, lockId, heldSeconds })
    }

    /**
     * Enter the guarded scope of an operation.
     *
     * Transaction starts and writes acquire the lease; reads pass through.
     * A failed acquisition leaves no pending operation and no transaction.
     */
    async enter(query: string): Promise<QueryKind> {

        const normalized = normalizeQuery(query)
        const kind = classifyQuery(normalized)

        this.#pendingQuery = normalized

        observer.emit('query:execute', { resource: this.#resource, query: normalized, kind })

        if (kind === 'read') {

            return kind
        }

        const wasInTransaction = this.#inTransaction

        if (kind === 'transaction-start') {

            this.#inTransaction = true
        }

        try {

            await this.acquire()
        }
        catch (error) {

            this.#inTransaction = wasInTransaction
            this.#pendingQuery = null
            throw error
        }

        return kind
    }

    /**
     * Leave the guarded scope. Releases unless a transaction is open.
     */
    async exit(): Promise<void> {

        try {

            if (!this.#inTransaction) {

                await this.release()
            }
        }
        finally {

            this.#pendingQuery = null
        }
    }

    /**
     * Run `body` inside the guarded scope of `query`.
     *
     * The scope is left on every exit path, including a throwing body.
     */
    async guard<T>(query: string, body: () => Promise<T>): Promise<T> {

        await this.enter(query)

        try {

            return await body()
        }
        finally {

            await this.exit()
        }
    }

    /**
     * Commit under the held lease, then release it.
     *
     * @throws LockRequiredError without calling `finalize` when no lease is active
     */
    async commit<T>(finalize: () => Promise<T>): Promise<T> {

        return this.#finalize('commit', finalize)
    }

    /**
     * Roll back under the held lease, then release it.
     *
     * @throws LockRequiredError without calling `finalize` when no lease is active
     */
    async rollback<T>(finalize: () => Promise<T>): Promise<T> {

        return this.#finalize('rollback', finalize)
    }

    /**
     * Whether a crash marker for the protected database exists.
     */
    async crashRecoveryCheck(): Promise<boolean> {

        return this.#marker.exists()
    }

    async #finalize<T>(
        operation: 'commit' | 'rollback',
        finalize: () => Promise<T>,
    ): Promise<T> {

        if (!this.isActive) {

            throw new LockRequiredError(this.#resource, operation)
        }

        let result: T

        try {

            result = await finalize()
        }
        catch (error) {

            // Lease stays held until the transaction is resolved
            observer.emit('lock:retained:error', {
                resource: this.#resource,
                operation,
                error: describeError(error),
            })

            throw error
        }

        await this.release()

        return result
    }

    #clearLock(): void {

        this.#lockId = null
        this.#acquiredAt = null
        this.#expiresAt = null
    }
}
