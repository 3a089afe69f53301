/**
 * Lock-related errors.
 *
 * Callers see exactly these from the lock layer, plus the underlying error
 * of a failed commit or rollback, which is rethrown untouched.
 */
import type { z } from 'zod'


/**
 * Error when required lock configuration is missing or invalid.
 *
 * Raised at construction, before any connection is opened. Never retried.
 *
 * @example
 * ```typescript
 * const [ctx, err] = await attempt(() => createLockedDatabase({ database: './app.db' }))
 * if (err instanceof LockConfigError) {
 *     console.error(`Fix ${err.field}: ${err.message}`)
 * }
 * ```
 */
export class LockConfigError extends Error {

    override readonly name = 'LockConfigError' as const

    constructor(
        message: string,
        public readonly field: string,
        public readonly issues: z.ZodIssue[] = [],
    ) {

        super(message)
    }
}


/**
 * Error when the lock cannot be acquired in time.
 *
 * Thrown once either the attempt budget or the wait deadline runs out.
 * The calling operation must not proceed; retrying is the caller's call.
 *
 * @example
 * ```typescript
 * const [, err] = await attempt(() => db.insertInto('jobs').values(job).execute())
 * if (err instanceof LockBusyError) {
 *     return res.status(503).send('Database busy, try again')
 * }
 * ```
 */
export class LockBusyError extends Error {

    override readonly name = 'LockBusyError' as const

    constructor(
        public readonly resource: string,
        public readonly attempts: number,
        public readonly waitSeconds: number,
    ) {

        super(
            `Failed to acquire lock for '${resource}' after ${attempts} attempts (waited up to ${waitSeconds}s)`
        )
    }
}


/**
 * Error when a transaction is finalized without an active lock.
 *
 * Signals an integration defect: the lease expired or was never taken.
 * The finalize operation is not attempted.
 */
export class LockRequiredError extends Error {

    override readonly name = 'LockRequiredError' as const

    constructor(
        public readonly resource: string,
        public readonly operation: 'commit' | 'rollback',
    ) {

        super(`Lock for '${resource}' is required for transaction ${operation}`)
    }
}


/**
 * Error when the lock store itself fails (network, throttling, service fault).
 *
 * Distinct from a failed condition, which stores report as `false`.
 * Retried inside acquisition, logged and ignored on release.
 */
export class LockStoreError extends Error {

    override readonly name = 'LockStoreError' as const

    constructor(
        public readonly operation: 'put' | 'delete' | 'get' | 'setup',
        public readonly key: string,
        public override readonly cause: Error,
    ) {

        super(`Lock store ${operation} failed for '${key}': ${cause.message}`)
    }
}
