/**
 * Remote lock store contract.
 *
 * Any store with atomic conditional writes keyed by a primary key can back
 * the lock. Correctness across processes rests entirely on these two
 * operations being atomic at the store.
 */

/**
 * A lock record as persisted in the store.
 *
 * @example
 * ```typescript
 * const record: LockRecord = {
 *     key: 'database#/mnt/shared/app.db',
 *     ownerId: '0d6c6f0e-8a3b-4d55-9b7e-2a8c1f5d9e10',
 *     expiresAt: 1_700_000_010.25,
 * }
 * ```
 */
export interface LockRecord {
    /** Derived from the protected resource, one record per resource */
    key: string;

    /** Ownership token, fresh on every acquisition attempt */
    ownerId: string;

    /** Seconds timestamp after which the record is stale */
    expiresAt: number;
}

/**
 * Conditional operations the lock manager needs.
 *
 * Both resolve `false` when their condition fails. Transport and service
 * faults reject with LockStoreError instead.
 */
export interface LockStore {
    /**
     * Write the record if no record exists for its key, or the existing
     * record's expiresAt is before `now`. Never overwrites a live record.
     */
    conditionalPut(record: LockRecord, now: number): Promise<boolean>;

    /**
     * Delete the record for `key` only if it is still owned by `ownerId`.
     */
    conditionalDelete(key: string, ownerId: string): Promise<boolean>;
}
