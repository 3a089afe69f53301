/**
 * In-memory lock store.
 *
 * Same conditional semantics as the remote stores, scoped to one process.
 * Suitable for tests and for several sessions inside a single process.
 */
import type { LockRecord, LockStore } from './types.js'


export class MemoryLockStore implements LockStore {

    #records = new Map<string, LockRecord>()

    async conditionalPut(record: LockRecord, now: number): Promise<boolean> {

        const existing = this.#records.get(record.key)

        if (existing && existing.expiresAt >= now) {

            return false
        }

        this.#records.set(record.key, { ...record })
        return true
    }

    async conditionalDelete(key: string, ownerId: string): Promise<boolean> {

        const existing = this.#records.get(key)

        if (!existing || existing.ownerId !== ownerId) {

            return false
        }

        this.#records.delete(key)
        return true
    }

    /**
     * Current record for a key, regardless of expiry.
     */
    get(key: string): LockRecord | null {

        const record = this.#records.get(key)
        return record ? { ...record } : null
    }

    /**
     * Number of stored records.
     */
    get size(): number {

        return this.#records.size
    }

    clear(): void {

        this.#records.clear()
    }
}
