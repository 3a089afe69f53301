/**
 * Lock manager types.
 *
 * One LockManager guards one protected resource (a database file) for one
 * session. The authoritative lock record lives in a remote LockStore;
 * the manager only keeps what it believes it holds.
 */
import type { LockStore } from './store/types.js';
import type { Clock } from './clock.js';
import type { CrashMarker } from './marker.js';

/**
 * Lease settings.
 *
 * @example
 * ```typescript
 * const settings: LockSettings = {
 *     expiration: 10,   // lease abandoned after 10s
 *     attempts: 10,     // at most 10 conditional writes
 *     wait: 3,          // give up after 3s
 *     delay: 50,        // backoff 50ms, 100ms, 150ms, ...
 * }
 * ```
 */
export interface LockSettings {
    /** Seconds after acquisition when the lease counts as abandoned */
    expiration: number;

    /** Maximum conditional writes per acquisition */
    attempts: number;

    /** Seconds to keep trying before giving up */
    wait: number;

    /** Base backoff in milliseconds, multiplied by the attempt number */
    delay: number;
}

/**
 * Settings as accepted from callers, before defaults.
 */
export interface LockSettingsInput {
    expiration?: number;
    attempts?: number;
    wait?: number;
    delay?: number;
}

/**
 * Constructor options for LockManager.
 */
export interface LockManagerOptions {
    /** Identity of the protected resource, usually the database path */
    resource: string;

    /** Remote store holding lock records */
    store: LockStore;

    /** Lease settings, validated at construction */
    settings: LockSettingsInput;

    /** Time source, defaults to the system clock */
    clock?: Clock;

    /** Crash marker, defaults to the SQLite rollback journal beside the resource */
    marker?: CrashMarker;

    /** Lock ID generator, defaults to random UUIDs */
    generateId?: () => string;
}

/**
 * Where a manager sits in its lifecycle.
 */
export type LockPhase = 'unlocked' | 'locked' | 'locked-in-transaction';

/**
 * Snapshot of a manager's in-memory state.
 */
export interface LockState {
    /** Ownership token of the held lease, null when none */
    lockId: string | null;

    /** Seconds timestamp of acquisition */
    acquiredAt: number | null;

    /** Seconds timestamp after which the lease is abandoned */
    expiresAt: number | null;

    /** A transaction start was seen and not yet finalized */
    inTransaction: boolean;

    /** Normalized text of the operation in flight */
    pendingQuery: string | null;
}
