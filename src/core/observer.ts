/**
 * Central event system for netlite.
 *
 * Core modules emit events, hosts subscribe. The logger is one subscriber;
 * applications can attach their own metrics or alerting the same way.
 *
 * @example
 * ```typescript
 * // In core module - emit events at key points
 * observer.emit('lock:acquired', { resource, lockId, acquiredAt, expiresAt, attempts })
 *
 * // In a host - subscribe to events
 * const cleanup = observer.on('lock:failed', (data) => alert(data.resource))
 *
 * // Pattern matching for multiple events
 * observer.on(/^lock:/, ({ event, data }) => record(event, data))
 * ```
 */
import {
    ObserverEngine,
    type Events
} from '@logosdx/observer'

import { isDebug } from './environment.js'


/**
 * All events emitted by netlite core modules.
 *
 * Events are namespaced by module:
 * - `lock:*` - Lease acquisition, retries and release
 * - `query:*` - Classified operations passing through the lock
 * - `session:*` - Protected database open/close
 * - `connection:*` - Lock store connections
 * - `config:*` - Configuration resolution
 * - `logger:*` - Logger lifecycle
 * - `error` - Catch-all errors
 */
export interface NetliteEvents {

    // Lock
    'lock:acquiring': { resource: string; key: string }
    'lock:acquired': { resource: string; lockId: string; acquiredAt: number; expiresAt: number; attempts: number }
    'lock:blocked': { resource: string; key: string; attempt: number }
    'lock:store:warning': { resource: string; key: string; attempt: number; error: string }
    'lock:store:error': { resource: string; key: string; attempt: number; error: string }
    'lock:failed': { resource: string; attempts: number; waitSeconds: number }
    'lock:released': { resource: string; lockId: string; heldSeconds: number }
    'lock:release:error': { resource: string; lockId: string; error: string }
    'lock:idle': { resource: string }
    'lock:retained:error': { resource: string; operation: 'commit' | 'rollback'; error: string }

    // Query
    'query:execute': { resource: string; query: string; kind: 'transaction-start' | 'write' | 'read' }

    // Session
    'session:open': { resource: string }
    'session:close': { resource: string }
    'session:close:skip': { resource: string; reason: string }
    'session:recovery:warning': { resource: string; phase: 'connect' | 'close' }

    // Lock store connection
    'connection:open': { store: string; dialect: string }
    'connection:error': { store: string; error: string }

    // Config
    'config:resolved': { database: string; table: string; dialect: string }

    // Logger
    'logger:started': { level: string }

    // Errors
    'error': { source: string; error: Error; context?: Record<string, unknown> }
}

export type NetliteEventNames = Events<NetliteEvents>;
export type NetliteEventCallback<E extends NetliteEventNames> = ObserverEngine.EventCallback<NetliteEvents[E]>

/**
 * Global observer instance for netlite.
 *
 * Enable debug mode with `NETLITE_DEBUG=1` to see all events as they occur.
 */
export const observer = new ObserverEngine<NetliteEvents>({
    name: 'netlite',
    spy: isDebug()
        ? (action) => console.error(`[netlite:${action.fn}] ${String(action.event)}`)
        : undefined
});

export type { ObserverEngine }
