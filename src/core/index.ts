/**
 * Core module exports.
 *
 * All lock, session and configuration logic is exported from here.
 * The SDK entry composes these into a ready Kysely instance.
 */

// Observer
export { observer } from './observer.js'
export type { NetliteEvents, NetliteEventNames, ObserverEngine } from './observer.js'

// Environment
export { isCi, isDebug } from './environment.js'

// Config
export * from './config/index.js'

// Query classification
export * from './query/index.js'

// Lock
export * from './lock/index.js'

// Lock store connections
export * from './connection/index.js'

// Session
export * from './session/index.js'

// Logger
export * from './logger/index.js'
