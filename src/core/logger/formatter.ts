/**
 * Log Formatter
 *
 * Converts observer events into LogEntry objects and serializes them
 * for file output. Each entry is a single JSON line.
 */
import type { LogEntry } from './types.js'
import { classifyEvent } from './classifier.js'


/**
 * Human-readable message templates for common events.
 * Keys are event names, values are functions that generate messages from event data.
 */
const MESSAGE_TEMPLATES: Record<string, (data: Record<string, unknown>) => string> = {

    // Lock
    'lock:acquiring': (d) => `Acquiring lock ${d['key']}`,
    'lock:acquired': (d) => `Lock acquired for ${d['resource']} after ${d['attempts']} attempt(s)`,
    'lock:blocked': (d) => `Lock ${d['key']} held elsewhere (attempt ${d['attempt']})`,
    'lock:store:warning': (d) => `Lock store error on ${d['key']} (attempt ${d['attempt']}): ${d['error']}`,
    'lock:store:error': (d) => `Lock store failure on ${d['key']} (attempt ${d['attempt']}): ${d['error']}`,
    'lock:failed': (d) => `Lock acquisition failed for ${d['resource']} after ${d['attempts']} attempt(s) within ${d['waitSeconds']}s`,
    'lock:released': (d) => `Lock released for ${d['resource']} after ${formatSeconds(d['heldSeconds'])}`,
    'lock:release:error': (d) => `Lock release failed for ${d['resource']}: ${d['error']}`,
    'lock:idle': (d) => `No active lock to release for ${d['resource']}`,
    'lock:retained:error': (d) => `Transaction ${d['operation']} failed for ${d['resource']}, lock retained: ${d['error']}`,

    // Query
    'query:execute': (d) => `Executing ${d['kind']} query: ${d['query']}`,

    // Session
    'session:open': (d) => `Opened ${d['resource']}`,
    'session:close': (d) => `Closed ${d['resource']}`,
    'session:close:skip': (d) => `Skipped closing ${d['resource']}: ${d['reason']}`,
    'session:recovery:warning': (d) => `Rollback journal found for ${d['resource']} on ${d['phase']}`,

    // Connection
    'connection:open': (d) => `Connected to lock store ${d['store']} (${d['dialect']})`,
    'connection:error': (d) => `Lock store connection error for ${d['store']}: ${d['error']}`,

    // Config
    'config:resolved': (d) => `Config resolved for ${d['database']} (lock table ${d['table']} on ${d['dialect']})`,

    // Logger lifecycle
    'logger:started': (d) => `Logger started at ${d['level']} level`,

    // Generic error
    'error': (d) => `Error in ${d['source']}: ${d['error'] instanceof Error ? d['error'].message : String(d['error'])}`,
}


/**
 * Generate a human-readable message for an event.
 *
 * Uses templates for known events, falls back to generic format.
 *
 * @param event - Observer event name
 * @param data - Event payload
 * @returns Human-readable message
 */
export function generateMessage(event: string, data: Record<string, unknown>): string {

    const template = MESSAGE_TEMPLATES[event]

    if (template) {

        try {

            return template(data)
        }
        catch {

            // Fall through to generic format
        }
    }

    // Generic format: "Event occurred" or "Event: key=value, ..."
    const parts = Object.entries(data)
        .slice(0, 3)
        .map(([k, v]) => `${k}=${summarizeValue(v)}`)

    if (parts.length === 0) {

        return event.replace(/:/g, ' ')
    }

    return `${event.replace(/:/g, ' ')}: ${parts.join(', ')}`
}


/**
 * Render a duration in seconds with millisecond precision.
 */
function formatSeconds(value: unknown): string {

    return typeof value === 'number' ? `${value.toFixed(3)}s` : String(value)
}


/**
 * Summarize a value for log message display.
 * Truncates long strings and formats objects.
 */
function summarizeValue(value: unknown): string {

    if (value === null || value === undefined) {

        return String(value)
    }

    if (typeof value === 'string') {

        if (value.length > 50) {

            return `"${value.slice(0, 47)}..."`
        }

        return `"${value}"`
    }

    if (typeof value === 'number' || typeof value === 'boolean') {

        return String(value)
    }

    if (Array.isArray(value)) {

        return `[${value.length} items]`
    }

    if (typeof value === 'object') {

        return `{${Object.keys(value).length} keys}`
    }

    return String(value)
}


/**
 * Format an event into a LogEntry.
 *
 * @param event - Observer event name
 * @param data - Event payload
 * @param context - Additional context (service name, etc.)
 * @param includeData - Whether to include full payload (verbose mode)
 * @returns Formatted log entry
 *
 * @example
 * ```typescript
 * const entry = formatEntry('session:open', { resource: 'app.db' }, { service: 'billing' }, true)
 * // {
 * //     timestamp: '2024-01-15T10:30:00.000Z',
 * //     level: 'info',
 * //     event: 'session:open',
 * //     message: 'Opened app.db',
 * //     data: { resource: 'app.db' },
 * //     context: { service: 'billing' }
 * // }
 * ```
 */
export function formatEntry(
    event: string,
    data: Record<string, unknown>,
    context?: Record<string, unknown>,
    includeData = false
): LogEntry {

    const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level: classifyEvent(event),
        event,
        message: generateMessage(event, data),
    }

    // Include full data at verbose level
    if (includeData && Object.keys(data).length > 0) {

        entry.data = sanitizeData(data)
    }

    // Include context if provided
    if (context && Object.keys(context).length > 0) {

        entry.context = context
    }

    return entry
}


/**
 * Sanitize data for logging.
 * Removes sensitive fields and handles non-serializable values.
 */
function sanitizeData(data: Record<string, unknown>): Record<string, unknown> {

    const SENSITIVE_KEYS = ['password', 'secret', 'token', 'credential', 'auth']
    const result: Record<string, unknown> = {}

    for (const [key, value] of Object.entries(data)) {

        // Redact sensitive fields
        const lowerKey = key.toLowerCase()

        if (SENSITIVE_KEYS.some((s) => lowerKey.includes(s))) {

            result[key] = '[REDACTED]'
            continue
        }

        // Handle Error objects
        if (value instanceof Error) {

            result[key] = {
                name: value.name,
                message: value.message,
                stack: value.stack?.split('\n').slice(0, 3).join('\n'),
            }
            continue
        }

        // Handle Date objects
        if (value instanceof Date) {

            result[key] = value.toISOString()
            continue
        }

        // Handle circular references / non-serializable
        try {

            JSON.stringify(value)
            result[key] = value
        }
        catch {

            result[key] = String(value)
        }
    }

    return result
}


/**
 * Serialize a LogEntry to a JSON line for file output.
 *
 * @param entry - Log entry to serialize
 * @returns JSON string with newline
 */
export function serializeEntry(entry: LogEntry): string {

    return JSON.stringify(entry) + '\n'
}
