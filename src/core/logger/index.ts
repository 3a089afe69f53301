/**
 * Logger Module
 *
 * Captures observer events and streams them to log outputs.
 *
 * Features:
 * - Automatic CI detection (compact lines vs JSON entries)
 * - Event classification by name
 * - Sensitive field redaction in verbose payloads
 */

// Types
export type {
    LogLevel,
    EntryLevel,
    LogEntry,
    LoggerConfig,
    LoggerState,
} from './types.js';

export { LOG_LEVEL_PRIORITY, DEFAULT_LOGGER_CONFIG } from './types.js';

// Classifier
export { classifyEvent, shouldLog } from './classifier.js';

// Formatter
export { generateMessage, formatEntry, serializeEntry } from './formatter.js';

// Logger
export { Logger, getLogger, resetLogger, type LoggerOptions } from './logger.js';
