/**
 * Logger
 *
 * Stream-based logger that subscribes to every observer event and writes
 * one line per event to console and/or file streams.
 *
 * @example
 * ```typescript
 * import { createWriteStream } from 'node:fs'
 *
 * const logger = new Logger({
 *     config: { level: 'info' },
 *     file: createWriteStream('/var/log/netlite.log', { flags: 'a' }),
 * })
 *
 * await logger.start()
 * // Lock, session and connection events are now written as they happen
 * ```
 */
import type { Writable } from 'node:stream';

import { observer } from '../observer.js';
import { isCi } from '../environment.js';
import { classifyEvent, getEntryLevelPriority, shouldLog } from './classifier.js';
import { generateMessage, serializeEntry, formatEntry } from './formatter.js';
import type { LogLevel, LoggerConfig, LoggerState, EntryLevel } from './types.js';
import { DEFAULT_LOGGER_CONFIG, LOG_LEVEL_PRIORITY } from './types.js';

/**
 * Options for Logger construction.
 */
export interface LoggerOptions {

    /** Logger configuration */
    config?: Partial<LoggerConfig>;

    /** Context to include with every entry */
    context?: Record<string, unknown>;

    /** File stream to write to */
    file?: Writable;

    /** Console stream to write to (defaults to stdout in CI mode) */
    console?: Writable;

    /** Force compact line output instead of JSON entries */
    compact?: boolean;
}

/**
 * Copy an event payload into a plain record.
 */
function toRecord(data: unknown): Record<string, unknown> {

    if (typeof data !== 'object' || data === null) {

        return {};

    }

    return Object.fromEntries(Object.entries(data));

}

/**
 * Logger that captures observer events and writes to streams.
 *
 * CI and serverless runs get compact lines on stdout, everything else
 * gets JSON entries.
 */
export class Logger {

    #config: LoggerConfig;
    #context: Record<string, unknown>;
    #file: Writable | null = null;
    #console: Writable | null = null;
    #compact: boolean;
    #state: LoggerState = 'idle';
    #unsubscribe: (() => void) | null = null;

    constructor(options: LoggerOptions = {}) {

        const headless = isCi();

        this.#config = { ...DEFAULT_LOGGER_CONFIG, ...options.config };
        this.#context = options.context ?? {};
        this.#compact = options.compact ?? headless;

        if (options.console) {

            this.#console = options.console;

        }
        else if (headless) {

            this.#console = process.stdout;

        }

        if (options.file) {

            this.#file = options.file;

        }

    }

    /**
     * Get the current logger state.
     */
    get state(): LoggerState {

        return this.#state;

    }

    /**
     * Get the current log level.
     */
    get level(): LogLevel {

        return this.#config.level;

    }

    /**
     * Check if logging is enabled.
     */
    get isEnabled(): boolean {

        return this.#config.enabled && this.#config.level !== 'silent';

    }

    /**
     * Update the logging context.
     *
     * Context is included with every log entry.
     */
    setContext(context: Record<string, unknown>): void {

        this.#context = { ...this.#context, ...context };

    }

    /**
     * Clear the logging context.
     */
    clearContext(): void {

        this.#context = {};

    }

    /**
     * Start the logger.
     *
     * Subscribes to all observer events.
     */
    async start(): Promise<void> {

        if (this.#state !== 'idle') {

            return;

        }

        if (!this.isEnabled) {

            return;

        }

        this.#unsubscribe = observer.on(/./, ({ event, data }) => {

            this.#handleEvent(String(event), toRecord(data));

        });

        this.#state = 'running';

        observer.emit('logger:started', { level: this.#config.level });

    }

    /**
     * Stop the logger.
     *
     * Unsubscribes and ends the file stream.
     */
    async stop(): Promise<void> {

        if (this.#state !== 'running') {

            return;

        }

        if (this.#unsubscribe) {

            this.#unsubscribe();
            this.#unsubscribe = null;

        }

        const file = this.#file;

        if (file && file !== process.stdout && file !== process.stderr) {

            await new Promise<void>((resolve) => {

                file.end(() => resolve());

            });

        }

        this.#state = 'stopped';

    }

    /**
     * Handle an observer event.
     */
    #handleEvent(event: string, data: Record<string, unknown>): void {

        if (!shouldLog(event, this.#config.level)) {

            return;

        }

        if (this.#compact) {

            this.#writeLine(classifyEvent(event), event, data);

        }
        else {

            this.#writeEntry(event, data);

        }

    }

    /**
     * Write a compact log line.
     */
    #writeLine(level: EntryLevel, event: string, data: Record<string, unknown>): void {

        const timestamp = new Date().toISOString();
        const message = generateMessage(event, data);
        const levelLabel = level.toUpperCase().padEnd(5);

        let line = `[${timestamp}] [${levelLabel}] [${event}] ${message}`;

        if (this.#config.level === 'verbose' && Object.keys(data).length > 0) {

            line += ` ${JSON.stringify(data)}`;

        }

        this.#write(line + '\n');

    }

    /**
     * Write a JSON log entry.
     */
    #writeEntry(event: string, data: Record<string, unknown>): void {

        const includeData = this.#config.level === 'verbose';
        const entry = formatEntry(event, data, this.#context, includeData);

        this.#write(serializeEntry(entry));

    }

    #write(line: string): void {

        if (this.#console) {

            this.#console.write(line);

        }

        if (this.#file) {

            this.#file.write(line);

        }

    }

    // ─────────────────────────────────────────────────────────────
    // Direct logging methods
    // ─────────────────────────────────────────────────────────────

    /**
     * Log an info message directly.
     */
    info(message: string, data?: Record<string, unknown>): void {

        this.#log('info', message, data);

    }

    /**
     * Log a warning message directly.
     */
    warn(message: string, data?: Record<string, unknown>): void {

        this.#log('warn', message, data);

    }

    /**
     * Log an error message directly.
     */
    error(message: string, data?: Record<string, unknown>): void {

        this.#log('error', message, data);

    }

    /**
     * Log a debug message directly.
     */
    debug(message: string, data?: Record<string, unknown>): void {

        this.#log('debug', message, data);

    }

    #log(level: EntryLevel, message: string, data?: Record<string, unknown>): void {

        if (!this.isEnabled || this.#state !== 'running') {

            return;

        }

        if (getEntryLevelPriority(level) > LOG_LEVEL_PRIORITY[this.#config.level]) {

            return;

        }

        const timestamp = new Date().toISOString();
        const levelLabel = level.toUpperCase().padEnd(5);

        let line = `[${timestamp}] [${levelLabel}] ${message}`;

        if (this.#config.level === 'verbose' && data && Object.keys(data).length > 0) {

            line += ` ${JSON.stringify(data)}`;

        }

        this.#write(line + '\n');

    }

}

// ─────────────────────────────────────────────────────────────
// Singleton / Factory
// ─────────────────────────────────────────────────────────────

let loggerInstance: Logger | null = null;

/**
 * Get or create a Logger instance.
 *
 * @param options - Logger options, used only when creating
 * @returns Logger instance, or null when none exists and no options were given
 */
export function getLogger(options?: LoggerOptions): Logger | null {

    if (!loggerInstance && options) {

        loggerInstance = new Logger(options);

    }

    return loggerInstance;

}

/**
 * Reset the logger singleton.
 *
 * Useful for testing to ensure clean state between tests.
 */
export async function resetLogger(): Promise<void> {

    if (loggerInstance) {

        await loggerInstance.stop();
        loggerInstance = null;

    }

}
