/**
 * Logger tests.
 */
import { describe, it, expect, afterEach } from 'vitest';
import { Writable } from 'node:stream';

import { Logger, getLogger, resetLogger } from '../../../src/core/logger/logger.js';
import { observer } from '../../../src/core/observer.js';

/**
 * Writable stream that keeps every chunk written to it.
 */
function collect(): { stream: Writable; lines: string[] } {

    const lines: string[] = [];
    const stream = new Writable({
        write(chunk: Buffer | string, _encoding, callback) {

            lines.push(chunk.toString());
            callback();

        },
    });

    return { stream, lines };

}

/**
 * Strip the leading timestamp from a compact line.
 */
function withoutTimestamp(line: string | undefined): string {

    return (line ?? '').replace(/^\[[^\]]+\] /, '');

}

describe('logger: Logger class', () => {

    const loggers: Logger[] = [];

    function create(options: ConstructorParameters<typeof Logger>[0]): Logger {

        const logger = new Logger(options);
        loggers.push(logger);
        return logger;

    }

    afterEach(async () => {

        for (const logger of loggers.splice(0)) {

            await logger.stop();

        }

        await resetLogger();

    });

    describe('construction', () => {

        it('should default to info level', () => {

            const logger = create({});

            expect(logger.level).toBe('info');
            expect(logger.isEnabled).toBe(true);
            expect(logger.state).toBe('idle');

        });

        it('should treat silent as disabled', () => {

            const logger = create({ config: { level: 'silent' } });

            expect(logger.isEnabled).toBe(false);

        });

    });

    describe('lifecycle', () => {

        it('should announce itself on start', async () => {

            const { stream, lines } = collect();
            const logger = create({ console: stream, compact: true });

            await logger.start();

            expect(logger.state).toBe('running');
            expect(withoutTimestamp(lines[0])).toBe(
                '[INFO ] [logger:started] Logger started at info level\n',
            );

        });

        it('should not start when disabled', async () => {

            const { stream, lines } = collect();
            const logger = create({ console: stream, compact: true, config: { enabled: false } });

            await logger.start();
            observer.emit('lock:failed', { resource: '/data/app.db', attempts: 10, waitSeconds: 3 });

            expect(logger.state).toBe('idle');
            expect(lines).toEqual([]);

        });

        it('should stop writing after stop', async () => {

            const { stream, lines } = collect();
            const logger = create({ console: stream, compact: true });

            await logger.start();
            await logger.stop();
            observer.emit('session:open', { resource: '/data/app.db' });

            expect(logger.state).toBe('stopped');
            expect(lines).toHaveLength(1);

        });

        it('should end the file stream on stop', async () => {

            const file = collect();
            const logger = create({ file: file.stream, compact: true });

            await logger.start();
            await logger.stop();

            expect(file.stream.writableEnded).toBe(true);
            expect(file.lines).toHaveLength(1);

        });

    });

    describe('event output', () => {

        it('should write compact lines', async () => {

            const { stream, lines } = collect();
            const logger = create({ console: stream, compact: true });

            await logger.start();
            observer.emit('lock:acquired', {
                resource: '/data/app.db',
                lockId: 'lock-1',
                acquiredAt: 1000,
                expiresAt: 1010,
                attempts: 2,
            });

            expect(withoutTimestamp(lines[1])).toBe(
                '[INFO ] [lock:acquired] Lock acquired for /data/app.db after 2 attempt(s)\n',
            );

        });

        it('should filter events below the configured level', async () => {

            const { stream, lines } = collect();
            const logger = create({ console: stream, compact: true, config: { level: 'warn' } });

            await logger.start();
            observer.emit('lock:acquired', {
                resource: '/data/app.db',
                lockId: 'lock-1',
                acquiredAt: 1000,
                expiresAt: 1010,
                attempts: 1,
            });
            observer.emit('lock:blocked', {
                resource: '/data/app.db',
                key: 'database#/data/app.db',
                attempt: 1,
            });

            expect(lines.map(withoutTimestamp)).toEqual([
                '[WARN ] [lock:blocked] Lock database#/data/app.db held elsewhere (attempt 1)\n',
            ]);

        });

        it('should write JSON entries with context', async () => {

            const { stream, lines } = collect();
            const logger = create({
                console: stream,
                compact: false,
                context: { service: 'billing' },
            });

            await logger.start();
            observer.emit('session:open', { resource: '/data/app.db' });

            const entry = JSON.parse(lines[1] ?? '{}');

            expect(entry).toMatchObject({
                level: 'info',
                event: 'session:open',
                message: 'Opened /data/app.db',
                context: { service: 'billing' },
            });
            expect(entry.data).toBeUndefined();

        });

        it('should apply context set after construction', async () => {

            const { stream, lines } = collect();
            const logger = create({ console: stream, compact: false });

            await logger.start();

            logger.setContext({ service: 'billing' });
            logger.setContext({ run: 'nightly' });
            observer.emit('session:open', { resource: '/data/app.db' });

            logger.clearContext();
            observer.emit('session:close', { resource: '/data/app.db' });

            const withContext = JSON.parse(lines[1] ?? '{}');
            const cleared = JSON.parse(lines[2] ?? '{}');

            expect(withContext.context).toEqual({ service: 'billing', run: 'nightly' });
            expect(cleared.event).toBe('session:close');
            expect(cleared.context).toBeUndefined();

        });

        it('should include payloads at verbose level', async () => {

            const { stream, lines } = collect();
            const logger = create({ console: stream, compact: true, config: { level: 'verbose' } });

            await logger.start();
            observer.emit('lock:idle', { resource: '/data/app.db' });

            expect(withoutTimestamp(lines[1])).toBe(
                '[DEBUG] [lock:idle] No active lock to release for /data/app.db {"resource":"/data/app.db"}\n',
            );

        });

    });

    describe('direct logging', () => {

        it('should write messages at or above the level', async () => {

            const { stream, lines } = collect();
            const logger = create({ console: stream, compact: true });

            await logger.start();
            logger.warn('Lock store slow');
            logger.debug('Not shown');

            expect(lines.map(withoutTimestamp).slice(1)).toEqual(['[WARN ] Lock store slow\n']);

        });

        it('should ignore messages before start', () => {

            const { stream, lines } = collect();
            const logger = create({ console: stream, compact: true });

            logger.error('Too early');

            expect(lines).toEqual([]);

        });

    });

    describe('singleton', () => {

        it('should return null before creation', () => {

            expect(getLogger()).toBeNull();

        });

        it('should return the same instance', () => {

            const first = getLogger({ compact: true });
            const second = getLogger({ compact: false });

            expect(first).not.toBeNull();
            expect(second).toBe(first);

        });

        it('should create a new instance after reset', async () => {

            const first = getLogger({});
            await resetLogger();
            const second = getLogger({});

            expect(second).not.toBe(first);

        });

    });

});
