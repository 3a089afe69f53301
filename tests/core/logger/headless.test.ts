/**
 * Logger output selection in CI and serverless runs.
 */
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Writable } from 'node:stream';

vi.mock('../../../src/core/environment.js', () => ({
    isCi: vi.fn(() => true),
    isDebug: vi.fn(() => false),
}));

// Import mocked modules
import { isCi } from '../../../src/core/environment.js';
import { Logger } from '../../../src/core/logger/logger.js';

describe('logger: headless output', () => {

    beforeEach(() => {

        vi.mocked(isCi).mockClear();

    });

    it('should check the environment once per logger', () => {

        const file = new Writable({ write: (_chunk, _encoding, callback) => callback() });

        new Logger({ file });

        expect(vi.mocked(isCi)).toHaveBeenCalledTimes(1);

    });

    it('should write compact lines when headless', async () => {

        const lines: string[] = [];
        const stream = new Writable({
            write(chunk: Buffer | string, _encoding, callback) {

                lines.push(chunk.toString());
                callback();

            },
        });

        const logger = new Logger({ console: stream });

        await logger.start();
        await logger.stop();

        expect((lines[0] ?? '').replace(/^\[[^\]]+\] /, '')).toBe(
            '[INFO ] [logger:started] Logger started at info level\n',
        );

    });

});
