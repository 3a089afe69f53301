/**
 * Environment variable config tests.
 *
 * Env vars follow the pattern: NETLITE_{PATH}_{TO}_{VALUE}
 *
 * @example
 * NETLITE_LOCK_EXPIRATION=30      ->  { lock: { expiration: 30 } }
 * NETLITE_STORE_DIALECT=postgres  ->  { store: { dialect: 'postgres' } }
 */
import { describe, it, expect } from 'vitest';

import { getEnvConfig } from '../../../src/core/config/index.js';
import { LockConfigError } from '../../../src/core/lock/index.js';

describe('config: env', () => {

    describe('getEnvConfig', () => {

        it('should return empty config when no env vars set', () => {

            expect(getEnvConfig({ PATH: '/usr/bin', HOME: '/home/test' })).toEqual({});

        });

        it('should map every setting to its nested path', () => {

            const config = getEnvConfig({
                NETLITE_DATABASE: '/mnt/shared/app.db',
                NETLITE_LOCK_EXPIRATION: '30',
                NETLITE_LOCK_ATTEMPTS: '5',
                NETLITE_LOCK_WAIT: '4',
                NETLITE_LOCK_DELAY: '100',
                NETLITE_LOCK_TABLE: 'netlite_locks',
                NETLITE_STORE_DIALECT: 'postgres',
                NETLITE_STORE_HOST: 'locks.internal',
                NETLITE_STORE_PORT: '5432',
                NETLITE_STORE_DATABASE: 'locks',
                NETLITE_STORE_USER: 'netlite',
                NETLITE_STORE_PASSWORD: 'test-secret',
                NETLITE_STORE_SSL: 'true',
                NETLITE_LOGGING_LEVEL: 'verbose',
            });

            expect(config).toEqual({
                database: '/mnt/shared/app.db',
                lock: {
                    expiration: 30,
                    attempts: 5,
                    wait: 4,
                    delay: 100,
                    table: 'netlite_locks',
                },
                store: {
                    dialect: 'postgres',
                    host: 'locks.internal',
                    port: 5432,
                    database: 'locks',
                    user: 'netlite',
                    password: 'test-secret',
                    ssl: true,
                },
                logging: { level: 'verbose' },
            });

        });

        it('should keep numeric-looking passwords and names as strings', () => {

            const config = getEnvConfig({
                NETLITE_STORE_PASSWORD: '12345',
                NETLITE_STORE_DATABASE: '2024',
                NETLITE_LOCK_TABLE: '42',
            });

            expect(config.store?.password).toBe('12345');
            expect(config.store?.database).toBe('2024');
            expect(config.lock?.table).toBe('42');

        });

        it('should ignore runtime toggles', () => {

            const config = getEnvConfig({
                NETLITE_DEBUG: '1',
                NETLITE_HEADLESS: 'true',
                NETLITE_LOCK_EXPIRATION: '10',
            });

            expect(config).toEqual({ lock: { expiration: 10 } });

        });

        it('should accept both store dialects', () => {

            for (const dialect of ['postgres', 'sqlite']) {

                expect(getEnvConfig({ NETLITE_STORE_DIALECT: dialect }).store?.dialect).toBe(dialect);

            }

        });

        it('should reject an unknown store dialect', () => {

            expect(() => getEnvConfig({ NETLITE_STORE_DIALECT: 'mysql' })).toThrow(
                'Invalid NETLITE_STORE_DIALECT: must be one of postgres, sqlite',
            );
            expect(() => getEnvConfig({ NETLITE_STORE_DIALECT: 'mysql' })).toThrow(LockConfigError);

        });

        it('should read process.env by default', () => {

            const backup = process.env['NETLITE_LOCK_TABLE'];
            process.env['NETLITE_LOCK_TABLE'] = 'from_process';

            try {

                expect(getEnvConfig().lock?.table).toBe('from_process');

            }
            finally {

                if (backup === undefined) {

                    delete process.env['NETLITE_LOCK_TABLE'];

                }
                else {

                    process.env['NETLITE_LOCK_TABLE'] = backup;

                }

            }

        });

    });

});
