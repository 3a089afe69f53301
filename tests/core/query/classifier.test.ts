/**
 * Query classifier tests.
 */
import { describe, it, expect } from 'vitest';
import {
    normalizeQuery,
    classifyQuery,
    isTransactionStart,
    isWriteQuery,
} from '../../../src/core/query/index.js';

describe('query: classifier', () => {

    describe('normalizeQuery', () => {

        it('should collapse spaces and upper-case', () => {

            expect(normalizeQuery('  select   *  from  users ')).toBe('SELECT * FROM USERS');

        });

        it('should drop tabs and line breaks', () => {

            expect(normalizeQuery('select\n  *\tfrom t')).toBe('SELECT *FROM T');
            expect(normalizeQuery('begin\r\n')).toBe('BEGIN');

        });

        it('should be idempotent', () => {

            const inputs = [
                'insert into "jobs" ("name") values (?)',
                '\tBegin  Immediate\n',
                '',
                'explain query plan select 1',
            ];

            for (const input of inputs) {

                const once = normalizeQuery(input);
                expect(normalizeQuery(once)).toBe(once);

            }

        });

    });

    describe('classifyQuery', () => {

        it('should classify transaction starts in any case or spacing', () => {

            expect(classifyQuery('BEGIN')).toBe('transaction-start');
            expect(classifyQuery('begin')).toBe('transaction-start');
            expect(classifyQuery('   Begin Deferred Transaction')).toBe('transaction-start');
            expect(isTransactionStart('\n\tbegin immediate')).toBe(true);

        });

        it('should classify row retrieval and explain as reads', () => {

            expect(classifyQuery('select * from "jobs"')).toBe('read');
            expect(classifyQuery('  SELECT 1')).toBe('read');
            expect(classifyQuery('explain query plan select * from t')).toBe('read');
            expect(isWriteQuery('Select count(*) from t')).toBe(false);

        });

        it('should classify everything else as a write', () => {

            expect(classifyQuery('insert into "jobs" ("name") values (?)')).toBe('write');
            expect(classifyQuery('update t set x = 1')).toBe('write');
            expect(classifyQuery('delete from t')).toBe('write');
            expect(classifyQuery('create table t (id integer)')).toBe('write');
            expect(classifyQuery('commit')).toBe('write');
            expect(classifyQuery('with x as (select 1) select * from x')).toBe('write');

        });

        it('should classify malformed or empty input without throwing', () => {

            expect(classifyQuery('')).toBe('write');
            expect(classifyQuery('   ')).toBe('write');
            expect(classifyQuery(';;;')).toBe('write');

        });

    });

});
