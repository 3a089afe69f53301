/**
 * Locked SQLite dialect tests.
 *
 * Runs Kysely over in-memory SQLite with an in-memory lock store.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Kysely, sql } from 'kysely';
import Database from 'better-sqlite3';

import { LockedSqliteDialect } from '../../../src/core/session/index.js';
import {
    LockManager,
    LockRequiredError,
    MemoryLockStore,
} from '../../../src/core/lock/index.js';
import { observer, type NetliteEventNames } from '../../../src/core/observer.js';
import {
    createIdGenerator,
    createManualClock,
    createMarker,
    type ManualClock,
} from '../../utils/lock.js';

interface TestDatabase {
    jobs: {
        id: number;
        name: string;
    };
}

const RESOURCE = '/data/app.db';

describe('session: locked sqlite dialect', () => {

    let store: MemoryLockStore;
    let clock: ManualClock;
    let marker: ReturnType<typeof createMarker>;
    let lock: LockManager;
    let db: Kysely<TestDatabase>;
    const cleanups: Array<() => void> = [];

    function listen(event: NetliteEventNames): unknown[] {

        const events: unknown[] = [];
        cleanups.push(observer.on(event, (data) => events.push(data)));
        return events;

    }

    function createDb(pragmas?: string[]): Kysely<TestDatabase> {

        return new Kysely<TestDatabase>({
            dialect: new LockedSqliteDialect({
                lock,
                sqlite: { database: new Database(':memory:') },
                pragmas,
            }),
        });

    }

    beforeEach(() => {

        store = new MemoryLockStore();
        clock = createManualClock(1000);
        marker = createMarker(false);
        lock = new LockManager({
            resource: RESOURCE,
            store,
            settings: { expiration: 10 },
            clock,
            marker,
            generateId: createIdGenerator(),
        });
        db = createDb();

    });

    afterEach(async () => {

        for (const cleanup of cleanups.splice(0)) {

            cleanup();

        }

        marker.present = false;
        await db.destroy();
        vi.restoreAllMocks();

    });

    async function createJobsTable(): Promise<void> {

        await db.schema
            .createTable('jobs')
            .addColumn('id', 'integer', (col) => col.primaryKey())
            .addColumn('name', 'text', (col) => col.notNull())
            .execute();

    }

    describe('statements', () => {

        it('should acquire and release around a write', async () => {

            await createJobsTable();

            const put = vi.spyOn(store, 'conditionalPut');
            const remove = vi.spyOn(store, 'conditionalDelete');

            await db.insertInto('jobs').values({ id: 1, name: 'sync' }).execute();

            expect(put).toHaveBeenCalledTimes(1);
            expect(remove).toHaveBeenCalledTimes(1);
            expect(remove).toHaveBeenCalledWith('database#/data/app.db', 'lock-2');
            expect(store.size).toBe(0);
            expect(lock.phase).toBe('unlocked');

        });

        it('should run reads without touching the lock store', async () => {

            await createJobsTable();
            await db.insertInto('jobs').values({ id: 1, name: 'sync' }).execute();

            const put = vi.spyOn(store, 'conditionalPut');
            const remove = vi.spyOn(store, 'conditionalDelete');

            const rows = await db.selectFrom('jobs').selectAll().execute();

            expect(rows).toEqual([{ id: 1, name: 'sync' }]);
            expect(put).not.toHaveBeenCalled();
            expect(remove).not.toHaveBeenCalled();

        });

        it('should stream reads inside one guard', async () => {

            await createJobsTable();
            await db.insertInto('jobs').values([
                { id: 1, name: 'a' },
                { id: 2, name: 'b' },
            ]).execute();

            const put = vi.spyOn(store, 'conditionalPut');
            const names: string[] = [];

            for await (const row of db.selectFrom('jobs').select('name').orderBy('id').stream()) {

                names.push(row.name);
                expect(lock.state.pendingQuery).toBe('SELECT "NAME" FROM "JOBS" ORDER BY "ID"');

            }

            expect(names).toEqual(['a', 'b']);
            expect(put).not.toHaveBeenCalled();
            expect(lock.state.pendingQuery).toBeNull();

        });

    });

    describe('transactions', () => {

        it('should hold one lock from begin to commit', async () => {

            await createJobsTable();

            const put = vi.spyOn(store, 'conditionalPut');
            const remove = vi.spyOn(store, 'conditionalDelete');
            const phases: string[] = [];

            await db.transaction().execute(async (trx) => {

                await trx.insertInto('jobs').values({ id: 1, name: 'a' }).execute();
                await trx.insertInto('jobs').values({ id: 2, name: 'b' }).execute();
                phases.push(lock.phase);

            });

            expect(phases).toEqual(['locked-in-transaction']);
            expect(put).toHaveBeenCalledTimes(1);
            expect(remove).toHaveBeenCalledTimes(1);
            expect(lock.phase).toBe('unlocked');
            expect(lock.inTransaction).toBe(false);

            const rows = await db.selectFrom('jobs').select('id').orderBy('id').execute();
            expect(rows).toEqual([{ id: 1 }, { id: 2 }]);

        });

        it('should release on rollback', async () => {

            await createJobsTable();

            await expect(
                db.transaction().execute(async (trx) => {

                    await trx.insertInto('jobs').values({ id: 1, name: 'a' }).execute();
                    throw new Error('abort');

                }),
            ).rejects.toThrow('abort');

            expect(lock.phase).toBe('unlocked');
            expect(store.size).toBe(0);

            const rows = await db.selectFrom('jobs').selectAll().execute();
            expect(rows).toEqual([]);

        });

        it('should refuse to commit after the lease expired', async () => {

            await createJobsTable();

            await expect(
                db.transaction().execute(async (trx) => {

                    await trx.insertInto('jobs').values({ id: 1, name: 'a' }).execute();
                    clock.advance(11);

                }),
            ).rejects.toBeInstanceOf(LockRequiredError);

        });

    });

    describe('connect and close', () => {

        it('should open without the lock when there is no crash marker', async () => {

            const put = vi.spyOn(store, 'conditionalPut');
            const opened = listen('session:open');

            await sql`select 1`.execute(db);

            expect(put).not.toHaveBeenCalled();
            expect(opened).toEqual([{ resource: RESOURCE }]);

        });

        it('should acquire before connecting under a crash marker', async () => {

            marker.present = true;

            const put = vi.spyOn(store, 'conditionalPut');
            const remove = vi.spyOn(store, 'conditionalDelete');
            const warnings = listen('session:recovery:warning');

            await sql`select 1`.execute(db);

            expect(warnings).toEqual([{ resource: RESOURCE, phase: 'connect' }]);
            expect(put).toHaveBeenCalledTimes(1);
            expect(remove).toHaveBeenCalledTimes(1);
            expect(lock.phase).toBe('unlocked');

        });

        it('should skip closing under a crash marker', async () => {

            await sql`select 1`.execute(db);
            marker.present = true;

            const remove = vi.spyOn(store, 'conditionalDelete');
            const skipped = listen('session:close:skip');
            const closed = listen('session:close');

            await db.destroy();

            expect(skipped).toHaveLength(1);
            expect(closed).toEqual([]);
            expect(remove).not.toHaveBeenCalled();

        });

        it('should take the lock to close an open transaction', async () => {

            await sql`select 1`.execute(db);
            await lock.guard('BEGIN', async () => undefined);
            clock.advance(11);

            const put = vi.spyOn(store, 'conditionalPut');
            const closed = listen('session:close');

            await db.destroy();

            expect(put).toHaveBeenCalledTimes(1);
            expect(closed).toEqual([{ resource: RESOURCE }]);
            expect(lock.inTransaction).toBe(false);
            expect(store.size).toBe(0);

        });

    });

    describe('pragmas', () => {

        it('should apply the network filesystem pragmas on connect', async () => {

            const tempStore = await sql<{ temp_store: number }>`PRAGMA temp_store`.execute(db);
            const cacheSize = await sql<{ cache_size: number }>`PRAGMA cache_size`.execute(db);

            expect(tempStore.rows).toEqual([{ temp_store: 2 }]);
            expect(cacheSize.rows).toEqual([{ cache_size: -262144 }]);

        });

        it('should use custom pragmas instead of the defaults', async () => {

            await db.destroy();
            db = createDb(['PRAGMA temp_store = FILE']);

            const tempStore = await sql<{ temp_store: number }>`PRAGMA temp_store`.execute(db);

            expect(tempStore.rows).toEqual([{ temp_store: 1 }]);

        });

    });

});
