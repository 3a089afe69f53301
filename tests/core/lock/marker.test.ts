/**
 * Crash marker tests.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { journalMarker, journalPath } from '../../../src/core/lock/index.js';

describe('lock: marker', () => {

    let dir: string;

    beforeEach(() => {

        dir = mkdtempSync(join(process.cwd(), 'tmp', 'marker-'));

    });

    afterEach(() => {

        rmSync(dir, { recursive: true, force: true });

    });

    it('should point at the rollback journal', () => {

        expect(journalPath('/mnt/shared/app.db')).toBe('/mnt/shared/app.db-journal');

    });

    it('should report a missing journal', async () => {

        const marker = journalMarker(join(dir, 'app.db'));

        expect(await marker.exists()).toBe(false);

    });

    it('should report a present journal', async () => {

        const database = join(dir, 'app.db');
        writeFileSync(`${database}-journal`, '');

        expect(await journalMarker(database).exists()).toBe(true);

    });

});
