import { describe, it, expect, beforeEach, afterAll } from 'vitest';
import { writeFile, mkdir, readdir, rm } from 'node:fs/promises';
import { join } from 'node:path';

import { QueryHistoryStore } from '../../../src/core/history/store.js';
import type { HistoryEntrySerialized, HistoryResult } from '../../../src/core/history/types.js';
import { createObserver } from '../../../src/core/observer.js';
import { record } from '../../utils/events.js';

const TMP_DIR = join(import.meta.dirname, '..', '..', 'tmp', 'history-test');

const SELECTED: HistoryResult = {
    success: true,
    columns: ['OrderId', 'Total'],
    rows: [{ OrderId: 1, Total: 20 }, { OrderId: 2, Total: 35 }],
    durationMs: 12,
};

describe('history: QueryHistoryStore', () => {

    beforeEach(async () => {

        await rm(TMP_DIR, { recursive: true, force: true });
        await mkdir(TMP_DIR, { recursive: true });

    });

    afterAll(async () => {

        await rm(TMP_DIR, { recursive: true, force: true });

    });

    describe('load', () => {

        it('should return an empty history when no file exists', async () => {

            expect(await new QueryHistoryStore(TMP_DIR, 'local').load()).toEqual([]);

        });

        it('should return an empty history for corrupted JSON', async () => {

            await writeFile(join(TMP_DIR, 'local.json'), '{ invalid json }', 'utf-8');

            expect(await new QueryHistoryStore(TMP_DIR, 'local').load()).toEqual([]);

        });

        it('should deserialize dates', async () => {

            const entry: HistoryEntrySerialized = {
                id: 'entry-1',
                query: 'SELECT 1',
                executedAt: '2026-03-01T10:00:00.000Z',
                durationMs: 3,
                success: true,
            };

            await writeFile(join(TMP_DIR, 'local.json'), JSON.stringify({ version: '1.0.0', entries: [entry] }), 'utf-8');

            const [loaded] = await new QueryHistoryStore(TMP_DIR, 'local').load();

            expect(loaded?.executedAt).toEqual(new Date('2026-03-01T10:00:00.000Z'));
            expect(loaded?.query).toBe('SELECT 1');

        });

    });

    describe('addEntry', () => {

        it('should store the entry newest first with its results', async () => {

            const observer = createObserver();
            const saved = record(observer, 'history:saved');
            const store = new QueryHistoryStore(TMP_DIR, 'local', { observer });

            await store.addEntry('SELECT 1', { success: true, columns: ['one'], rows: [{ one: 1 }], durationMs: 1 });
            const id = await store.addEntry('SELECT * FROM Orders', SELECTED);

            const [latest, earlier] = await store.getRecent();

            expect(latest).toMatchObject({ id, query: 'SELECT * FROM Orders', rowCount: 2, success: true, resultsFile: `${id}.results.gz` });
            expect(earlier?.query).toBe('SELECT 1');
            expect(saved).toEqual([
                { connection: 'local', id: earlier?.id, success: true },
                { connection: 'local', id, success: true },
            ]);

            expect(await store.loadResults(id)).toEqual({
                success: true,
                columns: ['OrderId', 'Total'],
                rows: [{ OrderId: 1, Total: 20 }, { OrderId: 2, Total: 35 }],
                durationMs: 0,
            });

        });

        it('should keep the error message and skip results for failures', async () => {

            const store = new QueryHistoryStore(TMP_DIR, 'local');

            const id = await store.addEntry('SELECT * FROM Nope', {
                success: false,
                errorMessage: "Invalid object name 'Nope'.",
                durationMs: 4,
            });

            const [entry] = await store.load();

            expect(entry).toMatchObject({ id, success: false, errorMessage: "Invalid object name 'Nope'." });
            expect(entry?.resultsFile).toBeUndefined();
            expect(await store.loadResults(id)).toBeNull();

        });

        it('should record rows affected as the row count for DML', async () => {

            const store = new QueryHistoryStore(TMP_DIR, 'local');

            await store.addEntry('DELETE FROM Orders', { success: true, rowsAffected: 7, durationMs: 2 });

            const [entry] = await store.load();

            expect(entry?.rowCount).toBe(7);
            expect(entry?.resultsFile).toBeUndefined();

        });

        it('should cap the history and delete results of dropped entries', async () => {

            const store = new QueryHistoryStore(TMP_DIR, 'local', { maxEntries: 2 });

            await store.addEntry('SELECT 1', SELECTED);
            await store.addEntry('SELECT 2', SELECTED);
            await store.addEntry('SELECT 3', SELECTED);

            const entries = await store.load();
            const files = await readdir(join(TMP_DIR, 'local'));

            expect(entries.map((e) => e.query)).toEqual(['SELECT 3', 'SELECT 2']);
            expect(files.sort()).toEqual(entries.map((e) => `${e.id}.results.gz`).sort());

        });

    });

    describe('clearing', () => {

        it('should remove entries older than the cutoff', async () => {

            const old: HistoryEntrySerialized = {
                id: 'old',
                query: 'SELECT 0',
                executedAt: '2026-01-01T00:00:00.000Z',
                durationMs: 1,
                success: true,
            };
            const recent: HistoryEntrySerialized = { ...old, id: 'recent', executedAt: '2026-06-01T00:00:00.000Z' };

            await writeFile(join(TMP_DIR, 'local.json'), JSON.stringify({ version: '1.0.0', entries: [recent, old] }), 'utf-8');

            const store = new QueryHistoryStore(TMP_DIR, 'local');
            const result = await store.clearOlderThan(3, new Date('2026-06-15T00:00:00.000Z'));

            expect(result).toEqual({ entriesRemoved: 1, filesRemoved: 0 });
            expect((await store.load()).map((e) => e.id)).toEqual(['recent']);

        });

        it('should clear everything', async () => {

            const store = new QueryHistoryStore(TMP_DIR, 'local');

            await store.addEntry('SELECT 1', SELECTED);
            await store.addEntry('SELECT 2', { success: true, rowsAffected: 0, durationMs: 1 });

            expect(await store.clearAll()).toEqual({ entriesRemoved: 2, filesRemoved: 1 });
            expect(await store.getStats()).toEqual({ entryCount: 0, resultsSize: 0 });

        });

    });

});
