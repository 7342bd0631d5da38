/**
 * Persistent query history.
 *
 * One JSON index per connection (newest first, capped) plus a gzipped
 * result set per successful query that returned rows.
 *
 * ```
 * <root>/
 * ├── local.json
 * └── local/
 *     └── 0b6f...e1.results.gz
 * ```
 */
import { gzip, gunzip } from 'node:zlib';
import { promisify } from 'node:util';
import { readFile, writeFile, mkdir, unlink, readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { attempt, attemptSync } from '@logosdx/utils';

import { observer as defaultObserver, type CoreObserver } from '../observer.js';
import {
    HistoryFileSchema,
    ResultsFileSchema,
    type ClearResult,
    type HistoryEntry,
    type HistoryEntrySerialized,
    type HistoryFileSerialized,
    type HistoryResult,
} from './types.js';

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

const HISTORY_VERSION = '1.0.0';
const RESULTS_SUFFIX = '.results.gz';

export interface QueryHistoryStoreOptions {

    /** Entries kept in the index (default 500) */
    maxEntries?: number;

    observer?: CoreObserver;
}

/**
 * Query history for one connection.
 *
 * @example
 * ```typescript
 * const store = new QueryHistoryStore(join(homedir(), '.sqlmode', 'history'), 'local')
 *
 * const id = await store.addEntry('SELECT * FROM Orders', result)
 * const recent = await store.getRecent(10)
 * const rows = await store.loadResults(id)
 * ```
 */
export class QueryHistoryStore {

    readonly #connection: string;
    readonly #historyPath: string;
    readonly #resultsDir: string;
    readonly #maxEntries: number;
    readonly #observer: CoreObserver;

    constructor(root: string, connection: string, options: QueryHistoryStoreOptions = {}) {

        this.#connection = connection;
        this.#historyPath = join(root, `${connection}.json`);
        this.#resultsDir = join(root, connection);
        this.#maxEntries = options.maxEntries ?? 500;
        this.#observer = options.observer ?? defaultObserver;

    }

    /**
     * Load history from disk, newest first.
     *
     * A missing or unreadable index is an empty history.
     */
    async load(): Promise<HistoryEntry[]> {

        const [content, err] = await attempt(() => readFile(this.#historyPath, 'utf-8'));

        if (err || typeof content !== 'string') {

            return [];

        }

        const [json, parseErr] = attemptSync((): unknown => JSON.parse(content));

        if (parseErr) {

            return [];

        }

        const parsed = HistoryFileSchema.safeParse(json);

        if (!parsed.success) {

            return [];

        }

        return parsed.data.entries.map(deserialize);

    }

    /**
     * Record a query and, when it returned rows, its results.
     *
     * @returns The new entry ID
     */
    async addEntry(query: string, result: HistoryResult): Promise<string> {

        await mkdir(this.#resultsDir, { recursive: true });

        const id = randomUUID();
        const entry: HistoryEntry = {
            id,
            query,
            executedAt: new Date(),
            durationMs: result.durationMs,
            success: result.success,
        };

        if (result.errorMessage !== undefined) {

            entry.errorMessage = result.errorMessage;

        }

        const rowCount = result.rows?.length ?? result.rowsAffected;

        if (rowCount !== undefined) {

            entry.rowCount = rowCount;

        }

        if (result.success && result.rows && result.rows.length > 0) {

            await this.saveResults(id, result);
            entry.resultsFile = `${id}${RESULTS_SUFFIX}`;

        }

        const entries = await this.load();
        entries.unshift(entry);

        const dropped = entries.splice(this.#maxEntries);

        await this.#removeResults(dropped);
        await this.#saveHistory(entries);

        this.#observer.emit('history:saved', { connection: this.#connection, id, success: result.success });

        return id;

    }

    async saveResults(id: string, result: HistoryResult): Promise<void> {

        await mkdir(this.#resultsDir, { recursive: true });

        const data = JSON.stringify({
            columns: result.columns ?? [],
            rows: result.rows ?? [],
        });

        const compressed = await gzipAsync(data);

        await writeFile(join(this.#resultsDir, `${id}${RESULTS_SUFFIX}`), compressed);

    }

    /**
     * Load a stored result set, or null when there is none.
     */
    async loadResults(id: string): Promise<HistoryResult | null> {

        const [compressed, err] = await attempt(() => readFile(join(this.#resultsDir, `${id}${RESULTS_SUFFIX}`)));

        if (err || !compressed) {

            return null;

        }

        const decompressed = await gunzipAsync(compressed);
        const [json, parseErr] = attemptSync((): unknown => JSON.parse(decompressed.toString()));

        if (parseErr) {

            return null;

        }

        const parsed = ResultsFileSchema.safeParse(json);

        if (!parsed.success) {

            return null;

        }

        return {
            success: true,
            columns: parsed.data.columns,
            rows: parsed.data.rows,
            durationMs: 0, // Not stored in results file
        };

    }

    async getRecent(limit = 50): Promise<HistoryEntry[]> {

        const entries = await this.load();

        return entries.slice(0, limit);

    }

    /**
     * Remove entries older than the given number of months.
     */
    async clearOlderThan(months: number, now: Date = new Date()): Promise<ClearResult> {

        const entries = await this.load();
        const cutoff = new Date(now);
        cutoff.setMonth(cutoff.getMonth() - months);

        const toKeep = entries.filter((entry) => entry.executedAt >= cutoff);
        const toRemove = entries.filter((entry) => entry.executedAt < cutoff);

        const filesRemoved = await this.#removeResults(toRemove);

        await this.#saveHistory(toKeep);

        this.#observer.emit('history:cleared', { connection: this.#connection, entriesRemoved: toRemove.length });

        return { entriesRemoved: toRemove.length, filesRemoved };

    }

    async clearAll(): Promise<ClearResult> {

        const entries = await this.load();

        let filesRemoved = 0;
        const [files] = await attempt(() => readdir(this.#resultsDir));

        for (const file of files ?? []) {

            if (!file.endsWith(RESULTS_SUFFIX)) continue;

            const [, err] = await attempt(() => unlink(join(this.#resultsDir, file)));

            if (!err) {

                filesRemoved++;

            }

        }

        await this.#saveHistory([]);

        this.#observer.emit('history:cleared', { connection: this.#connection, entriesRemoved: entries.length });

        return { entriesRemoved: entries.length, filesRemoved };

    }

    /**
     * Entry count and total size of stored results in bytes.
     */
    async getStats(): Promise<{ entryCount: number; resultsSize: number }> {

        const entries = await this.load();
        let resultsSize = 0;

        const [files] = await attempt(() => readdir(this.#resultsDir));

        for (const file of files ?? []) {

            if (!file.endsWith(RESULTS_SUFFIX)) continue;

            const [stats] = await attempt(() => stat(join(this.#resultsDir, file)));

            if (stats) {

                resultsSize += stats.size;

            }

        }

        return { entryCount: entries.length, resultsSize };

    }

    async #removeResults(entries: HistoryEntry[]): Promise<number> {

        let removed = 0;

        for (const entry of entries) {

            if (!entry.resultsFile) continue;

            const file = entry.resultsFile;
            const [, err] = await attempt(() => unlink(join(this.#resultsDir, file)));

            if (!err) {

                removed++;

            }

        }

        return removed;

    }

    async #saveHistory(entries: HistoryEntry[]): Promise<void> {

        await mkdir(this.#resultsDir, { recursive: true });

        const file: HistoryFileSerialized = {
            version: HISTORY_VERSION,
            entries: entries.map(serialize),
        };

        await writeFile(this.#historyPath, JSON.stringify(file, null, 2));

    }

}

function serialize(entry: HistoryEntry): HistoryEntrySerialized {

    return { ...entry, executedAt: entry.executedAt.toISOString() };

}

function deserialize(entry: HistoryEntrySerialized): HistoryEntry {

    const result: HistoryEntry = {
        id: entry.id,
        query: entry.query,
        executedAt: new Date(entry.executedAt),
        durationMs: entry.durationMs,
        success: entry.success,
    };

    if (entry.errorMessage !== undefined) result.errorMessage = entry.errorMessage;
    if (entry.rowCount !== undefined) result.rowCount = entry.rowCount;
    if (entry.resultsFile !== undefined) result.resultsFile = entry.resultsFile;

    return result;

}
