/**
 * Driver capability.
 *
 * The ConnectionManager talks to databases only through this interface,
 * so tests can put an in-process driver behind it. `KyselyDriver` is the
 * real one: it loads dialect modules lazily, so a missing driver package
 * only matters for the dialect that needs it.
 */
import { sql } from 'kysely';
import { attempt } from '@logosdx/utils';
import type { Kysely } from 'kysely';

import type { MetadataScope, SchemaNodeInput } from '../schema/types.js';
import type { DialectConnection } from './dialects/types.js';
import { DriverError } from './errors.js';
import { fetchScope } from './metadata/index.js';
import type { ConnectionConfig, Credentials, Dialect, QueryResult } from './types.js';

/**
 * Opaque handle for an open driver connection.
 */
export interface DriverHandle {
    readonly dialect: Dialect;
}

export interface Driver {

    /**
     * Open and verify a connection. Rejects with the driver's own error;
     * the manager classifies it.
     */
    openConnection(config: ConnectionConfig, credentials: Credentials, signal: AbortSignal): Promise<DriverHandle>;

    runQuery(handle: DriverHandle, sql: string, signal: AbortSignal): Promise<QueryResult>;

    fetchMetadata(handle: DriverHandle, scope: MetadataScope, signal: AbortSignal): Promise<SchemaNodeInput[]>;

    closeConnection(handle: DriverHandle): Promise<void>;
}

type DialectFactory = (config: ConnectionConfig, credentials: Credentials) => DialectConnection | Promise<DialectConnection>;

type KyselyFactory = (config: ConnectionConfig, credentials: Credentials) => Promise<Kysely<unknown>>;

function withoutDescribe(create: KyselyFactory): DialectFactory {

    return async (config, credentials) => ({ db: await create(config, credentials) });

}

/**
 * Get the dialect factory function.
 *
 * Uses dynamic import to lazy-load dialect modules.
 * This allows the connection module to be imported even when
 * specific database drivers aren't installed.
 */
async function getDialectFactory(dialect: Dialect): Promise<DialectFactory> {

    switch (dialect) {

    case 'sqlite':
        return (await import('./dialects/sqlite.js')).createSqliteConnection;

    case 'postgres':
        return withoutDescribe((await import('./dialects/postgres.js')).createPostgresConnection);

    case 'mysql':
        return withoutDescribe((await import('./dialects/mysql.js')).createMysqlConnection);

    case 'mssql':
        return withoutDescribe((await import('./dialects/mssql.js')).createMssqlConnection);

    }

}

/**
 * Get the install command for a dialect's driver.
 */
export function getInstallCommand(dialect: Dialect): string {

    const commands: Record<Dialect, string> = {
        postgres: 'npm install pg',
        mysql: 'npm install mysql2',
        sqlite: 'npm install better-sqlite3',
        mssql: 'npm install tedious tarn',
    };

    return commands[dialect];

}

/**
 * DriverError naming the install command when a driver package is
 * missing; any other error as is.
 */
function missingDriver(config: ConnectionConfig, error: Error | null): Error {

    const message = error?.message ?? '';

    if (error && !/cannot find (module|package)/i.test(message)) {

        return error;

    }

    const command = getInstallCommand(config.dialect);

    return new DriverError(
        config.name,
        `Missing driver for ${config.dialect}. Install it with:\n${command}`,
        command,
        { cause: error },
    );

}

export class KyselyHandle implements DriverHandle {

    constructor(
        readonly dialect: Dialect,
        readonly db: Kysely<unknown>,
        readonly describe?: (query: string) => string[],
    ) {}

}

/**
 * Driver backed by Kysely dialects.
 *
 * Kysely has no per-query cancellation, so an aborted query keeps running
 * on the server; the manager drops its result.
 *
 * Column names come from the first row. Without rows only SQLite can
 * still name them; the other dialects report none.
 *
 * @example
 * ```typescript
 * const driver = new KyselyDriver()
 * const handle = await driver.openConnection(config, { password: 'test-secret' }, signal)
 * const result = await driver.runQuery(handle, 'SELECT 1 AS one', signal)
 * // { columns: ['one'], rows: [{ one: 1 }] }
 * ```
 */
export class KyselyDriver implements Driver {

    async openConnection(config: ConnectionConfig, credentials: Credentials, signal: AbortSignal): Promise<DriverHandle> {

        const [createFn, importErr] = await attempt(() => getDialectFactory(config.dialect));

        if (importErr || !createFn) {

            throw missingDriver(config, importErr);

        }

        const [opened, createErr] = await attempt(async () => createFn(config, credentials));

        if (createErr || !opened) {

            throw missingDriver(config, createErr);

        }

        const { db, describe } = opened;

        // Test connection with simple query
        const [, probeErr] = await attempt(() => sql`SELECT 1`.execute(db));

        if (probeErr || signal.aborted) {

            await db.destroy();
            throw probeErr ?? signal.reason;

        }

        return new KyselyHandle(config.dialect, db, describe);

    }

    async runQuery(handle: DriverHandle, query: string, signal: AbortSignal): Promise<QueryResult> {

        const { db, describe } = this.#unwrap(handle);

        signal.throwIfAborted();

        const result = await sql.raw<Record<string, unknown>>(query).execute(db);
        const rows = result.rows;
        const firstRow = rows[0];
        const columns = firstRow ? Object.keys(firstRow) : describe?.(query) ?? [];

        // Get affected rows for DML statements
        const rowsAffected = result.numAffectedRows === undefined
            ? undefined
            : Number(result.numAffectedRows);

        return rowsAffected === undefined ? { columns, rows } : { columns, rows, rowsAffected };

    }

    async fetchMetadata(handle: DriverHandle, scope: MetadataScope, signal: AbortSignal): Promise<SchemaNodeInput[]> {

        const { db, dialect } = this.#unwrap(handle);

        signal.throwIfAborted();

        return fetchScope(db, dialect, scope);

    }

    async closeConnection(handle: DriverHandle): Promise<void> {

        await this.#unwrap(handle).db.destroy();

    }

    #unwrap(handle: DriverHandle): KyselyHandle {

        if (!(handle instanceof KyselyHandle)) {

            throw new TypeError(`Not a Kysely handle (${handle.dialect})`);

        }

        return handle;

    }

}
