/**
 * In-process Driver for connection manager, session and CLI tests.
 */
import type { Driver, DriverHandle } from '../../src/core/connection/driver.js';
import type { ConnectionConfig, Credentials, QueryResult } from '../../src/core/connection/types.js';
import type { MetadataScope, SchemaNodeInput } from '../../src/core/schema/types.js';
import { SHOP_CATALOG, createFakeFetcher, type FakeDatabase } from './fake-metadata.js';

export type QueryResponder = (sql: string, signal: AbortSignal) => QueryResult | Promise<QueryResult>;

/**
 * Error shaped like a driver's: a message plus an optional code.
 */
export class FakeDriverFailure extends Error {

    constructor(message: string, public readonly code?: string) {

        super(message);

    }

}

export interface FakeDriverOptions {
    catalog?: FakeDatabase[];
    respond?: QueryResponder;
}

const EMPTY: QueryResult = { columns: [], rows: [] };

export class FakeDriver implements Driver {

    /** Failures thrown by the next opens, in order */
    openFailures: Error[] = [];

    opened: { config: ConnectionConfig; credentials: Credentials }[] = [];
    queries: string[] = [];
    closed = 0;

    respond: QueryResponder;

    readonly metadataCalls: MetadataScope[];
    readonly #fetch: (scope: MetadataScope, signal: AbortSignal) => Promise<SchemaNodeInput[]>;

    constructor(options: FakeDriverOptions = {}) {

        const { fetch, calls } = createFakeFetcher(options.catalog ?? SHOP_CATALOG);

        this.#fetch = fetch;
        this.metadataCalls = calls;
        this.respond = options.respond ?? (() => EMPTY);

    }

    async openConnection(config: ConnectionConfig, credentials: Credentials): Promise<DriverHandle> {

        this.opened.push({ config, credentials });

        const failure = this.openFailures.shift();

        if (failure) {

            throw failure;

        }

        return { dialect: config.dialect };

    }

    async runQuery(_handle: DriverHandle, sql: string, signal: AbortSignal): Promise<QueryResult> {

        this.queries.push(sql);

        return this.respond(sql, signal);

    }

    async fetchMetadata(_handle: DriverHandle, scope: MetadataScope, signal: AbortSignal): Promise<SchemaNodeInput[]> {

        return this.#fetch(scope, signal);

    }

    async closeConnection(): Promise<void> {

        this.closed++;

    }

}

export const LOCAL: ConnectionConfig = {
    name: 'local',
    dialect: 'mssql',
    host: 'localhost',
    database: 'shop',
    auth: { method: 'password', user: 'sa' },
};
