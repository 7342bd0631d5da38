/**
 * Connection manager.
 *
 * Owns every live driver connection of a session, its SchemaCache and its
 * running query. Queries are non-blocking: `execute` returns a
 * QueryExecution at once and reports progress through its state and
 * `query:state` events.
 *
 * One query runs per connection; a second `execute` throws BusyError
 * synchronously. Cancellation is local first: the execution is marked
 * cancelled immediately and the connection's generation counter moves on,
 * so whatever the driver eventually returns is dropped.
 *
 * @example
 * ```typescript
 * const manager = new ConnectionManager({ driver: new KyselyDriver() })
 *
 * await manager.connect(config, { password: 'test-secret' })
 *
 * const execution = manager.execute('local', 'SELECT * FROM Orders')
 * await execution.settled
 *
 * await manager.closeAll()
 * ```
 */
import { attempt, retry } from '@logosdx/utils';

import { observer as defaultObserver, type CoreObserver } from '../observer.js';
import { SchemaCache } from '../schema/cache.js';
import { withDeadline } from '../shared/deadline.js';
import { classifyStatement, parseUseStatement, splitStatements } from '../sql/statements.js';
import { classifyConnectionError, classifyQueryError } from './classify.js';
import { isSingleConnection } from './dialects/pool.js';
import { KyselyDriver, type Driver, type DriverHandle } from './driver.js';
import {
    BusyError,
    CancelledError,
    NetworkError,
    NotConnectedError,
    type ConnectionError,
} from './errors.js';
import { QueryExecution, type TerminalState } from './execution.js';
import type { ConnectionConfig, ConnectionState, Credentials, QueryResult } from './types.js';
import { CredentialVault } from './vault.js';

export interface ConnectionManagerOptions {
    driver?: Driver;
    observer?: CoreObserver;
    vault?: CredentialVault;

    /** Per-attempt connect limit (default 15s) */
    connectTimeoutMs?: number;

    /** Query limit (default 30s) */
    queryTimeoutMs?: number;

    /** Metadata fetch limit (default 10s) */
    metadataTimeoutMs?: number;
    metadataRetryAfterMs?: number;
    metadataMaxRetryAfterMs?: number;

    /** Retries after the first failed connect attempt, so at most `retries + 1` attempts (network failures only, default 3) */
    retries?: number;

    /** First retry delay (default 500ms), multiplied by `backoff` each time */
    retryDelayMs?: number;
    backoff?: number;
    jitterFactor?: number;

    now?: () => number;
}

/**
 * Live view of a managed connection.
 */
export interface ManagedConnection {
    readonly name: string;
    readonly config: ConnectionConfig;
    readonly state: ConnectionState;

    /** Current database (changed by `USE`) */
    readonly database: string | undefined;

    readonly schema: SchemaCache | null;
    readonly running: QueryExecution | null;
}

interface Entry {
    config: ConnectionConfig;
    state: ConnectionState;
    handle: DriverHandle | null;
    cache: SchemaCache | null;
    running: QueryExecution | null;
    generation: number;
    database: string | undefined;
    abort: AbortController;
}

export class ConnectionManager {

    readonly #driver: Driver;
    readonly #observer: CoreObserver;
    readonly #vault: CredentialVault;
    readonly #now: () => number;

    readonly #connectTimeoutMs: number;
    readonly #queryTimeoutMs: number;
    readonly #metadataTimeoutMs: number;
    readonly #metadataRetryAfterMs: number;
    readonly #metadataMaxRetryAfterMs: number;
    readonly #retries: number;
    readonly #retryDelayMs: number;
    readonly #backoff: number;
    readonly #jitterFactor: number;

    #entries = new Map<string, Entry>();

    constructor(options: ConnectionManagerOptions = {}) {

        this.#driver = options.driver ?? new KyselyDriver();
        this.#observer = options.observer ?? defaultObserver;
        this.#vault = options.vault ?? new CredentialVault();
        this.#now = options.now ?? Date.now;

        this.#connectTimeoutMs = options.connectTimeoutMs ?? 15_000;
        this.#queryTimeoutMs = options.queryTimeoutMs ?? 30_000;
        this.#metadataTimeoutMs = options.metadataTimeoutMs ?? 10_000;
        this.#metadataRetryAfterMs = options.metadataRetryAfterMs ?? 5_000;
        this.#metadataMaxRetryAfterMs = options.metadataMaxRetryAfterMs ?? 60_000;
        this.#retries = options.retries ?? 3;
        this.#retryDelayMs = options.retryDelayMs ?? 500;
        this.#backoff = options.backoff ?? 2;
        this.#jitterFactor = options.jitterFactor ?? 0.1;

    }

    get vault(): CredentialVault {

        return this.#vault;

    }

    // ─────────────────────────────────────────────────────────────
    // Lifecycle
    // ─────────────────────────────────────────────────────────────

    /**
     * Open a connection.
     *
     * Network failures are retried with exponential backoff; auth and
     * driver failures end the attempt at once. On success the cache starts
     * loading the database list in the background.
     *
     * @throws AuthError | NetworkError | DriverError
     */
    async connect(config: ConnectionConfig, credentials?: Credentials): Promise<ManagedConnection> {

        const { name } = config;

        if (credentials) {

            this.#vault.set(name, credentials);

        }

        if (this.#entries.has(name)) {

            await this.disconnect(name);

        }

        const entry: Entry = {
            config,
            state: { status: 'connecting', attempt: 1 },
            handle: null,
            cache: null,
            running: null,
            generation: 0,
            database: config.database,
            abort: new AbortController(),
        };

        this.#entries.set(name, entry);

        const started = this.#now();
        let attemptNo = 0;
        let lastError: ConnectionError | undefined;

        const [handle, err] = await attempt(() => retry(
            async () => {

                attemptNo++;
                entry.state = { status: 'connecting', attempt: attemptNo };
                this.#observer.emit('connection:connecting', { connection: name, dialect: config.dialect, attempt: attemptNo });

                const [opened, raw] = await attempt(() => withDeadline(
                    (signal) => this.#driver.openConnection(config, this.#vault.resolve(name), signal),
                    this.#connectTimeoutMs,
                    () => new NetworkError(name, `Connection timed out after ${this.#connectTimeoutMs}ms`),
                    entry.abort.signal,
                ));

                if (raw || !opened) {

                    lastError = classifyConnectionError(name, raw);
                    throw lastError;

                }

                return opened;

            },
            {
                // The attempt cap below is what bounds the loop
                retries: this.#retries + 1,
                delay: this.#retryDelayMs,
                backoff: this.#backoff,
                jitterFactor: this.#jitterFactor,
                shouldRetry: (error) => {

                    const retryable = error instanceof NetworkError
                        && attemptNo <= this.#retries
                        && !entry.abort.signal.aborted;

                    if (retryable) {

                        this.#observer.emit('connection:retry', { connection: name, attempt: attemptNo, error: error.message });

                    }

                    return retryable;

                },
            },
        ));

        // Disconnected or replaced while connecting
        if (entry.abort.signal.aborted || this.#entries.get(name) !== entry) {

            if (handle) {

                await this.#close(name, handle);

            }

            throw new NotConnectedError(name);

        }

        if (err || !handle) {

            const error = lastError ?? classifyConnectionError(name, err);

            entry.state = { status: 'failed', reason: error.message, error };
            this.#observer.emit('connection:error', { connection: name, kind: error.name, error: error.message });

            throw error;

        }

        entry.handle = handle;
        entry.cache = new SchemaCache({
            connection: name,
            fetch: (scope, signal) => this.#driver.fetchMetadata(handle, scope, signal),
            timeoutMs: this.#metadataTimeoutMs,
            retryAfterMs: this.#metadataRetryAfterMs,
            maxRetryAfterMs: this.#metadataMaxRetryAfterMs,
            now: this.#now,
            observer: this.#observer,
        });
        entry.state = { status: 'connected' };

        this.#observer.emit('connection:open', {
            connection: name,
            dialect: config.dialect,
            durationMs: this.#now() - started,
        });

        void this.#probe(entry.cache);

        return this.#view(entry);

    }

    /**
     * Close a connection. A running query becomes cancelled and the
     * schema cache is dropped. The config is remembered for `reconnect`.
     */
    async disconnect(name: string): Promise<void> {

        const entry = this.#entries.get(name);

        if (!entry) {

            return;

        }

        entry.abort.abort(new NotConnectedError(name));

        if (entry.running) {

            this.cancel(entry.running);

        }

        entry.cache?.invalidate();
        entry.cache = null;

        const handle = entry.handle;
        const wasOpen = handle !== null;

        entry.handle = null;
        entry.state = { status: 'disconnected' };

        if (handle) {

            await this.#close(name, handle);

        }

        if (wasOpen) {

            this.#observer.emit('connection:close', { connection: name });

        }

    }

    /**
     * Disconnect and connect again with the remembered config and
     * session credentials.
     */
    async reconnect(name: string): Promise<ManagedConnection> {

        const entry = this.#entries.get(name);

        if (!entry) {

            throw new NotConnectedError(name);

        }

        await this.disconnect(name);

        return this.connect(entry.config);

    }

    /**
     * Disconnect everything (session teardown).
     */
    async closeAll(): Promise<void> {

        await Promise.all([...this.#entries.keys()].map((name) => this.disconnect(name)));

    }

    // ─────────────────────────────────────────────────────────────
    // Execution
    // ─────────────────────────────────────────────────────────────

    /**
     * Start a query. Returns immediately. A script of several statements
     * runs them in order on the same connection.
     *
     * @throws NotConnectedError when the connection is not open
     * @throws BusyError when a query is already running on it
     */
    execute(name: string, sql: string): QueryExecution {

        const entry = this.#entries.get(name);
        const handle = entry?.handle;

        if (!entry || !handle) {

            throw new NotConnectedError(name);

        }

        if (entry.running) {

            this.#observer.emit('query:busy', { connection: name, runningId: entry.running.id });

            throw new BusyError(name, entry.running.id);

        }

        entry.generation++;

        const execution = new QueryExecution(name, sql, entry.generation);

        entry.running = execution;
        entry.state = { status: 'executing', executionId: execution.id };

        execution.start(this.#now());
        this.#emitState(execution);

        void this.#run(entry, handle, execution);

        return execution;

    }

    /**
     * Cancel an execution. It is `cancelled` when this returns; the
     * driver call is aborted and any later result is dropped.
     *
     * Returns false when the execution had already finished.
     */
    cancel(execution: QueryExecution): boolean {

        if (execution.isTerminal) {

            return false;

        }

        const entry = this.#entries.get(execution.connectionName);
        const error = new CancelledError(execution.id);

        if (entry?.running === execution) {

            entry.generation++;
            entry.running = null;

            if (entry.state.status === 'executing') {

                entry.state = { status: 'connected' };

            }

        }

        execution.controller.abort(error);
        execution.finish({ status: 'cancelled', error }, this.#now());
        this.#emitState(execution);

        return true;

    }

    async #run(entry: Entry, handle: DriverHandle, execution: QueryExecution): Promise<void> {

        const name = execution.connectionName;

        const statements = splitStatements(execution.sql).map((statement) => statement.text);

        const [result, raw] = await attempt(() => withDeadline(
            (signal) => this.#runStatements(entry, handle, statements.length ? statements : [execution.sql], signal),
            this.#queryTimeoutMs,
            () => new NetworkError(name, `Query timed out after ${this.#queryTimeoutMs}ms`),
            execution.signal,
        ));

        // Cancelled or superseded while running
        if (execution.isTerminal || entry.generation !== execution.generation) {

            if (!execution.signal.aborted) {

                this.#observer.emit('query:late-result', { connection: name, executionId: execution.id });

            }

            return;

        }

        entry.running = null;

        if (entry.handle === handle) {

            entry.state = { status: 'connected' };

        }

        let state: TerminalState;

        if (raw || !result) {

            state = { status: 'failed', error: classifyQueryError(name, raw) };

        }
        else {

            state = { status: 'succeeded', result };

        }

        execution.finish(state, this.#now());
        this.#emitState(execution);

    }

    /**
     * Run statements one at a time, stopping at the first failure. The
     * result is the last statement's.
     */
    async #runStatements(entry: Entry, handle: DriverHandle, statements: string[], signal: AbortSignal): Promise<QueryResult> {

        let result: QueryResult = { columns: [], rows: [] };

        for (const statement of statements) {

            signal.throwIfAborted();
            result = await this.#driver.runQuery(handle, statement, signal);

            // The server applied it, even if the execution was cancelled since
            if (entry.handle === handle) {

                this.#afterSuccess(entry, statement);

            }

        }

        return result;

    }

    /**
     * Keep cached metadata and the current database in step with what a
     * successful statement changed.
     */
    #afterSuccess(entry: Entry, sql: string): void {

        if (classifyStatement(sql) === 'ddl') {

            entry.cache?.invalidate();

        }

        // On a wider pool the next query may land on another server connection
        const database = isSingleConnection(entry.config) ? parseUseStatement(sql) : null;

        if (database !== null) {

            entry.database = database;
            this.#observer.emit('connection:database', { connection: entry.config.name, database });

        }

    }

    #emitState(execution: QueryExecution): void {

        const { state } = execution;
        const error = state.status === 'failed' ? state.error.message : undefined;
        const durationMs = execution.durationMs;

        this.#observer.emit('query:state', {
            connection: execution.connectionName,
            executionId: execution.id,
            status: execution.status,
            ...(durationMs === undefined ? {} : { durationMs }),
            ...(error === undefined ? {} : { error }),
        });

    }

    // ─────────────────────────────────────────────────────────────
    // Lookup
    // ─────────────────────────────────────────────────────────────

    schema(name: string): SchemaCache | null {

        return this.#entries.get(name)?.cache ?? null;

    }

    state(name: string): ConnectionState {

        return this.#entries.get(name)?.state ?? { status: 'disconnected' };

    }

    get(name: string): ManagedConnection | undefined {

        const entry = this.#entries.get(name);

        return entry ? this.#view(entry) : undefined;

    }

    list(): ManagedConnection[] {

        return [...this.#entries.values()].map((entry) => this.#view(entry));

    }

    // ─────────────────────────────────────────────────────────────
    // Internals
    // ─────────────────────────────────────────────────────────────

    #view(entry: Entry): ManagedConnection {

        return {
            name: entry.config.name,
            config: entry.config,
            get state() {

                return entry.state;

            },
            get database() {

                return entry.database;

            },
            get schema() {

                return entry.cache;

            },
            get running() {

                return entry.running;

            },
        };

    }

    /**
     * Initial metadata probe. A failure stays recorded in the cache (and
     * is emitted as `schema:failed`), so there is nothing more to do here.
     */
    async #probe(cache: SchemaCache): Promise<void> {

        await attempt(() => cache.listChildren());

    }

    async #close(name: string, handle: DriverHandle): Promise<void> {

        const [, err] = await attempt(() => this.#driver.closeConnection(handle));

        if (err) {

            this.#observer.emit('error', { source: 'connection', error: err, context: { connection: name } });

        }

    }

}
