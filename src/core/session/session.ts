/**
 * Query session.
 *
 * Composes one ModalEditor, the AutocompleteEngine and a
 * ConnectionManager behind a single event-driven surface. The UI sends
 * key events to `handleKey` and renders from the session's events; it
 * never touches the editor or the manager's internals.
 *
 * Key handling is synchronous. Completions and query results arrive
 * later and are applied in their own continuations, so a late result can
 * never interleave with a key press.
 *
 * @example
 * ```typescript
 * const session = new QuerySession({ connections: new FileConnectionStore() })
 *
 * session.events.on('completion:changed', ({ candidates }) => renderMenu(candidates))
 * session.events.on('execution:changed', ({ execution }) => renderResult(execution))
 *
 * await session.connect('local')
 * session.handleKey({ key: 'i' })
 * ```
 */
import { writeFile } from 'node:fs/promises';
import { ObserverEngine } from '@logosdx/observer';
import { attempt, attemptSync } from '@logosdx/utils';

import { AutocompleteEngine, acceptCompletion, type CompletionCandidate, type CompletionSource } from '../completion/engine.js';
import { CompletionScheduler } from '../completion/scheduler.js';
import { ConnectionManager } from '../connection/manager.js';
import type { QueryExecution } from '../connection/execution.js';
import type { ConnectionConfig, Credentials } from '../connection/types.js';
import { cursorOffset } from '../editor/buffer.js';
import { ModalEditor } from '../editor/editor.js';
import type { EditorCommand, KeyEvent, KeyOutcome } from '../editor/types.js';
import type { HistoryResult } from '../history/types.js';
import { createDefaultSettings } from '../settings/defaults.js';
import type { Settings } from '../settings/schema.js';
import { statementAt } from '../sql/statements.js';
import type { ConnectionLookup } from '../store/connections.js';
import type { QueryHistoryStore } from '../history/store.js';
import { NoActiveConnectionError, UnknownConnectionError } from './errors.js';
import type { QuerySessionOptions, SessionEvents, SessionObserver } from './types.js';

/**
 * Build a ConnectionManager configured from settings.
 */
export function createManager(settings: Settings): ConnectionManager {

    return new ConnectionManager({
        connectTimeoutMs: settings.connection.timeoutMs,
        queryTimeoutMs: settings.query.timeoutMs,
        metadataTimeoutMs: settings.metadata.timeoutMs,
        metadataRetryAfterMs: settings.metadata.retryAfterMs,
        metadataMaxRetryAfterMs: settings.metadata.maxRetryAfterMs,
        retries: settings.connection.retries,
        retryDelayMs: settings.connection.retryDelayMs,
        backoff: settings.connection.backoff,
    });

}

/**
 * What to persist for a finished execution.
 */
export function toHistoryResult(execution: QueryExecution): HistoryResult | null {

    const { state } = execution;
    const durationMs = execution.durationMs ?? 0;

    switch (state.status) {

    case 'succeeded': {

        const result: HistoryResult = {
            success: true,
            columns: state.result.columns,
            rows: state.result.rows,
            durationMs,
        };

        if (state.result.rowsAffected !== undefined) {

            result.rowsAffected = state.result.rowsAffected;

        }

        return result;

    }

    case 'failed':
    case 'cancelled':
        return { success: false, errorMessage: state.error.message, durationMs };

    case 'pending':
    case 'running':
        return null;

    }

}

export class QuerySession {

    readonly #events: SessionObserver = new ObserverEngine<SessionEvents>({ name: 'session' });
    readonly #editor: ModalEditor;
    readonly #manager: ConnectionManager;
    readonly #ownsManager: boolean;
    readonly #engine: AutocompleteEngine;
    readonly #scheduler: CompletionScheduler;
    readonly #connections: ConnectionLookup | undefined;
    readonly #historyStore: ((connection: string) => QueryHistoryStore | null) | undefined;
    readonly #historySize: number;

    #file: string | undefined;
    #active: string | null = null;
    #completions: CompletionCandidate[] = [];
    #selected = 0;
    #current: QueryExecution | null = null;
    #history: QueryExecution[] = [];
    #closed = false;

    constructor(options: QuerySessionOptions = {}) {

        const settings = options.settings ?? createDefaultSettings();

        this.#editor = new ModalEditor({
            text: options.text ?? '',
            undoLimit: settings.editor.undoLimit,
            tabWidth: settings.editor.tabWidth,
        });

        this.#ownsManager = options.manager === undefined;
        this.#manager = options.manager ?? createManager(settings);
        this.#connections = options.connections;
        this.#historyStore = settings.history.persist ? options.history : undefined;
        this.#historySize = settings.history.size;
        this.#file = options.file;

        this.#engine = new AutocompleteEngine({
            source: () => this.#completionSource(),
            maxResults: settings.completion.maxResults,
        });

        this.#scheduler = new CompletionScheduler({
            complete: (text, cursor) => this.#engine.complete(text, cursor),
            debounceMs: settings.completion.debounceMs,
            onResult: (candidates) => this.#setCompletions(candidates),
            onError: (error) => this.#events.emit('error', { source: 'completion', error }),
        });

    }

    // ─────────────────────────────────────────────────────────────
    // State
    // ─────────────────────────────────────────────────────────────

    get events(): SessionObserver {

        return this.#events;

    }

    get editor(): ModalEditor {

        return this.#editor;

    }

    get manager(): ConnectionManager {

        return this.#manager;

    }

    /** Active connection name */
    get connection(): string | null {

        return this.#active;

    }

    get completions(): readonly CompletionCandidate[] {

        return this.#completions;

    }

    get selectedCompletion(): number {

        return this.#selected;

    }

    /** Execution in flight, if any */
    get current(): QueryExecution | null {

        return this.#current;

    }

    /** Finished executions, newest first */
    get history(): readonly QueryExecution[] {

        return this.#history;

    }

    // ─────────────────────────────────────────────────────────────
    // Keys
    // ─────────────────────────────────────────────────────────────

    /**
     * Route a key press.
     *
     * While the completion menu is open in insert mode, `tab` accepts the
     * selected candidate and `ctrl+n`/`ctrl+p` move the selection;
     * everything else goes to the editor. Any edit closes the menu until
     * the next result arrives.
     */
    handleKey(event: KeyEvent): KeyOutcome {

        if (this.#closed) {

            return { changed: false };

        }

        if (this.#completions.length > 0 && this.#editor.mode === 'insert') {

            if (event.key === 'tab' && !event.shift) {

                return { changed: this.acceptCompletion() };

            }

            if (event.ctrl && (event.key === 'n' || event.key === 'p')) {

                this.selectCompletion(event.key === 'n' ? 1 : -1);

                return { changed: false };

            }

        }

        const outcome = this.#editor.handleKey(event);

        if (outcome.changed) {

            // Candidates were computed for the old text
            this.#dismiss();
            this.#emitBuffer();

        }

        if (outcome.previousMode !== undefined) {

            this.#events.emit('mode:changed', { mode: this.#editor.mode, previous: outcome.previousMode });

            if (this.#editor.mode !== 'insert') {

                this.#dismiss();

            }

        }

        switch (outcome.signal?.type) {

        case 'execute':
            this.#report({ type: 'run' }, () => this.executeStatement());
            break;

        case 'command':
            void this.runCommand(outcome.signal.command);
            break;

        case 'complete':
            void this.#scheduler.request(this.#editor.text, cursorOffset(this.#editor.buffer));
            break;

        case 'dismiss':
            this.#dismiss();
            break;

        case undefined:
            break;

        }

        return outcome;

    }

    // ─────────────────────────────────────────────────────────────
    // Completion
    // ─────────────────────────────────────────────────────────────

    /**
     * Move the menu selection, wrapping at either end.
     */
    selectCompletion(delta: number): void {

        const count = this.#completions.length;

        if (count === 0) return;

        this.#selected = (((this.#selected + delta) % count) + count) % count;
        this.#events.emit('completion:changed', { candidates: this.#completions, selected: this.#selected });

    }

    /**
     * Accept a candidate (the selected one by default) and close the menu.
     *
     * Returns false when the buffer changed under the candidate.
     */
    acceptCompletion(index = this.#selected): boolean {

        const candidate = this.#completions[index];

        this.#dismiss();

        if (!candidate) {

            return false;

        }

        const next = acceptCompletion(this.#editor.buffer, candidate);

        if (!next) {

            return false;

        }

        this.#editor.applyEdit(next);
        this.#emitBuffer();

        return true;

    }

    #completionSource(): CompletionSource | undefined {

        const connection = this.#active ? this.#manager.get(this.#active) : undefined;
        const schema = connection?.schema;

        if (!connection || !schema) {

            return undefined;

        }

        return connection.database === undefined
            ? { schema }
            : { schema, database: connection.database };

    }

    #setCompletions(candidates: CompletionCandidate[]): void {

        // Left insert mode while the request was pending
        if (this.#editor.mode !== 'insert') return;

        this.#completions = candidates;
        this.#selected = 0;
        this.#events.emit('completion:changed', { candidates, selected: 0 });

    }

    #dismiss(): void {

        this.#scheduler.cancel();

        if (this.#completions.length === 0) return;

        this.#completions = [];
        this.#selected = 0;
        this.#events.emit('completion:changed', { candidates: [], selected: 0 });

    }

    // ─────────────────────────────────────────────────────────────
    // Connections
    // ─────────────────────────────────────────────────────────────

    /**
     * Connect and make the connection active.
     *
     * @throws UnknownConnectionError when a name is not saved
     * @throws AuthError | NetworkError | DriverError
     */
    async connect(target: string | ConnectionConfig, credentials?: Credentials): Promise<void> {

        const config = typeof target === 'string' ? await this.#lookup(target) : target;

        await this.#manager.connect(config, credentials);

        this.#active = config.name;
        this.#events.emit('connection:changed', { connection: config.name });

    }

    async disconnect(): Promise<void> {

        const active = this.#active;

        if (active === null) return;

        this.#active = null;
        await this.#manager.disconnect(active);
        this.#events.emit('connection:changed', { connection: null });

    }

    /**
     * Drop the active connection's cached metadata.
     */
    refresh(): void {

        this.#manager.schema(this.#requireConnection())?.refresh();

    }

    async #lookup(name: string): Promise<ConnectionConfig> {

        const config = await this.#connections?.get(name);

        if (!config) {

            throw new UnknownConnectionError(name);

        }

        return config;

    }

    #requireConnection(): string {

        if (this.#active === null) {

            throw new NoActiveConnectionError();

        }

        return this.#active;

    }

    // ─────────────────────────────────────────────────────────────
    // Execution
    // ─────────────────────────────────────────────────────────────

    /**
     * Run SQL on the active connection.
     *
     * @throws NoActiveConnectionError
     * @throws BusyError when a query is already running
     */
    execute(sql: string): QueryExecution {

        const execution = this.#manager.execute(this.#requireConnection(), sql);

        this.#current = execution;
        this.#events.emit('execution:changed', { execution, status: execution.status });

        void execution.settled.then((settled) => this.#finished(settled));

        return execution;

    }

    /**
     * Run the statement under the cursor. Null when it is blank.
     */
    executeStatement(): QueryExecution | null {

        const statement = statementAt(this.#editor.text, cursorOffset(this.#editor.buffer));

        return statement.text ? this.execute(statement.text) : null;

    }

    /**
     * Run the whole buffer. Null when it is blank.
     */
    executeBuffer(): QueryExecution | null {

        const text = this.#editor.text.trim();

        return text ? this.execute(text) : null;

    }

    /**
     * Cancel the execution in flight. False when there is none.
     */
    cancel(): boolean {

        return this.#current ? this.#manager.cancel(this.#current) : false;

    }

    async #finished(execution: QueryExecution): Promise<void> {

        if (this.#current === execution) {

            this.#current = null;

        }

        this.#history.unshift(execution);
        this.#history.splice(this.#historySize);

        this.#events.emit('execution:changed', { execution, status: execution.status });

        const store = this.#historyStore?.(execution.connectionName);
        const result = toHistoryResult(execution);

        if (!store || !result) return;

        const [, err] = await attempt(() => store.addEntry(execution.sql, result));

        if (err) {

            this.#events.emit('error', { source: 'history', error: err });

        }

    }

    // ─────────────────────────────────────────────────────────────
    // Commands
    // ─────────────────────────────────────────────────────────────

    /**
     * Carry out a command-line action and report it as `command:result`.
     * Never rejects; failures are reported.
     */
    async runCommand(command: EditorCommand): Promise<void> {

        switch (command.type) {

        case 'run':
            this.#report(command, () => this.executeBuffer());
            return;

        case 'write': {

            const path = command.path ?? this.#file;

            if (!path) {

                this.#result(command, false, 'No file name');

                return;

            }

            const [, err] = await attempt(() => writeFile(path, this.#editor.text, 'utf-8'));

            if (err) {

                this.#result(command, false, err.message);

                return;

            }

            this.#file = path;
            this.#result(command, true, `Written ${path}`);

            return;

        }

        case 'quit':
            if (this.#current && !command.force) {

                this.#result(command, false, 'A query is running (add ! to cancel it and quit)');

                return;

            }

            if (command.force) {

                this.cancel();

            }

            this.#result(command, true, 'Bye');
            this.#events.emit('quit', { force: command.force });

            return;

        case 'refresh': {

            const [, err] = await attempt(async () => this.refresh());

            this.#result(command, !err, err ? err.message : 'Schema cache cleared');

            return;

        }

        case 'connect': {

            const [, err] = await attempt(() => this.connect(command.name));

            this.#result(command, !err, err ? err.message : `Connected to ${command.name}`);

            return;

        }

        case 'disconnect': {

            const active = this.#active;
            const [, err] = await attempt(() => this.disconnect());

            this.#result(command, !err, err ? err.message : active ? `Disconnected from ${active}` : 'Not connected');

            return;

        }

        case 'cancel': {

            const cancelled = this.cancel();

            this.#result(command, cancelled, cancelled ? 'Cancelled' : 'Nothing running');

            return;

        }

        case 'history': {

            const lines = this.#history.map((execution) => `${execution.status}: ${execution.sql}`);

            this.#result(command, true, lines.length ? lines.join('\n') : 'No history');

            return;

        }

        case 'unknown':
            this.#result(command, false, `Not an editor command: ${command.input}`);
            return;

        }

    }

    #report(command: EditorCommand, run: () => QueryExecution | null): void {

        const [execution, err] = attemptSync(run);

        if (err) {

            this.#result(command, false, err.message);

            return;

        }

        this.#result(command, execution !== null, execution ? 'Running' : 'Nothing to run');

    }

    #result(command: EditorCommand, ok: boolean, message: string): void {

        this.#events.emit('command:result', { command, ok, message });

    }

    #emitBuffer(): void {

        this.#events.emit('buffer:changed', {
            text: this.#editor.text,
            cursor: this.#editor.buffer.cursor,
        });

    }

    // ─────────────────────────────────────────────────────────────
    // Teardown
    // ─────────────────────────────────────────────────────────────

    /**
     * Stop completions, cancel the running query and, when the session
     * created its manager, close every connection.
     */
    async close(): Promise<void> {

        if (this.#closed) return;

        this.#closed = true;
        this.#scheduler.cancel();
        this.cancel();

        if (this.#ownsManager) {

            await this.#manager.closeAll();

        }

    }

}
