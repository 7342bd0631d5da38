/**
 * Query execution handle.
 *
 * Returned synchronously by `ConnectionManager.execute`. The state moves
 * `pending > running` and then to exactly one terminal state; once
 * terminal it never changes again, so a result that arrives after
 * `cancelled` cannot turn the execution into `succeeded` or `failed`.
 *
 * @example
 * ```typescript
 * const execution = manager.execute('local', 'SELECT 1')
 *
 * execution.status            // 'running'
 * await execution.settled
 * execution.state             // { status: 'succeeded', result: {...} }
 * ```
 */
import { randomUUID } from 'node:crypto';

import type { CancelledError, NetworkError, QueryError } from './errors.js';
import type { QueryResult } from './types.js';

export type ExecutionStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'cancelled';

export type ExecutionState =
    | { status: 'pending' }
    | { status: 'running' }
    | { status: 'succeeded'; result: QueryResult }
    | { status: 'failed'; error: QueryError | NetworkError }
    | { status: 'cancelled'; error: CancelledError };

export type TerminalState = Extract<ExecutionState, { status: 'succeeded' | 'failed' | 'cancelled' }>;

export class QueryExecution {

    readonly id: string = randomUUID();

    #state: ExecutionState = { status: 'pending' };
    #startedAt: number | undefined;
    #endedAt: number | undefined;
    #resolve: (execution: QueryExecution) => void = () => undefined;

    readonly controller = new AbortController();

    /**
     * Resolves once the execution reaches a terminal state. Never rejects.
     */
    readonly settled: Promise<QueryExecution>;

    constructor(
        readonly connectionName: string,
        readonly sql: string,
        readonly generation: number,
    ) {

        this.settled = new Promise((resolve) => {

            this.#resolve = resolve;

        });

    }

    get state(): ExecutionState {

        return this.#state;

    }

    get status(): ExecutionStatus {

        return this.#state.status;

    }

    get startedAt(): number | undefined {

        return this.#startedAt;

    }

    get endedAt(): number | undefined {

        return this.#endedAt;

    }

    get durationMs(): number | undefined {

        if (this.#startedAt === undefined || this.#endedAt === undefined) {

            return undefined;

        }

        return this.#endedAt - this.#startedAt;

    }

    get isTerminal(): boolean {

        return this.#state.status !== 'pending' && this.#state.status !== 'running';

    }

    get signal(): AbortSignal {

        return this.controller.signal;

    }

    /** @internal */
    start(now: number): void {

        if (this.#state.status !== 'pending') return;

        this.#state = { status: 'running' };
        this.#startedAt = now;

    }

    /**
     * Move to a terminal state.
     *
     * Returns false, changing nothing, when already terminal.
     *
     * @internal
     */
    finish(state: TerminalState, now: number): boolean {

        if (this.isTerminal) {

            return false;

        }

        this.#state = state;
        this.#startedAt ??= now;
        this.#endedAt = now;
        this.#resolve(this);

        return true;

    }

}
