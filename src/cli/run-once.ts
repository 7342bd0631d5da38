/**
 * Non-interactive execution.
 *
 * Connects, runs every statement of the input in order, prints the
 * result sets and disconnects. No editor and no completion are involved.
 *
 * Exit codes: 0 success, 1 query failure, 2 connection failure, 3 usage
 * error. Execution stops at the first failing statement.
 *
 * @example
 * ```typescript
 * const code = await runOnce({
 *     connection: 'local',
 *     sql: 'SELECT 1 AS one; SELECT 2 AS two',
 *     format: 'json',
 *     connections: new FileConnectionStore(),
 * })
 * ```
 */
import { readFile } from 'node:fs/promises'
import type { Writable } from 'node:stream'
import { attempt } from '@logosdx/utils'

import { ConnectionManager } from '../core/connection/manager.js'
import type { ConnectionConfig, Credentials } from '../core/connection/types.js'
import { splitStatements } from '../core/sql/statements.js'
import type { ConnectionLookup } from '../core/store/connections.js'
import { formatResults, type OutputFormat, type StatementResult } from './format.js'


export const EXIT_CODES = {
    success: 0,
    queryFailure: 1,
    connectionFailure: 2,
    usage: 3,
} as const

export type ExitCode = typeof EXIT_CODES[keyof typeof EXIT_CODES]


export interface RunOnceOptions {

    /** Saved connection name, or a full config */
    connection: string | ConnectionConfig

    sql?: string

    /** SQL file to read instead of `sql` */
    file?: string

    format?: OutputFormat

    credentials?: Credentials

    /** Resolves a connection name */
    connections?: ConnectionLookup

    /** When omitted a manager is created and closed afterwards */
    manager?: ConnectionManager

    stdout?: Writable
    stderr?: Writable
}


export async function runOnce(options: RunOnceOptions): Promise<ExitCode> {

    const stdout = options.stdout ?? process.stdout
    const stderr = options.stderr ?? process.stderr
    const fail = (code: ExitCode, message: string): ExitCode => {

        stderr.write(`${message}\n`)

        return code
    }

    // ── Input ────────────────────────────────────────────────────

    if ((options.sql === undefined) === (options.file === undefined)) {

        return fail(EXIT_CODES.usage, 'Provide exactly one of --sql or --file')
    }

    let text = options.sql ?? ''

    if (options.file !== undefined) {

        const path = options.file
        const [content, readErr] = await attempt(() => readFile(path, 'utf-8'))

        if (readErr || typeof content !== 'string') {

            return fail(EXIT_CODES.usage, `Cannot read ${path}: ${readErr?.message ?? 'no content'}`)
        }

        text = content
    }

    const statements = splitStatements(text)

    if (statements.length === 0) {

        return fail(EXIT_CODES.usage, 'No SQL statements to run')
    }

    // ── Connection ───────────────────────────────────────────────

    let config: ConnectionConfig | null

    if (typeof options.connection === 'string') {

        const name = options.connection
        const [found, lookupErr] = await attempt(async () => (await options.connections?.get(name)) ?? null)

        if (lookupErr) {

            return fail(EXIT_CODES.connectionFailure, lookupErr.message)
        }

        config = found
    }
    else {

        config = options.connection
    }

    if (!config) {

        return fail(EXIT_CODES.connectionFailure, `Unknown connection '${String(options.connection)}'`)
    }

    const manager = options.manager ?? new ConnectionManager()
    const [, connectErr] = await attempt(() => manager.connect(config, options.credentials))

    if (connectErr) {

        await close(manager, options.manager, config.name)

        return fail(EXIT_CODES.connectionFailure, `${connectErr.name}: ${connectErr.message}`)
    }

    // ── Statements ───────────────────────────────────────────────

    const results: StatementResult[] = []
    let failure: string | null = null

    for (const statement of statements) {

        const execution = manager.execute(config.name, statement.text)
        const { state } = await execution.settled

        if (state.status !== 'succeeded') {

            failure = state.status === 'failed' || state.status === 'cancelled'
                ? `${state.error.name}: ${state.error.message}`
                : `Execution ended in ${state.status}`
            break
        }

        const result: StatementResult = {
            statement: statement.text,
            columns: state.result.columns,
            rows: state.result.rows,
        }

        if (state.result.rowsAffected !== undefined) {

            result.rowsAffected = state.result.rowsAffected
        }

        results.push(result)
    }

    await close(manager, options.manager, config.name)

    stdout.write(formatResults(results, options.format ?? 'csv'))

    return failure === null ? EXIT_CODES.success : fail(EXIT_CODES.queryFailure, failure)
}


/**
 * Close what runOnce opened: everything on its own manager, only its
 * connection on a shared one.
 */
async function close(manager: ConnectionManager, shared: ConnectionManager | undefined, name: string): Promise<void> {

    if (shared) {

        await manager.disconnect(name)

        return
    }

    await manager.closeAll()
}
