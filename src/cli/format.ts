/**
 * Result set output for `sqlmode query`.
 *
 * CSV: header row then data per result set, sets separated by a blank
 * line; statements without a result set (DDL, DML) print nothing.
 * JSON: one array of `{ statement, columns, rows, rowsAffected }`.
 */
import { stringify } from 'csv-stringify/sync'

export type OutputFormat = 'csv' | 'json'

export interface StatementResult {
    statement: string
    columns: string[]
    rows: Record<string, unknown>[]
    rowsAffected?: number
}


/**
 * Make a driver value printable: dates as ISO strings, binary as hex,
 * bigint as its decimal string.
 */
export function normalizeValue(value: unknown): unknown {

    if (value instanceof Date) {

        return value.toISOString()
    }

    if (Buffer.isBuffer(value)) {

        return `0x${value.toString('hex')}`
    }

    if (typeof value === 'bigint') {

        return value.toString()
    }

    return value
}


function normalizeRow(row: Record<string, unknown>): Record<string, unknown> {

    const out: Record<string, unknown> = {}

    for (const [key, value] of Object.entries(row)) {

        out[key] = normalizeValue(value)
    }

    return out
}


/**
 * @example
 * ```typescript
 * formatCsv([{ statement: 'SELECT 1 AS one', columns: ['one'], rows: [{ one: 1 }] }])
 * // 'one\n1\n'
 * ```
 */
export function formatCsv(results: StatementResult[]): string {

    return results
        .filter((result) => result.columns.length > 0)
        .map((result) => stringify(result.rows.map(normalizeRow), {
            header: true,
            columns: result.columns,
            cast: {
                boolean: (value) => (value ? 'true' : 'false'),
                object: (value) => JSON.stringify(value),
            },
        }))
        .join('\n')
}


export function formatJson(results: StatementResult[]): string {

    const output = results.map((result) => ({
        statement: result.statement,
        columns: result.columns,
        rows: result.rows.map(normalizeRow),
        rowsAffected: result.rowsAffected ?? null,
    }))

    return JSON.stringify(output, null, 2) + '\n'
}


export function formatResults(results: StatementResult[], format: OutputFormat): string {

    return format === 'json' ? formatJson(results) : formatCsv(results)
}
