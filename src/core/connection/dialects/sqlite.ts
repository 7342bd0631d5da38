/**
 * SQLite dialect adapter.
 *
 * Uses better-sqlite3 for synchronous SQLite access. No credentials.
 */
import { Kysely, SqliteDialect } from 'kysely'
import Database from 'better-sqlite3'
import { attemptSync } from '@logosdx/utils'
import type { ConnectionConfig } from '../types.js'
import type { DialectConnection } from './types.js'


/**
 * Create a SQLite connection.
 *
 * Unlike the networked dialects it can name the columns of a query that
 * returned no rows, by preparing the statement again.
 *
 * @example
 * ```typescript
 * // In-memory database
 * const { db } = createSqliteConnection({ name: 'scratch', dialect: 'sqlite', filename: ':memory:' })
 *
 * // File-based database
 * const { db } = createSqliteConnection({ name: 'local', dialect: 'sqlite', filename: './data.db' })
 * ```
 */
export function createSqliteConnection(config: ConnectionConfig): DialectConnection {

    const filename = config.filename ?? config.database ?? ':memory:'
    const database = new Database(filename)

    const db = new Kysely<unknown>({
        dialect: new SqliteDialect({ database }),
    })

    const describe = (query: string): string[] => {

        // Statements that change the schema may not prepare a second time
        const [statement, err] = attemptSync(() => database.prepare(query))

        if (err || !statement || !statement.reader) return []

        return statement.columns().map((column) => column.name)
    }

    return { db, describe }
}
