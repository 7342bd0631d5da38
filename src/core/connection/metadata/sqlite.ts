/**
 * SQLite metadata queries.
 *
 * Attached databases (`main`, plus any `ATTACH`ed file) stand in for
 * databases. SQLite has no stored procedures.
 */
import { sql } from 'kysely';

import type { Kysely } from 'kysely';
import type { SchemaNodeInput } from '../../schema/types.js';
import type { ColumnsScope, DialectMetadataOperations } from './types.js';

export const sqliteMetadataOperations: DialectMetadataOperations = {

    async listDatabases(db: Kysely<unknown>): Promise<SchemaNodeInput[]> {

        const result = await sql<{ name: string }>`
            SELECT name FROM pragma_database_list WHERE name != 'temp' ORDER BY seq
        `.execute(db);

        return result.rows.map((row): SchemaNodeInput => ({ kind: 'database', name: row.name }));

    },

    async listObjects(db: Kysely<unknown>, database: string): Promise<SchemaNodeInput[]> {

        const result = await sql<{ name: string; type: string }>`
            SELECT name, type
            FROM ${sql.id(database, 'sqlite_master')}
            WHERE type IN ('table', 'view')
            AND name NOT LIKE 'sqlite_%'
            ORDER BY name
        `.execute(db);

        return result.rows.map((row): SchemaNodeInput => ({
            kind: row.type === 'view' ? 'view' : 'table',
            name: row.name,
        }));

    },

    async listColumns(db: Kysely<unknown>, scope: ColumnsScope): Promise<SchemaNodeInput[]> {

        const result = await sql<{ name: string; type: string; notnull: number }>`
            SELECT name, type, "notnull"
            FROM pragma_table_info(${scope.table}, ${scope.database})
            ORDER BY cid
        `.execute(db);

        return result.rows.map((row): SchemaNodeInput => ({
            kind: 'column',
            name: row.name,
            dataType: row.type,
            nullable: row.notnull === 0,
        }));

    },

    async listParameters(): Promise<SchemaNodeInput[]> {

        return [];

    },

};
