/**
 * MSSQL metadata queries.
 *
 * Queries SQL Server system views (sys.*). Object lists use three-part
 * names, so any database on the server can be browsed without `USE`.
 */
import { sql } from 'kysely';

import type { Kysely } from 'kysely';
import type { SchemaNodeInput } from '../../schema/types.js';
import type { ColumnsScope, DialectMetadataOperations, ParametersScope } from './types.js';

/**
 * Schemas to exclude (system schemas).
 */
const EXCLUDED_SCHEMAS = ['sys', 'INFORMATION_SCHEMA', 'guest'];

const SYSTEM_DATABASES = ['master', 'tempdb', 'model', 'msdb'];

/**
 * `[db].[schema].[name]` for OBJECT_ID lookups.
 */
function objectName(database: string, schema: string | undefined, name: string): string {

    const quote = (part: string) => `[${part.replace(/]/g, ']]')}]`;

    return `${quote(database)}.${quote(schema ?? 'dbo')}.${quote(name)}`;

}

export const mssqlMetadataOperations: DialectMetadataOperations = {

    async listDatabases(db: Kysely<unknown>): Promise<SchemaNodeInput[]> {

        const result = await sql<{ name: string }>`
            SELECT name
            FROM sys.databases
            WHERE name NOT IN (${sql.join(SYSTEM_DATABASES)})
            AND HAS_DBACCESS(name) = 1
            ORDER BY name
        `.execute(db);

        return result.rows.map((row): SchemaNodeInput => ({ kind: 'database', name: row.name }));

    },

    async listObjects(db: Kysely<unknown>, database: string): Promise<SchemaNodeInput[]> {

        const result = await sql<{
            object_name: string;
            schema_name: string;
            type: string;
        }>`
            SELECT
                o.name as object_name,
                s.name as schema_name,
                RTRIM(o.type) as type
            FROM ${sql.id(database, 'sys', 'objects')} o
            JOIN ${sql.id(database, 'sys', 'schemas')} s ON o.schema_id = s.schema_id
            WHERE o.type IN ('U', 'V', 'P')
            AND o.is_ms_shipped = 0
            AND s.name NOT IN (${sql.join(EXCLUDED_SCHEMAS)})
            ORDER BY s.name, o.name
        `.execute(db);

        return result.rows.map((row): SchemaNodeInput => {

            const kind = row.type === 'U' ? 'table' : row.type === 'V' ? 'view' : 'procedure';

            return { kind, name: row.object_name, schema: row.schema_name };

        });

    },

    async listColumns(db: Kysely<unknown>, scope: ColumnsScope): Promise<SchemaNodeInput[]> {

        const result = await sql<{
            column_name: string;
            data_type: string;
            is_nullable: boolean | number;
        }>`
            SELECT
                c.name as column_name,
                t.name as data_type,
                c.is_nullable
            FROM ${sql.id(scope.database, 'sys', 'columns')} c
            JOIN ${sql.id(scope.database, 'sys', 'types')} t ON c.user_type_id = t.user_type_id
            WHERE c.object_id = OBJECT_ID(${objectName(scope.database, scope.schema, scope.table)})
            ORDER BY c.column_id
        `.execute(db);

        return result.rows.map((row): SchemaNodeInput => ({
            kind: 'column',
            name: row.column_name,
            dataType: row.data_type,
            nullable: Boolean(row.is_nullable),
        }));

    },

    async listParameters(db: Kysely<unknown>, scope: ParametersScope): Promise<SchemaNodeInput[]> {

        const result = await sql<{
            param_name: string;
            data_type: string;
            is_output: boolean | number;
        }>`
            SELECT
                p.name as param_name,
                t.name as data_type,
                p.is_output
            FROM ${sql.id(scope.database, 'sys', 'parameters')} p
            JOIN ${sql.id(scope.database, 'sys', 'types')} t ON p.user_type_id = t.user_type_id
            WHERE p.object_id = OBJECT_ID(${objectName(scope.database, scope.schema, scope.procedure)})
            AND p.parameter_id > 0
            ORDER BY p.parameter_id
        `.execute(db);

        return result.rows.map((row): SchemaNodeInput => ({
            kind: 'parameter',
            name: row.param_name,
            dataType: row.data_type,
            mode: row.is_output ? 'inout' : 'in',
        }));

    },

};
