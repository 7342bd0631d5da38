/**
 * MySQL metadata queries.
 *
 * MySQL has no schema level below the database, so object nodes carry no
 * `schema`.
 */
import { sql } from 'kysely';

import type { Kysely } from 'kysely';
import type { SchemaNodeInput } from '../../schema/types.js';
import { parameterMode } from './types.js';
import type { ColumnsScope, DialectMetadataOperations, ParametersScope } from './types.js';

/**
 * System databases to exclude.
 */
const EXCLUDED_SCHEMAS = ['mysql', 'information_schema', 'performance_schema', 'sys'];

export const mysqlMetadataOperations: DialectMetadataOperations = {

    async listDatabases(db: Kysely<unknown>): Promise<SchemaNodeInput[]> {

        const result = await sql<{ schema_name: string }>`
            SELECT SCHEMA_NAME as schema_name
            FROM information_schema.SCHEMATA
            WHERE SCHEMA_NAME NOT IN (${sql.join(EXCLUDED_SCHEMAS)})
            ORDER BY SCHEMA_NAME
        `.execute(db);

        return result.rows.map((row): SchemaNodeInput => ({ kind: 'database', name: row.schema_name }));

    },

    async listObjects(db: Kysely<unknown>, database: string): Promise<SchemaNodeInput[]> {

        const [relations, procedures] = await Promise.all([
            sql<{ table_name: string; table_type: string }>`
                SELECT TABLE_NAME as table_name, TABLE_TYPE as table_type
                FROM information_schema.TABLES
                WHERE TABLE_SCHEMA = ${database}
                ORDER BY TABLE_NAME
            `.execute(db),

            sql<{ routine_name: string }>`
                SELECT ROUTINE_NAME as routine_name
                FROM information_schema.ROUTINES
                WHERE ROUTINE_SCHEMA = ${database}
                AND ROUTINE_TYPE = 'PROCEDURE'
                ORDER BY ROUTINE_NAME
            `.execute(db),
        ]);

        return [
            ...relations.rows.map((row): SchemaNodeInput => ({
                kind: row.table_type === 'VIEW' ? 'view' : 'table',
                name: row.table_name,
            })),
            ...procedures.rows.map((row): SchemaNodeInput => ({
                kind: 'procedure',
                name: row.routine_name,
            })),
        ];

    },

    async listColumns(db: Kysely<unknown>, scope: ColumnsScope): Promise<SchemaNodeInput[]> {

        const result = await sql<{
            column_name: string;
            column_type: string;
            is_nullable: string;
        }>`
            SELECT
                COLUMN_NAME as column_name,
                COLUMN_TYPE as column_type,
                IS_NULLABLE as is_nullable
            FROM information_schema.COLUMNS
            WHERE TABLE_SCHEMA = ${scope.database}
            AND TABLE_NAME = ${scope.table}
            ORDER BY ORDINAL_POSITION
        `.execute(db);

        return result.rows.map((row): SchemaNodeInput => ({
            kind: 'column',
            name: row.column_name,
            dataType: row.column_type,
            nullable: row.is_nullable === 'YES',
        }));

    },

    async listParameters(db: Kysely<unknown>, scope: ParametersScope): Promise<SchemaNodeInput[]> {

        const result = await sql<{
            parameter_name: string;
            data_type: string;
            parameter_mode: string | null;
        }>`
            SELECT
                PARAMETER_NAME as parameter_name,
                DATA_TYPE as data_type,
                PARAMETER_MODE as parameter_mode
            FROM information_schema.PARAMETERS
            WHERE SPECIFIC_SCHEMA = ${scope.database}
            AND SPECIFIC_NAME = ${scope.procedure}
            AND PARAMETER_NAME IS NOT NULL
            ORDER BY ORDINAL_POSITION
        `.execute(db);

        return result.rows.map((row): SchemaNodeInput => ({
            kind: 'parameter',
            name: row.parameter_name,
            dataType: row.data_type,
            mode: parameterMode(row.parameter_mode),
        }));

    },

};
