/**
 * PostgreSQL metadata queries.
 *
 * Queries pg_catalog and information_schema. A postgres session only sees
 * its own database's catalog, so other databases list no objects.
 */
import { sql } from 'kysely';

import type { Kysely } from 'kysely';
import type { SchemaNodeInput } from '../../schema/types.js';
import { parameterMode } from './types.js';
import type { ColumnsScope, DialectMetadataOperations, ParametersScope } from './types.js';

/**
 * Schemas to exclude (system schemas).
 */
const EXCLUDED_SCHEMAS = ['pg_catalog', 'information_schema', 'pg_toast'];

export const postgresMetadataOperations: DialectMetadataOperations = {

    async listDatabases(db: Kysely<unknown>): Promise<SchemaNodeInput[]> {

        const result = await sql<{ datname: string }>`
            SELECT datname
            FROM pg_database
            WHERE datistemplate = false
            ORDER BY datname
        `.execute(db);

        return result.rows.map((row): SchemaNodeInput => ({ kind: 'database', name: row.datname }));

    },

    async listObjects(db: Kysely<unknown>, database: string): Promise<SchemaNodeInput[]> {

        const [relations, procedures] = await Promise.all([
            sql<{ table_name: string; table_schema: string; table_type: string }>`
                SELECT table_name, table_schema, table_type
                FROM information_schema.tables
                WHERE table_catalog = ${database}
                AND table_schema NOT IN (${sql.join(EXCLUDED_SCHEMAS)})
                ORDER BY table_schema, table_name
            `.execute(db),

            sql<{ proname: string; nspname: string }>`
                SELECT p.proname, n.nspname
                FROM pg_proc p
                JOIN pg_namespace n ON p.pronamespace = n.oid
                WHERE p.prokind = 'p'
                AND n.nspname NOT IN (${sql.join(EXCLUDED_SCHEMAS)})
                AND current_database() = ${database}
                ORDER BY n.nspname, p.proname
            `.execute(db),
        ]);

        return [
            ...relations.rows.map((row): SchemaNodeInput => ({
                kind: row.table_type === 'VIEW' ? 'view' : 'table',
                name: row.table_name,
                schema: row.table_schema,
            })),
            ...procedures.rows.map((row): SchemaNodeInput => ({
                kind: 'procedure',
                name: row.proname,
                schema: row.nspname,
            })),
        ];

    },

    async listColumns(db: Kysely<unknown>, scope: ColumnsScope): Promise<SchemaNodeInput[]> {

        const result = await sql<{
            column_name: string;
            data_type: string;
            is_nullable: string;
        }>`
            SELECT column_name, data_type, is_nullable
            FROM information_schema.columns
            WHERE table_catalog = ${scope.database}
            AND table_schema = ${scope.schema ?? 'public'}
            AND table_name = ${scope.table}
            ORDER BY ordinal_position
        `.execute(db);

        return result.rows.map((row): SchemaNodeInput => ({
            kind: 'column',
            name: row.column_name,
            dataType: row.data_type,
            nullable: row.is_nullable === 'YES',
        }));

    },

    async listParameters(db: Kysely<unknown>, scope: ParametersScope): Promise<SchemaNodeInput[]> {

        const result = await sql<{
            parameter_name: string | null;
            data_type: string;
            parameter_mode: string | null;
            ordinal_position: number;
        }>`
            SELECT p.parameter_name, p.data_type, p.parameter_mode, p.ordinal_position
            FROM information_schema.parameters p
            JOIN information_schema.routines r
                ON p.specific_schema = r.specific_schema
                AND p.specific_name = r.specific_name
            WHERE r.routine_schema = ${scope.schema ?? 'public'}
            AND r.routine_name = ${scope.procedure}
            ORDER BY p.ordinal_position
        `.execute(db);

        return result.rows.map((row): SchemaNodeInput => ({
            kind: 'parameter',
            name: row.parameter_name ?? `$${row.ordinal_position}`,
            dataType: row.data_type,
            mode: parameterMode(row.parameter_mode),
        }));

    },

};
