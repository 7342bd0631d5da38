/**
 * Dialect factory for metadata operations.
 *
 * Returns the catalog queries for a dialect and answers a schema-cache
 * scope with them.
 */
import type { Kysely } from 'kysely';

import type { MetadataScope, SchemaNodeInput } from '../../schema/types.js';
import type { Dialect } from '../types.js';
import type { DialectMetadataOperations } from './types.js';

import { mssqlMetadataOperations } from './mssql.js';
import { mysqlMetadataOperations } from './mysql.js';
import { postgresMetadataOperations } from './postgres.js';
import { sqliteMetadataOperations } from './sqlite.js';

/**
 * Dialect-to-operations mapping.
 */
const dialectOperations: Record<Dialect, DialectMetadataOperations> = {
    postgres: postgresMetadataOperations,
    mysql: mysqlMetadataOperations,
    mssql: mssqlMetadataOperations,
    sqlite: sqliteMetadataOperations,
};

/**
 * Get metadata operations for a specific dialect.
 *
 * @example
 * ```typescript
 * const ops = getMetadataOperations('mssql')
 * const databases = await ops.listDatabases(db)
 * ```
 */
export function getMetadataOperations(dialect: Dialect): DialectMetadataOperations {

    return dialectOperations[dialect];

}

/**
 * Run the query for one schema-cache scope.
 */
export function fetchScope(
    db: Kysely<unknown>,
    dialect: Dialect,
    scope: MetadataScope,
): Promise<SchemaNodeInput[]> {

    const ops = getMetadataOperations(dialect);

    switch (scope.kind) {

    case 'databases':
        return ops.listDatabases(db);

    case 'objects':
        return ops.listObjects(db, scope.database);

    case 'columns':
        return ops.listColumns(db, scope);

    case 'parameters':
        return ops.listParameters(db, scope);

    }

}

export type { DialectMetadataOperations } from './types.js';
