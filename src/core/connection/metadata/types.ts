/**
 * Dialect metadata operations.
 *
 * Each dialect answers the four schema-cache scopes with its own catalog
 * queries and maps rows onto node inputs.
 */
import type { Kysely } from 'kysely';

import type { MetadataScope, SchemaNodeInput } from '../../schema/types.js';

export type ColumnsScope = Extract<MetadataScope, { kind: 'columns' }>;
export type ParametersScope = Extract<MetadataScope, { kind: 'parameters' }>;

export interface DialectMetadataOperations {

    /** Databases visible to the login, system databases excluded */
    listDatabases(db: Kysely<unknown>): Promise<SchemaNodeInput[]>;

    /** Tables, views and procedures of one database */
    listObjects(db: Kysely<unknown>, database: string): Promise<SchemaNodeInput[]>;

    listColumns(db: Kysely<unknown>, scope: ColumnsScope): Promise<SchemaNodeInput[]>;

    listParameters(db: Kysely<unknown>, scope: ParametersScope): Promise<SchemaNodeInput[]>;
}

/**
 * Map a catalog parameter mode onto the node's mode.
 */
export function parameterMode(mode: string | null | undefined): 'in' | 'out' | 'inout' {

    switch (mode?.toUpperCase()) {

    case 'OUT':
        return 'out';

    case 'INOUT':
        return 'inout';

    default:
        return 'in';

    }

}
