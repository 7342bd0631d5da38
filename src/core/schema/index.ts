/**
 * Schema cache module.
 *
 * Per-connection lazy metadata tree plus the prefix ranking shared with
 * completion.
 */
export { SchemaCache, nodeKey } from './cache.js';
export type { SchemaCacheOptions, FindOptions } from './cache.js';

export { SchemaFetchError, StaleNodeError } from './errors.js';
export { rankByPrefix, matchTier, compareNames } from './ranking.js';
export type { Ranked } from './ranking.js';

export type {
    SchemaNode,
    SchemaNodeKind,
    SchemaNodeInput,
    ObjectKind,
    NodeKey,
    DatabaseNode,
    TableNode,
    ViewNode,
    ProcedureNode,
    ColumnNode,
    ParameterNode,
    MetadataScope,
    MetadataFetcher,
    LoadStatus,
} from './types.js';
