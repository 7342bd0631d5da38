/**
 * Schema cache types.
 *
 * Nodes form a tree (database > table/view/procedure > column/parameter)
 * but refer to their parent by key, never by object. The cache owns the
 * key table, so dropping a subtree drops every reference into it.
 */

export type SchemaNodeKind = 'database' | 'table' | 'view' | 'column' | 'procedure' | 'parameter';

/**
 * Kinds shown as completion candidates for table-like objects.
 */
export type ObjectKind = 'table' | 'view' | 'procedure';

export type NodeKey = string;

interface NodeBase {
    key: NodeKey;
    name: string;
    parentKey: NodeKey | null;
}

export interface DatabaseNode extends NodeBase {
    kind: 'database';
}

export interface TableNode extends NodeBase {
    kind: 'table';
    schema?: string;
}

export interface ViewNode extends NodeBase {
    kind: 'view';
    schema?: string;
}

export interface ProcedureNode extends NodeBase {
    kind: 'procedure';
    schema?: string;
}

export interface ColumnNode extends NodeBase {
    kind: 'column';
    dataType?: string;
    nullable?: boolean;
}

export interface ParameterNode extends NodeBase {
    kind: 'parameter';
    dataType?: string;
    mode?: 'in' | 'out' | 'inout';
}

export type SchemaNode =
    | DatabaseNode
    | TableNode
    | ViewNode
    | ProcedureNode
    | ColumnNode
    | ParameterNode;

/**
 * A node as returned by a metadata fetch, before the cache assigns keys.
 */
export type SchemaNodeInput =
    | Omit<DatabaseNode, 'key' | 'parentKey'>
    | Omit<TableNode, 'key' | 'parentKey'>
    | Omit<ViewNode, 'key' | 'parentKey'>
    | Omit<ProcedureNode, 'key' | 'parentKey'>
    | Omit<ColumnNode, 'key' | 'parentKey'>
    | Omit<ParameterNode, 'key' | 'parentKey'>;

/**
 * What a metadata fetch is asked for.
 */
export type MetadataScope =
    | { kind: 'databases' }
    | { kind: 'objects'; database: string }
    | { kind: 'columns'; database: string; schema?: string; table: string }
    | { kind: 'parameters'; database: string; schema?: string; procedure: string };

/**
 * Fetch capability supplied by the connection that owns the cache.
 */
export type MetadataFetcher = (scope: MetadataScope, signal: AbortSignal) => Promise<SchemaNodeInput[]>;

export type LoadStatus = 'unloaded' | 'loading' | 'loaded' | 'failed';
