/**
 * Schema cache.
 *
 * Lazily loaded tree of database metadata for one connection. Children of
 * a node are fetched on first access and kept until invalidated. Each node
 * tracks its own load state, so "never fetched" and "fetched, empty" are
 * different things.
 *
 * Concurrent requests for the same node share one in-flight fetch. A failed
 * fetch is remembered with a retry deadline (doubling on each consecutive
 * failure) and rethrown without a round-trip until then. A fetch that
 * completes after its node was invalidated is discarded.
 *
 * @example
 * ```typescript
 * const cache = new SchemaCache({ connection: 'local', fetch })
 *
 * const [db] = await cache.listChildren()      // databases
 * const objects = await cache.listChildren(db)  // tables, views, procedures
 *
 * cache.findByPrefix('table', 'ord')            // loaded tables only
 * ```
 */
import { observer as defaultObserver, type CoreObserver } from '../observer.js';
import { withDeadline } from '../shared/deadline.js';
import { SchemaFetchError, StaleNodeError } from './errors.js';
import { rankByPrefix } from './ranking.js';
import type {
    LoadStatus,
    MetadataFetcher,
    MetadataScope,
    NodeKey,
    SchemaNode,
    SchemaNodeInput,
    SchemaNodeKind,
} from './types.js';

/**
 * Key of the virtual root whose children are the databases.
 */
const ROOT: NodeKey = '';

export interface SchemaCacheOptions {

    /** Connection name, for events */
    connection: string;

    /** Metadata capability of the owning connection */
    fetch: MetadataFetcher;

    /** Per-fetch time limit (default 10s) */
    timeoutMs?: number;

    /** Delay before retrying a failed fetch (default 5s) */
    retryAfterMs?: number;

    /** Upper bound for the doubling retry delay (default 60s) */
    maxRetryAfterMs?: number;

    /** Clock, injectable for tests */
    now?: () => number;

    observer?: CoreObserver;
}

export interface FindOptions {

    /** Only children of this node */
    parent?: SchemaNode | NodeKey;

    /** Only objects in this schema (case-insensitive) */
    schema?: string;
}

interface LoadingState {
    status: 'loading';
    promise: Promise<SchemaNode[]>;
    failures: number;
}

type LoadState =
    | LoadingState
    | { status: 'loaded'; children: NodeKey[] }
    | { status: 'failed'; error: SchemaFetchError; retryAt: number; failures: number };

/**
 * Build the cache key of a node from its parent and identity.
 */
export function nodeKey(parentKey: NodeKey | null, input: SchemaNodeInput): NodeKey {

    const schema = 'schema' in input && input.schema ? `${input.schema}.` : '';

    return `${parentKey ?? ROOT}/${input.kind}:${schema}${input.name}`;

}

function keyOf(node: SchemaNode | NodeKey): NodeKey {

    return typeof node === 'string' ? node : node.key;

}

export class SchemaCache {

    readonly connection: string;

    readonly #fetch: MetadataFetcher;
    readonly #timeoutMs: number;
    readonly #retryAfterMs: number;
    readonly #maxRetryAfterMs: number;
    readonly #now: () => number;
    readonly #observer: CoreObserver;

    #nodes = new Map<NodeKey, SchemaNode>();
    #states = new Map<NodeKey, LoadState>();

    constructor(options: SchemaCacheOptions) {

        this.connection = options.connection;
        this.#fetch = options.fetch;
        this.#timeoutMs = options.timeoutMs ?? 10_000;
        this.#retryAfterMs = options.retryAfterMs ?? 5_000;
        this.#maxRetryAfterMs = options.maxRetryAfterMs ?? 60_000;
        this.#now = options.now ?? Date.now;
        this.#observer = options.observer ?? defaultObserver;

    }

    // ─────────────────────────────────────────────────────────────
    // Reads
    // ─────────────────────────────────────────────────────────────

    /**
     * Children of a node, fetching them on first access.
     *
     * Without a node, returns the databases. Columns and parameters have no
     * children.
     *
     * @throws SchemaFetchError when the fetch fails or a recent failure has not expired
     * @throws StaleNodeError when the node's ancestors were invalidated
     */
    async listChildren(node?: SchemaNode): Promise<SchemaNode[]> {

        if (node && (node.kind === 'column' || node.kind === 'parameter')) {

            return [];

        }

        const key = node ? node.key : ROOT;
        const state = this.#states.get(key);

        if (state?.status === 'loaded') {

            return this.#resolve(state.children);

        }

        if (state?.status === 'loading') {

            return state.promise;

        }

        if (state?.status === 'failed' && this.#now() < state.retryAt) {

            throw state.error;

        }

        const scope = node ? this.#scopeOf(node) : { kind: 'databases' as const };

        return this.#load(key, scope, state?.status === 'failed' ? state.failures : 0);

    }

    /**
     * Loaded nodes of a kind whose name starts with `prefix`, best match
     * first. Never fetches.
     */
    findByPrefix(kind: SchemaNodeKind, prefix: string, options: FindOptions = {}): SchemaNode[] {

        const parentKey = options.parent === undefined ? undefined : keyOf(options.parent);
        const schema = options.schema?.toLowerCase();

        const candidates = [...this.#nodes.values()].filter((node) => {

            if (node.kind !== kind) return false;
            if (parentKey !== undefined && node.parentKey !== parentKey) return false;

            if (schema !== undefined) {

                const nodeSchema = 'schema' in node ? node.schema : undefined;

                return nodeSchema?.toLowerCase() === schema;

            }

            return true;

        });

        return rankByPrefix(candidates, prefix, (node) => node.name).map((r) => r.item);

    }

    /**
     * Every loaded node of a kind, in fetch order.
     */
    nodesOfKind(kind: SchemaNodeKind): SchemaNode[] {

        return [...this.#nodes.values()].filter((node) => node.kind === kind);

    }

    getNode(key: NodeKey): SchemaNode | undefined {

        return this.#nodes.get(key);

    }

    getParent(node: SchemaNode): SchemaNode | undefined {

        return node.parentKey === null ? undefined : this.#nodes.get(node.parentKey);

    }

    /**
     * Load state of a node's children (the root's without a node).
     */
    status(node?: SchemaNode | NodeKey): LoadStatus {

        return this.#states.get(node === undefined ? ROOT : keyOf(node))?.status ?? 'unloaded';

    }

    get size(): number {

        return this.#nodes.size;

    }

    // ─────────────────────────────────────────────────────────────
    // Invalidation
    // ─────────────────────────────────────────────────────────────

    /**
     * Drop cached children of a node, recursively. Without a node, drops
     * everything. A remembered failure on the node itself is kept.
     */
    invalidate(node?: SchemaNode | NodeKey): void {

        this.#drop(node, false);

    }

    /**
     * Like invalidate, and also forgets failures so the next access
     * fetches immediately.
     */
    refresh(node?: SchemaNode | NodeKey): void {

        this.#drop(node, true);

    }

    #drop(node: SchemaNode | NodeKey | undefined, clearFailure: boolean): void {

        if (node === undefined) {

            const failed = clearFailure ? undefined : this.#states.get(ROOT);

            this.#nodes.clear();
            this.#states.clear();

            if (failed?.status === 'failed') {

                this.#states.set(ROOT, failed);

            }

        }
        else {

            const key = keyOf(node);
            const state = this.#states.get(key);

            this.#dropChildren(key);

            if (state?.status === 'failed' && !clearFailure) {

                this.#states.set(key, state);

            }

        }

        this.#observer.emit('schema:invalidated', {
            connection: this.connection,
            node: node === undefined ? null : keyOf(node),
        });

    }

    #dropChildren(key: NodeKey): void {

        const state = this.#states.get(key);

        this.#states.delete(key);

        if (state?.status !== 'loaded') {

            return;

        }

        for (const child of state.children) {

            this.#dropChildren(child);
            this.#nodes.delete(child);

        }

    }

    // ─────────────────────────────────────────────────────────────
    // Fetching
    // ─────────────────────────────────────────────────────────────

    #load(key: NodeKey, scope: MetadataScope, failures: number): Promise<SchemaNode[]> {

        const state: LoadingState = { status: 'loading', promise: Promise.resolve([]), failures };

        state.promise = this.#fetchChildren(key, scope, state);
        this.#states.set(key, state);

        return state.promise;

    }

    async #fetchChildren(key: NodeKey, scope: MetadataScope, state: LoadingState): Promise<SchemaNode[]> {

        const started = this.#now();

        this.#observer.emit('schema:fetch', { connection: this.connection, node: key });

        let inputs: SchemaNodeInput[];

        try {

            inputs = await withDeadline(
                (signal) => this.#fetch(scope, signal),
                this.#timeoutMs,
                () => new Error(`Metadata request timed out after ${this.#timeoutMs}ms`),
            );

        }
        catch (cause) {

            const failures = state.failures + 1;
            const delay = Math.min(this.#retryAfterMs * 2 ** (failures - 1), this.#maxRetryAfterMs);
            const retryAt = this.#now() + delay;
            const error = new SchemaFetchError(key, retryAt, cause);

            if (this.#states.get(key) === state) {

                this.#states.set(key, { status: 'failed', error, retryAt, failures });

            }

            this.#observer.emit('schema:failed', {
                connection: this.connection,
                node: key,
                error: error.message,
                retryAt,
            });

            throw error;

        }

        const parentKey = key === ROOT ? null : key;
        const children = inputs.map((input): SchemaNode => ({
            ...input,
            key: nodeKey(parentKey, input),
            parentKey,
        }));

        // Invalidated while in flight: hand the result to waiting callers only
        if (this.#states.get(key) !== state) {

            return children;

        }

        for (const child of children) {

            this.#nodes.set(child.key, child);

        }

        this.#states.set(key, { status: 'loaded', children: children.map((c) => c.key) });

        this.#observer.emit('schema:fetched', {
            connection: this.connection,
            node: key,
            count: children.length,
            durationMs: this.#now() - started,
        });

        return children;

    }

    #resolve(keys: NodeKey[]): SchemaNode[] {

        const nodes: SchemaNode[] = [];

        for (const key of keys) {

            const node = this.#nodes.get(key);

            if (node) nodes.push(node);

        }

        return nodes;

    }

    /**
     * Metadata scope for a node's children. Walks parent keys to find the
     * owning database.
     */
    #scopeOf(node: SchemaNode): MetadataScope {

        switch (node.kind) {

        case 'database':
            return { kind: 'objects', database: node.name };

        case 'table':
        case 'view':
            return { kind: 'columns', database: this.#databaseOf(node), schema: node.schema, table: node.name };

        case 'procedure':
            return { kind: 'parameters', database: this.#databaseOf(node), schema: node.schema, procedure: node.name };

        case 'column':
        case 'parameter':
            throw new StaleNodeError(node.key);

        }

    }

    #databaseOf(node: SchemaNode): string {

        const parent = this.getParent(node);

        if (parent?.kind !== 'database') {

            throw new StaleNodeError(node.key);

        }

        return parent.name;

    }

}
