/**
 * Autocomplete engine.
 *
 * Turns buffer text and a cursor into ranked candidates drawn from the
 * static keyword list and the connection's SchemaCache. Qualified tokens
 * (`o.`, `dbo.Orders.`) complete columns of the table they resolve to;
 * bare tokens complete keywords, tables, views and procedures.
 *
 * @example
 * ```typescript
 * const engine = new AutocompleteEngine({
 *     source: () => ({ schema: cache, database: 'shop' }),
 * })
 *
 * const candidates = await engine.complete('SELECT * FROM Ord', 17)
 * const next = acceptCompletion(buffer, candidates[0])
 * ```
 */
import { attempt } from '@logosdx/utils';

import { bufferText, replaceRange, toPosition, withCursor } from '../editor/buffer.js';
import type { Buffer } from '../editor/types.js';
import type { SchemaCache } from '../schema/cache.js';
import { rankByPrefix } from '../schema/ranking.js';
import type { SchemaNode, TableNode, ViewNode } from '../schema/types.js';
import { analyzeContext, extractTableRefs, resolveQualifier, type CompletionContext, type TableRef } from './context.js';
import { SQL_KEYWORDS } from './keywords.js';

export type CandidateKind = 'table' | 'view' | 'column' | 'procedure' | 'keyword';

export interface CompletionSpan {
    start: number;
    end: number;
}

export interface CompletionCandidate {
    text: string;
    kind: CandidateKind;

    /** Match tier, lower is better */
    score: number;

    /** Offsets in the buffer text the candidate replaces */
    span: CompletionSpan;

    /** Text the span held when the candidate was computed */
    replaced: string;

    detail?: string;
}

/**
 * Where schema candidates come from: the active connection's cache and
 * its current database.
 */
export interface CompletionSource {
    schema: SchemaCache;
    database?: string;
}

export interface AutocompleteEngineOptions {

    /** Called per request; undefined when no connection is active */
    source?: () => CompletionSource | undefined;

    /** Result bound (default 50) */
    maxResults?: number;

    keywords?: readonly string[];
}

interface Entry {
    text: string;
    kind: CandidateKind;
    detail?: string;
}

type Relation = TableNode | ViewNode;

function isRelation(node: SchemaNode): node is Relation {

    return node.kind === 'table' || node.kind === 'view';

}

function sameName(a: string | undefined, b: string | undefined): boolean {

    return a !== undefined && b !== undefined && a.toLowerCase() === b.toLowerCase();

}

function toEntry(node: SchemaNode): Entry | null {

    switch (node.kind) {

    case 'table':
    case 'view':
    case 'procedure':
        return node.schema
            ? { text: node.name, kind: node.kind, detail: node.schema }
            : { text: node.name, kind: node.kind };

    case 'column':
        return node.dataType
            ? { text: node.name, kind: 'column', detail: node.dataType }
            : { text: node.name, kind: 'column' };

    case 'database':
    case 'parameter':
        return null;

    }

}

export class AutocompleteEngine {

    readonly maxResults: number;

    readonly #source: () => CompletionSource | undefined;
    readonly #keywords: readonly string[];

    constructor(options: AutocompleteEngineOptions = {}) {

        this.#source = options.source ?? (() => undefined);
        this.maxResults = options.maxResults ?? 50;
        this.#keywords = options.keywords ?? SQL_KEYWORDS;

    }

    /**
     * Ranked candidates for the token at `cursor` (an offset into `text`).
     */
    async complete(text: string, cursor: number): Promise<CompletionCandidate[]> {

        const ctx = analyzeContext(text, cursor);

        if (ctx.suppressed) {

            return [];

        }

        const source = this.#source();

        if (ctx.qualifier) {

            const entries = source ? await this.#qualified(ctx.qualifier, ctx, source) : [];

            return this.#finish(entries, ctx);

        }

        const entries: Entry[] = this.#keywords.map((keyword) => ({ text: keyword, kind: 'keyword' }));

        if (source) {

            await this.#ensureObjects(source);

            for (const kind of ['table', 'view', 'procedure'] as const) {

                for (const node of source.schema.findByPrefix(kind, ctx.prefix)) {

                    const entry = toEntry(node);

                    if (entry) entries.push(entry);

                }

            }

        }

        return this.#finish(entries, ctx);

    }

    async #qualified(parts: string[], ctx: CompletionContext, source: CompletionSource): Promise<Entry[]> {

        const last = parts[parts.length - 1] ?? '';
        let target: TableRef;

        if (parts.length === 1) {

            target = resolveQualifier(last, extractTableRefs(ctx.statement)) ?? { name: last };

        }
        else {

            target = { name: last };

            const schema = parts[parts.length - 2];
            const database = parts[parts.length - 3];

            if (schema !== undefined) target.schema = schema;
            if (database !== undefined) target.database = database;

        }

        let relation = await this.#findRelation(source, target);

        // `db.table` where the first part names a database rather than a schema
        if (!relation && parts.length === 2 && target.schema !== undefined) {

            relation = await this.#findRelation(source, { name: last, database: target.schema });

        }

        if (relation) {

            const [columns] = await attempt(() => source.schema.listChildren(relation));

            return (columns ?? []).flatMap((node) => toEntry(node) ?? []);

        }

        if (parts.length > 1) {

            return [];

        }

        // Schema qualifier: that schema's tables and views
        const inSchema = [
            ...source.schema.findByPrefix('table', ctx.prefix, { schema: last }),
            ...source.schema.findByPrefix('view', ctx.prefix, { schema: last }),
        ];

        if (inSchema.length > 0) {

            return inSchema.flatMap((node) => toEntry(node) ?? []);

        }

        // Database qualifier: that database's objects
        const database = await this.#ensureObjects(source, last);

        if (!database) {

            return [];

        }

        return (['table', 'view', 'procedure'] as const)
            .flatMap((kind) => source.schema.findByPrefix(kind, ctx.prefix, { parent: database }))
            .flatMap((node) => toEntry(node) ?? []);

    }

    /**
     * Cached table or view a reference names, preferring the current
     * database.
     */
    async #findRelation(source: CompletionSource, ref: TableRef): Promise<Relation | null> {

        const { schema: cache } = source;

        await this.#ensureObjects(source, ref.database);

        const matches = [...cache.nodesOfKind('table'), ...cache.nodesOfKind('view')]
            .filter(isRelation)
            .filter((node) => sameName(node.name, ref.name))
            .filter((node) => ref.schema === undefined || sameName(node.schema, ref.schema))
            .filter((node) => ref.database === undefined || sameName(cache.getParent(node)?.name, ref.database));

        const current = matches.find((node) => sameName(cache.getParent(node)?.name, source.database));

        return current ?? matches[0] ?? null;

    }

    /**
     * Load the object list of a database (the current one by default).
     *
     * Fetch failures are recorded by the cache with their retry deadline;
     * completion then works from whatever is already loaded.
     */
    async #ensureObjects(source: CompletionSource, name = source.database): Promise<SchemaNode | null> {

        const { schema: cache } = source;
        const [databases] = await attempt(() => cache.listChildren());

        if (!databases) {

            return null;

        }

        const database = name === undefined
            ? (databases.length === 1 ? databases[0] : undefined)
            : databases.find((node) => sameName(node.name, name));

        if (!database) {

            return null;

        }

        await attempt(() => cache.listChildren(database));

        return database;

    }

    #finish(entries: Entry[], ctx: CompletionContext): CompletionCandidate[] {

        const seen = new Set<string>();
        const candidates: CompletionCandidate[] = [];

        for (const { item, tier } of rankByPrefix(entries, ctx.prefix, (entry) => entry.text)) {

            if (seen.has(item.text)) continue;

            seen.add(item.text);
            candidates.push({
                ...item,
                score: tier,
                span: { start: ctx.start, end: ctx.end },
                replaced: ctx.prefix,
            });

            if (candidates.length >= this.maxResults) break;

        }

        return candidates;

    }

}

const IDENT_CHAR = /[\w$#@]/;

/**
 * Apply a candidate to a buffer.
 *
 * Returns the new buffer, or null when the span no longer holds the text
 * the candidate was computed against or the word now runs past the span.
 * Accepting a candidate that is
 * already in place only moves the cursor.
 */
export function acceptCompletion(buffer: Buffer, candidate: CompletionCandidate): Buffer | null {

    const text = bufferText(buffer);
    const { start, end } = candidate.span;
    const after = start + candidate.text.length;

    if (start < 0 || end < start || end > text.length) {

        return null;

    }

    if (text.slice(start, after) === candidate.text && !IDENT_CHAR.test(text.charAt(after))) {

        return withCursor(buffer, toPosition(buffer.lines, after));

    }

    // The word was edited or typed on past the span
    if (text.slice(start, end) !== candidate.replaced || IDENT_CHAR.test(text.charAt(end))) {

        return null;

    }

    return replaceRange(buffer, start, end, candidate.text, after);

}

