/**
 * Lexical completion context.
 *
 * Finds the partial token under the cursor, the qualifier in front of it
 * (`o.` or `dbo.Orders.`) and the tables the current statement declares.
 * This is a backward character scan plus a few regexes, not a parser.
 *
 * @example
 * ```typescript
 * const ctx = analyzeContext('SELECT o.Ord FROM Orders o', 12)
 * // ctx.prefix === 'Ord', ctx.qualifier === ['o'], ctx.start === 9
 *
 * extractTableRefs('SELECT * FROM dbo.Orders AS o')
 * // [{ name: 'Orders', schema: 'dbo', alias: 'o' }]
 * ```
 */
import {
    lexicalStateAt,
    maskLiterals,
    statementAt,
    unquoteIdentifier,
} from '../sql/statements.js';
import { isReservedWord } from './keywords.js';

export interface TableRef {
    name: string;
    schema?: string;
    database?: string;
    alias?: string;
}

export interface CompletionContext {

    /** Partial identifier before the cursor (may be empty) */
    prefix: string;

    /** Offset where the partial identifier starts */
    start: number;

    /** Cursor offset */
    end: number;

    /** Qualifier parts before the separator, outermost first */
    qualifier: string[] | null;

    /** Text of the statement containing the cursor */
    statement: string;

    /** True inside a string literal or comment, or right after `;` */
    suppressed: boolean;
}

const IDENT_CHAR = /[\w$#@]/;

function isIdentChar(ch: string | undefined): boolean {

    return ch !== undefined && IDENT_CHAR.test(ch);

}

const QUOTE_OPENERS: Record<string, string> = { ']': '[', '"': '"', '`': '`' };

/**
 * Read one identifier that ends just before `end`, scanning backward.
 */
function readIdentifierBackward(text: string, end: number): { name: string; start: number } | null {

    const last = text[end - 1];

    if (last === undefined) {

        return null;

    }

    const opener = QUOTE_OPENERS[last];

    if (opener !== undefined) {

        const open = text.lastIndexOf(opener, end - 2);

        if (open < 0) {

            return null;

        }

        return { name: text.slice(open + 1, end - 1), start: open };

    }

    let start = end;

    while (start > 0 && isIdentChar(text[start - 1])) {

        start--;

    }

    return start === end ? null : { name: text.slice(start, end), start };

}

/**
 * Qualifier parts before a `.` at `dot`, outermost first.
 */
function readQualifier(text: string, dot: number): string[] | null {

    const parts: string[] = [];
    let end = dot;

    for (;;) {

        const ident = readIdentifierBackward(text, end);

        if (!ident) {

            break;

        }

        parts.unshift(ident.name);

        if (text[ident.start - 1] !== '.') {

            break;

        }

        end = ident.start - 1;

    }

    return parts.length > 0 ? parts : null;

}

/**
 * Completion context at a cursor offset.
 */
export function analyzeContext(text: string, offset: number): CompletionContext {

    const end = Math.max(0, Math.min(offset, text.length));
    let start = end;

    while (start > 0 && isIdentChar(text[start - 1])) {

        start--;

    }

    // Inside an unterminated [bracket, "quote or `backtick the token starts after it
    const opener = text[start - 1];
    const tokenStart = opener === '[' || opener === '"' || opener === '`' ? start - 1 : start;
    const qualifier = text[tokenStart - 1] === '.' ? readQualifier(text, tokenStart - 1) : null;

    const state = lexicalStateAt(text, end);
    const prefix = text.slice(start, end);
    const afterSeparator = prefix === '' && qualifier === null && text[end - 1] === ';';

    return {
        prefix,
        start,
        end,
        qualifier,
        statement: statementAt(text, end).text,
        suppressed: state === 'string' || state === 'comment' || afterSeparator,
    };

}

// ─────────────────────────────────────────────────────────────
// Table references
// ─────────────────────────────────────────────────────────────

const NAME = String.raw`(?:"[^"]+"|\x60[^\x60]+\x60|\[[^\]]+\]|[\w$#@]+)`;
const DOTTED = String.raw`${NAME}(?:\s*\.\s*${NAME}){0,2}`;
const ALIAS = String.raw`(?:\s+(?:AS\s+)?(${NAME}))?`;

const REF_PATTERN = new RegExp(String.raw`\b(?:FROM|JOIN|UPDATE|INTO)\s+(${DOTTED})${ALIAS}`, 'gi');
const LIST_PATTERN = new RegExp(String.raw`\s*,\s*(${DOTTED})${ALIAS}`, 'iy');
const NAME_PATTERN = new RegExp(NAME, 'g');

function toRef(dotted: string, alias: string | undefined): TableRef | null {

    const parts = [...dotted.matchAll(NAME_PATTERN)].map((m) => unquoteIdentifier(m[0]));
    const name = parts.pop();

    if (name === undefined || isReservedWord(name)) {

        return null;

    }

    const ref: TableRef = { name };
    const schema = parts.pop();
    const database = parts.pop();

    if (schema !== undefined) ref.schema = schema;
    if (database !== undefined) ref.database = database;

    if (alias !== undefined && !isReservedWord(alias)) {

        ref.alias = unquoteIdentifier(alias);

    }

    return ref;

}

/**
 * Tables declared by FROM, JOIN, UPDATE and INTO clauses, with their
 * aliases. Comma lists after FROM are followed. Strings and comments are
 * ignored.
 */
export function extractTableRefs(sql: string): TableRef[] {

    const masked = maskLiterals(sql);
    const refs: TableRef[] = [];

    for (const match of masked.matchAll(REF_PATTERN)) {

        const dotted = match[1];

        if (dotted === undefined) continue;

        const first = toRef(dotted, match[2]);

        if (first) refs.push(first);

        LIST_PATTERN.lastIndex = (match.index ?? 0) + match[0].length;

        let next = LIST_PATTERN.exec(masked);

        while (next?.[1] !== undefined) {

            const ref = toRef(next[1], next[2]);

            if (ref) refs.push(ref);

            next = LIST_PATTERN.exec(masked);

        }

    }

    return refs;

}

/**
 * Table a qualifier refers to within the declared refs. Aliases win over
 * table names; matching ignores case.
 */
export function resolveQualifier(name: string, refs: TableRef[]): TableRef | null {

    const lower = name.toLowerCase();

    return refs.find((ref) => ref.alias?.toLowerCase() === lower)
        ?? refs.find((ref) => ref.name.toLowerCase() === lower)
        ?? null;

}
