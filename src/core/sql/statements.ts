/**
 * SQL statement utilities.
 *
 * Lexical helpers, not a parser: they know where strings, quoted
 * identifiers and comments start and end, which is enough to split a
 * script into statements, find the statement under the cursor, and tell
 * whether an offset sits inside a literal.
 *
 * @example
 * ```typescript
 * splitStatements("SELECT 1; SELECT ';'")
 * // [{ text: 'SELECT 1', start: 0, end: 8 }, { text: "SELECT ';'", start: 10, end: 20 }]
 *
 * classifyStatement('create table t (id int)')  // 'ddl'
 * ```
 */

export interface Statement {

    /** Statement text without surrounding whitespace or the `;` */
    text: string;

    /** Offset of the first character of `text` in the script */
    start: number;

    /** Offset just past the last character of `text` */
    end: number;
}

export type StatementKind = 'rows' | 'ddl' | 'dml' | 'other';

/**
 * Where an offset sits lexically.
 */
export type LexicalState = 'code' | 'string' | 'identifier' | 'comment';

interface Segment {
    from: number;
    to: number;
}

// ─────────────────────────────────────────────────────────────
// Lexical scanning
// ─────────────────────────────────────────────────────────────

/**
 * Walk the text once, reporting statement separators and the lexical
 * state at `until`.
 */
function scan(text: string, until = text.length): { separators: number[]; state: LexicalState } {

    const separators: number[] = [];
    let state: LexicalState = 'code';
    let closer = '';
    let i = 0;

    while (i < until) {

        const ch = text[i];
        const next = text[i + 1];

        if (state === 'code') {

            if (ch === ';') {

                separators.push(i);

            }
            else if (ch === "'") {

                state = 'string';
                closer = "'";

            }
            else if (ch === '"' || ch === '`') {

                state = 'identifier';
                closer = ch;

            }
            else if (ch === '[') {

                state = 'identifier';
                closer = ']';

            }
            else if (ch === '-' && next === '-') {

                state = 'comment';
                closer = '\n';
                i++;

            }
            else if (ch === '/' && next === '*') {

                state = 'comment';
                closer = '*/';
                i++;

            }

        }
        else if (state === 'comment') {

            if (closer === '*/' && ch === '*' && next === '/') {

                state = 'code';
                i++;

            }
            else if (closer === '\n' && ch === '\n') {

                state = 'code';

            }

        }
        else if (ch === closer) {

            // Doubled quote is an escaped quote
            if (next === closer && i + 1 < until) {

                i++;

            }
            else {

                state = 'code';

            }

        }

        i++;

    }

    return { separators, state };

}

/**
 * Lexical state at an offset (what the character before it opened).
 */
export function lexicalStateAt(text: string, offset: number): LexicalState {

    return scan(text, Math.min(offset, text.length)).state;

}

/**
 * Replace the contents of string literals and comments with spaces.
 *
 * Offsets are preserved, so regex matches on the result map back to the
 * original text.
 */
export function maskLiterals(text: string): string {

    let result = '';
    let state: LexicalState = 'code';
    let closer = '';

    for (let i = 0; i < text.length; i++) {

        const ch = text.charAt(i);
        const next = text.charAt(i + 1);

        if (state === 'code') {

            if (ch === "'") {

                state = 'string';
                closer = "'";
                result += ch;

            }
            else if (ch === '-' && next === '-') {

                state = 'comment';
                closer = '\n';
                result += '  ';
                i++;

            }
            else if (ch === '/' && next === '*') {

                state = 'comment';
                closer = '*/';
                result += '  ';
                i++;

            }
            else {

                result += ch;

            }

            continue;

        }

        if (state === 'string' && ch === closer) {

            if (next === closer) {

                result += '  ';
                i++;

            }
            else {

                state = 'code';
                result += ch;

            }

            continue;

        }

        if (state === 'comment' && closer === '*/' && ch === '*' && next === '/') {

            state = 'code';
            result += '  ';
            i++;

            continue;

        }

        if (state === 'comment' && closer === '\n' && ch === '\n') {

            state = 'code';
            result += ch;

            continue;

        }

        result += ch === '\n' ? '\n' : ' ';

    }

    return result;

}

// ─────────────────────────────────────────────────────────────
// Splitting
// ─────────────────────────────────────────────────────────────

/**
 * Raw segments covering the whole text.
 *
 * Split on `;` outside strings and comments. Without any `;`, blank lines
 * separate statements.
 */
function segments(text: string): Segment[] {

    const { separators } = scan(text);
    const result: Segment[] = [];

    if (separators.length > 0) {

        let from = 0;

        for (const at of separators) {

            result.push({ from, to: at });
            from = at + 1;

        }

        result.push({ from, to: text.length });

        return result;

    }

    const blank = /\n[ \t]*\n/g;
    let from = 0;

    for (const match of text.matchAll(blank)) {

        const at = match.index ?? 0;

        result.push({ from, to: at });
        from = at + match[0].length;

    }

    result.push({ from, to: text.length });

    return result;

}

function toStatement(text: string, segment: Segment): Statement {

    const raw = text.slice(segment.from, segment.to);
    const leading = raw.length - raw.trimStart().length;
    const trimmed = raw.trim();
    const start = segment.from + leading;

    return { text: trimmed, start, end: start + trimmed.length };

}

/**
 * Split a script into non-empty statements.
 */
export function splitStatements(text: string): Statement[] {

    return segments(text)
        .map((segment) => toStatement(text, segment))
        .filter((statement) => statement.text !== '');

}

/**
 * The statement containing an offset.
 *
 * A cursor right after a `;` belongs to the next statement. The result may
 * be empty when the cursor sits between statements.
 */
export function statementAt(text: string, offset: number): Statement {

    const all = segments(text);
    const target = all.find((segment) => offset <= segment.to) ?? all[all.length - 1] ?? { from: 0, to: 0 };

    return toStatement(text, target);

}

// ─────────────────────────────────────────────────────────────
// Classification
// ─────────────────────────────────────────────────────────────

const ROW_KEYWORDS = new Set(['SELECT', 'WITH', 'SHOW', 'DESCRIBE', 'DESC', 'EXPLAIN', 'PRAGMA', 'VALUES', 'TABLE']);
const DDL_KEYWORDS = new Set(['CREATE', 'ALTER', 'DROP', 'TRUNCATE', 'RENAME']);
const DML_KEYWORDS = new Set(['INSERT', 'UPDATE', 'DELETE', 'MERGE', 'REPLACE', 'UPSERT']);

/**
 * First keyword of a statement, comments skipped.
 */
export function leadingKeyword(sql: string): string {

    const match = /^[\s(]*([A-Za-z]+)/.exec(maskLiterals(sql));

    return match?.[1]?.toUpperCase() ?? '';

}

/**
 * Rough statement class by its first keyword.
 *
 * - `rows`: returns a result set
 * - `ddl`: changes schema (cached metadata is stale after it)
 * - `dml`: changes data
 */
export function classifyStatement(sql: string): StatementKind {

    const keyword = leadingKeyword(sql);

    if (ROW_KEYWORDS.has(keyword)) return 'rows';
    if (DDL_KEYWORDS.has(keyword)) return 'ddl';
    if (DML_KEYWORDS.has(keyword)) return 'dml';

    return 'other';

}

/**
 * Database named by a `USE` statement, or null.
 *
 * @example
 * ```typescript
 * parseUseStatement('USE [Sales];')  // 'Sales'
 * parseUseStatement('SELECT 1')     // null
 * ```
 */
export function parseUseStatement(sql: string): string | null {

    const match = /^\s*USE\s+(\[[^\]]+\]|"[^"]+"|`[^`]+`|[\w$#@]+)\s*;?\s*$/i.exec(sql);
    const name = match?.[1];

    return name ? unquoteIdentifier(name) : null;

}

/**
 * Strip `[]`, `""` or backtick quoting from an identifier.
 */
export function unquoteIdentifier(name: string): string {

    const first = name.charAt(0);
    const last = name.charAt(name.length - 1);

    if (name.length >= 2 && ((first === '[' && last === ']') || (first === '"' && last === '"') || (first === '`' && last === '`'))) {

        return name.slice(1, -1);

    }

    return name;

}
