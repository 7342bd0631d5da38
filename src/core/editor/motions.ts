/**
 * Cursor motions.
 *
 * Each motion is a pure function of the buffer and a count. Motions never
 * fail on odd input: a count that runs past the buffer clamps to the edge,
 * and a character search with no match returns null (the caller treats
 * that as a no-op).
 */
import { bufferText, clampPosition, cursorOffset, firstNonBlank, lineAt, toPosition } from './buffer.js';
import type { Buffer, MotionName, MotionResult, Position } from './types.js';

type MotionFn = (buffer: Buffer, count: number | undefined, char?: string) => MotionResult | null;

// ─────────────────────────────────────────────────────────────
// Word scanning
// ─────────────────────────────────────────────────────────────

const SPACE = 0;
const WORD = 1;
const PUNCT = 2;

/**
 * Vim character classes. A "big word" only separates on whitespace.
 */
function charClass(ch: string | undefined, bigWord: boolean): number {

    if (ch === undefined || /\s/.test(ch)) {

        return SPACE;

    }

    if (bigWord) {

        return WORD;

    }

    return /\w/.test(ch) ? WORD : PUNCT;

}

export function nextWordStart(text: string, offset: number, bigWord: boolean): number {

    const n = text.length;
    let i = offset;
    const cls = charClass(text[i], bigWord);

    if (cls !== SPACE) {

        while (i < n && charClass(text[i], bigWord) === cls) i++;

    }

    while (i < n && charClass(text[i], bigWord) === SPACE) i++;

    return i;

}

export function nextWordEnd(text: string, offset: number, bigWord: boolean): number {

    const n = text.length;
    let i = offset + 1;

    while (i < n && charClass(text[i], bigWord) === SPACE) i++;

    if (i >= n) {

        return Math.max(0, n - 1);

    }

    const cls = charClass(text[i], bigWord);

    while (i + 1 < n && charClass(text[i + 1], bigWord) === cls) i++;

    return i;

}

export function previousWordStart(text: string, offset: number, bigWord: boolean): number {

    let i = offset - 1;

    while (i > 0 && charClass(text[i], bigWord) === SPACE) i--;

    if (i <= 0) {

        return 0;

    }

    const cls = charClass(text[i], bigWord);

    while (i > 0 && charClass(text[i - 1], bigWord) === cls) i--;

    return i;

}

export function previousWordEnd(text: string, offset: number, bigWord: boolean): number {

    let i = offset;
    const cls = charClass(text[i], bigWord);

    if (cls !== SPACE) {

        while (i > 0 && charClass(text[i - 1], bigWord) === cls) i--;

    }

    i--;

    while (i > 0 && charClass(text[i], bigWord) === SPACE) i--;

    return Math.max(0, i);

}

function repeatOffset(
    buffer: Buffer,
    count: number | undefined,
    step: (text: string, offset: number) => number,
): Position {

    const text = bufferText(buffer);
    let offset = cursorOffset(buffer);

    for (let i = 0; i < (count ?? 1); i++) {

        const next = step(text, offset);

        if (next === offset) {

            break;

        }

        offset = next;

    }

    return toPosition(buffer.lines, offset);

}

// ─────────────────────────────────────────────────────────────
// Bracket matching
// ─────────────────────────────────────────────────────────────

const BRACKET_PAIRS: Record<string, { match: string; forward: boolean }> = {
    '(': { match: ')', forward: true },
    '[': { match: ']', forward: true },
    '{': { match: '}', forward: true },
    ')': { match: '(', forward: false },
    ']': { match: '[', forward: false },
    '}': { match: '{', forward: false },
};

function matchBracket(buffer: Buffer): Position | null {

    const line = lineAt(buffer, buffer.cursor.line);
    let column = buffer.cursor.column;

    while (column < line.length && !(line.charAt(column) in BRACKET_PAIRS)) column++;

    const open = line.charAt(column);
    const pair = BRACKET_PAIRS[open];

    if (!pair) {

        return null;

    }

    const text = bufferText(buffer);
    const start = cursorOffset(buffer) + (column - buffer.cursor.column);
    const step = pair.forward ? 1 : -1;
    let depth = 0;

    for (let i = start; i >= 0 && i < text.length; i += step) {

        const ch = text[i];

        if (ch === open) depth++;
        else if (ch === pair.match) depth--;

        if (depth === 0) {

            return toPosition(buffer.lines, i);

        }

    }

    return null;

}

// ─────────────────────────────────────────────────────────────
// Character search within a line
// ─────────────────────────────────────────────────────────────

function findInLine(buffer: Buffer, char: string | undefined, count: number | undefined, forward: boolean): number | null {

    if (!char) {

        return null;

    }

    const line = lineAt(buffer, buffer.cursor.line);
    let column = buffer.cursor.column;

    for (let found = 0; found < (count ?? 1); found++) {

        column = forward
            ? line.indexOf(char, column + 1)
            : column > 0 ? line.lastIndexOf(char, column - 1) : -1;

        if (column < 0) {

            return null;

        }

    }

    return column;

}

// ─────────────────────────────────────────────────────────────
// Motion table
// ─────────────────────────────────────────────────────────────

const charwise = (position: Position, inclusive = false): MotionResult => ({
    position,
    linewise: false,
    inclusive,
});

const linewise = (position: Position): MotionResult => ({
    position,
    linewise: true,
    inclusive: false,
});

const MOTIONS: Record<MotionName, MotionFn> = {

    h: (b, n) => charwise({ line: b.cursor.line, column: Math.max(0, b.cursor.column - (n ?? 1)) }),

    l: (b, n) => charwise({
        line: b.cursor.line,
        column: Math.min(lineAt(b, b.cursor.line).length, b.cursor.column + (n ?? 1)),
    }),

    j: (b, n) => linewise(clampPosition(b.lines, { line: b.cursor.line + (n ?? 1), column: b.cursor.column })),

    k: (b, n) => linewise(clampPosition(b.lines, { line: b.cursor.line - (n ?? 1), column: b.cursor.column })),

    w: (b, n) => charwise(repeatOffset(b, n, (t, o) => nextWordStart(t, o, false))),
    W: (b, n) => charwise(repeatOffset(b, n, (t, o) => nextWordStart(t, o, true))),
    b: (b, n) => charwise(repeatOffset(b, n, (t, o) => previousWordStart(t, o, false))),
    B: (b, n) => charwise(repeatOffset(b, n, (t, o) => previousWordStart(t, o, true))),
    e: (b, n) => charwise(repeatOffset(b, n, (t, o) => nextWordEnd(t, o, false)), true),
    E: (b, n) => charwise(repeatOffset(b, n, (t, o) => nextWordEnd(t, o, true)), true),
    ge: (b, n) => charwise(repeatOffset(b, n, (t, o) => previousWordEnd(t, o, false)), true),

    '0': (b) => charwise({ line: b.cursor.line, column: 0 }),

    '^': (b) => charwise({ line: b.cursor.line, column: firstNonBlank(lineAt(b, b.cursor.line)) }),

    $: (b, n) => {

        const line = Math.min(b.lines.length - 1, b.cursor.line + (n ?? 1) - 1);

        return charwise({ line, column: Math.max(0, lineAt(b, line).length - 1) }, true);

    },

    gg: (b, n) => {

        const line = Math.min(b.lines.length - 1, Math.max(0, (n ?? 1) - 1));

        return linewise({ line, column: firstNonBlank(lineAt(b, line)) });

    },

    G: (b, n) => {

        const line = n === undefined
            ? b.lines.length - 1
            : Math.min(b.lines.length - 1, Math.max(0, n - 1));

        return linewise({ line, column: firstNonBlank(lineAt(b, line)) });

    },

    f: (b, n, c) => {

        const column = findInLine(b, c, n, true);

        return column === null ? null : charwise({ line: b.cursor.line, column }, true);

    },

    t: (b, n, c) => {

        const column = findInLine(b, c, n, true);

        return column === null ? null : charwise({ line: b.cursor.line, column: column - 1 }, true);

    },

    F: (b, n, c) => {

        const column = findInLine(b, c, n, false);

        return column === null ? null : charwise({ line: b.cursor.line, column });

    },

    T: (b, n, c) => {

        const column = findInLine(b, c, n, false);

        return column === null ? null : charwise({ line: b.cursor.line, column: column + 1 });

    },

    '%': (b) => {

        const position = matchBracket(b);

        return position ? charwise(position, true) : null;

    },

};

/**
 * Motions that take a character argument (`f{c}`).
 */
export const CHAR_MOTIONS: ReadonlySet<string> = new Set(['f', 'F', 't', 'T']);

export function isMotionName(key: string): key is MotionName {

    return Object.hasOwn(MOTIONS, key);

}

/**
 * Run a motion.
 *
 * @param count - explicit count, or undefined when none was typed
 * @param char - target character for f/F/t/T
 * @returns the landing position, or null when the motion has no target
 *
 * @example
 * ```typescript
 * const buffer = createBuffer('SELECT name FROM users')
 * applyMotion(buffer, 'w', 2)?.position  // { line: 0, column: 12 }
 * ```
 */
export function applyMotion(
    buffer: Buffer,
    motion: MotionName,
    count?: number,
    char?: string,
): MotionResult | null {

    const result = MOTIONS[motion](buffer, count, char);

    if (!result) {

        return null;

    }

    return { ...result, position: clampPosition(buffer.lines, result.position) };

}
