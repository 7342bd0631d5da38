/**
 * Operators and single-key edits.
 *
 * All functions are pure: they take a buffer and return the edited buffer
 * plus whatever text was removed or copied. A function that has nothing to
 * act on returns null.
 */
import {
    bufferText,
    clampPosition,
    cursorOffset,
    firstNonBlank,
    lineAt,
    replaceLines,
    replaceRange,
    toOffset,
    toPosition,
    withCursor,
} from './buffer.js';
import type { Buffer, MotionName, MotionResult, OperatorName, Position, Register } from './types.js';

/**
 * Text range an operator acts on.
 *
 * Charwise ranges are `[start, end)` offsets; linewise ranges are whole
 * lines `[startLine, endLine]`.
 */
export type OperatorRange =
    | { linewise: false; start: number; end: number }
    | { linewise: true; startLine: number; endLine: number };

export interface EditResult {
    buffer: Buffer;
    register?: Register;

    /** The edit leaves the editor in insert mode (`c`, `o`) */
    insert?: boolean;
}

function lineEndOffset(lines: readonly string[], line: number): number {

    return toOffset(lines, { line, column: (lines[line] ?? '').length });

}

/**
 * Inclusive end of a charwise range, kept on its own line.
 */
function inclusiveEnd(lines: readonly string[], position: Position): number {

    const offset = toOffset(lines, position);

    return Math.min(offset + 1, lineEndOffset(lines, position.line));

}

/**
 * Range covered by moving from the cursor with a motion.
 *
 * A forward `w`/`W` that crosses into the next line stops at the end of the
 * cursor line, so `dw` on the last word does not join lines.
 */
export function motionRange(buffer: Buffer, motion: MotionResult, name: MotionName): OperatorRange {

    const from = buffer.cursor;
    const to = motion.position;

    if (motion.linewise) {

        return {
            linewise: true,
            startLine: Math.min(from.line, to.line),
            endLine: Math.max(from.line, to.line),
        };

    }

    const a = toOffset(buffer.lines, from);
    const b = toOffset(buffer.lines, to);
    const forward = b >= a;
    const far = forward ? to : from;

    let start = Math.min(a, b);
    let end = motion.inclusive ? inclusiveEnd(buffer.lines, far) : Math.max(a, b);

    if ((name === 'w' || name === 'W') && forward && to.line > from.line) {

        end = lineEndOffset(buffer.lines, from.line);

    }

    start = Math.min(start, end);

    return { linewise: false, start, end };

}

/**
 * Range of the active visual selection, or null without one.
 */
export function selectionRange(buffer: Buffer): OperatorRange | null {

    const selection = buffer.selection;

    if (!selection) {

        return null;

    }

    const anchor = clampPosition(buffer.lines, selection.anchor);
    const cursor = buffer.cursor;

    if (selection.linewise) {

        return {
            linewise: true,
            startLine: Math.min(anchor.line, cursor.line),
            endLine: Math.max(anchor.line, cursor.line),
        };

    }

    const a = toOffset(buffer.lines, anchor);
    const b = toOffset(buffer.lines, cursor);
    const last = a >= b ? anchor : cursor;

    return {
        linewise: false,
        start: Math.min(a, b),
        end: inclusiveEnd(buffer.lines, last),
    };

}

/**
 * Range of `count` whole lines starting at the cursor (`dd`, `3yy`).
 */
export function lineRange(buffer: Buffer, count: number): OperatorRange {

    const startLine = buffer.cursor.line;

    return {
        linewise: true,
        startLine,
        endLine: Math.min(buffer.lines.length - 1, startLine + Math.max(1, count) - 1),
    };

}

function rangeText(buffer: Buffer, range: OperatorRange): Register {

    if (range.linewise) {

        return {
            text: buffer.lines.slice(range.startLine, range.endLine + 1).join('\n'),
            linewise: true,
        };

    }

    return {
        text: bufferText(buffer).slice(range.start, range.end),
        linewise: false,
    };

}

// ─────────────────────────────────────────────────────────────
// Indentation
// ─────────────────────────────────────────────────────────────

/**
 * Shift lines right (`>`) or left (`<`) by one indent width.
 */
export function shiftLines(
    buffer: Buffer,
    startLine: number,
    endLine: number,
    direction: '>' | '<',
    width: number,
): Buffer {

    const indent = ' '.repeat(width);
    const shifted = buffer.lines.slice(startLine, endLine + 1).map((line) => {

        if (direction === '>') {

            return line.length > 0 ? indent + line : line;

        }

        const leading = line.length - line.trimStart().length;

        return line.slice(Math.min(leading, width));

    });

    const first = shifted[0] ?? '';

    return replaceLines(buffer, startLine, endLine, shifted, {
        line: startLine,
        column: firstNonBlank(first),
    });

}

// ─────────────────────────────────────────────────────────────
// Operators
// ─────────────────────────────────────────────────────────────

/**
 * Apply `d`, `c`, `y`, `>` or `<` to a range.
 *
 * @example
 * ```typescript
 * const buffer = createBuffer('SELECT name FROM users')
 * const motion = applyMotion(buffer, 'w')
 * const { buffer: next, register } = applyOperator(buffer, 'd', motionRange(buffer, motion, 'w'))
 * // next: 'name FROM users', register: { text: 'SELECT ', linewise: false }
 * ```
 */
export function applyOperator(
    buffer: Buffer,
    operator: OperatorName,
    range: OperatorRange,
    indentWidth = 4,
): EditResult {

    if (operator === '>' || operator === '<') {

        const [startLine, endLine] = range.linewise
            ? [range.startLine, range.endLine]
            : [toPosition(buffer.lines, range.start).line, toPosition(buffer.lines, range.end).line];

        return { buffer: shiftLines(buffer, startLine, endLine, operator, indentWidth) };

    }

    const register = rangeText(buffer, range);

    if (operator === 'y') {

        const cursor = range.linewise
            ? { line: range.startLine, column: buffer.cursor.column }
            : toPosition(buffer.lines, range.start);

        return { buffer: withCursor(buffer, cursor), register };

    }

    if (range.linewise) {

        const first = lineAt(buffer, range.startLine);
        const indent = first.slice(0, first.length - first.trimStart().length);
        const replacement = operator === 'c' ? [indent] : [];

        const next = replaceLines(buffer, range.startLine, range.endLine, replacement);

        if (operator === 'c') {

            const line = range.startLine;

            return {
                buffer: withCursor(next, { line, column: lineAt(next, line).length }),
                register,
                insert: true,
            };

        }

        return { buffer: next, register };

    }

    return {
        buffer: replaceRange(buffer, range.start, range.end, '', range.start),
        register,
        insert: operator === 'c',
    };

}

// ─────────────────────────────────────────────────────────────
// Single-key edits
// ─────────────────────────────────────────────────────────────

/**
 * `x` (forward) and `X` (backward) within the cursor line.
 */
export function deleteChars(buffer: Buffer, count: number, forward: boolean): EditResult | null {

    const { line, column } = buffer.cursor;
    const length = lineAt(buffer, line).length;
    const n = Math.max(1, count);

    const from = forward ? column : Math.max(0, column - n);
    const to = forward ? Math.min(length, column + n) : column;

    if (from >= to) {

        return null;

    }

    const base = toOffset(buffer.lines, { line, column: 0 });

    return applyOperator(buffer, 'd', { linewise: false, start: base + from, end: base + to });

}

/**
 * `p` (after) and `P` (before).
 */
export function putRegister(buffer: Buffer, register: Register, after: boolean, count: number): EditResult | null {

    if (register.text === '' && !register.linewise) {

        return null;

    }

    const n = Math.max(1, count);

    if (register.linewise) {

        const block = register.text.split('\n');
        const lines: string[] = [];

        for (let i = 0; i < n; i++) lines.push(...block);

        const at = after ? buffer.cursor.line + 1 : buffer.cursor.line;
        const next: Buffer = {
            lines: [...buffer.lines.slice(0, at), ...lines, ...buffer.lines.slice(at)],
            cursor: { line: at, column: firstNonBlank(lines[0] ?? '') },
        };

        return { buffer: next };

    }

    const text = register.text.repeat(n);
    const hasChar = lineAt(buffer, buffer.cursor.line).length > 0;
    const offset = cursorOffset(buffer) + (after && hasChar ? 1 : 0);

    return { buffer: replaceRange(buffer, offset, offset, text, offset + text.length - 1) };

}

/**
 * `J`: join the cursor line with the following `count - 1` lines (at least one).
 */
export function joinLines(buffer: Buffer, count: number): EditResult | null {

    const { line } = buffer.cursor;
    const joins = Math.max(1, count - 1);

    if (line >= buffer.lines.length - 1) {

        return null;

    }

    let joined = lineAt(buffer, line);
    let column = joined.length;
    const last = Math.min(buffer.lines.length - 1, line + joins);

    for (let i = line + 1; i <= last; i++) {

        const head = joined.replace(/\s+$/, '');
        const tail = lineAt(buffer, i).replace(/^\s+/, '');
        const separator = head === '' || tail === '' || tail.startsWith(')') ? '' : ' ';

        column = head.length;
        joined = head + separator + tail;

    }

    return {
        buffer: replaceLines(buffer, line, last, [joined], { line, column }),
    };

}

/**
 * `r{c}`: replace `count` characters under the cursor.
 */
export function replaceChars(buffer: Buffer, char: string, count: number): EditResult | null {

    const { line, column } = buffer.cursor;
    const text = lineAt(buffer, line);
    const n = Math.max(1, count);

    if (char.length !== 1 || column + n > text.length) {

        return null;

    }

    const base = toOffset(buffer.lines, { line, column: 0 });

    return {
        buffer: replaceRange(buffer, base + column, base + column + n, char.repeat(n), base + column + n - 1),
    };

}

/**
 * `o` (below) and `O` (above): open a line with the current indentation.
 */
export function openLine(buffer: Buffer, below: boolean): EditResult {

    const current = lineAt(buffer, buffer.cursor.line);
    const indent = current.slice(0, current.length - current.trimStart().length);
    const at = below ? buffer.cursor.line + 1 : buffer.cursor.line;

    return {
        buffer: {
            lines: [...buffer.lines.slice(0, at), indent, ...buffer.lines.slice(at)],
            cursor: { line: at, column: indent.length },
        },
        insert: true,
    };

}
