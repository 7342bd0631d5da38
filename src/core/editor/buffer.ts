/**
 * Pure buffer operations.
 *
 * Every function returns a new Buffer and keeps the cursor invariant:
 * the line is within the buffer and the column is within `[0, length]`.
 * Edits are done on the joined text through offsets, then split again.
 *
 * @example
 * ```typescript
 * let buffer = createBuffer('SELECT 1')
 * buffer = withCursor(buffer, { line: 0, column: 7 })
 * buffer = insertText(buffer, 'TOP 5 ')
 * bufferText(buffer)  // 'SELECT TOP 5 1'
 * ```
 */
import type { Buffer, Position } from './types.js';

/**
 * Normalize line endings to `\n`.
 */
export function normalizeNewlines(text: string): string {

    return text.replace(/\r\n?/g, '\n');

}

/**
 * Create a buffer from text. An empty string is one empty line.
 */
export function createBuffer(text = '', cursor: Position = { line: 0, column: 0 }): Buffer {

    const lines = normalizeNewlines(text).split('\n');

    return {
        lines,
        cursor: clampPosition(lines, cursor),
    };

}

export function bufferText(buffer: Buffer): string {

    return buffer.lines.join('\n');

}

/**
 * Line text, or an empty string for an out-of-range index.
 */
export function lineAt(buffer: Buffer, line: number): string {

    return buffer.lines[line] ?? '';

}

/**
 * Index of the first non-whitespace character (0 for blank lines).
 */
export function firstNonBlank(line: string): number {

    const match = /\S/.exec(line);

    return match ? match.index : 0;

}

function clampNumber(value: number, min: number, max: number): number {

    if (!Number.isFinite(value)) {

        return min;

    }

    return Math.min(Math.max(Math.trunc(value), min), max);

}

/**
 * Clamp a position into the buffer.
 *
 * With `allowAppend` false the column stops on the last character, which is
 * where normal mode keeps the cursor.
 */
export function clampPosition(
    lines: readonly string[],
    position: Position,
    allowAppend = true,
): Position {

    const line = clampNumber(position.line, 0, Math.max(0, lines.length - 1));
    const length = (lines[line] ?? '').length;
    const max = allowAppend ? length : Math.max(0, length - 1);

    return { line, column: clampNumber(position.column, 0, max) };

}

/**
 * Move the cursor, clamping it. Clears nothing else.
 */
export function withCursor(buffer: Buffer, position: Position, allowAppend = true): Buffer {

    return { ...buffer, cursor: clampPosition(buffer.lines, position, allowAppend) };

}

/**
 * Character offset of a position within the joined text.
 */
export function toOffset(lines: readonly string[], position: Position): number {

    const clamped = clampPosition(lines, position);
    let offset = 0;

    for (let i = 0; i < clamped.line; i++) {

        offset += (lines[i] ?? '').length + 1;

    }

    return offset + clamped.column;

}

/**
 * Position of a character offset within the joined text.
 */
export function toPosition(lines: readonly string[], offset: number): Position {

    let remaining = Math.max(0, offset);

    for (let line = 0; line < lines.length; line++) {

        const length = (lines[line] ?? '').length;

        if (remaining <= length) {

            return { line, column: remaining };

        }

        remaining -= length + 1;

    }

    const last = lines.length - 1;

    return { line: last, column: (lines[last] ?? '').length };

}

export function cursorOffset(buffer: Buffer): number {

    return toOffset(buffer.lines, buffer.cursor);

}

/**
 * Text between two offsets (`end` exclusive).
 */
export function textBetween(buffer: Buffer, start: number, end: number): string {

    return bufferText(buffer).slice(Math.min(start, end), Math.max(start, end));

}

/**
 * Replace the text between two offsets.
 *
 * The cursor lands at `cursorAt` when given, otherwise just after the
 * inserted text. Any selection is dropped.
 */
export function replaceRange(
    buffer: Buffer,
    start: number,
    end: number,
    text: string,
    cursorAt?: number,
): Buffer {

    const source = bufferText(buffer);
    const from = clampNumber(Math.min(start, end), 0, source.length);
    const to = clampNumber(Math.max(start, end), 0, source.length);
    const inserted = normalizeNewlines(text);

    const lines = (source.slice(0, from) + inserted + source.slice(to)).split('\n');
    const target = cursorAt ?? from + inserted.length;

    return {
        lines,
        cursor: toPosition(lines, target),
    };

}

/**
 * Insert text at the cursor and move the cursor past it.
 */
export function insertText(buffer: Buffer, text: string): Buffer {

    const offset = cursorOffset(buffer);

    return replaceRange(buffer, offset, offset, text);

}

/**
 * Replace whole lines `[from, to]` (inclusive) with new lines.
 *
 * Removing every line leaves a single empty line.
 */
export function replaceLines(
    buffer: Buffer,
    from: number,
    to: number,
    replacement: readonly string[],
    cursor?: Position,
): Buffer {

    const start = Math.max(0, Math.min(from, to));
    const end = Math.min(buffer.lines.length - 1, Math.max(from, to));

    const lines = [
        ...buffer.lines.slice(0, start),
        ...replacement,
        ...buffer.lines.slice(end + 1),
    ];

    if (lines.length === 0) {

        lines.push('');

    }

    const target = cursor ?? { line: start, column: firstNonBlank(lines[start] ?? '') };

    return {
        lines,
        cursor: clampPosition(lines, target),
    };

}

/**
 * Same text and cursor.
 */
export function sameBuffer(a: Buffer, b: Buffer): boolean {

    return sameText(a, b)
        && a.cursor.line === b.cursor.line
        && a.cursor.column === b.cursor.column;

}

export function sameText(a: Buffer, b: Buffer): boolean {

    if (a.lines === b.lines) {

        return true;

    }

    if (a.lines.length !== b.lines.length) {

        return false;

    }

    return a.lines.every((line, i) => line === b.lines[i]);

}
