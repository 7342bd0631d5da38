import { describe, it, expect } from 'vitest';

import {
    bufferText,
    clampPosition,
    createBuffer,
    insertText,
    replaceRange,
    toOffset,
    toPosition,
    withCursor,
} from '../../../src/core/editor/buffer.js';
import { applyMotion } from '../../../src/core/editor/motions.js';
import { parseCommand } from '../../../src/core/editor/commands.js';

describe('editor: buffer', () => {

    it('should normalize line endings', () => {

        expect(createBuffer('a\r\nb\rc').lines).toEqual(['a', 'b', 'c']);

    });

    it('should hold one empty line for empty text', () => {

        expect(createBuffer().lines).toEqual(['']);

    });

    it('should clamp positions into the buffer', () => {

        const lines = ['SELECT', ''];

        expect(clampPosition(lines, { line: 5, column: 3 })).toEqual({ line: 1, column: 0 });
        expect(clampPosition(lines, { line: 0, column: 99 })).toEqual({ line: 0, column: 6 });
        expect(clampPosition(lines, { line: 0, column: 99 }, false)).toEqual({ line: 0, column: 5 });
        expect(clampPosition(lines, { line: -1, column: Number.NaN })).toEqual({ line: 0, column: 0 });

    });

    it('should convert between offsets and positions', () => {

        const lines = ['SELECT 1', 'FROM t'];

        expect(toOffset(lines, { line: 1, column: 2 })).toBe(11);
        expect(toPosition(lines, 11)).toEqual({ line: 1, column: 2 });
        expect(toPosition(lines, 8)).toEqual({ line: 0, column: 8 });
        expect(toPosition(lines, 500)).toEqual({ line: 1, column: 6 });

    });

    it('should insert at the cursor and move past the text', () => {

        const buffer = insertText(withCursor(createBuffer('SELECT 1'), { line: 0, column: 7 }), 'TOP 5 ');

        expect(bufferText(buffer)).toBe('SELECT TOP 5 1');
        expect(buffer.cursor).toEqual({ line: 0, column: 13 });

    });

    it('should replace across lines', () => {

        const buffer = replaceRange(createBuffer('SELECT 1\nFROM t'), 6, 9, ' *\n');

        expect(buffer.lines).toEqual(['SELECT *', 'FROM t']);

    });

});

describe('editor: motions', () => {

    const buffer = createBuffer('SELECT name FROM users');

    it('should move by words', () => {

        expect(applyMotion(buffer, 'w', 2)?.position).toEqual({ line: 0, column: 12 });
        expect(applyMotion(buffer, 'e')?.position).toEqual({ line: 0, column: 5 });
        expect(applyMotion(withCursor(buffer, { line: 0, column: 12 }), 'b')?.position).toEqual({ line: 0, column: 7 });

    });

    it('should stop at the end of the buffer for large counts', () => {

        expect(applyMotion(buffer, 'w', 50)?.position).toEqual({ line: 0, column: 22 });

    });

    it('should return null when a character search has no target', () => {

        expect(applyMotion(buffer, 'f', 1, 'z')).toBeNull();

    });

    it('should go to a line with G', () => {

        const lines = createBuffer('a\n  b\nc');

        expect(applyMotion(lines, 'G', 2)?.position).toEqual({ line: 1, column: 2 });
        expect(applyMotion(lines, 'G')?.position).toEqual({ line: 2, column: 0 });

    });

});

describe('editor: parseCommand', () => {

    it('should parse the named commands', () => {

        expect(parseCommand('run')).toEqual({ type: 'run' });
        expect(parseCommand(':w out.sql')).toEqual({ type: 'write', path: 'out.sql' });
        expect(parseCommand('w')).toEqual({ type: 'write' });
        expect(parseCommand('q')).toEqual({ type: 'quit', force: false });
        expect(parseCommand('q!')).toEqual({ type: 'quit', force: true });
        expect(parseCommand('connect local')).toEqual({ type: 'connect', name: 'local' });
        expect(parseCommand('cancel')).toEqual({ type: 'cancel' });

    });

    it('should report unknown input', () => {

        expect(parseCommand('wat now')).toEqual({ type: 'unknown', input: 'wat now' });
        expect(parseCommand('connect')).toEqual({ type: 'unknown', input: 'connect' });

    });

});
