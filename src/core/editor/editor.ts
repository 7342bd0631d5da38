/**
 * Modal editor.
 *
 * A vim-style state machine over an immutable Buffer with four modes:
 * normal, insert, command and visual. Keys go in through `handleKey`; the
 * returned outcome says whether the buffer changed, whether the mode
 * changed, and whether the owner should execute, run a command, or
 * refresh completions.
 *
 * An insert session (from `i` to `escape`) is a single undo step. The
 * checkpoint is the buffer as it was when the insert command was typed,
 * and it is only recorded once the session actually changes text.
 *
 * @example
 * ```typescript
 * const editor = new ModalEditor({ text: 'SELECT 1' })
 *
 * editor.handleKey({ key: 'A' })
 * editor.handleKey({ key: ';' })
 * editor.handleKey({ key: 'escape' })
 * editor.text  // 'SELECT 1;'
 *
 * editor.handleKey({ key: 'u' })
 * editor.text  // 'SELECT 1'
 * ```
 */
import {
    bufferText,
    clampPosition,
    createBuffer,
    cursorOffset,
    firstNonBlank,
    insertText,
    lineAt,
    replaceRange,
    sameBuffer,
    sameText,
    toPosition,
    withCursor,
} from './buffer.js';
import { parseCommand } from './commands.js';
import { NormalKeyParser, isPrintable, type NormalCommand, type NormalAction } from './keymap.js';
import { applyMotion, nextWordEnd } from './motions.js';
import {
    applyOperator,
    deleteChars,
    joinLines,
    lineRange,
    motionRange,
    openLine,
    putRegister,
    replaceChars,
    selectionRange,
    type EditResult,
} from './operators.js';
import { UndoHistory } from './undo.js';
import type {
    Buffer,
    EditorMode,
    EditorSignal,
    KeyEvent,
    KeyOutcome,
    MotionName,
    MotionResult,
    OperatorName,
    Register,
} from './types.js';

export interface ModalEditorOptions {

    /** Initial text */
    text?: string;

    /** Maximum undo steps kept */
    undoLimit?: number;

    /** Spaces inserted by tab and used by `>`/`<` */
    tabWidth?: number;
}

/**
 * Characters that extend an identifier while typing.
 */
const IDENTIFIER_CHAR = /^[\w$#@]$/;

/**
 * Named keys that are never inserted as text.
 */
const SPECIAL_KEYS: ReadonlySet<string> = new Set([
    'escape',
    'enter',
    'backspace',
    'delete',
    'tab',
    'up',
    'down',
    'left',
    'right',
    'home',
    'end',
    'pageup',
    'pagedown',
]);

export class ModalEditor {

    #buffer: Buffer;
    #mode: EditorMode = 'normal';
    #commandLine = '';
    #register: Register = { text: '', linewise: false };
    #insertCheckpoint: Buffer | null = null;

    readonly #history: UndoHistory;
    readonly #parser = new NormalKeyParser();
    readonly #tabWidth: number;

    constructor(options: ModalEditorOptions = {}) {

        this.#buffer = createBuffer(options.text ?? '');
        this.#history = new UndoHistory(options.undoLimit ?? 200);
        this.#tabWidth = options.tabWidth ?? 4;

    }

    get buffer(): Buffer {

        return this.#buffer;

    }

    get text(): string {

        return bufferText(this.#buffer);

    }

    get mode(): EditorMode {

        return this.#mode;

    }

    /**
     * Text typed after `:` while in command mode.
     */
    get commandLine(): string {

        return this.#commandLine;

    }

    get register(): Register {

        return this.#register;

    }

    get canUndo(): boolean {

        return this.#history.canUndo;

    }

    get canRedo(): boolean {

        return this.#history.canRedo;

    }

    /**
     * True while a normal-mode command is partially typed (`d`, `2`, `f`).
     */
    get pendingKeys(): boolean {

        return this.#parser.pending;

    }

    // ─────────────────────────────────────────────────────────────
    // Public edits
    // ─────────────────────────────────────────────────────────────

    /**
     * Dispatch a key press to the active mode.
     */
    handleKey(event: KeyEvent): KeyOutcome {

        const before = this.#buffer;
        const mode = this.#mode;

        let signal: EditorSignal | undefined;

        switch (mode) {

        case 'normal':
            signal = this.#normalKey(event);
            break;

        case 'insert':
            signal = this.#insertKey(event);
            break;

        case 'command':
            signal = this.#commandKey(event);
            break;

        case 'visual':
            signal = this.#visualKey(event);
            break;

        }

        const outcome: KeyOutcome = {
            changed: !sameBuffer(before, this.#buffer) || before.selection !== this.#buffer.selection,
        };

        if (this.#mode !== mode) {

            outcome.previousMode = mode;

        }

        if (signal) {

            outcome.signal = signal;

        }

        return outcome;

    }

    /**
     * Replace the buffer with an edited version as one undoable change.
     *
     * Used for edits that do not come from keys, such as accepting a
     * completion. In insert mode the edit joins the current insert session.
     */
    applyEdit(next: Buffer): void {

        if (this.#mode === 'insert') {

            this.#insertEdit(next);

            return;

        }

        this.#commit(next);

    }

    /**
     * Replace all text, cursor at the end. Undoable.
     */
    setText(text: string): void {

        const lines = createBuffer(text).lines;
        const last = lines.length - 1;
        const next = createBuffer(text, { line: last, column: (lines[last] ?? '').length });

        // Nothing typed yet in this insert session, so the checkpoint is stale
        this.#insertCheckpoint = null;

        if (!sameText(next, this.#buffer)) {

            this.#history.push(this.#buffer);

        }

        this.#buffer = this.#mode === 'insert' ? next : withCursor(next, next.cursor, false);

    }

    undo(count = 1): boolean {

        let changed = false;

        for (let i = 0; i < count; i++) {

            const previous = this.#history.undo(this.#buffer);

            if (!previous) break;

            this.#buffer = previous;
            changed = true;

        }

        return changed;

    }

    redo(count = 1): boolean {

        let changed = false;

        for (let i = 0; i < count; i++) {

            const next = this.#history.redo(this.#buffer);

            if (!next) break;

            this.#buffer = next;
            changed = true;

        }

        return changed;

    }

    // ─────────────────────────────────────────────────────────────
    // Normal mode
    // ─────────────────────────────────────────────────────────────

    #normalKey(event: KeyEvent): EditorSignal | undefined {

        if (event.key === 'escape') {

            this.#parser.reset();

            return undefined;

        }

        const result = this.#parser.feed(event);

        if (result.status !== 'complete') {

            return undefined;

        }

        return this.#runNormal(result.command);

    }

    #runNormal(command: NormalCommand): EditorSignal | undefined {

        switch (command.kind) {

        case 'motion': {

            const motion = applyMotion(this.#buffer, command.motion, command.count, command.char);

            if (motion) {

                this.#buffer = withCursor(this.#buffer, motion.position, false);

            }

            return undefined;

        }

        case 'operator':
            this.#operatorMotion(command.operator, command.motion, command.count, command.char);

            return undefined;

        case 'lines':
            this.#applyEdit(applyOperator(this.#buffer, command.operator, lineRange(this.#buffer, command.count), this.#tabWidth));

            return undefined;

        case 'action':
            return this.#runAction(command.action, command.count, command.char);

        }

    }

    #operatorMotion(operator: OperatorName, name: MotionName, count?: number, char?: string): void {

        const motion = operator === 'c' && (name === 'w' || name === 'W')
            ? this.#changeWordMotion(name === 'W', count) ?? applyMotion(this.#buffer, name, count, char)
            : applyMotion(this.#buffer, name, count, char);

        if (!motion) {

            return;

        }

        this.#applyEdit(applyOperator(this.#buffer, operator, motionRange(this.#buffer, motion, name), this.#tabWidth));

    }

    /**
     * `cw` on a non-blank changes to the end of the word, like `ce`, but a
     * cursor on the last character changes only that word.
     */
    #changeWordMotion(bigWord: boolean, count?: number): MotionResult | null {

        const buffer = this.#buffer;
        const under = lineAt(buffer, buffer.cursor.line).charAt(buffer.cursor.column);

        if (under === '' || /\s/.test(under)) {

            return null;

        }

        const text = bufferText(buffer);
        let offset = cursorOffset(buffer) - 1;

        for (let i = 0; i < (count ?? 1); i++) {

            offset = nextWordEnd(text, offset, bigWord);

        }

        return {
            position: toPosition(buffer.lines, offset),
            linewise: false,
            inclusive: true,
        };

    }

    #runAction(action: NormalAction, count: number, char?: string): EditorSignal | undefined {

        const buffer = this.#buffer;
        const { line, column } = buffer.cursor;
        const text = lineAt(buffer, line);

        switch (action) {

        case 'insert':
            this.#enterInsert(buffer, buffer);
            break;

        case 'append':
            this.#enterInsert(buffer, withCursor(buffer, { line, column: text.length > 0 ? column + 1 : 0 }));
            break;

        case 'insert-line-start':
            this.#enterInsert(buffer, withCursor(buffer, { line, column: firstNonBlank(text) }));
            break;

        case 'append-line-end':
            this.#enterInsert(buffer, withCursor(buffer, { line, column: text.length }));
            break;

        case 'open-below':
        case 'open-above':
            this.#applyEdit(openLine(buffer, action === 'open-below'));
            break;

        case 'delete-char':
        case 'delete-char-before':
            this.#applyEdit(deleteChars(buffer, count, action === 'delete-char'));
            break;

        case 'delete-to-end':
            this.#operatorMotion('d', '$', count);
            break;

        case 'change-to-end':
            this.#operatorMotion('c', '$', count);
            break;

        case 'substitute-char': {

            const removed = deleteChars(buffer, count, true);
            this.#applyEdit(removed ? { ...removed, insert: true } : { buffer, insert: true });
            break;

        }

        case 'substitute-line':
            this.#applyEdit(applyOperator(buffer, 'c', lineRange(buffer, count), this.#tabWidth));
            break;

        case 'put-after':
        case 'put-before':
            this.#applyEdit(putRegister(buffer, this.#register, action === 'put-after', count));
            break;

        case 'join':
            this.#applyEdit(joinLines(buffer, count));
            break;

        case 'replace':
            this.#applyEdit(char === undefined ? null : replaceChars(buffer, char, count));
            break;

        case 'undo':
            this.undo(count);
            this.#buffer = withCursor(this.#buffer, this.#buffer.cursor, false);
            break;

        case 'redo':
            this.redo(count);
            this.#buffer = withCursor(this.#buffer, this.#buffer.cursor, false);
            break;

        case 'visual':
        case 'visual-line':
            this.#mode = 'visual';
            this.#buffer = {
                ...buffer,
                selection: { anchor: buffer.cursor, linewise: action === 'visual-line' },
            };
            break;

        case 'command-line':
            this.#mode = 'command';
            this.#commandLine = '';
            break;

        case 'execute':
            return { type: 'execute' };

        }

        return undefined;

    }

    /**
     * Apply an operator result in normal or visual mode.
     */
    #applyEdit(result: EditResult | null): void {

        if (!result) {

            return;

        }

        if (result.register) {

            this.#register = result.register;

        }

        const next: Buffer = { lines: result.buffer.lines, cursor: result.buffer.cursor };

        if (result.insert) {

            this.#enterInsert(this.#buffer, next);

            return;

        }

        this.#mode = 'normal';
        this.#commit(next);

    }

    #commit(next: Buffer): void {

        if (!sameText(next, this.#buffer)) {

            this.#history.push(this.#buffer);

        }

        this.#buffer = withCursor(next, next.cursor, false);

    }

    // ─────────────────────────────────────────────────────────────
    // Insert mode
    // ─────────────────────────────────────────────────────────────

    /**
     * Switch to insert mode. `checkpoint` is what undo returns to.
     */
    #enterInsert(checkpoint: Buffer, next: Buffer): void {

        const plain: Buffer = { lines: next.lines, cursor: clampPosition(next.lines, next.cursor) };

        this.#mode = 'insert';
        this.#parser.reset();

        if (sameText(plain, checkpoint)) {

            this.#insertCheckpoint = { lines: checkpoint.lines, cursor: checkpoint.cursor };
            this.#buffer = plain;

            return;

        }

        this.#insertCheckpoint = null;
        this.#history.push(checkpoint);
        this.#buffer = plain;

    }

    #insertEdit(next: Buffer): void {

        if (!sameText(next, this.#buffer) && this.#insertCheckpoint) {

            this.#history.push(this.#insertCheckpoint);
            this.#insertCheckpoint = null;

        }

        this.#buffer = next;

    }

    #leaveInsert(): void {

        const { line, column } = this.#buffer.cursor;

        this.#insertCheckpoint = null;
        this.#mode = 'normal';
        this.#buffer = withCursor(this.#buffer, { line, column: column - 1 }, false);

    }

    #insertKey(event: KeyEvent): EditorSignal | undefined {

        const buffer = this.#buffer;
        const { line, column } = buffer.cursor;

        if (event.ctrl || event.meta) {

            return event.ctrl && event.key === ' ' ? { type: 'complete' } : undefined;

        }

        switch (event.key) {

        case 'escape':
            this.#leaveInsert();

            return { type: 'dismiss' };

        case 'enter': {

            const current = lineAt(buffer, line);
            const indent = current.slice(0, current.length - current.trimStart().length);

            this.#insertEdit(insertText(buffer, '\n' + indent.slice(0, column)));

            return { type: 'dismiss' };

        }

        case 'backspace': {

            const offset = cursorOffset(buffer);

            if (offset === 0) {

                return undefined;

            }

            this.#insertEdit(replaceRange(buffer, offset - 1, offset, ''));

            return this.#completionSignalAfterDelete();

        }

        case 'delete': {

            const offset = cursorOffset(buffer);

            this.#insertEdit(replaceRange(buffer, offset, offset + 1, '', offset));

            return { type: 'dismiss' };

        }

        case 'tab':
            this.#insertEdit(insertText(buffer, ' '.repeat(this.#tabWidth)));

            return { type: 'dismiss' };

        case 'left':
        case 'right':
        case 'up':
        case 'down':
        case 'home':
        case 'end':
            this.#buffer = this.#moveInInsert(event.key);

            return { type: 'dismiss' };

        }

        if (SPECIAL_KEYS.has(event.key) || event.key === '') {

            return undefined;

        }

        this.#insertEdit(insertText(buffer, event.key));

        if (isPrintable(event) && (IDENTIFIER_CHAR.test(event.key) || event.key === '.')) {

            return { type: 'complete' };

        }

        return { type: 'dismiss' };

    }

    #completionSignalAfterDelete(): EditorSignal {

        const { line, column } = this.#buffer.cursor;
        const previous = lineAt(this.#buffer, line).charAt(column - 1);

        return IDENTIFIER_CHAR.test(previous) || previous === '.'
            ? { type: 'complete' }
            : { type: 'dismiss' };

    }

    #moveInInsert(key: string): Buffer {

        const buffer = this.#buffer;
        const { line, column } = buffer.cursor;

        switch (key) {

        case 'left':
            return withCursor(buffer, { line, column: column - 1 });
        case 'right':
            return withCursor(buffer, { line, column: column + 1 });
        case 'up':
            return withCursor(buffer, { line: line - 1, column });
        case 'down':
            return withCursor(buffer, { line: line + 1, column });
        case 'home':
            return withCursor(buffer, { line, column: 0 });
        default:
            return withCursor(buffer, { line, column: lineAt(buffer, line).length });

        }

    }

    // ─────────────────────────────────────────────────────────────
    // Command mode
    // ─────────────────────────────────────────────────────────────

    #commandKey(event: KeyEvent): EditorSignal | undefined {

        if (event.ctrl || event.meta) {

            return undefined;

        }

        switch (event.key) {

        case 'escape':
            this.#mode = 'normal';
            this.#commandLine = '';

            return undefined;

        case 'enter': {

            const command = parseCommand(this.#commandLine);

            this.#mode = 'normal';
            this.#commandLine = '';

            return { type: 'command', command };

        }

        case 'backspace':
            if (this.#commandLine === '') {

                this.#mode = 'normal';

            }
            this.#commandLine = this.#commandLine.slice(0, -1);

            return undefined;

        }

        if (!SPECIAL_KEYS.has(event.key)) {

            this.#commandLine += event.key;

        }

        return undefined;

    }

    // ─────────────────────────────────────────────────────────────
    // Visual mode
    // ─────────────────────────────────────────────────────────────

    #visualKey(event: KeyEvent): EditorSignal | undefined {

        const buffer = this.#buffer;
        const selection = buffer.selection;

        if (!selection) {

            this.#mode = 'normal';

            return undefined;

        }

        if (event.key === 'escape') {

            this.#exitVisual();

            return undefined;

        }

        if (!this.#parser.pending && !event.ctrl && !event.meta) {

            switch (event.key) {

            case 'v':
            case 'V': {

                const linewise = event.key === 'V';

                if (selection.linewise === linewise) {

                    this.#exitVisual();

                }
                else {

                    this.#buffer = { ...buffer, selection: { ...selection, linewise } };

                }

                return undefined;

            }

            case 'o':
                this.#buffer = {
                    lines: buffer.lines,
                    cursor: clampPosition(buffer.lines, selection.anchor),
                    selection: { anchor: buffer.cursor, linewise: selection.linewise },
                };

                return undefined;

            case 'd':
            case 'x':
                this.#selectionOperator('d');

                return undefined;

            case 'y':
            case 'c':
            case '>':
            case '<':
                this.#selectionOperator(event.key);

                return undefined;

            case 's':
                this.#selectionOperator('c');

                return undefined;

            }

        }

        const result = this.#parser.feed(event);

        if (result.status === 'complete') {

            if (result.command.kind === 'motion') {

                const { motion: name, count, char } = result.command;
                const motion = applyMotion(buffer, name, count, char);

                if (motion) {

                    this.#buffer = { ...withCursor(buffer, motion.position, false), selection };

                }

            }

            // Operators and actions other than the ones above are ignored here
            this.#parser.reset();

        }

        return undefined;

    }

    #selectionOperator(operator: OperatorName): void {

        const range = selectionRange(this.#buffer);

        this.#parser.reset();

        if (!range) {

            this.#exitVisual();

            return;

        }

        this.#applyEdit(applyOperator(this.#buffer, operator, range, this.#tabWidth));

        if (this.#mode === 'visual') {

            this.#exitVisual();

        }

    }

    #exitVisual(): void {

        this.#mode = 'normal';
        this.#parser.reset();
        this.#buffer = { lines: this.#buffer.lines, cursor: this.#buffer.cursor };

    }

}
