/**
 * Editor type definitions.
 *
 * The buffer is an immutable value: every edit produces a new Buffer, which
 * makes undo snapshots free and lets motions stay pure functions.
 */

/**
 * Zero-based cursor position.
 *
 * `column` may equal the line length (the append position).
 */
export interface Position {
    line: number;
    column: number;
}

/**
 * Visual selection anchor. The other end is always the cursor.
 */
export interface Selection {
    anchor: Position;
    linewise: boolean;
}

/**
 * Immutable text buffer snapshot.
 *
 * Invariants: `lines.length >= 1`, `0 <= cursor.line < lines.length`,
 * `0 <= cursor.column <= lines[cursor.line].length`.
 */
export interface Buffer {
    readonly lines: readonly string[];
    readonly cursor: Position;
    readonly selection?: Selection;
}

export type EditorMode = 'normal' | 'insert' | 'command' | 'visual';

/**
 * A single key press as delivered by the terminal layer.
 *
 * Printable keys carry the character itself (`'a'`, `'$'`). Special keys use
 * names: `escape`, `enter`, `backspace`, `delete`, `tab`, `up`, `down`,
 * `left`, `right`, `home`, `end`.
 */
export interface KeyEvent {
    key: string;
    ctrl?: boolean;
    meta?: boolean;
    shift?: boolean;
}

/**
 * Yank/delete register contents.
 */
export interface Register {
    text: string;
    linewise: boolean;
}

export type MotionName =
    | 'h' | 'j' | 'k' | 'l'
    | 'w' | 'W' | 'b' | 'B' | 'e' | 'E' | 'ge'
    | '0' | '^' | '$'
    | 'gg' | 'G'
    | 'f' | 'F' | 't' | 'T'
    | '%';

export type OperatorName = 'd' | 'c' | 'y' | '>' | '<';

/**
 * Where a motion lands and how an operator should treat the range.
 */
export interface MotionResult {
    position: Position;

    /** Operators act on whole lines */
    linewise: boolean;

    /** Range includes the character under the target */
    inclusive: boolean;
}

/**
 * Named actions produced by command-line input (`:run`, `:w file`, ...).
 */
export type EditorCommand =
    | { type: 'run' }
    | { type: 'write'; path?: string }
    | { type: 'quit'; force: boolean }
    | { type: 'refresh' }
    | { type: 'connect'; name: string }
    | { type: 'disconnect' }
    | { type: 'cancel' }
    | { type: 'history' }
    | { type: 'unknown'; input: string };

/**
 * What a key press did, for the owner of the editor to react to.
 *
 * - `execute`: normal-mode Enter
 * - `command`: a command line was submitted
 * - `complete`: an insertion that should refresh completions
 * - `dismiss`: completions no longer apply
 */
export type EditorSignal =
    | { type: 'execute' }
    | { type: 'command'; command: EditorCommand }
    | { type: 'complete' }
    | { type: 'dismiss' };

export interface KeyOutcome {
    /** Buffer content or cursor changed */
    changed: boolean;

    /** Mode before the key, when it changed */
    previousMode?: EditorMode;

    signal?: EditorSignal;
}
