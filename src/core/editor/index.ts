/**
 * Modal editor module.
 *
 * Vim-style editing over an immutable buffer. See ModalEditor for the state
 * machine and the pure helpers for buffer math and motions.
 */
export { ModalEditor } from './editor.js';
export type { ModalEditorOptions } from './editor.js';

export {
    createBuffer,
    bufferText,
    clampPosition,
    cursorOffset,
    insertText,
    lineAt,
    replaceRange,
    toOffset,
    toPosition,
    withCursor,
} from './buffer.js';

export { applyMotion, isMotionName } from './motions.js';
export { applyOperator, motionRange, selectionRange } from './operators.js';
export { parseCommand } from './commands.js';
export { NormalKeyParser, MAX_COUNT } from './keymap.js';
export { UndoHistory } from './undo.js';

export type {
    Buffer,
    EditorCommand,
    EditorMode,
    EditorSignal,
    KeyEvent,
    KeyOutcome,
    MotionName,
    MotionResult,
    OperatorName,
    Position,
    Register,
    Selection,
} from './types.js';
