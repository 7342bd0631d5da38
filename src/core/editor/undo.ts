/**
 * Undo history.
 *
 * Stores whole-buffer snapshots. Buffers are immutable, so a snapshot is
 * just a reference. Pushing a new entry clears the redo stack; the undo
 * stack is bounded and drops its oldest entry when full.
 */
import type { Buffer } from './types.js';

export class UndoHistory {

    #undo: Buffer[] = [];
    #redo: Buffer[] = [];
    readonly #limit: number;

    constructor(limit = 200) {

        this.#limit = Math.max(1, limit);

    }

    get canUndo(): boolean {

        return this.#undo.length > 0;

    }

    get canRedo(): boolean {

        return this.#redo.length > 0;

    }

    get size(): number {

        return this.#undo.length;

    }

    /**
     * Record the buffer as it was before a mutation.
     */
    push(snapshot: Buffer): void {

        this.#undo.push(snapshotOf(snapshot));

        if (this.#undo.length > this.#limit) {

            this.#undo.shift();

        }

        this.#redo = [];

    }

    /**
     * Step back. Returns the buffer to restore, or null when there is none.
     */
    undo(current: Buffer): Buffer | null {

        const previous = this.#undo.pop();

        if (!previous) {

            return null;

        }

        this.#redo.push(snapshotOf(current));

        return previous;

    }

    redo(current: Buffer): Buffer | null {

        const next = this.#redo.pop();

        if (!next) {

            return null;

        }

        this.#undo.push(snapshotOf(current));

        return next;

    }

    clear(): void {

        this.#undo = [];
        this.#redo = [];

    }

}

/**
 * Selection is view state, not content.
 */
function snapshotOf(buffer: Buffer): Buffer {

    return { lines: buffer.lines, cursor: buffer.cursor };

}
