/**
 * Normal-mode key sequence parser.
 *
 * Collects count prefixes, pending operators, the `g` prefix and character
 * arguments until a complete command is typed. Anything that does not form
 * a command resets the parser and reports `invalid`, which the editor
 * treats as a no-op.
 *
 * @example
 * ```typescript
 * const parser = new NormalKeyParser()
 * parser.feed({ key: '2' })  // { status: 'pending' }
 * parser.feed({ key: 'd' })  // { status: 'pending' }
 * parser.feed({ key: 'w' })
 * // { status: 'complete', command: { kind: 'operator', operator: 'd', motion: 'w', count: 2 } }
 * ```
 */
import { CHAR_MOTIONS, isMotionName } from './motions.js';
import type { KeyEvent, MotionName, OperatorName } from './types.js';

/**
 * Counts above this are treated as malformed input.
 */
export const MAX_COUNT = 9999;

export type NormalAction =
    | 'insert'
    | 'append'
    | 'insert-line-start'
    | 'append-line-end'
    | 'open-below'
    | 'open-above'
    | 'delete-char'
    | 'delete-char-before'
    | 'delete-to-end'
    | 'change-to-end'
    | 'substitute-char'
    | 'substitute-line'
    | 'put-after'
    | 'put-before'
    | 'join'
    | 'replace'
    | 'undo'
    | 'redo'
    | 'visual'
    | 'visual-line'
    | 'command-line'
    | 'execute';

export type NormalCommand =
    | { kind: 'motion'; motion: MotionName; count?: number; char?: string }
    | { kind: 'operator'; operator: OperatorName; motion: MotionName; count?: number; char?: string }
    | { kind: 'lines'; operator: OperatorName; count: number }
    | { kind: 'action'; action: NormalAction; count: number; char?: string };

export type ParseResult =
    | { status: 'pending' }
    | { status: 'invalid' }
    | { status: 'complete'; command: NormalCommand };

const ACTION_KEYS: Record<string, NormalAction> = {
    i: 'insert',
    a: 'append',
    I: 'insert-line-start',
    A: 'append-line-end',
    o: 'open-below',
    O: 'open-above',
    x: 'delete-char',
    X: 'delete-char-before',
    D: 'delete-to-end',
    C: 'change-to-end',
    s: 'substitute-char',
    S: 'substitute-line',
    p: 'put-after',
    P: 'put-before',
    J: 'join',
    u: 'undo',
    v: 'visual',
    V: 'visual-line',
    ':': 'command-line',
};

const OPERATOR_KEYS: ReadonlySet<string> = new Set(['d', 'c', 'y', '>', '<']);

/**
 * Special keys that behave like a motion key.
 */
const KEY_ALIASES: Record<string, string> = {
    left: 'h',
    right: 'l',
    up: 'k',
    down: 'j',
    home: '0',
    end: '$',
};

function isOperator(key: string): key is OperatorName {

    return OPERATOR_KEYS.has(key);

}

/**
 * Single printable character.
 */
export function isPrintable(event: KeyEvent): boolean {

    return !event.ctrl && !event.meta && [...event.key].length === 1;

}

type AwaitingChar =
    | { type: 'motion'; motion: MotionName }
    | { type: 'replace' };

export class NormalKeyParser {

    #count = '';
    #operatorCount = '';
    #operator: OperatorName | null = null;
    #gPrefix = false;
    #awaiting: AwaitingChar | null = null;

    /**
     * True while a multi-key command is being typed.
     */
    get pending(): boolean {

        return this.#count !== ''
            || this.#operator !== null
            || this.#gPrefix
            || this.#awaiting !== null;

    }

    /**
     * The operator waiting for its motion, if any.
     */
    get operator(): OperatorName | null {

        return this.#operator;

    }

    reset(): void {

        this.#count = '';
        this.#operatorCount = '';
        this.#operator = null;
        this.#gPrefix = false;
        this.#awaiting = null;

    }

    feed(event: KeyEvent): ParseResult {

        if (event.ctrl) {

            const redo = event.key === 'r' && !this.pending;
            this.reset();

            return redo
                ? { status: 'complete', command: { kind: 'action', action: 'redo', count: 1 } }
                : { status: 'invalid' };

        }

        if (this.#awaiting) {

            return this.#completeCharArgument(event);

        }

        const key = KEY_ALIASES[event.key] ?? event.key;

        if (/^[1-9]$/.test(key) || (key === '0' && this.#activeCount() !== '')) {

            return this.#appendCount(key);

        }

        if (this.#gPrefix) {

            this.#gPrefix = false;

            if (key === 'g' || key === 'e') {

                return this.#motion(key === 'g' ? 'gg' : 'ge');

            }

            return this.#invalid();

        }

        if (key === 'g') {

            this.#gPrefix = true;

            return { status: 'pending' };

        }

        if (this.#operator) {

            if (key === this.#operator) {

                const command: NormalCommand = {
                    kind: 'lines',
                    operator: this.#operator,
                    count: this.#totalCount() ?? 1,
                };
                this.reset();

                return { status: 'complete', command };

            }

            if (isMotionName(key)) {

                return this.#motion(key);

            }

            return this.#invalid();

        }

        if (isOperator(key)) {

            this.#operator = key;

            return { status: 'pending' };

        }

        if (isMotionName(key)) {

            return this.#motion(key);

        }

        if (key === 'enter') {

            return this.#action('execute');

        }

        if (key === 'r') {

            this.#awaiting = { type: 'replace' };

            return { status: 'pending' };

        }

        const action = ACTION_KEYS[key];

        if (action) {

            return this.#action(action);

        }

        return this.#invalid();

    }

    #activeCount(): string {

        return this.#operator ? this.#operatorCount : this.#count;

    }

    #appendCount(digit: string): ParseResult {

        const next = this.#activeCount() + digit;

        if (Number(next) > MAX_COUNT) {

            return this.#invalid();

        }

        if (this.#operator) {

            this.#operatorCount = next;

        }
        else {

            this.#count = next;

        }

        return { status: 'pending' };

    }

    /**
     * Count prefixes multiply (`2d3w` deletes six words).
     */
    #totalCount(): number | undefined {

        if (this.#count === '' && this.#operatorCount === '') {

            return undefined;

        }

        const total = Number(this.#count || '1') * Number(this.#operatorCount || '1');

        return total > MAX_COUNT ? MAX_COUNT : total;

    }

    #motion(motion: MotionName, char?: string): ParseResult {

        if (char === undefined && CHAR_MOTIONS.has(motion)) {

            this.#awaiting = { type: 'motion', motion };

            return { status: 'pending' };

        }

        const count = this.#totalCount();
        const operator = this.#operator;
        this.reset();

        const command: NormalCommand = operator
            ? { kind: 'operator', operator, motion, count, char }
            : { kind: 'motion', motion, count, char };

        return { status: 'complete', command };

    }

    #action(action: NormalAction, char?: string): ParseResult {

        const count = this.#totalCount() ?? 1;
        this.reset();

        return { status: 'complete', command: { kind: 'action', action, count, char } };

    }

    #completeCharArgument(event: KeyEvent): ParseResult {

        const awaiting = this.#awaiting;
        this.#awaiting = null;

        if (!awaiting || !isPrintable(event)) {

            return this.#invalid();

        }

        if (awaiting.type === 'replace') {

            return this.#action('replace', event.key);

        }

        return this.#motion(awaiting.motion, event.key);

    }

    #invalid(): ParseResult {

        this.reset();

        return { status: 'invalid' };

    }

}
