/**
 * Key helpers for editor and session tests.
 */
import type { KeyEvent, KeyOutcome } from '../../src/core/editor/types.js';

interface KeyTarget {
    handleKey(event: KeyEvent): KeyOutcome;
}

/**
 * Send each character of `text` as a printable key.
 */
export function typeKeys(target: KeyTarget, text: string): KeyOutcome[] {

    return [...text].map((key) => target.handleKey({ key }));

}

/**
 * Send named keys (`escape`, `enter`) or single characters in order.
 */
export function press(target: KeyTarget, ...keys: string[]): KeyOutcome[] {

    return keys.map((key) => target.handleKey({ key }));

}
