/**
 * Command-line parsing (`:` mode).
 */
import type { EditorCommand } from './types.js';

/**
 * Parse a command line into a named action.
 *
 * Unrecognised input becomes `{ type: 'unknown' }` so the caller can report
 * it; parsing never throws.
 *
 * @example
 * ```typescript
 * parseCommand(':w out.sql')     // { type: 'write', path: 'out.sql' }
 * parseCommand('connect local') // { type: 'connect', name: 'local' }
 * parseCommand('wat')           // { type: 'unknown', input: 'wat' }
 * ```
 */
export function parseCommand(input: string): EditorCommand {

    const line = input.trim().replace(/^:/, '').trim();
    const [head = '', ...rest] = line.split(/\s+/);
    const arg = rest.join(' ').trim();

    switch (head) {

    case 'r':
    case 'run':
        return { type: 'run' };

    case 'w':
    case 'write':
        return arg ? { type: 'write', path: arg } : { type: 'write' };

    case 'q':
    case 'quit':
        return { type: 'quit', force: false };

    case 'q!':
    case 'quit!':
        return { type: 'quit', force: true };

    case 'refresh':
        return { type: 'refresh' };

    case 'connect':
        return arg ? { type: 'connect', name: arg } : { type: 'unknown', input: line };

    case 'disconnect':
        return { type: 'disconnect' };

    case 'cancel':
        return { type: 'cancel' };

    case 'history':
        return { type: 'history' };

    default:
        return { type: 'unknown', input: line };

    }

}
