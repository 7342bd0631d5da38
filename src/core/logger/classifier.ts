/**
 * Event Classifier
 *
 * Classifies observer events by log level based on naming patterns.
 *
 * Classification rules:
 * - 'error' or '*:error', '*:failed' -> error
 * - '*:retry', '*:busy', '*:late-result' -> warn
 * - '*:open', '*:close', '*:loaded', etc. -> info
 * - Everything else -> debug
 *
 * `query:state` is the exception: its level follows the execution status,
 * so a failed query is a warning while progress is debug noise.
 */
import type { EntryLevel, LogLevel } from './types.js';
import { ENTRY_LEVEL_PRIORITY, LOG_LEVEL_PRIORITY } from './types.js';

/**
 * Patterns that classify an event as error level.
 */
const ERROR_PATTERNS = [/^error$/, /:error$/, /:failed$/];

/**
 * Patterns that classify an event as warn level.
 */
const WARN_PATTERNS = [/:retry$/, /:busy$/, /:late-result$/];

/**
 * Patterns that classify an event as info level.
 * These are significant lifecycle events worth logging at default verbosity.
 */
const INFO_PATTERNS = [
    /:open$/,
    /:close$/,
    /:loaded$/,
    /:saved$/,
    /:removed$/,
    /:cleared$/,
    /:started$/,
    /:database$/,
    /:invalidated$/,
];

const QUERY_STATUS_LEVELS: Record<string, EntryLevel> = {
    failed: 'warn',
    cancelled: 'info',
    succeeded: 'info',
};

/**
 * Classify an event name to determine its log level.
 *
 * @example
 * ```typescript
 * classifyEvent('error')                // 'error'
 * classifyEvent('connection:error')     // 'error'
 * classifyEvent('connection:open')      // 'info'
 * classifyEvent('schema:fetch')         // 'debug'
 * classifyEvent('query:state', { status: 'failed' }) // 'warn'
 * ```
 */
export function classifyEvent(event: string, data?: Record<string, unknown>): EntryLevel {

    if (event === 'query:state') {

        const status = data?.['status'];

        return (typeof status === 'string' ? QUERY_STATUS_LEVELS[status] : undefined) ?? 'debug';

    }

    for (const pattern of ERROR_PATTERNS) {

        if (pattern.test(event)) {

            return 'error';

        }

    }

    for (const pattern of WARN_PATTERNS) {

        if (pattern.test(event)) {

            return 'warn';

        }

    }

    for (const pattern of INFO_PATTERNS) {

        if (pattern.test(event)) {

            return 'info';

        }

    }

    return 'debug';

}

/**
 * Check if an entry level passes the configured verbosity.
 *
 * @example
 * ```typescript
 * shouldLog('error', 'warn')   // true
 * shouldLog('debug', 'info')   // false
 * shouldLog('debug', 'verbose') // true
 * ```
 */
export function shouldLog(level: EntryLevel, configLevel: LogLevel): boolean {

    return ENTRY_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[configLevel];

}
