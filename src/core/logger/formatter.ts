/**
 * Log Formatter
 *
 * Turns observer events into human-readable lines for the console and
 * LogEntry JSON lines for the log file.
 */
import type { EntryLevel, LogEntry } from './types.js'


/**
 * Human-readable message templates for common events.
 * Keys are event names, values are functions that generate messages from event data.
 */
const MESSAGE_TEMPLATES: Record<string, (data: Record<string, unknown>) => string> = {

    // Connection
    'connection:connecting': (d) => `Connecting to ${d['connection']} (${d['dialect']}, attempt ${d['attempt']})`,
    'connection:open': (d) => `Connected to ${d['connection']} (${d['dialect']}, ${d['durationMs']}ms)`,
    'connection:close': (d) => `Disconnected from ${d['connection']}`,
    'connection:error': (d) => `${d['kind']} for ${d['connection']}: ${d['error']}`,
    'connection:retry': (d) => `Retrying ${d['connection']} after attempt ${d['attempt']}: ${d['error']}`,
    'connection:database': (d) => `${d['connection']} switched to database ${d['database']}`,

    // Query
    'query:state': (d) => d['durationMs'] === undefined
        ? `Query ${d['executionId']} on ${d['connection']}: ${d['status']}`
        : `Query ${d['executionId']} on ${d['connection']}: ${d['status']} (${d['durationMs']}ms)${d['error'] ? ` ${d['error']}` : ''}`,
    'query:busy': (d) => `${d['connection']} is busy running ${d['runningId']}`,
    'query:late-result': (d) => `Dropped late result of ${d['executionId']} on ${d['connection']}`,

    // Schema
    'schema:fetch': (d) => `Fetching ${d['node']} on ${d['connection']}`,
    'schema:fetched': (d) => `Fetched ${d['count']} children of ${d['node']} on ${d['connection']} (${d['durationMs']}ms)`,
    'schema:failed': (d) => `Metadata fetch for ${d['node']} on ${d['connection']} failed: ${d['error']}`,
    'schema:invalidated': (d) => `Schema cache invalidated on ${d['connection']} (${d['node'] ?? 'all'})`,

    // Settings, history, store
    'settings:loaded': (d) => d['fromFile'] ? `Settings loaded from ${d['path']}` : 'Using default settings',
    'history:saved': (d) => `Saved history entry ${d['id']} for ${d['connection']}`,
    'history:cleared': (d) => `Cleared ${d['entriesRemoved']} history entries for ${d['connection']}`,
    'store:saved': (d) => `Saved connection ${d['name']}`,
    'store:removed': (d) => `Removed connection ${d['name']}`,

    // Logger lifecycle
    'logger:started': (d) => `Logger started: ${d['file'] ?? 'console'} at ${d['level']} level`,

    // Generic error
    'error': (d) => `Error in ${d['source']}: ${describeError(d['error'])}`,
}


function describeError(value: unknown): string {

    return value instanceof Error ? value.message : String(value)
}


/**
 * Generate a human-readable message for an event.
 *
 * Uses templates for known events, falls back to generic format.
 *
 * @example
 * ```typescript
 * generateMessage('connection:close', { connection: 'local' })
 * // 'Disconnected from local'
 * generateMessage('custom:thing', { a: 1 })
 * // 'custom thing: a=1'
 * ```
 */
export function generateMessage(event: string, data: Record<string, unknown>): string {

    const template = MESSAGE_TEMPLATES[event]

    if (template) {

        return template(data)
    }

    // Generic format: "Event occurred" or "Event: key=value, ..."
    const parts = Object.entries(data)
        .slice(0, 3)
        .map(([k, v]) => `${k}=${summarizeValue(v)}`)

    if (parts.length === 0) {

        return event.replace(/:/g, ' ')
    }

    return `${event.replace(/:/g, ' ')}: ${parts.join(', ')}`
}


/**
 * Summarize a value for log message display.
 * Truncates long strings and formats objects.
 */
function summarizeValue(value: unknown): string {

    if (value === null || value === undefined) {

        return String(value)
    }

    if (typeof value === 'string') {

        if (value.length > 50) {

            return `"${value.slice(0, 47)}..."`
        }

        return `"${value}"`
    }

    if (typeof value === 'number' || typeof value === 'boolean') {

        return String(value)
    }

    if (Array.isArray(value)) {

        return `[${value.length} items]`
    }

    if (typeof value === 'object') {

        return `{${Object.keys(value).length} keys}`
    }

    return String(value)
}


/**
 * Format a console line.
 *
 * @example
 * ```typescript
 * formatLine('info', 'connection:close', 'Disconnected from local', new Date(0))
 * // '[1970-01-01T00:00:00.000Z] [INFO ] [connection:close] Disconnected from local\n'
 * ```
 */
export function formatLine(level: EntryLevel, event: string, message: string, at: Date = new Date()): string {

    return `[${at.toISOString()}] [${level.toUpperCase().padEnd(5)}] [${event}] ${message}\n`
}


/**
 * Format an event into a LogEntry.
 *
 * @param includeData - Whether to include the full payload (verbose mode)
 */
export function formatEntry(
    level: EntryLevel,
    event: string,
    data: Record<string, unknown>,
    context?: Record<string, unknown>,
    includeData = false,
    at: Date = new Date(),
): LogEntry {

    const entry: LogEntry = {
        timestamp: at.toISOString(),
        level,
        event,
        message: generateMessage(event, data),
    }

    if (includeData && Object.keys(data).length > 0) {

        entry.data = sanitizeData(data)
    }

    if (context && Object.keys(context).length > 0) {

        entry.context = context
    }

    return entry
}


/**
 * Make payload values JSON-safe.
 */
function sanitizeData(data: Record<string, unknown>): Record<string, unknown> {

    const result: Record<string, unknown> = {}

    for (const [key, value] of Object.entries(data)) {

        if (value instanceof Error) {

            result[key] = {
                name: value.name,
                message: value.message,
                stack: value.stack?.split('\n').slice(0, 3).join('\n'),
            }
            continue
        }

        if (value instanceof Date) {

            result[key] = value.toISOString()
            continue
        }

        result[key] = value
    }

    return result
}


/**
 * Serialize a LogEntry to a JSON line for file output.
 */
export function serializeEntry(entry: LogEntry): string {

    return JSON.stringify(entry) + '\n'
}
