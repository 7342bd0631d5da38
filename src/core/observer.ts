/**
 * Central event system for sqlmode.
 *
 * Core modules emit events; the logger and any UI subscribe. Connection
 * and query state changes are published here so nothing in the core has
 * to know who is listening.
 *
 * @example
 * ```typescript
 * // In core module - emit events at key points
 * observer.emit('connection:open', { connection: 'local', dialect: 'mssql' })
 *
 * // Subscribe to a single event
 * const cleanup = observer.on('query:state', (data) => render(data))
 *
 * // Pattern matching for multiple events
 * observer.on(/^schema:/, ({ event, data }) => logSchemaEvent(event, data))
 * ```
 */
import {
    ObserverEngine,
    type Events
} from '@logosdx/observer'

import type { ExecutionStatus } from './connection/execution.js'


/**
 * All events emitted by sqlmode core modules.
 *
 * Events are namespaced by module:
 * - `connection:*` - Connection lifecycle and retries
 * - `query:*` - Query execution state
 * - `schema:*` - Metadata fetches and invalidation
 * - `settings:*` - Settings load
 * - `history:*` - Persisted query history
 * - `store:*` - Saved connection configs
 * - `error` - Catch-all errors
 */
export interface CoreEvents {

    // Connection lifecycle
    'connection:connecting': { connection: string; dialect: string; attempt: number }
    'connection:open': { connection: string; dialect: string; durationMs: number }
    'connection:close': { connection: string }
    'connection:error': { connection: string; kind: string; error: string }
    'connection:retry': { connection: string; attempt: number; error: string }
    'connection:database': { connection: string; database: string }

    // Query execution
    'query:state': { connection: string; executionId: string; status: ExecutionStatus; durationMs?: number; error?: string }
    'query:busy': { connection: string; runningId: string }
    'query:late-result': { connection: string; executionId: string }

    // Schema cache
    'schema:fetch': { connection: string; node: string }
    'schema:fetched': { connection: string; node: string; count: number; durationMs: number }
    'schema:failed': { connection: string; node: string; error: string; retryAt: number }
    'schema:invalidated': { connection: string; node: string | null }

    // Settings
    'settings:loaded': { path: string; fromFile: boolean }

    // History
    'history:saved': { connection: string; id: string; success: boolean }
    'history:cleared': { connection: string; entriesRemoved: number }

    // Connection store
    'store:saved': { name: string; path: string }
    'store:removed': { name: string; path: string }

    // Logger lifecycle
    'logger:started': { level: string; file: string | null }

    // Generic error
    'error': { source: string; error: Error; context?: Record<string, unknown> }
}

export type CoreEventNames = Events<CoreEvents>
export type CoreObserver = ObserverEngine<CoreEvents>


/**
 * Create an isolated core observer.
 *
 * Each ConnectionManager accepts one so tests and embedders do not share
 * the global bus.
 */
export function createObserver(name = 'sqlmode'): CoreObserver {

    return new ObserverEngine<CoreEvents>({
        name,
        spy: process.env['SQLMODE_DEBUG']
            ? (action) => console.error(`[${name}:${action.fn}] ${String(action.event)}`)
            : undefined
    })
}


/**
 * Shared observer used when a component is not given its own.
 */
export const observer: CoreObserver = createObserver()
