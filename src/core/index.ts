/**
 * Core module exports.
 *
 * All session logic is exported from here. Front ends (the CLI, a
 * terminal UI) import from this barrel file.
 */

// Observer
export { observer, createObserver } from './observer.js'
export type { CoreEvents, CoreEventNames, CoreObserver } from './observer.js'

// Environment
export { isCi, isDebug, getHomeDir } from './environment.js'

// Editor
export * from './editor/index.js'

// SQL statements
export * from './sql/index.js'

// Schema cache
export * from './schema/index.js'

// Completion
export * from './completion/index.js'

// Connection
export * from './connection/index.js'

// Config
export * from './config/index.js'

// Settings
export * from './settings/index.js'

// Connection store
export * from './store/index.js'

// History
export * from './history/index.js'

// Session
export * from './session/index.js'

// Logger
export {
    Logger,
    createLogger,
    classifyEvent,
    shouldLog,
    addMaskedFields,
    filterData,
} from './logger/index.js'
export type { EntryLevel, LogEntry, LoggerOptions, CreateLoggerOptions } from './logger/index.js'

// Shared
export { withDeadline } from './shared/index.js'
