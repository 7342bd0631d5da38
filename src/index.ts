/**
 * sqlmode public API.
 *
 * The core session pieces plus the non-interactive runner used by the
 * `sqlmode` binary.
 */
export * from './core/index.js'

export { runOnce, EXIT_CODES } from './cli/run-once.js'
export type { RunOnceOptions, ExitCode } from './cli/run-once.js'
export { formatCsv, formatJson, formatResults } from './cli/format.js'
export type { OutputFormat, StatementResult } from './cli/format.js'
