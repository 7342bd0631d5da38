/**
 * Logger Module
 *
 * Captures core observer events and writes them to log outputs.
 *
 * Features:
 * - Automatic CI detection (stdout)
 * - Smart redaction of sensitive fields
 * - Level classification by event name
 */

// Types
export type { LogLevel, EntryLevel, LogEntry, LoggerState } from './types.js';
export { LOG_LEVEL_PRIORITY, ENTRY_LEVEL_PRIORITY } from './types.js';

// Classifier
export { classifyEvent, shouldLog } from './classifier.js';

// Formatter
export { generateMessage, formatEntry, formatLine, serializeEntry } from './formatter.js';

// Redaction
export { addMaskedFields, isMaskedField, maskValue, filterData } from './redact.js';

// Logger
export { Logger, createLogger } from './logger.js';
export type { LoggerOptions, CreateLoggerOptions } from './logger.js';
