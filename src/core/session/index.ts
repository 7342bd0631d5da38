/**
 * Query session: editor, completion and execution behind one event surface.
 */
export { QuerySession, createManager, toHistoryResult } from './session.js';
export { NoActiveConnectionError, UnknownConnectionError } from './errors.js';
export type { QuerySessionOptions, SessionEvents, SessionObserver } from './types.js';
