/**
 * Session type definitions.
 */
import type { ObserverEngine } from '@logosdx/observer';

import type { CompletionCandidate } from '../completion/engine.js';
import type { ConnectionManager } from '../connection/manager.js';
import type { ExecutionStatus, QueryExecution } from '../connection/execution.js';
import type { EditorCommand, EditorMode, Position } from '../editor/types.js';
import type { QueryHistoryStore } from '../history/store.js';
import type { Settings } from '../settings/schema.js';
import type { ConnectionLookup } from '../store/connections.js';

/**
 * Events published to the UI layer.
 */
export interface SessionEvents {
    'buffer:changed': { text: string; cursor: Position }
    'mode:changed': { mode: EditorMode; previous: EditorMode }
    'completion:changed': { candidates: CompletionCandidate[]; selected: number }
    'execution:changed': { execution: QueryExecution; status: ExecutionStatus }
    'command:result': { command: EditorCommand; ok: boolean; message: string }
    'connection:changed': { connection: string | null }
    'quit': { force: boolean }
    'error': { source: string; error: Error }
}

export type SessionObserver = ObserverEngine<SessionEvents>;

export interface QuerySessionOptions {

    /** Shared manager; when omitted the session creates and owns one */
    manager?: ConnectionManager;

    /** Defaults apply when omitted */
    settings?: Settings;

    /** Resolves `:connect <name>` */
    connections?: ConnectionLookup;

    /** Persistent history per connection; null skips persisting. Unused when `history.persist` is off */
    history?: (connection: string) => QueryHistoryStore | null;

    /** Initial buffer text */
    text?: string;

    /** Target of `:w` without a path */
    file?: string;
}
