/**
 * SQL autocompletion.
 */
export { AutocompleteEngine, acceptCompletion } from './engine.js';
export type {
    AutocompleteEngineOptions,
    CandidateKind,
    CompletionCandidate,
    CompletionSource,
    CompletionSpan,
} from './engine.js';

export { analyzeContext, extractTableRefs, resolveQualifier } from './context.js';
export type { CompletionContext, TableRef } from './context.js';

export { CompletionScheduler } from './scheduler.js';
export type { CompletionSchedulerOptions } from './scheduler.js';

export { SQL_KEYWORDS, isReservedWord } from './keywords.js';
