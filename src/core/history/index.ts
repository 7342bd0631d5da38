/**
 * Persistent query history.
 */
export { QueryHistoryStore } from './store.js';
export type { QueryHistoryStoreOptions } from './store.js';
export * from './types.js';
