/**
 * Saved connection configs.
 */
export { FileConnectionStore } from './connections.js';
export type { ConnectionLookup, FileConnectionStoreOptions } from './connections.js';
