/**
 * Connection module exports.
 *
 * Driver access, connection lifecycle and non-blocking query execution.
 */
export { ConnectionManager } from './manager.js';
export type { ConnectionManagerOptions, ManagedConnection } from './manager.js';
export { KyselyDriver, KyselyHandle, getInstallCommand } from './driver.js';
export type { Driver, DriverHandle } from './driver.js';
export { QueryExecution } from './execution.js';
export type { ExecutionState, ExecutionStatus, TerminalState } from './execution.js';
export { CredentialVault } from './vault.js';
export { classifyConnectionError, classifyQueryError, isAuthFailure, isNetworkFailure } from './classify.js';
export * from './errors.js';
export * from './types.js';
