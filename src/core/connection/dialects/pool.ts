/**
 * Pool sizing shared by the networked dialects.
 *
 * One connection by default: executions on a connection are sequential,
 * and session state such as `USE` lives on a single server connection.
 */
import type { ConnectionConfig } from '../types.js';

export interface PoolLimits {
    min: number;
    max: number;
}

export function poolLimits(config: ConnectionConfig): PoolLimits {

    return {
        min: config.pool?.min ?? 0,
        max: config.pool?.max ?? 1,
    };

}

/**
 * Whether every query shares one server connection, so per-connection
 * session state carries from one statement to the next.
 */
export function isSingleConnection(config: ConnectionConfig): boolean {

    return config.dialect === 'sqlite' || poolLimits(config).max === 1;

}
