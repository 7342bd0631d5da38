/**
 * Raw driver error classification.
 *
 * Drivers report failures as plain errors with driver-specific codes
 * (tedious `ELOGIN`, pg SQLSTATE `28P01`, mysql `ER_ACCESS_DENIED_ERROR`).
 * These helpers map them onto the connection error taxonomy, keeping the
 * original message.
 *
 * @example
 * ```typescript
 * catch (raw) {
 *     throw classifyConnectionError('local', raw)
 * }
 * ```
 */
import {
    AuthError,
    DriverError,
    NetworkError,
    QueryError,
} from './errors.js';
import type { ConnectionError } from './errors.js';

const AUTH_CODES = new Set(['ELOGIN', '28P01', '28000', 'ER_ACCESS_DENIED_ERROR', 'ER_DBACCESS_DENIED_ERROR', 'CredentialUnavailableError']);
const AUTH_MESSAGES = /login failed|authentication|password|access denied|not authorized|invalid credentials/i;

const NETWORK_CODES = new Set([
    'ECONNREFUSED',
    'ECONNRESET',
    'ETIMEDOUT',
    'ETIMEOUT',
    'ENOTFOUND',
    'EHOSTUNREACH',
    'ENETUNREACH',
    'EPIPE',
    'ESOCKET',
    'ECONNCLOSED',
    'PROTOCOL_CONNECTION_LOST',
    '57P01',
    '08006',
    '08001',
]);
const NETWORK_MESSAGES = /econnrefused|etimedout|timed out|timeout|connection reset|connection lost|too many connections|getaddrinfo|socket hang up|network/i;

const MISSING_MODULE = /cannot find (module|package)|err_module_not_found/i;

function codeOf(error: unknown): string | undefined {

    if (typeof error !== 'object' || error === null) {

        return undefined;

    }

    if ('code' in error && typeof error.code === 'string') {

        return error.code;

    }

    return undefined;

}

function numberOf(error: unknown): number | undefined {

    if (typeof error !== 'object' || error === null) {

        return undefined;

    }

    if ('number' in error && typeof error.number === 'number') {

        return error.number;

    }

    if ('errno' in error && typeof error.errno === 'number') {

        return error.errno;

    }

    return undefined;

}

function messageOf(error: unknown): string {

    return error instanceof Error ? error.message : String(error);

}

export function isNetworkFailure(error: unknown): boolean {

    const code = codeOf(error);

    return (code !== undefined && NETWORK_CODES.has(code)) || NETWORK_MESSAGES.test(messageOf(error));

}

export function isAuthFailure(error: unknown): boolean {

    const code = codeOf(error);

    return (code !== undefined && AUTH_CODES.has(code)) || AUTH_MESSAGES.test(messageOf(error));

}

/**
 * Classify a failure to open a connection.
 *
 * Already-classified errors pass through. Anything unrecognized is a
 * DriverError: the driver could not establish a session for a reason
 * retrying will not fix.
 */
export function classifyConnectionError(connection: string, error: unknown): ConnectionError {

    if (error instanceof AuthError || error instanceof NetworkError || error instanceof DriverError) {

        return error;

    }

    const message = messageOf(error);

    if (MISSING_MODULE.test(message) || codeOf(error) === 'ERR_MODULE_NOT_FOUND') {

        return new DriverError(connection, message, undefined, { cause: error });

    }

    if (isAuthFailure(error)) {

        return new AuthError(connection, message, { cause: error });

    }

    if (isNetworkFailure(error)) {

        return new NetworkError(connection, message, { cause: error });

    }

    return new DriverError(connection, message, undefined, { cause: error });

}

/**
 * Classify a failure while running a statement.
 *
 * Server errors become QueryError with the server's code; dropped
 * connections become NetworkError.
 */
export function classifyQueryError(connection: string, error: unknown): QueryError | NetworkError {

    if (error instanceof QueryError || error instanceof NetworkError) {

        return error;

    }

    const code = codeOf(error);

    if (code !== undefined && NETWORK_CODES.has(code)) {

        return new NetworkError(connection, messageOf(error), { cause: error });

    }

    return new QueryError(messageOf(error), code, numberOf(error), { cause: error });

}
