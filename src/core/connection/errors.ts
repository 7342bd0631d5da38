/**
 * Connection and query errors.
 *
 * Callers branch on the class: an AuthError asks for new credentials, a
 * DriverError asks for a driver install, a NetworkError was already
 * retried. Messages from the server are kept verbatim.
 */


/**
 * Credentials were rejected. Never retried.
 *
 * @example
 * ```typescript
 * const [conn, err] = await attempt(() => manager.connect(config))
 * if (err instanceof AuthError) promptForPassword(err.connection)
 * ```
 */
export class AuthError extends Error {

    override readonly name = 'AuthError' as const

    constructor(
        public readonly connection: string,
        message: string,
        options?: ErrorOptions,
    ) {

        super(message, options)
    }
}


/**
 * Server unreachable, connection dropped, or a time limit expired.
 */
export class NetworkError extends Error {

    override readonly name = 'NetworkError' as const

    constructor(
        public readonly connection: string,
        message: string,
        options?: ErrorOptions,
    ) {

        super(message, options)
    }
}


/**
 * Driver package missing or unable to talk to the server. Never retried.
 */
export class DriverError extends Error {

    override readonly name = 'DriverError' as const

    constructor(
        public readonly connection: string,
        message: string,
        public readonly installCommand?: string,
        options?: ErrorOptions,
    ) {

        super(message, options)
    }
}


/**
 * A query is already running on the connection.
 *
 * Thrown synchronously by `execute`; nothing is queued.
 */
export class BusyError extends Error {

    override readonly name = 'BusyError' as const

    constructor(
        public readonly connection: string,
        public readonly runningId: string,
    ) {

        super(`Connection '${connection}' is busy running ${runningId}`)
    }
}


/**
 * The execution was cancelled before it finished.
 */
export class CancelledError extends Error {

    override readonly name = 'CancelledError' as const

    constructor(public readonly executionId: string) {

        super(`Execution ${executionId} was cancelled`)
    }
}


/**
 * The server rejected a statement.
 *
 * `message` is the server's text, unmodified.
 */
export class QueryError extends Error {

    override readonly name = 'QueryError' as const

    constructor(
        message: string,
        public readonly code?: string,
        public readonly number?: number,
        options?: ErrorOptions,
    ) {

        super(message, options)
    }
}


/**
 * No open connection with that name.
 */
export class NotConnectedError extends Error {

    override readonly name = 'NotConnectedError' as const

    constructor(public readonly connection: string) {

        super(`Connection '${connection}' is not open`)
    }
}


export type ConnectionError = AuthError | NetworkError | DriverError;
