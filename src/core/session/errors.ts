/**
 * Session errors.
 */


/**
 * An action needs a connection and none is active.
 */
export class NoActiveConnectionError extends Error {

    override readonly name = 'NoActiveConnectionError' as const

    constructor() {

        super('No active connection. Use :connect <name>')
    }
}


/**
 * `:connect <name>` named a connection that is not saved.
 */
export class UnknownConnectionError extends Error {

    override readonly name = 'UnknownConnectionError' as const

    constructor(public readonly connection: string) {

        super(`Unknown connection '${connection}'`)
    }
}
