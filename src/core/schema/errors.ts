/**
 * Schema cache errors.
 */


/**
 * A metadata fetch failed.
 *
 * Transient: the cache remembers it until `retryAt`, then tries again on
 * the next access. `refresh()` clears it sooner.
 *
 * @example
 * ```typescript
 * const [children, err] = await attempt(() => cache.listChildren(db))
 * if (err instanceof SchemaFetchError) {
 *     showStatus(`Metadata unavailable until ${new Date(err.retryAt).toLocaleTimeString()}`)
 * }
 * ```
 */
export class SchemaFetchError extends Error {

    override readonly name = 'SchemaFetchError' as const

    constructor(
        public readonly node: string,
        public readonly retryAt: number,
        public override readonly cause: unknown,
    ) {

        const reason = cause instanceof Error ? cause.message : String(cause)

        super(`Failed to load ${node || 'databases'}: ${reason}`)
    }
}


/**
 * A node whose ancestors are no longer in the cache.
 *
 * Happens when a caller holds a node across an invalidation of its parent.
 */
export class StaleNodeError extends Error {

    override readonly name = 'StaleNodeError' as const

    constructor(public readonly node: string) {

        super(`Schema node '${node}' is no longer cached; reload its parent`)
    }
}
