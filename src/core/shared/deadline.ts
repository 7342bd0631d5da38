/**
 * Deadline helper.
 *
 * Runs abortable work with a time limit. The work receives a signal that
 * aborts on timeout or when the caller's own signal aborts, and the
 * returned promise rejects as soon as either happens, even if the work
 * ignores its signal.
 *
 * @example
 * ```typescript
 * const rows = await withDeadline(
 *     (signal) => driver.runQuery(handle, sql, signal),
 *     30_000,
 *     () => new NetworkError('local', 'Query timed out after 30000ms'),
 * )
 * ```
 */

export async function withDeadline<T>(
    work: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    onTimeout: () => Error,
    outer?: AbortSignal,
): Promise<T> {

    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    let detach: (() => void) | undefined;

    const stopped = new Promise<never>((_, reject) => {

        timer = setTimeout(() => {

            const error = onTimeout();
            controller.abort(error);
            reject(error);

        }, timeoutMs);

        if (outer) {

            const onAbort = () => {

                controller.abort(outer.reason);
                reject(outer.reason);

            };

            if (outer.aborted) {

                onAbort();

            }
            else {

                outer.addEventListener('abort', onAbort, { once: true });
                detach = () => outer.removeEventListener('abort', onAbort);

            }

        }

    });

    try {

        return await Promise.race([work(controller.signal), stopped]);

    }
    finally {

        clearTimeout(timer);
        detach?.();

    }

}
