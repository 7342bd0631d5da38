/**
 * Completion request scheduling.
 *
 * Debounces requests and publishes only the result of the latest one.
 * Every request gets a sequence number; a result whose number is no longer
 * the latest when it arrives is dropped.
 *
 * @example
 * ```typescript
 * const scheduler = new CompletionScheduler({
 *     complete: (text, cursor) => engine.complete(text, cursor),
 *     debounceMs: 30,
 *     onResult: (candidates) => render(candidates),
 * })
 *
 * scheduler.request(text, cursor)
 * ```
 */
import { attempt } from '@logosdx/utils';

import type { CompletionCandidate } from './engine.js';

export interface CompletionSchedulerOptions {

    complete: (text: string, cursor: number) => Promise<CompletionCandidate[]>;

    /** Wait before running a request (default 30ms) */
    debounceMs?: number;

    /** Latest result */
    onResult: (candidates: CompletionCandidate[], sequence: number) => void;

    onError?: (error: Error, sequence: number) => void;
}

interface Pending {
    sequence: number;
    resolve: (candidates: CompletionCandidate[] | null) => void;
}

export class CompletionScheduler {

    readonly #complete: CompletionSchedulerOptions['complete'];
    readonly #debounceMs: number;
    readonly #onResult: CompletionSchedulerOptions['onResult'];
    readonly #onError: CompletionSchedulerOptions['onError'];

    #sequence = 0;
    #timer: ReturnType<typeof setTimeout> | undefined;
    #pending: Pending | undefined;

    constructor(options: CompletionSchedulerOptions) {

        this.#complete = options.complete;
        this.#debounceMs = options.debounceMs ?? 30;
        this.#onResult = options.onResult;
        this.#onError = options.onError;

    }

    /**
     * Sequence number of the latest request.
     */
    get sequence(): number {

        return this.#sequence;

    }

    /**
     * Schedule a completion. Resolves with the candidates once published,
     * or null when a newer request or `cancel()` superseded it.
     */
    request(text: string, cursor: number): Promise<CompletionCandidate[] | null> {

        this.#supersede();

        const sequence = ++this.#sequence;

        return new Promise((resolve) => {

            this.#pending = { sequence, resolve };
            this.#timer = setTimeout(() => {

                this.#timer = undefined;
                this.#pending = undefined;
                void this.#run(text, cursor, sequence).then(resolve);

            }, this.#debounceMs);

        });

    }

    /**
     * Drop any waiting or running request.
     */
    cancel(): void {

        this.#supersede();
        this.#sequence++;

    }

    async #run(text: string, cursor: number, sequence: number): Promise<CompletionCandidate[] | null> {

        const [candidates, error] = await attempt(() => this.#complete(text, cursor));

        if (sequence !== this.#sequence) {

            return null;

        }

        if (error) {

            this.#onError?.(error, sequence);

            return null;

        }

        const result = candidates ?? [];

        this.#onResult(result, sequence);

        return result;

    }

    #supersede(): void {

        clearTimeout(this.#timer);
        this.#timer = undefined;
        this.#pending?.resolve(null);
        this.#pending = undefined;

    }

}
