import type { CoreEventNames, CoreEvents, CoreObserver } from '../../src/core/observer.js';

/**
 * Collect the payloads of one event as they are emitted.
 */
export function record<E extends CoreEventNames>(observer: CoreObserver, event: E): CoreEvents[E][] {

    const seen: CoreEvents[E][] = [];

    observer.on(event, (data) => {

        seen.push(data);

    });

    return seen;

}
