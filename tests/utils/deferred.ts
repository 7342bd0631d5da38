/**
 * A promise the test settles by hand.
 */
export interface Deferred<T> {
    promise: Promise<T>;
    resolve: (value: T) => void;
    reject: (error: unknown) => void;
}

export function deferred<T>(): Deferred<T> {

    let resolve: (value: T) => void = () => undefined;
    let reject: (error: unknown) => void = () => undefined;

    const promise = new Promise<T>((res, rej) => {

        resolve = res;
        reject = rej;

    });

    return { promise, resolve, reject };

}

/**
 * Let pending promise callbacks run.
 */
export async function flushPromises(rounds = 5): Promise<void> {

    for (let i = 0; i < rounds; i++) {

        await Promise.resolve();

    }

}
