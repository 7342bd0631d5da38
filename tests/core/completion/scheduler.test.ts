import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import type { CompletionCandidate } from '../../../src/core/completion/engine.js';
import { CompletionScheduler } from '../../../src/core/completion/scheduler.js';
import { deferred } from '../../utils/deferred.js';

function candidate(text: string): CompletionCandidate {

    return { text, kind: 'keyword', score: 1, span: { start: 0, end: 1 }, replaced: 'S' };

}

describe('completion: CompletionScheduler', () => {

    beforeEach(() => {

        vi.useFakeTimers();

    });

    afterEach(() => {

        vi.useRealTimers();

    });

    it('should run only the latest request inside the debounce window', async () => {

        const complete = vi.fn(async (text: string) => [candidate(text)]);
        const onResult = vi.fn();
        const scheduler = new CompletionScheduler({ complete, debounceMs: 30, onResult });

        const first = scheduler.request('S', 1);
        const second = scheduler.request('SE', 2);

        await vi.advanceTimersByTimeAsync(30);

        expect(await first).toBeNull();
        expect(await second).toEqual([candidate('SE')]);
        expect(complete).toHaveBeenCalledTimes(1);
        expect(complete).toHaveBeenCalledWith('SE', 2);
        expect(onResult).toHaveBeenCalledWith([candidate('SE')], 2);

    });

    it('should drop a result that arrives after a newer request', async () => {

        const slow = deferred<CompletionCandidate[]>();
        const fast = deferred<CompletionCandidate[]>();
        const complete = vi.fn()
            .mockReturnValueOnce(slow.promise)
            .mockReturnValueOnce(fast.promise);
        const onResult = vi.fn();
        const scheduler = new CompletionScheduler({ complete, debounceMs: 30, onResult });

        const first = scheduler.request('S', 1);

        await vi.advanceTimersByTimeAsync(30);

        const second = scheduler.request('SE', 2);

        await vi.advanceTimersByTimeAsync(30);

        fast.resolve([candidate('SE')]);
        slow.resolve([candidate('S')]);

        expect(await second).toEqual([candidate('SE')]);
        expect(await first).toBeNull();
        expect(onResult).toHaveBeenCalledTimes(1);
        expect(onResult).toHaveBeenCalledWith([candidate('SE')], 2);

    });

    it('should resolve null and never run after cancel', async () => {

        const complete = vi.fn(async () => [candidate('S')]);
        const onResult = vi.fn();
        const scheduler = new CompletionScheduler({ complete, debounceMs: 30, onResult });

        const pending = scheduler.request('S', 1);

        scheduler.cancel();

        await vi.advanceTimersByTimeAsync(100);

        expect(await pending).toBeNull();
        expect(complete).not.toHaveBeenCalled();
        expect(onResult).not.toHaveBeenCalled();
        expect(scheduler.sequence).toBe(2);

    });

    it('should report failures through onError', async () => {

        const failure = new Error('metadata timed out');
        const complete = vi.fn(async (): Promise<CompletionCandidate[]> => {

            throw failure;

        });
        const onResult = vi.fn();
        const onError = vi.fn();
        const scheduler = new CompletionScheduler({ complete, debounceMs: 30, onResult, onError });

        const pending = scheduler.request('S', 1);

        await vi.advanceTimersByTimeAsync(30);

        expect(await pending).toBeNull();
        expect(onError).toHaveBeenCalledWith(failure, 1);
        expect(onResult).not.toHaveBeenCalled();

    });

});
