import { describe, it, expect } from 'vitest';

import { withDeadline } from '../../../src/core/shared/deadline.js';

describe('shared: withDeadline', () => {

    it('should resolve with the work result', async () => {

        expect(await withDeadline(async () => 'done', 1000, () => new Error('late'))).toBe('done');

    });

    it('should reject and abort the work on timeout', async () => {

        let seen: AbortSignal | undefined;

        const pending = withDeadline((signal) => {

            seen = signal;

            return new Promise<never>(() => undefined);

        }, 10, () => new Error('Query timed out after 10ms'));

        await expect(pending).rejects.toThrow('Query timed out after 10ms');
        expect(seen?.aborted).toBe(true);

    });

    it('should reject with the outer reason when the caller aborts', async () => {

        const outer = new AbortController();
        const pending = withDeadline(() => new Promise<never>(() => undefined), 1000, () => new Error('late'), outer.signal);

        outer.abort(new Error('cancelled'));

        await expect(pending).rejects.toThrow('cancelled');

    });

    it('should not start waiting on an already aborted signal', async () => {

        const outer = new AbortController();

        outer.abort(new Error('gone'));

        await expect(withDeadline(() => new Promise<never>(() => undefined), 1000, () => new Error('late'), outer.signal)).rejects.toThrow('gone');

    });

});
