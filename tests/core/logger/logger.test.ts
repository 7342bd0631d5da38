import { describe, it, expect } from 'vitest';
import { setImmediate as tick } from 'node:timers/promises';

import { Logger } from '../../../src/core/logger/logger.js';
import { createObserver } from '../../../src/core/observer.js';
import type { LogLevel } from '../../../src/core/logger/types.js';
import { capture } from '../../utils/streams.js';

/**
 * Capture split into the lines written so far.
 */
function lines(text: string): string[] {

    return text.split(/(?<=\n)/).filter(Boolean);

}

function setup(level: LogLevel, withFile = false) {

    const observer = createObserver();
    const consoleOut = capture();
    const fileOut = capture();
    const logger = new Logger({
        level,
        observer,
        console: consoleOut.stream,
        file: withFile ? fileOut.stream : null,
        now: () => new Date(0),
    });

    return {
        observer,
        logger,
        consoleLines: () => lines(consoleOut.text()),
        fileLines: () => lines(fileOut.text()),
    };

}

describe('logger: Logger', () => {

    it('should write observer events as console lines', async () => {

        const { observer, logger, consoleLines } = setup('info');

        logger.start();
        observer.emit('connection:open', { connection: 'local', dialect: 'mssql', durationMs: 42 });
        await tick();

        expect(logger.state).toBe('running');
        expect(consoleLines()).toEqual([
            '[1970-01-01T00:00:00.000Z] [INFO ] [logger:started] Logger started: console at info level\n',
            '[1970-01-01T00:00:00.000Z] [INFO ] [connection:open] Connected to local (mssql, 42ms)\n',
        ]);

        await logger.stop();

    });

    it('should filter events below the configured level', async () => {

        const { observer, logger, consoleLines } = setup('warn');

        logger.start();
        observer.emit('schema:fetch', { connection: 'local', node: 'root' });
        observer.emit('connection:close', { connection: 'local' });
        observer.emit('query:busy', { connection: 'local', runningId: 'e1' });
        await tick();

        expect(consoleLines()).toEqual([
            '[1970-01-01T00:00:00.000Z] [WARN ] [query:busy] local is busy running e1\n',
        ]);

        await logger.stop();

    });

    it('should write JSON lines with context to the file stream', async () => {

        const { observer, logger, fileLines } = setup('error', true);

        logger.setContext({ session: 's1' });
        logger.start();
        observer.emit('connection:error', { connection: 'local', kind: 'AuthError', error: 'Login failed' });
        await tick();

        expect(fileLines().map((line) => JSON.parse(line))).toEqual([{
            timestamp: '1970-01-01T00:00:00.000Z',
            level: 'error',
            event: 'connection:error',
            message: 'AuthError for local: Login failed',
            context: { session: 's1' },
        }]);

        await logger.stop();

    });

    it('should redact secrets in verbose file entries', async () => {

        const { observer, logger, fileLines } = setup('verbose', true);

        logger.start();
        observer.emit('error', { source: 'connection', error: new Error('boom'), context: { password: 'test-secret' } });
        await tick();

        const last = fileLines().at(-1);
        const entry: unknown = last === undefined ? null : JSON.parse(last);

        expect(entry).toMatchObject({
            level: 'error',
            message: 'Error in connection: boom',
            data: { context: { password: '<Password test******* (11) />' } },
        });

        await logger.stop();

    });

    it('should stop capturing after stop', async () => {

        const { observer, logger, consoleLines } = setup('info');

        logger.start();
        await logger.stop();
        observer.emit('connection:close', { connection: 'local' });
        await tick();

        expect(logger.state).toBe('stopped');
        expect(consoleLines()).toHaveLength(1);

    });

    it('should stay idle when silent', () => {

        const { logger } = setup('silent');

        logger.start();

        expect(logger.isEnabled).toBe(false);
        expect(logger.state).toBe('idle');

    });

    it('should write direct messages only while running', async () => {

        const { logger, consoleLines } = setup('info');

        logger.warn('before start');
        logger.start();
        logger.warn('Slow metadata fetch');
        logger.debug('hidden');
        await tick();

        expect(consoleLines().at(-1)).toBe('[1970-01-01T00:00:00.000Z] [WARN ] Slow metadata fetch\n');
        expect(consoleLines()).toHaveLength(2);

        await logger.stop();

    });

});
