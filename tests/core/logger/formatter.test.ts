import { describe, it, expect } from 'vitest';

import { formatEntry, formatLine, generateMessage, serializeEntry } from '../../../src/core/logger/formatter.js';

const EPOCH = new Date(0);

describe('logger: formatter', () => {

    describe('generateMessage', () => {

        it('should use templates for known events', () => {

            expect(generateMessage('connection:open', { connection: 'local', dialect: 'mssql', durationMs: 42 }))
                .toBe('Connected to local (mssql, 42ms)');
            expect(generateMessage('connection:error', { connection: 'local', kind: 'AuthError', error: 'Login failed' }))
                .toBe('AuthError for local: Login failed');
            expect(generateMessage('schema:invalidated', { connection: 'local' }))
                .toBe('Schema cache invalidated on local (all)');

        });

        it('should include duration and error for finished queries', () => {

            expect(generateMessage('query:state', { connection: 'local', executionId: 'e1', status: 'failed', durationMs: 5, error: 'boom' }))
                .toBe('Query e1 on local: failed (5ms) boom');
            expect(generateMessage('query:state', { connection: 'local', executionId: 'e1', status: 'running' }))
                .toBe('Query e1 on local: running');

        });

        it('should fall back to a generic format', () => {

            expect(generateMessage('custom:thing', { a: 1, b: 'x', c: [1, 2], d: true })).toBe('custom thing: a=1, b="x", c=[2 items]');
            expect(generateMessage('custom:thing', {})).toBe('custom thing');

        });

        it('should describe errors by message', () => {

            expect(generateMessage('error', { source: 'connection', error: new Error('socket closed') }))
                .toBe('Error in connection: socket closed');

        });

    });

    describe('formatLine', () => {

        it('should pad the level', () => {

            expect(formatLine('info', 'connection:close', 'Disconnected from local', EPOCH))
                .toBe('[1970-01-01T00:00:00.000Z] [INFO ] [connection:close] Disconnected from local\n');

        });

    });

    describe('formatEntry', () => {

        it('should leave out data unless asked', () => {

            expect(formatEntry('info', 'connection:close', { connection: 'local' }, undefined, false, EPOCH)).toEqual({
                timestamp: '1970-01-01T00:00:00.000Z',
                level: 'info',
                event: 'connection:close',
                message: 'Disconnected from local',
            });

        });

        it('should include data and context when given', () => {

            const entry = formatEntry('info', 'connection:close', { connection: 'local' }, { session: 's1' }, true, EPOCH);

            expect(entry.data).toEqual({ connection: 'local' });
            expect(entry.context).toEqual({ session: 's1' });

        });

        it('should make errors JSON-safe', () => {

            const entry = formatEntry('error', 'error', { source: 'x', error: new Error('boom') }, undefined, true, EPOCH);

            expect(entry.data?.['error']).toMatchObject({ name: 'Error', message: 'boom' });

        });

    });

    it('should serialize one JSON line', () => {

        expect(serializeEntry({ timestamp: 't', level: 'warn', event: 'e', message: 'm' }))
            .toBe('{"timestamp":"t","level":"warn","event":"e","message":"m"}\n');

    });

});
