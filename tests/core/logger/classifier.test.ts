import { describe, it, expect } from 'vitest';

import { classifyEvent, shouldLog } from '../../../src/core/logger/classifier.js';

describe('logger: classifier', () => {

    describe('classifyEvent', () => {

        it('should classify "error" as error level', () => {

            expect(classifyEvent('error')).toBe('error');

        });

        it('should classify events ending with :error or :failed as error level', () => {

            expect(classifyEvent('connection:error')).toBe('error');
            expect(classifyEvent('schema:failed')).toBe('error');

        });

        it('should classify retries, busy rejections and late results as warn level', () => {

            expect(classifyEvent('connection:retry')).toBe('warn');
            expect(classifyEvent('query:busy')).toBe('warn');
            expect(classifyEvent('query:late-result')).toBe('warn');

        });

        it('should classify lifecycle events as info level', () => {

            expect(classifyEvent('connection:open')).toBe('info');
            expect(classifyEvent('connection:close')).toBe('info');
            expect(classifyEvent('connection:database')).toBe('info');
            expect(classifyEvent('settings:loaded')).toBe('info');
            expect(classifyEvent('schema:invalidated')).toBe('info');

        });

        it('should classify everything else as debug level', () => {

            expect(classifyEvent('schema:fetch')).toBe('debug');
            expect(classifyEvent('connection:connecting')).toBe('debug');

        });

        it('should classify query:state by its status', () => {

            expect(classifyEvent('query:state', { status: 'failed' })).toBe('warn');
            expect(classifyEvent('query:state', { status: 'succeeded' })).toBe('info');
            expect(classifyEvent('query:state', { status: 'cancelled' })).toBe('info');
            expect(classifyEvent('query:state', { status: 'running' })).toBe('debug');
            expect(classifyEvent('query:state')).toBe('debug');

        });

    });

    describe('shouldLog', () => {

        it('should pass entries at or above the configured verbosity', () => {

            expect(shouldLog('error', 'warn')).toBe(true);
            expect(shouldLog('warn', 'warn')).toBe(true);
            expect(shouldLog('info', 'warn')).toBe(false);
            expect(shouldLog('debug', 'info')).toBe(false);
            expect(shouldLog('debug', 'verbose')).toBe(true);

        });

        it('should pass nothing when silent', () => {

            expect(shouldLog('error', 'silent')).toBe(false);

        });

    });

});
