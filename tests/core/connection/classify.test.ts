import { describe, it, expect } from 'vitest';

import { classifyConnectionError, classifyQueryError, isNetworkFailure } from '../../../src/core/connection/classify.js';
import { AuthError, DriverError, NetworkError, QueryError } from '../../../src/core/connection/errors.js';
import { FakeDriverFailure } from '../../utils/fake-driver.js';

describe('connection: classify', () => {

    describe('classifyConnectionError', () => {

        it('should map login failures to AuthError', () => {

            const error = classifyConnectionError('local', new FakeDriverFailure("Login failed for user 'sa'.", 'ELOGIN'));

            expect(error).toBeInstanceOf(AuthError);
            expect(error.message).toBe("Login failed for user 'sa'.");
            expect(error.connection).toBe('local');

        });

        it('should map postgres auth codes to AuthError', () => {

            const error = classifyConnectionError('pg', new FakeDriverFailure('boom', '28P01'));

            expect(error).toBeInstanceOf(AuthError);

        });

        it('should map refused connections to NetworkError', () => {

            const raw = new FakeDriverFailure('connect ECONNREFUSED 127.0.0.1:1433', 'ECONNREFUSED');
            const error = classifyConnectionError('local', raw);

            expect(error).toBeInstanceOf(NetworkError);
            expect(error.cause).toBe(raw);

        });

        it('should map a missing module to DriverError', () => {

            const error = classifyConnectionError('local', new Error("Cannot find module 'tedious'"));

            expect(error).toBeInstanceOf(DriverError);

        });

        it('should treat anything unrecognized as DriverError', () => {

            expect(classifyConnectionError('local', new Error('TLS handshake rejected'))).toBeInstanceOf(DriverError);
            expect(classifyConnectionError('local', 'odd')).toBeInstanceOf(DriverError);

        });

        it('should pass classified errors through', () => {

            const auth = new AuthError('local', 'denied');

            expect(classifyConnectionError('local', auth)).toBe(auth);

        });

    });

    describe('classifyQueryError', () => {

        it('should keep the server code and message', () => {

            const error = classifyQueryError('local', new FakeDriverFailure("Invalid object name 'Nope'.", 'EREQUEST'));

            expect(error).toBeInstanceOf(QueryError);
            expect(error.message).toBe("Invalid object name 'Nope'.");
            expect(error instanceof QueryError && error.code).toBe('EREQUEST');

        });

        it('should map a dropped connection to NetworkError', () => {

            expect(classifyQueryError('local', new FakeDriverFailure('socket closed', 'ECONNRESET'))).toBeInstanceOf(NetworkError);

        });

    });

    it('should recognize network failures by message', () => {

        expect(isNetworkFailure(new Error('getaddrinfo ENOTFOUND db.internal'))).toBe(true);
        expect(isNetworkFailure(new Error('syntax error'))).toBe(false);

    });

});
