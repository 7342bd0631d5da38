/**
 * Environment connection tests.
 */
import { describe, it, expect } from 'vitest';

import { getEnvConnection, ENV_CONNECTION_NAME } from '../../../src/core/config/env.js';
import { ConfigValidationError } from '../../../src/core/config/schema.js';

describe('config: env', () => {

    describe('getEnvConnection', () => {

        it('should return null without a dialect', () => {

            expect(getEnvConnection({ SQLMODE_CONNECTION_HOST: 'localhost' })).toBeNull();
            expect(getEnvConnection({})).toBeNull();

        });

        it('should read a full connection', () => {

            const config = getEnvConnection({
                SQLMODE_CONNECTION_DIALECT: 'postgres',
                SQLMODE_CONNECTION_HOST: 'localhost',
                SQLMODE_CONNECTION_PORT: '5432',
                SQLMODE_CONNECTION_DATABASE: 'app',
                SQLMODE_CONNECTION_AUTH_METHOD: 'password',
                SQLMODE_CONNECTION_AUTH_USER: 'postgres',
                SQLMODE_PASSWORD: 'test-secret',
            });

            expect(config).toEqual({
                name: ENV_CONNECTION_NAME,
                dialect: 'postgres',
                host: 'localhost',
                port: 5432,
                database: 'app',
                auth: { method: 'password', user: 'postgres' },
            });

        });

        it('should take the name from SQLMODE_CONNECTION_NAME', () => {

            const config = getEnvConnection({
                SQLMODE_CONNECTION_NAME: 'ci',
                SQLMODE_CONNECTION_DIALECT: 'sqlite',
                SQLMODE_CONNECTION_FILENAME: 'app.db',
            });

            expect(config).toEqual({ name: 'ci', dialect: 'sqlite', filename: 'app.db' });

        });

        it('should keep numeric-looking names as strings', () => {

            const config = getEnvConnection({
                SQLMODE_CONNECTION_DIALECT: 'mssql',
                SQLMODE_CONNECTION_HOST: 'db01',
                SQLMODE_CONNECTION_DATABASE: '2024',
            });

            expect(config?.database).toBe('2024');

        });

        it('should reject an invalid dialect', () => {

            expect(() => getEnvConnection({ SQLMODE_CONNECTION_DIALECT: 'oracle' })).toThrow(ConfigValidationError);

        });

        it('should require a host for network dialects', () => {

            expect(() => getEnvConnection({ SQLMODE_CONNECTION_DIALECT: 'mysql' })).toThrow('Host is required for non-SQLite databases');

        });

    });

});
