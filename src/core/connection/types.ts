/**
 * Connection configuration and lifecycle types.
 *
 * A config describes where and how to connect. Credential material is not
 * part of it; it travels separately as `Credentials` and lives only in
 * memory.
 */

/**
 * Supported database dialects.
 */
export type Dialect = 'postgres' | 'mysql' | 'sqlite' | 'mssql';

/**
 * How a connection authenticates.
 *
 * - `integrated`: Windows integrated security (mssql, NTLM)
 * - `password`: user name and password (SQL Server auth, postgres, mysql)
 * - `entra-id`: Microsoft Entra ID (mssql), from the default credential
 *   chain or a supplied access token
 */
export type AuthConfig =
    | { method: 'integrated'; domain?: string; user?: string }
    | { method: 'password'; user: string }
    | { method: 'entra-id'; mode: 'default' | 'access-token'; clientId?: string };

export type AuthMethod = AuthConfig['method'];

/**
 * Database connection configuration.
 *
 * @example
 * ```typescript
 * const local: ConnectionConfig = {
 *     name: 'local',
 *     dialect: 'mssql',
 *     host: 'localhost',
 *     database: 'shop',
 *     auth: { method: 'password', user: 'sa' },
 *     trustServerCertificate: true,
 * }
 *
 * const scratch: ConnectionConfig = {
 *     name: 'scratch',
 *     dialect: 'sqlite',
 *     filename: ':memory:',
 * }
 * ```
 */
export interface ConnectionConfig {
    name: string;
    dialect: Dialect;

    // Network (postgres, mysql, mssql)
    host?: string;
    port?: number;

    database?: string;

    // SQLite file
    filename?: string;

    auth?: AuthConfig;

    // TLS
    encrypt?: boolean;
    trustServerCertificate?: boolean;

    pool?: {
        min?: number;
        max?: number;
    };
}

/**
 * Secret material for one connection. Never persisted, never logged.
 */
export interface Credentials {
    password?: string;
    accessToken?: string;
}

/**
 * Lifecycle of a managed connection.
 */
export type ConnectionState =
    | { status: 'disconnected' }
    | { status: 'connecting'; attempt: number }
    | { status: 'connected' }
    | { status: 'executing'; executionId: string }
    | { status: 'failed'; reason: string; error: Error };

export type ConnectionStatus = ConnectionState['status'];

/**
 * A finished query's result set.
 */
export interface QueryResult {
    columns: string[];
    rows: Record<string, unknown>[];
    rowsAffected?: number;
}
