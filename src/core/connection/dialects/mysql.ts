/**
 * MySQL dialect adapter.
 *
 * Uses the 'mysql2' package for MySQL connections.
 * Install with: npm install mysql2
 */
import { Kysely, MysqlDialect } from 'kysely';
import type { ConnectionConfig, Credentials } from '../types.js';
import { poolLimits } from './pool.js';

/**
 * Create a MySQL connection.
 *
 * @example
 * ```typescript
 * const db = await createMysqlConnection({
 *     name: 'mysql',
 *     dialect: 'mysql',
 *     host: 'localhost',
 *     database: 'shop',
 *     auth: { method: 'password', user: 'root' },
 * }, { password: 'test-secret' })
 * ```
 */
export async function createMysqlConnection(
    config: ConnectionConfig,
    credentials: Credentials,
): Promise<Kysely<unknown>> {

    // Dynamic import to avoid compile-time dependency
    const mysql2 = await import('mysql2');
    const createPool = mysql2.default?.createPool ?? mysql2.createPool;

    const pool = createPool({
        host: config.host ?? 'localhost',
        port: config.port ?? 3306,
        user: config.auth?.method === 'password' ? config.auth.user : undefined,
        password: credentials.password,
        database: config.database,
        connectionLimit: poolLimits(config).max,
        ssl: config.encrypt ? { rejectUnauthorized: !config.trustServerCertificate } : undefined,
    });

    return new Kysely<unknown>({
        dialect: new MysqlDialect({ pool }),
    });

}
