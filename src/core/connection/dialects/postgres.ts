/**
 * PostgreSQL dialect adapter.
 *
 * Uses the 'pg' package for PostgreSQL connections.
 * Install with: npm install pg @types/pg
 */
import { Kysely, PostgresDialect } from 'kysely';
import type { ConnectionConfig, Credentials } from '../types.js';
import { poolLimits } from './pool.js';

/**
 * Create a PostgreSQL connection.
 *
 * @example
 * ```typescript
 * const db = await createPostgresConnection({
 *     name: 'pg',
 *     dialect: 'postgres',
 *     host: 'localhost',
 *     database: 'shop',
 *     auth: { method: 'password', user: 'postgres' },
 * }, { password: 'test-secret' })
 * ```
 */
export async function createPostgresConnection(
    config: ConnectionConfig,
    credentials: Credentials,
): Promise<Kysely<unknown>> {

    // Dynamic import to avoid compile-time dependency
    const pg = await import('pg');
    const Pool = pg.default?.Pool ?? pg.Pool;
    const { min, max } = poolLimits(config);

    const pool = new Pool({
        host: config.host ?? 'localhost',
        port: config.port ?? 5432,
        user: config.auth?.method === 'password' ? config.auth.user : undefined,
        password: credentials.password,
        database: config.database,
        min,
        max,
        ssl: config.encrypt ? { rejectUnauthorized: !config.trustServerCertificate } : undefined,
    });

    return new Kysely<unknown>({
        dialect: new PostgresDialect({ pool }),
    });

}
