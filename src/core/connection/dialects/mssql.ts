/**
 * SQL Server (MSSQL) dialect adapter.
 *
 * Uses 'tedious' and 'tarn' packages for MSSQL connections.
 * Install with: npm install tedious tarn
 *
 * Auth methods map onto tedious authentication types:
 *
 * - `password` → `default` (SQL Server auth)
 * - `integrated` → `ntlm`
 * - `entra-id` → `azure-active-directory-default` or
 *   `azure-active-directory-access-token`
 */
import { Kysely, MssqlDialect } from 'kysely'
import type { ConnectionConfig, Credentials } from '../types.js'
import { poolLimits } from './pool.js'


type TediousAuthentication = NonNullable<
    ConstructorParameters<typeof import('tedious').Connection>[0]['authentication']
>


/**
 * Tedious authentication block for a config and its credentials.
 */
export function buildAuthentication(config: ConnectionConfig, credentials: Credentials): TediousAuthentication {

    const auth = config.auth ?? { method: 'password', user: 'sa' }

    switch (auth.method) {

    case 'password':
        return {
            type: 'default',
            options: {
                userName: auth.user,
                password: credentials.password,
            },
        }

    case 'integrated':
        return {
            type: 'ntlm',
            options: {
                userName: auth.user ?? '',
                password: credentials.password ?? '',
                domain: auth.domain ?? '',
            },
        }

    case 'entra-id':
        if (auth.mode === 'access-token') {

            return {
                type: 'azure-active-directory-access-token',
                options: { token: credentials.accessToken ?? '' },
            }
        }

        return {
            type: 'azure-active-directory-default',
            options: auth.clientId ? { clientId: auth.clientId } : {},
        }
    }
}


/**
 * Create a SQL Server connection.
 *
 * @example
 * ```typescript
 * const db = await createMssqlConnection({
 *     name: 'local',
 *     dialect: 'mssql',
 *     host: 'localhost',
 *     port: 1433,
 *     database: 'shop',
 *     auth: { method: 'password', user: 'sa' },
 * }, { password: 'test-secret' })
 * ```
 */
export async function createMssqlConnection(
    config: ConnectionConfig,
    credentials: Credentials,
): Promise<Kysely<unknown>> {

    // Dynamic import to avoid compile-time dependency
    const Tedious = await import('tedious')
    const Tarn = await import('tarn')
    const { min, max } = poolLimits(config)

    return new Kysely<unknown>({
        dialect: new MssqlDialect({
            tarn: {
                ...Tarn,
                options: { min, max },
            },
            tedious: {
                ...Tedious,
                connectionFactory: () =>
                    new Tedious.Connection({
                        server: config.host ?? 'localhost',
                        authentication: buildAuthentication(config, credentials),
                        options: {
                            port: config.port ?? 1433,
                            database: config.database,
                            trustServerCertificate: config.trustServerCertificate ?? !config.encrypt,
                            encrypt: config.encrypt ?? false,
                        },
                    }),
            },
        }),
    })
}
