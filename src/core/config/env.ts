/**
 * Connection config from environment variables.
 *
 * A connection can be described entirely through SQLMODE_CONNECTION_*
 * variables, so `sqlmode query` works in CI without a saved connection.
 * Uses makeNestedConfig to turn the flat variables into the nested
 * config shape; the underscore separator maps to object nesting.
 *
 * @example
 * ```bash
 * SQLMODE_CONNECTION_NAME=ci
 * SQLMODE_CONNECTION_DIALECT=postgres
 * SQLMODE_CONNECTION_HOST=localhost
 * SQLMODE_CONNECTION_PORT=5432
 * SQLMODE_CONNECTION_DATABASE=app
 * SQLMODE_CONNECTION_AUTH_METHOD=password
 * SQLMODE_CONNECTION_AUTH_USER=postgres
 * SQLMODE_PASSWORD=test-secret
 * ```
 */
import { makeNestedConfig } from '@logosdx/utils'

import type { ConnectionConfig } from '../connection/types.js'
import { parseConnectionConfig } from './schema.js'


const PREFIX = 'SQLMODE_CONNECTION_'


/**
 * Name given to an environment connection without SQLMODE_CONNECTION_NAME.
 */
export const ENV_CONNECTION_NAME = 'env'


/**
 * Read a connection config from SQLMODE_CONNECTION_* variables.
 *
 * Returns null when no dialect is set.
 *
 * @throws ConfigValidationError if the variables describe an invalid config
 */
export function getEnvConnection(env: NodeJS.ProcessEnv = process.env): ConnectionConfig | null {

    const vars: Record<string, string> = {}

    for (const [key, value] of Object.entries(env)) {

        if (key.startsWith(PREFIX) && value !== undefined) {

            vars[key] = value
        }
    }

    if (!vars[`${PREFIX}DIALECT`]) {

        return null
    }

    const { allConfigs } = makeNestedConfig<Record<string, unknown>>(
        vars,
        {
            stripPrefix: PREFIX,
            forceAllCapToLower: true,
            // Only port and encrypt are typed; names and hosts stay strings
            skipConversion: (key) => !/(port|encrypt)$/i.test(key),
        }
    )

    return parseConnectionConfig({ name: ENV_CONNECTION_NAME, ...allConfigs() })
}
