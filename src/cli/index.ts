#!/usr/bin/env node
/**
 * CLI entry point for sqlmode.
 *
 * Parses command line arguments with meow and runs one of the
 * non-interactive commands. Result sets go to stdout; logs and errors go
 * to stderr.
 *
 * @example
 * ```bash
 * sqlmode query -c local --sql "SELECT 1 AS one"
 * sqlmode query -c local --file report.sql --format json
 * sqlmode connections
 * ```
 */
import meow from 'meow'
import { attempt } from '@logosdx/utils'

import { getEnvConnection, ENV_CONNECTION_NAME } from '../core/config/env.js'
import type { ConnectionConfig, Credentials } from '../core/connection/types.js'
import { createLogger } from '../core/logger/logger.js'
import { createManager } from '../core/session/session.js'
import { SettingsManager } from '../core/settings/manager.js'
import { FileConnectionStore } from '../core/store/connections.js'
import type { OutputFormat } from './format.js'
import { EXIT_CODES, runOnce } from './run-once.js'
import { theme } from './theme.js'


const HELP_TEXT = `
  Usage
    $ sqlmode <command> [options]

  Commands
    query               Run SQL against a connection and print the results
    connections         List saved connections

  Options
    --connection, -c <name>  Connection to use (saved, or 'env' for SQLMODE_CONNECTION_*)
    --sql <text>             SQL to run
    --file, -f <path>        SQL file to run
    --format <csv|json>      Output format (default: csv)
    --password, -p <value>   Password (or SQLMODE_PASSWORD)
    --access-token <value>   Entra ID access token (or SQLMODE_ACCESS_TOKEN)
    --help, -h               Show this help
    --version                Show version

  Examples
    $ sqlmode query -c local --sql "SELECT name FROM sys.tables"
    $ sqlmode query -c local -f report.sql --format json > report.json
    $ SQLMODE_CONNECTION_DIALECT=sqlite SQLMODE_CONNECTION_FILENAME=app.db sqlmode query -c env --sql "SELECT 1"
`


function isOutputFormat(value: string): value is OutputFormat {

    return value === 'csv' || value === 'json'
}


function parseCli() {

    return meow(HELP_TEXT, {
        importMeta: import.meta,
        flags: {
            connection: {
                type: 'string',
                shortFlag: 'c'
            },
            sql: {
                type: 'string'
            },
            file: {
                type: 'string',
                shortFlag: 'f'
            },
            format: {
                type: 'string',
                default: 'csv'
            },
            password: {
                type: 'string',
                shortFlag: 'p'
            },
            accessToken: {
                type: 'string'
            }
        }
    })
}


/**
 * Credentials from flags, falling back to the environment.
 */
function resolveCredentials(flags: { password?: string, accessToken?: string }): Credentials | undefined {

    const password = flags.password ?? process.env['SQLMODE_PASSWORD']
    const accessToken = flags.accessToken ?? process.env['SQLMODE_ACCESS_TOKEN']

    if (password === undefined && accessToken === undefined) return undefined

    const credentials: Credentials = {}

    if (password !== undefined) credentials.password = password
    if (accessToken !== undefined) credentials.accessToken = accessToken

    return credentials
}


/**
 * Saved connections first; the SQLMODE_CONNECTION_* connection answers to
 * its own name or to any name the store does not know.
 */
async function resolveConnection(store: FileConnectionStore, name: string): Promise<ConnectionConfig | null> {

    const saved = name === ENV_CONNECTION_NAME ? null : await store.get(name)

    if (saved) return saved

    const fromEnv = getEnvConnection(process.env)

    return fromEnv ? { ...fromEnv, name } : null
}


async function listConnections(store: FileConnectionStore): Promise<number> {

    const [connections, err] = await attempt(() => store.list())

    if (err || !connections) {

        process.stderr.write(theme.error(err?.message ?? 'Cannot read connections') + '\n')

        return EXIT_CODES.usage
    }

    if (connections.length === 0) {

        process.stderr.write(theme.muted(`No saved connections in ${store.path}`) + '\n')

        return EXIT_CODES.success
    }

    for (const connection of connections) {

        const target = connection.dialect === 'sqlite'
            ? connection.filename ?? ':memory:'
            : `${connection.host ?? ''}${connection.port ? `:${connection.port}` : ''}`

        const database = connection.database ? `/${connection.database}` : ''

        process.stdout.write(`${theme.bold(connection.name)}  ${theme.primary(connection.dialect)}  ${target}${database}\n`)
    }

    return EXIT_CODES.success
}


async function main(): Promise<number> {

    const cli = parseCli()
    const [command] = cli.input

    const settingsManager = new SettingsManager()
    const [settings, settingsErr] = await attempt(() => settingsManager.load())

    if (settingsErr || !settings) {

        process.stderr.write(theme.error(settingsErr?.message ?? 'Cannot load settings') + '\n')

        return EXIT_CODES.usage
    }

    const logger = createLogger(settings.logging, { console: process.stderr })

    logger.start()

    const store = new FileConnectionStore()
    let exitCode: number

    switch (command) {

    case 'connections':
        exitCode = await listConnections(store)
        break

    case 'query': {

        const { connection, sql, file, format } = cli.flags

        if (!connection || !isOutputFormat(format)) {

            process.stderr.write(theme.error('query needs --connection and --format csv|json') + '\n')
            exitCode = EXIT_CODES.usage
            break
        }

        const [config, lookupErr] = await attempt(() => resolveConnection(store, connection))

        if (lookupErr) {

            process.stderr.write(theme.error(lookupErr.message) + '\n')
            exitCode = EXIT_CODES.connectionFailure
            break
        }

        const options: Parameters<typeof runOnce>[0] = {
            connection: config ?? connection,
            format,
            manager: createManager(settings),
        }

        if (sql !== undefined) options.sql = sql
        if (file !== undefined) options.file = file

        const credentials = resolveCredentials(cli.flags)

        if (credentials) options.credentials = credentials

        const manager = options.manager

        exitCode = await runOnce(options)

        await manager?.closeAll()
        break
    }

    default:
        cli.showHelp(EXIT_CODES.usage)
        exitCode = EXIT_CODES.usage
    }

    await logger.stop()

    return exitCode
}


main()
    .then((exitCode) => {

        process.exitCode = exitCode
    })
    .catch((error: unknown) => {

        process.stderr.write(theme.error(`Fatal error: ${error instanceof Error ? error.message : String(error)}`) + '\n')
        process.exitCode = 1
    })
