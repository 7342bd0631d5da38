/**
 * Settings Manager
 *
 * Loads, validates, and provides access to user settings from
 * `~/.sqlmode/settings.yml`, with SQLMODE_* environment overrides on top.
 */
import { readFile, writeFile, mkdir, access } from 'node:fs/promises'
import { join } from 'node:path'
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml'
import { attempt, attemptSync } from '@logosdx/utils'

import { getHomeDir } from '../environment.js'
import { observer as defaultObserver, type CoreObserver } from '../observer.js'
import { ENV_OVERRIDES, SETTINGS_FILE_NAME, createDefaultSettings } from './defaults.js'
import { parseSettings, type Settings } from './schema.js'


/**
 * Options for SettingsManager construction.
 */
export interface SettingsManagerOptions {

    /** Settings directory (default: ~/.sqlmode or SQLMODE_HOME) */
    dir?: string

    /** Override settings file name (default: settings.yml) */
    settingsFile?: string

    env?: NodeJS.ProcessEnv

    observer?: CoreObserver
}


function isRecord(value: unknown): value is Record<string, unknown> {

    return typeof value === 'object' && value !== null && !Array.isArray(value)
}


/**
 * Merge SQLMODE_* overrides into raw (unvalidated) settings.
 */
export function applyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv): unknown {

    const base: Record<string, unknown> = isRecord(raw) ? { ...raw } : {}
    let touched = false

    for (const [name, [section, key, type]] of Object.entries(ENV_OVERRIDES)) {

        const value = env[name]

        if (value === undefined || value === '') continue

        const current = base[section]
        const sectionValues: Record<string, unknown> = isRecord(current) ? { ...current } : {}

        switch (type) {

        case 'number':
            sectionValues[key] = Number(value)
            break

        case 'boolean':
            sectionValues[key] = value === 'true' || value === '1'
            break

        case 'string':
            sectionValues[key] = value
            break

        }

        base[section] = sectionValues
        touched = true
    }

    return touched || isRecord(raw) ? base : raw
}


/**
 * Manages user settings.
 *
 * Settings are loaded once and cached.
 *
 * @example
 * ```typescript
 * const manager = new SettingsManager()
 * const settings = await manager.load()
 *
 * settings.query.timeoutMs // 30000 unless overridden
 * ```
 */
export class SettingsManager {

    readonly #dir: string
    readonly #settingsFile: string
    readonly #env: NodeJS.ProcessEnv
    readonly #observer: CoreObserver
    #settings: Settings | null = null

    constructor(options: SettingsManagerOptions = {}) {

        this.#env = options.env ?? process.env
        this.#dir = options.dir ?? getHomeDir()
        this.#settingsFile = options.settingsFile ?? SETTINGS_FILE_NAME
        this.#observer = options.observer ?? defaultObserver
    }

    get settingsFilePath(): string {

        return join(this.#dir, this.#settingsFile)
    }

    get isLoaded(): boolean {

        return this.#settings !== null
    }

    /**
     * Loaded settings.
     *
     * @throws Error if `load()` has not run
     */
    get settings(): Settings {

        if (!this.#settings) {

            throw new Error('Settings not loaded. Call load() first.')
        }

        return this.#settings
    }

    async exists(): Promise<boolean> {

        const [, err] = await attempt(() => access(this.settingsFilePath))

        return !err
    }

    /**
     * Load settings from disk.
     *
     * A missing or empty file yields defaults. Invalid YAML or schema
     * violations throw.
     *
     * @throws SettingsValidationError if settings are invalid
     */
    async load(): Promise<Settings> {

        const fromFile = await this.exists()
        let raw: unknown = undefined

        if (fromFile) {

            const [content, readErr] = await attempt(() => readFile(this.settingsFilePath, 'utf-8'))

            if (readErr || typeof content !== 'string') {

                throw new Error(`Failed to read settings file: ${readErr?.message ?? 'no content'}`, { cause: readErr })
            }

            const [parsed, yamlErr] = attemptSync((): unknown => parseYaml(content))

            if (yamlErr) {

                throw new Error(`Invalid YAML in settings file: ${yamlErr.message}`, { cause: yamlErr })
            }

            raw = parsed ?? undefined
        }

        this.#settings = parseSettings(applyEnvOverrides(raw, this.#env))

        this.#observer.emit('settings:loaded', { path: this.settingsFilePath, fromFile })

        return this.#settings
    }

    /**
     * Write the current settings (defaults if none loaded) to disk.
     */
    async save(): Promise<void> {

        const settings = this.#settings ?? createDefaultSettings()

        await mkdir(this.#dir, { recursive: true })

        const yaml = stringifyYaml(settings, {
            indent: 4,
            lineWidth: 120,
        })

        await writeFile(this.settingsFilePath, yaml, 'utf-8')
    }

    /**
     * Write a settings file with defaults.
     *
     * @param force - Overwrite existing file if true
     * @throws Error if file exists and force is false
     */
    async init(force = false): Promise<void> {

        if (await this.exists() && !force) {

            throw new Error('Settings file already exists. Use force=true to overwrite.')
        }

        this.#settings = createDefaultSettings()

        await this.save()
    }
}
