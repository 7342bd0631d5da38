/**
 * Default Settings
 *
 * Defaults used when no settings.yml exists, plus the environment
 * variables that override individual settings.
 */
import { parseSettings, type Settings } from './schema.js';

export const SETTINGS_FILE_NAME = 'settings.yml';

/**
 * Create a fresh settings object with every default filled in.
 */
export function createDefaultSettings(): Settings {

    return parseSettings({});

}

type EnvValueType = 'number' | 'boolean' | 'string';

/**
 * Environment overrides, applied on top of the settings file.
 */
export const ENV_OVERRIDES = {
    SQLMODE_QUERY_TIMEOUT_MS: ['query', 'timeoutMs', 'number'],
    SQLMODE_METADATA_TIMEOUT_MS: ['metadata', 'timeoutMs', 'number'],
    SQLMODE_METADATA_RETRY_AFTER_MS: ['metadata', 'retryAfterMs', 'number'],
    SQLMODE_CONNECTION_TIMEOUT_MS: ['connection', 'timeoutMs', 'number'],
    SQLMODE_CONNECTION_RETRIES: ['connection', 'retries', 'number'],
    SQLMODE_COMPLETION_MAX_RESULTS: ['completion', 'maxResults', 'number'],
    SQLMODE_HISTORY_SIZE: ['history', 'size', 'number'],
    SQLMODE_HISTORY_PERSIST: ['history', 'persist', 'boolean'],
    SQLMODE_LOG_LEVEL: ['logging', 'level', 'string'],
    SQLMODE_LOG_FILE: ['logging', 'file', 'string'],
} as const satisfies Record<string, readonly [keyof Settings, string, EnvValueType]>;
