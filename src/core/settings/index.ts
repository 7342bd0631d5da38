/**
 * Settings module.
 *
 * User-level settings with defaults, YAML persistence and environment
 * overrides.
 */
export { SettingsManager, applyEnvOverrides } from './manager.js';
export type { SettingsManagerOptions } from './manager.js';
export { ENV_OVERRIDES, SETTINGS_FILE_NAME, createDefaultSettings } from './defaults.js';
export {
    SettingsSchema,
    LogLevelSchema,
    SettingsValidationError,
    parseSettings,
} from './schema.js';
export type { Settings, SettingsInput, LogLevel } from './schema.js';
