import { describe, it, expect } from 'vitest';
import { mkdtempSync, rmSync, existsSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { SettingsManager, applyEnvOverrides } from '../../../src/core/settings/manager.js';
import { SettingsValidationError } from '../../../src/core/settings/schema.js';
import { createObserver } from '../../../src/core/observer.js';
import { record } from '../../utils/events.js';

/**
 * Creates a fresh test context for each test.
 */
function createTestContext(env: NodeJS.ProcessEnv = {}) {

    const tempDir = mkdtempSync(join(process.cwd(), 'tmp', 'settings-test-'));
    const observer = createObserver();
    const manager = new SettingsManager({ dir: tempDir, env, observer });

    const writeSettings = (yaml: string) => writeFileSync(join(tempDir, 'settings.yml'), yaml, 'utf-8');

    const cleanup = () => {

        if (existsSync(tempDir)) {

            rmSync(tempDir, { recursive: true });

        }

    };

    return { tempDir, manager, observer, writeSettings, cleanup };

}

describe('settings: SettingsManager', () => {

    describe('load', () => {

        it('should return defaults when the file does not exist', async () => {

            const { manager, observer, cleanup } = createTestContext();
            const loaded = record(observer, 'settings:loaded');

            try {

                const settings = await manager.load();

                expect(settings.query.timeoutMs).toBe(30_000);
                expect(settings.metadata.timeoutMs).toBe(10_000);
                expect(settings.history.size).toBe(20);
                expect(loaded).toEqual([{ path: manager.settingsFilePath, fromFile: false }]);

            }
            finally {

                cleanup();

            }

        });

        it('should merge file values over defaults', async () => {

            const { manager, writeSettings, cleanup } = createTestContext();

            try {

                writeSettings('query:\n    timeoutMs: 5000\n');

                const settings = await manager.load();

                expect(settings.query.timeoutMs).toBe(5000);
                expect(settings.metadata.timeoutMs).toBe(10_000);

            }
            finally {

                cleanup();

            }

        });

        it('should apply environment overrides on top of the file', async () => {

            const { manager, writeSettings, cleanup } = createTestContext({
                SQLMODE_QUERY_TIMEOUT_MS: '1000',
                SQLMODE_HISTORY_PERSIST: 'false',
            });

            try {

                writeSettings('query:\n    timeoutMs: 5000\nhistory:\n    size: 5\n');

                const settings = await manager.load();

                expect(settings.query.timeoutMs).toBe(1000);
                expect(settings.history).toEqual({ size: 5, persist: false });

            }
            finally {

                cleanup();

            }

        });

        it('should name the invalid field', async () => {

            const { manager, writeSettings, cleanup } = createTestContext();

            try {

                writeSettings('query:\n    timeoutMs: 0\n');

                const error = await manager.load().catch((err: unknown) => err);

                expect(error).toBeInstanceOf(SettingsValidationError);
                expect(error).toHaveProperty('field', 'query.timeoutMs');
                expect(error).toHaveProperty('message', 'query.timeoutMs: Must be a positive number of milliseconds');

            }
            finally {

                cleanup();

            }

        });

        it('should reject invalid YAML', async () => {

            const { manager, writeSettings, cleanup } = createTestContext();

            try {

                writeSettings('query: [\n');

                await expect(manager.load()).rejects.toThrow(/^Invalid YAML in settings file/);

            }
            finally {

                cleanup();

            }

        });

        it('should reject a non-numeric environment override', async () => {

            const { manager, cleanup } = createTestContext({ SQLMODE_CONNECTION_RETRIES: 'many' });

            try {

                await expect(manager.load()).rejects.toHaveProperty('field', 'connection.retries');

            }
            finally {

                cleanup();

            }

        });

    });

    describe('settings', () => {

        it('should throw before load', () => {

            const { manager, cleanup } = createTestContext();

            try {

                expect(() => manager.settings).toThrow('Settings not loaded. Call load() first.');
                expect(manager.isLoaded).toBe(false);

            }
            finally {

                cleanup();

            }

        });

    });

    describe('init', () => {

        it('should write defaults that load back', async () => {

            const { manager, tempDir, cleanup } = createTestContext();

            try {

                await manager.init();

                expect(await manager.exists()).toBe(true);

                const reloaded = await new SettingsManager({ dir: tempDir, env: {} }).load();

                expect(reloaded).toEqual(manager.settings);

            }
            finally {

                cleanup();

            }

        });

        it('should refuse to overwrite without force', async () => {

            const { manager, cleanup } = createTestContext();

            try {

                await manager.init();

                await expect(manager.init()).rejects.toThrow('Settings file already exists. Use force=true to overwrite.');
                await expect(manager.init(true)).resolves.toBeUndefined();

            }
            finally {

                cleanup();

            }

        });

    });

});

describe('settings: applyEnvOverrides', () => {

    it('should leave raw settings alone without overrides', () => {

        expect(applyEnvOverrides(undefined, {})).toBeUndefined();

    });

    it('should create missing sections', () => {

        expect(applyEnvOverrides(undefined, { SQLMODE_LOG_LEVEL: 'verbose', SQLMODE_LOG_FILE: '' })).toEqual({
            logging: { level: 'verbose' },
        });

    });

});
