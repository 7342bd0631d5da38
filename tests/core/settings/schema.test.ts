import { describe, it, expect } from 'vitest';

import { parseSettings, SettingsValidationError } from '../../../src/core/settings/schema.js';

describe('settings: schema', () => {

    describe('parseSettings', () => {

        it('should fill every default for an empty object', () => {

            expect(parseSettings({})).toEqual({
                query: { timeoutMs: 30_000 },
                metadata: { timeoutMs: 10_000, retryAfterMs: 5_000, maxRetryAfterMs: 60_000 },
                connection: { timeoutMs: 15_000, retries: 3, retryDelayMs: 500, backoff: 2 },
                completion: { maxResults: 50, debounceMs: 30 },
                editor: { undoLimit: 200, tabWidth: 4 },
                history: { size: 20, persist: true },
                logging: { level: 'info', file: null },
            });

        });

        it('should treat null as empty', () => {

            expect(parseSettings(null).query.timeoutMs).toBe(30_000);

        });

        it('should reject too many retries', () => {

            expect(() => parseSettings({ connection: { retries: 11 } })).toThrow(SettingsValidationError);

        });

        it('should reject an invalid log level with the field path', () => {

            const error = (() => {

                try {

                    parseSettings({ logging: { level: 'loud' } });

                }
                catch (err) {

                    return err;

                }

                return null;

            })();

            expect(error).toBeInstanceOf(SettingsValidationError);
            expect(error).toHaveProperty('field', 'logging.level');

        });

    });

});
