/**
 * Vitest global setup.
 *
 * Creates tmp/ before tests run and removes the tmp/test-[hex]
 * directories they leave behind.
 */
import { mkdirSync } from 'node:fs';
import { readdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { attempt } from '@logosdx/utils';

/**
 * Pattern matching test directories (test-[8 hex chars]).
 */
const TEST_DIR_PATTERN = /^test-[0-9a-f]{8}$/;

export default function globalSetup(): () => Promise<void> {

    const tmpDir = join(process.cwd(), 'tmp');

    mkdirSync(tmpDir, { recursive: true });

    return async () => {

        const [entries] = await attempt(() => readdir(tmpDir));
        const testDirs = (entries ?? []).filter((name) => TEST_DIR_PATTERN.test(name));

        await Promise.all(
            testDirs.map((name) => rm(join(tmpDir, name), { recursive: true, force: true })),
        );

    };

}
