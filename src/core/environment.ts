/**
 * Environment Detection
 *
 * Utilities for detecting the runtime environment (CI, headless, etc.).
 * The logger uses these to decide where lines go.
 */
import { homedir } from 'node:os';
import { join } from 'node:path';

/**
 * CI environment variable names to check.
 */
const CI_ENV_VARS = [
    'CI',
    'CONTINUOUS_INTEGRATION',
    'GITHUB_ACTIONS',
    'GITLAB_CI',
    'CIRCLECI',
    'TRAVIS',
    'JENKINS_URL',
    'BUILDKITE',
    'TEAMCITY_VERSION',
    'TF_BUILD',
    'BITBUCKET_BUILD_NUMBER',
];

/**
 * Detect if running in a CI/headless environment.
 *
 * Checks for:
 * - SQLMODE_HEADLESS=true environment variable
 * - Common CI environment variables
 * - No TTY available
 *
 * @example
 * ```typescript
 * if (isCi()) {
 *     // Log to stdout instead of file
 * }
 * ```
 */
export function isCi(): boolean {

    if (process.env['SQLMODE_HEADLESS'] === 'true') {

        return true;

    }

    for (const envVar of CI_ENV_VARS) {

        if (process.env[envVar]) {

            return true;

        }

    }

    // Piped output, non-interactive
    if (!process.stdout.isTTY) {

        return true;

    }

    return false;

}

/**
 * Check if debug logging is enabled.
 *
 * @returns true if SQLMODE_DEBUG is set
 */
export function isDebug(): boolean {

    return process.env['SQLMODE_DEBUG'] === 'true';

}

/**
 * Directory holding settings, saved connections and query history.
 *
 * Defaults to `~/.sqlmode`; `SQLMODE_HOME` overrides it.
 */
export function getHomeDir(): string {

    return process.env['SQLMODE_HOME'] ?? join(homedir(), '.sqlmode');

}
