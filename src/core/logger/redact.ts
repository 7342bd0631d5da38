/**
 * Smart Redaction
 *
 * Masks sensitive fields in log data. Field names are matched through a
 * Set holding every case variation, so `accessToken`, `ACCESS_TOKEN` and
 * `access-token` all hit.
 *
 * - Max 12 mask chars + "..." for overflow
 * - First 4 chars visible in verbose mode
 *
 * @example
 * ```typescript
 * maskValue('mysecretpassword', 'Password', 'info')
 * // => '<Password ************... (16) />'
 *
 * maskValue('mysecretpassword', 'Password', 'verbose')
 * // => '<Password myse********... (16) />'
 * ```
 */
import type { LogLevel } from './types.js';

const MASK_MAX_LENGTH = 12;

// Set of all masked field name variations
const MASKED_FIELDS = new Set<string>();

// ─────────────────────────────────────────────────────────────
// Case Conversion Helpers
// ─────────────────────────────────────────────────────────────

function toCamelCase(str: string): string {

    return str
        .replace(/[-_\s]+(.)?/g, (_, c: string | undefined) => (c ? c.toUpperCase() : ''))
        .replace(/^[A-Z]/, (c) => c.toLowerCase());

}

function toSnakeCase(str: string): string {

    return str
        .replace(/[-\s]+/g, '_')
        .replace(/([a-z])([A-Z])/g, '$1_$2')
        .toLowerCase();

}

function toKebabCase(str: string): string {

    return str
        .replace(/[_\s]+/g, '-')
        .replace(/([a-z])([A-Z])/g, '$1-$2')
        .toLowerCase();

}

function toTitleCase(str: string): string {

    return str
        .replace(/[-_\s]+/g, ' ')
        .replace(/([a-z])([A-Z])/g, '$1 $2')
        .split(' ')
        .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
        .join('');

}

function cleanStr(str: string): string {

    return str.replace(/[-_\s]/g, '');

}

// ─────────────────────────────────────────────────────────────
// Field Registration
// ─────────────────────────────────────────────────────────────

/**
 * Add field names, with their case variations, to the masked set.
 * `sqlmode_` prefixed variants cover SQLMODE_* environment variables.
 */
export function addMaskedFields(fields: string[]): void {

    for (const field of fields) {

        for (const variant of [field, `sqlmode_${field}`]) {

            const snake = toSnakeCase(variant);
            const clean = cleanStr(variant);

            MASKED_FIELDS.add(variant);
            MASKED_FIELDS.add(variant.toLowerCase());
            MASKED_FIELDS.add(variant.toUpperCase());
            MASKED_FIELDS.add(toCamelCase(variant));
            MASKED_FIELDS.add(snake);
            MASKED_FIELDS.add(snake.toUpperCase());
            MASKED_FIELDS.add(toKebabCase(variant));
            MASKED_FIELDS.add(toTitleCase(variant));
            MASKED_FIELDS.add(clean);
            MASKED_FIELDS.add(clean.toLowerCase());
            MASKED_FIELDS.add(clean.toUpperCase());

        }

    }

}

addMaskedFields([
    'password',
    'pass',
    'pwd',
    'secret',
    'token',
    'access_token',
    'credential',
    'credentials',
    'client_secret',
    'private_key',
    'connection_string',
    'auth_token',
    'bearer_token',
]);

export function isMaskedField(key: string): boolean {

    return MASKED_FIELDS.has(key);

}

// ─────────────────────────────────────────────────────────────
// Masking
// ─────────────────────────────────────────────────────────────

/**
 * Mask a value with asterisks.
 *
 * Format: `<FieldName mask (length) />`
 */
export function maskValue(value: string, prefix: string, level: LogLevel): string {

    const valueLen = value.length;
    const maskLen = Math.min(valueLen, MASK_MAX_LENGTH);

    let masked = '*'.repeat(maskLen);

    if (level === 'verbose' && valueLen >= 4) {

        masked = value.slice(0, 4) + '*'.repeat(Math.max(0, maskLen - 4));

    }

    if (valueLen > MASK_MAX_LENGTH) {

        masked += '...';

    }

    return `<${toTitleCase(prefix)} ${masked} (${valueLen}) />`;

}

// ─────────────────────────────────────────────────────────────
// Data Filtering
// ─────────────────────────────────────────────────────────────

function filterValue(value: unknown, level: LogLevel): unknown {

    if (Array.isArray(value)) {

        return value.map((item) => filterValue(item, level));

    }

    if (typeof value !== 'object' || value === null) {

        return value;

    }

    // Leave class instances (Error, Date, URL) to the formatter
    if (Object.getPrototypeOf(value) !== Object.prototype) {

        return value;

    }

    return filterData(Object.fromEntries(Object.entries(value)), level);

}

/**
 * Recursively filter a payload, masking sensitive fields.
 *
 * Returns a copy; the original is not modified. Non-string secrets (an
 * object under `credentials`) are replaced entirely.
 *
 * @example
 * ```typescript
 * filterData({ connection: 'local', password: 'test-secret' }, 'info')
 * // { connection: 'local', password: '<Password *********** (11) />' }
 * ```
 */
export function filterData(entry: Record<string, unknown>, level: LogLevel): Record<string, unknown> {

    const filtered: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(entry)) {

        if (MASKED_FIELDS.has(key)) {

            filtered[key] = typeof value === 'string'
                ? maskValue(value, key, level)
                : `<${toTitleCase(key)} [redacted] />`;

            continue;

        }

        filtered[key] = filterValue(value, level);

    }

    return filtered;

}
