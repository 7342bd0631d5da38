/**
 * Settings Zod schemas and validation.
 *
 * Every field has a default, so an empty or missing settings file yields
 * a complete Settings object.
 */
import { z } from 'zod';

// ─────────────────────────────────────────────────────────────
// Base Schemas
// ─────────────────────────────────────────────────────────────

/**
 * Log level.
 */
export const LogLevelSchema = z.enum(['silent', 'error', 'warn', 'info', 'verbose']);

const MillisecondsSchema = z.number().int().min(1, 'Must be a positive number of milliseconds');

// ─────────────────────────────────────────────────────────────
// Section Schemas
// ─────────────────────────────────────────────────────────────

const QuerySettingsSchema = z.object({
    timeoutMs: MillisecondsSchema.default(30_000),
});

const MetadataSettingsSchema = z.object({
    timeoutMs: MillisecondsSchema.default(10_000),
    retryAfterMs: MillisecondsSchema.default(5_000),
    maxRetryAfterMs: MillisecondsSchema.default(60_000),
});

const ConnectionSettingsSchema = z.object({
    timeoutMs: MillisecondsSchema.default(15_000),
    retries: z.number().int().min(0).max(10).default(3),
    retryDelayMs: z.number().int().min(0).default(500),
    backoff: z.number().min(1).default(2),
});

const CompletionSettingsSchema = z.object({
    maxResults: z.number().int().min(1).max(500).default(50),
    debounceMs: z.number().int().min(0).default(30),
});

const EditorSettingsSchema = z.object({
    undoLimit: z.number().int().min(1).default(200),
    tabWidth: z.number().int().min(1).max(16).default(4),
});

const HistorySettingsSchema = z.object({
    size: z.number().int().min(1).default(20),
    persist: z.boolean().default(true),
});

const LoggingSettingsSchema = z.object({
    level: LogLevelSchema.default('info'),

    /** Log file path; null logs to the console only */
    file: z.string().nullable().default(null),
});

// ─────────────────────────────────────────────────────────────
// Main Settings Schema
// ─────────────────────────────────────────────────────────────

export const SettingsSchema = z.object({
    query: QuerySettingsSchema.default({}),
    metadata: MetadataSettingsSchema.default({}),
    connection: ConnectionSettingsSchema.default({}),
    completion: CompletionSettingsSchema.default({}),
    editor: EditorSettingsSchema.default({}),
    history: HistorySettingsSchema.default({}),
    logging: LoggingSettingsSchema.default({}),
});

export type Settings = z.infer<typeof SettingsSchema>;
export type SettingsInput = z.input<typeof SettingsSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

// ─────────────────────────────────────────────────────────────
// Validation Error
// ─────────────────────────────────────────────────────────────

/**
 * Error thrown when settings validation fails.
 */
export class SettingsValidationError extends Error {

    override readonly name = 'SettingsValidationError' as const;

    constructor(
        message: string,
        public readonly field: string,
        public readonly issues: z.ZodIssue[],
    ) {

        super(`${field}: ${message}`);

    }

}

// ─────────────────────────────────────────────────────────────
// Validation Functions
// ─────────────────────────────────────────────────────────────

/**
 * Validate settings and fill in defaults.
 *
 * @throws SettingsValidationError if validation fails
 *
 * @example
 * ```typescript
 * const settings = parseSettings({ query: { timeoutMs: 5000 } })
 * settings.metadata.timeoutMs // 10000
 * ```
 */
export function parseSettings(settings: unknown): Settings {

    const result = SettingsSchema.safeParse(settings ?? {});

    if (!result.success) {

        const firstIssue = result.error.issues[0];

        throw new SettingsValidationError(
            firstIssue?.message ?? 'Settings validation failed',
            firstIssue?.path.join('.') || 'unknown',
            result.error.issues,
        );

    }

    return result.data;

}
