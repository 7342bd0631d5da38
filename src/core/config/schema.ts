/**
 * Connection config Zod schemas and validation.
 *
 * Uses Zod for declarative validation with better error messages
 * and type inference.
 */
import { z } from 'zod';

import type { ConnectionConfig } from '../connection/types.js';

/**
 * Valid database dialects.
 */
export const DialectSchema = z.enum(['postgres', 'mysql', 'sqlite', 'mssql']);

/**
 * Connection name pattern - alphanumeric with hyphens and underscores.
 */
export const ConnectionNameSchema = z
    .string()
    .min(1, 'Connection name is required')
    .regex(
        /^[a-z0-9_-]+$/i,
        'Connection name must contain only letters, numbers, hyphens, and underscores',
    );

/**
 * Port number validation.
 */
const PortSchema = z
    .number()
    .int()
    .min(1, 'Port must be at least 1')
    .max(65535, 'Port must be at most 65535');

const PoolSchema = z.object({
    min: z.number().int().min(0).optional(),
    max: z.number().int().min(1).optional(),
});

/**
 * Authentication. `integrated` and `entra-id` are SQL Server only.
 */
export const AuthSchema = z.discriminatedUnion('method', [
    z.object({
        method: z.literal('integrated'),
        domain: z.string().optional(),
        user: z.string().optional(),
    }),
    z.object({
        method: z.literal('password'),
        user: z.string().min(1, 'User is required for password authentication'),
    }),
    z.object({
        method: z.literal('entra-id'),
        mode: z.enum(['default', 'access-token']).default('default'),
        clientId: z.string().optional(),
    }),
]);

/**
 * Connection configuration schema.
 *
 * SQLite only requires a name and a filename (or database).
 * Other dialects require host.
 */
export const ConnectionConfigSchema = z
    .object({
        name: ConnectionNameSchema,
        dialect: DialectSchema,
        host: z.string().optional(),
        port: PortSchema.optional(),
        database: z.string().min(1).optional(),
        filename: z.string().optional(),
        auth: AuthSchema.optional(),
        encrypt: z.boolean().optional(),
        trustServerCertificate: z.boolean().optional(),
        pool: PoolSchema.optional(),
    })
    .refine((conn) => conn.dialect === 'sqlite' || conn.host, {
        message: 'Host is required for non-SQLite databases',
        path: ['host'],
    })
    .refine((conn) => conn.dialect === 'mssql' || !conn.auth || conn.auth.method === 'password', {
        message: 'Integrated and Entra ID authentication are only supported for mssql',
        path: ['auth', 'method'],
    });

export type ConnectionConfigInput = z.input<typeof ConnectionConfigSchema>;

/**
 * Validation error with the first failing field.
 */
export class ConfigValidationError extends Error {

    override readonly name = 'ConfigValidationError' as const;

    constructor(
        message: string,
        public readonly field: string,
        public readonly issues: z.ZodIssue[],
    ) {

        super(message);

    }

}

/**
 * Validate and normalize a connection config.
 *
 * @throws ConfigValidationError if validation fails
 *
 * @example
 * ```typescript
 * const config = parseConnectionConfig({
 *     name: 'local',
 *     dialect: 'mssql',
 *     host: 'localhost',
 *     auth: { method: 'password', user: 'sa' },
 * })
 * ```
 */
export function parseConnectionConfig(input: unknown): ConnectionConfig {

    const result = ConnectionConfigSchema.safeParse(input);

    if (!result.success) {

        const firstIssue = result.error.issues[0];

        throw new ConfigValidationError(
            firstIssue?.message ?? 'Connection config validation failed',
            firstIssue?.path.join('.') || 'unknown',
            result.error.issues,
        );

    }

    return result.data;

}
