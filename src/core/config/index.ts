/**
 * Config module - connection config validation.
 *
 * Zod schemas for saved and ad-hoc connections, and connection configs
 * described through SQLMODE_CONNECTION_* variables.
 */

// Schema & Validation
export {
    AuthSchema,
    ConnectionConfigSchema,
    ConnectionNameSchema,
    DialectSchema,
    ConfigValidationError,
    parseConnectionConfig,
    type ConnectionConfigInput,
} from './schema.js';

// Environment variables
export { getEnvConnection, ENV_CONNECTION_NAME } from './env.js';
