/**
 * Shared module exports.
 *
 * Cross-cutting helpers used by multiple core modules.
 */
export { withDeadline } from './deadline.js'
