/**
 * @parley-module: Logger
 * @parley-risk: low
 * @parley-scope: utility
 *
 * @description
 * Re-export shared Winston-based logging utilities to keep a single source of truth.
 */
export { logger, createModuleLogger, sanitizeLogData } from '@parley/shared';
