/**
 * Configuration constants
 */

export const DEFAULT_CONFIG_FILENAME = '.pystylelint.ini';
export const ALLOWED_EXTS = new Set(['.py']);
export const DEFAULT_CONCURRENCY = 4;
export const LOG_PREFIX = '[pystylelint]';
