/**
 * Logger utility for pystylelint
 *
 * Console output functions that can be silenced for the JSON output format,
 * where stdout carries only the structured document.
 */
import { LOG_PREFIX } from '../config/constants';

let silentMode = false;
let verboseMode = false;

/**
 * Enable or disable silent mode.
 * When enabled, log() outputs nothing.
 * error() always outputs to stderr.
 */
export function setSilentMode(silent: boolean): void {
    silentMode = silent;
}

/**
 * Enable or disable debug output.
 */
export function setVerboseMode(verbose: boolean): void {
    verboseMode = verbose;
}

/**
 * Log to stdout. Silenced in silent mode.
 */
export function log(...args: unknown[]): void {
    if (!silentMode) {
        console.log(...args);
    }
}

/**
 * Debug line to stderr, only in verbose mode.
 */
export function debug(...args: unknown[]): void {
    if (verboseMode) {
        console.error(LOG_PREFIX, ...args);
    }
}

/**
 * Log error to stderr. ALWAYS outputs (never silenced).
 */
export function error(...args: unknown[]): void {
    console.error(...args);
}
