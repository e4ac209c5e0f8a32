/**
 * Output helpers for the kprint CLI.
 *
 * @module output
 */

export { formatError, type ErrorFormatOptions } from './error.js';
