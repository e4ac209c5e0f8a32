/**
 * Error rendering for the command boundary.
 *
 * @module output/error
 */

import pc from 'picocolors';
import { errorMessage } from '@kprint/core';

/**
 * Options for formatError.
 */
export interface ErrorFormatOptions {
  /** Enable colored output (default: when the terminal supports it) */
  colors?: boolean;
}

/**
 * Format a failure as a single `Error: <message>` line.
 */
export function formatError(error: unknown, options: ErrorFormatOptions = {}): string {
  const line = `Error: ${errorMessage(error)}`;
  return (options.colors ?? pc.isColorSupported) ? pc.red(line) : line;
}
