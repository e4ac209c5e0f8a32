/**
 * Printer interface and shared output helpers.
 *
 * @module printers/printer
 */

import type { TypeMeta } from '../api/types.js';
import { PrinterError, errorMessage } from '../errors.js';

/**
 * Output format selectors accepted by the printer factory.
 * The empty string selects the caller's fallback printer.
 */
export type OutputFormat = 'json' | 'yaml' | 'template' | 'templatefile' | '';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'yaml', 'template', 'templatefile', ''];

/**
 * Destination for printed output. `process.stdout` and any Node writable
 * stream qualify.
 */
export interface Writer {
  write(chunk: string): void;
}

/**
 * A printer renders resource objects to a writer.
 *
 * Implementations are synchronous and throw {@link PrinterError} on failure.
 */
export interface ResourcePrinter {
  /**
   * Render one object (an item or a list) to the writer.
   *
   * @param obj - The object to print
   * @param w - Destination; borrowed for the duration of the call only
   */
  printObj(obj: TypeMeta, w: Writer): void;

  /**
   * Whether output is a faithful encoding at a declared API version, as
   * opposed to a display-only rendering.
   */
  isVersioned(): boolean;
}

/**
 * Write a chunk, reporting a rejecting writer as a 'Write' failure.
 */
export function writeTo(w: Writer, chunk: string): void {
  try {
    w.write(chunk);
  } catch (error) {
    throw new PrinterError(`error writing output: ${errorMessage(error)}`, 'Write', { cause: error });
  }
}
