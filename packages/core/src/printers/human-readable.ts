/**
 * Human-readable printer: renders objects as aligned table rows, choosing
 * the columns and row layout by the object's kind.
 *
 * @module printers/human-readable
 */

import { inspect } from 'node:util';
import type { TypeMeta } from '../api/types.js';
import { PrinterError, errorMessage } from '../errors.js';
import { logger } from '../utils/logger.js';
import { TabWriter, type TabWriterOptions } from './tabwriter.js';
import type { ResourcePrinter, Writer } from './printer.js';
import { addDefaultHandlers, type HandlerRegistry, type RenderFunc } from './handlers.js';

interface HandlerEntry {
  columns: readonly string[];
  render: RenderFunc<TypeMeta>;
}

const TABLE_LAYOUT: TabWriterOptions = {
  minWidth: 20,
  tabWidth: 5,
  padding: 3,
  padChar: ' ',
};

/**
 * Table printer with a kind-keyed handler registry.
 *
 * The printer remembers the kind it printed last and writes a header row
 * only when the kind changes, so it can be fed a stream of mixed objects
 * (for example a watch) without repeating headers on every call. That
 * session state makes an instance unsafe to share between concurrent
 * callers; use one printer per output stream.
 *
 * Output is for display only and {@link HumanReadablePrinter.isVersioned}
 * is always false.
 */
export class HumanReadablePrinter implements ResourcePrinter, HandlerRegistry {
  private readonly handlers = new Map<string, HandlerEntry>();
  private lastKind: string | undefined;

  /**
   * @param noHeaders - Never write header rows
   */
  constructor(private readonly noHeaders = false) {
    addDefaultHandlers(this);
  }

  /**
   * Register the columns and renderer for a kind, replacing any existing
   * registration for the same kind.
   *
   * The renderer must declare exactly two positional parameters, neither
   * with a default value: the check uses the function's `length`, which
   * does not count defaulted or rest parameters, so a renderer such as
   * `(obj, w = out) => ...` type-checks but is rejected here.
   *
   * @param kind - Kind tag the handler is for; must equal `T['kind']`
   * @param columns - Header column names
   * @param render - Renderer declaring `(obj, writer)`
   * @throws PrinterError of kind 'MalformedHandler'; the registry is left unchanged
   */
  handler<T extends TypeMeta>(
    kind: T['kind'],
    columns: readonly string[],
    render: RenderFunc<T>
  ): void {
    const problem = validateHandler(kind, columns, render);
    if (problem) {
      logger.warn(`Unable to add print handler: ${problem}`);
      throw new PrinterError(`invalid print handler for "${kind}": ${problem}`, 'MalformedHandler');
    }

    const matches = (obj: TypeMeta): obj is T => obj.kind === kind;
    this.handlers.set(kind, {
      columns: [...columns],
      render: (obj, w) => {
        if (!matches(obj)) {
          throw new PrinterError(`handler for "${kind}" cannot print "${obj.kind}"`, 'UnknownType');
        }
        render(obj, w);
      },
    });
    logger.debug(`Registered print handler for ${kind}`, { columns });
  }

  /**
   * Whether a handler is registered for the kind.
   */
  handles(kind: string): boolean {
    return this.handlers.has(kind);
  }

  printObj(obj: TypeMeta, output: Writer): void {
    const w = new TabWriter(output, TABLE_LAYOUT);
    try {
      this.render(obj, w);
    } catch (error) {
      // Rows rendered before the failure are still written; a failing
      // flush must not hide the render error.
      try {
        w.flush();
      } catch (flushError) {
        logger.warn(`Unable to flush table output: ${errorMessage(flushError)}`);
      }
      throw error;
    }
    w.flush();
  }

  private render(obj: TypeMeta, w: TabWriter): void {
    const entry = this.handlers.get(obj.kind);
    if (!entry) {
      throw new PrinterError(
        `unknown type "${obj.kind}": ${inspect(obj, { depth: 2, breakLength: Infinity })}`,
        'UnknownType'
      );
    }

    if (!this.noHeaders && obj.kind !== this.lastKind) {
      w.write(`${entry.columns.join('\t')}\n`);
      this.lastKind = obj.kind;
    }

    entry.render(obj, w);
  }

  isVersioned(): boolean {
    return false;
  }
}

function validateHandler(kind: unknown, columns: unknown, render: unknown): string | undefined {
  if (typeof kind !== 'string' || kind.length === 0) {
    return 'kind must be a non-empty string';
  }
  if (!Array.isArray(columns) || columns.length === 0 || !columns.every((c) => typeof c === 'string')) {
    return 'columns must be a non-empty list of strings';
  }
  if (typeof render !== 'function') {
    return `${inspect(render)} is not a function`;
  }
  if (render.length !== 2) {
    return `the renderer must accept 2 parameters (obj, writer), got ${render.length}`;
  }
  return undefined;
}
