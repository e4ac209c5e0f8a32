/**
 * Template printer: renders the versioned form of an object through a
 * user-supplied Nunjucks template.
 *
 * @module printers/template
 */

import nunjucks from 'nunjucks';
import type { Template } from 'nunjucks';
import type { TypeMeta } from '../api/types.js';
import { scheme, toVersionedMap, type Encoder } from '../api/codec.js';
import { PrinterError, errorMessage } from '../errors.js';
import { writeTo, type ResourcePrinter, type Writer } from './printer.js';

/**
 * Output is plain text, and a field the template names but the object
 * lacks is an error rather than an empty string.
 */
const environment = new nunjucks.Environment(null, {
  autoescape: false,
  throwOnUndefined: true,
});

/**
 * Options for TemplatePrinter.
 */
export interface TemplatePrinterOptions {
  /** Encoder producing the versioned form (default: the shared scheme) */
  encoder?: Encoder;
  /** Name used for the template in error messages (default: 'output') */
  name?: string;
}

/**
 * Prints objects by rendering a template against their versioned record.
 *
 * The template is compiled in the constructor, so a syntax error is raised
 * there and never from {@link TemplatePrinter.printObj}.
 *
 * @example
 * ```typescript
 * const printer = new TemplatePrinter('v1beta2', '{{ metadata.name }}\n');
 * printer.printObj(pod, process.stdout);
 * ```
 */
export class TemplatePrinter implements ResourcePrinter {
  private readonly template: Template;
  private readonly encoder: Encoder;

  /**
   * @throws PrinterError of kind 'TemplateParse' if the template does not compile
   */
  constructor(
    private readonly version: string,
    source: string,
    options: TemplatePrinterOptions = {}
  ) {
    this.encoder = options.encoder ?? scheme;
    const name = options.name ?? 'output';
    try {
      this.template = new nunjucks.Template(source, environment, name, true);
    } catch (error) {
      throw new PrinterError(`error parsing template ${name}: ${errorMessage(error)}`, 'TemplateParse', {
        cause: error,
      });
    }
  }

  printObj(obj: TypeMeta, w: Writer): void {
    const data = toVersionedMap(this.encoder, obj, this.version);

    let output: string;
    try {
      output = this.template.render(data);
    } catch (error) {
      throw new PrinterError(`error executing template: ${errorMessage(error)}`, 'TemplateExecution', {
        cause: error,
      });
    }
    writeTo(w, output);
  }

  isVersioned(): boolean {
    return true;
  }
}
