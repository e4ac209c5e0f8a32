/**
 * Printer factory: builds the printer for an output format selector.
 *
 * @module printers/factory
 */

import { readFileSync } from 'node:fs';
import type { Encoder } from '../api/codec.js';
import { PrinterError, errorMessage } from '../errors.js';
import { logger } from '../utils/logger.js';
import { JsonPrinter } from './json.js';
import { YamlPrinter } from './yaml.js';
import { TemplatePrinter } from './template.js';
import type { ResourcePrinter } from './printer.js';

/**
 * Options for getPrinter.
 */
export interface GetPrinterOptions {
  /** Encoder handed to the versioned printers (default: the shared scheme) */
  encoder?: Encoder;
}

/**
 * Build the printer for an output format.
 *
 * - 'json' and 'yaml' print the object encoded at `version`
 * - 'template' compiles `templateSource` as template text
 * - 'templatefile' reads the template from the file at `templateSource`
 * - '' returns `fallback` itself
 *
 * @param version - API version the versioned printers encode to
 * @param format - Output format selector
 * @param templateSource - Template text or template file path, depending on `format`
 * @param fallback - Printer returned when no format is selected
 * @throws PrinterError of kind 'UnsupportedFormat', 'MissingTemplateInput',
 *   'FileRead' or 'TemplateParse'
 *
 * @example
 * ```typescript
 * const printer = getPrinter('v1beta2', options.output, options.template, new HumanReadablePrinter());
 * printer.printObj(pod, process.stdout);
 * ```
 */
export function getPrinter(
  version: string,
  format: string,
  templateSource: string,
  fallback: ResourcePrinter,
  options: GetPrinterOptions = {}
): ResourcePrinter {
  const { encoder } = options;
  logger.debug(`Building printer for format "${format}"`, { version });

  switch (format) {
    case 'json':
      return new JsonPrinter(version, { encoder });
    case 'yaml':
      return new YamlPrinter(version, { encoder });
    case 'template':
      if (templateSource.length === 0) {
        throw new PrinterError('template format specified but no template given', 'MissingTemplateInput');
      }
      return new TemplatePrinter(version, templateSource, { encoder, name: JSON.stringify(templateSource) });
    case 'templatefile': {
      if (templateSource.length === 0) {
        throw new PrinterError(
          'templatefile format specified but no template file given',
          'MissingTemplateInput'
        );
      }
      let data: string;
      try {
        data = readFileSync(templateSource, 'utf-8');
      } catch (error) {
        throw new PrinterError(`error reading template ${templateSource}: ${errorMessage(error)}`, 'FileRead', {
          cause: error,
        });
      }
      return new TemplatePrinter(version, data, { encoder, name: templateSource });
    }
    case '':
      return fallback;
    default:
      throw new PrinterError(`output format "${format}" not recognized`, 'UnsupportedFormat');
  }
}
