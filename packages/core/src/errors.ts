/**
 * @fileoverview Error types raised by printers and the printer factory.
 *
 * @module @kprint/core/errors
 */

/**
 * Categories of printer failure.
 *
 * - 'UnsupportedFormat': the output format selector is not recognized
 * - 'MissingTemplateInput': template output selected without a template
 * - 'TemplateParse': the template text does not compile
 * - 'TemplateExecution': rendering the template against an object failed
 * - 'FileRead': the template file could not be read
 * - 'Encoding': the encoder rejected the object or the API version
 * - 'UnknownType': no tabular handler is registered for the object's kind
 * - 'MalformedHandler': a handler registration does not meet the contract
 * - 'Write': the output writer rejected the data
 */
export type PrinterErrorKind =
  | 'UnsupportedFormat'
  | 'MissingTemplateInput'
  | 'TemplateParse'
  | 'TemplateExecution'
  | 'FileRead'
  | 'Encoding'
  | 'UnknownType'
  | 'MalformedHandler'
  | 'Write';

/**
 * Error thrown by every printer operation.
 * The underlying failure, if any, is kept as `cause`.
 */
export class PrinterError extends Error {
  constructor(
    message: string,
    public readonly kind: PrinterErrorKind,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PrinterError';
  }
}

/**
 * Error thrown when input data cannot be decoded into a resource object.
 */
export class DecodeError extends Error {
  constructor(
    message: string,
    public readonly location: string
  ) {
    super(location ? `${message} (at ${location})` : message);
    this.name = 'DecodeError';
  }
}

/**
 * Extract a readable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
