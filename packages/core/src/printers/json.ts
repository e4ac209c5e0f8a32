/**
 * JSON printer for versioned, machine-readable output.
 *
 * @module printers/json
 */

import type { TypeMeta } from '../api/types.js';
import { scheme, type Encoder } from '../api/codec.js';
import { PrinterError, errorMessage } from '../errors.js';
import { writeTo, type ResourcePrinter, type Writer } from './printer.js';

const INDENT = '    ';

/**
 * Options for JsonPrinter.
 */
export interface JsonPrinterOptions {
  /** Encoder producing the versioned form (default: the shared scheme) */
  encoder?: Encoder;
}

/**
 * Prints objects as JSON encoded at a fixed API version, indented with
 * four spaces and terminated by a newline.
 *
 * The encoder's output is re-indented token by token, so key order and
 * number literals come out exactly as the encoder wrote them.
 */
export class JsonPrinter implements ResourcePrinter {
  private readonly encoder: Encoder;

  constructor(
    private readonly version: string,
    options: JsonPrinterOptions = {}
  ) {
    this.encoder = options.encoder ?? scheme;
  }

  printObj(obj: TypeMeta, w: Writer): void {
    const data = this.encoder.encode(obj, this.version);
    try {
      JSON.parse(data);
    } catch (error) {
      throw new PrinterError(`encoder produced invalid JSON: ${errorMessage(error)}`, 'Encoding', {
        cause: error,
      });
    }
    writeTo(w, `${indentJson(data)}\n`);
  }

  isVersioned(): boolean {
    return true;
  }
}

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';
}

function skipWhitespace(data: string, from: number): number {
  let i = from;
  while (i < data.length && isWhitespace(data[i])) {
    i++;
  }
  return i;
}

/**
 * Lay out valid JSON text with one member or element per line. Tokens are
 * copied verbatim; only whitespace between them changes.
 */
function indentJson(data: string, indent = INDENT): string {
  let out = '';
  let depth = 0;
  let inString = false;
  let escaped = false;
  const newline = () => `\n${indent.repeat(depth)}`;

  for (let i = 0; i < data.length; i++) {
    const ch = data[i];
    if (inString) {
      out += ch;
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    switch (ch) {
      case '"':
        inString = true;
        out += ch;
        break;
      case '{':
      case '[': {
        const close = ch === '{' ? '}' : ']';
        const next = skipWhitespace(data, i + 1);
        if (data[next] === close) {
          out += ch + close;
          i = next;
        } else {
          depth++;
          out += ch + newline();
        }
        break;
      }
      case '}':
      case ']':
        depth--;
        out += newline() + ch;
        break;
      case ',':
        out += ',' + newline();
        break;
      case ':':
        out += ': ';
        break;
      default:
        if (!isWhitespace(ch)) {
          out += ch;
        }
    }
  }
  return out;
}
