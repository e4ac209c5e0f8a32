/**
 * YAML printer for versioned structured output.
 *
 * @module printers/yaml
 */

import { stringify } from 'yaml';
import type { TypeMeta } from '../api/types.js';
import { scheme, toVersionedMap, type Encoder } from '../api/codec.js';
import { writeTo, type ResourcePrinter, type Writer } from './printer.js';

/**
 * Options for YamlPrinter.
 */
export interface YamlPrinterOptions {
  /** Indentation spaces (default: 2) */
  indent?: number;
  /** Encoder producing the versioned form (default: the shared scheme) */
  encoder?: Encoder;
}

/**
 * Prints objects as YAML documents encoded at a fixed API version.
 *
 * The versioned record is a plain mapping with no meaningful key order,
 * so keys are emitted sorted. Output is written exactly as the serializer
 * produces it.
 */
export class YamlPrinter implements ResourcePrinter {
  private readonly indent: number;
  private readonly encoder: Encoder;

  constructor(
    private readonly version: string,
    options: YamlPrinterOptions = {}
  ) {
    this.indent = options.indent ?? 2;
    this.encoder = options.encoder ?? scheme;
  }

  printObj(obj: TypeMeta, w: Writer): void {
    const data = toVersionedMap(this.encoder, obj, this.version);
    writeTo(w, stringify(data, { indent: this.indent, sortMapEntries: true }));
  }

  isVersioned(): boolean {
    return true;
  }
}
