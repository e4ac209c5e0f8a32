/**
 * @fileoverview Versioned encoding of resource objects.
 *
 * The scheme turns an in-memory object into its portable JSON form at a
 * named API version. Structured and template printers build on it and
 * never look at the in-memory shape directly.
 *
 * @module @kprint/core/api/codec
 */

import { PrinterError, errorMessage } from '../errors.js';
import type { TypeMeta } from './types.js';

/**
 * API versions the scheme can encode to.
 */
export const SUPPORTED_VERSIONS = ['v1beta1', 'v1beta2'] as const;

export type APIVersion = (typeof SUPPORTED_VERSIONS)[number];

/**
 * Version used when the caller does not name one.
 */
export const LATEST_VERSION: APIVersion = 'v1beta2';

/**
 * Turns a resource object into its serialized form at an API version.
 */
export interface Encoder {
  /**
   * @throws PrinterError of kind 'Encoding' when the object or version is rejected
   */
  encode(obj: TypeMeta, version: string): string;
}

export function isSupportedVersion(version: string): version is APIVersion {
  return SUPPORTED_VERSIONS.some((supported) => supported === version);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * JSON encoder over the supported API versions.
 *
 * The encoded document always starts with `kind` and `apiVersion`; any
 * `apiVersion` the object carried in memory is replaced by the target one.
 */
export class Scheme implements Encoder {
  encode(obj: TypeMeta, version: string): string {
    if (!isSupportedVersion(version)) {
      throw new PrinterError(
        `API version "${version}" is not supported (expected one of: ${SUPPORTED_VERSIONS.join(', ')})`,
        'Encoding'
      );
    }
    if (typeof obj.kind !== 'string' || obj.kind.length === 0) {
      throw new PrinterError('object has no kind set', 'Encoding');
    }

    const { kind, apiVersion: _, ...fields } = obj;
    try {
      return JSON.stringify({ kind, apiVersion: version, ...fields });
    } catch (error) {
      throw new PrinterError(`unable to encode ${kind}: ${errorMessage(error)}`, 'Encoding', {
        cause: error,
      });
    }
  }
}

/**
 * Shared scheme instance used when a printer is not given an encoder.
 */
export const scheme = new Scheme();

/**
 * Encode an object and decode the result into a generic string-keyed record.
 *
 * @throws PrinterError of kind 'Encoding' if encoding fails or the output is not a JSON object
 */
export function toVersionedMap(
  encoder: Encoder,
  obj: TypeMeta,
  version: string
): Record<string, unknown> {
  const data = encoder.encode(obj, version);

  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (error) {
    throw new PrinterError(`encoder produced invalid JSON: ${errorMessage(error)}`, 'Encoding', {
      cause: error,
    });
  }

  if (!isRecord(parsed)) {
    throw new PrinterError('encoder output is not a JSON object', 'Encoding');
  }
  return parsed;
}
