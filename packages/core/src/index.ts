/**
 * @fileoverview Public API for @kprint/core package.
 *
 * This module exports the resource model, the versioned codec, the label
 * formatter and every printer, along with the factory that picks a printer
 * for an output format.
 *
 * @module @kprint/core
 *
 * @example
 * ```typescript
 * import { getPrinter, HumanReadablePrinter, LATEST_VERSION } from '@kprint/core';
 *
 * const printer = getPrinter(LATEST_VERSION, 'yaml', '', new HumanReadablePrinter());
 * printer.printObj(serviceList, process.stdout);
 * ```
 */

// ============================================
// RESOURCE MODEL
// ============================================

export type {
  TypeMeta,
  LabelSet,
  ObjectMeta,
  ListMeta,
  Container,
  ContainerPort,
  PodSpec,
  PodStatus,
  Pod,
  PodList,
  PodTemplate,
  ReplicationControllerSpec,
  ReplicationController,
  ReplicationControllerList,
  ServiceSpec,
  Service,
  ServiceList,
  Minion,
  MinionList,
  Status,
  ObjectReference,
  Event,
  EventList,
  KnownObject,
  KnownKind,
} from './api/types.js';

/**
 * Input decoding for JSON/YAML documents.
 *
 * @example
 * ```typescript
 * import { decodeObject } from '@kprint/core';
 * const pod = decodeObject(JSON.parse(text), 'pod.json');
 * ```
 */
export { decodeObject, decodeKnownObject, isKnownKind, KNOWN_KINDS, KnownObjectSchema } from './api/decode.js';

// ============================================
// ENCODING
// ============================================

export {
  Scheme,
  scheme,
  toVersionedMap,
  isSupportedVersion,
  SUPPORTED_VERSIONS,
  LATEST_VERSION,
  type APIVersion,
  type Encoder,
} from './api/codec.js';

export { formatLabels } from './labels/index.js';

// ============================================
// PRINTERS
// ============================================

export * from './printers/index.js';

// ============================================
// ERRORS & LOGGING
// ============================================

export { PrinterError, DecodeError, errorMessage, type PrinterErrorKind } from './errors.js';
export {
  logger,
  setLogLevel,
  getLogLevel,
  isLogLevel,
  LOG_LEVELS,
  type LogLevel,
} from './utils/logger.js';
