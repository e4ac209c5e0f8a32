/**
 * @fileoverview Decoding of parsed JSON/YAML documents into resource objects.
 *
 * Known kinds are validated against their schema so printers receive the
 * shape their types promise. Documents of any other kind are accepted as
 * long as they carry a `kind` string; they pass through untouched and it is
 * up to the chosen printer whether it can render them.
 *
 * @module @kprint/core/api/decode
 */

import { z } from 'zod';
import { DecodeError } from '../errors.js';
import type { KnownKind, KnownObject, TypeMeta } from './types.js';

const LabelSetSchema = z.record(z.string(), z.string());

// Object schemas pass unmodelled fields through, so versioned output keeps
// everything the document carried.
const ObjectMetaSchema = z
  .object({
    name: z.string().min(1),
    namespace: z.string().optional(),
    uid: z.string().optional(),
    labels: LabelSetSchema.optional(),
    creationTimestamp: z.string().optional(),
    resourceVersion: z.string().optional(),
  })
  .passthrough();

const ListMetaSchema = z
  .object({
    resourceVersion: z.string().optional(),
  })
  .passthrough();

const ContainerSchema = z
  .object({
    name: z.string(),
    image: z.string(),
    ports: z
      .array(
        z
          .object({
            name: z.string().optional(),
            containerPort: z.number().int(),
            protocol: z.string().optional(),
          })
          .passthrough()
      )
      .optional(),
  })
  .passthrough();

const PodSpecSchema = z
  .object({
    containers: z.array(ContainerSchema).default([]),
  })
  .passthrough();

const apiVersion = z.string().optional();

const PodSchema = z
  .object({
    kind: z.literal('Pod'),
    apiVersion,
    metadata: ObjectMetaSchema,
    spec: PodSpecSchema.default({}),
    status: z
      .object({
        phase: z.string().optional(),
        host: z.string().optional(),
        hostIP: z.string().optional(),
        podIP: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

const ReplicationControllerSchema = z
  .object({
    kind: z.literal('ReplicationController'),
    apiVersion,
    metadata: ObjectMetaSchema,
    spec: z
      .object({
        replicas: z.number().int().nonnegative(),
        selector: LabelSetSchema.default({}),
        template: z
          .object({
            metadata: ObjectMetaSchema.partial().optional(),
            spec: PodSpecSchema.default({}),
          })
          .passthrough(),
      })
      .passthrough(),
    status: z.object({ replicas: z.number().int().nonnegative() }).passthrough().optional(),
  })
  .passthrough();

const ServiceSchema = z
  .object({
    kind: z.literal('Service'),
    apiVersion,
    metadata: ObjectMetaSchema,
    spec: z
      .object({
        port: z.number().int(),
        protocol: z.string().optional(),
        selector: LabelSetSchema.optional(),
        portalIP: z.string().optional(),
        containerPort: z.union([z.number().int(), z.string()]).optional(),
      })
      .passthrough(),
  })
  .passthrough();

const MinionSchema = z
  .object({
    kind: z.literal('Minion'),
    apiVersion,
    metadata: ObjectMetaSchema,
    status: z.object({ hostIP: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

const StatusSchema = z
  .object({
    kind: z.literal('Status'),
    apiVersion,
    status: z.string(),
    message: z.string().optional(),
    reason: z.string().optional(),
    code: z.number().int().optional(),
  })
  .passthrough();

const EventSchema = z
  .object({
    kind: z.literal('Event'),
    apiVersion,
    metadata: ObjectMetaSchema,
    involvedObject: z
      .object({
        kind: z.string(),
        name: z.string(),
        namespace: z.string().optional(),
        uid: z.string().optional(),
        apiVersion: z.string().optional(),
      })
      .passthrough(),
    status: z.string().optional(),
    reason: z.string().optional(),
    message: z.string().optional(),
    source: z.string().optional(),
    timestamp: z.string().optional(),
  })
  .passthrough();

function listOf<K extends string, T extends z.ZodTypeAny>(kind: K, item: T) {
  return z
    .object({
      kind: z.literal(kind),
      apiVersion,
      metadata: ListMetaSchema.optional(),
      items: z.array(item).default([]),
    })
    .passthrough();
}

/**
 * Schema accepting any of the known resource kinds.
 */
export const KnownObjectSchema = z.discriminatedUnion('kind', [
  PodSchema,
  listOf('PodList', PodSchema),
  ReplicationControllerSchema,
  listOf('ReplicationControllerList', ReplicationControllerSchema),
  ServiceSchema,
  listOf('ServiceList', ServiceSchema),
  MinionSchema,
  listOf('MinionList', MinionSchema),
  StatusSchema,
  EventSchema,
  listOf('EventList', EventSchema),
]);

const TypeMetaSchema = z
  .object({
    kind: z.string().min(1),
    apiVersion,
  })
  .passthrough();

/**
 * Kinds validated by {@link KnownObjectSchema}.
 */
export const KNOWN_KINDS = [
  'Pod',
  'PodList',
  'ReplicationController',
  'ReplicationControllerList',
  'Service',
  'ServiceList',
  'Minion',
  'MinionList',
  'Status',
  'Event',
  'EventList',
] as const satisfies readonly KnownKind[];

export function isKnownKind(kind: string): kind is KnownKind {
  return KNOWN_KINDS.some((known) => known === kind);
}

function toDecodeError(error: z.ZodError, source: string): DecodeError {
  const issue = error.issues[0];
  const field = issue ? issue.path.join('.') : '';
  const location = source && field ? `${source}: ${field}` : source || field;
  return new DecodeError(issue?.message ?? error.message, location);
}

/**
 * Decode a known resource, failing if the document does not match its schema.
 *
 * @param data - Parsed JSON or YAML document
 * @param source - Where the document came from, used in error messages
 * @throws DecodeError if the document is not a valid known resource
 */
export function decodeKnownObject(data: unknown, source = ''): KnownObject {
  const result = KnownObjectSchema.safeParse(data);
  if (!result.success) {
    throw toDecodeError(result.error, source);
  }
  return result.data;
}

/**
 * Decode any resource document.
 *
 * Known kinds are validated against their schema; other kinds only need a non-empty
 * `kind` string and keep all of their fields.
 *
 * @param data - Parsed JSON or YAML document
 * @param source - Where the document came from, used in error messages
 * @throws DecodeError if the document has no kind or a known kind fails validation
 */
export function decodeObject(data: unknown, source = ''): TypeMeta {
  const meta = TypeMetaSchema.safeParse(data);
  if (!meta.success) {
    throw toDecodeError(meta.error, source);
  }
  if (isKnownKind(meta.data.kind)) {
    return decodeKnownObject(data, source);
  }
  return meta.data;
}
