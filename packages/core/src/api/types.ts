/**
 * @fileoverview Resource object model.
 *
 * Every resource carries a literal `kind` tag naming its shape. Printers
 * dispatch on that tag, so an item kind and its list kind (`Pod` and
 * `PodList`) are distinct shapes even though one contains the other.
 *
 * @module @kprint/core/api/types
 */

/**
 * Fields every resource object carries.
 */
export interface TypeMeta {
  /** Shape tag, e.g. 'Pod' or 'ServiceList' */
  kind: string;
  /** API version the object was read at, if known */
  apiVersion?: string;
}

/**
 * Label or selector set: string keys mapped to string values.
 */
export type LabelSet = Record<string, string>;

export interface ObjectMeta {
  name: string;
  namespace?: string;
  uid?: string;
  labels?: LabelSet;
  creationTimestamp?: string;
  resourceVersion?: string;
}

export interface ListMeta {
  resourceVersion?: string;
}

export interface ContainerPort {
  name?: string;
  containerPort: number;
  protocol?: string;
}

export interface Container {
  name: string;
  image: string;
  ports?: ContainerPort[];
}

export interface PodSpec {
  containers: Container[];
}

export interface PodStatus {
  phase?: string;
  host?: string;
  hostIP?: string;
  podIP?: string;
}

export interface Pod extends TypeMeta {
  kind: 'Pod';
  metadata: ObjectMeta;
  spec: PodSpec;
  status?: PodStatus;
}

export interface PodList extends TypeMeta {
  kind: 'PodList';
  metadata?: ListMeta;
  items: Pod[];
}

export interface PodTemplate {
  metadata?: Partial<ObjectMeta>;
  spec: PodSpec;
}

export interface ReplicationControllerSpec {
  replicas: number;
  selector: LabelSet;
  template: PodTemplate;
}

export interface ReplicationController extends TypeMeta {
  kind: 'ReplicationController';
  metadata: ObjectMeta;
  spec: ReplicationControllerSpec;
  status?: { replicas: number };
}

export interface ReplicationControllerList extends TypeMeta {
  kind: 'ReplicationControllerList';
  metadata?: ListMeta;
  items: ReplicationController[];
}

export interface ServiceSpec {
  port: number;
  protocol?: string;
  selector?: LabelSet;
  portalIP?: string;
  containerPort?: number | string;
}

export interface Service extends TypeMeta {
  kind: 'Service';
  metadata: ObjectMeta;
  spec: ServiceSpec;
}

export interface ServiceList extends TypeMeta {
  kind: 'ServiceList';
  metadata?: ListMeta;
  items: Service[];
}

export interface Minion extends TypeMeta {
  kind: 'Minion';
  metadata: ObjectMeta;
  status?: { hostIP?: string };
}

export interface MinionList extends TypeMeta {
  kind: 'MinionList';
  metadata?: ListMeta;
  items: Minion[];
}

/**
 * Result of an API operation, as returned by the server.
 */
export interface Status extends TypeMeta {
  kind: 'Status';
  status: string;
  message?: string;
  reason?: string;
  code?: number;
}

export interface ObjectReference {
  kind: string;
  name: string;
  namespace?: string;
  uid?: string;
  apiVersion?: string;
}

export interface Event extends TypeMeta {
  kind: 'Event';
  metadata: ObjectMeta;
  involvedObject: ObjectReference;
  status?: string;
  reason?: string;
  message?: string;
  source?: string;
  timestamp?: string;
}

export interface EventList extends TypeMeta {
  kind: 'EventList';
  metadata?: ListMeta;
  items: Event[];
}

/**
 * Every resource shape this package knows how to decode and print.
 */
export type KnownObject =
  | Pod
  | PodList
  | ReplicationController
  | ReplicationControllerList
  | Service
  | ServiceList
  | Minion
  | MinionList
  | Status
  | Event
  | EventList;

export type KnownKind = KnownObject['kind'];
