/**
 * Default table handlers for the known resource kinds.
 *
 * @module printers/handlers
 */

import type {
  Event,
  EventList,
  Minion,
  MinionList,
  Pod,
  PodList,
  PodSpec,
  ReplicationController,
  ReplicationControllerList,
  Service,
  ServiceList,
  Status,
  TypeMeta,
} from '../api/types.js';
import { formatLabels } from '../labels/index.js';
import type { Writer } from './printer.js';

/**
 * Renders one object of type `T` as table rows on the writer.
 * Throws to report a failure. Registration requires both parameters to be
 * declared without defaults.
 */
export type RenderFunc<T> = (obj: T, w: Writer) => void;

/**
 * Anything handlers can be registered with.
 */
export interface HandlerRegistry {
  handler<T extends TypeMeta>(kind: T['kind'], columns: readonly string[], render: RenderFunc<T>): void;
}

/**
 * Build a list renderer that prints every item with the singular renderer.
 * The first failing item aborts the rest.
 *
 * @example
 * ```typescript
 * printer.handler('PodList', podColumns, listHandler<PodList>(printPod));
 * ```
 */
export function listHandler<L extends { items: readonly unknown[] }>(
  render: RenderFunc<L['items'][number]>
): RenderFunc<L> {
  return (list: L, w: Writer) => {
    for (const item of list.items) {
      render(item, w);
    }
  };
}

export const podColumns = ['NAME', 'IMAGE(S)', 'HOST', 'LABELS', 'STATUS'] as const;
export const replicationControllerColumns = ['NAME', 'IMAGE(S)', 'SELECTOR', 'REPLICAS'] as const;
export const serviceColumns = ['NAME', 'LABELS', 'SELECTOR', 'IP', 'PORT'] as const;
export const minionColumns = ['NAME'] as const;
export const statusColumns = ['STATUS'] as const;
export const eventColumns = ['NAME', 'KIND', 'STATUS', 'REASON', 'MESSAGE'] as const;

/**
 * Register the handlers for every known kind, item and list form alike.
 */
export function addDefaultHandlers(registry: HandlerRegistry): void {
  registry.handler('Pod', podColumns, printPod);
  registry.handler('PodList', podColumns, listHandler<PodList>(printPod));
  registry.handler('ReplicationController', replicationControllerColumns, printReplicationController);
  registry.handler(
    'ReplicationControllerList',
    replicationControllerColumns,
    listHandler<ReplicationControllerList>(printReplicationController)
  );
  registry.handler('Service', serviceColumns, printService);
  registry.handler('ServiceList', serviceColumns, listHandler<ServiceList>(printService));
  registry.handler('Minion', minionColumns, printMinion);
  registry.handler('MinionList', minionColumns, listHandler<MinionList>(printMinion));
  registry.handler('Status', statusColumns, printStatus);
  registry.handler('Event', eventColumns, printEvent);
  registry.handler('EventList', eventColumns, listHandler<EventList>(printEvent));
}

function row(...cells: Array<string | number>): string {
  return `${cells.join('\t')}\n`;
}

export function makeImageList(spec: PodSpec): string {
  return spec.containers.map((container) => container.image).join(',');
}

export function podHostString(host = '', ip = ''): string {
  if (host === '' && ip === '') {
    return '<unassigned>';
  }
  return `${host}/${ip}`;
}

export function printPod(pod: Pod, w: Writer): void {
  w.write(
    row(
      pod.metadata.name,
      makeImageList(pod.spec),
      podHostString(pod.status?.host, pod.status?.hostIP),
      formatLabels(pod.metadata.labels),
      pod.status?.phase ?? ''
    )
  );
}

export function printReplicationController(controller: ReplicationController, w: Writer): void {
  w.write(
    row(
      controller.metadata.name,
      makeImageList(controller.spec.template.spec),
      formatLabels(controller.spec.selector),
      controller.spec.replicas
    )
  );
}

export function printService(svc: Service, w: Writer): void {
  w.write(
    row(
      svc.metadata.name,
      formatLabels(svc.metadata.labels),
      formatLabels(svc.spec.selector),
      svc.spec.portalIP ?? '',
      svc.spec.port
    )
  );
}

export function printMinion(minion: Minion, w: Writer): void {
  w.write(row(minion.metadata.name));
}

export function printStatus(status: Status, w: Writer): void {
  w.write(row(status.status));
}

export function printEvent(event: Event, w: Writer): void {
  w.write(
    row(
      event.involvedObject.name,
      event.involvedObject.kind,
      event.status ?? '',
      event.reason ?? '',
      event.message ?? ''
    )
  );
}
