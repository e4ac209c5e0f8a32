/**
 * Resource printers.
 *
 * Provides the versioned printers (json, yaml, template), the
 * human-readable table printer and the factory that picks one by format.
 *
 * @module printers
 */

export type { OutputFormat, ResourcePrinter, Writer } from './printer.js';
export { OUTPUT_FORMATS, writeTo } from './printer.js';
export { JsonPrinter, type JsonPrinterOptions } from './json.js';
export { YamlPrinter, type YamlPrinterOptions } from './yaml.js';
export { TemplatePrinter, type TemplatePrinterOptions } from './template.js';
export { TabWriter, type TabWriterOptions } from './tabwriter.js';
export { HumanReadablePrinter } from './human-readable.js';
export {
  addDefaultHandlers,
  listHandler,
  makeImageList,
  podHostString,
  printEvent,
  printMinion,
  printPod,
  printReplicationController,
  printService,
  printStatus,
  podColumns,
  replicationControllerColumns,
  serviceColumns,
  minionColumns,
  statusColumns,
  eventColumns,
  type HandlerRegistry,
  type RenderFunc,
} from './handlers.js';
export { getPrinter, type GetPrinterOptions } from './factory.js';
