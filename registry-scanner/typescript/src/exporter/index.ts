/**
 * Exporter exports.
 * @module exporter
 */

export type { Exporter, TextSink } from './types.js';
export { JsonExporter } from './json.js';
export {
  TableExporter,
  TABLE_HEADER,
  createCsvExporter,
  createTsvExporter,
  formatScanTime,
} from './table.js';
export { createExporter } from './factory.js';
