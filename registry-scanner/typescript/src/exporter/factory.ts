/**
 * Exporter selection by output format.
 * @module exporter/factory
 */

import { OUTPUT_FORMATS } from '../config.js';
import { ScannerError } from '../errors.js';
import { JsonExporter } from './json.js';
import { createCsvExporter, createTsvExporter } from './table.js';
import type { Exporter, TextSink } from './types.js';

/**
 * Creates the exporter for an output format.
 */
export function createExporter(format: string, sink: TextSink): Exporter {
  switch (format) {
    case 'json':
      return new JsonExporter(sink);
    case 'csv':
      return createCsvExporter(sink);
    case 'tsv':
      return createTsvExporter(sink);
    default:
      throw ScannerError.configuration(
        `unsupported output format: ${format} (allowed: ${OUTPUT_FORMATS.join(', ')})`
      );
  }
}
