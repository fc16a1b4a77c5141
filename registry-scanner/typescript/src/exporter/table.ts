/**
 * Delimiter-separated (CSV/TSV) exporter.
 * @module exporter/table
 */

import { stringify } from 'csv-stringify/sync';
import { ScannerError } from '../errors.js';
import { formatArtifactReference } from '../types/reference.js';
import type { AnalyzeResult, Vulnerability } from '../types/vulnerability.js';
import type { Exporter, TextSink } from './types.js';

export const TABLE_HEADER = [
  'Scan Time',
  'Image URI',
  'Vulnerability ID',
  'Severity',
  'CVSS Score',
  'Package Name',
  'Installed Version',
  'Fixed Version',
  'Description',
  'Reference URL',
] as const;

/**
 * Writes one row per vulnerability, after a header row.
 */
export class TableExporter implements Exporter {
  private readonly sink: TextSink;
  private readonly delimiter: string;

  constructor(sink: TextSink, delimiter: string) {
    this.sink = sink;
    this.delimiter = delimiter;
  }

  async export(results: readonly AnalyzeResult[]): Promise<void> {
    const rows: string[][] = [[...TABLE_HEADER]];

    for (const result of results) {
      const imageUri = formatArtifactReference(result.artifact);
      const scanTime = formatScanTime(result.scanTime);
      for (const vulnerability of result.vulnerabilities) {
        rows.push(buildRecord(scanTime, imageUri, vulnerability));
      }
    }

    try {
      this.sink.write(stringify(rows, { delimiter: this.delimiter }));
    } catch (error) {
      throw ScannerError.exportFailed(error);
    }
  }
}

/**
 * Creates a comma-separated exporter.
 */
export function createCsvExporter(sink: TextSink): TableExporter {
  return new TableExporter(sink, ',');
}

/**
 * Creates a tab-separated exporter.
 */
export function createTsvExporter(sink: TextSink): TableExporter {
  return new TableExporter(sink, '\t');
}

/**
 * RFC 3339 at second precision, in UTC.
 */
export function formatScanTime(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

function buildRecord(scanTime: string, imageUri: string, v: Vulnerability): string[] {
  return [
    scanTime,
    imageUri,
    v.id,
    v.severity,
    v.cvssScore.toFixed(1),
    v.packageName,
    v.installedVersion,
    v.fixedVersion,
    v.description.trim(),
    v.urls[0] ?? '',
  ];
}
