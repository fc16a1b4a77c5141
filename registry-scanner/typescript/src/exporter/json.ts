/**
 * JSON exporter.
 * @module exporter/json
 */

import { ScannerError } from '../errors.js';
import { formatArtifactReference } from '../types/reference.js';
import type { AnalyzeResult } from '../types/vulnerability.js';
import type { Exporter, TextSink } from './types.js';

/**
 * Writes results as an indented JSON array. Each artifact also carries its
 * canonical `uri`.
 */
export class JsonExporter implements Exporter {
  private readonly sink: TextSink;

  constructor(sink: TextSink) {
    this.sink = sink;
  }

  async export(results: readonly AnalyzeResult[]): Promise<void> {
    const document = results.map((result) => ({
      artifact: { ...result.artifact, uri: formatArtifactReference(result.artifact) },
      scanTime: result.scanTime.toISOString(),
      vulnerabilities: result.vulnerabilities,
      summary: result.summary,
    }));

    try {
      this.sink.write(`${JSON.stringify(document, null, 2)}\n`);
    } catch (error) {
      throw ScannerError.exportFailed(error);
    }
  }
}
