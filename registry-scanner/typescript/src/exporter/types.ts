/**
 * Exporter contracts.
 * @module exporter/types
 */

import type { AnalyzeResult } from '../types/vulnerability.js';

/**
 * Destination for exported text (stdout, a file stream, a test buffer).
 */
export interface TextSink {
  write(chunk: string): unknown;
}

/**
 * Writes a batch of analysis results. Accepts an empty batch.
 */
export interface Exporter {
  export(results: readonly AnalyzeResult[]): Promise<void>;
}
