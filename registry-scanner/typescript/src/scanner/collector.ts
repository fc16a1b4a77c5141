/**
 * Accumulates the outcome of every analysis unit.
 * @module scanner/collector
 */

import { ScannerErrorKind, type ScannerError } from '../errors.js';
import type { AnalyzeResult } from '../types/vulnerability.js';

/**
 * Results and errors of one scan. Units append from their continuations,
 * which the event loop runs one at a time.
 */
export class ResultCollector {
  private readonly resultList: AnalyzeResult[] = [];
  private readonly errorList: ScannerError[] = [];

  addResult(result: AnalyzeResult): void {
    this.resultList.push(result);
  }

  addError(error: ScannerError): void {
    this.errorList.push(error);
  }

  get results(): readonly AnalyzeResult[] {
    return this.resultList;
  }

  get errors(): readonly ScannerError[] {
    return this.errorList;
  }

  hasErrorOfKind(kind: ScannerErrorKind): boolean {
    return this.errorList.some((e) => e.kind === kind);
  }

  /**
   * True once a cancellation has been recorded.
   */
  get cancelled(): boolean {
    return this.hasErrorOfKind(ScannerErrorKind.Cancelled);
  }
}
