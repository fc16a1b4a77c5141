/**
 * Scan orchestration exports.
 * @module scanner
 */

export {
  Scanner,
  createScanner,
  type CreateScannerOptions,
  type ScanOptions,
  type ScanReport,
  type ScanStatus,
  type ScannerDependencies,
} from './scanner.js';
export { ResultCollector } from './collector.js';
