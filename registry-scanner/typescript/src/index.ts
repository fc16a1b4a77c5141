/**
 * Artifact Registry Vulnerability Scanner
 *
 * Discovers container images in Google Artifact Registry, selects one digest
 * per image, and reports the vulnerabilities Container Analysis found:
 * - Streaming discovery over paginated repository and image listings
 * - Deterministic version selection ("latest" tag, otherwise newest)
 * - Bounded-concurrency analysis with per-image failure isolation
 * - JSON, CSV and TSV exporters
 * - Service account, access token and Application Default Credentials auth
 *
 * @example
 * ```typescript
 * import { ScannerConfigBuilder, createScanner } from 'registry-scanner';
 *
 * const config = new ScannerConfigBuilder('us-central1')
 *   .projectId('my-project')
 *   .minSeverity('CRITICAL')
 *   .build();
 *
 * const scanner = await createScanner(config);
 * const report = await scanner.scan();
 * if (report.error) {
 *   console.error(report.error.message);
 * }
 * ```
 *
 * @module registry-scanner
 */

// Configuration
export {
  type ScannerConfig,
  ScannerConfigBuilder,
  ScannerConfigSchema,
  type AuthMethod,
  type OutputFormat,
  OUTPUT_FORMATS,
  DEFAULT_TIMEOUT,
  DEFAULT_CONCURRENCY,
  DEFAULT_MAX_CANDIDATES,
  DEFAULT_USER_AGENT,
  MAX_CONCURRENCY,
  createDefaultConfig,
  configFromEnv,
  projectIdFromEnv,
  parseOutputFormat,
  validateConfig,
} from './config.js';

// Errors
export {
  ScannerError,
  ScannerErrorKind,
  ScanAggregateError,
  type ScannerErrorOptions,
  isScannerError,
  isCancelledError,
  isAuthError,
} from './errors.js';

// Client
export { RegistryClient, createClient } from './client/client.js';
export type { HttpResponse, RequestOptions } from './client/http.js';

// Auth
export {
  SecretString,
  GcpAuthProvider,
  resolveProjectId,
  type TokenProvider,
  type TokenResponse,
  type CachedToken,
  type ProjectDetector,
} from './auth/index.js';

// Services
export {
  RepositoryService,
  DockerImageService,
  VulnerabilityService,
  toVulnerability,
  type ListDockerImagesOptions,
} from './services/index.js';

// Concurrency
export { Semaphore } from './concurrency/semaphore.js';

// Discovery
export {
  EMPTY_CANDIDATE,
  LATEST_TAG,
  selectBestVersion,
  scanRepository,
  ImageResolver,
  type CandidateVersion,
  type SelectionContext,
  type ScanRepositoryOptions,
  type ImageResolverOptions,
  type DockerImageLister,
  type RepositoryLister,
  type ResolvedItem,
  type ScanTarget,
  type TargetSource,
} from './resolver/index.js';

// Orchestration
export {
  Scanner,
  ResultCollector,
  createScanner,
  type CreateScannerOptions,
  type ScanOptions,
  type ScanReport,
  type ScanStatus,
  type ScannerDependencies,
} from './scanner/index.js';

// Exporters
export {
  createExporter,
  JsonExporter,
  TableExporter,
  TABLE_HEADER,
  createCsvExporter,
  createTsvExporter,
  formatScanTime,
  type Exporter,
  type TextSink,
} from './exporter/index.js';

// Types
export * from './types/index.js';

// Observability
export {
  MetricNames,
  type MetricLabels,
  type MetricCollector,
  type Logger,
  type LogLevel,
  type LogSink,
  type ObservabilityConfig,
  NoOpMetricCollector,
  NoOpLogger,
  ConsoleLogger,
  InMemoryMetricCollector,
  configureObservability,
  getMetrics,
  getLogger,
} from './observability/index.js';
