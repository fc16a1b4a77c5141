/**
 * Scan orchestration: discovery, bounded-concurrency analysis, export.
 * @module scanner/scanner
 */

import { resolveProjectId } from '../auth/project.js';
import type { TokenProvider } from '../auth/provider.js';
import { RegistryClient } from '../client/client.js';
import {
  DEFAULT_CONCURRENCY,
  ScannerConfigSchema,
  validateConfig,
  type ScannerConfig,
} from '../config.js';
import { Semaphore } from '../concurrency/semaphore.js';
import {
  ScanAggregateError,
  ScannerError,
  ScannerErrorKind,
  isCancelledError,
  isScannerError,
} from '../errors.js';
import { createExporter } from '../exporter/factory.js';
import type { Exporter, TextSink } from '../exporter/types.js';
import {
  MetricNames,
  getLogger,
  getMetrics,
  type Logger,
  type MetricCollector,
} from '../observability/index.js';
import { ImageResolver } from '../resolver/image-resolver.js';
import type { ScanTarget, TargetSource } from '../resolver/types.js';
import { formatArtifactReference } from '../types/reference.js';
import type { AnalyzeResult, Analyzer, Severity } from '../types/vulnerability.js';
import { ResultCollector } from './collector.js';

/**
 * Overall outcome of a scan.
 */
export type ScanStatus = 'succeeded' | 'partial' | 'failed';

/**
 * What a scan produced.
 */
export interface ScanReport {
  status: ScanStatus;
  /** Successful analyses, in completion order */
  results: readonly AnalyzeResult[];
  /** Every recorded failure */
  errors: readonly ScannerError[];
  /** Targets dispatched for analysis */
  targetCount: number;
  /** All errors joined; present whenever `errors` is non-empty */
  error?: ScanAggregateError;
}

/**
 * Collaborators of a {@link Scanner}.
 */
export interface ScannerDependencies {
  resolver: TargetSource;
  analyzer: Analyzer;
  exporter: Exporter;
  logger?: Logger;
  metrics?: MetricCollector;
}

/**
 * What to scan and how.
 */
export interface ScanOptions {
  projectId: string;
  location: string;
  /** Maximum in-flight analyses */
  concurrency?: number;
  minSeverity?: Severity;
  fixableOnly?: boolean;
  /** Scan only these references instead of the whole location */
  images?: readonly string[];
}

/**
 * Drains the resolver, analyzes each target under a concurrency cap, and
 * exports the collected results once every unit has settled.
 */
export class Scanner {
  private readonly resolver: TargetSource;
  private readonly analyzer: Analyzer;
  private readonly exporter: Exporter;
  private readonly logger: Logger;
  private readonly metrics: MetricCollector;
  private readonly options: Required<Omit<ScanOptions, 'images'>> & { images: readonly string[] };

  constructor(deps: ScannerDependencies, options: ScanOptions) {
    const concurrency = ScannerConfigSchema.shape.concurrency.safeParse(
      options.concurrency ?? DEFAULT_CONCURRENCY
    );
    if (!concurrency.success) {
      throw ScannerError.configuration(
        `concurrency: ${concurrency.error.issues[0]?.message ?? 'invalid value'}`
      );
    }

    this.resolver = deps.resolver;
    this.analyzer = deps.analyzer;
    this.exporter = deps.exporter;
    this.logger = deps.logger ?? getLogger();
    this.metrics = deps.metrics ?? getMetrics();
    this.options = {
      projectId: options.projectId,
      location: options.location,
      concurrency: concurrency.data,
      minSeverity: options.minSeverity ?? 'HIGH',
      fixableOnly: options.fixableOnly ?? false,
      images: options.images ?? [],
    };
  }

  /**
   * Runs the scan.
   *
   * Per-target failures are collected, not thrown; the report carries them.
   * Throws only when exporting fails.
   */
  async scan(signal?: AbortSignal): Promise<ScanReport> {
    const { projectId, location, concurrency, images } = this.options;
    const collector = new ResultCollector();
    const semaphore = new Semaphore(concurrency);
    const inFlight = new Set<Promise<void>>();
    let targetCount = 0;

    this.logger.info('Starting scan', {
      project: projectId,
      location,
      concurrency,
      images: images.length > 0 ? images.length : undefined,
    });

    const items =
      images.length > 0
        ? this.resolver.resolveReferences(images, signal)
        : this.resolver.resolveAll(projectId, location, signal);

    try {
      for await (const item of items) {
        if (item.kind === 'error') {
          collector.addError(item.error);
          this.metrics.incrementCounter(MetricNames.RESOLVE_ERRORS_TOTAL, {
            location,
            errorKind: item.error.kind,
          });
          this.logger.warn('Failed to resolve images', { error: item.error.message });
          if (isCancelledError(item.error)) {
            break;
          }
          continue;
        }

        try {
          await semaphore.acquire(signal);
        } catch (error) {
          if (isCancelledError(error)) {
            break;
          }
          throw error;
        }

        targetCount++;
        this.metrics.incrementCounter(MetricNames.TARGETS_RESOLVED_TOTAL, {
          location: item.target.location,
          repository: item.target.repository,
        });

        const unit: Promise<void> = this.analyzeTarget(item.target, collector, signal).finally(() => {
          semaphore.release();
          inFlight.delete(unit);
          this.metrics.setGauge(MetricNames.IN_FLIGHT_ANALYSES, inFlight.size);
        });
        inFlight.add(unit);
        this.metrics.setGauge(MetricNames.IN_FLIGHT_ANALYSES, inFlight.size);
      }
    } catch (error) {
      collector.addError(
        isScannerError(error) ? error : ScannerError.listingFailed('scan targets', error)
      );
    }

    await Promise.all(inFlight);

    if (signal?.aborted && !collector.cancelled) {
      collector.addError(ScannerError.cancelled('Scan cancelled'));
    }

    const results = collector.results;
    if (results.length > 0) {
      try {
        await this.exporter.export(results);
      } catch (error) {
        throw isScannerError(error) && error.kind === ScannerErrorKind.ExportFailed
          ? error
          : ScannerError.exportFailed(error);
      }
      this.logger.info('Exported results', { count: results.length });
    } else {
      this.logger.info('No results to export; nothing to report');
    }

    const errors = collector.errors;
    const report: ScanReport = {
      status: errors.length === 0 ? 'succeeded' : results.length > 0 ? 'partial' : 'failed',
      results,
      errors,
      targetCount,
    };

    if (errors.length > 0) {
      report.error = new ScanAggregateError(errors);
      this.logger.warn('Scan completed with errors', {
        errors: errors.length,
        results: results.length,
      });
    } else {
      this.logger.info('Scan completed', { results: results.length });
    }

    return report;
  }

  /**
   * Analyzes one target. Never rejects; the outcome goes to the collector.
   */
  private async analyzeTarget(
    target: ScanTarget,
    collector: ResultCollector,
    signal?: AbortSignal
  ): Promise<void> {
    const labels = { location: target.location, repository: target.repository };
    const uri = formatArtifactReference(target.artifact);
    const start = Date.now();

    try {
      const result = await this.analyzer.analyze(
        {
          artifact: target.artifact,
          location: target.location,
          minSeverity: this.options.minSeverity,
          fixableOnly: this.options.fixableOnly,
        },
        signal
      );
      collector.addResult(result);
      this.metrics.incrementCounter(MetricNames.ANALYSES_TOTAL, { ...labels, success: true });
      this.metrics.incrementCounter(
        MetricNames.VULNERABILITIES_TOTAL,
        labels,
        result.summary.totalCount
      );
      this.logger.debug('Analyzed image', {
        uri,
        vulnerabilities: result.summary.totalCount,
      });
    } catch (error) {
      // A cancelled scan records a single Cancelled error once every unit settles
      if (signal?.aborted && isCancelledError(error)) {
        this.logger.debug('Analysis cancelled', { uri });
        return;
      }
      const analysisError = ScannerError.analysisFailed(uri, error);
      collector.addError(analysisError);
      this.metrics.incrementCounter(MetricNames.ANALYSES_TOTAL, {
        ...labels,
        success: false,
        errorKind: isScannerError(error) ? error.kind : undefined,
      });
      this.logger.warn('Failed to analyze image', { uri, error: analysisError.message });
    } finally {
      this.metrics.recordHistogram(MetricNames.ANALYSIS_DURATION_MS, Date.now() - start, labels);
    }
  }
}

/**
 * Overrides for {@link createScanner}.
 */
export interface CreateScannerOptions {
  /** Where results are written; stdout by default */
  sink?: TextSink;
  tokenProvider?: TokenProvider;
  logger?: Logger;
  metrics?: MetricCollector;
}

/**
 * Wires a scanner against the real APIs from a configuration.
 */
export async function createScanner(
  config: ScannerConfig,
  options: CreateScannerOptions = {}
): Promise<Scanner> {
  validateConfig(config);

  const images = config.images ?? [];
  const projectId = images.length > 0 ? (config.projectId ?? '') : await resolveProjectId(config);

  const client = new RegistryClient(
    { ...config, ...(projectId ? { projectId } : {}) },
    options.tokenProvider
  );
  const logger = options.logger ?? getLogger();

  const resolver = new ImageResolver({
    repositories: client.repositories(),
    dockerImages: client.dockerImages(),
    maxCandidatesPerImage: config.maxCandidatesPerImage,
    logger,
  });

  return new Scanner(
    {
      resolver,
      analyzer: client.vulnerabilities(),
      exporter: createExporter(config.outputFormat, options.sink ?? process.stdout),
      logger,
      metrics: options.metrics,
    },
    {
      projectId,
      location: config.location,
      concurrency: config.concurrency,
      minSeverity: config.minSeverity,
      fixableOnly: config.fixableOnly,
      images,
    }
  );
}
