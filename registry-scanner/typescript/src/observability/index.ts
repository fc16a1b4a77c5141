/**
 * Observability module for the registry scanner.
 * Provides metrics and logging support.
 * @module observability
 */

/**
 * Metric names for scan operations.
 */
export const MetricNames = {
  // Discovery metrics
  TARGETS_RESOLVED_TOTAL: 'scanner_targets_resolved_total',
  RESOLVE_ERRORS_TOTAL: 'scanner_resolve_errors_total',

  // Analysis metrics
  ANALYSES_TOTAL: 'scanner_analyses_total',
  ANALYSIS_DURATION_MS: 'scanner_analysis_duration_ms',
  VULNERABILITIES_TOTAL: 'scanner_vulnerabilities_total',

  // Concurrency metrics
  IN_FLIGHT_ANALYSES: 'scanner_in_flight_analyses',
} as const;

/**
 * Labels for metrics.
 */
export interface MetricLabels {
  /** Registry location */
  location?: string;
  /** Repository ID */
  repository?: string;
  /** Error kind */
  errorKind?: string;
  /** Success/failure */
  success?: boolean;
}

/**
 * Metric collector interface.
 */
export interface MetricCollector {
  /** Increments a counter */
  incrementCounter(name: string, labels?: MetricLabels, value?: number): void;
  /** Records a histogram value */
  recordHistogram(name: string, value: number, labels?: MetricLabels): void;
  /** Sets a gauge value */
  setGauge(name: string, value: number, labels?: MetricLabels): void;
}

/**
 * Logger interface.
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Destination a {@link ConsoleLogger} writes lines to.
 */
export interface LogSink {
  write(chunk: string): unknown;
}

/**
 * No-op metric collector for when metrics are disabled.
 */
export class NoOpMetricCollector implements MetricCollector {
  incrementCounter(): void {}
  recordHistogram(): void {}
  setGauge(): void {}
}

/**
 * Line-oriented logger writing to a stream (stderr by default, keeping
 * stdout free for exported results).
 */
export class ConsoleLogger implements Logger {
  private readonly prefix: string;
  private readonly minLevel: LogLevel;
  private readonly sink: LogSink;

  constructor(options?: { prefix?: string; minLevel?: LogLevel; sink?: LogSink }) {
    this.prefix = options?.prefix ?? '[scanner]';
    this.minLevel = options?.minLevel ?? 'info';
    this.sink = options?.sink ?? process.stderr;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.minLevel);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) {
      return;
    }
    const timestamp = new Date().toISOString();
    const contextStr = context ? ` ${JSON.stringify(context, errorReplacer)}` : '';
    this.sink.write(`${timestamp} ${this.prefix} [${level.toUpperCase()}] ${message}${contextStr}\n`);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }
}

// Errors have no enumerable own properties; log their message instead of "{}".
function errorReplacer(_key: string, value: unknown): unknown {
  return value instanceof Error ? value.message : value;
}

/**
 * No-op logger for when logging is disabled.
 */
export class NoOpLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

/**
 * Simple in-memory metric collector for development/testing.
 */
export class InMemoryMetricCollector implements MetricCollector {
  private readonly counters: Map<string, number> = new Map();
  private readonly histograms: Map<string, number[]> = new Map();
  private readonly gauges: Map<string, number> = new Map();

  private makeKey(name: string, labels?: MetricLabels): string {
    const labelStr = labels
      ? Object.entries(labels)
          .filter(([, v]) => v !== undefined)
          .map(([k, v]) => `${k}=${String(v)}`)
          .sort()
          .join(',')
      : '';
    return labelStr ? `${name}{${labelStr}}` : name;
  }

  incrementCounter(name: string, labels?: MetricLabels, value: number = 1): void {
    const key = this.makeKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  recordHistogram(name: string, value: number, labels?: MetricLabels): void {
    const key = this.makeKey(name, labels);
    const values = this.histograms.get(key) ?? [];
    values.push(value);
    this.histograms.set(key, values);
  }

  setGauge(name: string, value: number, labels?: MetricLabels): void {
    const key = this.makeKey(name, labels);
    this.gauges.set(key, value);
  }

  /** Gets all counter values */
  getCounters(): Map<string, number> {
    return new Map(this.counters);
  }

  /** Gets all histogram values */
  getHistograms(): Map<string, number[]> {
    return new Map(this.histograms);
  }

  /** Gets all gauge values */
  getGauges(): Map<string, number> {
    return new Map(this.gauges);
  }

  /** Resets all metrics */
  reset(): void {
    this.counters.clear();
    this.histograms.clear();
    this.gauges.clear();
  }
}

/**
 * Observability configuration.
 */
export interface ObservabilityConfig {
  /** Metric collector */
  metrics?: MetricCollector;
  /** Logger */
  logger?: Logger;
  /** Enable debug logging */
  debug?: boolean;
}

/**
 * Global observability instance.
 */
let globalObservability: Required<Omit<ObservabilityConfig, 'debug'>> = {
  metrics: new NoOpMetricCollector(),
  logger: new NoOpLogger(),
};

/**
 * Configures global observability.
 */
export function configureObservability(config: ObservabilityConfig): void {
  globalObservability = {
    metrics: config.metrics ?? new NoOpMetricCollector(),
    logger: config.logger ?? new ConsoleLogger({ minLevel: config.debug ? 'debug' : 'info' }),
  };
}

/**
 * Gets the global metric collector.
 */
export function getMetrics(): MetricCollector {
  return globalObservability.metrics;
}

/**
 * Gets the global logger.
 */
export function getLogger(): Logger {
  return globalObservability.logger;
}
