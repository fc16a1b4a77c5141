/**
 * Configuration types for the registry scanner.
 * @module config
 */

import { z } from 'zod';
import { ScannerError } from './errors.js';
import { CONTAINER_ANALYSIS_ENDPOINT, DEFAULT_API_ENDPOINT } from './types/common.js';
import { parseSeverity, type Severity } from './types/vulnerability.js';

/**
 * Default request timeout in milliseconds.
 */
export const DEFAULT_TIMEOUT = 30000;

/**
 * Default number of concurrent analyses.
 */
export const DEFAULT_CONCURRENCY = 5;

/**
 * Upper bound on concurrent analyses.
 */
export const MAX_CONCURRENCY = 255;

/**
 * Default number of versions buffered per image while scanning a repository.
 */
export const DEFAULT_MAX_CANDIDATES = 5;

/**
 * Default User-Agent header.
 */
export const DEFAULT_USER_AGENT = 'registry-scanner/1.0.0';

/**
 * Output formats understood by the exporters.
 */
export const OUTPUT_FORMATS = ['json', 'csv', 'tsv'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * Authentication method types.
 */
export type AuthMethod =
  | { type: 'service_account'; keyPath?: string; keyJson?: string }
  | { type: 'adc' }
  | { type: 'access_token'; token: string };

/**
 * Registry scanner configuration.
 */
export interface ScannerConfig {
  /** Registry location (e.g., "us-central1", "europe") */
  location: string;
  /** GCP project ID; inferred from the environment when absent */
  projectId?: string;
  /** Artifact Registry API endpoint */
  apiEndpoint: string;
  /** Container Analysis API endpoint */
  containerAnalysisEndpoint: string;
  /** Authentication method */
  auth?: AuthMethod;
  /** Request timeout in milliseconds */
  timeout: number;
  /** User-Agent header */
  userAgent: string;
  /** Maximum concurrent analyses */
  concurrency: number;
  /** Versions buffered per image during selection */
  maxCandidatesPerImage: number;
  /** Minimum severity reported */
  minSeverity: Severity;
  /** Report only vulnerabilities that have a fix */
  fixableOnly: boolean;
  /** Output format */
  outputFormat: OutputFormat;
  /** Explicit image references; the whole location is scanned when absent */
  images?: string[];
  /** Enable debug logging */
  debug: boolean;
}

const AuthMethodSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('service_account'),
    keyPath: z.string().optional(),
    keyJson: z.string().optional(),
  }),
  z.object({ type: z.literal('adc') }),
  z.object({ type: z.literal('access_token'), token: z.string().min(1) }),
]);

/**
 * Zod schema for ScannerConfig validation.
 */
export const ScannerConfigSchema = z.object({
  location: z.string().trim().min(1, 'Location cannot be empty'),
  projectId: z
    .string()
    .regex(/^[a-z][a-z0-9-]{4,28}[a-z0-9]$/, 'Invalid project ID format')
    .optional(),
  apiEndpoint: z.string().url(),
  containerAnalysisEndpoint: z.string().url(),
  auth: AuthMethodSchema.optional(),
  timeout: z.number().int().positive('Timeout must be greater than 0'),
  userAgent: z.string().min(1),
  concurrency: z
    .number()
    .int('Concurrency must be an integer between 1 and 255')
    .min(1, 'Concurrency must be between 1 and 255')
    .max(MAX_CONCURRENCY, 'Concurrency must be between 1 and 255'),
  maxCandidatesPerImage: z.number().int().positive(),
  minSeverity: z.enum(['UNSPECIFIED', 'MINIMAL', 'LOW', 'MEDIUM', 'HIGH', 'CRITICAL']),
  fixableOnly: z.boolean(),
  outputFormat: z.enum(OUTPUT_FORMATS),
  images: z.array(z.string().min(1)).optional(),
  debug: z.boolean(),
});

/**
 * Creates a default configuration.
 */
export function createDefaultConfig(location: string): ScannerConfig {
  return {
    location,
    apiEndpoint: DEFAULT_API_ENDPOINT,
    containerAnalysisEndpoint: CONTAINER_ANALYSIS_ENDPOINT,
    auth: { type: 'adc' },
    timeout: DEFAULT_TIMEOUT,
    userAgent: DEFAULT_USER_AGENT,
    concurrency: DEFAULT_CONCURRENCY,
    maxCandidatesPerImage: DEFAULT_MAX_CANDIDATES,
    minSeverity: 'HIGH',
    fixableOnly: false,
    outputFormat: 'json',
    debug: false,
  };
}

/**
 * Validates a configuration.
 */
export function validateConfig(config: ScannerConfig): void {
  const result = ScannerConfigSchema.safeParse(config);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw ScannerError.configuration(`${path}${issue?.message ?? 'Invalid configuration'}`);
  }
}

/**
 * Parses an output format name.
 */
export function parseOutputFormat(input: string): OutputFormat {
  const normalized = input.trim().toLowerCase();
  const format = OUTPUT_FORMATS.find((f) => f === normalized);
  if (!format) {
    throw ScannerError.configuration(
      `unsupported output format: ${input} (allowed: ${OUTPUT_FORMATS.join(', ')})`
    );
  }
  return format;
}

/**
 * Creates configuration from environment variables.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ScannerConfig {
  const location = env['SCANNER_LOCATION'];

  if (!location) {
    throw ScannerError.configuration('Location not found in environment. Set SCANNER_LOCATION');
  }

  const config = createDefaultConfig(location);

  const projectId = projectIdFromEnv(env);
  if (projectId) {
    config.projectId = projectId;
  }

  if (env['SCANNER_CONCURRENCY']) {
    const concurrency = parseInt(env['SCANNER_CONCURRENCY'], 10);
    if (!isNaN(concurrency)) {
      config.concurrency = concurrency;
    }
  }

  if (env['SCANNER_MIN_SEVERITY']) {
    config.minSeverity = parseSeverity(env['SCANNER_MIN_SEVERITY']);
  }

  if (env['SCANNER_OUTPUT_FORMAT']) {
    config.outputFormat = parseOutputFormat(env['SCANNER_OUTPUT_FORMAT']);
  }

  if (env['SCANNER_TIMEOUT_SECONDS']) {
    const timeout = parseInt(env['SCANNER_TIMEOUT_SECONDS'], 10);
    if (!isNaN(timeout) && timeout > 0) {
      config.timeout = timeout * 1000;
    }
  }

  // Determine auth method
  const serviceAccountKey = env['SCANNER_SERVICE_ACCOUNT_KEY'];
  const googleCredentials = env['GOOGLE_APPLICATION_CREDENTIALS'];

  if (serviceAccountKey) {
    config.auth = { type: 'service_account', keyJson: serviceAccountKey };
  } else if (googleCredentials) {
    config.auth = { type: 'service_account', keyPath: googleCredentials };
  } else {
    config.auth = { type: 'adc' };
  }

  return config;
}

/**
 * Reads the project ID from the first environment variable that sets one.
 */
export function projectIdFromEnv(env: NodeJS.ProcessEnv = process.env): string | undefined {
  return env['SCANNER_PROJECT_ID'] || env['GOOGLE_CLOUD_PROJECT'] || env['GCLOUD_PROJECT'] || undefined;
}

/**
 * Builder for ScannerConfig.
 */
export class ScannerConfigBuilder {
  private config: ScannerConfig;

  constructor(location: string) {
    this.config = createDefaultConfig(location);
  }

  /**
   * Sets the project ID.
   */
  projectId(projectId: string): this {
    this.config.projectId = projectId;
    return this;
  }

  /**
   * Sets the Artifact Registry API endpoint.
   */
  apiEndpoint(endpoint: string): this {
    this.config.apiEndpoint = endpoint;
    return this;
  }

  /**
   * Sets the Container Analysis API endpoint.
   */
  containerAnalysisEndpoint(endpoint: string): this {
    this.config.containerAnalysisEndpoint = endpoint;
    return this;
  }

  /**
   * Sets the authentication method.
   */
  auth(auth: AuthMethod): this {
    this.config.auth = auth;
    return this;
  }

  /**
   * Sets service account authentication from a key file path.
   */
  serviceAccountKey(keyPath: string): this {
    this.config.auth = { type: 'service_account', keyPath };
    return this;
  }

  /**
   * Sets access token authentication.
   */
  accessToken(token: string): this {
    this.config.auth = { type: 'access_token', token };
    return this;
  }

  /**
   * Sets the request timeout.
   */
  timeout(timeoutMs: number): this {
    this.config.timeout = timeoutMs;
    return this;
  }

  /**
   * Sets the User-Agent header.
   */
  userAgent(userAgent: string): this {
    this.config.userAgent = userAgent;
    return this;
  }

  concurrency(concurrency: number): this {
    this.config.concurrency = concurrency;
    return this;
  }

  maxCandidatesPerImage(max: number): this {
    this.config.maxCandidatesPerImage = max;
    return this;
  }

  minSeverity(severity: Severity): this {
    this.config.minSeverity = severity;
    return this;
  }

  fixableOnly(fixableOnly: boolean = true): this {
    this.config.fixableOnly = fixableOnly;
    return this;
  }

  outputFormat(format: OutputFormat): this {
    this.config.outputFormat = format;
    return this;
  }

  /**
   * Restricts the scan to explicit image references.
   */
  images(images: string[]): this {
    this.config.images = [...images];
    return this;
  }

  debug(debug: boolean = true): this {
    this.config.debug = debug;
    return this;
  }

  /**
   * Builds and validates the configuration.
   */
  build(): ScannerConfig {
    validateConfig(this.config);
    return { ...this.config };
  }
}
