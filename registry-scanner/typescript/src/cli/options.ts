/**
 * Command-line definition and option parsing.
 * @module cli/options
 */

import { Command, Option } from 'commander';
import { z } from 'zod';
import {
  MAX_CONCURRENCY,
  OUTPUT_FORMATS,
  configFromEnv,
  parseOutputFormat,
  validateConfig,
  type ScannerConfig,
} from '../config.js';
import { ScannerError } from '../errors.js';
import { parseSeverity } from '../types/vulnerability.js';

/**
 * Raw values commander collects.
 */
const CliOptionsSchema = z.object({
  location: z.string().optional(),
  project: z.string().optional(),
  minSeverity: z.string().optional(),
  outputFormat: z.string().optional(),
  concurrency: z.string().optional(),
  fixable: z.boolean().optional(),
  image: z.array(z.string()).optional(),
  debug: z.boolean().optional(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

/**
 * Builds the `registry-scanner` command. Defaults are applied by the
 * configuration layer so environment variables can supply them.
 */
export function buildProgram(): Command {
  return new Command()
    .name('registry-scanner')
    .description('Scan Artifact Registry container images for known vulnerabilities')
    .option('-l, --location <location>', 'registry location, e.g. us-central1 (env: SCANNER_LOCATION)')
    .option('-p, --project <id>', 'GCP project ID (inferred from the environment when omitted)')
    .option('-s, --min-severity <level>', 'minimum severity: MINIMAL, LOW, MEDIUM, HIGH, CRITICAL (default: HIGH)')
    .addOption(
      new Option('-o, --output-format <format>', 'output format (default: json)').choices(OUTPUT_FORMATS)
    )
    .option('-c, --concurrency <n>', `maximum concurrent analyses, 1-${MAX_CONCURRENCY} (default: 5)`)
    .option('-f, --fixable', 'report only vulnerabilities that have a fix')
    .option('-i, --image <uri...>', 'scan only these image references')
    .option('-d, --debug', 'enable debug logging');
}

/**
 * Validates commander's option bag.
 */
export function parseCliOptions(values: unknown): CliOptions {
  const parsed = CliOptionsSchema.safeParse(values);
  if (!parsed.success) {
    throw ScannerError.configuration(`invalid options: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
  }
  return parsed.data;
}

/**
 * Parses the concurrency flag.
 */
export function parseConcurrency(raw: string): number {
  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value < 1 || value > MAX_CONCURRENCY) {
    throw ScannerError.configuration(
      `concurrency must be an integer between 1 and ${MAX_CONCURRENCY}, got ${raw}`
    );
  }
  return value;
}

/**
 * Merges command-line options over the environment configuration.
 */
export function toScannerConfig(
  options: CliOptions,
  env: NodeJS.ProcessEnv = process.env
): ScannerConfig {
  const location = options.location ?? env['SCANNER_LOCATION'];
  if (!location) {
    throw ScannerError.configuration('location is required: pass --location or set SCANNER_LOCATION');
  }

  const config = configFromEnv({ ...env, SCANNER_LOCATION: location });

  if (options.project) {
    config.projectId = options.project;
  }
  if (options.minSeverity !== undefined) {
    config.minSeverity = parseSeverity(options.minSeverity);
  }
  if (options.outputFormat !== undefined) {
    config.outputFormat = parseOutputFormat(options.outputFormat);
  }
  if (options.concurrency !== undefined) {
    config.concurrency = parseConcurrency(options.concurrency);
  }
  if (options.fixable) {
    config.fixableOnly = true;
  }
  if (options.image && options.image.length > 0) {
    config.images = options.image;
  }
  if (options.debug) {
    config.debug = true;
  }

  validateConfig(config);
  return config;
}
