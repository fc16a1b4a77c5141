/**
 * Vulnerability types and Container Analysis occurrence schemas.
 * @module types/vulnerability
 */

import { z } from 'zod';
import { ScannerError } from '../errors.js';
import type { ArtifactReference } from './reference.js';

/**
 * Severity levels reported by Container Analysis.
 */
export type Severity = 'UNSPECIFIED' | 'MINIMAL' | 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

/**
 * Ordinal of each severity; higher is worse.
 */
export const SeverityOrder: Readonly<Record<Severity, number>> = {
  UNSPECIFIED: 0,
  MINIMAL: 1,
  LOW: 2,
  MEDIUM: 3,
  HIGH: 4,
  CRITICAL: 5,
};

const SeverityEnum = z.enum(['SEVERITY_UNSPECIFIED', 'MINIMAL', 'LOW', 'MEDIUM', 'HIGH', 'CRITICAL']);

/**
 * A single vulnerability finding.
 */
export interface Vulnerability {
  /** CVE identifier */
  id: string;
  severity: Severity;
  cvssScore: number;
  packageType: string;
  packageName: string;
  installedVersion: string;
  /** Empty when no fix is available */
  fixedVersion: string;
  description: string;
  urls: string[];
}

/**
 * Aggregated statistics for one image.
 */
export interface VulnerabilitySummary {
  totalCount: number;
  countBySeverity: Partial<Record<Severity, number>>;
  fixableCount: number;
}

/**
 * Parameters for analyzing one image.
 */
export interface AnalyzeRequest {
  /** Image reference to analyze; must carry a digest */
  artifact: ArtifactReference;
  /** Registry location, used to build the resource URL */
  location: string;
  /** Minimum severity to keep */
  minSeverity: Severity;
  /** Keep only findings with a fix */
  fixableOnly: boolean;
}

/**
 * Analysis result for one image.
 */
export interface AnalyzeResult {
  artifact: ArtifactReference;
  scanTime: Date;
  vulnerabilities: Vulnerability[];
  summary: VulnerabilitySummary;
}

/**
 * Fetches vulnerability findings for one image. Implementations must be safe
 * to call concurrently.
 */
export interface Analyzer {
  analyze(request: AnalyzeRequest, signal?: AbortSignal): Promise<AnalyzeResult>;
}

/**
 * Version as reported in a package issue.
 */
export const PackageVersionSchema = z.object({
  name: z.string().optional(),
  kind: z.string().optional(),
  fullName: z.string().optional(),
});

/**
 * Package issue attached to a vulnerability occurrence.
 */
export const PackageIssueSchema = z.object({
  affectedPackage: z.string().optional(),
  affectedVersion: PackageVersionSchema.optional(),
  fixedVersion: PackageVersionSchema.optional(),
  packageType: z.string().optional(),
  fixAvailable: z.boolean().optional(),
});

/**
 * Vulnerability occurrence as returned by the Container Analysis REST API.
 */
export const OccurrenceSchema = z.object({
  name: z.string(),
  resourceUri: z.string().optional(),
  noteName: z.string().optional(),
  kind: z.string().optional(),
  vulnerability: z.object({
    severity: SeverityEnum.optional(),
    effectiveSeverity: SeverityEnum.optional(),
    cvssScore: z.number().optional(),
    shortDescription: z.string().optional(),
    packageIssue: z.array(PackageIssueSchema).optional(),
    relatedUrls: z.array(z.object({ url: z.string().optional(), label: z.string().optional() })).optional(),
  }),
});

export type Occurrence = z.infer<typeof OccurrenceSchema>;

/**
 * A page of occurrences; items are validated one by one.
 */
export const ListOccurrencesResponseSchema = z.object({
  occurrences: z.array(z.unknown()).optional(),
  nextPageToken: z.string().optional(),
});

/**
 * Maps the API severity enum onto {@link Severity}.
 */
export function normalizeSeverity(value: z.infer<typeof SeverityEnum> | undefined): Severity {
  if (value === undefined || value === 'SEVERITY_UNSPECIFIED') {
    return 'UNSPECIFIED';
  }
  return value;
}

/**
 * Parses a user-supplied severity level.
 */
export function parseSeverity(input: string): Severity {
  const normalized = input.trim().toUpperCase();
  switch (normalized) {
    case 'MINIMAL':
    case 'LOW':
    case 'MEDIUM':
    case 'HIGH':
    case 'CRITICAL':
      return normalized;
    default:
      throw ScannerError.configuration(
        `invalid severity level: ${normalized} (allowed: MINIMAL, LOW, MEDIUM, HIGH, CRITICAL)`
      );
  }
}

/**
 * Keeps findings at or above the given severity. UNSPECIFIED keeps everything.
 */
export function filterBySeverity(vulns: Vulnerability[], min: Severity): Vulnerability[] {
  if (min === 'UNSPECIFIED') {
    return vulns;
  }
  const threshold = SeverityOrder[min];
  return vulns.filter((v) => SeverityOrder[v.severity] >= threshold);
}

/**
 * Keeps findings that have a fixed version.
 */
export function filterFixable(vulns: Vulnerability[]): Vulnerability[] {
  return vulns.filter((v) => v.fixedVersion !== '');
}

/**
 * Builds the summary for a list of findings.
 */
export function buildSummary(vulns: Vulnerability[]): VulnerabilitySummary {
  const summary: VulnerabilitySummary = {
    totalCount: vulns.length,
    countBySeverity: {},
    fixableCount: 0,
  };

  for (const v of vulns) {
    summary.countBySeverity[v.severity] = (summary.countBySeverity[v.severity] ?? 0) + 1;
    if (v.fixedVersion !== '') {
      summary.fixableCount++;
    }
  }
  return summary;
}

/**
 * Sorts findings by severity, most severe first.
 */
export function sortBySeverity(vulns: Vulnerability[]): Vulnerability[] {
  return [...vulns].sort((a, b) => SeverityOrder[b.severity] - SeverityOrder[a.severity]);
}
