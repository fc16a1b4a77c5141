/**
 * Vulnerability lookups through the Container Analysis API.
 * @module services/vulnerability
 */

import type { RegistryClient } from '../client/client.js';
import { ScannerError } from '../errors.js';
import { getLogger } from '../observability/index.js';
import { toResourceUrl } from '../types/reference.js';
import {
  ListOccurrencesResponseSchema,
  OccurrenceSchema,
  buildSummary,
  filterBySeverity,
  filterFixable,
  normalizeSeverity,
  sortBySeverity,
  type AnalyzeRequest,
  type AnalyzeResult,
  type Analyzer,
  type Occurrence,
  type Vulnerability,
} from '../types/vulnerability.js';
import type { PaginatedResponse, PaginationOptions } from '../types/common.js';

/**
 * Service for vulnerability occurrences of container images.
 */
export class VulnerabilityService implements Analyzer {
  private readonly client: RegistryClient;

  constructor(client: RegistryClient) {
    this.client = client;
  }

  /**
   * Fetches, filters and summarizes the vulnerabilities of one image digest.
   * Findings are ordered most severe first.
   */
  async analyze(request: AnalyzeRequest, signal?: AbortSignal): Promise<AnalyzeResult> {
    const resourceUrl = toResourceUrl(request.artifact, request.location);
    const filter = `resourceUrl="${resourceUrl}" AND kind="VULNERABILITY"`;

    const vulnerabilities: Vulnerability[] = [];
    for await (const occurrence of this.listAllOccurrences(request.artifact.projectId, filter, {
      signal,
    })) {
      vulnerabilities.push(toVulnerability(occurrence));
    }

    let filtered = filterBySeverity(vulnerabilities, request.minSeverity);
    if (request.fixableOnly) {
      filtered = filterFixable(filtered);
    }
    filtered = sortBySeverity(filtered);

    return {
      artifact: request.artifact,
      scanTime: new Date(),
      vulnerabilities: filtered,
      summary: buildSummary(filtered),
    };
  }

  /**
   * Lists one page of occurrences in a project.
   *
   * Occurrences that do not carry vulnerability details are dropped.
   */
  async listOccurrences(
    projectId: string,
    filter: string,
    options?: PaginationOptions
  ): Promise<PaginatedResponse<Occurrence>> {
    const response = await this.client.getContainerAnalysis(`/projects/${projectId}/occurrences`, {
      query: {
        filter,
        pageSize: options?.pageSize,
        pageToken: options?.pageToken,
      },
      signal: options?.signal,
    });

    const parsed = ListOccurrencesResponseSchema.safeParse(response.data ?? {});
    if (!parsed.success) {
      throw ScannerError.invalidResponse(`projects/${projectId}/occurrences`, parsed.error.message);
    }

    const items: Occurrence[] = [];
    for (const raw of parsed.data.occurrences ?? []) {
      const occurrence = OccurrenceSchema.safeParse(raw);
      if (occurrence.success) {
        items.push(occurrence.data);
      } else {
        getLogger().debug('Skipping unconvertible occurrence', {
          project: projectId,
          issue: occurrence.error.issues[0]?.message,
        });
      }
    }

    return {
      items,
      nextPageToken: parsed.data.nextPageToken || undefined,
    };
  }

  /**
   * Iterates over every matching occurrence.
   */
  async *listAllOccurrences(
    projectId: string,
    filter: string,
    options: Omit<PaginationOptions, 'pageToken'> = {}
  ): AsyncGenerator<Occurrence, void, undefined> {
    let pageToken: string | undefined;

    do {
      const page = await this.listOccurrences(projectId, filter, { ...options, pageToken });
      yield* page.items;
      pageToken = page.nextPageToken;
    } while (pageToken);
  }
}

type PackageVersion = { name?: string; kind?: string; fullName?: string };

function formatVersion(version: PackageVersion | undefined): string {
  return version?.fullName || version?.name || '';
}

/**
 * Converts an occurrence into a finding. Package details come from the first
 * package issue.
 */
export function toVulnerability(occurrence: Occurrence): Vulnerability {
  const details = occurrence.vulnerability;
  const issue = details.packageIssue?.[0];
  const fixed = issue?.fixedVersion;

  const effective = normalizeSeverity(details.effectiveSeverity);
  const severity = effective !== 'UNSPECIFIED' ? effective : normalizeSeverity(details.severity);

  return {
    id: details.shortDescription ?? '',
    severity,
    cvssScore: details.cvssScore ?? 0,
    packageType: issue?.packageType ?? '',
    packageName: issue?.affectedPackage ?? '',
    installedVersion: formatVersion(issue?.affectedVersion),
    // MAXIMUM marks "no fix yet"
    fixedVersion: fixed && fixed.kind !== 'MAXIMUM' ? formatVersion(fixed) : '',
    description: occurrence.noteName ?? '',
    urls: (details.relatedUrls ?? []).flatMap((related) => (related.url ? [related.url] : [])),
  };
}
