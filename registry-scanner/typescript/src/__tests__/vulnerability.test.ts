import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { RegistryClient } from '../client/client.js';
import { ScannerConfigBuilder } from '../config.js';
import { ScannerErrorKind } from '../errors.js';
import { toVulnerability } from '../services/vulnerability.js';
import {
  buildSummary,
  filterBySeverity,
  filterFixable,
  parseSeverity,
  sortBySeverity,
  type AnalyzeRequest,
  type Occurrence,
} from '../types/vulnerability.js';
import { digest, jsonResponse, target, vulnerability } from './fixtures.js';

describe('severity helpers', () => {
  it('parses severities case-insensitively', () => {
    expect(parseSeverity(' high ')).toBe('HIGH');
    expect(parseSeverity('Critical')).toBe('CRITICAL');
  });

  it('rejects unknown severities', () => {
    expect(() => parseSeverity('urgent')).toThrow(
      'invalid severity level: URGENT (allowed: MINIMAL, LOW, MEDIUM, HIGH, CRITICAL)'
    );
  });

  it('keeps findings at or above the threshold', () => {
    const vulns = [
      vulnerability({ id: 'a', severity: 'LOW' }),
      vulnerability({ id: 'b', severity: 'HIGH' }),
      vulnerability({ id: 'c', severity: 'CRITICAL' }),
      vulnerability({ id: 'd', severity: 'UNSPECIFIED' }),
    ];

    expect(filterBySeverity(vulns, 'HIGH').map((v) => v.id)).toEqual(['b', 'c']);
    expect(filterBySeverity(vulns, 'UNSPECIFIED')).toBe(vulns);
  });

  it('keeps only fixable findings', () => {
    const vulns = [vulnerability({ id: 'a', fixedVersion: '' }), vulnerability({ id: 'b' })];

    expect(filterFixable(vulns).map((v) => v.id)).toEqual(['b']);
  });

  it('sorts most severe first, keeping order within a level', () => {
    const vulns = [
      vulnerability({ id: 'a', severity: 'MEDIUM' }),
      vulnerability({ id: 'b', severity: 'CRITICAL' }),
      vulnerability({ id: 'c', severity: 'MEDIUM' }),
    ];

    expect(sortBySeverity(vulns).map((v) => v.id)).toEqual(['b', 'a', 'c']);
  });

  it('summarizes counts', () => {
    const summary = buildSummary([
      vulnerability({ severity: 'HIGH' }),
      vulnerability({ severity: 'HIGH', fixedVersion: '' }),
      vulnerability({ severity: 'CRITICAL' }),
    ]);

    expect(summary).toEqual({
      totalCount: 3,
      countBySeverity: { HIGH: 2, CRITICAL: 1 },
      fixableCount: 2,
    });
  });
});

describe('toVulnerability', () => {
  const occurrence: Occurrence = {
    name: 'projects/test-project/occurrences/1',
    noteName: 'projects/goog-vulnz/notes/CVE-2024-1234',
    kind: 'VULNERABILITY',
    vulnerability: {
      severity: 'MEDIUM',
      effectiveSeverity: 'HIGH',
      cvssScore: 8.1,
      shortDescription: 'CVE-2024-1234',
      packageIssue: [
        {
          affectedPackage: 'zlib',
          packageType: 'OS',
          affectedVersion: { name: '1.2.11', kind: 'NORMAL', fullName: '1.2.11-r3' },
          fixedVersion: { name: '1.2.12', kind: 'NORMAL', fullName: '1.2.12-r0' },
        },
      ],
      relatedUrls: [{ url: 'https://example.com/a' }, { label: 'no url' }, { url: 'https://example.com/b' }],
    },
  };

  it('maps the first package issue', () => {
    expect(toVulnerability(occurrence)).toEqual({
      id: 'CVE-2024-1234',
      severity: 'HIGH',
      cvssScore: 8.1,
      packageType: 'OS',
      packageName: 'zlib',
      installedVersion: '1.2.11-r3',
      fixedVersion: '1.2.12-r0',
      description: 'projects/goog-vulnz/notes/CVE-2024-1234',
      urls: ['https://example.com/a', 'https://example.com/b'],
    });
  });

  it('falls back to the base severity when the effective one is unspecified', () => {
    const vuln = toVulnerability({
      ...occurrence,
      vulnerability: { ...occurrence.vulnerability, effectiveSeverity: 'SEVERITY_UNSPECIFIED' },
    });

    expect(vuln.severity).toBe('MEDIUM');
  });

  it('treats a MAXIMUM fixed version as no fix', () => {
    const vuln = toVulnerability({
      ...occurrence,
      vulnerability: {
        ...occurrence.vulnerability,
        packageIssue: [{ affectedPackage: 'zlib', fixedVersion: { kind: 'MAXIMUM' } }],
      },
    });

    expect(vuln.fixedVersion).toBe('');
    expect(vuln.installedVersion).toBe('');
  });

  it('fills defaults for a bare occurrence', () => {
    expect(toVulnerability({ name: 'projects/p/occurrences/2', vulnerability: {} })).toEqual({
      id: '',
      severity: 'UNSPECIFIED',
      cvssScore: 0,
      packageType: '',
      packageName: '',
      installedVersion: '',
      fixedVersion: '',
      description: '',
      urls: [],
    });
  });
});

describe('VulnerabilityService', () => {
  const fetchMock = vi.fn<[string | URL | Request, RequestInit | undefined], Promise<Response>>();
  const scanTarget = target('repo-one', 'app', digest('a'));
  const request: AnalyzeRequest = {
    artifact: scanTarget.artifact,
    location: 'us-central1',
    minSeverity: 'HIGH',
    fixableOnly: false,
  };

  function occurrenceJson(id: string, severity: string, fixed?: string): Record<string, unknown> {
    return {
      name: `projects/test-project/occurrences/${id}`,
      noteName: `projects/goog-vulnz/notes/${id}`,
      vulnerability: {
        effectiveSeverity: severity,
        shortDescription: id,
        packageIssue: [
          {
            affectedPackage: 'openssl',
            affectedVersion: { name: '3.0.1' },
            ...(fixed ? { fixedVersion: { name: fixed } } : {}),
          },
        ],
      },
    };
  }

  function createClient(): RegistryClient {
    const config = new ScannerConfigBuilder('us-central1')
      .projectId('test-project')
      .accessToken('test-token')
      .build();
    return new RegistryClient(config);
  }

  function requestedUrl(call: number): URL {
    return new URL(String(fetchMock.mock.calls[call]?.[0]));
  }

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('pages through occurrences and filters by severity', async () => {
    fetchMock
      .mockResolvedValueOnce(
        jsonResponse({
          occurrences: [occurrenceJson('CVE-1', 'HIGH', '3.0.2'), occurrenceJson('CVE-2', 'LOW')],
          nextPageToken: 'page-2',
        })
      )
      .mockResolvedValueOnce(
        jsonResponse({
          occurrences: [occurrenceJson('CVE-3', 'CRITICAL'), { name: 'projects/p/occurrences/x' }],
        })
      );

    const result = await createClient().vulnerabilities().analyze(request);

    expect(result.vulnerabilities.map((v) => [v.id, v.severity])).toEqual([
      ['CVE-3', 'CRITICAL'],
      ['CVE-1', 'HIGH'],
    ]);
    expect(result.summary).toEqual({
      totalCount: 2,
      countBySeverity: { CRITICAL: 1, HIGH: 1 },
      fixableCount: 1,
    });
    expect(result.artifact).toBe(scanTarget.artifact);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(requestedUrl(1).searchParams.get('pageToken')).toBe('page-2');
  });

  it('filters occurrences by resource URL and kind', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({}));

    await createClient().vulnerabilities().analyze(request);

    const url = requestedUrl(0);
    expect(url.origin).toBe('https://containeranalysis.googleapis.com');
    expect(url.pathname).toBe('/v1/projects/test-project/occurrences');
    expect(url.searchParams.get('filter')).toBe(
      `resourceUrl="https://us-central1-docker.pkg.dev/test-project/repo-one/app@${digest('a')}" AND kind="VULNERABILITY"`
    );
  });

  it('sends the bearer token and quota project', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({}));

    await createClient().vulnerabilities().analyze(request);

    const headers = new Headers(fetchMock.mock.calls[0]?.[1]?.headers);
    expect(headers.get('authorization')).toBe('Bearer test-token');
    expect(headers.get('x-goog-user-project')).toBe('test-project');
    expect(headers.get('user-agent')).toBe('registry-scanner/1.0.0');
  });

  it('keeps only fixable findings when asked', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        occurrences: [occurrenceJson('CVE-1', 'HIGH', '3.0.2'), occurrenceJson('CVE-2', 'HIGH')],
      })
    );

    const result = await createClient()
      .vulnerabilities()
      .analyze({ ...request, fixableOnly: true });

    expect(result.vulnerabilities.map((v) => v.id)).toEqual(['CVE-1']);
  });

  it('maps API errors to error kinds', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse(
        { error: { code: 403, message: 'Permission denied on resource', status: 'PERMISSION_DENIED' } },
        403
      )
    );

    await expect(createClient().vulnerabilities().analyze(request)).rejects.toMatchObject({
      kind: ScannerErrorKind.PermissionDenied,
      statusCode: 403,
      message: 'Permission denied on resource',
    });
  });

  it('does not call the API once the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      createClient().vulnerabilities().analyze(request, controller.signal)
    ).rejects.toMatchObject({ kind: ScannerErrorKind.Cancelled });
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
