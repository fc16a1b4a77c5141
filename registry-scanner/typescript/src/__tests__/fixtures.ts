/**
 * In-process fakes and builders shared by the tests.
 */

import { vi } from 'vitest';
import type { Logger } from '../observability/index.js';
import type {
  DockerImageLister,
  RepositoryLister,
  ResolvedItem,
  ScanTarget,
  TargetSource,
} from '../resolver/types.js';
import type { DockerImage } from '../types/docker-image.js';
import { parseArtifactUri } from '../types/reference.js';
import type { Repository } from '../types/repository.js';
import type { AnalyzeResult, Vulnerability } from '../types/vulnerability.js';

export const HOST = 'us-central1-docker.pkg.dev';
export const PROJECT = 'test-project';
export const LOCATION = 'us-central1';
export const PARENT = `projects/${PROJECT}/locations/${LOCATION}`;

export function digest(hexChar: string): string {
  return `sha256:${hexChar.repeat(64)}`;
}

export function repoName(repository: string): string {
  return `${PARENT}/repositories/${repository}`;
}

export function imageUri(repository: string, image: string, imageDigest: string): string {
  return `${HOST}/${PROJECT}/${repository}/${image}@${imageDigest}`;
}

export function dockerImage(
  uri: string,
  options: { tags?: string[]; updateTime?: string } = {}
): DockerImage {
  return {
    name: `image-${uri.length}`,
    uri,
    tags: options.tags,
    updateTime: options.updateTime,
  };
}

export function repository(id: string, format: string = 'DOCKER'): Repository {
  return { name: repoName(id), format };
}

export function createLogger(): Logger & {
  debug: ReturnType<typeof vi.fn>;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
} {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/**
 * Serves canned image listings per repository; an Error entry fails the
 * listing after the images before it were yielded.
 */
export class FakeDockerImageLister implements DockerImageLister {
  readonly calls: Array<{ repositoryName: string; orderBy?: string }> = [];
  private readonly listings: Map<string, Array<DockerImage | Error>>;

  constructor(listings: Record<string, Array<DockerImage | Error>>) {
    this.listings = new Map(Object.entries(listings));
  }

  async *listAll(
    repositoryName: string,
    options: { orderBy?: string; signal?: AbortSignal } = {}
  ): AsyncGenerator<DockerImage, void, undefined> {
    this.calls.push({ repositoryName, orderBy: options.orderBy });
    for (const entry of this.listings.get(repositoryName) ?? []) {
      if (entry instanceof Error) {
        throw entry;
      }
      yield entry;
    }
  }
}

export class FakeRepositoryLister implements RepositoryLister {
  readonly parents: string[] = [];
  private readonly entries: Array<Repository | Error>;

  constructor(entries: Array<Repository | Error>) {
    this.entries = entries;
  }

  async *listAll(parent: string): AsyncGenerator<Repository, void, undefined> {
    this.parents.push(parent);
    for (const entry of this.entries) {
      if (entry instanceof Error) {
        throw entry;
      }
      yield entry;
    }
  }
}

export function target(repositoryId: string, image: string, imageDigest: string): ScanTarget {
  const uri = imageUri(repositoryId, image, imageDigest);
  const parsed = parseArtifactUri(uri);
  if (!parsed.ok) {
    throw parsed.error;
  }
  return { artifact: parsed.value, uri, location: LOCATION, repository: repositoryId };
}

/**
 * Replays fixed resolver items.
 */
export class FakeTargetSource implements TargetSource {
  readonly resolveAllCalls: Array<{ projectId: string; location: string }> = [];
  readonly resolveReferencesCalls: Array<readonly string[]> = [];
  private readonly items: ResolvedItem[];

  constructor(items: ResolvedItem[]) {
    this.items = items;
  }

  async *resolveAll(projectId: string, location: string): AsyncGenerator<ResolvedItem, void, undefined> {
    this.resolveAllCalls.push({ projectId, location });
    yield* this.items;
  }

  async *resolveReferences(uris: readonly string[]): AsyncGenerator<ResolvedItem, void, undefined> {
    this.resolveReferencesCalls.push(uris);
    yield* this.items;
  }
}

export function vulnerability(overrides: Partial<Vulnerability> = {}): Vulnerability {
  return {
    id: 'CVE-2024-0001',
    severity: 'HIGH',
    cvssScore: 7.5,
    packageType: 'OS',
    packageName: 'openssl',
    installedVersion: '3.0.1',
    fixedVersion: '3.0.2',
    description: 'projects/goog-vulnz/notes/CVE-2024-0001',
    urls: ['https://example.com/CVE-2024-0001'],
    ...overrides,
  };
}

export function analyzeResult(
  scanTarget: ScanTarget,
  vulnerabilities: Vulnerability[] = [],
  scanTime: Date = new Date('2024-05-01T12:34:56.789Z')
): AnalyzeResult {
  return {
    artifact: scanTarget.artifact,
    scanTime,
    vulnerabilities,
    summary: {
      totalCount: vulnerabilities.length,
      countBySeverity: {},
      fixableCount: vulnerabilities.filter((v) => v.fixedVersion !== '').length,
    },
  };
}

/**
 * JSON response as the Google APIs return it.
 */
export function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/**
 * Collects everything written to it.
 */
export class MemorySink {
  readonly chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  get text(): string {
    return this.chunks.join('');
  }
}
