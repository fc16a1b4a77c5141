/**
 * Types shared by the discovery pipeline.
 * @module resolver/types
 */

import type { ScannerError } from '../errors.js';
import type { PaginationOptions } from '../types/common.js';
import type { DockerImage } from '../types/docker-image.js';
import type { ArtifactReference } from '../types/reference.js';
import type { Repository } from '../types/repository.js';

/**
 * An image version selected for analysis.
 */
export interface ScanTarget {
  /** Reference with the digest populated */
  artifact: ArtifactReference;
  /** URI as returned by the registry listing */
  uri: string;
  /** Registry location (e.g., "us-central1") */
  location: string;
  /** Repository ID */
  repository: string;
}

/**
 * Element of the resolver sequence.
 */
export type ResolvedItem =
  | { kind: 'target'; target: ScanTarget }
  | { kind: 'error'; error: ScannerError };

/**
 * Lists the repositories under a location.
 */
export interface RepositoryLister {
  listAll(
    parent: string,
    options?: Omit<PaginationOptions, 'pageToken'>
  ): AsyncIterable<Repository>;
}

/**
 * Lists the Docker images of one repository.
 */
export interface DockerImageLister {
  listAll(
    repositoryName: string,
    options?: Omit<PaginationOptions, 'pageToken'> & { orderBy?: string }
  ): AsyncIterable<DockerImage>;
}

/**
 * Produces the targets a scan analyzes.
 */
export interface TargetSource {
  resolveAll(projectId: string, location: string, signal?: AbortSignal): AsyncIterable<ResolvedItem>;
  resolveReferences(uris: readonly string[], signal?: AbortSignal): AsyncIterable<ResolvedItem>;
}
