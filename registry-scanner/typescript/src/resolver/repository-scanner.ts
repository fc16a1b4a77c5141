/**
 * Per-repository discovery: list, group by image, select.
 * @module resolver/repository-scanner
 */

import { DEFAULT_MAX_CANDIDATES } from '../config.js';
import { Semaphore } from '../concurrency/semaphore.js';
import { ScannerError, isCancelledError } from '../errors.js';
import { getLogger, type Logger } from '../observability/index.js';
import { ORDER_BY_UPDATE_TIME_DESC } from '../types/docker-image.js';
import { parseArtifactUri, type ArtifactReference } from '../types/reference.js';
import { extractLocationAndRepository } from '../types/repository.js';
import { selectBestVersion, type CandidateVersion } from './selection.js';
import type { DockerImageLister, ScanTarget } from './types.js';

/**
 * Options for {@link scanRepository}.
 */
export interface ScanRepositoryOptions {
  /** Versions kept per image name; later (older) entries are dropped */
  maxCandidatesPerImage?: number;
  signal?: AbortSignal;
  logger?: Logger;
}

interface ImageGroup {
  slots: Semaphore;
  candidates: CandidateVersion[];
  artifacts: Map<CandidateVersion, ArtifactReference>;
}

/**
 * Scans one repository and returns one target per image name.
 *
 * Entries are requested most recently updated first, so the per-image cap
 * keeps the newest versions. Fails with `ListingFailed` when the listing
 * fails or returns a URI that does not parse.
 */
export async function scanRepository(
  lister: DockerImageLister,
  repositoryName: string,
  options: ScanRepositoryOptions = {}
): Promise<ScanTarget[]> {
  const { location, repository } = extractLocationAndRepository(repositoryName);
  const maxCandidates = options.maxCandidatesPerImage ?? DEFAULT_MAX_CANDIDATES;
  const logger = options.logger ?? getLogger();
  const groups = new Map<string, ImageGroup>();

  try {
    for await (const image of lister.listAll(repositoryName, {
      orderBy: ORDER_BY_UPDATE_TIME_DESC,
      signal: options.signal,
    })) {
      const parsed = parseArtifactUri(image.uri);
      if (!parsed.ok) {
        throw parsed.error;
      }

      const artifact = parsed.value;
      if (artifact.digest === undefined) {
        logger.warn('Skipping image without digest', { uri: image.uri });
        continue;
      }

      let group = groups.get(artifact.imageName);
      if (!group) {
        group = { slots: new Semaphore(maxCandidates), candidates: [], artifacts: new Map() };
        groups.set(artifact.imageName, group);
      }
      if (!group.slots.tryAcquire()) {
        continue;
      }

      const candidate: CandidateVersion = {
        digest: artifact.digest,
        tags: image.tags ?? [],
        updateTime: parseTimestamp(image.updateTime),
        uri: image.uri,
      };
      group.candidates.push(candidate);
      group.artifacts.set(candidate, artifact);
    }
  } catch (error) {
    if (isCancelledError(error)) {
      throw error;
    }
    throw ScannerError.listingFailed(`images in ${repositoryName}`, error);
  }

  const targets: ScanTarget[] = [];
  for (const [imageName, group] of groups) {
    const best = selectBestVersion(group.candidates, { imageName, location, repository }, logger);
    const artifact = group.artifacts.get(best);
    if (best.digest === '' || artifact === undefined) {
      continue;
    }

    logger.debug('Resolved image target', {
      location,
      repository,
      image_name: imageName,
      digest: best.digest,
      uri: best.uri,
    });
    targets.push({ artifact, uri: best.uri, location, repository });
  }

  return targets;
}

function parseTimestamp(value: string | undefined): Date {
  const date = value ? new Date(value) : new Date(0);
  return isNaN(date.getTime()) ? new Date(0) : date;
}
