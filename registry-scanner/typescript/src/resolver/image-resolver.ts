/**
 * Registry-wide discovery of scan targets.
 * @module resolver/image-resolver
 */

import { DEFAULT_MAX_CANDIDATES } from '../config.js';
import { ScannerError, isCancelledError, isScannerError } from '../errors.js';
import { getLogger, type Logger } from '../observability/index.js';
import type { RepositoryFormat } from '../types/common.js';
import { ORDER_BY_UPDATE_TIME_DESC } from '../types/docker-image.js';
import {
  formatArtifactReference,
  isDigestLike,
  locationFromHost,
  parseArtifactUri,
  withDigest,
} from '../types/reference.js';
import { buildLocationName, buildRepositoryName } from '../types/repository.js';
import { scanRepository } from './repository-scanner.js';
import type {
  DockerImageLister,
  RepositoryLister,
  ResolvedItem,
  ScanTarget,
  TargetSource,
} from './types.js';

const DOCKER_FORMAT: RepositoryFormat = 'DOCKER';

/**
 * Collaborators and limits for {@link ImageResolver}.
 */
export interface ImageResolverOptions {
  repositories: RepositoryLister;
  dockerImages: DockerImageLister;
  maxCandidatesPerImage?: number;
  logger?: Logger;
}

/**
 * Turns a project/location (or a list of references) into scan targets.
 */
export class ImageResolver implements TargetSource {
  private readonly repositories: RepositoryLister;
  private readonly dockerImages: DockerImageLister;
  private readonly maxCandidatesPerImage: number;
  private readonly logger: Logger;

  constructor(options: ImageResolverOptions) {
    this.repositories = options.repositories;
    this.dockerImages = options.dockerImages;
    this.maxCandidatesPerImage = options.maxCandidatesPerImage ?? DEFAULT_MAX_CANDIDATES;
    this.logger = options.logger ?? getLogger();
  }

  /**
   * Yields one target per image of every Docker repository in the location.
   *
   * A failure listing the repositories is yielded once and ends the sequence.
   * A failure inside one repository is yielded and the next repository is
   * scanned. Work stops as soon as the consumer stops iterating.
   */
  async *resolveAll(
    projectId: string,
    location: string,
    signal?: AbortSignal
  ): AsyncGenerator<ResolvedItem, void, undefined> {
    const parent = buildLocationName(projectId, location);

    try {
      for await (const repo of this.repositories.listAll(parent, { signal })) {
        if (repo.format !== DOCKER_FORMAT) {
          continue;
        }

        let targets: ScanTarget[];
        try {
          targets = await scanRepository(this.dockerImages, repo.name, {
            maxCandidatesPerImage: this.maxCandidatesPerImage,
            signal,
            logger: this.logger,
          });
        } catch (error) {
          const scanError = isScannerError(error)
            ? error
            : ScannerError.listingFailed(`images in ${repo.name}`, error);
          yield { kind: 'error', error: scanError };
          if (isCancelledError(scanError)) {
            return;
          }
          continue;
        }

        for (const target of targets) {
          yield { kind: 'target', target };
        }
      }
    } catch (error) {
      yield {
        kind: 'error',
        error:
          isScannerError(error) && isCancelledError(error)
            ? error
            : ScannerError.listingFailed(`repositories in ${parent}`, error),
      };
    }
  }

  /**
   * Yields one target per explicit image reference, in input order.
   */
  async *resolveReferences(
    uris: readonly string[],
    signal?: AbortSignal
  ): AsyncGenerator<ResolvedItem, void, undefined> {
    for (const uri of uris) {
      let item: ResolvedItem;
      try {
        item = { kind: 'target', target: await this.resolveReference(uri, signal) };
      } catch (error) {
        item = {
          kind: 'error',
          error: isScannerError(error) ? error : ScannerError.listingFailed(uri, error),
        };
      }

      yield item;
      if (item.kind === 'error' && isCancelledError(item.error)) {
        return;
      }
    }
  }

  /**
   * Resolves one reference to a digest.
   *
   * Digest-qualified references need no API call. A tag is looked up in the
   * repository listing; a bare image name goes through version selection.
   */
  async resolveReference(uri: string, signal?: AbortSignal): Promise<ScanTarget> {
    if (signal?.aborted) {
      throw ScannerError.cancelled('Reference resolution cancelled');
    }

    const parsed = parseArtifactUri(uri);
    if (!parsed.ok) {
      throw parsed.error;
    }

    const ref = parsed.value;
    const location = locationFromHost(ref.host);
    const repository = ref.repositoryId;

    if (ref.digest !== undefined) {
      return { artifact: ref, uri, location, repository };
    }

    if (ref.tag !== undefined && isDigestLike(ref.tag)) {
      const digest = ref.tag;
      const { tag: _tag, ...untagged } = ref;
      return { artifact: withDigest(untagged, digest), uri, location, repository };
    }

    const repositoryName = buildRepositoryName(ref.projectId, location, repository);

    if (ref.tag === undefined) {
      const targets = await scanRepository(this.dockerImages, repositoryName, {
        maxCandidatesPerImage: this.maxCandidatesPerImage,
        signal,
        logger: this.logger,
      });
      const match = targets.find((t) => t.artifact.imageName === ref.imageName);
      if (!match) {
        throw ScannerError.notFound(`image ${formatArtifactReference(ref)}`);
      }
      return match;
    }

    const tag = ref.tag;
    try {
      for await (const image of this.dockerImages.listAll(repositoryName, {
        orderBy: ORDER_BY_UPDATE_TIME_DESC,
        signal,
      })) {
        const listed = parseArtifactUri(image.uri);
        if (!listed.ok || listed.value.imageName !== ref.imageName) {
          continue;
        }
        if (listed.value.digest !== undefined && (image.tags ?? []).includes(tag)) {
          return {
            artifact: withDigest(ref, listed.value.digest),
            uri: image.uri,
            location,
            repository,
          };
        }
      }
    } catch (error) {
      if (isCancelledError(error)) {
        throw error;
      }
      throw ScannerError.listingFailed(`images in ${repositoryName}`, error);
    }

    throw ScannerError.notFound(`tag ${formatArtifactReference(ref)}`);
  }
}
