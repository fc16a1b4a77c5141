/**
 * Docker image listing for Artifact Registry repositories.
 * @module services/docker-image
 */

import type { RegistryClient } from '../client/client.js';
import { ScannerError } from '../errors.js';
import type { DockerImage } from '../types/docker-image.js';
import { ListDockerImagesResponseSchema } from '../types/docker-image.js';
import type { PaginationOptions, PaginatedResponse } from '../types/common.js';

/**
 * Options for listing Docker images.
 */
export interface ListDockerImagesOptions extends PaginationOptions {
  /** Sort order, e.g. "update_time desc" */
  orderBy?: string;
}

/**
 * Service for Docker image listing.
 */
export class DockerImageService {
  private readonly client: RegistryClient;

  constructor(client: RegistryClient) {
    this.client = client;
  }

  /**
   * Lists one page of Docker images in a repository.
   *
   * @param repositoryName - `projects/{project}/locations/{location}/repositories/{repository}`
   */
  async list(
    repositoryName: string,
    options?: ListDockerImagesOptions
  ): Promise<PaginatedResponse<DockerImage>> {
    const response = await this.client.get(`/${repositoryName}/dockerImages`, {
      query: {
        pageSize: options?.pageSize,
        pageToken: options?.pageToken,
        orderBy: options?.orderBy,
      },
      signal: options?.signal,
    });

    const parsed = ListDockerImagesResponseSchema.safeParse(response.data ?? {});
    if (!parsed.success) {
      throw ScannerError.invalidResponse(`${repositoryName}/dockerImages`, parsed.error.message);
    }

    return {
      items: parsed.data.dockerImages ?? [],
      nextPageToken: parsed.data.nextPageToken || undefined,
    };
  }

  /**
   * Iterates over every Docker image in a repository, one page at a time.
   */
  async *listAll(
    repositoryName: string,
    options: Omit<ListDockerImagesOptions, 'pageToken'> = {}
  ): AsyncGenerator<DockerImage, void, undefined> {
    let pageToken: string | undefined;

    do {
      const page = await this.list(repositoryName, { ...options, pageToken });
      yield* page.items;
      pageToken = page.nextPageToken;
    } while (pageToken);
  }
}
