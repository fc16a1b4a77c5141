/**
 * Repository service for Artifact Registry operations.
 * @module services/repository
 */

import type { RegistryClient } from '../client/client.js';
import { ScannerError } from '../errors.js';
import type { Repository } from '../types/repository.js';
import { ListRepositoriesResponseSchema } from '../types/repository.js';
import type { PaginationOptions, PaginatedResponse } from '../types/common.js';

/**
 * Service for repository operations.
 */
export class RepositoryService {
  private readonly client: RegistryClient;

  constructor(client: RegistryClient) {
    this.client = client;
  }

  /**
   * Lists one page of repositories.
   *
   * @param parent - Location resource name, `projects/{project}/locations/{location}`
   * @param options - Pagination options
   */
  async list(
    parent: string,
    options?: PaginationOptions
  ): Promise<PaginatedResponse<Repository>> {
    const response = await this.client.get(`/${parent}/repositories`, {
      query: {
        pageSize: options?.pageSize,
        pageToken: options?.pageToken,
      },
      signal: options?.signal,
    });

    const parsed = ListRepositoriesResponseSchema.safeParse(response.data ?? {});
    if (!parsed.success) {
      throw ScannerError.invalidResponse(`${parent}/repositories`, parsed.error.message);
    }

    return {
      items: parsed.data.repositories ?? [],
      nextPageToken: parsed.data.nextPageToken || undefined,
    };
  }

  /**
   * Iterates over every repository under a location, fetching pages on demand.
   * Pages after the consumer stops are never requested.
   */
  async *listAll(
    parent: string,
    options: Omit<PaginationOptions, 'pageToken'> = {}
  ): AsyncGenerator<Repository, void, undefined> {
    let pageToken: string | undefined;

    do {
      const page = await this.list(parent, { ...options, pageToken });
      yield* page.items;
      pageToken = page.nextPageToken;
    } while (pageToken);
  }
}
