/**
 * Repository types for Google Artifact Registry.
 * @module types/repository
 */

import { z } from 'zod';
import type { Timestamp } from './common.js';

/**
 * Repository resource from Artifact Registry API.
 */
export interface Repository {
  /** Full resource name: projects/{project}/locations/{location}/repositories/{repository} */
  name: string;
  /** Repository format (DOCKER, MAVEN, NPM, etc.) */
  format: string;
  /** User-provided description */
  description?: string;
  /** Labels/tags */
  labels?: Record<string, string>;
  /** Creation timestamp */
  createTime?: Timestamp;
  /** Last update timestamp */
  updateTime?: Timestamp;
  /** Repository mode (STANDARD_REPOSITORY, VIRTUAL_REPOSITORY, REMOTE_REPOSITORY) */
  mode?: string;
}

/**
 * List repositories response.
 */
export interface ListRepositoriesResponse {
  /** Repositories in the response */
  repositories?: Repository[];
  /** Token for the next page */
  nextPageToken?: string;
}

/**
 * Zod schema for Repository validation.
 */
export const RepositorySchema = z.object({
  name: z.string(),
  format: z.string(),
  description: z.string().optional(),
  labels: z.record(z.string()).optional(),
  createTime: z.string().optional(),
  updateTime: z.string().optional(),
  mode: z.string().optional(),
});

/**
 * Zod schema for a page of repositories.
 */
export const ListRepositoriesResponseSchema = z.object({
  repositories: z.array(RepositorySchema).optional(),
  nextPageToken: z.string().optional(),
});

/**
 * Location and repository ID decoded from a repository resource name.
 */
export interface RepositoryLocation {
  location: string;
  repository: string;
}

/**
 * Decodes `projects/{p}/locations/{l}/repositories/{r}` by position.
 * Names with fewer than six segments yield empty strings.
 */
export function extractLocationAndRepository(name: string): RepositoryLocation {
  const parts = name.split('/');
  if (parts.length < 6) {
    return { location: '', repository: '' };
  }
  return { location: parts[3] ?? '', repository: parts[5] ?? '' };
}

/**
 * Builds the parent resource name repositories are listed under.
 */
export function buildLocationName(project: string, location: string): string {
  return `projects/${project}/locations/${location}`;
}

/**
 * Builds a repository resource name.
 */
export function buildRepositoryName(
  project: string,
  location: string,
  repository: string
): string {
  return `${buildLocationName(project, location)}/repositories/${repository}`;
}
