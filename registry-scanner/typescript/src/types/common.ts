/**
 * Common types for the registry scanner.
 * @module types/common
 */

/**
 * Outcome of an operation that reports failure as a value.
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Repository format types supported by Artifact Registry.
 */
export type RepositoryFormat =
  | 'DOCKER'
  | 'MAVEN'
  | 'NPM'
  | 'PYTHON'
  | 'APT'
  | 'YUM'
  | 'GO'
  | 'KFP';

/**
 * Pagination options for list operations.
 */
export interface PaginationOptions {
  /** Maximum number of items to return */
  pageSize?: number;
  /** Token for the next page */
  pageToken?: string;
  /** Abort signal for the underlying request */
  signal?: AbortSignal;
}

/**
 * Paginated response wrapper.
 */
export interface PaginatedResponse<T> {
  /** Items in the current page */
  items: T[];
  /** Token for the next page (undefined if no more pages) */
  nextPageToken?: string;
}

/**
 * Timestamp string in RFC3339 format.
 */
export type Timestamp = string;

/**
 * OAuth2 scopes required for Artifact Registry and Container Analysis.
 */
export const CLOUD_PLATFORM_SCOPES = [
  'https://www.googleapis.com/auth/cloud-platform',
];

/**
 * Default API endpoint for Artifact Registry.
 */
export const DEFAULT_API_ENDPOINT = 'https://artifactregistry.googleapis.com';

/**
 * Container Analysis API endpoint.
 */
export const CONTAINER_ANALYSIS_ENDPOINT = 'https://containeranalysis.googleapis.com';

/**
 * Host suffix of Artifact Registry Docker endpoints.
 */
export const DOCKER_HOST_SUFFIX = '-docker.pkg.dev';
