/**
 * Type exports for the registry scanner.
 * @module types
 */

// Common types
export type {
  Result,
  RepositoryFormat,
  PaginationOptions,
  PaginatedResponse,
  Timestamp,
} from './common.js';

export {
  CLOUD_PLATFORM_SCOPES,
  DEFAULT_API_ENDPOINT,
  CONTAINER_ANALYSIS_ENDPOINT,
  DOCKER_HOST_SUFFIX,
} from './common.js';

// References
export type { ArtifactReference, ParseOptions } from './reference.js';

export {
  parseArtifactUri,
  parseDigestFromUri,
  formatArtifactReference,
  isDigestLike,
  toResourceUrl,
  locationFromHost,
  withDigest,
} from './reference.js';

// Repository types
export type {
  Repository,
  RepositoryLocation,
  ListRepositoriesResponse,
} from './repository.js';

export {
  RepositorySchema,
  ListRepositoriesResponseSchema,
  extractLocationAndRepository,
  buildLocationName,
  buildRepositoryName,
} from './repository.js';

// Docker image types
export type { DockerImage, ListDockerImagesResponse } from './docker-image.js';

export {
  DockerImageSchema,
  ListDockerImagesResponseSchema,
  ORDER_BY_UPDATE_TIME_DESC,
} from './docker-image.js';

// Vulnerability types
export type {
  Severity,
  Vulnerability,
  VulnerabilitySummary,
  AnalyzeRequest,
  AnalyzeResult,
  Analyzer,
  Occurrence,
} from './vulnerability.js';

export {
  SeverityOrder,
  OccurrenceSchema,
  ListOccurrencesResponseSchema,
  normalizeSeverity,
  parseSeverity,
  filterBySeverity,
  filterFixable,
  buildSummary,
  sortBySeverity,
} from './vulnerability.js';
