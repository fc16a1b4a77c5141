/**
 * Docker image types for Google Artifact Registry.
 * @module types/docker-image
 */

import { z } from 'zod';
import type { Timestamp } from './common.js';

/**
 * DockerImage resource from the Artifact Registry API.
 */
export interface DockerImage {
  /** Full resource name */
  name: string;
  /** Image URI, e.g. "us-central1-docker.pkg.dev/p/r/img@sha256:..." */
  uri: string;
  /** Tags pointing at this digest */
  tags?: string[];
  /** Compressed size in bytes */
  imageSizeBytes?: string;
  /** Upload timestamp */
  uploadTime?: Timestamp;
  /** Manifest media type */
  mediaType?: string;
  /** Build timestamp */
  buildTime?: Timestamp;
  /** Last update timestamp */
  updateTime?: Timestamp;
}

/**
 * List Docker images response.
 */
export interface ListDockerImagesResponse {
  dockerImages?: DockerImage[];
  nextPageToken?: string;
}

/**
 * Ordering accepted by the Docker image listing.
 */
export const ORDER_BY_UPDATE_TIME_DESC = 'update_time desc';

/**
 * Zod schema for DockerImage validation.
 */
export const DockerImageSchema = z.object({
  name: z.string(),
  uri: z.string(),
  tags: z.array(z.string()).optional(),
  imageSizeBytes: z.string().optional(),
  uploadTime: z.string().optional(),
  mediaType: z.string().optional(),
  buildTime: z.string().optional(),
  updateTime: z.string().optional(),
});

/**
 * Zod schema for a page of Docker images.
 */
export const ListDockerImagesResponseSchema = z.object({
  dockerImages: z.array(DockerImageSchema).optional(),
  nextPageToken: z.string().optional(),
});
