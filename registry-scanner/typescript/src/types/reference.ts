/**
 * Artifact references: parsing, rendering and resource URLs.
 * @module types/reference
 */

import { ScannerError } from '../errors.js';
import { DOCKER_HOST_SUFFIX, type Result } from './common.js';

/**
 * Parsed components of an Artifact Registry image URI.
 */
export interface ArtifactReference {
  /** Registry host, e.g. "us-central1-docker.pkg.dev" */
  readonly host: string;
  /** GCP project ID */
  readonly projectId: string;
  /** Repository ID */
  readonly repositoryId: string;
  /** Image path, possibly nested ("team/service/worker") */
  readonly imageName: string;
  /** Tag, absent when the URI has none */
  readonly tag?: string;
  /** Content digest ("sha256:<64 hex>"), absent when the URI has none */
  readonly digest?: string;
}

/**
 * Options for {@link parseArtifactUri}.
 */
export interface ParseOptions {
  /** Fail when the URI carries no "@sha256:" digest */
  requireDigest?: boolean;
}

const DIGEST_PREFIX = 'sha256:';

const ARTIFACT_URI_PATTERN =
  /^([a-z0-9-]+-docker\.pkg\.dev)\/([^/]+)\/([^/]+)\/([^:@]+)(?::([^@]+))?(?:@(sha256:[a-fA-F0-9]{64}))?$/;

/**
 * Parses a raw Artifact Registry URI.
 *
 * Accepts `host/project/repository/image[:tag][@sha256:<64 hex>]`. Malformed
 * input is reported as a `MalformedReference` error value, never thrown.
 */
export function parseArtifactUri(
  uri: string,
  options: ParseOptions = {}
): Result<ArtifactReference, ScannerError> {
  const match = ARTIFACT_URI_PATTERN.exec(uri);
  if (!match) {
    return { ok: false, error: ScannerError.malformedReference(uri, 'unrecognized format') };
  }

  const [, host = '', projectId = '', repositoryId = '', imageName = '', tag, digest] = match;

  if (options.requireDigest && !digest) {
    return {
      ok: false,
      error: ScannerError.malformedReference(uri, "missing '@' digest separator"),
    };
  }

  const reference: {
    host: string;
    projectId: string;
    repositoryId: string;
    imageName: string;
    tag?: string;
    digest?: string;
  } = { host, projectId, repositoryId, imageName };
  if (tag) {
    reference.tag = tag;
  }
  if (digest) {
    reference.digest = digest;
  }

  return { ok: true, value: Object.freeze(reference) };
}

/**
 * Extracts the digest from a digest-qualified URI.
 */
export function parseDigestFromUri(uri: string): Result<string, ScannerError> {
  const parsed = parseArtifactUri(uri, { requireDigest: true });
  if (!parsed.ok) {
    return parsed;
  }
  return { ok: true, value: parsed.value.digest ?? '' };
}

/**
 * Renders a reference in its canonical string form.
 */
export function formatArtifactReference(ref: ArtifactReference): string {
  let result = `${ref.host}/${ref.projectId}/${ref.repositoryId}/${ref.imageName}`;
  if (ref.tag !== undefined) {
    result += `:${ref.tag}`;
  }
  if (ref.digest !== undefined) {
    result += `@${ref.digest}`;
  }
  return result;
}

/**
 * Returns true when a tag string is actually a digest.
 */
export function isDigestLike(tag: string): boolean {
  return tag.startsWith(DIGEST_PREFIX);
}

/**
 * Builds the resource URL Container Analysis indexes occurrences by.
 */
export function toResourceUrl(ref: ArtifactReference, location: string): string {
  return `https://${location}${DOCKER_HOST_SUFFIX}/${ref.projectId}/${ref.repositoryId}/${ref.imageName}@${ref.digest ?? ''}`;
}

/**
 * Derives the registry location from a Docker host name.
 */
export function locationFromHost(host: string): string {
  return host.endsWith(DOCKER_HOST_SUFFIX)
    ? host.slice(0, host.length - DOCKER_HOST_SUFFIX.length)
    : '';
}

/**
 * Returns a copy of the reference pinned to a digest.
 */
export function withDigest(ref: ArtifactReference, digest: string): ArtifactReference {
  return Object.freeze({ ...ref, digest });
}
