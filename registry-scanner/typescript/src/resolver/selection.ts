/**
 * Selection of the authoritative version of an image.
 * @module resolver/selection
 */

import type { Logger } from '../observability/index.js';
import { getLogger } from '../observability/index.js';

/**
 * One listed version of an image.
 */
export interface CandidateVersion {
  /** Content digest */
  digest: string;
  /** Tags pointing at the digest */
  tags: readonly string[];
  /** Last update time reported by the registry */
  updateTime: Date;
  /** URI as returned by the listing */
  uri: string;
}

/**
 * Returned when there is nothing to choose from.
 */
export const EMPTY_CANDIDATE: Readonly<CandidateVersion> = Object.freeze({
  digest: '',
  tags: Object.freeze([]),
  updateTime: new Date(0),
  uri: '',
});

export const LATEST_TAG = 'latest';

/**
 * Where a selection happens; used only for the debug log line.
 */
export interface SelectionContext {
  imageName: string;
  location: string;
  repository: string;
}

/**
 * Picks the version to scan: the first candidate tagged `latest`, otherwise
 * the one with the greatest update time (the earliest one on ties).
 */
export function selectBestVersion(
  candidates: readonly CandidateVersion[],
  context?: SelectionContext,
  logger: Logger = getLogger()
): Readonly<CandidateVersion> {
  const [first] = candidates;
  if (first === undefined) {
    return EMPTY_CANDIDATE;
  }

  let newest = first;
  for (const candidate of candidates) {
    if (candidate.tags.includes(LATEST_TAG)) {
      logSelection(logger, candidate, 'latest_tag', context);
      return candidate;
    }
    if (candidate.updateTime.getTime() > newest.updateTime.getTime()) {
      newest = candidate;
    }
  }

  logSelection(logger, newest, 'newest_timestamp', context);
  return newest;
}

function logSelection(
  logger: Logger,
  candidate: CandidateVersion,
  reason: 'latest_tag' | 'newest_timestamp',
  context?: SelectionContext
): void {
  logger.debug('Selected image digest', {
    ...context,
    digest: candidate.digest,
    tags: candidate.tags,
    update_time: candidate.updateTime.toISOString(),
    selection_reason: reason,
  });
}
