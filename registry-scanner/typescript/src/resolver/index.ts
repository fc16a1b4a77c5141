/**
 * Discovery pipeline exports.
 * @module resolver
 */

export {
  EMPTY_CANDIDATE,
  LATEST_TAG,
  selectBestVersion,
  type CandidateVersion,
  type SelectionContext,
} from './selection.js';
export { scanRepository, type ScanRepositoryOptions } from './repository-scanner.js';
export { ImageResolver, type ImageResolverOptions } from './image-resolver.js';
export type {
  DockerImageLister,
  RepositoryLister,
  ResolvedItem,
  ScanTarget,
  TargetSource,
} from './types.js';
