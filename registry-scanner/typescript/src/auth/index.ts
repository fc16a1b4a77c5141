/**
 * Authentication module for the registry scanner.
 * @module auth
 */

export { SecretString } from './secret.js';
export {
  GcpAuthProvider,
  type TokenProvider,
  type TokenResponse,
  type CachedToken,
} from './provider.js';
export { resolveProjectId, type ProjectDetector } from './project.js';
