/**
 * Project ID resolution.
 * @module auth/project
 */

import { projectIdFromEnv, type ScannerConfig } from '../config.js';
import { GcpAuthProvider } from './provider.js';

/**
 * Anything able to detect the project from ambient credentials.
 */
export interface ProjectDetector {
  detectProjectId(): Promise<string>;
}

/**
 * Resolves the project to scan: the configured value, then the environment,
 * then whatever the credentials report.
 */
export async function resolveProjectId(
  config: Pick<ScannerConfig, 'projectId' | 'auth'>,
  options: { env?: NodeJS.ProcessEnv; detector?: ProjectDetector } = {}
): Promise<string> {
  if (config.projectId) {
    return config.projectId;
  }

  const fromEnv = projectIdFromEnv(options.env ?? process.env);
  if (fromEnv) {
    return fromEnv;
  }

  const detector = options.detector ?? new GcpAuthProvider(config.auth ?? { type: 'adc' });
  return detector.detectProjectId();
}
