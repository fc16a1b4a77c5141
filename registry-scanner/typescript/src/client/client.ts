/**
 * Authenticated client for the Artifact Registry and Container Analysis APIs.
 * @module client/client
 */

import type { ScannerConfig } from '../config.js';
import { validateConfig } from '../config.js';
import { GcpAuthProvider, type TokenProvider } from '../auth/provider.js';
import { RepositoryService } from '../services/repository.js';
import { DockerImageService } from '../services/docker-image.js';
import { VulnerabilityService } from '../services/vulnerability.js';
import { buildUrl, httpGet, type HttpResponse, type RequestOptions } from './http.js';

/**
 * Main client for the registry scanner's API calls.
 *
 * @example
 * ```typescript
 * import { RegistryClient, ScannerConfigBuilder } from 'registry-scanner';
 *
 * const config = new ScannerConfigBuilder('us-central1')
 *   .projectId('my-project')
 *   .build();
 *
 * const client = new RegistryClient(config);
 *
 * for await (const repo of client.repositories().listAll('projects/my-project/locations/us-central1')) {
 *   console.log(repo.name);
 * }
 * ```
 */
export class RegistryClient {
  private readonly config: ScannerConfig;
  private readonly tokenProvider: TokenProvider;

  // Lazy-initialized services
  private repositoryService?: RepositoryService;
  private dockerImageService?: DockerImageService;
  private vulnerabilityService?: VulnerabilityService;

  constructor(config: ScannerConfig, tokenProvider?: TokenProvider) {
    validateConfig(config);
    this.config = { ...config };
    this.tokenProvider =
      tokenProvider ?? new GcpAuthProvider(config.auth ?? { type: 'adc' }, config.projectId);
  }

  /**
   * Gets the repository service.
   */
  repositories(): RepositoryService {
    if (!this.repositoryService) {
      this.repositoryService = new RepositoryService(this);
    }
    return this.repositoryService;
  }

  /**
   * Gets the Docker image listing service.
   */
  dockerImages(): DockerImageService {
    if (!this.dockerImageService) {
      this.dockerImageService = new DockerImageService(this);
    }
    return this.dockerImageService;
  }

  /**
   * Gets the vulnerability service for Container Analysis operations.
   */
  vulnerabilities(): VulnerabilityService {
    if (!this.vulnerabilityService) {
      this.vulnerabilityService = new VulnerabilityService(this);
    }
    return this.vulnerabilityService;
  }

  /**
   * Makes an authenticated GET request to the Artifact Registry API.
   */
  async get(path: string, options?: RequestOptions): Promise<HttpResponse> {
    return this.request(this.config.apiEndpoint, path, options);
  }

  /**
   * Makes an authenticated GET request to the Container Analysis API.
   */
  async getContainerAnalysis(path: string, options?: RequestOptions): Promise<HttpResponse> {
    return this.request(this.config.containerAnalysisEndpoint, path, options);
  }

  /**
   * Core request method with authentication.
   */
  private async request(
    endpoint: string,
    path: string,
    options?: RequestOptions
  ): Promise<HttpResponse> {
    const token = await this.tokenProvider.getToken();
    const url = buildUrl(endpoint, `/v1${path}`, options?.query);

    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
      'User-Agent': this.config.userAgent,
      ...(this.config.projectId ? { 'x-goog-user-project': this.config.projectId } : {}),
      ...options?.headers,
    };

    return httpGet(url, {
      headers,
      timeout: options?.timeout ?? this.config.timeout,
      signal: options?.signal,
    });
  }
}

/**
 * Creates a new registry client.
 */
export function createClient(config: ScannerConfig, tokenProvider?: TokenProvider): RegistryClient {
  return new RegistryClient(config, tokenProvider);
}
