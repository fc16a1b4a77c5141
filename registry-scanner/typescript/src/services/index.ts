/**
 * Service exports for the registry scanner.
 * @module services
 */

export { RepositoryService } from './repository.js';
export { DockerImageService, type ListDockerImagesOptions } from './docker-image.js';
export { VulnerabilityService, toVulnerability } from './vulnerability.js';
