/**
 * Client module for the registry scanner.
 * @module client
 */

export { RegistryClient, createClient } from './client.js';
export { buildUrl, httpGet } from './http.js';
export type { HttpResponse, QueryParams, RequestOptions } from './http.js';
