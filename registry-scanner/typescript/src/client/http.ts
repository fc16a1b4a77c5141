/**
 * HTTP client utilities for the Google Cloud REST APIs.
 * @module client/http
 */

import { z } from 'zod';
import { ScannerError, ScannerErrorKind } from '../errors.js';

/**
 * Query parameter values; undefined entries are omitted.
 */
export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * HTTP request options.
 */
export interface RequestOptions {
  /** Request headers */
  headers?: Record<string, string>;
  /** Query parameters */
  query?: QueryParams;
  /** Request timeout in milliseconds */
  timeout?: number;
  /** Caller cancellation */
  signal?: AbortSignal;
}

/**
 * HTTP response structure. The body is validated by the caller.
 */
export interface HttpResponse {
  /** Response status code */
  status: number;
  /** Response headers */
  headers: Headers;
  /** Parsed response body */
  data: unknown;
}

const DEFAULT_REQUEST_TIMEOUT = 30000;

/**
 * Error envelope returned by Google APIs.
 */
const GcpErrorBodySchema = z.object({
  error: z
    .object({
      code: z.number().optional(),
      message: z.string().optional(),
      status: z.string().optional(),
    })
    .optional(),
  message: z.string().optional(),
});

/**
 * Builds a URL with query parameters.
 */
export function buildUrl(baseUrl: string, path: string, query?: QueryParams): string {
  const normalizedPath = path.startsWith('/') ? path : `/${path}`;
  const url = new URL(normalizedPath, baseUrl);

  if (query) {
    Object.entries(query).forEach(([key, value]) => {
      if (value !== undefined) {
        url.searchParams.append(key, String(value));
      }
    });
  }

  return url.toString();
}

/**
 * Performs a GET request and parses the JSON body.
 *
 * Non-2xx responses become a ScannerError mapped from the status, an elapsed
 * timeout becomes `Timeout`, an abort of the caller's signal becomes
 * `Cancelled`, and any other transport failure becomes `ConnectionFailed`.
 */
export async function httpGet(
  url: string,
  options: Omit<RequestOptions, 'query'> = {}
): Promise<HttpResponse> {
  const { headers = {}, timeout = DEFAULT_REQUEST_TIMEOUT, signal } = options;

  if (signal?.aborted) {
    throw ScannerError.cancelled('Request cancelled');
  }

  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeout);
  const onAbort = (): void => controller.abort();
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    const response = await fetch(url, {
      method: 'GET',
      headers: { Accept: 'application/json', ...headers },
      signal: controller.signal,
    });

    if (!response.ok) {
      throw await parseErrorResponse(response);
    }

    const data = await parseResponseBody(response);

    return {
      status: response.status,
      headers: response.headers,
      data,
    };
  } catch (error) {
    if (error instanceof ScannerError) {
      throw error;
    }

    if (isAbortError(error)) {
      throw timedOut
        ? ScannerError.timeout(`Request timeout after ${timeout}ms`)
        : ScannerError.cancelled('Request cancelled');
    }

    const cause = error instanceof Error ? error : undefined;
    throw new ScannerError(
      ScannerErrorKind.ConnectionFailed,
      `Request failed: ${cause?.message ?? String(error)}`,
      { cause }
    );
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener('abort', onAbort);
  }
}

function isAbortError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    error.name === 'AbortError'
  );
}

/**
 * Parses the response body based on content type.
 */
async function parseResponseBody(response: Response): Promise<unknown> {
  if (response.status === 204 || response.headers.get('Content-Length') === '0') {
    return undefined;
  }

  const contentType = response.headers.get('Content-Type') ?? '';
  if (contentType.includes('application/json')) {
    const json: unknown = await response.json();
    return json;
  }

  return response.text();
}

/**
 * Parses an error response.
 */
async function parseErrorResponse(response: Response): Promise<ScannerError> {
  const status = response.status;
  const requestId = response.headers.get('x-goog-request-id') ?? undefined;

  let message = `HTTP ${status}`;
  const text = await response.text();

  if (text) {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      json = undefined;
    }
    const parsed = GcpErrorBodySchema.safeParse(json);
    if (parsed.success) {
      message = parsed.data.error?.message ?? parsed.data.message ?? message;
    } else {
      message = `${message}: ${text.slice(0, 200)}`;
    }
  }

  return ScannerError.fromHttpStatus(status, message, { requestId });
}
