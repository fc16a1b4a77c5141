import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { buildUrl, httpGet } from '../client/http.js';
import { ScannerErrorKind } from '../errors.js';
import { jsonResponse } from './fixtures.js';

const fetchMock = vi.fn<[string | URL | Request, RequestInit | undefined], Promise<Response>>();

function abortError(): Error {
  const error = new Error('This operation was aborted');
  error.name = 'AbortError';
  return error;
}

// Settles only when the request signal aborts
function hangUntilAborted(_input: string | URL | Request, init?: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => reject(abortError()));
  });
}

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal('fetch', fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('buildUrl', () => {
  it('appends defined query parameters only', () => {
    expect(
      buildUrl('https://example.com', 'v1/items', { pageSize: 10, pageToken: undefined, filter: 'a b' })
    ).toBe('https://example.com/v1/items?pageSize=10&filter=a+b');
  });
});

describe('httpGet', () => {
  it('returns parsed JSON', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ value: 1 }));

    const response = await httpGet('https://example.com/v1/items');

    expect(response.status).toBe(200);
    expect(response.data).toEqual({ value: 1 });
  });

  it('sends a bodiless GET that accepts JSON', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({}));

    await httpGet('https://example.com/v1/items', { headers: { Authorization: 'Bearer test-token' } });

    const init = fetchMock.mock.calls[0]?.[1];
    expect(init?.method).toBe('GET');
    expect(init?.body).toBeUndefined();
    expect(new Headers(init?.headers).get('accept')).toBe('application/json');
    expect(new Headers(init?.headers).get('authorization')).toBe('Bearer test-token');
  });

  it('returns no body for 204', async () => {
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 204 }));

    const response = await httpGet('https://example.com/v1/items');

    expect(response.data).toBeUndefined();
  });

  it('keeps non-JSON error bodies in the message', async () => {
    fetchMock.mockResolvedValueOnce(new Response('Bad gateway', { status: 502 }));

    await expect(httpGet('https://example.com/v1/items')).rejects.toMatchObject({
      kind: ScannerErrorKind.Unknown,
      statusCode: 502,
      message: 'HTTP 502: Bad gateway',
    });
  });

  it('maps rate limiting and carries the request ID', async () => {
    fetchMock.mockResolvedValueOnce(
      new Response(JSON.stringify({ error: { code: 429, message: 'Quota exceeded' } }), {
        status: 429,
        headers: { 'x-goog-request-id': 'req-1' },
      })
    );

    await expect(httpGet('https://example.com/v1/items')).rejects.toMatchObject({
      kind: ScannerErrorKind.RequestsExceeded,
      message: 'Quota exceeded',
      requestId: 'req-1',
    });
  });

  it('reports transport failures as connection errors', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

    await expect(httpGet('https://example.com/v1/items')).rejects.toMatchObject({
      kind: ScannerErrorKind.ConnectionFailed,
      message: 'Request failed: fetch failed',
    });
  });

  it('times out slow requests', async () => {
    fetchMock.mockImplementationOnce(hangUntilAborted);

    await expect(
      httpGet('https://example.com/v1/items', { timeout: 5 })
    ).rejects.toMatchObject({
      kind: ScannerErrorKind.Timeout,
      message: 'Request timeout after 5ms',
    });
  });

  it('reports a caller abort as cancellation', async () => {
    fetchMock.mockImplementationOnce(hangUntilAborted);
    const controller = new AbortController();

    const pending = httpGet('https://example.com/v1/items', { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toMatchObject({
      kind: ScannerErrorKind.Cancelled,
      message: 'Request cancelled',
    });
  });
});
