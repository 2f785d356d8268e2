/**
 * HTTP Client Utility Tests
 *
 * Covers HttpClientError, fetchJson/fetchRaw against a stubbed fetch,
 * the mapping onto connector error kinds, and the header helpers.
 */

import { describe, it, expect, vi, beforeEach, afterAll } from 'vitest';
import {
  HttpClientError,
  fetchJson,
  fetchRaw,
  toConnectorError,
  plexHeaders,
  jellyfinEmbyHeaders,
} from '../http.js';
import { ConnectorError } from '../errors.js';

const mockFetch = vi.fn<typeof fetch>();
vi.stubGlobal('fetch', mockFetch);

afterAll(() => {
  vi.unstubAllGlobals();
});

function createMockResponse(options: {
  ok?: boolean;
  status?: number;
  statusText?: string;
  body?: unknown;
}): Response {
  const { ok = true, status = 200, statusText = 'OK', body = {} } = options;

  return {
    ok,
    status,
    statusText,
    json: vi.fn().mockResolvedValue(body),
    text: vi.fn().mockResolvedValue(typeof body === 'string' ? body : JSON.stringify(body)),
  } as unknown as Response;
}

describe('HttpClientError', () => {
  it('builds a message from service and status', () => {
    const error = new HttpClientError({
      service: 'plex',
      statusCode: 401,
      statusText: 'Unauthorized',
      url: 'http://plex.local:32400/status/sessions',
    });

    expect(error.name).toBe('HttpClientError');
    expect(error.message).toBe('plex request failed: 401 Unauthorized');
    expect(error.url).toBe('http://plex.local:32400/status/sessions');
    expect(error).toBeInstanceOf(HttpClientError);
  });

  it('prefers an explicit message', () => {
    const error = new HttpClientError({
      service: 'emby',
      statusCode: 500,
      statusText: 'Internal Server Error',
      url: 'http://emby.local/Sessions',
      message: 'boom',
    });

    expect(error.message).toBe('boom');
  });

  it.each([
    [401, 'unauthorized'],
    [403, 'unauthorized'],
    [404, 'not_found'],
    [408, 'timeout'],
    [504, 'timeout'],
    [500, 'unreachable'],
    [503, 'unreachable'],
    [400, 'malformed_response'],
  ] as const)('maps status %i to %s', (statusCode, kind) => {
    const error = new HttpClientError({ service: 'x', statusCode, statusText: '', url: '/' });
    expect(error.connectorKind).toBe(kind);
  });
});

describe('fetchJson', () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it('returns the parsed body', async () => {
    mockFetch.mockResolvedValue(createMockResponse({ body: [{ Id: 'abc' }] }));

    const data = await fetchJson<Array<{ Id: string }>>('http://emby.local/Sessions', {
      service: 'emby',
    });

    expect(data).toEqual([{ Id: 'abc' }]);
  });

  it('passes headers through and attaches a timeout signal', async () => {
    mockFetch.mockResolvedValue(createMockResponse({}));

    await fetchJson('http://emby.local/Sessions', {
      headers: { 'X-Emby-Token': 'test-secret' },
      timeout: 5000,
    });

    const init = mockFetch.mock.calls[0]?.[1];
    expect(init?.headers).toEqual({ 'X-Emby-Token': 'test-secret' });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it('sends no signal without a timeout', async () => {
    mockFetch.mockResolvedValue(createMockResponse({}));

    await fetchJson('http://emby.local/Sessions');

    expect(mockFetch.mock.calls[0]?.[1]?.signal).toBeUndefined();
  });

  it('throws HttpClientError on a non-2xx response', async () => {
    mockFetch.mockResolvedValue(
      createMockResponse({ ok: false, status: 401, statusText: 'Unauthorized' })
    );

    const error = await fetchJson('http://emby.local/Sessions', { service: 'emby' }).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(HttpClientError);
    expect(error).toMatchObject({ service: 'emby', statusCode: 401 });
  });

  it('defaults the service name to API', async () => {
    mockFetch.mockResolvedValue(createMockResponse({ ok: false, status: 500, statusText: 'Error' }));

    await expect(fetchJson('http://emby.local/Sessions')).rejects.toThrow(
      'API request failed: 500 Error'
    );
  });

  it('includes the response body only when asked', async () => {
    mockFetch.mockResolvedValue(
      createMockResponse({ ok: false, status: 400, statusText: 'Bad Request', body: 'bad id' })
    );

    const error = await fetchJson('http://emby.local/Sessions', { includeBodyInError: true }).catch(
      (e: unknown) => e
    );

    expect(error).toMatchObject({ responseBody: 'bad id' });
  });
});

describe('fetchRaw', () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it('returns the response unread', async () => {
    const response = createMockResponse({ status: 204 });
    mockFetch.mockResolvedValue(response);

    await expect(fetchRaw('http://emby.local/Sessions/1/Message', { method: 'POST' })).resolves.toBe(
      response
    );
    expect(mockFetch.mock.calls[0]?.[1]?.method).toBe('POST');
  });
});

describe('toConnectorError', () => {
  it('passes a ConnectorError through', () => {
    const original = new ConnectorError('plex', 'timeout', 'slow');
    expect(toConnectorError('plex', original)).toBe(original);
  });

  it('uses the HTTP status kind', () => {
    const error = toConnectorError(
      'jellyfin',
      new HttpClientError({ service: 'jellyfin', statusCode: 403, statusText: 'Forbidden', url: '/' })
    );

    expect(error.kind).toBe('unauthorized');
    expect(error.message).toBe('Jellyfin unauthorized: jellyfin request failed: 403 Forbidden');
  });

  it('maps an aborted request to timeout', () => {
    const abort = new Error('The operation was aborted due to timeout');
    abort.name = 'TimeoutError';

    expect(toConnectorError('emby', abort).kind).toBe('timeout');
  });

  it('maps a JSON syntax error to malformed_response', () => {
    expect(toConnectorError('emby', new SyntaxError('Unexpected token <')).kind).toBe(
      'malformed_response'
    );
  });

  it('treats anything else as unreachable', () => {
    const error = toConnectorError('emby', new TypeError('fetch failed'));

    expect(error.kind).toBe('unreachable');
    expect(error.retryable).toBe(true);
    expect(error.message).toBe('Emby unreachable: fetch failed');
  });
});

describe('header helpers', () => {
  it('identifies the client to Plex', () => {
    const headers = plexHeaders('test-secret');

    expect(headers['X-Plex-Client-Identifier']).toBe('reelwatch');
    expect(headers['X-Plex-Product']).toBe('Reelwatch');
    expect(headers['X-Plex-Token']).toBe('test-secret');
    expect(headers.Accept).toBe('application/json');
  });

  it('omits the Plex token when absent', () => {
    expect(plexHeaders()).not.toHaveProperty('X-Plex-Token');
  });

  it('sends the Emby token header for Jellyfin and Emby', () => {
    expect(jellyfinEmbyHeaders('test-secret')).toEqual({
      Accept: 'application/json',
      'X-Emby-Token': 'test-secret',
    });
    expect(jellyfinEmbyHeaders()).toEqual({ Accept: 'application/json' });
  });
});
