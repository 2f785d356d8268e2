/**
 * HTTP Client Utilities
 *
 * Provides a consistent interface for making HTTP requests with:
 * - Typed errors carrying the service and status
 * - Mapping of transport and status failures onto connector error kinds
 * - Request timeout support
 */

import type { ServerType } from '@reelwatch/shared';
import { ConnectorError, type ConnectorErrorKind } from './errors.js';

/**
 * HTTP client error with service context
 */
export class HttpClientError extends Error {
  public readonly statusCode: number;
  public readonly statusText: string;
  public readonly service: string;
  public readonly url: string;
  public readonly responseBody?: string;

  constructor(options: {
    service: string;
    statusCode: number;
    statusText: string;
    url: string;
    message?: string;
    responseBody?: string;
  }) {
    const message =
      options.message ||
      `${options.service} request failed: ${options.statusCode} ${options.statusText}`;
    super(message);
    this.name = 'HttpClientError';
    this.service = options.service;
    this.statusCode = options.statusCode;
    this.statusText = options.statusText;
    this.url = options.url;
    this.responseBody = options.responseBody;

    Error.captureStackTrace(this, this.constructor);
    Object.setPrototypeOf(this, HttpClientError.prototype);
  }

  /**
   * Connector error kind for this HTTP status
   */
  get connectorKind(): ConnectorErrorKind {
    if (this.statusCode === 401 || this.statusCode === 403) return 'unauthorized';
    if (this.statusCode === 404) return 'not_found';
    if (this.statusCode === 408 || this.statusCode === 504) return 'timeout';
    if (this.statusCode >= 500) return 'unreachable';
    return 'malformed_response';
  }
}

/**
 * Options for HTTP requests
 */
export interface HttpRequestOptions extends Omit<RequestInit, 'signal'> {
  /** Service name for error messages */
  service?: string;
  /** Request timeout in milliseconds */
  timeout?: number;
  /** Whether to include response body in errors */
  includeBodyInError?: boolean;
}

/**
 * Check if response is OK, throw HttpClientError if not
 */
async function assertResponseOk(
  response: Response,
  url: string,
  service: string | undefined,
  includeBodyInError: boolean | undefined
): Promise<void> {
  if (response.ok) return;

  let responseBody: string | undefined;
  if (includeBodyInError) {
    responseBody = await response.text().catch(() => undefined);
  }

  throw new HttpClientError({
    service: service || 'API',
    statusCode: response.status,
    statusText: response.statusText,
    url,
    responseBody,
  });
}

async function send(url: string, options: HttpRequestOptions): Promise<Response> {
  const { timeout, service, includeBodyInError, ...fetchOptions } = options;

  const response = await fetch(url, {
    ...fetchOptions,
    signal: timeout ? AbortSignal.timeout(timeout) : undefined,
  });

  await assertResponseOk(response, url, service, includeBodyInError);
  return response;
}

/**
 * Fetch JSON data from a URL
 *
 * @example
 * const data = await fetchJson<unknown[]>('http://emby.local:8096/Sessions', {
 *   service: 'emby',
 *   headers: jellyfinEmbyHeaders('test-api-key'),
 *   timeout: 10000,
 * });
 */
export async function fetchJson<T>(url: string, options: HttpRequestOptions = {}): Promise<T> {
  const response = await send(url, options);
  return response.json() as Promise<T>;
}

/**
 * Send a request whose response body is not needed (commands, messages).
 * Still validates response.ok
 */
export async function fetchRaw(url: string, options: HttpRequestOptions = {}): Promise<Response> {
  return send(url, options);
}

/**
 * Translate anything thrown by fetchJson/fetchRaw into a ConnectorError
 */
export function toConnectorError(service: ServerType, error: unknown): ConnectorError {
  if (error instanceof ConnectorError) return error;

  if (error instanceof HttpClientError) {
    return new ConnectorError(service, error.connectorKind, error.message, error);
  }

  // AbortSignal.timeout rejects with a DOMException named TimeoutError
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return new ConnectorError(service, 'timeout', 'request timed out', error);
  }

  // Invalid JSON body
  if (error instanceof SyntaxError) {
    return new ConnectorError(service, 'malformed_response', error.message, error);
  }

  // fetch() rejects with TypeError for DNS, refused connections and resets
  const message = error instanceof Error ? error.message : String(error);
  return new ConnectorError(service, 'unreachable', message, error);
}

/**
 * Helper to create Plex-specific headers
 */
export function plexHeaders(token?: string): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: 'application/json',
    'X-Plex-Client-Identifier': 'reelwatch',
    'X-Plex-Product': 'Reelwatch',
    'X-Plex-Version': '0.1.0',
    'X-Plex-Device': 'Server',
    'X-Plex-Platform': 'Node.js',
  };

  if (token) {
    headers['X-Plex-Token'] = token;
  }

  return headers;
}

/**
 * Helper to create Jellyfin/Emby-specific headers
 * Note: Both use identical X-Emby-Token header (Jellyfin forked from Emby)
 */
export function jellyfinEmbyHeaders(apiKey?: string): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: 'application/json',
  };

  if (apiKey) {
    headers['X-Emby-Token'] = apiKey;
  }

  return headers;
}
