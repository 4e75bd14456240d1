/**
 * HTTP client interface and the default fetch-backed implementation.
 *
 * Every component receives the client through its ApiContext, so tests can
 * swap in an in-process fake and callers can bring their own pooling,
 * proxying or timeouts.
 */

import { NetworkError, describeError } from '../errors.js';

// ---------------------------------------------------------------------------
// Data models
// ---------------------------------------------------------------------------

export type HttpMethod = 'GET' | 'POST' | 'PUT';

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  /** Serialized JSON body */
  body?: string;
}

export interface HttpResponse {
  status: number;
  /** Raw response body; empty string when the server sent none */
  body: string;
}

// ---------------------------------------------------------------------------
// Client interface
// ---------------------------------------------------------------------------

/**
 * Sends one request and resolves with the response, whatever its status.
 * Rejects only when no response was received.
 */
export interface HttpClient {
  send(request: HttpRequest): Promise<HttpResponse>;
}

// ---------------------------------------------------------------------------
// fetch implementation
// ---------------------------------------------------------------------------

export type FetchLike = (
  input: string,
  init: { method: string; headers: Record<string, string>; body?: string },
) => Promise<{ status: number; text(): Promise<string> }>;

/**
 * Default client over the global `fetch`. Transport rejections become
 * NetworkError; timeouts are whatever `fetchImpl` applies.
 */
export function createFetchHttpClient(fetchImpl: FetchLike = globalThis.fetch): HttpClient {
  return {
    async send(request: HttpRequest): Promise<HttpResponse> {
      try {
        const response = await fetchImpl(request.url, {
          method: request.method,
          headers: request.headers,
          body: request.body,
        });
        return { status: response.status, body: await response.text() };
      } catch (err) {
        throw new NetworkError(
          `${request.method} ${request.url} failed: ${describeError(err)}`,
          { cause: err },
        );
      }
    },
  };
}
