/**
 * Shared request path for every endpoint: URL resolution, auth header,
 * status mapping and response validation.
 */

import type { z } from 'zod';
import {
  AuthenticationError,
  OrcaErrorCode,
  ServerError,
} from '../errors.js';
import type { Logger } from '../logging/logger.js';
import { PageHeader } from '../schemas/output.schema.js';
import type { HttpClient, HttpMethod, HttpRequest } from './http-client.js';

// ---------------------------------------------------------------------------
// Endpoints
// ---------------------------------------------------------------------------

export const PATH_LOGIN = '/api-token-auth/';
export const PATH_CHANGE_INSTANCES = '/orcabase/change_instances/';
export const PATH_SERVICE_ITEMS = '/orcabase/service_items/';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

/**
 * Everything a core call needs besides its own arguments.
 */
export interface ApiContext {
  /** Base address of the service, e.g. "https://orca.example.test" */
  baseUrl: string;
  http: HttpClient;
  logger: Logger;
}

export interface ApiRequestOptions {
  method: HttpMethod;
  path: string;
  /** Sent as `Authorization: Token <token>` when present */
  token?: string;
  query?: Record<string, string | undefined>;
  body?: unknown;
}

/** Longest slice of a response body kept on errors and in logs */
const MAX_BODY_EXCERPT = 500;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Resolve `path` against `baseUrl` the way a browser resolves a link: an
 * absolute path replaces any path on the base. Undefined query values are
 * dropped.
 */
export function buildUrl(
  baseUrl: string,
  path: string,
  query: Record<string, string | undefined> = {},
): string {
  const url = new URL(path, baseUrl);
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined && value !== '') {
      url.searchParams.set(key, value);
    }
  }
  return url.toString();
}

function excerpt(body: string): string {
  return body.length <= MAX_BODY_EXCERPT ? body : `${body.slice(0, MAX_BODY_EXCERPT)}...(truncated)`;
}

function parseJson(body: string, status: number, label: string): unknown {
  try {
    return JSON.parse(body);
  } catch (err) {
    throw new ServerError(
      `${label} returned a body that is not JSON`,
      status,
      excerpt(body),
      OrcaErrorCode.INVALID_RESPONSE,
      { cause: err },
    );
  }
}

// ---------------------------------------------------------------------------
// requestJson
// ---------------------------------------------------------------------------

/** A 2xx response whose body parsed as JSON */
interface JsonDocument {
  label: string;
  status: number;
  body: string;
  json: unknown;
}

function invalidResponse(document: JsonDocument, message: string, cause?: unknown): ServerError {
  return new ServerError(
    `${document.label} ${message}`,
    document.status,
    excerpt(document.body),
    OrcaErrorCode.INVALID_RESPONSE,
    cause === undefined ? undefined : { cause },
  );
}

function describeIssues(error: z.ZodError): string {
  return error.errors.map((e) => e.message).join(', ');
}

async function requestDocument(ctx: ApiContext, options: ApiRequestOptions): Promise<JsonDocument> {
  const url = buildUrl(ctx.baseUrl, options.path, options.query);
  const label = `${options.method} ${new URL(url).pathname}`;

  const headers: Record<string, string> = { Accept: 'application/json' };
  if (options.token !== undefined) {
    headers['Authorization'] = `Token ${options.token}`;
  }
  const request: HttpRequest = { method: options.method, url, headers };
  if (options.body !== undefined) {
    headers['Content-Type'] = 'application/json';
    request.body = JSON.stringify(options.body);
  }

  ctx.logger.debug('request', { method: options.method, url, body: options.body });
  const response = await ctx.http.send(request);
  ctx.logger.debug('response', { method: options.method, url, status: response.status });

  if (response.status === 401 || response.status === 403) {
    throw new AuthenticationError(
      `${label} was rejected with status ${response.status}`,
      response.status,
    );
  }
  if (response.status < 200 || response.status >= 300) {
    throw new ServerError(
      `${label} failed with status ${response.status}`,
      response.status,
      excerpt(response.body),
    );
  }

  return {
    label,
    status: response.status,
    body: response.body,
    json: parseJson(response.body, response.status, label),
  };
}

/**
 * Send one request and validate the JSON response against `schema`.
 *
 * - 401 / 403 → AuthenticationError
 * - any other status outside 2xx → ServerError (SERVER_ERROR)
 * - 2xx with a body that is not JSON or does not match → ServerError (INVALID_RESPONSE)
 * - transport failure → whatever the HttpClient threw (NetworkError for the default client)
 */
export async function requestJson<T extends z.ZodTypeAny>(
  ctx: ApiContext,
  options: ApiRequestOptions,
  schema: T,
): Promise<z.output<T>> {
  const document = await requestDocument(ctx, options);
  const parsed = schema.safeParse(document.json);
  if (!parsed.success) {
    throw invalidResponse(
      document,
      `returned an unexpected document: ${describeIssues(parsed.error)}`,
      parsed.error,
    );
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// Pages
// ---------------------------------------------------------------------------

/**
 * Fetch the first page of a list endpoint and validate its entries.
 *
 * Only the first page is ever read. When the server reports more entries
 * than it returned, the gap is logged at warn level and the visible entries
 * are returned as-is.
 */
export async function requestFirstPage<T extends z.ZodTypeAny>(
  ctx: ApiContext,
  options: Omit<ApiRequestOptions, 'method' | 'body'>,
  item: T,
): Promise<Array<z.output<T>>> {
  const document = await requestDocument(ctx, { ...options, method: 'GET' });
  const header = PageHeader.safeParse(document.json);
  if (!header.success) {
    throw invalidResponse(
      document,
      `returned an unexpected document: ${describeIssues(header.error)}`,
      header.error,
    );
  }
  const page = header.data;
  if (page.count === 0) {
    return [];
  }

  if (!Array.isArray(page.results)) {
    throw invalidResponse(document, `reported ${page.count} entries but no results array`);
  }

  const results: Array<z.output<T>> = [];
  for (const [index, entry] of page.results.entries()) {
    const parsed = item.safeParse(entry);
    if (!parsed.success) {
      throw invalidResponse(
        document,
        `returned an unexpected entry at index ${index}: ${describeIssues(parsed.error)}`,
        parsed.error,
      );
    }
    results.push(parsed.data);
  }

  if (page.count > results.length) {
    ctx.logger.warn('Only the first page of results was read', {
      path: options.path,
      reported: page.count,
      returned: results.length,
      omitted: page.count - results.length,
    });
  }
  return results;
}
