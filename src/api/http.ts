import {
  ValidationError,
  NetworkError,
  NotFoundError,
  AuthenticationError,
  AuthorizationError,
  RateLimitError,
  ServiceUnavailableError,
  CliError,
  TimeoutError,
  getErrorMessage,
} from '../lib/errors.js';
import { MAX_TEXT_FILE_SIZE_BYTES } from '../utils/file-read.js';

export interface RequestOptions {
  method?: string;
  headers?: Record<string, string>;
  body?: string | null;
  timeoutMs?: number;
}

export interface HttpTextResponse {
  status: number;
  headers: Headers;
  text: string;
}

export interface HttpJsonResponse {
  status: number;
  headers: Headers;
  data: unknown;
}

export type QueryParams = Record<string, string | number | boolean | undefined | null>;

export const DEFAULT_TIMEOUT_MS = 30_000;
const MAX_TEXT_RESPONSE_BYTES = MAX_TEXT_FILE_SIZE_BYTES;

async function readResponseText(response: Response, maxBytes: number): Promise<string> {
  const contentLength = Number.parseInt(response.headers.get('content-length') || '', 10);
  if (Number.isFinite(contentLength) && contentLength > maxBytes) {
    throw new NetworkError(`Response too large (${contentLength} bytes).`);
  }

  const text = await response.text();
  if (Buffer.byteLength(text, 'utf-8') > maxBytes) {
    throw new NetworkError(`Response too large (over ${maxBytes} bytes).`);
  }
  return text;
}

function getTimeoutMs(options: RequestOptions): number {
  const timeout = options.timeoutMs;
  return timeout !== undefined && Number.isFinite(timeout) && timeout > 0
    ? timeout
    : DEFAULT_TIMEOUT_MS;
}

export async function requestText(
  url: string,
  options: RequestOptions = {},
): Promise<HttpTextResponse> {
  const timeoutMs = getTimeoutMs(options);
  const controller = new AbortController();
  const timeout = setTimeout(() => {
    controller.abort(new Error(`Request timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  try {
    const response = await fetch(url, {
      method: options.method ?? 'GET',
      headers: options.headers,
      body: options.body,
      signal: controller.signal,
    });

    const text = await readResponseText(response, MAX_TEXT_RESPONSE_BYTES);
    return {
      status: response.status,
      headers: response.headers,
      text,
    };
  } catch (error: unknown) {
    if (controller.signal.aborted) {
      throw new TimeoutError(`Request timed out after ${timeoutMs}ms`);
    }
    if (error instanceof CliError) throw error;
    throw new NetworkError(`Request to ${url} failed: ${getErrorMessage(error)}`);
  } finally {
    clearTimeout(timeout);
  }
}

export async function requestJson(
  url: string,
  options: RequestOptions = {},
): Promise<HttpJsonResponse> {
  const res = await requestText(url, options);
  let data: unknown = null;
  if (res.text) {
    try {
      data = JSON.parse(res.text);
    } catch {
      data = res.text;
    }
  }
  return { status: res.status, headers: res.headers, data };
}

/**
 * Normalize a relative API path: ensure non-empty, relative, leading slash.
 */
export function normalizePath(rawPath: string): string {
  let p = rawPath.trim();
  if (!p) {
    throw new ValidationError('Path is required');
  }
  if (p.startsWith('http://') || p.startsWith('https://')) {
    throw new ValidationError(`Path must be relative (got "${p}")`);
  }
  if (!p.startsWith('/')) {
    p = `/${p}`;
  }
  return p;
}

function describeErrorBody(data: unknown): string {
  if (typeof data === 'string') return data;
  if (data && typeof data === 'object') {
    for (const key of ['message', 'error', 'errors']) {
      const value: unknown = Reflect.get(data, key);
      if (typeof value === 'string' && value) return value;
    }
  }
  return JSON.stringify(data);
}

/**
 * Throw a typed error if the HTTP status indicates failure (>= 400).
 */
export function throwOnHttpError(status: number, data: unknown): void {
  if (status < 400) return;
  const fullMsg = `Shopline API error (${status}): ${describeErrorBody(data)}`;
  switch (status) {
    case 400:
    case 422:
      throw new ValidationError(fullMsg);
    case 401:
      throw new AuthenticationError(fullMsg);
    case 403:
      throw new AuthorizationError(fullMsg);
    case 404:
      throw new NotFoundError(fullMsg);
    case 429:
      throw new RateLimitError(fullMsg);
    default:
      if (status >= 500) throw new ServiceUnavailableError(fullMsg);
      throw new CliError(fullMsg, 'HTTP_ERROR', 1, { status });
  }
}

/**
 * Apply optional query parameters to a URL, skipping null/undefined/empty values.
 */
export function applyQueryParams(url: URL, query?: QueryParams | null): void {
  if (!query) return;
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined || value === null || value === '') continue;
    url.searchParams.set(key, String(value));
  }
}
