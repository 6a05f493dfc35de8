import { logger } from '../lib/logger.js';
import { ValidationError } from '../lib/errors.js';
import {
  applyQueryParams,
  normalizePath,
  requestJson,
  throwOnHttpError,
  type QueryParams,
} from './http.js';

export interface ApiClient {
  /** Store handle the client talks to; empty when authenticated by a direct token. */
  readonly handle: string;
  list(path: string, query?: QueryParams): Promise<unknown>;
  get(path: string, id: string): Promise<unknown>;
  delete(path: string, id: string): Promise<unknown>;
}

export interface ShoplineClientOptions {
  baseUrl: string;
  accessToken: string;
  handle: string;
  timeoutMs?: number;
}

const log = logger.child('api');

export class ShoplineClient implements ApiClient {
  readonly handle: string;
  private readonly baseUrl: string;
  private readonly accessToken: string;
  private readonly timeoutMs?: number;

  constructor(options: ShoplineClientOptions) {
    if (!options.accessToken) {
      throw new ValidationError('An access token is required to call the Shopline API');
    }
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.accessToken = options.accessToken;
    this.handle = options.handle;
    this.timeoutMs = options.timeoutMs;
  }

  private buildUrl(path: string, query?: QueryParams): URL {
    const url = new URL(`${this.baseUrl}${normalizePath(path)}`);
    applyQueryParams(url, query);
    return url;
  }

  private async send(method: string, url: URL): Promise<unknown> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      Authorization: `Bearer ${this.accessToken}`,
    };
    if (this.handle) headers['X-Shopline-Store'] = this.handle;

    log.debug('request', { method, url: url.toString() });
    const res = await requestJson(url.toString(), {
      method,
      headers,
      timeoutMs: this.timeoutMs,
    });
    log.debug('response', { method, url: url.toString(), status: res.status });
    throwOnHttpError(res.status, res.data);
    return res.data;
  }

  list(path: string, query?: QueryParams): Promise<unknown> {
    return this.send('GET', this.buildUrl(path, query));
  }

  get(path: string, id: string): Promise<unknown> {
    return this.send('GET', this.buildUrl(`${path}/${encodeURIComponent(id)}`));
  }

  delete(path: string, id: string): Promise<unknown> {
    return this.send('DELETE', this.buildUrl(`${path}/${encodeURIComponent(id)}`));
  }
}
