import { describe, it, expect, vi, afterEach } from 'vitest';
import { ShoplineClient } from '../api/client.js';
import {
  applyQueryParams,
  normalizePath,
  requestJson,
  throwOnHttpError,
} from '../api/http.js';
import {
  AuthenticationError,
  CliError,
  NetworkError,
  NotFoundError,
  RateLimitError,
  ServiceUnavailableError,
  TimeoutError,
  ValidationError,
} from '../lib/errors.js';

function stubFetch(body: string, status = 200) {
  const fetchMock = vi.fn<typeof fetch>(async () => new Response(body, { status }));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
  vi.useRealTimers();
});

describe('normalizePath', () => {
  it('adds a leading slash', () => {
    expect(normalizePath(' orders ')).toBe('/orders');
    expect(normalizePath('/orders')).toBe('/orders');
  });

  it('rejects empty and absolute paths', () => {
    expect(() => normalizePath(' ')).toThrow('Path is required');
    expect(() => normalizePath('https://example.com/orders')).toThrow(ValidationError);
  });
});

describe('applyQueryParams', () => {
  it('skips empty values', () => {
    const url = new URL('https://api.example.com/orders');
    applyQueryParams(url, { page: 2, status: 'open', from: '', to: undefined, vendor: null });
    expect(url.toString()).toBe('https://api.example.com/orders?page=2&status=open');
  });
});

describe('throwOnHttpError', () => {
  it.each([
    [400, ValidationError],
    [422, ValidationError],
    [401, AuthenticationError],
    [404, NotFoundError],
    [429, RateLimitError],
    [503, ServiceUnavailableError],
  ])('maps %i to a typed error', (status, ErrorClass) => {
    expect(() => throwOnHttpError(status, { message: 'nope' })).toThrow(ErrorClass);
  });

  it('uses the message field of the body', () => {
    expect(() => throwOnHttpError(404, { message: 'order not found' })).toThrow(
      'Shopline API error (404): order not found',
    );
  });

  it('falls back to a generic error for other statuses', () => {
    let caught: unknown;
    try {
      throwOnHttpError(409, { errors: 'conflict' });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(CliError);
    expect(caught instanceof CliError && caught.code).toBe('HTTP_ERROR');
  });

  it('accepts success statuses', () => {
    expect(() => throwOnHttpError(204, null)).not.toThrow();
  });
});

describe('requestJson', () => {
  it('parses JSON bodies and keeps text that is not JSON', async () => {
    stubFetch('{"ok":true}');
    expect((await requestJson('https://api.example.com/a')).data).toEqual({ ok: true });

    stubFetch('plain');
    expect((await requestJson('https://api.example.com/a')).data).toBe('plain');

    stubFetch('');
    expect((await requestJson('https://api.example.com/a')).data).toBeNull();
  });

  it('wraps transport failures', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn<typeof fetch>(async () => {
        throw new Error('socket hang up');
      }),
    );

    await expect(requestJson('https://api.example.com/a')).rejects.toThrow(
      new NetworkError('Request to https://api.example.com/a failed: socket hang up'),
    );
  });

  it('turns an aborted request into a timeout', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn<typeof fetch>(
        (_url, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
          }),
      ),
    );

    await expect(requestJson('https://api.example.com/a', { timeoutMs: 5 })).rejects.toBeInstanceOf(
      TimeoutError,
    );
  });
});

describe('ShoplineClient', () => {
  it('requires an access token', () => {
    expect(
      () => new ShoplineClient({ baseUrl: 'https://api.example.com', accessToken: '', handle: '' }),
    ).toThrow(ValidationError);
  });

  it('lists with query parameters and store headers', async () => {
    const fetchMock = stubFetch('{"items":[]}');
    const client = new ShoplineClient({
      baseUrl: 'https://api.example.com/v1/',
      accessToken: 'test-token',
      handle: 'demo-shop',
    });

    await expect(client.list('/orders', { page: 1, status: 'open' })).resolves.toEqual({ items: [] });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.example.com/v1/orders?page=1&status=open');
    expect(init?.method).toBe('GET');
    expect(init?.headers).toEqual({
      Accept: 'application/json',
      Authorization: 'Bearer test-token',
      'X-Shopline-Store': 'demo-shop',
    });
  });

  it('encodes ids and omits the store header without a handle', async () => {
    const fetchMock = stubFetch('');
    const client = new ShoplineClient({
      baseUrl: 'https://api.example.com',
      accessToken: 'test-token',
      handle: '',
    });

    await client.delete('/webhooks', 'wh/1');

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.example.com/webhooks/wh%2F1');
    expect(init?.method).toBe('DELETE');
    expect(init?.headers).toEqual({
      Accept: 'application/json',
      Authorization: 'Bearer test-token',
    });
  });

  it('raises API errors', async () => {
    stubFetch('{"message":"order not found"}', 404);
    const client = new ShoplineClient({
      baseUrl: 'https://api.example.com',
      accessToken: 'test-token',
      handle: 'demo-shop',
    });

    await expect(client.get('/orders', 'ord_1')).rejects.toThrow(
      'Shopline API error (404): order not found',
    );
  });
});
