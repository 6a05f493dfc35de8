/**
 * In-process stand-ins for the credential store, the API client and stdout.
 */
import { vi, type Mock } from 'vitest';
import type { ApiClient } from '../../api/client.js';
import type { QueryParams } from '../../api/http.js';
import { NotFoundError } from '../../lib/errors.js';
import type { OutputStream } from '../../output/formatter.js';
import type { StoreCredentials, WritableCredentialStore } from '../../profiles/store.js';

export function makeProfile(
  name: string,
  handle: string,
  overrides: Partial<StoreCredentials> = {},
): StoreCredentials {
  return {
    name,
    handle,
    accessToken: `test-token-${name}`,
    createdAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export class MemoryCredentialStore implements WritableCredentialStore {
  readonly profiles = new Map<string, StoreCredentials>();
  /** Names whose `get` throws, as if the entry were unreadable. */
  readonly broken = new Set<string>();

  constructor(profiles: StoreCredentials[] = []) {
    for (const profile of profiles) this.profiles.set(profile.name, profile);
  }

  list(): string[] {
    return [...this.profiles.keys()];
  }

  get(name: string): StoreCredentials {
    const profile = this.profiles.get(name);
    if (!profile || this.broken.has(name)) {
      throw new NotFoundError(`no credentials stored for "${name}"`);
    }
    return profile;
  }

  save(credentials: StoreCredentials): void {
    this.profiles.set(credentials.name, credentials);
  }

  delete(name: string): boolean {
    return this.profiles.delete(name);
  }
}

export interface FakeApiClient extends ApiClient {
  list: Mock<(path: string, query?: QueryParams) => Promise<unknown>>;
  get: Mock<(path: string, id: string) => Promise<unknown>>;
  delete: Mock<(path: string, id: string) => Promise<unknown>>;
}

export function createFakeClient(handle = 'demo-shop', data: unknown = { items: [] }): FakeApiClient {
  return {
    handle,
    list: vi.fn<(path: string, query?: QueryParams) => Promise<unknown>>(async () => data),
    get: vi.fn<(path: string, id: string) => Promise<unknown>>(async () => data),
    delete: vi.fn<(path: string, id: string) => Promise<unknown>>(async () => null),
  };
}

export interface CapturedStream extends OutputStream {
  readonly chunks: string[];
  text(): string;
}

export function captureStream(): CapturedStream {
  const chunks: string[] = [];
  return {
    chunks,
    write(chunk: string) {
      chunks.push(chunk);
      return true;
    },
    text: () => chunks.join(''),
  };
}
