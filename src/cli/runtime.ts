import type { Command } from 'commander';
import {
  getApiBaseUrl,
  getDefaultStoreToken,
  getDirectAccessToken,
  type Env,
} from '../config.js';
import { ShoplineClient, type ApiClient } from '../api/client.js';
import {
  AuthenticationError,
  ConfigurationError,
  CredentialStoreError,
  ValidationError,
  getErrorMessage,
} from '../lib/errors.js';
import { openCredentialStore, type CredentialStore } from '../profiles/store.js';
import { resolveStoreAlias, resolveStoreCredentials } from '../profiles/resolve.js';
import type { OutputStream } from '../output/formatter.js';
import { getRootOptions } from './root-options.js';

export interface ClientCredentials {
  handle: string;
  accessToken: string;
}

export interface RuntimeDeps {
  env?: Env;
  storeFactory?: () => CredentialStore;
  clientFactory?: (credentials: ClientCredentials) => ApiClient;
  stderr?: OutputStream;
}

export function defaultClientFactory(env: Env = process.env) {
  return (credentials: ClientCredentials): ApiClient =>
    new ShoplineClient({
      baseUrl: getApiBaseUrl(env),
      accessToken: credentials.accessToken,
      handle: credentials.handle,
    });
}

function openStore(factory: () => CredentialStore): CredentialStore {
  try {
    return factory();
  } catch (error) {
    if (error instanceof CredentialStoreError) throw error;
    throw new CredentialStoreError(getErrorMessage(error));
  }
}

/** Store token requested for this invocation: --store, else SHOPLINE_STORE, then alias expansion. */
export function getRequestedStore(cmd: Command, env: Env = process.env): string {
  const flag = getRootOptions(cmd).store?.trim() ?? '';
  return resolveStoreAlias(flag || getDefaultStoreToken(env), env);
}

/**
 * Build an API client for the store selected by --store / SHOPLINE_STORE.
 *
 * A direct access token from the environment is used, without opening the
 * credential store, when no store was requested.
 */
export function getClient(cmd: Command, deps: RuntimeDeps = {}): ApiClient {
  const env = deps.env ?? process.env;
  const clientFactory = deps.clientFactory ?? defaultClientFactory(env);
  let storeName = getRequestedStore(cmd, env);

  if (!storeName) {
    const token = getDirectAccessToken(env);
    if (token) {
      return clientFactory({ handle: '', accessToken: token });
    }
  }

  const store = openStore(deps.storeFactory ?? (() => openCredentialStore()));

  if (!storeName) {
    const names = store.list();
    if (names.length === 0) {
      throw new ConfigurationError("no store profiles configured, run 'spl auth login'");
    }
    if (names.length > 1) {
      throw new ValidationError('multiple profiles configured, use --store to select one');
    }
    storeName = names[0];
  }

  const credentials = resolveStoreCredentials(store, storeName, { stderr: deps.stderr });
  if (!credentials.accessToken) {
    throw new AuthenticationError(
      `profile "${credentials.name}" has no access token; run 'spl auth login' again`,
    );
  }
  return clientFactory({ handle: credentials.handle, accessToken: credentials.accessToken });
}
