import { ENV_STORE_ALIASES, type Env } from '../config.js';
import { AmbiguousProfileError, ProfileNotFoundError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import type { CredentialStore, StoreCredentials } from './store.js';

/** Host suffixes under which the platform serves stores; stripping one leaves the store handle. */
export const PLATFORM_HOST_SUFFIXES = [
  '.myshopline.com',
  '.myshoplineapp.com',
  '.shoplineapp.com',
  '.shoplineapp.cn',
] as const;

const MIN_PREFIX_LENGTH = 3;
const IGNORED_HOST_LABELS = new Set(['www', 'admin']);

export interface ProfileMatch {
  name: string;
  credentials: StoreCredentials;
}

export interface ResolveOptions {
  /** Receives the one-line note printed when a fuzzy match is selected. */
  stderr?: { write(chunk: string): unknown };
}

const log = logger.child('profiles');

function addLookupKey(out: Set<string>, raw: string): void {
  const key = raw.trim().toLowerCase().replace(/^\/+|\/+$/g, '');
  if (key) out.add(key);
}

function addHostLookupKeys(out: Set<string>, host: string): void {
  for (const suffix of PLATFORM_HOST_SUFFIXES) {
    if (host.endsWith(suffix)) {
      addLookupKey(out, host.slice(0, -suffix.length));
    }
  }

  const dot = host.indexOf('.');
  if (dot > 0) {
    const label = host.slice(0, dot);
    if (!IGNORED_HOST_LABELS.has(label)) {
      addLookupKey(out, label);
    }
  }
}

function addPathLookupKeys(out: Set<string>, rawPath: string): void {
  const trimmed = rawPath.replace(/^\/+|\/+$/g, '');
  if (!trimmed) return;

  const parts = trimmed.split('/');
  parts.forEach((part, i) => {
    addLookupKey(out, part);
    if (part === 'admin' && i + 1 < parts.length) {
      addLookupKey(out, parts[i + 1]);
    }
  });
  addLookupKey(out, parts[parts.length - 1]);
}

/** Percent-decoded path, or undefined when it carries a malformed escape. */
function decodePath(pathname: string): string | undefined {
  try {
    return decodeURIComponent(pathname);
  } catch (error) {
    if (error instanceof URIError) return undefined;
    throw error;
  }
}

function addLookupVariants(out: Set<string>, raw: string): void {
  if (!raw.includes('://')) {
    // No scheme: the whole value reads as a path.
    addPathLookupKeys(out, raw.split(/[?#]/)[0]);
    return;
  }

  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch {
    return;
  }

  const host = parsed.hostname.trim().toLowerCase();
  if (host) {
    addLookupKey(out, host);
    addHostLookupKeys(out, host);
  }
  const path = decodePath(parsed.pathname);
  if (path !== undefined) addPathLookupKeys(out, path);
}

/**
 * Normalized forms of a profile name, a store handle or a user-supplied token.
 * Two values refer to the same store when their key sets intersect.
 */
export function lookupKeys(value: string): Set<string> {
  const out = new Set<string>();
  const normalized = value.trim().toLowerCase();
  if (!normalized) return out;

  addLookupKey(out, normalized);
  addLookupVariants(out, normalized);

  const hasScheme = normalized.includes('://');
  const hasPath = normalized.includes('/');
  if (normalized.includes('.') && !hasPath && !hasScheme) {
    addHostLookupKeys(out, normalized);
  }
  if (!hasScheme && hasPath) {
    addLookupVariants(out, `https://${normalized}`);
  }
  return out;
}

function intersects(a: Set<string>, b: Set<string>): boolean {
  for (const key of a) {
    if (b.has(key)) return true;
  }
  return false;
}

function hasPrefixMatch(requestKeys: Set<string>, profileName: string, handle: string): boolean {
  const name = profileName.trim().toLowerCase();
  const normalizedHandle = handle.trim().toLowerCase();
  for (const key of requestKeys) {
    if (key.length < MIN_PREFIX_LENGTH) continue;
    if (name.startsWith(key) || normalizedHandle.startsWith(key)) return true;
  }
  return false;
}

function uniqueMatches(matches: ProfileMatch[]): ProfileMatch[] {
  const seen = new Set<string>();
  const out: ProfileMatch[] = [];
  for (const match of matches) {
    const key = match.name.trim();
    if (!key || seen.has(key)) continue;
    seen.add(key);
    out.push(match);
  }
  return out.sort((a, b) => {
    const left = a.name.toLowerCase();
    const right = b.name.toLowerCase();
    return left < right ? -1 : left > right ? 1 : 0;
  });
}

/**
 * Profiles matching `requested`. Exact (shared lookup key) matches win; prefix
 * matches are only returned when there is no exact match.
 */
export function findProfileMatches(store: CredentialStore, requested: string): ProfileMatch[] {
  const names = store.list();
  if (names.length === 0) return [];

  const requestKeys = lookupKeys(requested);
  const exact: ProfileMatch[] = [];
  const prefix: ProfileMatch[] = [];

  for (const name of names) {
    let credentials: StoreCredentials;
    try {
      credentials = store.get(name);
    } catch (error) {
      log.debug('skipping unreadable profile', { name, error: String(error) });
      continue;
    }

    const candidateKeys = lookupKeys(name);
    for (const key of lookupKeys(credentials.handle)) candidateKeys.add(key);

    if (intersects(requestKeys, candidateKeys)) {
      exact.push({ name, credentials });
    } else if (hasPrefixMatch(requestKeys, name, credentials.handle)) {
      prefix.push({ name, credentials });
    }
  }

  log.debug('profile lookup', {
    requested,
    profiles: names.length,
    exact: exact.length,
    prefix: prefix.length,
  });
  return uniqueMatches(exact.length > 0 ? exact : prefix);
}

/**
 * Resolve a store token (exact profile name, handle, admin URL or a prefix of
 * either) to stored credentials.
 */
export function resolveStoreCredentials(
  store: CredentialStore,
  requested: string,
  options: ResolveOptions = {},
): StoreCredentials {
  const name = requested.trim();
  if (!name) {
    throw new ProfileNotFoundError(requested);
  }

  try {
    return store.get(name);
  } catch (error) {
    log.debug('no exact profile match', { requested: name, error: String(error) });
  }

  const matches = findProfileMatches(store, name);
  if (matches.length === 1) {
    const [match] = matches;
    const stderr = options.stderr ?? process.stderr;
    stderr.write(`Using profile "${match.name}" (matched from "${requested}")\n`);
    return match.credentials;
  }
  if (matches.length > 1) {
    throw new AmbiguousProfileError(
      requested,
      matches.map((match) => match.name),
    );
  }
  throw new ProfileNotFoundError(requested);
}

/**
 * Expand a short store alias from SHOPLINE_STORE_ALIASES
 * ("alias1:fullname1,alias2:fullname2"). Unknown tokens are returned unchanged.
 */
export function resolveStoreAlias(token: string, env: Env = process.env): string {
  if (!token) return token;
  const raw = env[ENV_STORE_ALIASES] ?? '';
  if (!raw) return token;

  const wanted = token.toLowerCase();
  for (const pair of raw.split(',')) {
    const separator = pair.indexOf(':');
    if (separator === -1) continue;
    const alias = pair.slice(0, separator).trim();
    if (alias.toLowerCase() === wanted) {
      return pair.slice(separator + 1).trim();
    }
  }
  return token;
}
