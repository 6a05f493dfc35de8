import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { getConfigDir } from '../config.js';
import { CredentialStoreError, NotFoundError, getErrorMessage } from '../lib/errors.js';
import { decryptSecret, encryptSecret } from '../lib/secrets.js';
import { readJsonFile } from '../utils/file-read.js';

export const StoreCredentialsSchema = z.object({
  name: z.string().min(1),
  handle: z.string(),
  accessToken: z.string(),
  appKey: z.string().optional(),
  appSecret: z.string().optional(),
  region: z.string().optional(),
  createdAt: z.string(),
});

export type StoreCredentials = z.infer<typeof StoreCredentialsSchema>;

/**
 * Read side of the credential backend, as consumed by the profile resolver.
 * `get` throws when no profile is stored under the exact name.
 */
export interface CredentialStore {
  list(): string[];
  get(name: string): StoreCredentials;
}

export interface WritableCredentialStore extends CredentialStore {
  save(credentials: StoreCredentials): void;
  delete(name: string): boolean;
}

const CredentialsFileSchema = z.object({
  version: z.literal(1),
  profiles: z.record(z.string(), StoreCredentialsSchema),
});

type CredentialsFile = z.infer<typeof CredentialsFileSchema>;

const CREDENTIALS_FILE = 'credentials.json';
const MAX_PROFILE_AGE_MS = 90 * 24 * 60 * 60 * 1000;

export function isCredentialOld(credentials: StoreCredentials, now: number = Date.now()): boolean {
  const created = Date.parse(credentials.createdAt);
  return Number.isFinite(created) && now - created > MAX_PROFILE_AGE_MS;
}

function encryptProfile(credentials: StoreCredentials): StoreCredentials {
  return {
    ...credentials,
    accessToken: encryptSecret(credentials.accessToken),
    ...(credentials.appSecret ? { appSecret: encryptSecret(credentials.appSecret) } : {}),
  };
}

function decryptProfile(credentials: StoreCredentials): StoreCredentials {
  return {
    ...credentials,
    accessToken: decryptSecret(credentials.accessToken),
    ...(credentials.appSecret ? { appSecret: decryptSecret(credentials.appSecret) } : {}),
  };
}

/**
 * Profiles persisted in <config dir>/credentials.json with secrets encrypted at rest.
 */
export class FileCredentialStore implements WritableCredentialStore {
  private data: CredentialsFile;

  constructor(readonly filePath: string) {
    this.data = FileCredentialStore.read(filePath);
  }

  private static read(filePath: string): CredentialsFile {
    if (!fs.existsSync(filePath)) {
      return { version: 1, profiles: {} };
    }
    let raw: unknown;
    try {
      raw = readJsonFile(filePath, { label: 'credentials file', expectObject: true });
    } catch (error) {
      throw new CredentialStoreError(getErrorMessage(error), { filePath });
    }
    const parsed = CredentialsFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new CredentialStoreError(`invalid credentials file ${filePath}: ${issues}`, {
        filePath,
      });
    }
    return parsed.data;
  }

  private write(): void {
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    fs.writeFileSync(this.filePath, JSON.stringify(this.data, null, 2), {
      encoding: 'utf-8',
      mode: 0o600,
    });
  }

  list(): string[] {
    return Object.keys(this.data.profiles);
  }

  get(name: string): StoreCredentials {
    const stored = Object.hasOwn(this.data.profiles, name) ? this.data.profiles[name] : undefined;
    if (!stored) {
      throw new NotFoundError(`no credentials stored for "${name}"`);
    }
    return decryptProfile(stored);
  }

  save(credentials: StoreCredentials): void {
    this.data.profiles[credentials.name] = encryptProfile(credentials);
    this.write();
  }

  delete(name: string): boolean {
    if (!Object.hasOwn(this.data.profiles, name)) return false;
    delete this.data.profiles[name];
    this.write();
    return true;
  }
}

export function getCredentialsPath(configDir: string = getConfigDir()): string {
  return path.join(configDir, CREDENTIALS_FILE);
}

export function openCredentialStore(configDir: string = getConfigDir()): FileCredentialStore {
  return new FileCredentialStore(getCredentialsPath(configDir));
}
