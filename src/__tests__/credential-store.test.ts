import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { CredentialStoreError, NotFoundError } from '../lib/errors.js';
import {
  FileCredentialStore,
  getCredentialsPath,
  isCredentialOld,
  openCredentialStore,
} from '../profiles/store.js';
import { makeProfile } from './helpers/fakes.js';

describe('FileCredentialStore', () => {
  let tmpDir = '';

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'spl-store-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = '';
  });

  it('starts empty when no file exists', () => {
    expect(openCredentialStore(tmpDir).list()).toEqual([]);
  });

  it('persists profiles with the token encrypted at rest', () => {
    const store = openCredentialStore(tmpDir);
    store.save(makeProfile('demo', 'demo-shop', { appSecret: 'test-app-secret' }));

    const raw = fs.readFileSync(getCredentialsPath(tmpDir), 'utf-8');
    expect(raw).not.toContain('test-token-demo');
    expect(raw).not.toContain('test-app-secret');

    const reopened = openCredentialStore(tmpDir);
    expect(reopened.list()).toEqual(['demo']);
    expect(reopened.get('demo')).toEqual(
      makeProfile('demo', 'demo-shop', { appSecret: 'test-app-secret' }),
    );
  });

  it('writes the file with owner-only permissions', () => {
    openCredentialStore(tmpDir).save(makeProfile('demo', 'demo-shop'));

    expect(fs.statSync(getCredentialsPath(tmpDir)).mode & 0o777).toBe(0o600);
  });

  it('throws NotFoundError for unknown names', () => {
    expect(() => openCredentialStore(tmpDir).get('toString')).toThrow(NotFoundError);
    expect(() => openCredentialStore(tmpDir).get('demo')).toThrow(
      'no credentials stored for "demo"',
    );
  });

  it('deletes profiles', () => {
    const store = openCredentialStore(tmpDir);
    store.save(makeProfile('demo', 'demo-shop'));

    expect(store.delete('demo')).toBe(true);
    expect(store.delete('demo')).toBe(false);
    expect(openCredentialStore(tmpDir).list()).toEqual([]);
  });

  it('reports unreadable files as credential store errors', () => {
    const filePath = getCredentialsPath(tmpDir);
    fs.writeFileSync(filePath, '{not json', 'utf-8');

    expect(() => new FileCredentialStore(filePath)).toThrow(CredentialStoreError);
  });

  it('rejects files with an unknown layout', () => {
    const filePath = getCredentialsPath(tmpDir);
    fs.writeFileSync(filePath, JSON.stringify({ version: 2, profiles: {} }), 'utf-8');

    expect(() => new FileCredentialStore(filePath)).toThrow(/invalid credentials file/);
  });
});

describe('isCredentialOld', () => {
  it('flags profiles older than 90 days', () => {
    const profile = makeProfile('demo', 'demo-shop', { createdAt: '2026-01-01T00:00:00.000Z' });

    expect(isCredentialOld(profile, Date.parse('2026-03-01T00:00:00.000Z'))).toBe(false);
    expect(isCredentialOld(profile, Date.parse('2026-04-02T00:00:00.000Z'))).toBe(true);
  });

  it('ignores unparseable dates', () => {
    expect(isCredentialOld(makeProfile('demo', 'demo-shop', { createdAt: 'soon' }))).toBe(false);
  });
});
