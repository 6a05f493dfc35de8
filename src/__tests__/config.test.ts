import os from 'node:os';
import path from 'node:path';
import { describe, it, expect } from 'vitest';
import {
  DEFAULT_API_BASE_URL,
  getApiBaseUrl,
  getConfigDir,
  getDefaultOutput,
  getDefaultStoreToken,
  getDirectAccessToken,
  getLogLevel,
  isOutputFormat,
} from '../config.js';

describe('getDefaultOutput', () => {
  it('defaults to text', () => {
    expect(getDefaultOutput({})).toBe('text');
  });

  it('reads SHOPLINE_OUTPUT case-insensitively', () => {
    expect(getDefaultOutput({ SHOPLINE_OUTPUT: ' JSON ' })).toBe('json');
    expect(getDefaultOutput({ SHOPLINE_OUTPUT: 'ndjson' })).toBe('ndjson');
  });

  it('ignores unknown formats', () => {
    expect(getDefaultOutput({ SHOPLINE_OUTPUT: 'yaml' })).toBe('text');
  });
});

describe('isOutputFormat', () => {
  it('accepts the known formats only', () => {
    expect(['text', 'json', 'jsonl', 'ndjson'].every(isOutputFormat)).toBe(true);
    expect(isOutputFormat('csv')).toBe(false);
    expect(isOutputFormat('JSON')).toBe(false);
  });
});

describe('store and token lookup', () => {
  it('trims SHOPLINE_STORE', () => {
    expect(getDefaultStoreToken({ SHOPLINE_STORE: '  demo ' })).toBe('demo');
    expect(getDefaultStoreToken({})).toBe('');
  });

  it('takes the first non-empty direct token', () => {
    expect(
      getDirectAccessToken({ SHOPLINE_ACCESS_TOKEN: ' ', SHOPLINE_API_TOKEN: 'test-token-api', SHOPLINE_TOKEN: 'test-token' }),
    ).toBe('test-token-api');
  });

  it('never uses the admin token', () => {
    expect(getDirectAccessToken({ SHOPLINE_ADMIN_TOKEN: 'test-admin-token' })).toBe('');
  });
});

describe('paths and urls', () => {
  it('resolves SHOPLINE_CONFIG_DIR', () => {
    expect(getConfigDir({ SHOPLINE_CONFIG_DIR: 'relative/dir' })).toBe(path.resolve('relative/dir'));
  });

  it('falls back to ~/.shopline', () => {
    expect(getConfigDir({})).toBe(path.join(os.homedir(), '.shopline'));
  });

  it('strips trailing slashes from the API base URL', () => {
    expect(getApiBaseUrl({ SHOPLINE_API_BASE_URL: 'http://localhost:8080/v1//' })).toBe(
      'http://localhost:8080/v1',
    );
    expect(getApiBaseUrl({})).toBe(DEFAULT_API_BASE_URL);
  });
});

describe('getLogLevel', () => {
  it('reads SHOPLINE_LOG_LEVEL', () => {
    expect(getLogLevel({ SHOPLINE_LOG_LEVEL: 'DEBUG' })).toBe('debug');
  });

  it('defaults to warn', () => {
    expect(getLogLevel({})).toBe('warn');
    expect(getLogLevel({ SHOPLINE_LOG_LEVEL: 'verbose' })).toBe('warn');
  });
});
