import os from 'node:os';
import path from 'node:path';
import { LogLevelSchema, type LogLevel } from './lib/logger.js';

export const ENV_STORE = 'SHOPLINE_STORE';
export const ENV_STORE_ALIASES = 'SHOPLINE_STORE_ALIASES';
export const ENV_OUTPUT = 'SHOPLINE_OUTPUT';
export const ENV_CONFIG_DIR = 'SHOPLINE_CONFIG_DIR';
export const ENV_API_BASE_URL = 'SHOPLINE_API_BASE_URL';
export const ENV_LOG_LEVEL = 'SHOPLINE_LOG_LEVEL';

/** Checked in order; the admin token (SHOPLINE_ADMIN_TOKEN) is deliberately not one of them. */
export const DIRECT_TOKEN_ENV_VARS = [
  'SHOPLINE_ACCESS_TOKEN',
  'SHOPLINE_API_TOKEN',
  'SHOPLINE_TOKEN',
] as const;

export const DEFAULT_API_BASE_URL = 'https://open.shopline.io/v1';

export const OUTPUT_FORMATS = ['text', 'json', 'jsonl', 'ndjson'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export type Env = Record<string, string | undefined>;

function readEnv(env: Env, name: string): string {
  return (env[name] ?? '').trim();
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/** Default for --output: SHOPLINE_OUTPUT when it names a known format, otherwise "text". */
export function getDefaultOutput(env: Env = process.env): OutputFormat {
  const requested = readEnv(env, ENV_OUTPUT).toLowerCase();
  return isOutputFormat(requested) ? requested : 'text';
}

export function getDefaultStoreToken(env: Env = process.env): string {
  return readEnv(env, ENV_STORE);
}

export function getDirectAccessToken(env: Env = process.env): string {
  for (const name of DIRECT_TOKEN_ENV_VARS) {
    const token = readEnv(env, name);
    if (token) return token;
  }
  return '';
}

/** Returns the directory holding credentials.json (SHOPLINE_CONFIG_DIR or ~/.shopline). */
export function getConfigDir(env: Env = process.env): string {
  const configured = readEnv(env, ENV_CONFIG_DIR);
  return configured ? path.resolve(configured) : path.join(os.homedir(), '.shopline');
}

export function getApiBaseUrl(env: Env = process.env): string {
  const configured = readEnv(env, ENV_API_BASE_URL);
  return (configured || DEFAULT_API_BASE_URL).replace(/\/+$/, '');
}

export function getLogLevel(env: Env = process.env): LogLevel {
  const parsed = LogLevelSchema.safeParse(readEnv(env, ENV_LOG_LEVEL).toLowerCase());
  return parsed.success ? parsed.data : 'warn';
}
