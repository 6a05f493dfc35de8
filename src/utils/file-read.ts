import fs from 'node:fs';
import { getErrorMessage, ValidationError } from '../lib/errors.js';

export const MAX_JSON_FILE_SIZE_BYTES = 1_048_576;
export const MAX_TEXT_FILE_SIZE_BYTES = 1_048_576;

export interface SafeJsonReadOptions {
  label?: string;
  maxBytes?: number;
  expectObject?: boolean;
}

export interface SafeTextReadOptions {
  label?: string;
  maxBytes?: number;
}

function normalizeLabel(filePath: string, label: string | undefined): string {
  return label ? `${label} (${filePath})` : filePath;
}

function getErrnoCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function readRegularFile(filePath: string, label: string, maxBytes: number): string {
  let stats: fs.Stats;
  try {
    stats = fs.lstatSync(filePath);
  } catch (error) {
    throw new ValidationError(`Failed to read ${label}: ${getErrorMessage(error)}`, {
      errno: getErrnoCode(error),
    });
  }

  if (stats.isSymbolicLink() || !stats.isFile()) {
    throw new ValidationError(`${label} is not a safe regular file.`);
  }
  if (stats.size > maxBytes) {
    throw new ValidationError(`${label} is too large (${stats.size} bytes, max ${maxBytes}).`);
  }

  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ValidationError(`Failed to read ${label}: ${getErrorMessage(error)}`);
  }

  if (Buffer.byteLength(raw, 'utf-8') > maxBytes) {
    throw new ValidationError(`${label} is too large (max ${maxBytes} bytes).`);
  }
  return raw;
}

export function readTextFile(filePath: string, options: SafeTextReadOptions = {}): string {
  return readRegularFile(
    filePath,
    normalizeLabel(filePath, options.label),
    options.maxBytes ?? MAX_TEXT_FILE_SIZE_BYTES,
  );
}

export function readJsonFile(filePath: string, options: SafeJsonReadOptions = {}): unknown {
  const label = normalizeLabel(filePath, options.label);
  const raw = readRegularFile(filePath, label, options.maxBytes ?? MAX_JSON_FILE_SIZE_BYTES);

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`Invalid JSON in ${label}: ${getErrorMessage(error)}`);
  }

  if (options.expectObject && (!parsed || typeof parsed !== 'object' || Array.isArray(parsed))) {
    throw new ValidationError(`Invalid structure in ${label}: expected JSON object.`);
  }

  return parsed;
}
