import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ValidationError } from '../lib/errors.js';
import { readJsonFile, readTextFile } from '../utils/file-read.js';

describe('file-read helpers', () => {
  let tmpDir = '';

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'spl-file-read-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = '';
  });

  it('reads a query file as utf-8 text', () => {
    const filePath = path.join(tmpDir, 'query.txt');
    fs.writeFileSync(filePath, '.items[].id\n', 'utf-8');

    expect(readTextFile(filePath, { label: '--query-file' })).toBe('.items[].id\n');
  });

  it('names the label and path when the file is missing', () => {
    const filePath = path.join(tmpDir, 'missing.txt');

    expect(() => readTextFile(filePath, { label: '--query-file' })).toThrow(
      `Failed to read --query-file (${filePath})`,
    );
  });

  it('rejects symbolic links', () => {
    const targetPath = path.join(tmpDir, 'target.txt');
    const linkPath = path.join(tmpDir, 'link.txt');
    fs.writeFileSync(targetPath, '.', 'utf-8');
    fs.symlinkSync(targetPath, linkPath);

    expect(() => readTextFile(linkPath)).toThrow(/not a safe regular file/);
  });

  it('rejects directories', () => {
    expect(() => readTextFile(tmpDir)).toThrow(ValidationError);
  });

  it('enforces the byte limit', () => {
    const filePath = path.join(tmpDir, 'big.txt');
    fs.writeFileSync(filePath, '123456', 'utf-8');

    expect(() => readTextFile(filePath, { maxBytes: 3 })).toThrow(
      `${filePath} is too large (6 bytes, max 3).`,
    );
  });

  it('parses JSON objects', () => {
    const filePath = path.join(tmpDir, 'credentials.json');
    fs.writeFileSync(filePath, JSON.stringify({ version: 1, profiles: {} }), 'utf-8');

    expect(readJsonFile(filePath, { expectObject: true })).toEqual({ version: 1, profiles: {} });
  });

  it('rejects arrays when an object is expected', () => {
    const filePath = path.join(tmpDir, 'array.json');
    fs.writeFileSync(filePath, JSON.stringify(['orders', 'products']), 'utf-8');

    expect(() => readJsonFile(filePath, { label: 'alias table', expectObject: true })).toThrow(
      `Invalid structure in alias table (${filePath}): expected JSON object.`,
    );
  });

  it('reports malformed JSON', () => {
    const filePath = path.join(tmpDir, 'invalid.json');
    fs.writeFileSync(filePath, '{"verbs":', 'utf-8');

    expect(() => readJsonFile(filePath)).toThrow(/^Invalid JSON in /);
  });
});
