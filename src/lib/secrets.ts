/**
 * Secret encryption for stored store credentials
 *
 * Access tokens and app secrets are encrypted with AES-256-GCM before they are
 * written to the credentials file. The key is derived from machine-specific data
 * and an optional user-provided passphrase (SHOPLINE_SECRET_PASSPHRASE).
 *
 * Encrypted values are prefixed with "enc:v2:"; unprefixed values are read as
 * plaintext.
 */

import crypto from 'node:crypto';
import os from 'node:os';
import { readTextFile as readSafeTextFile } from '../utils/file-read.js';
import { ConfigurationError, getErrorMessage } from './errors.js';

const ENCRYPTION_PREFIX = 'enc:v2:';
const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 16;
const AUTH_TAG_LENGTH = 16;
const SALT = 'shopline-cli-v1';
const SCRYPT_COST = 2 ** 15;
const SCRYPT_BLOCK_SIZE = 8;
const SCRYPT_PARALLELIZATION = 1;

function getSecretPassphrase(): string | null {
  const configured = process.env.SHOPLINE_SECRET_PASSPHRASE?.trim();
  return configured && configured.length > 0 ? configured : null;
}

function readFirstLine(filePath: string): string | null {
  try {
    const raw = readSafeTextFile(filePath, { label: 'machine identifier', maxBytes: 1_024 });
    const value = raw.split(/\r?\n/)[0]?.trim();
    return value || null;
  } catch {
    return null;
  }
}

function getPrimaryMacAddress(): string | null {
  const candidates: string[] = [];
  for (const iface of Object.values(os.networkInterfaces())) {
    if (!iface) continue;
    for (const item of iface) {
      if (item.internal) continue;
      if (!item.mac || item.mac === '00:00:00:00:00:00') continue;
      candidates.push(item.mac.toLowerCase());
    }
  }
  candidates.sort();
  return candidates[0] ?? null;
}

/**
 * Get a machine-specific identifier for key derivation
 */
function getMachineId(): string {
  for (const candidate of ['/etc/machine-id', '/var/lib/dbus/machine-id']) {
    const value = readFirstLine(candidate);
    if (value) return value;
  }

  const mac = getPrimaryMacAddress();
  if (mac) {
    return `mac:${mac}`;
  }

  return `${os.hostname()}-${os.userInfo().username}`;
}

function deriveKey(): Buffer {
  const passphrase = getSecretPassphrase();
  const material = passphrase ? `${SALT}:pass:${passphrase}` : getMachineId();
  const userSalt = `${SALT}-${os.userInfo().username}`;
  return crypto.scryptSync(material, userSalt, 32, {
    N: SCRYPT_COST,
    r: SCRYPT_BLOCK_SIZE,
    p: SCRYPT_PARALLELIZATION,
    maxmem: 128 * SCRYPT_BLOCK_SIZE * SCRYPT_COST * 2,
  });
}

export function isEncrypted(value: string): boolean {
  return value.startsWith(ENCRYPTION_PREFIX);
}

/**
 * Encrypt a plaintext secret.
 * Returns a string in format: enc:v2:<base64(iv + authTag + ciphertext)>
 */
export function encryptSecret(plaintext: string): string {
  if (!plaintext || isEncrypted(plaintext)) {
    return plaintext;
  }

  const key = deriveKey();
  const iv = crypto.randomBytes(IV_LENGTH);

  const cipher = crypto.createCipheriv(ALGORITHM, key, iv);
  const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
  const authTag = cipher.getAuthTag();

  return ENCRYPTION_PREFIX + Buffer.concat([iv, authTag, encrypted]).toString('base64');
}

/**
 * Decrypt an encrypted secret. Plaintext values are returned as-is.
 */
export function decryptSecret(ciphertext: string): string {
  if (!ciphertext || !isEncrypted(ciphertext)) {
    return ciphertext;
  }

  try {
    const combined = Buffer.from(ciphertext.slice(ENCRYPTION_PREFIX.length), 'base64');
    if (combined.length < IV_LENGTH + AUTH_TAG_LENGTH) {
      throw new Error('Invalid encrypted data: too short');
    }

    const iv = combined.subarray(0, IV_LENGTH);
    const authTag = combined.subarray(IV_LENGTH, IV_LENGTH + AUTH_TAG_LENGTH);
    const encrypted = combined.subarray(IV_LENGTH + AUTH_TAG_LENGTH);

    const decipher = crypto.createDecipheriv(ALGORITHM, deriveKey(), iv);
    decipher.setAuthTag(authTag);

    return Buffer.concat([decipher.update(encrypted), decipher.final()]).toString('utf8');
  } catch (error) {
    throw new ConfigurationError(
      `Failed to decrypt secret: ${getErrorMessage(error)}. ` +
        'This may happen if the credentials were saved on a different machine. ' +
        'Run `spl auth login` to store them again.',
    );
  }
}

/**
 * Redact a secret for display (show first/last few chars)
 */
export function redactSecret(value: string | undefined): string {
  if (!value) return '(not set)';
  if (value.length <= 8) {
    return '*'.repeat(value.length);
  }
  return `${value.slice(0, 4)}...${value.slice(-4)}`;
}
