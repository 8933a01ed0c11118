/**
 * Credential envelopes
 *
 * A credential map is serialized to JSON and sealed with AES-256-GCM under a
 * key derived from the master key by scrypt, with a fresh salt and IV per
 * envelope. Layout, base64 encoded:
 *
 *   "RHCV" | version (1) | salt (32) | iv (12) | auth tag (16) | ciphertext
 *
 * Anything that fails to open surfaces as CredentialDecryptionError, never as
 * partial plaintext.
 */

import { createCipheriv, createDecipheriv, randomBytes, scryptSync } from 'node:crypto';
import { CredentialMapSchema, type CredentialMap } from '@relayhub/shared';
import { CredentialDecryptionError, toErrorMessage } from '../utils/errors.js';

const ALGORITHM = 'aes-256-gcm';
const MAGIC = Buffer.from('RHCV');
const VERSION = 1;
const SALT_LENGTH = 32;
const IV_LENGTH = 12;
const TAG_LENGTH = 16;
const KEY_LENGTH = 32;
const SCRYPT_OPTIONS = { N: 16384, r: 8, p: 1 };

const HEADER_LENGTH = MAGIC.length + 1 + SALT_LENGTH + IV_LENGTH + TAG_LENGTH;

function withKey<T>(masterKey: string, salt: Buffer, use: (key: Buffer) => T): T {
  const key = scryptSync(masterKey, salt, KEY_LENGTH, SCRYPT_OPTIONS);
  try {
    return use(key);
  } finally {
    key.fill(0);
  }
}

function seal(plaintext: Buffer, masterKey: string): Buffer {
  const salt = randomBytes(SALT_LENGTH);
  const iv = randomBytes(IV_LENGTH);
  return withKey(masterKey, salt, (key) => {
    const cipher = createCipheriv(ALGORITHM, key, iv, { authTagLength: TAG_LENGTH });
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
    return Buffer.concat([MAGIC, Buffer.from([VERSION]), salt, iv, cipher.getAuthTag(), ciphertext]);
  });
}

function open(envelope: Buffer, masterKey: string): Buffer {
  if (envelope.length < HEADER_LENGTH) {
    throw new Error('Envelope is truncated');
  }
  if (!envelope.subarray(0, MAGIC.length).equals(MAGIC)) {
    throw new Error('Not a credential envelope');
  }
  const version = envelope.readUInt8(MAGIC.length);
  if (version !== VERSION) {
    throw new Error(`Unsupported envelope version: ${version}`);
  }

  let offset = MAGIC.length + 1;
  const take = (length: number): Buffer => {
    const field = envelope.subarray(offset, offset + length);
    offset += length;
    return field;
  };
  const salt = take(SALT_LENGTH);
  const iv = take(IV_LENGTH);
  const tag = take(TAG_LENGTH);
  const ciphertext = envelope.subarray(offset);

  return withKey(masterKey, salt, (key) => {
    const decipher = createDecipheriv(ALGORITHM, key, iv, { authTagLength: TAG_LENGTH });
    decipher.setAuthTag(tag);
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  });
}

/**
 * Generate a random master key (hex, 256 bits).
 */
export function generateMasterKey(): string {
  return randomBytes(KEY_LENGTH).toString('hex');
}

export function encryptCredentials(credentials: CredentialMap, masterKey: string): string {
  const plaintext = Buffer.from(JSON.stringify(credentials), 'utf-8');
  try {
    return seal(plaintext, masterKey).toString('base64');
  } finally {
    plaintext.fill(0);
  }
}

export function decryptCredentials(
  envelope: string,
  masterKey: string,
  platform?: string
): CredentialMap {
  let plaintext: Buffer;
  try {
    plaintext = open(Buffer.from(envelope, 'base64'), masterKey);
  } catch (err) {
    throw new CredentialDecryptionError(
      `Failed to decrypt credentials: ${toErrorMessage(err)}`,
      platform,
      { cause: err }
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(plaintext.toString('utf-8'));
  } catch (err) {
    throw new CredentialDecryptionError('Decrypted credentials are not valid JSON', platform, {
      cause: err,
    });
  } finally {
    plaintext.fill(0);
  }

  const result = CredentialMapSchema.safeParse(parsed);
  if (!result.success) {
    throw new CredentialDecryptionError('Decrypted credentials have an unexpected shape', platform);
  }
  return result.data;
}
