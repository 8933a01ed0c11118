import { describe, it, expect } from 'vitest';
import { createCipheriv, randomBytes, scryptSync } from 'node:crypto';
import { encryptCredentials, decryptCredentials, generateMasterKey } from './secrets.js';
import { CredentialDecryptionError } from '../utils/errors.js';

const masterKey = 'test-master-key-0123456789abcdef';

/** Seal arbitrary plaintext in the envelope layout, bypassing the JSON step. */
function sealPlaintext(plaintext: string, key: string): string {
  const salt = randomBytes(32);
  const iv = randomBytes(12);
  const derived = scryptSync(key, salt, 32, { N: 16384, r: 8, p: 1 });
  const cipher = createCipheriv('aes-256-gcm', derived, iv, { authTagLength: 16 });
  const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf-8'), cipher.final()]);
  return Buffer.concat([Buffer.from('RHCV'), Buffer.from([1]), salt, iv, cipher.getAuthTag(), ciphertext]).toString(
    'base64'
  );
}

function decryptError(envelope: string, key = masterKey): unknown {
  try {
    decryptCredentials(envelope, key, 'ozon');
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('encryptCredentials / decryptCredentials', () => {
  const credentials = { client_id: 'test-client', api_key: 'test-key', note: 'ünïcode ✓' };

  it('round-trips a credential map', () => {
    const sealed = encryptCredentials(credentials, masterKey);
    expect(sealed).not.toContain('test-key');
    expect(decryptCredentials(sealed, masterKey)).toEqual(credentials);
  });

  it('round-trips an empty map', () => {
    expect(decryptCredentials(encryptCredentials({}, masterKey), masterKey)).toEqual({});
  });

  it('writes a versioned envelope with a fresh salt and IV each time', () => {
    const first = Buffer.from(encryptCredentials(credentials, masterKey), 'base64');
    const second = Buffer.from(encryptCredentials(credentials, masterKey), 'base64');
    expect(first.subarray(0, 4).toString('ascii')).toBe('RHCV');
    expect(first[4]).toBe(1);
    expect(first.subarray(5, 49).equals(second.subarray(5, 49))).toBe(false);
  });

  it('opens an envelope sealed outside this module', () => {
    expect(decryptCredentials(sealPlaintext('{"api_key":"test-key"}', masterKey), masterKey)).toEqual({
      api_key: 'test-key',
    });
  });

  it('fails closed on a tampered ciphertext', () => {
    const raw = Buffer.from(encryptCredentials(credentials, masterKey), 'base64');
    const last = raw.length - 1;
    raw[last] = (raw[last] ?? 0) ^ 0x01;

    expect(decryptError(raw.toString('base64'))).toBeInstanceOf(CredentialDecryptionError);
  });

  it('fails closed with the wrong master key', () => {
    const caught = decryptError(encryptCredentials(credentials, masterKey), 'another-test-key');
    expect(caught).toBeInstanceOf(CredentialDecryptionError);
    expect(caught).toMatchObject({ kind: 'credential_decryption', platform: 'ozon' });
  });

  it('names what is wrong with a malformed envelope', () => {
    const raw = Buffer.from(encryptCredentials(credentials, masterKey), 'base64');
    const wrongVersion = Buffer.from(raw);
    wrongVersion[4] = 2;

    expect(decryptError(raw.subarray(0, 20).toString('base64'))).toMatchObject({
      message: 'Failed to decrypt credentials: Envelope is truncated',
    });
    expect(decryptError(Buffer.concat([Buffer.from('XXXX'), raw.subarray(4)]).toString('base64'))).toMatchObject({
      message: 'Failed to decrypt credentials: Not a credential envelope',
    });
    expect(decryptError(wrongVersion.toString('base64'))).toMatchObject({
      message: 'Failed to decrypt credentials: Unsupported envelope version: 2',
    });
  });

  it('rejects a decrypted payload that is not a string map', () => {
    expect(() => decryptCredentials(sealPlaintext('{"api_key":42}', masterKey), masterKey)).toThrow(
      'Decrypted credentials have an unexpected shape'
    );
  });

  it('rejects a decrypted payload that is not JSON', () => {
    expect(() => decryptCredentials(sealPlaintext('not json', masterKey), masterKey)).toThrow(
      'Decrypted credentials are not valid JSON'
    );
  });
});

describe('generateMasterKey', () => {
  it('returns 64 hex characters', () => {
    expect(generateMasterKey()).toMatch(/^[a-f0-9]{64}$/);
  });
});
