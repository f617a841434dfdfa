/**
 * Unit tests for KeyStore
 *
 * Uses the minimum iteration count so PBKDF2 does not dominate test time.
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { KeyStore, type KeyStoreRecord } from '../../src/keystore/key-store.js';
import { AuthenticationError } from '../../src/errors.js';
import type { KeyPair } from '../../src/certificates/types.js';
import { captureError, sharedKeyPair } from '../helpers/test-trust.js';

function pkcs8(keyPair: KeyPair): string {
  return keyPair.privateKey.export({ type: 'pkcs8', format: 'pem' }).toString();
}

describe('KeyStore', () => {
  const keyStore = new KeyStore({ iterations: 1000, saltBytes: 16 });
  let keyPair: KeyPair;
  let record: KeyStoreRecord;

  beforeAll(async () => {
    keyPair = await sharedKeyPair(0);
    record = await keyStore.seal(keyPair.privateKey, 'test-secret');
  });

  it('round-trips a private key under the right password', async () => {
    const privateKey = await keyStore.unlock(record, 'test-secret');
    expect(privateKey.export({ type: 'pkcs8', format: 'pem' }).toString()).toBe(pkcs8(keyPair));
  });

  it('records its KDF parameters', () => {
    expect(record.version).toBe(1);
    expect(record.kdf).toBe('pbkdf2-sha256');
    expect(record.iterations).toBe(1000);
    expect(Buffer.from(record.salt, 'base64')).toHaveLength(16);
    expect(Buffer.from(record.iv, 'base64')).toHaveLength(16);
  });

  it('never stores the key in the clear', () => {
    const body = pkcs8(keyPair).split('\n')[1];
    expect(JSON.stringify(record).includes(body)).toBe(false);
  });

  it('uses a fresh salt and IV for every seal', async () => {
    const again = await keyStore.seal(keyPair.privateKey, 'test-secret');
    expect(again.salt).not.toBe(record.salt);
    expect(again.iv).not.toBe(record.iv);
    expect(again.ciphertext).not.toBe(record.ciphertext);
  });

  it('reports a wrong password and a corrupted record identically', async () => {
    const wrongPassword = await captureError(keyStore.unlock(record, 'wrong-secret'));
    const corrupted = await captureError(keyStore.unlock({ ...record, ciphertext: 'AAAA' }, 'test-secret'));
    const malformed = await captureError(keyStore.unlock({ version: 1 }, 'test-secret'));

    for (const error of [wrongPassword, corrupted, malformed]) {
      expect(error).toBeInstanceOf(AuthenticationError);
      expect(error).toHaveProperty('message', 'Unable to unlock key store');
      expect(error instanceof Error && error.cause).toBeUndefined();
    }
  });

  it('unlocks records sealed with a different iteration count', async () => {
    const stronger = new KeyStore({ iterations: 2000, saltBytes: 32 });
    const sealed = await stronger.seal(keyPair.privateKey, 'test-secret');

    const privateKey = await keyStore.unlock(sealed, 'test-secret');
    expect(privateKey.export({ type: 'pkcs8', format: 'pem' }).toString()).toBe(pkcs8(keyPair));
  });

  it('reseals under a new password', async () => {
    const resealed = await keyStore.reseal(record, 'test-secret', 'new-test-secret');

    await expect(keyStore.unlock(resealed, 'test-secret')).rejects.toThrow(AuthenticationError);
    const privateKey = await keyStore.unlock(resealed, 'new-test-secret');
    expect(privateKey.export({ type: 'pkcs8', format: 'pem' }).toString()).toBe(pkcs8(keyPair));
  });

  it('refuses to reseal with the wrong old password', async () => {
    await expect(keyStore.reseal(record, 'wrong-secret', 'new-test-secret')).rejects.toThrow(AuthenticationError);
  });

  it('refuses to seal a public key', async () => {
    await expect(keyStore.seal(keyPair.publicKey, 'test-secret')).rejects.toThrow(TypeError);
  });
});
