/**
 * Unit tests for CryptoManager
 *
 * alice signs, bob receives, mallory holds an unrelated key.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CryptoManager } from '../../src/crypto/crypto-manager.js';
import type { KeyManager } from '../../src/keys/key-manager.js';
import type { EncryptedEnvelope } from '../../src/crypto/types.js';
import type { UnlockedIdentity } from '../../src/identity/identity-vault.js';
import {
  DecryptionError,
  TrustError,
  UntrustedRecipientError,
  UntrustedSignerError,
} from '../../src/errors.js';
import {
  DAY_MS,
  TestClock,
  captureError,
  createTestKeyManager,
  issueTestIdentity,
  tamperCertificatePem,
} from '../helpers/test-trust.js';

const RECORD = 'Blood pressure 120/80, follow-up in 6 weeks';

function flipFirstByte(base64: string): string {
  const bytes = Buffer.from(base64, 'base64');
  bytes[0] ^= 0x01;
  return bytes.toString('base64');
}

describe('CryptoManager', () => {
  let keyManager: KeyManager;
  let clock: TestClock;
  let manager: CryptoManager;
  let alice: UnlockedIdentity;
  let bob: UnlockedIdentity;
  let mallory: UnlockedIdentity;

  beforeEach(async () => {
    ({ keyManager, clock } = createTestKeyManager());
    manager = new CryptoManager({ keyManager, maxSignatureAgeDays: 30 });
    alice = await issueTestIdentity(keyManager, 'alice', 0);
    bob = await issueTestIdentity(keyManager, 'bob', 1);
    mallory = await issueTestIdentity(keyManager, 'mallory', 2);
  });

  describe('encrypt', () => {
    it('produces an envelope the recipient can decrypt', async () => {
      const envelope = await manager.encrypt(RECORD, bob.certificate, alice);
      const plaintext = await manager.decrypt(envelope, bob.privateKey);

      expect(plaintext.toString('utf8')).toBe(RECORD);
    });

    it('embeds the signer certificate and signing time', async () => {
      const envelope = await manager.encrypt(RECORD, bob.certificate, alice);

      expect(envelope.version).toBe(1);
      expect(envelope.signerCertificate).toBe(alice.certificate.pem);
      expect(envelope.signedAt).toBe('2026-03-01T12:00:00.000Z');
      expect(Buffer.from(envelope.iv, 'base64')).toHaveLength(16);
      // RSA-2048 wrapped session key
      expect(Buffer.from(envelope.wrappedKey, 'base64')).toHaveLength(256);
    });

    it('uses a fresh session key and IV for every envelope', async () => {
      const first = await manager.encrypt(RECORD, bob.certificate, alice);
      const second = await manager.encrypt(RECORD, bob.certificate, alice);

      expect(second.iv).not.toBe(first.iv);
      expect(second.ciphertext).not.toBe(first.ciphertext);
      expect(second.wrappedKey).not.toBe(first.wrappedKey);
    });

    it('accepts binary content', async () => {
      const content = Uint8Array.from([0, 1, 2, 254, 255]);
      const envelope = await manager.encrypt(content, bob.certificate, alice);

      expect([...await manager.decrypt(envelope, bob.privateKey)]).toEqual([0, 1, 2, 254, 255]);
    });

    it('refuses a revoked recipient', async () => {
      await keyManager.revoke(bob.certificate.serialNumber);

      const error = await captureError(manager.encrypt(RECORD, bob.certificate, alice));
      expect(error).toBeInstanceOf(UntrustedRecipientError);
      expect(error instanceof UntrustedRecipientError && error.reason).toBe('revoked');
      expect(error instanceof UntrustedRecipientError && error.serialNumber).toBe(bob.certificate.serialNumber);
    });

    it('refuses an expired recipient', async () => {
      clock.advance(366 * DAY_MS);

      const error = await captureError(manager.encrypt(RECORD, bob.certificate, alice));
      expect(error instanceof UntrustedRecipientError && error.reason).toBe('expired');
    });

    it('refuses to sign with a revoked certificate', async () => {
      await keyManager.revoke(alice.certificate.serialNumber);

      await expect(manager.encrypt(RECORD, bob.certificate, alice)).rejects.toThrow(UntrustedSignerError);
    });

    it('refuses a signer whose key does not match its certificate', async () => {
      const impostor = { certificate: alice.certificate, privateKey: mallory.privateKey };

      await expect(manager.encrypt(RECORD, bob.certificate, impostor)).rejects.toThrow(TrustError);
    });
  });

  describe('decrypt', () => {
    let envelope: EncryptedEnvelope;

    beforeEach(async () => {
      envelope = await manager.encrypt(RECORD, bob.certificate, alice);
    });

    it('fails with DecryptionError under the wrong key', async () => {
      await expect(manager.decrypt(envelope, mallory.privateKey)).rejects.toThrow(DecryptionError);
      await expect(manager.decrypt(envelope, mallory.privateKey)).rejects.toThrow('Unable to decrypt envelope');
    });

    it('fails with the same error on malformed fields', async () => {
      await expect(manager.decrypt({ ...envelope, iv: 'AAAA' }, bob.privateKey)).rejects.toThrow(DecryptionError);
      await expect(manager.decrypt({ ...envelope, wrappedKey: '%%%' }, bob.privateKey)).rejects.toThrow(DecryptionError);
    });

    it('wipes the unwrapped session key when the ciphertext is rejected', async () => {
      const fill = vi.spyOn(Buffer.prototype, 'fill');
      try {
        // 15 bytes is not a whole AES block, so decryption fails after the unwrap
        const truncated = { ...envelope, ciphertext: Buffer.alloc(15).toString('base64') };
        await expect(manager.decrypt(truncated, bob.privateKey)).rejects.toThrow(DecryptionError);

        const wiped = fill.mock.contexts.filter((buffer) =>
          buffer instanceof Buffer && buffer.length === 32 && buffer.every((byte) => byte === 0));
        expect(wiped.length).toBeGreaterThan(0);
      } finally {
        fill.mockRestore();
      }
    });

    it('still works after the signer is revoked', async () => {
      await keyManager.revoke(alice.certificate.serialNumber);

      expect((await manager.decrypt(envelope, bob.privateKey)).toString('utf8')).toBe(RECORD);
    });
  });

  describe('verify and inspect', () => {
    let envelope: EncryptedEnvelope;

    beforeEach(async () => {
      envelope = await manager.encrypt(RECORD, bob.certificate, alice);
    });

    it('verifies an untouched envelope', async () => {
      expect(await manager.verify(envelope, bob.privateKey)).toBe(true);

      const result = await manager.inspect(envelope, bob.privateKey);
      expect(result.status).toBe('verified');
      if (result.status === 'verified') {
        expect(result.plaintext.toString('utf8')).toBe(RECORD);
        expect(result.signer.serialNumber).toBe(alice.certificate.serialNumber);
        expect(result.signedAt.toISOString()).toBe('2026-03-01T12:00:00.000Z');
      }
    });

    it('stops verifying once the signer is revoked', async () => {
      await keyManager.revoke(alice.certificate.serialNumber);

      expect(await manager.verify(envelope, bob.privateKey)).toBe(false);
      expect(await manager.inspect(envelope, bob.privateKey))
        .toMatchObject({ status: 'untrusted-signer', reason: 'revoked' });
    });

    it('returns false rather than throwing once the signer expired', async () => {
      clock.advance(365 * DAY_MS);

      expect(await manager.verify(envelope, bob.privateKey)).toBe(false);
      expect(await manager.inspect(envelope, bob.privateKey))
        .toMatchObject({ status: 'untrusted-signer', reason: 'expired' });
    });

    it('still verifies a signature older than the maximum age', async () => {
      clock.advance(31 * DAY_MS);

      expect(await manager.verify(envelope, bob.privateKey)).toBe(true);
    });

    it('rejects a signature with one flipped bit', async () => {
      const tampered = { ...envelope, signature: flipFirstByte(envelope.signature) };

      expect(await manager.verify(tampered, bob.privateKey)).toBe(false);
      expect((await manager.inspect(tampered, bob.privateKey)).status).toBe('invalid-signature');
    });

    it('rejects a changed signing time', async () => {
      const tampered = { ...envelope, signedAt: '2026-03-01T12:00:01.000Z' };

      expect((await manager.inspect(tampered, bob.privateKey)).status).toBe('invalid-signature');
    });

    it('rejects tampered ciphertext', async () => {
      const tampered = { ...envelope, ciphertext: flipFirstByte(envelope.ciphertext) };

      expect(await manager.verify(tampered, bob.privateKey)).toBe(false);
    });

    it('rejects a swapped signer certificate', async () => {
      const tampered = { ...envelope, signerCertificate: mallory.certificate.pem };

      expect((await manager.inspect(tampered, bob.privateKey)).status).toBe('invalid-signature');
    });

    it('rejects a tampered signer certificate', async () => {
      const tampered = { ...envelope, signerCertificate: tamperCertificatePem(envelope.signerCertificate) };

      expect(await manager.inspect(tampered, bob.privateKey)).toEqual({ status: 'invalid-certificate' });
    });

    it('reports undecryptable when given the wrong key', async () => {
      expect(await manager.verify(envelope, mallory.privateKey)).toBe(false);
      expect((await manager.inspect(envelope, mallory.privateKey)).status).toBe('undecryptable');
    });
  });

  describe('detached signatures', () => {
    it('verifies only the signed content', () => {
      const { signature, signedAt } = manager.sign('entry body', alice);

      expect(manager.verifySignature('entry body', signedAt, signature, alice.certificate)).toBe(true);
      expect(manager.verifySignature('entry body!', signedAt, signature, alice.certificate)).toBe(false);
      expect(manager.verifySignature('entry body', signedAt, signature, mallory.certificate)).toBe(false);
    });

    it('rejects a signature that is not base64', () => {
      const { signedAt } = manager.sign('entry body', alice);

      expect(manager.verifySignature('entry body', signedAt, 'not base64!', alice.certificate)).toBe(false);
    });
  });
});
