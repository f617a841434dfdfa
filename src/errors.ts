/**
 * Error taxonomy
 *
 * Every failure surfaced by this library is a TrustError subclass, so callers
 * can tell policy rejections (untrusted certificates) apart from cryptographic
 * failures. None of these are retried internally.
 */

/** Base error for all trust-subsystem failures. */
export class TrustError extends Error {
  override name = 'TrustError';
}

/** Key pair or certificate generation failed in the underlying primitive. */
export class KeyGenerationError extends TrustError {
  override name = 'KeyGenerationError';
}

/** Certificate is malformed or its self-signature does not verify. */
export class CertificateIntegrityError extends TrustError {
  override name = 'CertificateIntegrityError';
}

/** Recipient certificate is expired or revoked. */
export class UntrustedRecipientError extends TrustError {
  override name = 'UntrustedRecipientError';

  constructor(
    readonly serialNumber: string,
    readonly reason: 'expired' | 'revoked',
  ) {
    super(`Recipient certificate ${serialNumber} is not trusted (${reason})`);
  }
}

/** Signer certificate is expired or revoked at signing time. */
export class UntrustedSignerError extends TrustError {
  override name = 'UntrustedSignerError';

  constructor(
    readonly serialNumber: string,
    readonly reason: 'expired' | 'revoked',
  ) {
    super(`Signer certificate ${serialNumber} is not trusted (${reason})`);
  }
}

/**
 * Envelope could not be decrypted. The message is fixed: wrong key, corrupted
 * ciphertext and bad padding are reported identically.
 */
export class DecryptionError extends TrustError {
  override name = 'DecryptionError';

  constructor() {
    super('Unable to decrypt envelope');
  }
}

/**
 * Key store could not be unlocked. Wrong password and corrupted record are
 * reported identically.
 */
export class AuthenticationError extends TrustError {
  override name = 'AuthenticationError';

  constructor() {
    super('Unable to unlock key store');
  }
}

/** Export blob failed structural validation on import. */
export class MalformedEnvelopeError extends TrustError {
  override name = 'MalformedEnvelopeError';

  constructor(readonly issues: string[]) {
    super(`Malformed envelope: ${issues.join('; ')}`);
  }
}

/** Identity vault lookup or provisioning failure. */
export class IdentityError extends TrustError {
  override name = 'IdentityError';
}

/** Revocation list could not be read, written or confirmed on disk. */
export class RevocationStoreError extends TrustError {
  override name = 'RevocationStoreError';
}

export function isTrustError(err: unknown): err is TrustError {
  return err instanceof TrustError;
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
