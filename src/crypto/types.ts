import type { KeyObject } from 'crypto';
import type { Certificate } from '../certificates/types.js';

/**
 * Output of one encrypt+sign operation. Immutable once produced; storage and
 * transport treat it as an opaque JSON value.
 *
 * Binary fields are base64.
 */
export interface EncryptedEnvelope {
    version: 1;
    /** AES-256-CBC ciphertext of the content under a per-envelope session key */
    ciphertext: string;
    iv: string;
    /** Session key, RSA-OAEP encrypted to the recipient */
    wrappedKey: string;
    /** RSA-PSS signature over the content, signer serial and signedAt */
    signature: string;
    /** ISO-8601 signing time, covered by the signature */
    signedAt: string;
    /** Signer's certificate, PEM, embedded verbatim */
    signerCertificate: string;
}

export interface SignerIdentity {
    certificate: Certificate;
    privateKey: KeyObject;
}

export interface DetachedSignature {
    signature: string;
    signedAt: string;
}

export type VerificationResult =
    | { status: 'verified'; plaintext: Buffer; signer: Certificate; signedAt: Date }
    | { status: 'invalid-certificate' }
    | { status: 'untrusted-signer'; reason: 'expired' | 'revoked'; signer: Certificate }
    | { status: 'undecryptable'; signer: Certificate }
    | { status: 'invalid-signature'; signer: Certificate };

export type VerificationStatus = VerificationResult['status'];
