import type { KeyObject } from 'crypto';

/**
 * Self-signed X.509 certificate binding a subject to an RSA public key.
 *
 * Instances only come out of certificate parsing, which has already checked
 * the self-signature, so holding one means the fields match `pem`.
 */
export interface Certificate {
    subjectId: string;
    publicKey: KeyObject;
    /** Lowercase hex */
    serialNumber: string;
    issuedAt: Date;
    expiresAt: Date;
    /** Self-signature over the TBS certificate, hex */
    issuerSignature: string;
    /** Full certificate, PEM encoded (the serialized form) */
    pem: string;
}

export interface KeyPair {
    publicKey: KeyObject;
    privateKey: KeyObject;
}

export interface Identity {
    keyPair: KeyPair;
    certificate: Certificate;
}

export interface CertificateDetails {
    subject: string;
    issuer: string;
    serialNumber: string;
    notBefore: string;
    notAfter: string;
    keyAlgorithm: string;
    signatureAlgorithm: string;
    version: number;
    isCa: boolean;
}

export interface PublicKeyDetails {
    algorithm: 'RSA';
    keySize: number;
    publicExponent: number;
    pem: string;
}
