/**
 * X.509 certificate construction and parsing
 *
 * Certificates are self-signed: subject and issuer are both CN=<subjectId> and
 * the signature is made with the private key the certificate attests to. There
 * is no external trust anchor, so integrity means "the embedded public key
 * verifies the embedded signature over the TBS bytes".
 */

import forge from 'node-forge';
import { createPublicKey, type KeyObject } from 'crypto';
import { CertificateIntegrityError } from '../errors.js';
import type { Certificate, CertificateDetails, KeyPair, PublicKeyDetails } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CertificateRequest {
    subjectId: string;
    keyPair: KeyPair;
    serialNumber: string;
    issuedAt: Date;
    validityDays: number;
}

/**
 * Build and self-sign a certificate. X.509 validity has second precision, so
 * `issuedAt` is truncated to the second before the window is computed.
 */
export function buildSelfSignedCertificate(request: CertificateRequest): Certificate {
    const issuedAt = new Date(Math.floor(request.issuedAt.getTime() / 1000) * 1000);
    const expiresAt = new Date(issuedAt.getTime() + request.validityDays * DAY_MS);

    const cert = forge.pki.createCertificate();
    cert.publicKey = forge.pki.publicKeyFromPem(exportPem(request.keyPair.publicKey, 'spki'));
    cert.serialNumber = request.serialNumber;
    cert.validity.notBefore = issuedAt;
    cert.validity.notAfter = expiresAt;

    const attrs = [{ name: 'commonName', value: request.subjectId }];
    cert.setSubject(attrs);
    cert.setIssuer(attrs);
    cert.setExtensions([{ name: 'basicConstraints', cA: false, critical: true }]);

    const signingKey = forge.pki.privateKeyFromPem(exportPem(request.keyPair.privateKey, 'pkcs8'));
    cert.sign(signingKey, forge.md.sha256.create());

    return parseCertificate(forge.pki.certificateToPem(cert));
}

/**
 * Parse a PEM certificate and check its self-signature.
 * Throws CertificateIntegrityError for anything malformed or tampered.
 */
export function parseCertificate(pem: string): Certificate {
    const cert = decodeCertificate(pem);

    const subjectId: unknown = cert.subject.getField('CN')?.value;
    if (typeof subjectId !== 'string' || subjectId.length === 0) {
        throw new CertificateIntegrityError('Certificate has no subject common name');
    }

    const signature: unknown = cert.signature;
    if (typeof signature !== 'string') {
        throw new CertificateIntegrityError('Certificate has no signature');
    }

    return {
        subjectId,
        publicKey: createPublicKey(forge.pki.publicKeyToPem(cert.publicKey)),
        serialNumber: cert.serialNumber.toLowerCase(),
        issuedAt: cert.validity.notBefore,
        expiresAt: cert.validity.notAfter,
        issuerSignature: forge.util.bytesToHex(signature),
        pem: forge.pki.certificateToPem(cert),
    };
}

export function describeCertificate(certificate: Certificate): CertificateDetails {
    const cert = decodeCertificate(certificate.pem);
    const basicConstraints: unknown = cert.getExtension('basicConstraints');
    const publicKey = describePublicKey(certificate.publicKey);

    return {
        subject: certificate.subjectId,
        issuer: readCommonName(cert.issuer) ?? 'Unknown',
        serialNumber: certificate.serialNumber,
        notBefore: certificate.issuedAt.toISOString(),
        notAfter: certificate.expiresAt.toISOString(),
        keyAlgorithm: `RSA ${publicKey.keySize}`,
        signatureAlgorithm: forge.pki.oids[cert.siginfo.algorithmOid] ?? cert.siginfo.algorithmOid,
        version: cert.version + 1,
        isCa: isCaExtension(basicConstraints),
    };
}

export function describePublicKey(publicKey: KeyObject): PublicKeyDetails {
    const details = publicKey.asymmetricKeyDetails;
    if (publicKey.asymmetricKeyType !== 'rsa' || !details?.modulusLength) {
        throw new TypeError('Only RSA public keys are supported');
    }
    return {
        algorithm: 'RSA',
        keySize: details.modulusLength,
        publicExponent: Number(details.publicExponent ?? 65537n),
        pem: exportPem(publicKey, 'spki'),
    };
}

function decodeCertificate(pem: string): forge.pki.Certificate {
    let cert: forge.pki.Certificate;
    try {
        cert = forge.pki.certificateFromPem(pem);
    } catch (error) {
        throw new CertificateIntegrityError('Certificate could not be parsed', { cause: error });
    }

    // Self-signed: the certificate is its own issuer. forge throws when the
    // issuer name does not match the subject, and returns false on a bad signature.
    let verified: boolean;
    try {
        verified = cert.verify(cert);
    } catch (error) {
        throw new CertificateIntegrityError('Certificate self-signature could not be checked', { cause: error });
    }
    if (!verified) {
        throw new CertificateIntegrityError('Certificate self-signature does not verify');
    }
    return cert;
}

function readCommonName(name: forge.pki.Certificate['issuer']): string | undefined {
    const value: unknown = name.getField('CN')?.value;
    return typeof value === 'string' ? value : undefined;
}

function isCaExtension(extension: unknown): boolean {
    return typeof extension === 'object'
        && extension !== null
        && 'cA' in extension
        && extension.cA === true;
}

function exportPem(key: KeyObject, type: 'spki' | 'pkcs8'): string {
    return key.export({ type, format: 'pem' }).toString();
}
