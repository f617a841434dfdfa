/**
 * Key Manager
 *
 * Identity issuance and trust-state authority:
 * - Generates RSA key pairs and self-signed certificates
 * - Parses serialized certificates (integrity-checked)
 * - Appends to the shared revocation list
 * - Answers "is this certificate trusted right now?"
 *
 * A certificate is trusted while now < expiresAt and its serial is absent from
 * the revocation list. Trust is always evaluated against a single snapshot of
 * the list, so one operation never sees a serial both revoked and not revoked.
 */

import { logger } from '../app/logger.js';
import { getCertificateConfig } from '../app/config.js';
import { generateSerialNumber, normalizeSerialNumber } from '../app/id-generator.js';
import { KeyGenerationError, TrustError } from '../errors.js';
import {
    buildSelfSignedCertificate,
    describeCertificate,
    describePublicKey,
    parseCertificate,
} from '../certificates/certificate.js';
import type {
    Certificate,
    CertificateDetails,
    Identity,
    KeyPair,
    PublicKeyDetails,
} from '../certificates/types.js';
import type { RevocationEntry, RevocationStore } from '../revocation/types.js';
import { generateRsaKeyPair } from './key-generator.js';

export type TrustStatus =
    | { trusted: true }
    | { trusted: false; reason: 'expired' | 'revoked' };

export interface KeyManagerConfig {
    revocationStore: RevocationStore;
    /** RSA modulus length (defaults to certificate.keySize from config) */
    keySize?: number;
    /** Certificate validity window (defaults to certificate.validityDays from config) */
    validityDays?: number;
    /** Clock used for issuance and expiry checks */
    now?: () => Date;
}

/**
 * Revocation state frozen at one instant, plus the evaluation time.
 */
export class TrustSnapshot {
    constructor(
        private readonly revoked: ReadonlySet<string>,
        readonly at: Date,
    ) {}

    evaluate(certificate: Certificate): TrustStatus {
        if (this.at.getTime() >= certificate.expiresAt.getTime()) {
            return { trusted: false, reason: 'expired' };
        }
        if (this.revoked.has(certificate.serialNumber)) {
            return { trusted: false, reason: 'revoked' };
        }
        return { trusted: true };
    }
}

export class KeyManager {
    private revocationStore: RevocationStore;
    private keySize: number;
    private validityDays: number;
    private clock: () => Date;
    private issuedSerials = new Set<string>();

    constructor(config: KeyManagerConfig) {
        this.revocationStore = config.revocationStore;
        this.keySize = config.keySize ?? getCertificateConfig().keySize;
        this.validityDays = config.validityDays ?? getCertificateConfig().validityDays;
        this.clock = config.now ?? (() => new Date());
    }

    now(): Date {
        return this.clock();
    }

    /**
     * Generate a key pair and a self-signed certificate for a subject.
     */
    async generateIdentity(subjectId: string): Promise<Identity> {
        if (subjectId.trim().length === 0) {
            throw new KeyGenerationError('Subject id must not be empty');
        }

        let keyPair: KeyPair;
        try {
            keyPair = await generateRsaKeyPair(this.keySize);
        } catch (error) {
            logger.error({ subjectId, keySize: this.keySize, error }, 'RSA key pair generation failed');
            throw new KeyGenerationError('RSA key pair generation failed', { cause: error });
        }

        const certificate = this.issueCertificate(subjectId, keyPair);
        return { keyPair, certificate };
    }

    /**
     * Issue a fresh self-signed certificate for an existing key pair
     * (new serial, new validity window).
     */
    issueCertificate(subjectId: string, keyPair: KeyPair): Certificate {
        const serialNumber = this.nextSerialNumber();
        let certificate: Certificate;
        try {
            certificate = buildSelfSignedCertificate({
                subjectId,
                keyPair,
                serialNumber,
                issuedAt: this.now(),
                validityDays: this.validityDays,
            });
        } catch (error) {
            this.issuedSerials.delete(serialNumber);
            if (error instanceof TrustError) throw error;
            logger.error({ subjectId, error }, 'Certificate issuance failed');
            throw new KeyGenerationError('Certificate issuance failed', { cause: error });
        }

        logger.info({
            subjectId,
            serialNumber,
            expiresAt: certificate.expiresAt.toISOString(),
        }, 'Issued self-signed certificate');
        return certificate;
    }

    parseCertificate(pem: string): Certificate {
        return parseCertificate(pem);
    }

    describeCertificate(certificate: Certificate): CertificateDetails {
        return describeCertificate(certificate);
    }

    describePublicKey(certificate: Certificate): PublicKeyDetails {
        return describePublicKey(certificate.publicKey);
    }

    /**
     * Add a serial to the revocation list. Idempotent; resolves once the entry
     * is durable.
     *
     * @returns true when newly revoked, false when it already was
     */
    async revoke(serialNumber: string, revokedBy?: string): Promise<boolean> {
        const entry: RevocationEntry = {
            serialNumber: normalizeSerialNumber(serialNumber),
            revokedAt: this.now().toISOString(),
            ...(revokedBy ? { revokedBy } : {}),
        };

        const added = await this.revocationStore.add(entry);
        if (added) {
            logger.info({ serialNumber: entry.serialNumber, revokedBy }, 'Certificate revoked');
        } else {
            logger.debug({ serialNumber: entry.serialNumber }, 'Certificate already revoked');
        }
        return added;
    }

    async isRevoked(serialNumber: string): Promise<boolean> {
        return this.revocationStore.has(normalizeSerialNumber(serialNumber));
    }

    async listRevoked(): Promise<RevocationEntry[]> {
        return this.revocationStore.list();
    }

    async trustSnapshot(): Promise<TrustSnapshot> {
        return new TrustSnapshot(await this.revocationStore.snapshot(), this.now());
    }

    async evaluateTrust(certificate: Certificate): Promise<TrustStatus> {
        return (await this.trustSnapshot()).evaluate(certificate);
    }

    async isTrusted(certificate: Certificate): Promise<boolean> {
        return (await this.evaluateTrust(certificate)).trusted;
    }

    private nextSerialNumber(): string {
        let serialNumber = generateSerialNumber();
        while (this.issuedSerials.has(serialNumber)) {
            serialNumber = generateSerialNumber();
        }
        this.issuedSerials.add(serialNumber);
        return serialNumber;
    }
}
