/**
 * Sharing Protocol
 *
 * Portable export/import of envelopes between installations. The blob is
 * self-contained JSON: verifying it needs nothing beyond the importer's own
 * revocation list.
 *
 * {
 *   "format": "record-trust/envelope",
 *   "version": 1,
 *   "envelope": { ciphertext, iv, wrappedKey, signature, signedAt, signerCertificate, version },
 *   "metadata": { entryId?, title?, createdAt? }
 * }
 *
 * Import only validates structure and certificate integrity. Trust is decided
 * by CryptoManager.verify/inspect, which callers run before using the content.
 */

import { z } from 'zod';
import { logger } from '../app/logger.js';
import { describeCertificate, parseCertificate } from '../certificates/certificate.js';
import type { CertificateDetails } from '../certificates/types.js';
import { isBase64 } from '../crypto/encoding.js';
import { IV_LENGTH } from '../crypto/primitives.js';
import type { EncryptedEnvelope } from '../crypto/types.js';
import { MalformedEnvelopeError } from '../errors.js';

export const ENVELOPE_FORMAT = 'record-trust/envelope';
export const ENVELOPE_FORMAT_VERSION = 1;

const base64Field = z.string().min(1).refine(isBase64, 'must be base64');

const encryptedEnvelopeSchema = z.object({
    version: z.literal(1),
    ciphertext: base64Field,
    iv: base64Field.refine(
        (value) => Buffer.from(value, 'base64').length === IV_LENGTH,
        `must encode ${IV_LENGTH} bytes`,
    ),
    wrappedKey: base64Field,
    signature: base64Field,
    signedAt: z.string().datetime(),
    signerCertificate: z.string().includes('-----BEGIN CERTIFICATE-----'),
});

const metadataSchema = z.object({
    entryId: z.string().optional(),
    title: z.string().optional(),
    createdAt: z.string().optional(),
});

const portableBlobSchema = z.object({
    format: z.literal(ENVELOPE_FORMAT),
    version: z.literal(ENVELOPE_FORMAT_VERSION),
    envelope: encryptedEnvelopeSchema,
    metadata: metadataSchema.optional(),
});

export type EnvelopeMetadata = z.infer<typeof metadataSchema>;

export interface ImportedPackage {
    envelope: EncryptedEnvelope;
    metadata: EnvelopeMetadata;
    /** Who the embedded certificate says signed it (not yet trusted) */
    signer: CertificateDetails;
}

/**
 * Serialize an envelope (and optional entry metadata) into a portable blob.
 */
export function exportEnvelope(envelope: EncryptedEnvelope, metadata?: EnvelopeMetadata): string {
    const blob: z.infer<typeof portableBlobSchema> = {
        format: ENVELOPE_FORMAT,
        version: ENVELOPE_FORMAT_VERSION,
        envelope: {
            version: envelope.version,
            ciphertext: envelope.ciphertext,
            iv: envelope.iv,
            wrappedKey: envelope.wrappedKey,
            signature: envelope.signature,
            signedAt: envelope.signedAt,
            signerCertificate: envelope.signerCertificate,
        },
        ...(metadata ? { metadata } : {}),
    };
    return JSON.stringify(blob, null, 2);
}

/**
 * Parse and structurally validate a portable blob.
 *
 * @throws MalformedEnvelopeError on any structural violation
 * @throws CertificateIntegrityError when the embedded certificate is tampered
 */
export function importPackage(blob: string): ImportedPackage {
    let raw: unknown;
    try {
        raw = JSON.parse(blob);
    } catch {
        throw new MalformedEnvelopeError(['blob is not valid JSON']);
    }

    const result = portableBlobSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues.map((issue) =>
            `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`);
        logger.warn({ issues }, 'Rejected malformed envelope');
        throw new MalformedEnvelopeError(issues);
    }

    const { envelope, metadata } = result.data;
    const signer = describeCertificate(parseCertificate(envelope.signerCertificate));
    logger.debug({ signer: signer.subject, serialNumber: signer.serialNumber }, 'Imported envelope');

    return { envelope, metadata: metadata ?? {}, signer };
}

export function importEnvelope(blob: string): EncryptedEnvelope {
    return importPackage(blob).envelope;
}
