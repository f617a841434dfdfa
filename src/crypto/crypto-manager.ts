/**
 * Crypto Manager
 *
 * Hybrid encryption and signing of records:
 * - encrypt: AES-256-CBC under a fresh session key + IV, session key wrapped
 *   to the recipient with RSA-OAEP, content signed with RSA-PSS
 * - decrypt: unwrap, then decrypt; independent of revocation state
 * - inspect/verify: signer trust (re-evaluated now) -> decrypt -> signature
 *   over the recovered plaintext
 *
 * Signed payload (canonical JSON, sorted keys):
 *   { content: base64(plaintext), serialNumber: <signer serial>, signedAt: <ISO> }
 */

import type { KeyObject } from 'crypto';
import stableStringify from 'json-stable-stringify';
import { logger } from '../app/logger.js';
import { getSignatureConfig } from '../app/config.js';
import { parseCertificate } from '../certificates/certificate.js';
import type { Certificate } from '../certificates/types.js';
import {
    CertificateIntegrityError,
    DecryptionError,
    TrustError,
    UntrustedRecipientError,
    UntrustedSignerError,
} from '../errors.js';
import type { KeyManager } from '../keys/key-manager.js';
import { base64ToBytes, bytesToBase64, isBase64 } from './encoding.js';
import {
    IV_LENGTH,
    SESSION_KEY_LENGTH,
    aesCbcDecrypt,
    aesCbcEncrypt,
    generateIv,
    generateSessionKey,
    pssSign,
    pssVerify,
    unwrapSessionKey,
    wrapSessionKey,
} from './primitives.js';
import type {
    DetachedSignature,
    EncryptedEnvelope,
    SignerIdentity,
    VerificationResult,
} from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CryptoManagerConfig {
    keyManager: KeyManager;
    /** Signatures older than this are logged as stale (defaults to signature.maxAgeDays) */
    maxSignatureAgeDays?: number;
}

function toBuffer(data: Uint8Array | string): Buffer {
    return typeof data === 'string' ? Buffer.from(data, 'utf8') : Buffer.from(data);
}

function signedPayload(content: Buffer, serialNumber: string, signedAt: string): Buffer {
    const canonical = stableStringify({
        content: bytesToBase64(content),
        serialNumber,
        signedAt,
    });
    if (canonical === undefined) {
        throw new TypeError('Signed payload could not be serialized');
    }
    return Buffer.from(canonical, 'utf8');
}

export class CryptoManager {
    private keyManager: KeyManager;
    private maxSignatureAgeDays: number;

    constructor(config: CryptoManagerConfig) {
        this.keyManager = config.keyManager;
        this.maxSignatureAgeDays = config.maxSignatureAgeDays ?? getSignatureConfig().maxAgeDays;
    }

    /**
     * Encrypt content to a recipient and sign it as `signer`.
     *
     * Both certificates are checked against one revocation snapshot: the
     * recipient must be trusted (UntrustedRecipientError) and so must the
     * signer (UntrustedSignerError).
     */
    async encrypt(
        plaintext: Uint8Array | string,
        recipient: Certificate,
        signer: SignerIdentity,
    ): Promise<EncryptedEnvelope> {
        const trust = await this.keyManager.trustSnapshot();

        const recipientTrust = trust.evaluate(recipient);
        if (!recipientTrust.trusted) {
            logger.warn({
                serialNumber: recipient.serialNumber,
                reason: recipientTrust.reason,
            }, 'Refusing to encrypt to untrusted recipient');
            throw new UntrustedRecipientError(recipient.serialNumber, recipientTrust.reason);
        }

        const signerTrust = trust.evaluate(signer.certificate);
        if (!signerTrust.trusted) {
            logger.warn({
                serialNumber: signer.certificate.serialNumber,
                reason: signerTrust.reason,
            }, 'Refusing to sign with untrusted certificate');
            throw new UntrustedSignerError(signer.certificate.serialNumber, signerTrust.reason);
        }

        const content = toBuffer(plaintext);
        const sessionKey = generateSessionKey();
        const iv = generateIv();

        const ciphertext = aesCbcEncrypt(sessionKey, iv, content);
        const wrappedKey = wrapSessionKey(recipient.publicKey, sessionKey);
        sessionKey.fill(0);

        const { signature, signedAt } = this.sign(content, signer);

        logger.debug({
            recipient: recipient.serialNumber,
            signer: signer.certificate.serialNumber,
            bytes: content.length,
        }, 'Encrypted envelope');

        return {
            version: 1,
            ciphertext: bytesToBase64(ciphertext),
            iv: bytesToBase64(iv),
            wrappedKey: bytesToBase64(wrappedKey),
            signature,
            signedAt,
            signerCertificate: signer.certificate.pem,
        };
    }

    /**
     * Recover the content. Every failure is the same DecryptionError.
     */
    async decrypt(envelope: EncryptedEnvelope, recipientPrivateKey: KeyObject): Promise<Buffer> {
        let sessionKey: Buffer | undefined;
        try {
            const iv = base64ToBytes(envelope.iv);
            if (iv.length !== IV_LENGTH) throw new RangeError('Invalid IV length');

            sessionKey = unwrapSessionKey(recipientPrivateKey, base64ToBytes(envelope.wrappedKey));
            if (sessionKey.length !== SESSION_KEY_LENGTH) throw new RangeError('Invalid session key length');

            return aesCbcDecrypt(sessionKey, iv, base64ToBytes(envelope.ciphertext));
        } catch {
            logger.debug('Envelope decryption failed');
            throw new DecryptionError();
        } finally {
            sessionKey?.fill(0);
        }
    }

    /**
     * True only when the signer is trusted now, the envelope decrypts and the
     * signature matches the decrypted content.
     */
    async verify(envelope: EncryptedEnvelope, recipientPrivateKey: KeyObject): Promise<boolean> {
        return (await this.inspect(envelope, recipientPrivateKey)).status === 'verified';
    }

    /**
     * Verification with the reason spelled out. Never throws on bad input.
     */
    async inspect(envelope: EncryptedEnvelope, recipientPrivateKey: KeyObject): Promise<VerificationResult> {
        let signer: Certificate;
        try {
            signer = parseCertificate(envelope.signerCertificate);
        } catch (error) {
            if (!(error instanceof CertificateIntegrityError)) throw error;
            logger.warn('Envelope carries a malformed or tampered signer certificate');
            return { status: 'invalid-certificate' };
        }

        // Untrusted signer: stop before any cryptographic work
        const trust = (await this.keyManager.trustSnapshot()).evaluate(signer);
        if (!trust.trusted) {
            logger.warn({ serialNumber: signer.serialNumber, reason: trust.reason }, 'Signer certificate not trusted');
            return { status: 'untrusted-signer', reason: trust.reason, signer };
        }

        let plaintext: Buffer;
        try {
            plaintext = await this.decrypt(envelope, recipientPrivateKey);
        } catch (error) {
            if (!(error instanceof DecryptionError)) throw error;
            return { status: 'undecryptable', signer };
        }

        const signedAt = new Date(envelope.signedAt);
        if (Number.isNaN(signedAt.getTime())
            || !this.verifySignature(plaintext, envelope.signedAt, envelope.signature, signer)) {
            plaintext.fill(0);
            logger.warn({ serialNumber: signer.serialNumber }, 'Envelope signature does not verify');
            return { status: 'invalid-signature', signer };
        }

        const ageDays = (this.keyManager.now().getTime() - signedAt.getTime()) / DAY_MS;
        if (ageDays > this.maxSignatureAgeDays) {
            logger.warn({
                serialNumber: signer.serialNumber,
                signedAt: envelope.signedAt,
                maxAgeDays: this.maxSignatureAgeDays,
            }, 'Signature is older than the configured maximum age');
        }

        return { status: 'verified', plaintext, signer, signedAt };
    }

    /**
     * Detached RSA-PSS signature over content, bound to the signer's serial
     * and the signing time.
     */
    sign(data: Uint8Array | string, signer: SignerIdentity): DetachedSignature {
        const content = toBuffer(data);
        const signedAt = this.keyManager.now().toISOString();
        const payload = signedPayload(content, signer.certificate.serialNumber, signedAt);
        const signature = pssSign(signer.privateKey, payload);

        if (!pssVerify(signer.certificate.publicKey, payload, signature)) {
            throw new TrustError('Signer private key does not match signer certificate');
        }
        return { signature: bytesToBase64(signature), signedAt };
    }

    /**
     * Pure signature check; does not consult revocation state.
     */
    verifySignature(
        data: Uint8Array | string,
        signedAt: string,
        signature: string,
        certificate: Certificate,
    ): boolean {
        if (!isBase64(signature)) return false;
        const payload = signedPayload(toBuffer(data), certificate.serialNumber, signedAt);
        try {
            return pssVerify(certificate.publicKey, payload, base64ToBytes(signature));
        } catch (error) {
            logger.debug({ error }, 'Signature check raised');
            return false;
        }
    }
}
