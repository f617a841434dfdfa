/**
 * Thin wrappers over node:crypto for the hybrid envelope.
 *
 * - Bulk: AES-256-CBC, PKCS#7 padding
 * - Key wrapping: RSA-OAEP, SHA-256 / MGF1-SHA-256
 * - Signatures: RSA-PSS, SHA-256 / MGF1-SHA-256, maximum salt length
 */

import {
    constants,
    createCipheriv,
    createDecipheriv,
    privateDecrypt,
    publicEncrypt,
    randomBytes,
    sign,
    verify,
    type KeyObject,
} from 'crypto';

export const SESSION_KEY_LENGTH = 32;
export const IV_LENGTH = 16;

const CIPHER = 'aes-256-cbc';

export function generateSessionKey(): Buffer {
    return randomBytes(SESSION_KEY_LENGTH);
}

export function generateIv(): Buffer {
    return randomBytes(IV_LENGTH);
}

export function aesCbcEncrypt(key: Buffer, iv: Buffer, plaintext: Buffer): Buffer {
    const cipher = createCipheriv(CIPHER, key, iv);
    return Buffer.concat([cipher.update(plaintext), cipher.final()]);
}

export function aesCbcDecrypt(key: Buffer, iv: Buffer, ciphertext: Buffer): Buffer {
    const decipher = createDecipheriv(CIPHER, key, iv);
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
}

export function wrapSessionKey(publicKey: KeyObject, sessionKey: Buffer): Buffer {
    return publicEncrypt(
        { key: publicKey, padding: constants.RSA_PKCS1_OAEP_PADDING, oaepHash: 'sha256' },
        sessionKey,
    );
}

export function unwrapSessionKey(privateKey: KeyObject, wrappedKey: Buffer): Buffer {
    return privateDecrypt(
        { key: privateKey, padding: constants.RSA_PKCS1_OAEP_PADDING, oaepHash: 'sha256' },
        wrappedKey,
    );
}

export function pssSign(privateKey: KeyObject, data: Buffer): Buffer {
    return sign('sha256', data, {
        key: privateKey,
        padding: constants.RSA_PKCS1_PSS_PADDING,
        saltLength: constants.RSA_PSS_SALTLEN_MAX_SIGN,
    });
}

export function pssVerify(publicKey: KeyObject, data: Buffer, signature: Buffer): boolean {
    return verify('sha256', data, {
        key: publicKey,
        padding: constants.RSA_PKCS1_PSS_PADDING,
        saltLength: constants.RSA_PSS_SALTLEN_AUTO,
    }, signature);
}
