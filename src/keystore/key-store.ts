/**
 * Key Store
 *
 * At-rest protection of a user's private key:
 *   key        = PBKDF2-HMAC-SHA256(password, salt, iterations, 32 bytes)
 *   ciphertext = AES-256-CBC(key, iv, PKCS#8 PEM of the private key)
 *
 * Each record carries its own salt and iteration count, so raising the
 * configured iteration count only affects records sealed afterwards.
 */

import { createCipheriv, createDecipheriv, createPrivateKey, pbkdf2, randomBytes, type KeyObject } from 'crypto';
import { promisify } from 'util';
import { z } from 'zod';
import { logger } from '../app/logger.js';
import { getKeyStoreConfig, type KeyStoreConfig } from '../app/config.js';
import { AuthenticationError } from '../errors.js';
import { base64ToBytes, bytesToBase64, isBase64 } from '../crypto/encoding.js';

const pbkdf2Async = promisify(pbkdf2);

const ALGORITHM = 'aes-256-cbc';
const KEY_LENGTH = 32;
const IV_LENGTH = 16;

const base64String = z.string().refine(isBase64, 'must be base64');

export const keyStoreRecordSchema = z.object({
    version: z.literal(1),
    kdf: z.literal('pbkdf2-sha256'),
    salt: base64String,
    iterations: z.number().int().positive(),
    iv: base64String,
    ciphertext: base64String,
});

export type KeyStoreRecord = z.infer<typeof keyStoreRecordSchema>;

async function deriveKey(password: string, salt: Buffer, iterations: number): Promise<Buffer> {
    return pbkdf2Async(password, salt, iterations, KEY_LENGTH, 'sha256');
}

export class KeyStore {
    private iterations: number;
    private saltBytes: number;

    constructor(config: KeyStoreConfig = getKeyStoreConfig()) {
        this.iterations = config.iterations;
        this.saltBytes = config.saltBytes;
    }

    /**
     * Encrypt a private key under a password-derived key with a fresh salt and IV.
     */
    async seal(privateKey: KeyObject, password: string): Promise<KeyStoreRecord> {
        if (privateKey.type !== 'private') {
            throw new TypeError('Only private keys can be sealed');
        }

        const salt = randomBytes(this.saltBytes);
        const iv = randomBytes(IV_LENGTH);
        const key = await deriveKey(password, salt, this.iterations);

        const plaintext = Buffer.from(privateKey.export({ type: 'pkcs8', format: 'pem' }).toString(), 'utf8');
        const cipher = createCipheriv(ALGORITHM, key, iv);
        const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
        plaintext.fill(0);
        key.fill(0);

        return {
            version: 1,
            kdf: 'pbkdf2-sha256',
            salt: bytesToBase64(salt),
            iterations: this.iterations,
            iv: bytesToBase64(iv),
            ciphertext: bytesToBase64(ciphertext),
        };
    }

    /**
     * Recover the private key. Wrong password, corrupted ciphertext and a
     * malformed record all fail with the same AuthenticationError.
     */
    async unlock(record: unknown, password: string): Promise<KeyObject> {
        try {
            const parsed = keyStoreRecordSchema.parse(record);
            const iv = base64ToBytes(parsed.iv);
            if (iv.length !== IV_LENGTH) throw new RangeError('Invalid IV length');

            const key = await deriveKey(password, base64ToBytes(parsed.salt), parsed.iterations);
            const decipher = createDecipheriv(ALGORITHM, key, iv);
            const plaintext = Buffer.concat([decipher.update(base64ToBytes(parsed.ciphertext)), decipher.final()]);
            key.fill(0);

            const privateKey = createPrivateKey({ key: plaintext, format: 'pem' });
            plaintext.fill(0);
            return privateKey;
        } catch {
            logger.warn('Key store unlock failed');
            throw new AuthenticationError();
        }
    }

    /**
     * Re-encrypt under a new password with a fresh salt and the current
     * iteration count.
     */
    async reseal(record: unknown, oldPassword: string, newPassword: string): Promise<KeyStoreRecord> {
        const privateKey = await this.unlock(record, oldPassword);
        return this.seal(privateKey, newPassword);
    }
}
