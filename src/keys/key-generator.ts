/**
 * RSA key pair generation
 *
 * Runs on the libuv thread pool, so concurrent callers generate in parallel
 * without blocking the event loop.
 */

import { generateKeyPair } from 'crypto';
import { promisify } from 'util';
import type { KeyPair } from '../certificates/types.js';

const generateKeyPairAsync = promisify(generateKeyPair);

export const RSA_PUBLIC_EXPONENT = 0x10001;

export async function generateRsaKeyPair(modulusLength: number): Promise<KeyPair> {
    const { publicKey, privateKey } = await generateKeyPairAsync('rsa', {
        modulusLength,
        publicExponent: RSA_PUBLIC_EXPONENT,
    });
    return { publicKey, privateKey };
}
