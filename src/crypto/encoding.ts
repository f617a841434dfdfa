/**
 * Base64 helpers
 *
 * Buffer.from(str, 'base64') silently skips invalid characters, so anything
 * read from outside the process is checked with isBase64 first.
 */

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export function bytesToBase64(bytes: Uint8Array): string {
    return Buffer.from(bytes).toString('base64');
}

export function isBase64(value: string): boolean {
    return BASE64_PATTERN.test(value);
}

/**
 * Decode canonical base64; throws on anything else.
 */
export function base64ToBytes(value: string): Buffer {
    if (!isBase64(value)) {
        throw new TypeError('Invalid base64 input');
    }
    return Buffer.from(value, 'base64');
}
