/**
 * Identifier generation utilities.
 */

import { randomBytes } from 'crypto';

const SERIAL_NUMBER_BYTES = 16;

/**
 * Generate a random certificate serial number as lowercase hex.
 *
 * DER INTEGERs are signed, so the high bit of the first byte is cleared to keep
 * the serial positive, and the first byte is never zero so the hex form stays
 * the same after a parse round trip.
 */
export function generateSerialNumber(): string {
  const bytes = randomBytes(SERIAL_NUMBER_BYTES);
  bytes[0] = (bytes[0] & 0x7f) | 0x01;
  return bytes.toString('hex');
}

/**
 * Normalize a serial number for comparison and storage (trimmed, lowercase hex).
 */
export function normalizeSerialNumber(serialNumber: string): string {
  const normalized = serialNumber.trim().toLowerCase();
  if (!/^[0-9a-f]+$/.test(normalized)) {
    throw new RangeError(`Invalid certificate serial number: ${serialNumber}`);
  }
  return normalized;
}
