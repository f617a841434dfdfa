/**
 * Unit tests for X.509 certificate construction and parsing
 */

import { describe, it, expect, beforeAll } from 'vitest';
import {
  buildSelfSignedCertificate,
  describeCertificate,
  describePublicKey,
  parseCertificate,
} from '../../src/certificates/certificate.js';
import { CertificateIntegrityError } from '../../src/errors.js';
import type { Certificate, KeyPair } from '../../src/certificates/types.js';
import { DAY_MS, sharedKeyPair, tamperCertificatePem } from '../helpers/test-trust.js';

const SERIAL = '1a2b3c4d5e6f708192a3b4c5d6e7f801';

describe('buildSelfSignedCertificate', () => {
  let keyPair: KeyPair;
  let certificate: Certificate;

  beforeAll(async () => {
    keyPair = await sharedKeyPair(0);
    certificate = buildSelfSignedCertificate({
      subjectId: 'alice',
      keyPair,
      serialNumber: SERIAL,
      issuedAt: new Date('2026-03-01T12:00:00.750Z'),
      validityDays: 365,
    });
  });

  it('binds the subject, serial and public key', () => {
    expect(certificate.subjectId).toBe('alice');
    expect(certificate.serialNumber).toBe(SERIAL);
    expect(certificate.publicKey.export({ type: 'spki', format: 'pem' }))
      .toEqual(keyPair.publicKey.export({ type: 'spki', format: 'pem' }));
  });

  it('truncates issuedAt to the second and applies the validity window', () => {
    expect(certificate.issuedAt.toISOString()).toBe('2026-03-01T12:00:00.000Z');
    expect(certificate.expiresAt.getTime() - certificate.issuedAt.getTime()).toBe(365 * DAY_MS);
  });

  it('produces a PEM that parses back to the same fields', () => {
    const parsed = parseCertificate(certificate.pem);

    expect(parsed.subjectId).toBe('alice');
    expect(parsed.serialNumber).toBe(SERIAL);
    expect(parsed.issuedAt.getTime()).toBe(certificate.issuedAt.getTime());
    expect(parsed.expiresAt.getTime()).toBe(certificate.expiresAt.getTime());
    expect(parsed.issuerSignature).toBe(certificate.issuerSignature);
  });

  it('encodes the issuer signature as hex', () => {
    // 2048-bit RSA signature = 256 bytes
    expect(certificate.issuerSignature).toMatch(/^[0-9a-f]{512}$/);
  });
});

describe('parseCertificate', () => {
  let pem: string;

  beforeAll(async () => {
    pem = buildSelfSignedCertificate({
      subjectId: 'bob',
      keyPair: await sharedKeyPair(0),
      serialNumber: SERIAL,
      issuedAt: new Date('2026-03-01T12:00:00.000Z'),
      validityDays: 30,
    }).pem;
  });

  it('rejects a certificate whose signature bytes were altered', () => {
    expect(() => parseCertificate(tamperCertificatePem(pem))).toThrow(CertificateIntegrityError);
  });

  it('rejects text that is not a certificate', () => {
    expect(() => parseCertificate('not a certificate')).toThrow(CertificateIntegrityError);
  });

  it('rejects an empty PEM block', () => {
    expect(() => parseCertificate('-----BEGIN CERTIFICATE-----\n-----END CERTIFICATE-----\n'))
      .toThrow(CertificateIntegrityError);
  });
});

describe('describeCertificate', () => {
  it('reports the X.509 details of a self-signed end-entity certificate', async () => {
    const certificate = buildSelfSignedCertificate({
      subjectId: 'carol',
      keyPair: await sharedKeyPair(0),
      serialNumber: SERIAL,
      issuedAt: new Date('2026-03-01T12:00:00.000Z'),
      validityDays: 10,
    });

    expect(describeCertificate(certificate)).toEqual({
      subject: 'carol',
      issuer: 'carol',
      serialNumber: SERIAL,
      notBefore: '2026-03-01T12:00:00.000Z',
      notAfter: '2026-03-11T12:00:00.000Z',
      keyAlgorithm: 'RSA 2048',
      signatureAlgorithm: 'sha256WithRSAEncryption',
      version: 3,
      isCa: false,
    });
  });
});

describe('describePublicKey', () => {
  it('reports modulus length and exponent', async () => {
    const { publicKey } = await sharedKeyPair(0);
    const details = describePublicKey(publicKey);

    expect(details.algorithm).toBe('RSA');
    expect(details.keySize).toBe(2048);
    expect(details.publicExponent).toBe(65537);
    expect(details.pem.startsWith('-----BEGIN PUBLIC KEY-----')).toBe(true);
  });
});
