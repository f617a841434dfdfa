/**
 * Identity Vault
 *
 * Per-user identity on disk: <usersDir>/<subjectId>/identity.json holds the
 * sealed private key, the current certificate and the certificates it
 * replaced. The private key only ever reaches disk inside a KeyStoreRecord.
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { createPublicKey, type KeyObject } from 'crypto';
import { z } from 'zod';
import { logger } from '../app/logger.js';
import { writeFileAtomic, type AtomicWriteOptions } from '../app/atomic-file.js';
import type { Certificate } from '../certificates/types.js';
import type { SignerIdentity } from '../crypto/types.js';
import { IdentityError, isErrnoException } from '../errors.js';
import type { KeyManager } from '../keys/key-manager.js';
import { keyStoreRecordSchema, type KeyStore, type KeyStoreRecord } from '../keystore/key-store.js';

const IDENTITY_FILE = 'identity.json';
const SUBJECT_ID_PATTERN = /^[A-Za-z0-9_-][A-Za-z0-9._-]{0,127}$/;

const storedIdentitySchema = z.object({
    version: z.literal(1),
    subjectId: z.string(),
    certificate: z.string(),
    keyStore: keyStoreRecordSchema,
    /** Certificates replaced by rotation, oldest first */
    history: z.array(z.string()),
    createdAt: z.string(),
    updatedAt: z.string(),
});

type StoredIdentity = z.infer<typeof storedIdentitySchema>;

export interface UnlockedIdentity extends SignerIdentity {
    subjectId: string;
}

export interface IdentityVaultConfig {
    usersDir: string;
    keyManager: KeyManager;
    keyStore: KeyStore;
}

export class IdentityVault {
    private usersDir: string;
    private keyManager: KeyManager;
    private keyStore: KeyStore;

    constructor(config: IdentityVaultConfig) {
        this.usersDir = config.usersDir;
        this.keyManager = config.keyManager;
        this.keyStore = config.keyStore;
    }

    exists(subjectId: string): boolean {
        return existsSync(this.identityPath(subjectId));
    }

    /**
     * Create a key pair and certificate for a new subject and store them
     * sealed under `password`.
     */
    async provision(subjectId: string, password: string): Promise<UnlockedIdentity> {
        if (this.exists(subjectId)) {
            throw new IdentityError(`Identity already exists: ${subjectId}`);
        }

        const { keyPair, certificate } = await this.keyManager.generateIdentity(subjectId);
        const keyStore = await this.keyStore.seal(keyPair.privateKey, password);
        const now = this.keyManager.now().toISOString();

        // A concurrent provision of the same subject loses here, not at the check above
        try {
            await this.write({
                version: 1,
                subjectId,
                certificate: certificate.pem,
                keyStore,
                history: [],
                createdAt: now,
                updatedAt: now,
            }, { exclusive: true });
        } catch (error) {
            if (isErrnoException(error) && error.code === 'EEXIST') {
                throw new IdentityError(`Identity already exists: ${subjectId}`, { cause: error });
            }
            throw error;
        }

        logger.info({ subjectId, serialNumber: certificate.serialNumber }, 'Provisioned identity');
        return { subjectId, certificate, privateKey: keyPair.privateKey };
    }

    /**
     * Unseal the private key and pair it with the stored certificate.
     * A wrong password fails with AuthenticationError.
     */
    async unlock(subjectId: string, password: string): Promise<UnlockedIdentity> {
        const stored = await this.read(subjectId);
        const certificate = this.keyManager.parseCertificate(stored.certificate);
        const privateKey = await this.keyStore.unlock(stored.keyStore, password);

        if (!keysMatch(privateKey, certificate)) {
            throw new IdentityError(`Stored certificate does not match the private key for ${subjectId}`);
        }
        return { subjectId, certificate, privateKey };
    }

    async getCertificate(subjectId: string): Promise<Certificate> {
        const stored = await this.read(subjectId);
        return this.keyManager.parseCertificate(stored.certificate);
    }

    /**
     * Certificates this subject held before, oldest first.
     */
    async getCertificateHistory(subjectId: string): Promise<Certificate[]> {
        const stored = await this.read(subjectId);
        return stored.history.map((pem) => this.keyManager.parseCertificate(pem));
    }

    /**
     * Replace the subject's key pair and certificate, then revoke the old
     * certificate. Envelopes signed with the old certificate stop verifying;
     * envelopes encrypted to the old key can no longer be decrypted by the
     * new identity.
     */
    async rotate(subjectId: string, password: string, revokedBy?: string): Promise<UnlockedIdentity> {
        const current = await this.unlock(subjectId, password);
        const stored = await this.read(subjectId);

        const { keyPair, certificate } = await this.keyManager.generateIdentity(subjectId);
        const keyStore = await this.keyStore.seal(keyPair.privateKey, password);

        await this.write({
            ...stored,
            certificate: certificate.pem,
            keyStore,
            history: [...stored.history, stored.certificate],
            updatedAt: this.keyManager.now().toISOString(),
        });
        await this.keyManager.revoke(current.certificate.serialNumber, revokedBy ?? subjectId);

        logger.info({
            subjectId,
            previousSerialNumber: current.certificate.serialNumber,
            serialNumber: certificate.serialNumber,
        }, 'Rotated identity');
        return { subjectId, certificate, privateKey: keyPair.privateKey };
    }

    async changePassword(subjectId: string, oldPassword: string, newPassword: string): Promise<void> {
        const stored = await this.read(subjectId);
        const keyStore: KeyStoreRecord = await this.keyStore.reseal(stored.keyStore, oldPassword, newPassword);

        await this.write({
            ...stored,
            keyStore,
            updatedAt: this.keyManager.now().toISOString(),
        });
        logger.info({ subjectId }, 'Identity password changed');
    }

    private identityPath(subjectId: string): string {
        if (!SUBJECT_ID_PATTERN.test(subjectId)) {
            throw new IdentityError(`Invalid subject id: ${JSON.stringify(subjectId)}`);
        }
        return join(this.usersDir, subjectId, IDENTITY_FILE);
    }

    private async read(subjectId: string): Promise<StoredIdentity> {
        const path = this.identityPath(subjectId);
        if (!existsSync(path)) {
            throw new IdentityError(`Unknown identity: ${subjectId}`);
        }

        let raw: unknown;
        try {
            raw = JSON.parse(await readFile(path, 'utf8'));
        } catch (error) {
            throw new IdentityError(`Identity file is unreadable: ${path}`, { cause: error });
        }

        const result = storedIdentitySchema.safeParse(raw);
        if (!result.success || result.data.subjectId !== subjectId) {
            throw new IdentityError(`Identity file is corrupted: ${path}`);
        }
        return result.data;
    }

    private async write(identity: StoredIdentity, options: AtomicWriteOptions = {}): Promise<void> {
        await writeFileAtomic(this.identityPath(identity.subjectId), JSON.stringify(identity, null, 2), options);
    }
}

function keysMatch(privateKey: KeyObject, certificate: Certificate): boolean {
    const derived = createPublicKey(privateKey).export({ type: 'spki', format: 'der' });
    const expected = certificate.publicKey.export({ type: 'spki', format: 'der' });
    return derived.equals(expected);
}
