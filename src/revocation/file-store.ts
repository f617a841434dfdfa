/**
 * File-backed revocation list
 *
 * File format: { "revoked": [{ serialNumber, revokedAt, revokedBy? }, ...] }
 *
 * Every query re-reads the file so revocations made by other processes are
 * seen immediately. Appends are serialized in-process through a queue and
 * across processes through an exclusive lock file; each append re-reads the
 * list under the lock, adds the entry (union), replaces the file atomically and
 * reads it back to confirm the entry landed.
 */

import { readFile } from 'fs/promises';
import PQueue from 'p-queue';
import { z } from 'zod';
import { logger } from '../app/logger.js';
import { writeFileAtomic } from '../app/atomic-file.js';
import { RevocationStoreError, isErrnoException } from '../errors.js';
import { LockFile } from './lock-file.js';
import type { RevocationEntry, RevocationStore } from './types.js';

const revocationFileSchema = z.object({
    revoked: z.array(z.object({
        serialNumber: z.string().min(1),
        revokedAt: z.string(),
        revokedBy: z.string().optional(),
    })),
});

type RevocationFile = z.infer<typeof revocationFileSchema>;

export interface FileRevocationStoreOptions {
    /** Give up acquiring the lock file after this long */
    lockTimeoutMs?: number;
    /** A lock file older than this is considered abandoned by a crashed writer */
    staleLockMs?: number;
}

const WRITE_ATTEMPTS = 3;

export class FileRevocationStore implements RevocationStore {
    private writes = new PQueue({ concurrency: 1 });
    private lockTimeoutMs: number;
    private staleLockMs: number;

    constructor(readonly path: string, options: FileRevocationStoreOptions = {}) {
        this.lockTimeoutMs = options.lockTimeoutMs ?? 5000;
        this.staleLockMs = options.staleLockMs ?? 30000;
    }

    async add(entry: RevocationEntry): Promise<boolean> {
        return this.writes.add(() => this.withLock(() => this.append(entry)), { throwOnTimeout: true });
    }

    async has(serialNumber: string): Promise<boolean> {
        return (await this.snapshot()).has(serialNumber);
    }

    async list(): Promise<RevocationEntry[]> {
        return (await this.read()).revoked;
    }

    async snapshot(): Promise<ReadonlySet<string>> {
        const { revoked } = await this.read();
        return new Set(revoked.map((entry) => entry.serialNumber));
    }

    private async append(entry: RevocationEntry): Promise<boolean> {
        const current = await this.read();
        if (current.revoked.some((existing) => existing.serialNumber === entry.serialNumber)) {
            return false;
        }

        for (let attempt = 1; attempt <= WRITE_ATTEMPTS; attempt++) {
            const latest = attempt === 1 ? current : await this.read();
            const next: RevocationFile = {
                revoked: latest.revoked.some((existing) => existing.serialNumber === entry.serialNumber)
                    ? latest.revoked
                    : [...latest.revoked, entry],
            };
            try {
                await writeFileAtomic(this.path, JSON.stringify(next, null, 2), { mode: 0o644 });
            } catch (error) {
                throw new RevocationStoreError(`Failed to write revocation list: ${this.path}`, { cause: error });
            }

            // A writer that took over our lock as stale may have replaced the file
            const written = await this.read();
            if (written.revoked.some((existing) => existing.serialNumber === entry.serialNumber)) {
                logger.debug({ path: this.path, count: written.revoked.length }, 'Revocation list written');
                return true;
            }
            logger.warn({ path: this.path, attempt }, 'Revocation entry missing after write, retrying');
        }

        throw new RevocationStoreError(`Revocation of ${entry.serialNumber} could not be confirmed: ${this.path}`);
    }

    private async read(): Promise<RevocationFile> {
        let raw: string;
        try {
            raw = await readFile(this.path, 'utf8');
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                return { revoked: [] };
            }
            throw new RevocationStoreError(`Failed to read revocation list: ${this.path}`, { cause: error });
        }

        // Corrupted is an error, never an empty list
        try {
            return revocationFileSchema.parse(JSON.parse(raw));
        } catch (error) {
            throw new RevocationStoreError(`Revocation list is corrupted: ${this.path}`, { cause: error });
        }
    }

    private async withLock<T>(fn: () => Promise<T>): Promise<T> {
        const lock = new LockFile(`${this.path}.lock`, {
            timeoutMs: this.lockTimeoutMs,
            staleMs: this.staleLockMs,
        });
        await lock.acquire();

        let result: T;
        try {
            result = await fn();
        } catch (error) {
            await lock.release().catch((releaseError: unknown) => {
                logger.warn({ path: this.path, error: releaseError }, 'Failed to release revocation list lock');
            });
            throw error;
        }
        await lock.release();
        return result;
    }
}
