/**
 * Cross-process exclusive lock backed by a file created with O_EXCL.
 *
 * The lock file holds a random owner token. A lock older than `staleMs` is
 * treated as abandoned and may be taken over, so release only removes the
 * file while it still carries our token.
 */

import { mkdir, open, readFile, stat, unlink, type FileHandle } from 'fs/promises';
import { dirname } from 'path';
import { randomUUID } from 'crypto';
import { logger } from '../app/logger.js';
import { RevocationStoreError, isErrnoException } from '../errors.js';

const RETRY_MS = 20;

export interface LockFileOptions {
    /** Give up acquiring after this long */
    timeoutMs?: number;
    /** A lock older than this is considered abandoned by a crashed writer */
    staleMs?: number;
}

export class LockFile {
    private token: string | null = null;
    private timeoutMs: number;
    private staleMs: number;

    constructor(readonly path: string, options: LockFileOptions = {}) {
        this.timeoutMs = options.timeoutMs ?? 5000;
        this.staleMs = options.staleMs ?? 30000;
    }

    async acquire(): Promise<void> {
        if (this.token !== null) {
            throw new RevocationStoreError(`Lock already held: ${this.path}`);
        }

        const deadline = Date.now() + this.timeoutMs;
        await mkdir(dirname(this.path), { recursive: true });

        for (;;) {
            const token = randomUUID();
            if (await this.tryCreate(token)) {
                this.token = token;
                return;
            }

            await this.removeIfStale();
            if (Date.now() > deadline) {
                throw new RevocationStoreError(`Timed out waiting for lock: ${this.path}`);
            }
            await new Promise((resolve) => setTimeout(resolve, RETRY_MS));
        }
    }

    /**
     * Remove the lock if we still own it. A lock taken over by another writer
     * is left in place.
     */
    async release(): Promise<void> {
        const token = this.token;
        if (token === null) return;
        this.token = null;

        try {
            const current = await this.readToken();
            if (current !== token) {
                logger.warn({ lockPath: this.path }, 'Lock was taken over by another writer before release');
                return;
            }
            await unlink(this.path);
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                logger.warn({ lockPath: this.path }, 'Lock was removed before release');
                return;
            }
            throw new RevocationStoreError(`Failed to release lock: ${this.path}`, { cause: error });
        }
    }

    private async tryCreate(token: string): Promise<boolean> {
        let handle: FileHandle;
        try {
            handle = await open(this.path, 'wx');
        } catch (error) {
            if (isErrnoException(error) && error.code === 'EEXIST') return false;
            throw new RevocationStoreError(`Failed to create lock: ${this.path}`, { cause: error });
        }

        try {
            await handle.writeFile(token, 'utf8');
            await handle.sync();
        } catch (error) {
            await handle.close();
            await unlink(this.path);
            throw new RevocationStoreError(`Failed to write lock: ${this.path}`, { cause: error });
        }
        await handle.close();
        return true;
    }

    private async readToken(): Promise<string> {
        return readFile(this.path, 'utf8');
    }

    private async removeIfStale(): Promise<void> {
        try {
            const token = await this.readToken();
            const { mtimeMs } = await stat(this.path);
            if (Date.now() - mtimeMs <= this.staleMs) return;

            // Only remove the lock we judged stale, not one created since
            if (await this.readToken() !== token) return;
            logger.warn({ lockPath: this.path }, 'Removing stale lock');
            await unlink(this.path);
        } catch (error) {
            // Released between our attempts
            if (isErrnoException(error) && error.code === 'ENOENT') return;
            throw new RevocationStoreError(`Failed to inspect lock: ${this.path}`, { cause: error });
        }
    }
}
