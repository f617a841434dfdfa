import type { RevocationEntry, RevocationStore } from './types.js';

/**
 * In-process revocation list. Nothing survives a restart; use
 * FileRevocationStore for an installation.
 */
export class MemoryRevocationStore implements RevocationStore {
    private entries = new Map<string, RevocationEntry>();

    constructor(initial: RevocationEntry[] = []) {
        for (const entry of initial) {
            if (!this.entries.has(entry.serialNumber)) {
                this.entries.set(entry.serialNumber, { ...entry });
            }
        }
    }

    async add(entry: RevocationEntry): Promise<boolean> {
        if (this.entries.has(entry.serialNumber)) return false;
        this.entries.set(entry.serialNumber, { ...entry });
        return true;
    }

    async has(serialNumber: string): Promise<boolean> {
        return this.entries.has(serialNumber);
    }

    async list(): Promise<RevocationEntry[]> {
        return Array.from(this.entries.values(), (entry) => ({ ...entry }));
    }

    async snapshot(): Promise<ReadonlySet<string>> {
        return new Set(this.entries.keys());
    }
}
