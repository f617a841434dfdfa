/**
 * Revocation list types
 *
 * The revocation list is installation-wide and append-only: an entry, once
 * added, is never removed.
 */

export interface RevocationEntry {
    /** Lowercase hex certificate serial number */
    serialNumber: string;
    /** ISO-8601 timestamp */
    revokedAt: string;
    /** Who requested the revocation (audit only) */
    revokedBy?: string;
}

/**
 * Backing store for the revocation list.
 *
 * Implementations must make `add` durable before resolving, and must never
 * drop an entry written by a concurrent caller.
 */
export interface RevocationStore {
    /** @returns true when the serial was newly added, false if already present */
    add(entry: RevocationEntry): Promise<boolean>;
    has(serialNumber: string): Promise<boolean>;
    list(): Promise<RevocationEntry[]>;
    /** Revoked serials at one instant */
    snapshot(): Promise<ReadonlySet<string>>;
}
