/**
 * Vault store contract
 *
 * Backends (SQL, memory) implement this interface. Storage faults are
 * reported as values, never thrown, so the caller can always tell a write
 * fault from a missing record.
 */

import type { StoreReadError, StoreWriteError } from "../errors/vault-errors.js";
import type { ContentHash, LookupToken } from "../keys/key-deriver.js";

/**
 * Persisted vault entry.
 */
export interface VaultRecord {
  /** Row id assigned by the store; reassigned when the row is replaced */
  id: number;
  /** Unique de-duplication key */
  contentHash: ContentHash;
  /** Lossless PNG encoding of the full-resolution original */
  originalImage: Uint8Array;
  /** Rendition encoded by the compression tier of `compressedSize` */
  compressedImage: Uint8Array;
  lookupToken: LookupToken;
  /** User-supplied display name */
  name: string;
  /** Creation time, `YYYY-MM-DD HH:MM:SS` in UTC */
  timestamp: string;
  /** Target edge the rendition was produced for */
  compressedSize: number;
}

export type NewVaultRecord = Omit<VaultRecord, "id">;

export type PutResult = { ok: true; id: number } | { ok: false; error: StoreWriteError };

export type LookupResult =
  | { status: "found"; record: VaultRecord }
  | { status: "not-found" }
  | { status: "error"; error: StoreReadError };

export interface VaultStore {
  /**
   * Insert a record, or replace the existing record with the same content hash.
   */
  put(record: NewVaultRecord): Promise<PutResult>;

  /**
   * Exact-match lookup on the lookup token.
   */
  getByToken(token: LookupToken): Promise<LookupResult>;

  /**
   * Number of rows holding the given content hash (0 or 1).
   */
  countByContentHash(contentHash: ContentHash): Promise<number>;

  /**
   * Total number of records.
   */
  count(): Promise<number>;
}

/**
 * Format a date as `YYYY-MM-DD HH:MM:SS` (UTC).
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace("T", " ");
}
