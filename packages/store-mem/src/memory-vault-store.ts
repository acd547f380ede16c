/**
 * In-memory VaultStore implementation
 *
 * Provides pure in-memory record storage for testing and ephemeral sessions.
 * No persistence - data is lost when the instance is garbage collected.
 */

import type {
  ContentHash,
  LookupResult,
  LookupToken,
  NewVaultRecord,
  PutResult,
  VaultRecord,
  VaultStore,
} from "@pixvault/core";

/**
 * In-memory VaultStore.
 *
 * Mirrors the SQL backend: replacing a record by content hash assigns it a
 * fresh id, the way SQLite's INSERT OR REPLACE does under AUTOINCREMENT.
 */
export class MemoryVaultStore implements VaultStore {
  private records = new Map<ContentHash, VaultRecord>();
  private tokens = new Map<LookupToken, ContentHash>();
  private nextId = 1;

  async put(record: NewVaultRecord): Promise<PutResult> {
    const previous = this.records.get(record.contentHash);
    if (previous) {
      this.tokens.delete(previous.lookupToken);
    }

    const id = this.nextId++;
    this.records.set(record.contentHash, {
      ...record,
      id,
      originalImage: record.originalImage.slice(),
      compressedImage: record.compressedImage.slice(),
    });
    this.tokens.set(record.lookupToken, record.contentHash);
    return { ok: true, id };
  }

  async getByToken(token: LookupToken): Promise<LookupResult> {
    const contentHash = this.tokens.get(token);
    const record = contentHash !== undefined ? this.records.get(contentHash) : undefined;
    if (!record) {
      return { status: "not-found" };
    }
    return {
      status: "found",
      record: {
        ...record,
        originalImage: record.originalImage.slice(),
        compressedImage: record.compressedImage.slice(),
      },
    };
  }

  async countByContentHash(contentHash: ContentHash): Promise<number> {
    return this.records.has(contentHash) ? 1 : 0;
  }

  async count(): Promise<number> {
    return this.records.size;
  }
}
