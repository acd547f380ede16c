/**
 * SQL-backed VaultStore
 *
 * One row per content hash in `vault_record`. Re-storing a hash uses
 * INSERT OR REPLACE: SQLite deletes the old row and inserts a new one, so
 * the replaced record comes back with a new id.
 */

import {
  type ContentHash,
  type LookupResult,
  type LookupToken,
  type NewVaultRecord,
  type PutResult,
  StoreReadError,
  StoreWriteError,
  type VaultLogger,
  type VaultRecord,
  type VaultStore,
} from "@pixvault/core";
import type { DatabaseClient, SqlRow } from "./database-client.js";
import { initializeSchema, VAULT_TABLE } from "./migrations/index.js";

export interface SqlVaultStoreOptions {
  /** Run migrations before first use (default: true) */
  autoMigrate?: boolean;
  logger?: VaultLogger;
}

const RECORD_COLUMNS =
  "id, content_hash, original_image, compressed_image, lookup_token, name, timestamp, compressed_size";

export class SqlVaultStore implements VaultStore {
  private initialized = false;
  private readonly autoMigrate: boolean;
  private readonly logger?: VaultLogger;

  constructor(
    private readonly db: DatabaseClient,
    options: SqlVaultStoreOptions = {},
  ) {
    const { autoMigrate = true, logger } = options;
    this.autoMigrate = autoMigrate;
    this.logger = logger;
  }

  /**
   * Create a store and bring its schema up to date.
   */
  static async create(db: DatabaseClient, options?: SqlVaultStoreOptions): Promise<SqlVaultStore> {
    const store = new SqlVaultStore(db, options);
    await store.ensureSchema();
    return store;
  }

  private async ensureSchema(): Promise<void> {
    if (this.initialized) return;
    if (this.autoMigrate) {
      await initializeSchema(this.db);
    }
    this.initialized = true;
  }

  async put(record: NewVaultRecord): Promise<PutResult> {
    try {
      await this.ensureSchema();
      const result = await this.db.transaction((tx) =>
        tx.execute(
          `INSERT OR REPLACE INTO ${VAULT_TABLE}
            (content_hash, original_image, compressed_image, lookup_token, name, timestamp, compressed_size)
            VALUES (?, ?, ?, ?, ?, ?, ?)`,
          [
            record.contentHash,
            record.originalImage,
            record.compressedImage,
            record.lookupToken,
            record.name,
            record.timestamp,
            record.compressedSize,
          ],
        ),
      );
      this.logger?.debug?.(`Stored ${record.contentHash} as row ${result.lastInsertRowId}`);
      return { ok: true, id: result.lastInsertRowId };
    } catch (error) {
      this.logger?.error?.(`Failed to store ${record.contentHash}:`, error);
      return {
        ok: false,
        error: new StoreWriteError(`Failed to store record ${record.contentHash}`, {
          cause: error,
        }),
      };
    }
  }

  async getByToken(token: LookupToken): Promise<LookupResult> {
    try {
      await this.ensureSchema();
      const rows = await this.db.query(
        `SELECT ${RECORD_COLUMNS} FROM ${VAULT_TABLE} WHERE lookup_token = ? LIMIT 1`,
        [token],
      );
      const [row] = rows;
      if (!row) {
        return { status: "not-found" };
      }
      return { status: "found", record: toRecord(row) };
    } catch (error) {
      this.logger?.error?.("Vault lookup failed:", error);
      const readError =
        error instanceof StoreReadError
          ? error
          : new StoreReadError("Failed to look up record", { cause: error });
      return { status: "error", error: readError };
    }
  }

  async countByContentHash(contentHash: ContentHash): Promise<number> {
    await this.ensureSchema();
    const rows = await this.db.query(
      `SELECT COUNT(*) AS total FROM ${VAULT_TABLE} WHERE content_hash = ?`,
      [contentHash],
    );
    return readInteger(rows[0] ?? {}, "total");
  }

  async count(): Promise<number> {
    await this.ensureSchema();
    const rows = await this.db.query(`SELECT COUNT(*) AS total FROM ${VAULT_TABLE}`);
    return readInteger(rows[0] ?? {}, "total");
  }
}

function toRecord(row: SqlRow): VaultRecord {
  return {
    id: readInteger(row, "id"),
    contentHash: readText(row, "content_hash"),
    originalImage: readBlob(row, "original_image"),
    compressedImage: readBlob(row, "compressed_image"),
    lookupToken: readText(row, "lookup_token"),
    name: readText(row, "name"),
    timestamp: readText(row, "timestamp"),
    compressedSize: readInteger(row, "compressed_size"),
  };
}

function readText(row: SqlRow, column: string): string {
  const value = row[column];
  if (typeof value !== "string") {
    throw new StoreReadError(`Column ${column} is not text`);
  }
  return value;
}

function readInteger(row: SqlRow, column: string): number {
  const value = row[column];
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new StoreReadError(`Column ${column} is not an integer`);
  }
  return value;
}

function readBlob(row: SqlRow, column: string): Uint8Array {
  const value = row[column];
  if (!(value instanceof Uint8Array)) {
    throw new StoreReadError(`Column ${column} is not a blob`);
  }
  return value;
}
