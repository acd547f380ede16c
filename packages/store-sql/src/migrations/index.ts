/**
 * SQL schema migrations
 *
 * Versioned schema changes recorded in a `schema_version` table.
 */

import type { DatabaseClient } from "../database-client.js";

export interface Migration {
  /** Migration version number (must be sequential) */
  version: number;
  name: string;
  /** Statements applying the migration (semicolon-separated) */
  up: string;
  /** Statements reverting the migration (semicolon-separated) */
  down: string;
}

/** Name of the vault record table */
export const VAULT_TABLE = "vault_record";

/**
 * All migrations in order. Append new ones with the next version number.
 */
export const migrations: Migration[] = [
  {
    version: 1,
    name: "vault_record",
    up: `
      CREATE TABLE IF NOT EXISTS ${VAULT_TABLE} (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        content_hash TEXT UNIQUE NOT NULL,
        original_image BLOB NOT NULL,
        compressed_image BLOB NOT NULL,
        lookup_token TEXT NOT NULL,
        name TEXT NOT NULL,
        timestamp TEXT NOT NULL,
        compressed_size INTEGER NOT NULL
      )
    `,
    down: `
      DROP TABLE IF EXISTS ${VAULT_TABLE}
    `,
  },
  {
    version: 2,
    name: "unique_lookup_token",
    up: `
      CREATE UNIQUE INDEX IF NOT EXISTS ${VAULT_TABLE}_lookup_token_idx
        ON ${VAULT_TABLE}(lookup_token)
    `,
    down: `
      DROP INDEX IF EXISTS ${VAULT_TABLE}_lookup_token_idx
    `,
  },
];

/**
 * Create the schema_version table if needed and apply pending migrations.
 */
export async function initializeSchema(db: DatabaseClient): Promise<void> {
  await db.execute(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at INTEGER NOT NULL
    )
  `);

  const currentVersion = await readVersion(db);

  for (const migration of migrations) {
    if (migration.version > currentVersion) {
      await db.transaction(async (tx) => {
        for (const stmt of splitStatements(migration.up)) {
          await tx.execute(stmt);
        }
        await tx.execute("INSERT INTO schema_version (version, applied_at) VALUES (?, ?)", [
          migration.version,
          Date.now(),
        ]);
      });
    }
  }
}

/**
 * Revert migrations above `targetVersion`, newest first.
 */
export async function rollbackMigration(db: DatabaseClient, targetVersion: number): Promise<void> {
  const currentVersion = await readVersion(db);

  const toRollback = migrations
    .filter((m) => m.version > targetVersion && m.version <= currentVersion)
    .sort((a, b) => b.version - a.version);

  for (const migration of toRollback) {
    await db.transaction(async (tx) => {
      for (const stmt of splitStatements(migration.down)) {
        await tx.execute(stmt);
      }
      await tx.execute("DELETE FROM schema_version WHERE version = ?", [migration.version]);
    });
  }
}

/**
 * Current schema version, or 0 when nothing has been applied.
 */
export async function getSchemaVersion(db: DatabaseClient): Promise<number> {
  const tables = await db.query(
    "SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'",
  );
  if (tables.length === 0) {
    return 0;
  }
  return readVersion(db);
}

async function readVersion(db: DatabaseClient): Promise<number> {
  const rows = await db.query("SELECT MAX(version) AS version FROM schema_version");
  const version = rows[0]?.version;
  return typeof version === "number" ? version : 0;
}

function splitStatements(sql: string): string[] {
  return sql
    .split(";")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}
