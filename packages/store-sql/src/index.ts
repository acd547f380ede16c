/**
 * SQL storage for the image vault
 *
 * @example In-memory SQLite through sql.js
 * ```typescript
 * import { SqlJsAdapter, SqlVaultStore } from "@pixvault/store-sql";
 *
 * const db = await SqlJsAdapter.create();
 * const store = await SqlVaultStore.create(db);
 * const vault = new VaultService(store);
 * // ...
 * await db.close();
 * ```
 */

export * from "./adapters/sql-js-adapter.js";
export * from "./database-client.js";
export * from "./migrations/index.js";
export * from "./sql-vault-store.js";
