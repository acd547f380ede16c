/**
 * Database client abstraction
 *
 * Minimal async interface for SQL access. Adapters wrap a concrete driver
 * (sql.js today) so the vault store never talks to a driver directly.
 */

/**
 * Result of an execute operation (INSERT, UPDATE, DELETE)
 */
export interface ExecuteResult {
  /** Last inserted row ID (for auto-increment columns) */
  lastInsertRowId: number;
  /** Number of rows affected by the statement */
  changes: number;
}

/**
 * Value that can be bound to a `?` placeholder
 */
export type SqlParam = number | string | Uint8Array | boolean | null | undefined;

/**
 * Column value as returned by SQLite
 */
export type SqlValue = number | string | Uint8Array | null;

/**
 * Result row keyed by column name
 */
export type SqlRow = Record<string, SqlValue>;

export interface DatabaseClient {
  /**
   * Run a query that returns rows
   *
   * @param sql SQL query string with ? placeholders
   * @returns Row objects keyed by column name
   */
  query(sql: string, params?: SqlParam[]): Promise<SqlRow[]>;

  /**
   * Run a statement that doesn't return rows (INSERT, UPDATE, DELETE, DDL)
   */
  execute(sql: string, params?: SqlParam[]): Promise<ExecuteResult>;

  /**
   * Run operations within a transaction
   *
   * Commits on success, rolls back on error. Use the client passed to `fn`
   * for every statement inside the transaction.
   */
  transaction<T>(fn: (client: DatabaseClient) => Promise<T>): Promise<T>;

  /**
   * Close the connection. The client must not be used afterwards.
   */
  close(): Promise<void>;
}
