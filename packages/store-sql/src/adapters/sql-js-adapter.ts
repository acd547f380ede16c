/**
 * sql.js adapter for the DatabaseClient interface
 *
 * SQLite compiled to WebAssembly. The database lives in memory; `export()`
 * and `SqlJsAdapter.open()` move it to and from a file image.
 */

import type { BindParams, Database, SqlJsStatic } from "sql.js";
import type { DatabaseClient, ExecuteResult, SqlParam, SqlRow } from "../database-client.js";

/**
 * Options for creating a SqlJsAdapter
 */
export interface SqlJsAdapterOptions {
  /** Path or URL of sql-wasm.wasm (default: the copy shipped with sql.js) */
  wasmPath?: string;
  /** Pre-loaded sql.js module */
  sqlJs?: SqlJsStatic;
}

/**
 * sql.js implementation of DatabaseClient
 *
 * Wraps the synchronous sql.js Database with an async interface.
 * Transactions are queued so that two concurrent callers never share one
 * BEGIN/COMMIT pair.
 */
export class SqlJsAdapter implements DatabaseClient {
  private queue: Promise<unknown> = Promise.resolve();
  private closed = false;
  private readonly transactionClient: DatabaseClient;

  private constructor(private db: Database) {
    this.transactionClient = {
      query: (sql, params) => this.query(sql, params),
      execute: (sql, params) => this.execute(sql, params),
      // Nested transactions join the enclosing one
      transaction: (fn) => fn(this.transactionClient),
      close: () => this.close(),
    };
  }

  /**
   * Create a new in-memory database
   */
  static async create(options?: SqlJsAdapterOptions): Promise<SqlJsAdapter> {
    const SQL = await SqlJsAdapter.loadSqlJs(options);
    return new SqlJsAdapter(new SQL.Database());
  }

  /**
   * Open a database from an exported SQLite file image
   */
  static async open(data: Uint8Array, options?: SqlJsAdapterOptions): Promise<SqlJsAdapter> {
    const SQL = await SqlJsAdapter.loadSqlJs(options);
    return new SqlJsAdapter(new SQL.Database(data));
  }

  private static async loadSqlJs(options?: SqlJsAdapterOptions): Promise<SqlJsStatic> {
    if (options?.sqlJs) {
      return options.sqlJs;
    }

    // sql.js is CommonJS; its exports object also carries itself as `default`
    const initSqlJs = (await import("sql.js")).default.default;
    const config: { locateFile?: (file: string) => string } = {};

    if (options?.wasmPath) {
      const wasmPath = options.wasmPath;
      config.locateFile = () => wasmPath;
    }

    return initSqlJs(config);
  }

  async query(sql: string, params?: SqlParam[]): Promise<SqlRow[]> {
    this.assertOpen();
    const stmt = this.db.prepare(sql);
    try {
      if (params && params.length > 0) {
        stmt.bind(this.convertParams(params));
      }
      const results: SqlRow[] = [];
      while (stmt.step()) {
        results.push(stmt.getAsObject());
      }
      return results;
    } finally {
      stmt.free();
    }
  }

  async execute(sql: string, params?: SqlParam[]): Promise<ExecuteResult> {
    this.assertOpen();
    if (params && params.length > 0) {
      this.db.run(sql, this.convertParams(params));
    } else {
      this.db.run(sql);
    }

    return {
      lastInsertRowId: this.selectNumber("SELECT last_insert_rowid() AS value"),
      changes: this.db.getRowsModified(),
    };
  }

  async transaction<T>(fn: (client: DatabaseClient) => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => {
      this.assertOpen();
      this.db.run("BEGIN TRANSACTION");
      try {
        const result = await fn(this.transactionClient);
        this.db.run("COMMIT");
        return result;
      } catch (error) {
        this.db.run("ROLLBACK");
        throw error;
      }
    };

    const next = this.queue.then(run, run);
    // The queue only orders work; failures reach the caller through `next`
    this.queue = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.db.close();
  }

  /**
   * Export the database as a SQLite file image
   */
  export(): Uint8Array {
    return this.db.export();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error("Database is closed");
    }
  }

  private convertParams(params: SqlParam[]): BindParams {
    return params.map((p) => {
      if (p === null || p === undefined) {
        return null;
      }
      if (typeof p === "boolean") {
        return p ? 1 : 0;
      }
      return p;
    });
  }

  private selectNumber(sql: string): number {
    const [row] = this.db.exec(sql);
    const value = row?.values[0]?.[0];
    return typeof value === "number" ? value : 0;
  }
}
