/**
 * Shared utilities for the vault CLI
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { type CompressionStats, type VaultLogger, VaultService } from "@pixvault/core";
import { SqlJsAdapter, SqlVaultStore } from "@pixvault/store-sql";
import { type CliConfig, CliError } from "./config.js";

/**
 * An open vault backed by a database file
 */
export interface VaultSession {
  vault: VaultService;
  store: SqlVaultStore;
  db: SqlJsAdapter;
  /** Write the in-memory database back to its file */
  save(): Promise<void>;
}

/**
 * Open the database file (or start an empty one), run `fn`, then close.
 *
 * The database is written back only when `fn` calls `save()`.
 */
export async function withVault<T>(
  config: CliConfig,
  fn: (session: VaultSession) => Promise<T>,
): Promise<T> {
  const logger = createConsoleLogger(config.verbose);
  const existing = await readIfExists(config.dbPath);
  const db = existing ? await SqlJsAdapter.open(existing) : await SqlJsAdapter.create();

  try {
    const store = await SqlVaultStore.create(db, { logger });
    const vault = new VaultService(store, { salt: config.salt, logger });
    const save = async () => {
      await fs.mkdir(path.dirname(config.dbPath), { recursive: true });
      await fs.writeFile(config.dbPath, db.export());
      logger.debug?.(`Saved ${config.dbPath}`);
    };
    return await fn({ vault, store, db, save });
  } finally {
    await db.close();
  }
}

async function readIfExists(filePath: string): Promise<Uint8Array | undefined> {
  try {
    return await fs.readFile(filePath);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return undefined;
    }
    throw err;
  }
}

/**
 * Logger writing to stderr; debug output only when verbose.
 */
export function createConsoleLogger(verbose: boolean): VaultLogger {
  return {
    debug: verbose ? (message, ...args) => console.error(dim(message), ...args) : undefined,
    info: verbose ? (message, ...args) => console.error(message, ...args) : undefined,
    warn: (message, ...args) => console.error(warning(message), ...args),
    error: (message, ...args) => console.error(error(message), ...args),
  };
}

/**
 * Render compression statistics as display lines
 */
export function formatStats(stats: CompressionStats): string[] {
  return [
    `Original:   ${stats.originalKb.toFixed(2)} KB (${stats.originalBytes} bytes, png)`,
    `Compressed: ${stats.compressedKb.toFixed(2)} KB (${stats.compressedBytes} bytes, ${stats.format})`,
    `Ratio:      ${stats.ratio.toFixed(2)}x`,
  ];
}

/**
 * Turn a display name into a safe file base name (extension dropped)
 */
export function toFileBase(name: string): string {
  const base = path.basename(name).replace(/\.[^.]+$/, "");
  const safe = base.replace(/[^a-zA-Z0-9_-]+/g, "-").replace(/^-+|-+$/g, "");
  return safe || "image";
}

/**
 * Read the value following a flag
 */
export function takeValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith("-")) {
    throw new CliError(`${flag} requires a value`);
  }
  return value;
}

/**
 * Print output styling utilities
 */
export const colors = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

export function colorize(text: string, ...codes: string[]): string {
  if (!process.stdout.isTTY) {
    return text;
  }
  return `${codes.join("")}${text}${colors.reset}`;
}

export function success(text: string): string {
  return colorize(text, colors.green);
}

export function error(text: string): string {
  return colorize(text, colors.red);
}

export function warning(text: string): string {
  return colorize(text, colors.yellow);
}

export function info(text: string): string {
  return colorize(text, colors.cyan);
}

export function dim(text: string): string {
  return colorize(text, colors.dim);
}

export function bold(text: string): string {
  return colorize(text, colors.bold);
}
