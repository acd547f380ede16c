/**
 * Configuration for the vault CLI.
 *
 * Defaults below, overridden by environment variables, overridden by the
 * global `--db` and `--verbose` flags.
 */

import * as path from "node:path";
import { assertTargetEdge, DEFAULT_TOKEN_SALT } from "@pixvault/core";

/** Database file used when neither PIXVAULT_DB nor --db is given */
export const DEFAULT_DB_FILE = "pixvault.sqlite";

/** Target edge used when ingest gets no --size */
export const DEFAULT_TARGET_EDGE = 64;

export interface CliConfig {
  /** Absolute path of the SQLite database file */
  dbPath: string;
  salt: string;
  defaultTargetEdge: number;
  verbose: boolean;
}

/**
 * Thrown for bad command-line input. `main` prints it and exits non-zero.
 */
export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliError";
  }
}

/**
 * Build configuration from environment variables.
 *
 * - PIXVAULT_DB: database file path
 * - PIXVAULT_SALT: lookup token salt
 * - PIXVAULT_DEFAULT_SIZE: default target edge
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd(),
): CliConfig {
  return {
    dbPath: path.resolve(cwd, env.PIXVAULT_DB || DEFAULT_DB_FILE),
    salt: env.PIXVAULT_SALT || DEFAULT_TOKEN_SALT,
    defaultTargetEdge: env.PIXVAULT_DEFAULT_SIZE
      ? parseTargetEdge(env.PIXVAULT_DEFAULT_SIZE)
      : DEFAULT_TARGET_EDGE,
    verbose: env.PIXVAULT_VERBOSE === "1",
  };
}

/**
 * Strip global flags from the argument list and apply them to `config`.
 */
export function parseGlobalArgs(
  args: string[],
  config: CliConfig,
  cwd: string = process.cwd(),
): { config: CliConfig; rest: string[] } {
  const result = { ...config };
  const rest: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--db") {
      const value = args[++i];
      if (!value) {
        throw new CliError("--db requires a path");
      }
      result.dbPath = path.resolve(cwd, value);
    } else if (arg === "-v" || arg === "--verbose") {
      result.verbose = true;
    } else {
      rest.push(arg);
    }
  }

  return { config: result, rest };
}

/**
 * Parse a target edge argument.
 *
 * @throws CliError when the value is not an integer in the supported range
 */
export function parseTargetEdge(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new CliError(`Size must be a whole number of pixels, got: ${value}`);
  }
  const edge = Number(value);
  try {
    assertTargetEdge(edge);
  } catch (error) {
    throw new CliError(error instanceof Error ? error.message : `Invalid size: ${value}`);
  }
  return edge;
}
