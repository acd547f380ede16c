/**
 * Command registry
 */

import type { CliConfig } from "../config.js";
import { runInfo } from "./info.js";
import { runIngest } from "./ingest.js";
import { runRetrieve } from "./retrieve.js";

export interface CommandInfo {
  description: string;
  usage: string;
  run: (args: string[], config: CliConfig) => Promise<void>;
}

export const commands: Record<string, CommandInfo> = {
  ingest: {
    description: "Derive a lookup token for an image and optionally store it",
    usage: "ingest <file> [--size <4-128>] [--name <name>] [--out <dir>] [--yes]",
    run: runIngest,
  },
  retrieve: {
    description: "Write the stored original and compressed images for a token",
    usage: "retrieve <token> [--out <dir>]",
    run: runRetrieve,
  },
  info: {
    description: "Show database location, schema version and record count",
    usage: "info",
    run: runInfo,
  },
};

/**
 * Look up a command by name. Only the registry's own keys match, so names
 * such as "constructor" are not commands.
 */
export function findCommand(name: string): CommandInfo | undefined {
  return Object.hasOwn(commands, name) ? commands[name] : undefined;
}
