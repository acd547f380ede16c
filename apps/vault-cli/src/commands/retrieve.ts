/**
 * Retrieve command - fetch an image by its lookup token
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { FORMAT_EXTENSIONS } from "@pixvault/core";
import { type CliConfig, CliError } from "../config.js";
import { bold, formatStats, success, takeValue, toFileBase, withVault } from "../shared.js";

export function parseRetrieveArgs(args: string[]): { token: string; out: string } {
  let token: string | undefined;
  let out = ".";

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "-o" || arg === "--out") {
      out = takeValue(args, i++, arg);
    } else if (arg.startsWith("-")) {
      throw new CliError(`Unknown option: ${arg}`);
    } else {
      token = arg;
    }
  }

  if (!token) {
    throw new CliError("retrieve requires a lookup token");
  }
  return { token, out };
}

/**
 * Run retrieve command
 */
export async function runRetrieve(args: string[], config: CliConfig): Promise<void> {
  const { token, out } = parseRetrieveArgs(args);

  await withVault(config, async ({ vault }) => {
    const result = await vault.retrieve(token);
    if (!result.ok) {
      throw new CliError(result.error.message);
    }

    const image = result.value;
    const base = toFileBase(image.name);
    const originalPath = path.join(out, `${base}.png`);
    const compressedPath = path.join(out, `${base}-compressed.${FORMAT_EXTENSIONS[image.format]}`);

    await fs.mkdir(out, { recursive: true });
    await fs.writeFile(originalPath, image.originalPng);
    await fs.writeFile(compressedPath, image.compressedImage);

    console.log(`${bold(image.name)} (${image.original.width}x${image.original.height}, stored ${image.timestamp} UTC)`);
    for (const line of formatStats(image.stats)) {
      console.log(line);
    }
    console.log(success(`Original written to ${originalPath}`));
    console.log(success(`Compressed written to ${compressedPath}`));
  });
}
