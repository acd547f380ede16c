/**
 * Ingest command - derive a token for an image and optionally store it
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { encodedImage, FORMAT_EXTENSIONS } from "@pixvault/core";
import { type CliConfig, CliError, parseTargetEdge } from "../config.js";
import { bold, formatStats, info, success, takeValue, toFileBase, withVault } from "../shared.js";

interface IngestArgs {
  file: string;
  name?: string;
  size?: number;
  yes: boolean;
  out?: string;
}

export function parseIngestArgs(args: string[]): IngestArgs {
  let file: string | undefined;
  const parsed: Omit<IngestArgs, "file"> = { yes: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "-s":
      case "--size":
        parsed.size = parseTargetEdge(takeValue(args, i++, arg));
        break;
      case "-n":
      case "--name":
        parsed.name = takeValue(args, i++, arg);
        break;
      case "-o":
      case "--out":
        parsed.out = takeValue(args, i++, arg);
        break;
      case "-y":
      case "--yes":
        parsed.yes = true;
        break;
      default:
        if (arg.startsWith("-")) {
          throw new CliError(`Unknown option: ${arg}`);
        }
        file = arg;
    }
  }

  if (!file) {
    throw new CliError("ingest requires an image file");
  }
  return { file, ...parsed };
}

/**
 * Run ingest command
 */
export async function runIngest(args: string[], config: CliConfig): Promise<void> {
  const { file, name, size, yes, out } = parseIngestArgs(args);
  const bytes = await fs.readFile(file);

  await withVault(config, async ({ vault, save }) => {
    const prepared = await vault.prepare({
      image: encodedImage(bytes),
      name: name ?? path.basename(file),
      targetEdge: size ?? config.defaultTargetEdge,
    });

    console.log(`${bold("Lookup token:")} ${prepared.lookupToken}`);
    console.log(`Target edge: ${prepared.targetEdge}px`);
    for (const line of formatStats(prepared.stats)) {
      console.log(line);
    }

    if (out) {
      const target = path.join(
        out,
        `${toFileBase(prepared.name)}-preview.${FORMAT_EXTENSIONS[prepared.compressed.format]}`,
      );
      await fs.mkdir(out, { recursive: true });
      await fs.writeFile(target, prepared.compressed.data);
      console.log(`Preview written to ${target}`);
    }

    if (!yes) {
      console.log(info("Not stored. Re-run with --yes to save this image."));
      return;
    }

    const result = await vault.confirm(prepared);
    if (!result.ok) {
      throw new CliError(result.error.message);
    }
    await save();
    console.log(success(`Stored ${prepared.name}. Keep the lookup token to retrieve it.`));
  });
}
