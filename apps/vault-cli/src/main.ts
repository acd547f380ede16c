#!/usr/bin/env node

/**
 * pixvault - command-line front end for the image vault
 *
 * - ingest: derive a lookup token for an image and, with --yes, store it
 * - retrieve: write the original and compressed images for a token
 * - info: show database details
 *
 * Usage: pixvault [--db <file>] [-v] <command> [options]
 */

import { VaultError } from "@pixvault/core";
import { commands, findCommand } from "./commands/index.js";
import { CliError, loadConfig, parseGlobalArgs } from "./config.js";
import { bold, dim, error } from "./shared.js";

function printHelp(): void {
  console.log(`
${bold("pixvault")}
${dim("Content-addressed image vault")}

${bold("Usage:")} pixvault [--db <file>] [-v] <command> [options]

${bold("Commands:")}
`);

  const maxCmdLen = Math.max(...Object.keys(commands).map((c) => c.length));
  for (const [name, cmd] of Object.entries(commands)) {
    console.log(`  ${name.padEnd(maxCmdLen + 2)} ${dim(cmd.description)}`);
  }

  console.log(`
${bold("Environment:")}
  PIXVAULT_DB            Database file (default: ./pixvault.sqlite)
  PIXVAULT_SALT          Lookup token salt
  PIXVAULT_DEFAULT_SIZE  Default target edge for ingest (default: 64)

${bold("Examples:")}
  pixvault ingest photo.jpg --size 32           # Preview token and sizes
  pixvault ingest photo.jpg --size 32 --yes     # Store the image
  pixvault retrieve <token> --out ./restored    # Get it back
`);
}

async function main(): Promise<void> {
  const { config, rest } = parseGlobalArgs(process.argv.slice(2), loadConfig());

  if (rest.length === 0 || rest[0] === "--help" || rest[0] === "-h") {
    printHelp();
    return;
  }

  const [cmdName, ...cmdArgs] = rest;
  const cmd = findCommand(cmdName);
  if (!cmd) {
    console.error(`pixvault: '${cmdName}' is not a command. See 'pixvault --help'.`);
    process.exitCode = 1;
    return;
  }

  if (cmdArgs.includes("--help") || cmdArgs.includes("-h")) {
    console.log(`\n${bold("Usage:")} pixvault ${cmd.usage}\n\n${cmd.description}\n`);
    return;
  }

  await cmd.run(cmdArgs, config);
}

main().catch((err) => {
  if (err instanceof CliError || err instanceof VaultError) {
    console.error(error(`fatal: ${err.message}`));
  } else {
    console.error("Unexpected error:", err);
  }
  process.exitCode = 1;
});
