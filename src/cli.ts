#!/usr/bin/env node
/**
 * topic-relay CLI
 */

import "dotenv/config";
import fs from "node:fs";
import { fileURLToPath } from "node:url";

import { Command } from "commander";

import { loadConfig } from "./config.js";
import { checkConfig } from "./cli/commands/check-config.js";
import { listRelays } from "./cli/commands/relays.js";
import { run } from "./cli/commands/run.js";
import { handleError } from "./cli/error-handler.js";
import { OutputFormatter } from "./cli/output-formatter.js";

export const program = new Command();
const out = new OutputFormatter();

program
  .name("topic-relay")
  .description("Relay messages between a local pub/sub bus and a cloud device channel")
  .version("0.1.0")
  .option("-c, --config <path>", "Path to relay.config.json")
  .option("-q, --quiet", "Quiet mode - minimal output")
  .option("-v, --verbose", "Show error details");

program
  .command("run")
  .description("Start the relay and keep it running until interrupted")
  .option("--connection-string <value>", "Device connection string (overrides config and RELAY_CONNECTION_STRING)")
  .action(async (options, cmd) => {
    const globals = cmd.optsWithGlobals();
    await handleError(async () => {
      const cfg = await loadConfig(globals.config, { connectionString: options.connectionString });
      await run(cfg, { quiet: globals.quiet });
    }, globals.verbose);
  });

program
  .command("relays")
  .description("List relays recorded in the state file")
  .option("--json", "Output JSON")
  .action(async (options, cmd) => {
    const globals = cmd.optsWithGlobals();
    await handleError(() => listRelays(globals.config, { json: options.json, quiet: globals.quiet }), globals.verbose);
  });

program
  .command("check-config")
  .description("Validate configuration and show the resolved settings")
  .option("--connection-string <value>", "Device connection string to validate")
  .option("--json", "Output JSON")
  .action(async (options, cmd) => {
    const globals = cmd.optsWithGlobals();
    await handleError(async () => {
      const cfg = await loadConfig(globals.config, { connectionString: options.connectionString });
      await checkConfig(cfg, { json: options.json, quiet: globals.quiet });
    }, globals.verbose);
  });

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    const entryPath = fs.realpathSync(entry);
    const modulePath = fs.realpathSync(fileURLToPath(import.meta.url));
    return entryPath === modulePath;
  } catch {
    return false;
  }
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch((err) => {
    out.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
}

// Only parse argv when invoked as an entrypoint script.
if (isMainModule()) {
  void runCli();
}
