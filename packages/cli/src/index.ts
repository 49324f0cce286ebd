#!/usr/bin/env tsx
import { CliUsageError, printConfigError, printHelp, runCli } from "./cli.js";
import { LingoDeskConfigError } from "./config.js";

async function main() {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((e: unknown) => {
  if (e instanceof LingoDeskConfigError) {
    printConfigError(e);
    process.exit(1);
  }

  console.error(e instanceof Error ? e.message : String(e));
  if (e instanceof CliUsageError) {
    printHelp();
  }
  process.exit(1);
});
