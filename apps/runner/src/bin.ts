#!/usr/bin/env -S node --import tsx

/**
 * Runner entry point. Variables from ./.env fill in whatever the
 * environment does not set.
 */

import { loadEnvFile } from "./config.js";
import { runCli } from "./cli.js";

async function main(): Promise<number> {
  loadEnvFile(".env");
  return runCli(process.argv.slice(2));
}

main()
  .then((exitCode) => process.exit(exitCode))
  .catch((err: unknown) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
