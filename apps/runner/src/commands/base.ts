/**
 * Base command interface for all CLI subcommands.
 */

import type { ReplyGenerator } from "@chatmem/sdk";
import { ConfigError } from "@chatmem/sdk";
import { loadConfig } from "../config.js";
import type { EnvSource } from "../config.js";
import { createRuntime } from "../runtime.js";
import type { Runtime } from "../runtime.js";

export interface ParsedArgs {
  /** Command name (e.g., "chat") */
  command: string;

  /** Named flags (e.g., { chat: "42", verbose: true }) */
  flags: Record<string, string | boolean>;

  /** Positional arguments */
  positional: string[];
}

export interface CliCommand {
  /** Command name (e.g., "chat", "status", "version") */
  name: string;

  /** Command description for help text */
  description: string;

  /** Execute the command with parsed arguments */
  execute(args: ParsedArgs): Promise<number>; // Exit code: 0 = success, 1+ = error
}

/** What commands read from the outside world; tests replace each part. */
export interface CommandDeps {
  env?: EnvSource;
  cwd?: string;
  generator?: ReplyGenerator;
}

/** Load the configuration and wire the runtime, or print why not and return null. */
export function loadRuntime(deps: CommandDeps): Runtime | null {
  try {
    const config = loadConfig({ env: deps.env, cwd: deps.cwd });
    return createRuntime(config, { generator: deps.generator, cwd: deps.cwd });
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[cli] ${err.message}`);
      return null;
    }
    throw err;
  }
}
