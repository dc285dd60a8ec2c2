/**
 * CLI argument parser. No external CLI framework needed.
 */

import type { ParsedArgs } from "../commands/base.js";

const NEGATIVE_NUMBER = /^-\d+(\.\d+)?$/;

function isFlagValue(next: string | undefined): next is string {
  return next !== undefined && next !== "" && (!next.startsWith("-") || NEGATIVE_NUMBER.test(next));
}

/**
 * Parse CLI arguments into structured ParsedArgs.
 *
 * Supported formats:
 *   - Long flag with value: --chat 42, --chat=42, --chat -1001234
 *   - Boolean flag: --verbose
 *   - Short flag: -v (treated as boolean)
 *   - Command: first non-flag argument
 *   - Positional: remaining non-flag arguments
 *
 * Examples:
 *   parseArgs(["status", "--chat", "42"]) → { command: "status", flags: { chat: "42" }, positional: [] }
 *   parseArgs(["--verbose"]) → { command: "", flags: { verbose: true }, positional: [] }
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const flags: Record<string, string | boolean> = {};
  const positional: string[] = [];
  let command = "";

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith("--")) {
      const eq = arg.indexOf("=");
      if (eq > 2) {
        flags[arg.slice(2, eq)] = arg.slice(eq + 1);
        continue;
      }
      const next = argv[i + 1];
      if (isFlagValue(next)) {
        flags[arg.slice(2)] = next;
        i++;
      } else {
        flags[arg.slice(2)] = true;
      }
      continue;
    }

    if (arg.startsWith("-") && arg.length === 2) {
      flags[arg.slice(1)] = true;
      continue;
    }

    if (arg.startsWith("-")) continue;

    if (!command) {
      command = arg;
    } else {
      positional.push(arg);
    }
  }

  return { command, flags, positional };
}

/** The flag's value, or undefined when it is absent or was given without one. */
export function getStringFlag(args: ParsedArgs, name: string): string | undefined {
  const value = args.flags[name];
  return typeof value === "string" ? value : undefined;
}
