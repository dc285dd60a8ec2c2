/**
 * CLI subcommand router.
 *
 *   chatmem [chat] [--chat <id>]
 *   chatmem status --chat <id> [--verbose]
 *   chatmem reset --chat <id>
 *   chatmem version [--verbose]
 */

import { parseArgs } from "./utils/args.js";
import type { CliCommand } from "./commands/base.js";
import { ChatCommand } from "./commands/chat.js";
import type { ChatCommandDeps } from "./commands/chat.js";
import { ResetCommand } from "./commands/reset.js";
import { StatusCommand } from "./commands/status.js";
import { VersionCommand } from "./commands/version.js";

function printHelp(commands: CliCommand[]): void {
  console.log("chatmem - chat assistant with per-conversation memory");
  console.log("");
  console.log("Usage: chatmem <command> [options]");
  console.log("");
  console.log("Commands:");
  for (const command of commands) {
    console.log(`  ${command.name.padEnd(9)}${command.description}`);
  }
  console.log("");
  console.log("Options:");
  console.log("  --chat <id>   Conversation id (chat defaults to \"local\")");
  console.log("  --verbose     Show detailed output");
  console.log("  --help, -h    Show this help message");
}

export async function runCli(argv: string[], deps: ChatCommandDeps = {}): Promise<number> {
  const parsed = parseArgs(argv);
  const commands: CliCommand[] = [
    new ChatCommand(deps),
    new StatusCommand(deps),
    new ResetCommand(deps),
    new VersionCommand(),
  ];

  if (parsed.flags.help === true || parsed.flags.h === true) {
    printHelp(commands);
    return 0;
  }

  const name = parsed.command === "" ? "chat" : parsed.command;
  const command = commands.find((cmd) => cmd.name === name);
  if (!command) {
    console.error(`Unknown command: ${parsed.command}`);
    console.error(`Available commands: ${commands.map((cmd) => cmd.name).join(", ")}`);
    return 1;
  }
  return command.execute(parsed);
}
