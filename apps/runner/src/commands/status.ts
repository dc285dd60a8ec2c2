/**
 * Status command - print the stored state of one conversation.
 */

import { errorMessage, isValidConversationId } from "@chatmem/sdk";
import { formatStatus } from "../chat-service.js";
import { getStringFlag } from "../utils/args.js";
import type { CliCommand, CommandDeps, ParsedArgs } from "./base.js";
import { loadRuntime } from "./base.js";

export class StatusCommand implements CliCommand {
  name = "status";
  description = "Show message count and summary state of a conversation";

  constructor(private readonly deps: CommandDeps = {}) {}

  async execute(args: ParsedArgs): Promise<number> {
    const chatId = getStringFlag(args, "chat");
    if (chatId === undefined || !isValidConversationId(chatId)) {
      console.error("[cli] status requires --chat <id>");
      return 1;
    }

    const runtime = loadRuntime(this.deps);
    if (!runtime) return 1;

    try {
      const status = await runtime.manager.status(chatId);
      console.log(formatStatus(status.messageCount, status.hasSummary, status.windowSize));
      if (args.flags.verbose) {
        console.log(`Summary version: ${status.summaryVersion}`);
        console.log(`Summarized messages: ${status.lastSummarizedCount}`);
      }
      return 0;
    } catch (err) {
      console.error(`[cli] Failed to read conversation ${chatId}: ${errorMessage(err)}`);
      return 1;
    }
  }
}
