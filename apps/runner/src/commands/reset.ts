/**
 * Reset command - delete the history and summary of one conversation.
 */

import { errorMessage, isValidConversationId } from "@chatmem/sdk";
import { Replies } from "../chat-service.js";
import { getStringFlag } from "../utils/args.js";
import type { CliCommand, CommandDeps, ParsedArgs } from "./base.js";
import { loadRuntime } from "./base.js";

export class ResetCommand implements CliCommand {
  name = "reset";
  description = "Clear the history and summary of a conversation";

  constructor(private readonly deps: CommandDeps = {}) {}

  async execute(args: ParsedArgs): Promise<number> {
    const chatId = getStringFlag(args, "chat");
    if (chatId === undefined || !isValidConversationId(chatId)) {
      console.error("[cli] reset requires --chat <id>");
      return 1;
    }

    const runtime = loadRuntime(this.deps);
    if (!runtime) return 1;

    try {
      await runtime.manager.reset(chatId);
      console.log(Replies.RESET);
      return 0;
    } catch (err) {
      console.error(`[cli] Failed to reset conversation ${chatId}: ${errorMessage(err)}`);
      return 1;
    }
  }
}
