/**
 * Chat command - a terminal conversation with the assistant.
 *
 * Each input line is handled exactly like an incoming chat message, so
 * `/status`, `/reset` and `/start` work here too. `/exit` or end of input
 * quits after pending summaries are written.
 */

import { createInterface } from "node:readline";
import { isValidConversationId } from "@chatmem/sdk";
import { getStringFlag } from "../utils/args.js";
import type { CliCommand, CommandDeps, ParsedArgs } from "./base.js";
import { loadRuntime } from "./base.js";

export const DEFAULT_CHAT_ID = "local";

export interface ChatCommandDeps extends CommandDeps {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export class ChatCommand implements CliCommand {
  name = "chat";
  description = "Chat with the assistant in the terminal (default)";

  constructor(private readonly deps: ChatCommandDeps = {}) {}

  async execute(args: ParsedArgs): Promise<number> {
    const chatId = getStringFlag(args, "chat") ?? DEFAULT_CHAT_ID;
    if (!isValidConversationId(chatId)) {
      console.error(`[cli] Invalid chat id: ${chatId}`);
      return 1;
    }

    const runtime = loadRuntime(this.deps);
    if (!runtime) return 1;
    if (!runtime.config.llm && !this.deps.generator) {
      console.error("[cli] OPENROUTER_API_KEY is not set");
      return 1;
    }

    const output = this.deps.output ?? process.stdout;
    const rl = createInterface({ input: this.deps.input ?? process.stdin, terminal: false });
    runtime.logger.info("Chat started", { conversationId: chatId });

    try {
      for await (const line of rl) {
        if (line.trim() === "/exit") break;
        const reply = await runtime.service.handleMessage(chatId, line);
        if (reply !== null) output.write(`${reply}\n`);
      }
    } finally {
      rl.close();
      await runtime.manager.whenIdle();
    }
    return 0;
  }
}
