/**
 * ChatCommandService - the transport-facing command surface.
 *
 * `/start`, `/status` and `/reset` are answered directly; any other slash
 * command is ignored. Plain text runs a turn through the context manager.
 */

import type { IConversationContextManager, ReplyGenerator } from "@chatmem/sdk";
import { CollaboratorError, errorKind, errorMessage } from "@chatmem/sdk";
import { createLogger } from "@chatmem/shared";
import type { Logger } from "@chatmem/shared";

export const Replies = {
  START: "Бот готов к работе",
  RESET: "История и сводка очищены.",
  EMPTY_REPLY: "Не удалось получить ответ.",
  SERVICE_UNAVAILABLE: "Сервис временно недоступен, попробуйте позже.",
} as const;

export function formatStatus(messageCount: number, hasSummary: boolean, windowSize: number): string {
  return `Сообщений: ${messageCount}. Сводка: ${hasSummary ? "есть" : "нет"}. Окно: ${windowSize}.`;
}

/** "/status@my_bot extra" -> "status"; null for plain text. */
export function parseCommand(text: string): string | null {
  if (!text.startsWith("/")) return null;
  const [head] = text.slice(1).split(/\s+/, 1);
  return head.split("@", 1)[0].toLowerCase();
}

export interface ChatCommandServiceDeps {
  manager: IConversationContextManager;
  generator: ReplyGenerator;
  logger?: Logger;
}

export class ChatCommandService {
  private readonly logger: Logger;

  constructor(private readonly deps: ChatCommandServiceDeps) {
    this.logger = deps.logger ?? createLogger("ChatCommandService");
  }

  /**
   * Reply text for an incoming message, or null when nothing should be sent.
   * Failures are logged and answered with a fixed apology; this never throws.
   */
  async handleMessage(chatId: string, text: string): Promise<string | null> {
    if (text.trim() === "") return null;
    try {
      return await this.dispatch(chatId, text);
    } catch (err) {
      const level = err instanceof CollaboratorError ? "warn" : "error";
      this.logger[level]("Message handling failed", {
        conversationId: chatId,
        kind: errorKind(err),
        error: errorMessage(err),
      });
      return Replies.SERVICE_UNAVAILABLE;
    }
  }

  private async dispatch(chatId: string, text: string): Promise<string | null> {
    const command = parseCommand(text);
    switch (command) {
      case null: {
        const { reply } = await this.deps.manager.runTurn(chatId, text, this.deps.generator);
        return reply.trim() === "" ? Replies.EMPTY_REPLY : reply;
      }
      case "start":
        return Replies.START;
      case "status": {
        const status = await this.deps.manager.status(chatId);
        return formatStatus(status.messageCount, status.hasSummary, status.windowSize);
      }
      case "reset":
        await this.deps.manager.reset(chatId);
        return Replies.RESET;
      default:
        this.logger.debug("Ignoring unknown command", { conversationId: chatId, command });
        return null;
    }
  }
}
