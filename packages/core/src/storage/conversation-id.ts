import { ConversationError, ErrorCode, isValidConversationId } from "@chatmem/sdk";

export function assertConversationId(conversationId: string): void {
  if (!isValidConversationId(conversationId)) {
    throw new ConversationError(conversationId, "invalid conversation id", {
      code: ErrorCode.INVALID_CONVERSATION_ID,
    });
  }
}
