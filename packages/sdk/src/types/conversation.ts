/**
 * Per-conversation records: running summary, counters and status snapshot.
 */

/** Latest merged summary of a conversation. */
export interface Summary {
  text: string;
  /** Number of messages absorbed into this summary. Never decreases. */
  highWaterMark: number;
  /** 1 for the first merge, incremented on every merge after that. */
  version: number;
  updatedAt: number;
}

/** Counters for one conversation. */
export interface ConversationMeta {
  messageCount: number;
  /** Fixed when the conversation is created. */
  windowSize: number;
  /** Always a multiple of windowSize and <= messageCount. */
  lastSummarizedCount: number;
}

/** Read-only snapshot returned by the status command. */
export interface ConversationStatus {
  conversationId: string;
  messageCount: number;
  hasSummary: boolean;
  windowSize: number;
  summaryVersion: number;
  lastSummarizedCount: number;
}

/** Half-open range [start, end) of message sequence indexes. */
export interface MessageRange {
  start: number;
  end: number;
}

const CONVERSATION_ID_MAX_LENGTH = 128;

/**
 * Conversation ids name directories in the file backend, so they must be
 * non-empty, bounded and free of path separators and "..".
 *
 * @example
 * isValidConversationId("-1001234567"); // true
 * isValidConversationId("../etc");      // false
 */
export function isValidConversationId(conversationId: string): boolean {
  if (typeof conversationId !== "string") return false;
  const trimmed = conversationId.trim();
  if (!trimmed || trimmed !== conversationId) return false;
  if (conversationId.length > CONVERSATION_ID_MAX_LENGTH) return false;
  if (conversationId === ".") return false;
  return !/[/\\\0]/.test(conversationId) && !conversationId.includes("..");
}
