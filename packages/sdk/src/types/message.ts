/**
 * Message types stored per conversation and sent to the LLM.
 */

/** Roles persisted in a conversation's message log. */
export type MessageRole = "user" | "assistant";

/** Roles that may appear in an assembled prompt. */
export type PromptRole = "system" | MessageRole;

/** A message before it is appended; the log assigns its sequence index. */
export interface NewMessage {
  role: MessageRole;
  content: string;
  /** Epoch ms. Defaults to the time of the append. */
  createdAt?: number;
}

/** A single message in a conversation's log. Immutable once written. */
export interface ConversationMessage {
  /** Position in the log, starting at 0. Defines the only total order. */
  seq: number;
  role: MessageRole;
  content: string;
  createdAt: number;
}

/** A message in the payload handed to the reply collaborator. */
export interface PromptMessage {
  role: PromptRole;
  content: string;
}

/** Ordered prompt for a single turn. */
export interface PromptPayload {
  messages: PromptMessage[];
}
