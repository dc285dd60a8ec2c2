/**
 * Conversation context manager - SDK contract for turn handling.
 * Implementation lives in packages/core.
 */

import type { PromptPayload } from "../types/message.js";
import type { ConversationStatus, MessageRange, Summary } from "../types/conversation.js";
import type { GenerateOptions, ReplyGenerator } from "../types/collaborator.js";

/** Result of one summarization attempt. */
export type SummarizationOutcome =
  | { status: "merged"; range: MessageRange; summary: Summary }
  /** range is null when the failure happened before a range was chosen. */
  | { status: "failed"; range: MessageRange | null; error: Error }
  /** The conversation was reset or the boundary was already folded. */
  | { status: "stale"; range: MessageRange }
  /** Nothing was due. */
  | { status: "skipped" };

export interface TurnCommitResult {
  /** false when the conversation was reset after the turn was prepared. */
  committed: boolean;
  messageCount: number;
  /**
   * Outcomes of the summarizations started by this commit, in order.
   * Never rejects; empty when nothing was due.
   */
  summarization: Promise<SummarizationOutcome[]>;
}

/** A turn whose prompt is built but whose messages are not yet stored. */
export interface PreparedTurn {
  readonly conversationId: string;
  readonly userInput: string;
  readonly payload: PromptPayload;
  /** Store the user input and the assistant reply. Callable once. */
  commit(assistantReply: string): Promise<TurnCommitResult>;
}

export interface TurnResult {
  reply: string;
  messageCount: number;
  summarization: Promise<SummarizationOutcome[]>;
}

export interface IConversationContextManager {
  /** Build the prompt for a turn. Nothing is stored until commit. */
  handleTurn(conversationId: string, userInput: string): Promise<PreparedTurn>;

  /** handleTurn, generate, commit. A failed generation stores nothing. */
  runTurn(
    conversationId: string,
    userInput: string,
    generator: ReplyGenerator,
    options?: GenerateOptions,
  ): Promise<TurnResult>;

  /** Clear all state of a conversation. Idempotent. */
  reset(conversationId: string): Promise<void>;

  status(conversationId: string): Promise<ConversationStatus>;

  /** Resolve once in-flight summarizations (of one or all conversations) settle. */
  whenIdle(conversationId?: string): Promise<void>;
}
