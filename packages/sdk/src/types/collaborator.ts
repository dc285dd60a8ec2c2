/**
 * LLM collaborator contracts. Implementations reject with CollaboratorError.
 */

import type { ConversationMessage, PromptPayload } from "./message.js";

export interface GenerateOptions {
  signal?: AbortSignal;
}

/** Produces the assistant reply for an assembled prompt. */
export interface ReplyGenerator {
  generate(payload: PromptPayload, options?: GenerateOptions): Promise<string>;
}

export interface SummarizeOptions {
  /** Target language of the summary, e.g. "ru". */
  language: string;
  signal?: AbortSignal;
}

/** Merges the previous summary and a block of messages into a new summary. */
export interface SummarizationCollaborator {
  summarize(
    previousSummary: string | null,
    messages: ConversationMessage[],
    options: SummarizeOptions,
  ): Promise<string>;
}
