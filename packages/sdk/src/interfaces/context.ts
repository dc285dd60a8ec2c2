/**
 * Context assembler interface - composes what the LLM sees for one turn.
 */

import type { ConversationMessage, PromptPayload } from "../types/message.js";
import type { Summary } from "../types/conversation.js";

export interface AssembleContextInput {
  systemPrompt: string;
  summary: Summary | null;
  /** Prior messages of the working window. */
  window: ConversationMessage[];
  userInput: string;
}

/** Pure composition of a prompt; never touches storage. */
export interface IContextAssembler {
  assemble(input: AssembleContextInput): PromptPayload;
}
