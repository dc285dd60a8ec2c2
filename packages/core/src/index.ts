// Storage
export { createInMemoryConversationStorage } from "./storage/memory-storage.js";
export { createFileConversationStorage } from "./storage/file-storage.js";
export type { FileConversationStorageOptions } from "./storage/file-storage.js";

// Memory
export { createContextAssembler, summaryHeading } from "./memory/context.js";
export type { ContextAssemblerOptions } from "./memory/context.js";
export {
  buildSummarizationMessages,
  createChatSummarizationCollaborator,
  formatTranscript,
} from "./memory/prompts.js";
export { createSummarizer, isSummarizationDue, nextSummarizationRange } from "./memory/summarizer.js";
export type { Summarizer, SummarizerOptions, SummarizationTarget } from "./memory/summarizer.js";
export { ConversationMessageSchema, ConversationMetaSchema, SummarySchema } from "./memory/schema.js";

// Conversation
export { createConversationContextManager } from "./conversation/manager.js";
export type { ConversationContextManagerOptions } from "./conversation/manager.js";
