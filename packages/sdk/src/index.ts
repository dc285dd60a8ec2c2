// Types
export type {
  MessageRole,
  PromptRole,
  NewMessage,
  ConversationMessage,
  PromptMessage,
  PromptPayload,
} from "./types/message.js";

export type {
  Summary,
  ConversationMeta,
  ConversationStatus,
  MessageRange,
} from "./types/conversation.js";
export { isValidConversationId } from "./types/conversation.js";

export type {
  GenerateOptions,
  ReplyGenerator,
  SummarizeOptions,
  SummarizationCollaborator,
} from "./types/collaborator.js";

// Errors
export {
  MemoryError,
  StorageUnavailableError,
  CompositionError,
  CollaboratorError,
  InvariantViolationError,
  ConversationError,
  ConfigError,
  errorKind,
  errorMessage,
} from "./errors/base.js";
export type { CollaboratorName, CollaboratorFailureKind } from "./errors/base.js";

export { ErrorCode } from "./errors/codes.js";
export type { ErrorCodeValue } from "./errors/codes.js";

// Interfaces
export type { AssembleContextInput, IContextAssembler } from "./interfaces/context.js";
export type {
  IMessageLogStore,
  ISummaryStore,
  IMetaStore,
  ConversationStores,
  IConversationStorage,
} from "./interfaces/state.js";
export type {
  SummarizationOutcome,
  TurnCommitResult,
  PreparedTurn,
  TurnResult,
  IConversationContextManager,
} from "./interfaces/manager.js";
