/**
 * Stable error codes carried by every MemoryError.
 */

export const ErrorCode = {
  MEMORY_ERROR: "MEMORY_ERROR",
  STORAGE_UNAVAILABLE: "STORAGE_UNAVAILABLE",
  COMPOSITION_ERROR: "COMPOSITION_ERROR",
  COLLABORATOR_ERROR: "COLLABORATOR_ERROR",
  COLLABORATOR_TIMEOUT: "COLLABORATOR_TIMEOUT",
  COLLABORATOR_ABORTED: "COLLABORATOR_ABORTED",
  INVARIANT_VIOLATION: "INVARIANT_VIOLATION",
  CONVERSATION_ERROR: "CONVERSATION_ERROR",
  INVALID_CONVERSATION_ID: "INVALID_CONVERSATION_ID",
  TURN_ALREADY_COMMITTED: "TURN_ALREADY_COMMITTED",
  CONFIG_ERROR: "CONFIG_ERROR",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];
