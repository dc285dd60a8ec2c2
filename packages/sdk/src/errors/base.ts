/**
 * Error hierarchy for the conversation memory engine.
 */

import { ErrorCode } from "./codes.js";

export class MemoryError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "MemoryError";
  }
}

/**
 * A store could not read or write its backing medium.
 * Surfaced to the caller; the operation committed nothing.
 */
export class StorageUnavailableError extends MemoryError {
  constructor(
    public readonly conversationId: string,
    public readonly operation: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(
      `Storage unavailable for conversation "${conversationId}" during ${operation}: ${message}`,
      ErrorCode.STORAGE_UNAVAILABLE,
      options,
    );
    this.name = "StorageUnavailableError";
  }
}

/**
 * A stored message is structurally invalid. Indicates corruption upstream
 * and is never retried.
 */
export class CompositionError extends MemoryError {
  constructor(
    message: string,
    public readonly seq?: number,
    options?: { cause?: unknown },
  ) {
    super(
      seq === undefined ? message : `Message #${seq}: ${message}`,
      ErrorCode.COMPOSITION_ERROR,
      options,
    );
    this.name = "CompositionError";
  }
}

export type CollaboratorName = "reply" | "summarization";
export type CollaboratorFailureKind = "network" | "timeout" | "aborted" | "invalid_response";

const COLLABORATOR_CODES: Record<CollaboratorFailureKind, string> = {
  network: ErrorCode.COLLABORATOR_ERROR,
  invalid_response: ErrorCode.COLLABORATOR_ERROR,
  timeout: ErrorCode.COLLABORATOR_TIMEOUT,
  aborted: ErrorCode.COLLABORATOR_ABORTED,
};

/** An LLM collaborator call failed. */
export class CollaboratorError extends MemoryError {
  constructor(
    public readonly collaborator: CollaboratorName,
    public readonly kind: CollaboratorFailureKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${collaborator} collaborator ${kind}: ${message}`, COLLABORATOR_CODES[kind], options);
    this.name = "CollaboratorError";
  }
}

/** A mutation would break a Meta or Summary invariant. */
export class InvariantViolationError extends MemoryError {
  constructor(
    public readonly conversationId: string,
    message: string,
  ) {
    super(`Conversation "${conversationId}": ${message}`, ErrorCode.INVARIANT_VIOLATION);
    this.name = "InvariantViolationError";
  }
}

export class ConversationError extends MemoryError {
  constructor(
    public readonly conversationId: string,
    message: string,
    options?: { cause?: unknown; code?: string },
  ) {
    super(
      `Conversation "${conversationId}" error: ${message}`,
      options?.code ?? ErrorCode.CONVERSATION_ERROR,
      options,
    );
    this.name = "ConversationError";
  }
}

export class ConfigError extends MemoryError {
  constructor(
    message: string,
    options?: { cause?: unknown; code?: string },
  ) {
    super(message, options?.code ?? ErrorCode.CONFIG_ERROR, options);
    this.name = "ConfigError";
  }
}

/** Error kind for log records: the error's name, or "UnknownError". */
export function errorKind(err: unknown): string {
  return err instanceof Error ? err.name : "UnknownError";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
