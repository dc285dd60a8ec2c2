/**
 * Store contracts for a conversation's durable state.
 *
 * Every method may reject with StorageUnavailableError. Implementations
 * must keep append order, replace the summary atomically and apply meta
 * read-modify-write updates atomically.
 */

import type { ConversationMessage, NewMessage } from "../types/message.js";
import type { ConversationMeta, Summary } from "../types/conversation.js";

/** Append-only log of a conversation's messages. */
export interface IMessageLogStore {
  /** Append one message. Resolves to its sequence index. */
  append(message: NewMessage): Promise<number>;

  /** Append several messages as a single write. */
  appendMany(messages: NewMessage[]): Promise<number[]>;

  /** Messages with start <= seq < end, ascending. */
  readRange(start: number, end: number): Promise<ConversationMessage[]>;

  /** The last n messages, ascending. Fewer when the log is shorter. */
  readLast(n: number): Promise<ConversationMessage[]>;

  count(): Promise<number>;

  /** Drop every message with seq >= length. Used to roll back a failed commit. */
  truncate(length: number): Promise<void>;

  clear(): Promise<void>;
}

/** Holder of the latest merged summary. No history is kept. */
export interface ISummaryStore {
  /** null for a conversation that has never been summarized. */
  read(): Promise<Summary | null>;

  /** Atomically replace the stored summary. */
  write(summary: Summary): Promise<void>;

  clear(): Promise<void>;
}

/** Counters for a conversation. */
export interface IMetaStore {
  /** Current counters; defaults for a fresh conversation. */
  read(): Promise<ConversationMeta>;

  /** Add `by` to the message count. Resolves to the new total. */
  incrementCount(by: number): Promise<number>;

  /**
   * Advance lastSummarizedCount. Rejects with InvariantViolationError when
   * the value is not a multiple of the window size, decreases the mark or
   * exceeds the message count.
   */
  markSummarized(upToCount: number): Promise<void>;

  clear(): Promise<void>;
}

/** The three stores owned by one conversation. */
export interface ConversationStores {
  readonly conversationId: string;
  readonly messages: IMessageLogStore;
  readonly summary: ISummaryStore;
  readonly meta: IMetaStore;
}

/** Backend that hands out per-conversation stores. */
export interface IConversationStorage {
  readonly kind: string;

  /**
   * Stores for a conversation. `windowSize` is recorded when the
   * conversation's meta is first created.
   */
  open(conversationId: string, windowSize: number): ConversationStores;

  /** Remove all state of a conversation. No-op when it does not exist. */
  clear(conversationId: string): Promise<void>;

  exists(conversationId: string): Promise<boolean>;
}
