/**
 * Meta mutation rules shared by every storage backend.
 */

import { InvariantViolationError } from "@chatmem/sdk";
import type { ConversationMeta } from "@chatmem/sdk";

export function freshMeta(windowSize: number): ConversationMeta {
  return { messageCount: 0, windowSize, lastSummarizedCount: 0 };
}

export function assertWindowSize(windowSize: number): void {
  if (!Number.isInteger(windowSize) || windowSize <= 0) {
    throw new RangeError(`windowSize must be a positive integer, got ${windowSize}`);
  }
}

export function applyIncrement(conversationId: string, meta: ConversationMeta, by: number): ConversationMeta {
  if (!Number.isInteger(by) || by <= 0) {
    throw new InvariantViolationError(conversationId, `message count increment must be a positive integer, got ${by}`);
  }
  return { ...meta, messageCount: meta.messageCount + by };
}

export function applyMarkSummarized(
  conversationId: string,
  meta: ConversationMeta,
  upToCount: number,
): ConversationMeta {
  if (!Number.isInteger(upToCount) || upToCount % meta.windowSize !== 0) {
    throw new InvariantViolationError(
      conversationId,
      `summarized count ${upToCount} is not a multiple of window size ${meta.windowSize}`,
    );
  }
  if (upToCount < meta.lastSummarizedCount) {
    throw new InvariantViolationError(
      conversationId,
      `summarized count cannot decrease from ${meta.lastSummarizedCount} to ${upToCount}`,
    );
  }
  if (upToCount > meta.messageCount) {
    throw new InvariantViolationError(
      conversationId,
      `summarized count ${upToCount} exceeds message count ${meta.messageCount}`,
    );
  }
  return { ...meta, lastSummarizedCount: upToCount };
}

export function assertRange(start: number, end: number): void {
  if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || end < start) {
    throw new RangeError(`Invalid message range [${start}, ${end})`);
  }
}

export function assertLength(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
  }
}
