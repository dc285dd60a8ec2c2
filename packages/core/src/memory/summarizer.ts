/**
 * Summarizer - folds the oldest un-summarized window into the running
 * summary.
 *
 * The collaborator call runs outside the conversation lock. The result is
 * committed under the lock only if the conversation was not reset and the
 * boundary was not folded by someone else in the meantime. Every failure
 * becomes a `failed` outcome; nothing here throws.
 */

import type {
  ConversationMeta,
  ConversationStores,
  MessageRange,
  SummarizationCollaborator,
  SummarizationOutcome,
  Summary,
} from "@chatmem/sdk";
import { CollaboratorError, InvariantViolationError, errorKind, errorMessage } from "@chatmem/sdk";
import { createLogger } from "@chatmem/shared";
import type { Logger } from "@chatmem/shared";

export function isSummarizationDue(meta: ConversationMeta): boolean {
  return meta.messageCount - meta.lastSummarizedCount >= meta.windowSize;
}

/** The oldest window not yet folded, or null when none is complete. */
export function nextSummarizationRange(meta: ConversationMeta): MessageRange | null {
  if (!isSummarizationDue(meta)) return null;
  return { start: meta.lastSummarizedCount, end: meta.lastSummarizedCount + meta.windowSize };
}

export interface SummarizationTarget {
  stores: ConversationStores;
  /** Run `fn` under the conversation lock. */
  withLock<T>(fn: () => Promise<T>): Promise<T>;
  /** False once the conversation was reset after this run was scheduled. */
  isCurrent(): boolean;
}

export interface SummarizerOptions {
  collaborator: SummarizationCollaborator;
  language: string;
  timeoutMs: number;
  logger?: Logger;
}

export interface Summarizer {
  /** Fold at most one window. */
  summarizeNext(target: SummarizationTarget): Promise<SummarizationOutcome>;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function createSummarizer(options: SummarizerOptions): Summarizer {
  const logger = options.logger ?? createLogger("Summarizer");

  /** Summary already covers the range: a crash hit between the two writes. */
  async function advanceMarkOnly(
    target: SummarizationTarget,
    range: MessageRange,
    summary: Summary,
  ): Promise<SummarizationOutcome> {
    return target.withLock(async (): Promise<SummarizationOutcome> => {
      const meta = await target.stores.meta.read();
      if (!target.isCurrent() || meta.lastSummarizedCount !== range.start) {
        return { status: "stale", range };
      }
      await target.stores.meta.markSummarized(range.end);
      logger.info("Summary mark recovered", {
        conversationId: target.stores.conversationId,
        highWaterMark: range.end,
      });
      return { status: "merged", range, summary };
    });
  }

  async function fold(target: SummarizationTarget, range: MessageRange): Promise<SummarizationOutcome> {
    const { stores } = target;
    const conversationId = stores.conversationId;

    const previous = await stores.summary.read();
    if (previous && previous.highWaterMark >= range.end) {
      return advanceMarkOnly(target, range, previous);
    }

    const messages = await stores.messages.readRange(range.start, range.end);
    if (messages.length !== range.end - range.start) {
      throw new InvariantViolationError(
        conversationId,
        `expected ${range.end - range.start} messages in [${range.start}, ${range.end}), found ${messages.length}`,
      );
    }

    const stop = logger.time("summarize");
    let text: string;
    try {
      text = await options.collaborator.summarize(previous?.text ?? null, messages, {
        language: options.language,
        signal: AbortSignal.timeout(options.timeoutMs),
      });
    } finally {
      stop();
    }
    if (text.trim() === "") {
      throw new CollaboratorError("summarization", "invalid_response", "empty summary");
    }

    return target.withLock(async (): Promise<SummarizationOutcome> => {
      if (!target.isCurrent()) {
        return { status: "stale", range };
      }
      const meta = await stores.meta.read();
      if (meta.lastSummarizedCount !== range.start) {
        return { status: "stale", range };
      }

      const current = await stores.summary.read();
      if (current && current.highWaterMark >= range.end) {
        await stores.meta.markSummarized(range.end);
        return { status: "merged", range, summary: current };
      }

      const summary: Summary = {
        text: text.trim(),
        highWaterMark: range.end,
        version: (current?.version ?? 0) + 1,
        updatedAt: Date.now(),
      };
      await stores.summary.write(summary);
      await stores.meta.markSummarized(range.end);
      logger.info("Summary merged", {
        conversationId,
        version: summary.version,
        highWaterMark: summary.highWaterMark,
      });
      return { status: "merged", range, summary };
    });
  }

  return {
    async summarizeNext(target: SummarizationTarget): Promise<SummarizationOutcome> {
      const conversationId = target.stores.conversationId;
      let range: MessageRange | null = null;
      try {
        if (!target.isCurrent()) return { status: "skipped" };
        range = nextSummarizationRange(await target.stores.meta.read());
        if (!range) return { status: "skipped" };
        return await fold(target, range);
      } catch (err) {
        logger.warn("Summarization failed", {
          conversationId,
          kind: errorKind(err),
          error: errorMessage(err),
          range,
        });
        return { status: "failed", range, error: toError(err) };
      }
    },
  };
}
