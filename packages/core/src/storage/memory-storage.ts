/**
 * In-memory conversation storage. State lives in process memory and is
 * lost on exit; used by tests and ephemeral sessions.
 */

import type {
  ConversationMessage,
  ConversationMeta,
  ConversationStores,
  IConversationStorage,
  NewMessage,
  Summary,
} from "@chatmem/sdk";
import { InvariantViolationError } from "@chatmem/sdk";
import { assertConversationId } from "./conversation-id.js";
import {
  applyIncrement,
  applyMarkSummarized,
  assertLength,
  assertRange,
  assertWindowSize,
  freshMeta,
} from "./meta-rules.js";

interface ConversationState {
  messages: ConversationMessage[];
  summary: Summary | null;
  meta: ConversationMeta | null;
}

export function createInMemoryConversationStorage(): IConversationStorage {
  const states = new Map<string, ConversationState>();

  function peek(conversationId: string): ConversationState | undefined {
    return states.get(conversationId);
  }

  function ensure(conversationId: string): ConversationState {
    let state = states.get(conversationId);
    if (!state) {
      state = { messages: [], summary: null, meta: null };
      states.set(conversationId, state);
    }
    return state;
  }

  function open(conversationId: string, windowSize: number): ConversationStores {
    assertConversationId(conversationId);
    assertWindowSize(windowSize);

    const metaOf = (state: ConversationState | undefined): ConversationMeta =>
      state?.meta ?? freshMeta(windowSize);

    const appendMany = async (messages: NewMessage[]): Promise<number[]> => {
      const state = ensure(conversationId);
      const now = Date.now();
      return messages.map((m) => {
        const seq = state.messages.length;
        state.messages.push({ seq, role: m.role, content: m.content, createdAt: m.createdAt ?? now });
        return seq;
      });
    };

    return {
      conversationId,

      messages: {
        async append(message: NewMessage): Promise<number> {
          const [seq] = await appendMany([message]);
          return seq;
        },

        appendMany,

        async readRange(start: number, end: number): Promise<ConversationMessage[]> {
          assertRange(start, end);
          return (peek(conversationId)?.messages ?? []).slice(start, end).map((m) => ({ ...m }));
        },

        async readLast(n: number): Promise<ConversationMessage[]> {
          assertLength("n", n);
          if (n === 0) return [];
          return (peek(conversationId)?.messages ?? []).slice(-n).map((m) => ({ ...m }));
        },

        async count(): Promise<number> {
          return peek(conversationId)?.messages.length ?? 0;
        },

        async truncate(length: number): Promise<void> {
          assertLength("length", length);
          const state = peek(conversationId);
          if (state && state.messages.length > length) {
            state.messages.length = length;
          }
        },

        async clear(): Promise<void> {
          const state = peek(conversationId);
          if (state) state.messages = [];
        },
      },

      summary: {
        async read(): Promise<Summary | null> {
          const summary = peek(conversationId)?.summary;
          return summary ? { ...summary } : null;
        },

        async write(summary: Summary): Promise<void> {
          const state = ensure(conversationId);
          if (state.summary && summary.highWaterMark < state.summary.highWaterMark) {
            throw new InvariantViolationError(
              conversationId,
              `summary high-water mark cannot decrease from ${state.summary.highWaterMark} to ${summary.highWaterMark}`,
            );
          }
          state.summary = { ...summary };
        },

        async clear(): Promise<void> {
          const state = peek(conversationId);
          if (state) state.summary = null;
        },
      },

      meta: {
        async read(): Promise<ConversationMeta> {
          return { ...metaOf(peek(conversationId)) };
        },

        async incrementCount(by: number): Promise<number> {
          const state = ensure(conversationId);
          state.meta = applyIncrement(conversationId, metaOf(state), by);
          return state.meta.messageCount;
        },

        async markSummarized(upToCount: number): Promise<void> {
          const state = ensure(conversationId);
          state.meta = applyMarkSummarized(conversationId, metaOf(state), upToCount);
        },

        async clear(): Promise<void> {
          const state = peek(conversationId);
          if (state) state.meta = null;
        },
      },
    };
  }

  return {
    kind: "memory",
    open,

    async clear(conversationId: string): Promise<void> {
      assertConversationId(conversationId);
      states.delete(conversationId);
    },

    async exists(conversationId: string): Promise<boolean> {
      assertConversationId(conversationId);
      const state = states.get(conversationId);
      return state !== undefined && (state.messages.length > 0 || state.summary !== null || state.meta !== null);
    },
  };
}
