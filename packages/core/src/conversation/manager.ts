/**
 * ConversationContextManager - the only writer of conversation state.
 *
 * A turn is built without the lock, the reply is generated by the caller,
 * and `commit` stores both messages under the per-conversation lock. Window
 * boundaries reached by a commit are folded into the summary afterwards,
 * one window at a time, with at most one summarization loop per
 * conversation.
 */

import type {
  ConversationStatus,
  ConversationStores,
  GenerateOptions,
  IConversationContextManager,
  IConversationStorage,
  IContextAssembler,
  PreparedTurn,
  ReplyGenerator,
  SummarizationCollaborator,
  SummarizationOutcome,
  TurnCommitResult,
  TurnResult,
} from "@chatmem/sdk";
import {
  CollaboratorError,
  ConfigError,
  ConversationError,
  ErrorCode,
  errorKind,
  errorMessage,
} from "@chatmem/sdk";
import { KeyedLock, MemoryConfigSchema, createLogger, validateInput } from "@chatmem/shared";
import type { Logger, MemoryConfig } from "@chatmem/shared";
import { createContextAssembler } from "../memory/context.js";
import { createSummarizer, isSummarizationDue } from "../memory/summarizer.js";
import type { Summarizer, SummarizationTarget } from "../memory/summarizer.js";
import { assertConversationId } from "../storage/conversation-id.js";

export interface ConversationContextManagerOptions {
  storage: IConversationStorage;
  summarizer: SummarizationCollaborator;
  /** Missing fields take their defaults (window 20, language "ru"). */
  config?: Partial<MemoryConfig>;
  assembler?: IContextAssembler;
  logger?: Logger;
}

const NOTHING_DUE: Promise<SummarizationOutcome[]> = Promise.resolve([]);

export function createConversationContextManager(
  options: ConversationContextManagerOptions,
): IConversationContextManager {
  const parsed = validateInput(MemoryConfigSchema, options.config ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid memory configuration: ${parsed.error}`);
  }
  const config = parsed.data;

  const { storage } = options;
  const logger = options.logger ?? createLogger("ConversationManager");
  const assembler = options.assembler ?? createContextAssembler({ language: config.summaryLanguage });
  const summarizer: Summarizer = createSummarizer({
    collaborator: options.summarizer,
    language: config.summaryLanguage,
    timeoutMs: config.summaryTimeoutMs,
    logger: logger.child("Summarizer"),
  });

  const conversationLock = new KeyedLock();
  const summarizationQueue = new KeyedLock();
  const generations = new Map<string, number>();
  const inFlight = new Map<string, Promise<void>>();

  function generationOf(conversationId: string): number {
    return generations.get(conversationId) ?? 0;
  }

  function openStores(conversationId: string): ConversationStores {
    assertConversationId(conversationId);
    return storage.open(conversationId, config.windowSize);
  }

  async function catchUp(stores: ConversationStores, generation: number): Promise<SummarizationOutcome[]> {
    const conversationId = stores.conversationId;
    const target: SummarizationTarget = {
      stores,
      withLock: (fn) => conversationLock.run(conversationId, fn),
      isCurrent: () => generationOf(conversationId) === generation,
    };

    const outcomes: SummarizationOutcome[] = [];
    while (true) {
      const outcome = await summarizer.summarizeNext(target);
      if (outcome.status === "skipped") break;
      outcomes.push(outcome);
      if (outcome.status !== "merged") break;
    }
    return outcomes;
  }

  function scheduleSummarization(stores: ConversationStores, generation: number): Promise<SummarizationOutcome[]> {
    const conversationId = stores.conversationId;
    const run = summarizationQueue.run(conversationId, () => catchUp(stores, generation));
    const settled = run.then(
      () => undefined,
      (err: unknown) => {
        logger.error("Summarization loop crashed", { conversationId, kind: errorKind(err), error: errorMessage(err) });
      },
    );
    inFlight.set(conversationId, settled);
    void settled.then(() => {
      if (inFlight.get(conversationId) === settled) inFlight.delete(conversationId);
    });
    return run.catch((err: unknown): SummarizationOutcome[] => [
      { status: "failed", range: null, error: err instanceof Error ? err : new Error(String(err)) },
    ]);
  }

  async function commitTurn(
    stores: ConversationStores,
    generation: number,
    userInput: string,
    assistantReply: string,
  ): Promise<TurnCommitResult> {
    const conversationId = stores.conversationId;

    const committed = await conversationLock.run(conversationId, async () => {
      if (generationOf(conversationId) !== generation) {
        logger.info("Discarding turn prepared before reset", { conversationId });
        return null;
      }

      // Meta is the commit record: log entries past its count belong to a
      // turn that never committed.
      const { messageCount } = await stores.meta.read();
      const logged = await stores.messages.count();
      if (logged > messageCount) {
        logger.warn("Dropping uncommitted messages from the log", { conversationId, logged, messageCount });
        await stores.messages.truncate(messageCount);
      }

      await stores.messages.appendMany([
        { role: "user", content: userInput },
        { role: "assistant", content: assistantReply },
      ]);
      try {
        await stores.meta.incrementCount(2);
      } catch (err) {
        await stores.messages.truncate(messageCount).catch((rollbackErr: unknown) => {
          logger.error("Rollback of message log failed", {
            conversationId,
            kind: errorKind(rollbackErr),
            error: errorMessage(rollbackErr),
          });
        });
        throw err;
      }
      return stores.meta.read();
    });

    if (committed === null) {
      const meta = await stores.meta.read();
      return { committed: false, messageCount: meta.messageCount, summarization: NOTHING_DUE };
    }

    logger.debug("Turn committed", { conversationId, messageCount: committed.messageCount });
    const summarization = isSummarizationDue(committed) ? scheduleSummarization(stores, generation) : NOTHING_DUE;
    return { committed: true, messageCount: committed.messageCount, summarization };
  }

  async function handleTurn(conversationId: string, userInput: string): Promise<PreparedTurn> {
    const stores = openStores(conversationId);
    if (typeof userInput !== "string") {
      throw new ConversationError(conversationId, "user input must be a string");
    }
    const generation = generationOf(conversationId);

    const meta = await stores.meta.read();
    const [summary, window] = await Promise.all([
      stores.summary.read(),
      // Bounded by meta so entries of an uncommitted turn never reach the prompt.
      stores.messages.readRange(Math.max(0, meta.messageCount - meta.windowSize), meta.messageCount),
    ]);
    const payload = assembler.assemble({ systemPrompt: config.systemPrompt, summary, window, userInput });

    let commitStarted = false;
    return {
      conversationId,
      userInput,
      payload,
      async commit(assistantReply: string): Promise<TurnCommitResult> {
        if (commitStarted) {
          throw new ConversationError(conversationId, "turn already committed", {
            code: ErrorCode.TURN_ALREADY_COMMITTED,
          });
        }
        commitStarted = true;
        try {
          return await commitTurn(stores, generation, userInput, assistantReply);
        } catch (err) {
          commitStarted = false;
          throw err;
        }
      },
    };
  }

  return {
    handleTurn,

    async runTurn(
      conversationId: string,
      userInput: string,
      generator: ReplyGenerator,
      generateOptions?: GenerateOptions,
    ): Promise<TurnResult> {
      const turn = await handleTurn(conversationId, userInput);
      const signal = generateOptions?.signal;

      let reply: string;
      try {
        reply = await generator.generate(turn.payload, { signal });
      } catch (err) {
        logger.warn("Reply generation failed", { conversationId, kind: errorKind(err), error: errorMessage(err) });
        if (err instanceof CollaboratorError) throw err;
        throw new CollaboratorError("reply", "network", errorMessage(err), { cause: err });
      }
      if (signal?.aborted) {
        throw new CollaboratorError("reply", "aborted", "turn cancelled before commit");
      }

      const result = await turn.commit(reply);
      return { reply, messageCount: result.messageCount, summarization: result.summarization };
    },

    async reset(conversationId: string): Promise<void> {
      assertConversationId(conversationId);
      await conversationLock.run(conversationId, async () => {
        generations.set(conversationId, generationOf(conversationId) + 1);
        await storage.clear(conversationId);
      });
      logger.info("Conversation reset", { conversationId });
    },

    async status(conversationId: string): Promise<ConversationStatus> {
      const stores = openStores(conversationId);
      const [meta, summary] = await Promise.all([stores.meta.read(), stores.summary.read()]);
      return {
        conversationId,
        messageCount: meta.messageCount,
        hasSummary: summary !== null && summary.text.trim() !== "",
        windowSize: meta.windowSize,
        summaryVersion: summary?.version ?? 0,
        lastSummarizedCount: meta.lastSummarizedCount,
      };
    },

    async whenIdle(conversationId?: string): Promise<void> {
      if (conversationId !== undefined) {
        await inFlight.get(conversationId);
        return;
      }
      await Promise.all(inFlight.values());
    },
  };
}
