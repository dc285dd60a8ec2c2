/**
 * File-backed conversation storage.
 *
 * Layout: `<dataDir>/<conversationId>/`
 *   messages.jsonl  one JSON record per line, appended or rewritten under
 *                   an in-process lock and an O_EXCL lock file (messages.lock)
 *   summary.json    replaced atomically (tmp file + rename)
 *   meta.json       replaced atomically under an in-process lock and an
 *                   O_EXCL lock file (meta.lock)
 *
 * Each store call opens and closes its own file handles.
 */

import { appendFile, mkdir, rm, stat, truncate as truncateFile } from "node:fs/promises";
import { join } from "node:path";
import type {
  ConversationMessage,
  ConversationMeta,
  ConversationStores,
  IConversationStorage,
  IMessageLogStore,
  IMetaStore,
  ISummaryStore,
  NewMessage,
  Summary,
} from "@chatmem/sdk";
import {
  CompositionError,
  InvariantViolationError,
  MemoryError,
  StorageUnavailableError,
  errorMessage,
} from "@chatmem/sdk";
import {
  createLogger,
  formatZodError,
  isMissingFile,
  readTextIfExists,
  withFileLock,
  withProcessLock,
  writeFileAtomic,
} from "@chatmem/shared";
import type { Logger } from "@chatmem/shared";
import { ConversationMessageSchema, ConversationMetaSchema, SummarySchema } from "../memory/schema.js";
import { assertConversationId } from "./conversation-id.js";
import {
  applyIncrement,
  applyMarkSummarized,
  assertLength,
  assertRange,
  assertWindowSize,
  freshMeta,
} from "./meta-rules.js";

const MESSAGES_FILE = "messages.jsonl";
const MESSAGES_LOCK_FILE = "messages.lock";
const SUMMARY_FILE = "summary.json";
const META_FILE = "meta.json";
const META_LOCK_FILE = "meta.lock";

export interface FileConversationStorageOptions {
  dataDir: string;
  /** Max wait for the log and meta lock files. Default: 5000 */
  lockTimeoutMs?: number;
  logger?: Logger;
}

/** Wrap I/O failures as StorageUnavailableError; memory-engine errors pass through. */
async function guardIo<T>(conversationId: string, operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof MemoryError) throw err;
    throw new StorageUnavailableError(conversationId, operation, errorMessage(err), { cause: err });
  }
}

function parseJson(raw: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }
}

interface LogContents {
  messages: ConversationMessage[];
  /** Byte length of the complete lines; anything after it is a torn write. */
  completeBytes: number;
  torn: boolean;
}

function parseLog(conversationId: string, raw: string | null, logger: Logger): LogContents {
  if (raw === null || raw.length === 0) {
    return { messages: [], completeBytes: 0, torn: false };
  }

  const lastNewline = raw.lastIndexOf("\n");
  const complete = raw.slice(0, lastNewline + 1);
  const torn = lastNewline + 1 < raw.length;
  if (torn) {
    logger.warn("Ignoring unterminated trailing record", {
      conversationId,
      bytes: Buffer.byteLength(raw) - Buffer.byteLength(complete),
    });
  }

  const messages: ConversationMessage[] = [];
  for (const line of complete.split("\n")) {
    if (line.trim() === "") continue;
    const seq = messages.length;
    const parsed = parseJson(line);
    if (!parsed.ok) {
      throw new CompositionError(`unparseable record: ${parsed.error}`, seq);
    }
    const result = ConversationMessageSchema.safeParse(parsed.value);
    if (!result.success) {
      throw new CompositionError(formatZodError(result.error), seq);
    }
    if (result.data.seq !== seq) {
      throw new CompositionError(`record out of order, stored seq ${result.data.seq}`, seq);
    }
    messages.push(result.data);
  }

  return { messages, completeBytes: Buffer.byteLength(complete), torn };
}

export function createFileConversationStorage(options: FileConversationStorageOptions): IConversationStorage {
  const logger = options.logger ?? createLogger("FileConversationStorage");
  const lockTimeoutMs = options.lockTimeoutMs ?? 5000;

  function conversationDir(conversationId: string): string {
    assertConversationId(conversationId);
    return join(options.dataDir, conversationId);
  }

  function createMessageLog(conversationId: string, dir: string): IMessageLogStore {
    const file = join(dir, MESSAGES_FILE);

    const readLog = async (): Promise<LogContents> => parseLog(conversationId, await readTextIfExists(file), logger);

    const readAll = (operation: string): Promise<ConversationMessage[]> =>
      guardIo(conversationId, operation, async () => (await readLog()).messages);

    const lockPath = join(dir, MESSAGES_LOCK_FILE);
    const withLogLock = <T>(fn: () => Promise<T>): Promise<T> =>
      withFileLock(lockPath, fn, { timeoutMs: lockTimeoutMs });

    const appendMany = (messages: NewMessage[]): Promise<number[]> =>
      guardIo(conversationId, "append", () =>
        withProcessLock(file, async () => {
          await mkdir(dir, { recursive: true });
          return withLogLock(async () => {
            const log = await readLog();
            if (log.torn) {
              await truncateFile(file, log.completeBytes);
            }

            const now = Date.now();
            const start = log.messages.length;
            const records = messages.map(
              (m, i): ConversationMessage => ({
                seq: start + i,
                role: m.role,
                content: m.content,
                createdAt: m.createdAt ?? now,
              }),
            );
            if (records.length === 0) return [];

            await appendFile(file, records.map((r) => `${JSON.stringify(r)}\n`).join(""), {
              encoding: "utf-8",
              mode: 0o600,
            });
            return records.map((r) => r.seq);
          });
        }),
      );

    return {
      async append(message: NewMessage): Promise<number> {
        const [seq] = await appendMany([message]);
        return seq;
      },

      appendMany,

      async readRange(start: number, end: number): Promise<ConversationMessage[]> {
        assertRange(start, end);
        return (await readAll("readRange")).slice(start, end);
      },

      async readLast(n: number): Promise<ConversationMessage[]> {
        assertLength("n", n);
        if (n === 0) return [];
        return (await readAll("readLast")).slice(-n);
      },

      async count(): Promise<number> {
        return (await readAll("count")).length;
      },

      async truncate(length: number): Promise<void> {
        assertLength("length", length);
        return guardIo(conversationId, "truncate", () =>
          withProcessLock(file, async () => {
            // Nothing to drop means nothing to lock; the directory may not exist.
            if ((await readLog()).messages.length <= length) return;
            await withLogLock(async () => {
              const { messages } = await readLog();
              if (messages.length <= length) return;
              const kept = messages.slice(0, length).map((m) => `${JSON.stringify(m)}\n`);
              await writeFileAtomic(file, kept.join(""));
            });
          }),
        );
      },

      clear(): Promise<void> {
        return guardIo(conversationId, "clearMessages", () =>
          withProcessLock(file, () => rm(file, { force: true })),
        );
      },
    };
  }

  function createSummaryStore(conversationId: string, dir: string): ISummaryStore {
    const file = join(dir, SUMMARY_FILE);

    const readSummary = async (): Promise<Summary | null> => {
      const raw = await readTextIfExists(file);
      if (raw === null) return null;
      const parsed = parseJson(raw);
      if (!parsed.ok) {
        throw new CompositionError(`unparseable summary record: ${parsed.error}`);
      }
      const result = SummarySchema.safeParse(parsed.value);
      if (!result.success) {
        throw new CompositionError(`invalid summary record: ${formatZodError(result.error)}`);
      }
      return result.data;
    };

    return {
      read(): Promise<Summary | null> {
        return guardIo(conversationId, "readSummary", readSummary);
      },

      write(summary: Summary): Promise<void> {
        return guardIo(conversationId, "writeSummary", () =>
          withProcessLock(file, async () => {
            const current = await readSummary();
            if (current && summary.highWaterMark < current.highWaterMark) {
              throw new InvariantViolationError(
                conversationId,
                `summary high-water mark cannot decrease from ${current.highWaterMark} to ${summary.highWaterMark}`,
              );
            }
            await mkdir(dir, { recursive: true });
            await writeFileAtomic(file, JSON.stringify(summary));
          }),
        );
      },

      clear(): Promise<void> {
        return guardIo(conversationId, "clearSummary", () => withProcessLock(file, () => rm(file, { force: true })));
      },
    };
  }

  function createMetaStore(conversationId: string, dir: string, windowSize: number): IMetaStore {
    const file = join(dir, META_FILE);
    const lockPath = join(dir, META_LOCK_FILE);

    const readMeta = async (): Promise<ConversationMeta> => {
      const raw = await readTextIfExists(file);
      if (raw === null) return freshMeta(windowSize);
      const parsed = parseJson(raw);
      if (!parsed.ok) {
        throw new CompositionError(`unparseable meta record: ${parsed.error}`);
      }
      const result = ConversationMetaSchema.safeParse(parsed.value);
      if (!result.success) {
        throw new CompositionError(`invalid meta record: ${formatZodError(result.error)}`);
      }
      return result.data;
    };

    const mutate = (
      operation: string,
      update: (meta: ConversationMeta) => ConversationMeta,
    ): Promise<ConversationMeta> =>
      guardIo(conversationId, operation, () =>
        withProcessLock(file, async () => {
          await mkdir(dir, { recursive: true });
          return withFileLock(
            lockPath,
            async () => {
              const next = update(await readMeta());
              await writeFileAtomic(file, JSON.stringify(next));
              return next;
            },
            { timeoutMs: lockTimeoutMs },
          );
        }),
      );

    return {
      read(): Promise<ConversationMeta> {
        return guardIo(conversationId, "readMeta", readMeta);
      },

      async incrementCount(by: number): Promise<number> {
        const next = await mutate("incrementCount", (meta) => applyIncrement(conversationId, meta, by));
        return next.messageCount;
      },

      async markSummarized(upToCount: number): Promise<void> {
        await mutate("markSummarized", (meta) => applyMarkSummarized(conversationId, meta, upToCount));
      },

      clear(): Promise<void> {
        return guardIo(conversationId, "clearMeta", () => withProcessLock(file, () => rm(file, { force: true })));
      },
    };
  }

  return {
    kind: "file",

    open(conversationId: string, windowSize: number): ConversationStores {
      const dir = conversationDir(conversationId);
      assertWindowSize(windowSize);
      return {
        conversationId,
        messages: createMessageLog(conversationId, dir),
        summary: createSummaryStore(conversationId, dir),
        meta: createMetaStore(conversationId, dir, windowSize),
      };
    },

    async clear(conversationId: string): Promise<void> {
      const dir = conversationDir(conversationId);
      return guardIo(conversationId, "clear", () => rm(dir, { recursive: true, force: true }));
    },

    async exists(conversationId: string): Promise<boolean> {
      const dir = conversationDir(conversationId);
      return guardIo(conversationId, "exists", async () => {
        try {
          return (await stat(dir)).isDirectory();
        } catch (err) {
          if (isMissingFile(err)) return false;
          throw err;
        }
      });
    },
  };
}
