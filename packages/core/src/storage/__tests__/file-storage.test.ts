import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { appendFile, mkdir, mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { CompositionError, StorageUnavailableError } from "@chatmem/sdk";
import { createFileConversationStorage } from "../file-storage.js";
import { describeStorageContract } from "./storage-contract.js";

describeStorageContract("file", async () => {
  const dataDir = await mkdtemp(join(tmpdir(), "chatmem-storage-"));
  return {
    storage: createFileConversationStorage({ dataDir }),
    cleanup: () => rm(dataDir, { recursive: true, force: true }),
  };
});

describe("createFileConversationStorage", () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), "chatmem-storage-"));
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it("lays out one directory per conversation", async () => {
    const stores = createFileConversationStorage({ dataDir }).open("-1001", 2);
    await stores.messages.appendMany([
      { role: "user", content: "q", createdAt: 10 },
      { role: "assistant", content: "a", createdAt: 11 },
    ]);
    await stores.meta.incrementCount(2);
    await stores.summary.write({ text: "s", highWaterMark: 2, version: 1, updatedAt: 12 });

    expect((await readdir(join(dataDir, "-1001"))).sort()).toEqual(["messages.jsonl", "meta.json", "summary.json"]);
    expect(await readFile(join(dataDir, "-1001", "messages.jsonl"), "utf-8")).toBe(
      '{"seq":0,"role":"user","content":"q","createdAt":10}\n' +
        '{"seq":1,"role":"assistant","content":"a","createdAt":11}\n',
    );
    expect(JSON.parse(await readFile(join(dataDir, "-1001", "meta.json"), "utf-8"))).toEqual({
      messageCount: 2,
      windowSize: 2,
      lastSummarizedCount: 0,
    });
  });

  it("survives a new storage instance on the same directory", async () => {
    const first = createFileConversationStorage({ dataDir }).open("chat-1", 2);
    await first.messages.appendMany([
      { role: "user", content: "q" },
      { role: "assistant", content: "a" },
    ]);
    await first.meta.incrementCount(2);
    await first.meta.markSummarized(2);
    await first.summary.write({ text: "сводка", highWaterMark: 2, version: 1, updatedAt: 1 });

    const second = createFileConversationStorage({ dataDir }).open("chat-1", 10);
    expect(await second.messages.count()).toBe(2);
    expect(await second.meta.read()).toEqual({ messageCount: 2, windowSize: 2, lastSummarizedCount: 2 });
    expect((await second.summary.read())?.text).toBe("сводка");
  });

  it("ignores an unterminated trailing record and overwrites it on the next append", async () => {
    const storage = createFileConversationStorage({ dataDir });
    const { messages } = storage.open("chat-1", 20);
    await messages.append({ role: "user", content: "kept", createdAt: 1 });
    await appendFile(join(dataDir, "chat-1", "messages.jsonl"), '{"seq":1,"role":"assis');

    expect(await messages.count()).toBe(1);
    expect(await messages.append({ role: "assistant", content: "next", createdAt: 2 })).toBe(1);
    expect((await messages.readRange(0, 2)).map((m) => m.content)).toEqual(["kept", "next"]);
  });

  it("raises CompositionError for an unparseable record", async () => {
    const { messages } = createFileConversationStorage({ dataDir }).open("chat-1", 20);
    await messages.append({ role: "user", content: "ok", createdAt: 1 });
    await appendFile(join(dataDir, "chat-1", "messages.jsonl"), "not json\n");

    await expect(messages.readLast(2)).rejects.toMatchObject({ name: "CompositionError", seq: 1 });
  });

  it("raises CompositionError for a record with a bad role", async () => {
    const { messages } = createFileConversationStorage({ dataDir }).open("chat-1", 20);
    await messages.append({ role: "user", content: "ok", createdAt: 1 });
    await appendFile(
      join(dataDir, "chat-1", "messages.jsonl"),
      '{"seq":1,"role":"tool","content":"x","createdAt":2}\n',
    );

    await expect(messages.count()).rejects.toBeInstanceOf(CompositionError);
  });

  it("raises CompositionError for records out of order", async () => {
    const { messages } = createFileConversationStorage({ dataDir }).open("chat-1", 20);
    await messages.append({ role: "user", content: "ok", createdAt: 1 });
    await appendFile(
      join(dataDir, "chat-1", "messages.jsonl"),
      '{"seq":5,"role":"assistant","content":"x","createdAt":2}\n',
    );

    await expect(messages.readLast(1)).rejects.toThrow("Message #1: record out of order, stored seq 5");
  });

  it("raises CompositionError for a meta record that breaks its invariants", async () => {
    const stores = createFileConversationStorage({ dataDir }).open("chat-1", 4);
    await stores.meta.incrementCount(2);
    await writeFile(
      join(dataDir, "chat-1", "meta.json"),
      JSON.stringify({ messageCount: 2, windowSize: 4, lastSummarizedCount: 4 }),
    );

    await expect(stores.meta.read()).rejects.toBeInstanceOf(CompositionError);
  });

  it("wraps I/O failures in StorageUnavailableError", async () => {
    const blocked = join(dataDir, "not-a-dir");
    await writeFile(blocked, "");
    const { messages } = createFileConversationStorage({ dataDir: blocked }).open("chat-1", 20);

    const failure = messages.append({ role: "user", content: "x" });
    await expect(failure).rejects.toBeInstanceOf(StorageUnavailableError);
    await expect(failure).rejects.toMatchObject({ conversationId: "chat-1", operation: "append" });
  });

  it("leaves no lock or temp files behind after meta updates", async () => {
    const { meta } = createFileConversationStorage({ dataDir }).open("chat-1", 4);
    await meta.incrementCount(4);
    await meta.markSummarized(4);
    expect(await readdir(join(dataDir, "chat-1"))).toEqual(["meta.json"]);
  });

  it("waits for the log lock file held by another process", async () => {
    const dir = join(dataDir, "chat-1");
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, "messages.lock"), JSON.stringify({ pid: process.pid, ts: Date.now() }));
    const { messages } = createFileConversationStorage({ dataDir, lockTimeoutMs: 50 }).open("chat-1", 20);

    const blocked = messages.append({ role: "user", content: "q" });
    await expect(blocked).rejects.toBeInstanceOf(StorageUnavailableError);
    await expect(blocked).rejects.toMatchObject({ operation: "append" });
    expect(await messages.count()).toBe(0);

    await rm(join(dir, "messages.lock"));
    await expect(messages.append({ role: "user", content: "q" })).resolves.toBe(0);
    expect(await readdir(dir)).toEqual(["messages.jsonl"]);
  });

  it("clear removes the conversation directory", async () => {
    const storage = createFileConversationStorage({ dataDir });
    await storage.open("chat-1", 4).meta.incrementCount(1);
    await storage.clear("chat-1");
    expect(await readdir(dataDir)).toEqual([]);
  });
});
