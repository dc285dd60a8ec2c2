import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError } from "@chatmem/sdk";
import { DEFAULT_SYSTEM_PROMPT } from "@chatmem/shared";
import { loadConfig, loadEnvFile } from "../src/config.js";

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "chatmem-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should apply defaults for an empty environment", () => {
    const config = loadConfig({ env: {}, cwd: dir });
    expect(config).toEqual({
      dataDir: "data",
      logLevel: "info",
      memory: {
        windowSize: 20,
        summaryLanguage: "ru",
        systemPrompt: DEFAULT_SYSTEM_PROMPT,
        summaryTimeoutMs: 30000,
      },
      llm: undefined,
    });
  });

  it("should read the LLM section when an API key is set", () => {
    const config = loadConfig({
      env: {
        OPENROUTER_API_KEY: "test-secret",
        OPENROUTER_MODEL: "test/model",
        LLM_TEMPERATURE: "0.2",
        ENABLE_RETRY: "yes",
      },
      cwd: dir,
    });
    expect(config.llm).toEqual({
      apiKey: "test-secret",
      baseUrl: "https://openrouter.ai/api/v1",
      model: "test/model",
      temperature: 0.2,
      timeoutMs: 30000,
      enableRetry: true,
    });
  });

  it("should coerce and validate WINDOW_SIZE", () => {
    expect(loadConfig({ env: { WINDOW_SIZE: "6" }, cwd: dir }).memory.windowSize).toBe(6);
    expect(() => loadConfig({ env: { WINDOW_SIZE: "0" }, cwd: dir })).toThrow(
      "Invalid configuration: memory.windowSize: windowSize must be a positive integer",
    );
  });

  it("should treat blank variables as unset", () => {
    const config = loadConfig({ env: { WINDOW_SIZE: "  ", OPENROUTER_API_KEY: "" }, cwd: dir });
    expect(config.memory.windowSize).toBe(20);
    expect(config.llm).toBeUndefined();
  });

  it("should reject an unknown boolean", () => {
    expect(() => loadConfig({ env: { OPENROUTER_API_KEY: "test-secret", ENABLE_RETRY: "maybe" }, cwd: dir })).toThrow(
      ConfigError,
    );
  });

  it("should prefer SYSTEM_PROMPT over SYSTEM_PROMPT_FILE", async () => {
    await writeFile(join(dir, "prompt.txt"), "from file\n");
    expect(loadConfig({ env: { SYSTEM_PROMPT_FILE: "prompt.txt" }, cwd: dir }).memory.systemPrompt).toBe("from file");
    expect(
      loadConfig({ env: { SYSTEM_PROMPT: "inline", SYSTEM_PROMPT_FILE: "prompt.txt" }, cwd: dir }).memory.systemPrompt,
    ).toBe("inline");
  });

  it("should fail on a missing SYSTEM_PROMPT_FILE", () => {
    expect(() => loadConfig({ env: { SYSTEM_PROMPT_FILE: "absent.txt" }, cwd: dir })).toThrow(
      `SYSTEM_PROMPT_FILE ${join(dir, "absent.txt")}: file not found`,
    );
  });

  it("should return a frozen config", () => {
    const config = loadConfig({ env: {}, cwd: dir });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.memory)).toBe(true);
  });
});

describe("loadEnvFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "chatmem-env-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should fill unset variables only", async () => {
    await writeFile(join(dir, ".env"), "WINDOW_SIZE=8\nDATA_DIR=from-file\n");
    const target: Record<string, string> = { DATA_DIR: "from-env" };
    loadEnvFile(join(dir, ".env"), target);
    expect(target).toEqual({ DATA_DIR: "from-env", WINDOW_SIZE: "8" });
  });

  it("should ignore a missing file", () => {
    const target: Record<string, string> = {};
    expect(() => loadEnvFile(join(dir, ".env"), target)).not.toThrow();
    expect(target).toEqual({});
  });
});
