import { describe, it, expect, vi } from "vitest";
import { APIConnectionTimeoutError, APIUserAbortError } from "openai";
import type { OpenAI } from "openai";
import { CollaboratorError } from "@chatmem/sdk";
import { createLogger } from "@chatmem/shared";
import type { LlmConfig } from "@chatmem/shared";
import { createOpenAIChatGenerator, toCollaboratorError } from "../../src/llm/openai-client.js";
import type { ChatCompletionsClient, ChatRequestOptions } from "../../src/llm/openai-client.js";

const quietLogger = createLogger("openai-test", "error");

const baseConfig: LlmConfig = {
  apiKey: "test-secret",
  baseUrl: "http://localhost:9/v1",
  model: "test/model",
  temperature: 0.3,
  timeoutMs: 1000,
  enableRetry: false,
};

function completion(content: string | null): OpenAI.Chat.ChatCompletion {
  return {
    id: "cmpl-1",
    object: "chat.completion",
    created: 0,
    model: "test/model",
    choices: [
      {
        index: 0,
        finish_reason: "stop",
        logprobs: null,
        message: { role: "assistant", content, refusal: null },
      },
    ],
  };
}

type CreateFn = (
  body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
  options?: ChatRequestOptions,
) => Promise<OpenAI.Chat.ChatCompletion>;

function fakeClient(create: CreateFn) {
  const spy = vi.fn(create);
  const client: ChatCompletionsClient = { chat: { completions: { create: spy } } };
  return { client, create: spy };
}

const payload = {
  messages: [
    { role: "system" as const, content: "be brief" },
    { role: "user" as const, content: "hi" },
  ],
};

describe("createOpenAIChatGenerator", () => {
  it("should send model, messages and temperature", async () => {
    const { client, create } = fakeClient(async () => completion("hello"));
    const generator = createOpenAIChatGenerator(baseConfig, { client, logger: quietLogger });

    await expect(generator.generate(payload)).resolves.toBe("hello");
    expect(create).toHaveBeenCalledTimes(1);
    expect(create.mock.calls[0][0]).toEqual({
      model: "test/model",
      messages: [
        { role: "system", content: "be brief" },
        { role: "user", content: "hi" },
      ],
      temperature: 0.3,
    });
    expect(create.mock.calls[0][1]).toMatchObject({ timeout: 1000, maxRetries: 0 });
  });

  it("should return an empty string for null content", async () => {
    const { client } = fakeClient(async () => completion(null));
    const generator = createOpenAIChatGenerator(baseConfig, { client, logger: quietLogger });
    await expect(generator.generate(payload)).resolves.toBe("");
  });

  it("should map timeouts and not retry when retry is off", async () => {
    const { client, create } = fakeClient(async () => {
      throw new APIConnectionTimeoutError();
    });
    const generator = createOpenAIChatGenerator(baseConfig, { client, logger: quietLogger });

    const error = await generator.generate(payload).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(CollaboratorError);
    expect(error).toMatchObject({ collaborator: "reply", kind: "timeout" });
    expect(create).toHaveBeenCalledTimes(1);
  });

  it("should retry once when enabled", async () => {
    let calls = 0;
    const { client, create } = fakeClient(async () => {
      calls++;
      if (calls === 1) throw new Error("socket hang up");
      return completion("second try");
    });
    const generator = createOpenAIChatGenerator({ ...baseConfig, enableRetry: true }, { client, logger: quietLogger });

    await expect(generator.generate(payload)).resolves.toBe("second try");
    expect(create).toHaveBeenCalledTimes(2);
  });

  it("should give up after the second attempt", async () => {
    const { client, create } = fakeClient(async () => {
      throw new Error("socket hang up");
    });
    const generator = createOpenAIChatGenerator({ ...baseConfig, enableRetry: true }, { client, logger: quietLogger });

    await expect(generator.generate(payload)).rejects.toMatchObject({ kind: "network" });
    expect(create).toHaveBeenCalledTimes(2);
  });

  it("should never retry an aborted request", async () => {
    const { client, create } = fakeClient(async () => {
      throw new APIUserAbortError();
    });
    const generator = createOpenAIChatGenerator({ ...baseConfig, enableRetry: true }, { client, logger: quietLogger });

    await expect(generator.generate(payload)).rejects.toMatchObject({ kind: "aborted" });
    expect(create).toHaveBeenCalledTimes(1);
  });

  it("should pass the abort signal through", async () => {
    const { client, create } = fakeClient(async () => completion("ok"));
    const generator = createOpenAIChatGenerator(baseConfig, { client, logger: quietLogger });
    const controller = new AbortController();

    await generator.generate(payload, { signal: controller.signal });
    expect(create.mock.calls[0][1]?.signal).toBe(controller.signal);
  });
});

describe("toCollaboratorError", () => {
  it("should keep collaborator errors as they are", () => {
    const original = new CollaboratorError("reply", "invalid_response", "bad");
    expect(toCollaboratorError(original)).toBe(original);
  });

  it("should map DOM-style abort errors", () => {
    const abort = new Error("The operation was aborted");
    abort.name = "AbortError";
    expect(toCollaboratorError(abort).kind).toBe("aborted");
  });

  it("should map anything else to a network failure", () => {
    const mapped = toCollaboratorError("boom");
    expect(mapped.kind).toBe("network");
    expect(mapped.message).toBe("reply collaborator network: boom");
  });
});
