/**
 * OpenAI-compatible reply generator (OpenRouter by default).
 *
 * SDK retries are disabled; `enableRetry` allows exactly one extra attempt.
 * Every call logs `llm_call` with model, duration and status.
 */

import { performance } from "node:perf_hooks";
import { OpenAI, APIConnectionTimeoutError, APIUserAbortError } from "openai";
import type { GenerateOptions, PromptMessage, PromptPayload, ReplyGenerator } from "@chatmem/sdk";
import { CollaboratorError, errorMessage } from "@chatmem/sdk";
import { createLogger } from "@chatmem/shared";
import type { LlmConfig, Logger } from "@chatmem/shared";

export interface ChatRequestOptions {
  signal?: AbortSignal;
  timeout?: number;
  maxRetries?: number;
}

/** The slice of the OpenAI client the generator uses. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
        options?: ChatRequestOptions,
      ): PromiseLike<OpenAI.Chat.ChatCompletion>;
    };
  };
}

export interface OpenAIChatGeneratorOptions {
  /** Defaults to a real OpenAI client built from the config. */
  client?: ChatCompletionsClient;
  logger?: Logger;
}

function toChatMessage(message: PromptMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
    case "user":
      return { role: "user", content: message.content };
  }
}

function isAbortError(err: unknown): boolean {
  return err instanceof APIUserAbortError || (err instanceof Error && err.name === "AbortError");
}

export function toCollaboratorError(err: unknown): CollaboratorError {
  if (err instanceof CollaboratorError) return err;
  if (err instanceof APIConnectionTimeoutError) {
    return new CollaboratorError("reply", "timeout", errorMessage(err), { cause: err });
  }
  if (isAbortError(err)) {
    return new CollaboratorError("reply", "aborted", errorMessage(err), { cause: err });
  }
  return new CollaboratorError("reply", "network", errorMessage(err), { cause: err });
}

export function createOpenAIChatGenerator(
  config: LlmConfig,
  options: OpenAIChatGeneratorOptions = {},
): ReplyGenerator {
  const logger = options.logger ?? createLogger("OpenAIChatGenerator");
  const client: ChatCompletionsClient =
    options.client ??
    new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl, timeout: config.timeoutMs, maxRetries: 0 });
  const attempts = config.enableRetry ? 2 : 1;

  async function requestOnce(payload: PromptPayload, signal: AbortSignal | undefined): Promise<string> {
    const completion = await client.chat.completions.create(
      {
        model: config.model,
        messages: payload.messages.map(toChatMessage),
        temperature: config.temperature,
      },
      { signal, timeout: config.timeoutMs, maxRetries: 0 },
    );
    if (!Array.isArray(completion.choices)) {
      throw new CollaboratorError("reply", "invalid_response", "response has no choices");
    }
    return completion.choices[0]?.message?.content ?? "";
  }

  return {
    async generate(payload: PromptPayload, generateOptions?: GenerateOptions): Promise<string> {
      const started = performance.now();
      const elapsed = () => Math.round(performance.now() - started);

      for (let attempt = 1; ; attempt++) {
        try {
          const text = await requestOnce(payload, generateOptions?.signal);
          logger.info("llm_call", { model: config.model, durationMs: elapsed(), status: "ok", attempt });
          return text;
        } catch (err) {
          const failure = toCollaboratorError(err);
          if (attempt < attempts && failure.kind !== "aborted") {
            logger.warn("llm_call_failed", { attempt, kind: failure.kind, error: failure.message, retrying: true });
            continue;
          }
          logger.error("llm_call", {
            model: config.model,
            durationMs: elapsed(),
            status: "error",
            kind: failure.kind,
            error: failure.message,
          });
          throw failure;
        }
      }
    },
  };
}
