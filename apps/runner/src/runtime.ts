/**
 * Wires configuration into storage, the context manager and the command
 * service.
 */

import { resolve } from "node:path";
import type { IConversationContextManager, ReplyGenerator } from "@chatmem/sdk";
import { CollaboratorError } from "@chatmem/sdk";
import {
  createChatSummarizationCollaborator,
  createConversationContextManager,
  createFileConversationStorage,
} from "@chatmem/core";
import { createLogger } from "@chatmem/shared";
import type { Logger, RunnerConfig } from "@chatmem/shared";
import { ChatCommandService } from "./chat-service.js";
import { createOpenAIChatGenerator } from "./llm/openai-client.js";

export interface Runtime {
  config: Readonly<RunnerConfig>;
  manager: IConversationContextManager;
  service: ChatCommandService;
  logger: Logger;
}

export interface RuntimeOptions {
  /** Replaces the OpenAI generator, e.g. with a test double. */
  generator?: ReplyGenerator;
  cwd?: string;
}

/** Generator for commands that never call the LLM when no API key is set. */
const unconfiguredGenerator: ReplyGenerator = {
  generate: () => Promise.reject(new CollaboratorError("reply", "network", "OPENROUTER_API_KEY is not set")),
};

export function createRuntime(config: Readonly<RunnerConfig>, options: RuntimeOptions = {}): Runtime {
  const logger = createLogger("chatmem", config.logLevel);
  const generator =
    options.generator ??
    (config.llm ? createOpenAIChatGenerator(config.llm, { logger: logger.child("llm") }) : unconfiguredGenerator);

  const storage = createFileConversationStorage({
    dataDir: resolve(options.cwd ?? process.cwd(), config.dataDir),
    logger: logger.child("storage"),
  });
  const manager = createConversationContextManager({
    storage,
    summarizer: createChatSummarizationCollaborator(generator),
    config: config.memory,
    logger: logger.child("manager"),
  });
  const service = new ChatCommandService({ manager, generator, logger: logger.child("service") });

  return { config, manager, service, logger };
}
