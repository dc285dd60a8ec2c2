/**
 * Runner configuration: environment variables (optionally loaded from a
 * .env file) validated against RunnerConfigSchema and frozen.
 */

import { readFileSync } from "node:fs";
import { isAbsolute, join } from "node:path";
import { config as loadDotenv } from "dotenv";
import { ConfigError, errorMessage } from "@chatmem/sdk";
import { RunnerConfigSchema, isMissingFile, validateInput } from "@chatmem/shared";
import type { RunnerConfig } from "@chatmem/shared";

export type EnvSource = Record<string, string | undefined>;

export interface LoadConfigOptions {
  /** Variables to read. Default: process.env */
  env?: EnvSource;
  /** Base for relative paths such as SYSTEM_PROMPT_FILE. Default: process.cwd() */
  cwd?: string;
}

/**
 * Load `path` into `target` (process.env by default). Variables that are
 * already set win. A missing file is not an error.
 */
export function loadEnvFile(path: string, target?: Record<string, string>): void {
  const result = target ? loadDotenv({ path, processEnv: target }) : loadDotenv({ path });
  if (result.error && !isMissingFile(result.error)) {
    throw new ConfigError(`Cannot read ${path}: ${result.error.message}`, { cause: result.error });
  }
}

function nonBlank(env: EnvSource, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === "" ? undefined : value.trim();
}

/** SYSTEM_PROMPT wins over SYSTEM_PROMPT_FILE; neither means the default prompt. */
function resolveSystemPrompt(env: EnvSource, cwd: string): string | undefined {
  const inline = env.SYSTEM_PROMPT;
  if (inline !== undefined && inline.trim() !== "") return inline;

  const file = nonBlank(env, "SYSTEM_PROMPT_FILE");
  if (!file) return undefined;
  const path = isAbsolute(file) ? file : join(cwd, file);
  try {
    return readFileSync(path, "utf-8").trim();
  } catch (err) {
    const reason = isMissingFile(err) ? "file not found" : errorMessage(err);
    throw new ConfigError(`SYSTEM_PROMPT_FILE ${path}: ${reason}`, { cause: err });
  }
}

function deepFreeze(config: RunnerConfig): Readonly<RunnerConfig> {
  Object.freeze(config.memory);
  if (config.llm) Object.freeze(config.llm);
  return Object.freeze(config);
}

export function loadConfig(options: LoadConfigOptions = {}): Readonly<RunnerConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const apiKey = nonBlank(env, "OPENROUTER_API_KEY");
  const input = {
    dataDir: nonBlank(env, "DATA_DIR"),
    logLevel: nonBlank(env, "LOG_LEVEL")?.toLowerCase(),
    memory: {
      windowSize: nonBlank(env, "WINDOW_SIZE"),
      summaryLanguage: nonBlank(env, "SUMMARY_LANGUAGE"),
      systemPrompt: resolveSystemPrompt(env, cwd),
      summaryTimeoutMs: nonBlank(env, "SUMMARY_TIMEOUT_MS"),
    },
    llm: apiKey
      ? {
          apiKey,
          baseUrl: nonBlank(env, "OPENROUTER_BASE_URL"),
          model: nonBlank(env, "OPENROUTER_MODEL"),
          temperature: nonBlank(env, "LLM_TEMPERATURE"),
          timeoutMs: nonBlank(env, "LLM_TIMEOUT_MS"),
          enableRetry: nonBlank(env, "ENABLE_RETRY"),
        }
      : undefined,
  };

  const result = validateInput(RunnerConfigSchema, input);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${result.error}`);
  }
  return deepFreeze(result.data);
}
