/**
 * Zod schemas for runtime configuration.
 *
 * Values arrive as strings from the environment, so numeric and boolean
 * fields are coerced before validation.
 */

import { z } from "zod";

export const DEFAULT_SYSTEM_PROMPT =
  "Ты — доброжелательный ассистент. Отвечай по существу, кратко и на языке собеседника.";

const booleanFromEnv = z
  .union([z.boolean(), z.string()])
  .transform((value, ctx) => {
    if (typeof value === "boolean") return value;
    const normalized = value.trim().toLowerCase();
    if (["1", "true", "yes", "on"].includes(normalized)) return true;
    if (["", "0", "false", "no", "off"].includes(normalized)) return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean, received "${value}"` });
    return z.NEVER;
  });

export const MemoryConfigSchema = z.object({
  windowSize: z.coerce
    .number()
    .int("windowSize must be an integer")
    .positive("windowSize must be a positive integer")
    .default(20),
  summaryLanguage: z.string().trim().min(1, "summaryLanguage must not be empty").default("ru"),
  systemPrompt: z.string().default(DEFAULT_SYSTEM_PROMPT),
  summaryTimeoutMs: z.coerce.number().int().positive().default(30000),
});

export const LlmConfigSchema = z.object({
  apiKey: z.string().min(1, "apiKey must not be empty"),
  baseUrl: z.string().url().default("https://openrouter.ai/api/v1"),
  model: z.string().min(1).default("openrouter/auto"),
  temperature: z.coerce.number().min(0).max(2).default(0.7),
  timeoutMs: z.coerce.number().int().positive().default(30000),
  enableRetry: booleanFromEnv.default(false),
});

export const RunnerConfigSchema = z.object({
  dataDir: z.string().min(1).default("data"),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  memory: MemoryConfigSchema,
  /** Absent when no API key is configured; only chat needs it. */
  llm: LlmConfigSchema.optional(),
});

export type MemoryConfig = z.infer<typeof MemoryConfigSchema>;
export type LlmConfig = z.infer<typeof LlmConfigSchema>;
export type RunnerConfig = z.infer<typeof RunnerConfigSchema>;
