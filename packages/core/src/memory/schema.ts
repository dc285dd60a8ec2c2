/**
 * Zod schemas for persisted records. Stores and the assembler parse
 * everything they did not construct themselves through these.
 */

import { z } from "zod";
import type { ConversationMessage, ConversationMeta, Summary } from "@chatmem/sdk";

export const MessageRoleSchema = z.enum(["user", "assistant"]);

export const ConversationMessageSchema = z.object({
  seq: z.number().int().nonnegative(),
  role: MessageRoleSchema,
  content: z.string(),
  createdAt: z.number().finite(),
}) satisfies z.ZodType<ConversationMessage>;

export const SummarySchema = z.object({
  text: z.string(),
  highWaterMark: z.number().int().nonnegative(),
  version: z.number().int().positive(),
  updatedAt: z.number().finite(),
}) satisfies z.ZodType<Summary>;

export const ConversationMetaSchema = z
  .object({
    messageCount: z.number().int().nonnegative(),
    windowSize: z.number().int().positive(),
    lastSummarizedCount: z.number().int().nonnegative(),
  })
  .refine((meta) => meta.lastSummarizedCount <= meta.messageCount, {
    message: "lastSummarizedCount exceeds messageCount",
    path: ["lastSummarizedCount"],
  })
  .refine((meta) => meta.lastSummarizedCount % meta.windowSize === 0, {
    message: "lastSummarizedCount is not a multiple of windowSize",
    path: ["lastSummarizedCount"],
  }) satisfies z.ZodType<ConversationMeta>;
