/**
 * ContextAssembler - composes the prompt for one turn.
 *
 * Order: system prompt, running summary, working window ascending by seq,
 * then the new user input. Pure; never touches storage.
 */

import type {
  AssembleContextInput,
  ConversationMessage,
  IContextAssembler,
  PromptMessage,
  PromptPayload,
  Summary,
} from "@chatmem/sdk";
import { CompositionError } from "@chatmem/sdk";
import { formatZodError } from "@chatmem/shared";
import { ConversationMessageSchema } from "./schema.js";

export interface ContextAssemblerOptions {
  /** Language of the summary heading. Default: "ru" */
  language?: string;
}

const SUMMARY_HEADINGS: Record<string, string> = {
  ru: "Краткая сводка предыдущего диалога:",
  en: "Summary of the earlier conversation:",
};

export function summaryHeading(language: string): string {
  return SUMMARY_HEADINGS[language] ?? SUMMARY_HEADINGS.en;
}

function seqOf(value: unknown): number | undefined {
  if (typeof value === "object" && value !== null && "seq" in value && typeof value.seq === "number") {
    return value.seq;
  }
  return undefined;
}

function validateWindow(window: readonly unknown[]): ConversationMessage[] {
  const seen = new Set<number>();
  const messages = window.map((entry) => {
    const result = ConversationMessageSchema.safeParse(entry);
    if (!result.success) {
      throw new CompositionError(formatZodError(result.error), seqOf(entry));
    }
    if (seen.has(result.data.seq)) {
      throw new CompositionError("duplicate seq in window", result.data.seq);
    }
    seen.add(result.data.seq);
    return result.data;
  });
  return messages.sort((a, b) => a.seq - b.seq);
}

function summaryMessage(summary: Summary | null, language: string): PromptMessage | null {
  if (!summary || summary.text.trim() === "") return null;
  return { role: "system", content: `${summaryHeading(language)}\n${summary.text}` };
}

export function createContextAssembler(options?: ContextAssemblerOptions): IContextAssembler {
  const language = options?.language ?? "ru";

  return {
    assemble(input: AssembleContextInput): PromptPayload {
      const messages: PromptMessage[] = [];

      if (input.systemPrompt.trim() !== "") {
        messages.push({ role: "system", content: input.systemPrompt });
      }

      const summary = summaryMessage(input.summary, language);
      if (summary) messages.push(summary);

      for (const m of validateWindow(input.window)) {
        messages.push({ role: m.role, content: m.content });
      }

      messages.push({ role: "user", content: input.userInput });
      return { messages };
    },
  };
}
