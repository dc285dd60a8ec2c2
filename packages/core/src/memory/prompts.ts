/**
 * Summarization prompt: folds the previous summary and a block of messages
 * into one short merged summary in the target language.
 */

import type {
  ConversationMessage,
  PromptMessage,
  ReplyGenerator,
  SummarizationCollaborator,
  SummarizeOptions,
} from "@chatmem/sdk";
import { CollaboratorError } from "@chatmem/sdk";

interface SummaryPromptTexts {
  instruction: string;
  previousHeading: string;
  dialogHeading: string;
}

const RUSSIAN_TEXTS: SummaryPromptTexts = {
  instruction:
    "Сожми диалог (последний блок сообщений) в краткую русскую сводку 5–8 строк. " +
    "Если есть предыдущая сводка, объедини их в одну актуальную сводку. " +
    "Пиши короткими предложениями, без маркеров списков.",
  previousHeading: "Предыдущая сводка:",
  dialogHeading: "Диалог:",
};

function englishTexts(language: string): SummaryPromptTexts {
  return {
    instruction:
      `Compress the dialogue (the latest block of messages) into a short summary of 5-8 lines in language "${language}". ` +
      "If there is a previous summary, merge both into one up-to-date summary. " +
      "Write short sentences without list markers.",
    previousHeading: "Previous summary:",
    dialogHeading: "Dialogue:",
  };
}

function textsFor(language: string): SummaryPromptTexts {
  return language === "ru" ? RUSSIAN_TEXTS : englishTexts(language);
}

/** `role: content` per line. */
export function formatTranscript(messages: readonly ConversationMessage[]): string {
  return messages.map((m) => `${m.role}: ${m.content}`).join("\n");
}

export function buildSummarizationMessages(
  previousSummary: string | null,
  messages: readonly ConversationMessage[],
  language: string,
): PromptMessage[] {
  const texts = textsFor(language);
  const prompt: PromptMessage[] = [{ role: "system", content: texts.instruction }];
  if (previousSummary && previousSummary.trim() !== "") {
    prompt.push({ role: "system", content: `${texts.previousHeading}\n${previousSummary}` });
  }
  prompt.push({ role: "user", content: `${texts.dialogHeading}\n${formatTranscript(messages)}` });
  return prompt;
}

/**
 * Use a reply generator (any chat completion endpoint) as the summarization
 * collaborator. Failures are re-labelled as summarization failures.
 */
export function createChatSummarizationCollaborator(generator: ReplyGenerator): SummarizationCollaborator {
  return {
    async summarize(
      previousSummary: string | null,
      messages: ConversationMessage[],
      options: SummarizeOptions,
    ): Promise<string> {
      const payload = { messages: buildSummarizationMessages(previousSummary, messages, options.language) };
      try {
        return await generator.generate(payload, { signal: options.signal });
      } catch (err) {
        if (err instanceof CollaboratorError && err.collaborator === "reply") {
          throw new CollaboratorError("summarization", err.kind, err.message, { cause: err });
        }
        throw err;
      }
    },
  };
}
