import type { LlmMessage } from "../core/contracts/llm-protocol.js";
import type {
  PromptBuildInput,
  PromptBuildOutput,
  QuestionPromptInput,
} from "./types.js";
import { renderContextSection, renderQuestionSection } from "./sections/document.js";
import { joinPromptBlocks } from "./sections/shared.js";

export const DEFAULT_SYSTEM_INSTRUCTION =
  "Use the provided context to answer the question.\n" +
  'If you cannot find the answer from the provided context, say "I cannot find the answer in the provided context."';

export function resolveSystemInstruction(value: string | null | undefined): string | null {
  if (value === undefined) return DEFAULT_SYSTEM_INSTRUCTION;
  if (value === null || value.trim().length === 0) return null;
  return value;
}

export function buildQuestionPrompt(input: QuestionPromptInput): string {
  return joinPromptBlocks([
    renderContextSection(input.context),
    renderQuestionSection(input.question),
  ]);
}

export function buildPrompt(input: PromptBuildInput): PromptBuildOutput {
  return {
    systemInstruction: resolveSystemInstruction(input.systemInstruction),
    prompt: buildQuestionPrompt(input),
  };
}

export function toTurnMessages(output: PromptBuildOutput): LlmMessage[] {
  const messages: LlmMessage[] = [];
  if (output.systemInstruction) {
    messages.push({ role: "system", content: output.systemInstruction });
  }
  messages.push({ role: "user", content: output.prompt });
  return messages;
}
