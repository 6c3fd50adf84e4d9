import { renderLabelledBlock } from "./shared.js";

export function renderContextSection(context: string): string {
  return renderLabelledBlock("Context", context);
}

export function renderQuestionSection(question: string): string {
  return renderLabelledBlock("Question", question);
}
