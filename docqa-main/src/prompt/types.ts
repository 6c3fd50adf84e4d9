export interface QuestionPromptInput {
  /** Extracted document text, embedded verbatim. */
  context: string;
  question: string;
}

export interface PromptBuildInput extends QuestionPromptInput {
  /**
   * `undefined` selects the default instruction; `null` or a blank string sends none.
   */
  systemInstruction?: string | null;
}

export interface PromptBuildOutput {
  systemInstruction: string | null;
  prompt: string;
}
