import type { AskOptions } from "docqa-main";

/** One submission of the ask form, as parsed from the request body. */
export type AskSubmission = {
  readonly document: File | null;
  readonly question: string;
  readonly model: string;
};

/** The slice of the agent the form needs. */
export interface AskService {
  ask(documentPath: string, question: string, options?: AskOptions): Promise<string>;
}

export type AskPageView = {
  readonly title: string;
  readonly models: readonly string[];
  readonly supportedFormats: readonly string[];
  readonly question: string;
  readonly model: string;
  readonly answer: string;
};
