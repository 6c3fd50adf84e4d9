import type { LlmProvider } from "../core/contracts/provider.js";
import { DocumentReader } from "../documents/document-reader.js";
import { buildPrompt, toTurnMessages } from "../prompt/builder.js";
import { DocumentQaError } from "./errors.js";
import { devError, devLog } from "../shared/index.js";

export interface DocumentQaAgentOptions {
  provider: LlmProvider;
  reader?: DocumentReader;
  /** Falls back to the provider's default model. */
  defaultModel?: string;
}

export interface AskOptions {
  /** Omit for the default instruction; pass `null` to send none. */
  systemInstruction?: string | null;
  model?: string;
}

/** Answers questions about a single document using its extracted text as context. */
export class DocumentQaAgent {
  private readonly provider: LlmProvider;
  private readonly reader: DocumentReader;
  readonly defaultModel: string;

  constructor(options: DocumentQaAgentOptions) {
    this.provider = options.provider;
    this.reader = options.reader ?? new DocumentReader();
    this.defaultModel = options.defaultModel ?? options.provider.defaultModel;
  }

  supportedFormats(): string[] {
    return this.reader.supportedFormats();
  }

  async ask(documentPath: string, question: string, options?: AskOptions): Promise<string> {
    const model = options?.model ?? this.defaultModel;
    devLog(`Ask: document=${documentPath} model=${model}`);

    try {
      const context = await this.reader.read(documentPath);
      const built = buildPrompt({
        context,
        question,
        systemInstruction: options?.systemInstruction,
      });

      const output = await this.provider.generateTurn({
        model,
        messages: toTurnMessages(built),
      });
      return output.content;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      devError(`Ask failed for ${documentPath}: ${message}`);
      throw new DocumentQaError(message, { cause: err });
    }
  }
}
