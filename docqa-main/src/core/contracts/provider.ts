import type { LlmTurnInput, LlmTurnOutput } from "./llm-protocol.js";

export interface LlmProvider {
  name: string;
  version: string;
  /** Model identifiers this provider accepts, in display order. */
  models: readonly string[];
  defaultModel: string;
  start(): void | Promise<void>;
  stop(): void | Promise<void>;
  generateTurn(input: LlmTurnInput): Promise<LlmTurnOutput>;
}
