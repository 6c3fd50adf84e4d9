export interface LlmMessage {
  role: "system" | "user";
  content: string;
}

export interface LlmTurnInput {
  model: string;
  messages: LlmMessage[];
}

export interface LlmTurnOutput {
  type: "assistant";
  content: string;
}
