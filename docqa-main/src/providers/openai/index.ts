import OpenAI from "openai";
import type { LlmProvider } from "../../core/contracts/provider.js";
import type {
  LlmMessage,
  LlmTurnInput,
  LlmTurnOutput,
} from "../../core/contracts/llm-protocol.js";

let client: OpenAI | null = null;

export const OPENAI_MODELS = ["gpt-3.5-turbo", "gpt-4o-mini", "gpt-4o"] as const;

function toOpenAiMessages(messages: LlmMessage[]): OpenAI.ChatCompletionMessageParam[] {
  const out: OpenAI.ChatCompletionMessageParam[] = [];

  for (const msg of messages) {
    switch (msg.role) {
      case "system":
        out.push({ role: "system", content: msg.content });
        break;
      case "user":
        out.push({ role: "user", content: msg.content });
        break;
      default:
        break;
    }
  }

  return out;
}

const provider: LlmProvider = {
  name: "openai",
  version: "1.0.0",
  models: OPENAI_MODELS,
  defaultModel: "gpt-3.5-turbo",

  start() {
    const apiKey = process.env["OPENAI_API_KEY"];
    if (!apiKey) {
      throw new Error("Missing OPENAI_API_KEY environment variable.");
    }
    const baseURL = process.env["OPENAI_BASE_URL"];
    client = new OpenAI({ apiKey, ...(baseURL ? { baseURL } : {}) });
  },

  stop() {
    client = null;
  },

  async generateTurn(input: LlmTurnInput): Promise<LlmTurnOutput> {
    if (!client) {
      throw new Error("OpenAI provider not started.");
    }

    const response = await client.chat.completions.create({
      model: input.model,
      messages: toOpenAiMessages(input.messages),
    });

    const reply = response.choices[0]?.message?.content;
    if (!reply) {
      throw new Error("Empty response from OpenAI.");
    }

    return {
      type: "assistant",
      content: reply,
    };
  },
};

export default provider;
