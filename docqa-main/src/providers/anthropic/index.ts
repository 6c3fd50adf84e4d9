import Anthropic from "@anthropic-ai/sdk";
import type { LlmProvider } from "../../core/contracts/provider.js";
import type {
  LlmMessage,
  LlmTurnInput,
  LlmTurnOutput,
} from "../../core/contracts/llm-protocol.js";

let client: Anthropic | null = null;

const MAX_TOKENS = 1024;

export const ANTHROPIC_MODELS = ["claude-3-5-haiku-latest", "claude-sonnet-4-5"] as const;

interface AnthropicMessageBuild {
  system?: string;
  messages: Array<{ role: "user"; content: string }>;
}

function toAnthropicPayload(messages: LlmMessage[]): AnthropicMessageBuild {
  const out: AnthropicMessageBuild = {
    messages: [],
  };

  for (const msg of messages) {
    switch (msg.role) {
      case "system":
        out.system = out.system ? `${out.system}\n\n${msg.content}` : msg.content;
        break;
      case "user":
        out.messages.push({ role: "user", content: msg.content });
        break;
      default:
        break;
    }
  }

  return out;
}

const provider: LlmProvider = {
  name: "anthropic",
  version: "1.0.0",
  models: ANTHROPIC_MODELS,
  defaultModel: "claude-3-5-haiku-latest",

  start() {
    const apiKey = process.env["ANTHROPIC_API_KEY"];
    if (!apiKey) {
      throw new Error("Missing ANTHROPIC_API_KEY environment variable.");
    }
    client = new Anthropic({ apiKey });
  },

  stop() {
    client = null;
  },

  async generateTurn(input: LlmTurnInput): Promise<LlmTurnOutput> {
    if (!client) {
      throw new Error("Anthropic provider not started.");
    }

    const payload = toAnthropicPayload(input.messages);
    const response = await client.messages.create({
      model: input.model,
      max_tokens: MAX_TOKENS,
      ...(payload.system ? { system: payload.system } : {}),
      messages: payload.messages,
    });

    const textParts: string[] = [];
    for (const block of response.content) {
      if (block.type === "text") {
        textParts.push(block.text);
      }
    }

    const reply = textParts.join("\n");
    if (!reply.trim()) {
      throw new Error("Empty response from Anthropic.");
    }

    return {
      type: "assistant",
      content: reply,
    };
  },
};

export default provider;
