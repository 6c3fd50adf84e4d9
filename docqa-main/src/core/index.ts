export type { LlmProvider } from "./contracts/provider.js";
export type {
  LlmMessage,
  LlmTurnInput,
  LlmTurnOutput,
} from "./contracts/llm-protocol.js";
export { loadProvider } from "./runtime/provider-loader.js";
export type { ProviderFactory } from "./runtime/provider-loader.js";
