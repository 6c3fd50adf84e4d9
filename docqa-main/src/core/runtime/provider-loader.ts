import type { LlmProvider } from "../contracts/provider.js";
import { devLog } from "../../shared/index.js";

export type ProviderFactory = () => Promise<{ default: LlmProvider }>;

/** Imports a provider module, checks its shape and starts it. */
export async function loadProvider(factory: ProviderFactory): Promise<LlmProvider> {
  const loaded = await factory();
  const provider = loaded?.default;
  if (!provider || typeof provider.generateTurn !== "function") {
    throw new Error("Invalid provider module: expected a default export.");
  }
  if (!provider.models.includes(provider.defaultModel)) {
    throw new Error(`Provider ${provider.name} does not list its default model ${provider.defaultModel}.`);
  }

  await provider.start();
  devLog(`Provider ready: ${provider.name} v${provider.version} (default model ${provider.defaultModel})`);
  return provider;
}
