import type { ProviderFactory } from "../core/index.js";

export type ProviderName = "openai" | "anthropic";

export const PROVIDER_NAMES: readonly ProviderName[] = ["openai", "anthropic"];

const providerFactories: Record<ProviderName, ProviderFactory> = {
  openai: () => import("../providers/openai/index.js"),
  anthropic: () => import("../providers/anthropic/index.js"),
};

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

export function getProviderFactory(name: ProviderName): ProviderFactory {
  return providerFactories[name];
}

export default providerFactories;
