import { DocumentQaAgent } from "../agent/index.js";
import { loadAppConfig, resolveDefaultModel, type AppConfig } from "../config/app-config.js";
import { getProviderFactory } from "../config/provider.js";
import { loadProvider, type ProviderFactory } from "../core/index.js";
import { DocumentReader } from "../documents/index.js";

export interface DocumentQaApp {
  config: AppConfig;
  agent: DocumentQaAgent;
  models: readonly string[];
  defaultModel: string;
  supportedFormats: string[];
  stop(): Promise<void>;
}

export interface CreateDocumentQaAppOptions {
  config?: AppConfig;
  /** Replaces the configured provider module, e.g. with a local stand-in. */
  providerFactory?: ProviderFactory;
}

/** Wires configuration, provider and document reader into a ready agent. */
export async function createDocumentQaApp(options?: CreateDocumentQaAppOptions): Promise<DocumentQaApp> {
  const config = options?.config ?? loadAppConfig();
  const provider = await loadProvider(options?.providerFactory ?? getProviderFactory(config.provider));
  let defaultModel: string;
  try {
    defaultModel = resolveDefaultModel(config, provider.models, provider.defaultModel);
  } catch (err) {
    await provider.stop();
    throw err;
  }
  const reader = new DocumentReader({ encodings: config.encodings });
  const agent = new DocumentQaAgent({ provider, reader, defaultModel });

  return {
    config,
    agent,
    models: provider.models,
    defaultModel,
    supportedFormats: reader.supportedFormats(),
    async stop() {
      await provider.stop();
    },
  };
}
