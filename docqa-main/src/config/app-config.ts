import type { TextEncodingChain } from "../documents/types.js";
import {
  DEFAULT_FALLBACK_ENCODINGS,
  DEFAULT_TEXT_ENCODING,
} from "../documents/extractors/text-extractor.js";
import { isProviderName, type ProviderName } from "./provider.js";

const DEFAULT_PROVIDER: ProviderName = "openai";
const DEFAULT_PORT = 7860;
const DEFAULT_MAX_UPLOAD_BYTES = 20 * 1024 * 1024;

export interface AppConfig {
  provider: ProviderName;
  /** Overrides the provider's own default model when set. */
  defaultModel?: string;
  encodings: TextEncodingChain;
  port: number;
  maxUploadBytes: number;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw && raw.length > 0 ? raw : undefined;
}

function readPositiveInt(env: Env, name: string): number | undefined {
  const raw = readString(env, name);
  if (!raw) return undefined;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) return undefined;
  return parsed;
}

function readList(env: Env, name: string): string[] | undefined {
  const raw = readString(env, name);
  if (!raw) return undefined;
  const items = raw.split(",").map((item) => item.trim()).filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}

export function loadAppConfig(env: Env = process.env): AppConfig {
  const providerName = readString(env, "DOCQA_PROVIDER")?.toLowerCase() ?? DEFAULT_PROVIDER;
  if (!isProviderName(providerName)) {
    throw new Error(`Unknown provider: ${providerName}`);
  }

  const defaultModel = readString(env, "DOCQA_DEFAULT_MODEL");

  return {
    provider: providerName,
    ...(defaultModel ? { defaultModel } : {}),
    encodings: {
      primary: readString(env, "DOCQA_TEXT_ENCODING") ?? DEFAULT_TEXT_ENCODING,
      fallbacks: readList(env, "DOCQA_FALLBACK_ENCODINGS") ?? [...DEFAULT_FALLBACK_ENCODINGS],
    },
    port: readPositiveInt(env, "DOCQA_PORT") ?? DEFAULT_PORT,
    maxUploadBytes: readPositiveInt(env, "DOCQA_MAX_UPLOAD_BYTES") ?? DEFAULT_MAX_UPLOAD_BYTES,
  };
}

/** Resolves the model to use by default, checked against the provider's list. */
export function resolveDefaultModel(config: AppConfig, models: readonly string[], providerDefault: string): string {
  const model = config.defaultModel ?? providerDefault;
  if (!models.includes(model)) {
    throw new Error(`Unsupported default model: ${model}`);
  }
  return model;
}
