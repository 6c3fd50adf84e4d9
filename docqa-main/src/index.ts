export {
  DocumentReader,
  readDocument,
  toDocumentReference,
  DocumentReadError,
  FileNotFoundError,
  UnsupportedFormatError,
  DecodingError,
  DependencyMissingError,
  PlainTextExtractor,
  PdfExtractor,
  WordExtractor,
  decodeStrict,
  DEFAULT_TEXT_ENCODING,
  DEFAULT_FALLBACK_ENCODINGS,
} from "./documents/index.js";
export type {
  DocumentReadErrorCode,
  DocumentReaderOptions,
  DocumentReference,
  ExtractorInput,
  MammothLoader,
  MammothModule,
  PdfJsLoader,
  PdfJsModule,
  TextEncodingChain,
  TextExtractor,
} from "./documents/index.js";
export {
  DEFAULT_SYSTEM_INSTRUCTION,
  buildPrompt,
  buildQuestionPrompt,
  resolveSystemInstruction,
  toTurnMessages,
} from "./prompt/builder.js";
export type { PromptBuildInput, PromptBuildOutput, QuestionPromptInput } from "./prompt/types.js";
export { DocumentQaAgent, DocumentQaError } from "./agent/index.js";
export type { AskOptions, DocumentQaAgentOptions } from "./agent/index.js";
export { loadProvider } from "./core/index.js";
export type { LlmMessage, LlmProvider, LlmTurnInput, LlmTurnOutput, ProviderFactory } from "./core/index.js";
export { loadAppConfig, resolveDefaultModel } from "./config/app-config.js";
export type { AppConfig } from "./config/app-config.js";
export { PROVIDER_NAMES, getProviderFactory, isProviderName } from "./config/provider.js";
export type { ProviderName } from "./config/provider.js";
export { createDocumentQaApp } from "./app/main.js";
export type { CreateDocumentQaAppOptions, DocumentQaApp } from "./app/main.js";
export { devLog, devWarn, devError } from "./shared/index.js";
