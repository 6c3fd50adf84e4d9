export { DocumentQaAgent } from "./document-qa-agent.js";
export type { AskOptions, DocumentQaAgentOptions } from "./document-qa-agent.js";
export { DocumentQaError } from "./errors.js";
