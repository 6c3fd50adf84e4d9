/**
 * The single failure kind callers of the agent see. The original failure
 * stays reachable through `cause`.
 */
export class DocumentQaError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(`Error processing the document: ${message}`, options);
    this.name = "DocumentQaError";
  }
}
