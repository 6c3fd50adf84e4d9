import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";
import { devError } from "docqa-main";
import type { AskService, AskSubmission } from "./types.js";

export interface AskHandlerDeps {
  agent: AskService;
  models: readonly string[];
}

const FALLBACK_UPLOAD_NAME = "upload";

/**
 * Runs one form submission and returns the text to display. Never rejects:
 * every failure becomes an `Error: ...` string.
 */
export async function handleAskSubmission(
  submission: AskSubmission,
  deps: AskHandlerDeps,
): Promise<string> {
  if (!submission.document) {
    return "Error: Please upload a document first.";
  }
  if (!submission.question.trim()) {
    return "Error: Please enter a question.";
  }
  if (!deps.models.includes(submission.model)) {
    return `Error: Unsupported model: ${submission.model}`;
  }

  let uploadDir: string | null = null;
  try {
    uploadDir = await mkdtemp(join(tmpdir(), "docqa-upload-"));
    const documentPath = join(uploadDir, uploadFileName(submission.document.name));
    await writeFile(documentPath, new Uint8Array(await submission.document.arrayBuffer()));

    return await deps.agent.ask(documentPath, submission.question, { model: submission.model });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return `Error: ${message}`;
  } finally {
    if (uploadDir) {
      await rm(uploadDir, { recursive: true, force: true }).catch((err: unknown) => {
        devError(`Failed to remove upload directory ${uploadDir}:`, err);
      });
    }
  }
}

function uploadFileName(name: string): string {
  const base = basename(name.replace(/\\/g, "/"));
  return base.length > 0 && base !== "." && base !== ".." ? base : FALLBACK_UPLOAD_NAME;
}
