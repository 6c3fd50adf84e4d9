import type { AskSubmission } from "./types.js";

/**
 * Parses a multipart/form-data body with the platform's own FormData parser.
 * Browsers send an unnamed empty file when no document was picked.
 */
export async function parseAskForm(body: Uint8Array, contentType: string): Promise<AskSubmission> {
  const request = new Request("http://localhost/", {
    method: "POST",
    headers: { "content-type": contentType },
    body: new Uint8Array(body),
  });
  const form = await request.formData();

  const document = form.get("document");
  const question = form.get("question");
  const model = form.get("model");

  return {
    document: document instanceof File && document.name.length > 0 ? document : null,
    question: typeof question === "string" ? question : "",
    model: typeof model === "string" ? model : "",
  };
}
