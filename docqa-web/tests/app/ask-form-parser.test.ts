import { describe, expect, it } from "vitest";
import { parseAskForm } from "../../src/app/ask-form-parser.js";

async function encode(form: FormData): Promise<{ body: Uint8Array; contentType: string }> {
  const request = new Request("http://localhost/", { method: "POST", body: form });
  return {
    body: new Uint8Array(await request.arrayBuffer()),
    contentType: request.headers.get("content-type") ?? "",
  };
}

describe("parseAskForm", () => {
  it("reads the document, question and model fields", async () => {
    const form = new FormData();
    form.append("document", new File(["The sky is blue."], "notes.txt", { type: "text/plain" }));
    form.append("question", "What color is the sky?");
    form.append("model", "gpt-4o");
    const { body, contentType } = await encode(form);

    const submission = await parseAskForm(body, contentType);

    expect(submission.question).toBe("What color is the sky?");
    expect(submission.model).toBe("gpt-4o");
    expect(submission.document?.name).toBe("notes.txt");
    expect(await submission.document?.text()).toBe("The sky is blue.");
  });

  it("treats missing fields as empty", async () => {
    const form = new FormData();
    form.append("question", "Only a question");
    const { body, contentType } = await encode(form);

    await expect(parseAskForm(body, contentType)).resolves.toEqual({
      document: null,
      question: "Only a question",
      model: "",
    });
  });

  it("ignores a text value sent in the document field", async () => {
    const form = new FormData();
    form.append("document", "not a file");
    const { body, contentType } = await encode(form);

    const submission = await parseAskForm(body, contentType);
    expect(submission.document).toBeNull();
  });

  it("rejects a malformed body", async () => {
    await expect(
      parseAskForm(new TextEncoder().encode("garbage"), "multipart/form-data; boundary=xyz"),
    ).rejects.toThrow();
  });
});
