import { describe, expect, it, vi } from "vitest";
import { existsSync } from "node:fs";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { tmpdir } from "node:os";
import { DocumentQaAgent, type AskOptions, type LlmProvider } from "docqa-main";
import { handleAskSubmission } from "../../src/app/ask-handler.js";
import type { AskService } from "../../src/app/types.js";

const models = ["fake-small", "fake-large"];

function notesFile(content = "The sky is blue.", name = "notes.txt"): File {
  return new File([content], name, { type: "text/plain" });
}

function createAgent(reply = "blue") {
  const ask = vi.fn(async (_path: string, _question: string, _options?: AskOptions) => reply);
  const agent: AskService = { ask };
  return { agent, ask };
}

describe("handleAskSubmission", () => {
  it("asks about the uploaded document and returns the answer", async () => {
    const { agent, ask } = createAgent("blue");

    const answer = await handleAskSubmission(
      { document: notesFile(), question: "What color is the sky?", model: "fake-large" },
      { agent, models },
    );

    expect(answer).toBe("blue");
    expect(ask).toHaveBeenCalledTimes(1);
    const [documentPath, question, options] = ask.mock.calls[0] ?? [];
    expect(basename(documentPath ?? "")).toBe("notes.txt");
    expect(question).toBe("What color is the sky?");
    expect(options).toEqual({ model: "fake-large" });
  });

  it("writes the upload under its original name and removes it afterwards", async () => {
    let seenPath = "";
    let seenContent = "";
    const agent: AskService = {
      ask: async (documentPath) => {
        seenPath = documentPath;
        seenContent = await readFile(documentPath, "utf8");
        return "ok";
      },
    };

    await handleAskSubmission(
      { document: notesFile("Quarterly numbers", "report.txt"), question: "Q?", model: "fake-small" },
      { agent, models },
    );

    expect(basename(seenPath)).toBe("report.txt");
    expect(seenContent).toBe("Quarterly numbers");
    expect(existsSync(dirname(seenPath))).toBe(false);
  });

  it("keeps only the base name of the uploaded file", async () => {
    const { agent, ask } = createAgent();

    await handleAskSubmission(
      { document: notesFile("x", "C:\\Users\\me\\notes.txt"), question: "Q?", model: "fake-small" },
      { agent, models },
    );

    expect(basename(ask.mock.calls[0]?.[0] ?? "")).toBe("notes.txt");
  });

  it("asks for a document first", async () => {
    const { agent, ask } = createAgent();

    await expect(
      handleAskSubmission({ document: null, question: "   ", model: "nope" }, { agent, models }),
    ).resolves.toBe("Error: Please upload a document first.");
    expect(ask).not.toHaveBeenCalled();
  });

  it("asks for a non-blank question", async () => {
    const { agent, ask } = createAgent();

    await expect(
      handleAskSubmission({ document: notesFile(), question: " \t ", model: "nope" }, { agent, models }),
    ).resolves.toBe("Error: Please enter a question.");
    expect(ask).not.toHaveBeenCalled();
  });

  it("rejects models outside the list", async () => {
    const { agent, ask } = createAgent();

    await expect(
      handleAskSubmission({ document: notesFile(), question: "Q?", model: "gpt-x" }, { agent, models }),
    ).resolves.toBe("Error: Unsupported model: gpt-x");
    expect(ask).not.toHaveBeenCalled();
  });

  it("shows agent failures as an error string and still cleans up", async () => {
    let seenPath = "";
    const agent: AskService = {
      ask: async (documentPath) => {
        seenPath = documentPath;
        throw new Error("Error processing the document: Unsupported file format: .csv");
      },
    };

    const answer = await handleAskSubmission(
      { document: notesFile("a,b", "table.csv"), question: "Q?", model: "fake-small" },
      { agent, models },
    );

    expect(answer).toBe("Error: Error processing the document: Unsupported file format: .csv");
    expect(existsSync(dirname(seenPath))).toBe(false);
  });

  it("displays a missing document as an Error string", async () => {
    const emptyDir = await mkdtemp(join(tmpdir(), "docqa-missing-"));
    const missingPath = join(emptyDir, "missing.pdf");
    const provider: LlmProvider = {
      name: "fake",
      version: "0.0.1",
      models,
      defaultModel: "fake-small",
      start() {},
      stop() {},
      generateTurn: vi.fn(async () => ({ type: "assistant" as const, content: "never" })),
    };
    const qa = new DocumentQaAgent({ provider });
    const agent: AskService = {
      ask: (_uploaded, question, options) => qa.ask(missingPath, question, options),
    };

    try {
      const answer = await handleAskSubmission(
        { document: notesFile(), question: "Anything?", model: "fake-small" },
        { agent, models },
      );

      expect(answer).toBe(`Error: Error processing the document: File not found: ${missingPath}`);
      expect(provider.generateTurn).not.toHaveBeenCalled();
    } finally {
      await rm(emptyDir, { recursive: true, force: true });
    }
  });
});
