import type { ExtractorInput, TextExtractor } from "../types.js";
import { DependencyMissingError } from "../errors.js";
import { devWarn } from "../../shared/index.js";

export interface MammothModule {
  extractRawText(input: { buffer: Buffer }): Promise<{
    value: string;
    messages: Array<{ type: string; message: string }>;
  }>;
}

export type MammothLoader = () => Promise<MammothModule>;

const loadMammoth: MammothLoader = async () => (await import("mammoth")).default;

// mammoth terminates every paragraph of the raw text with a blank line. Two
// consecutive line breaks inside one paragraph look the same and are split too.
const PARAGRAPH_BREAK = "\n\n";

export class WordExtractor implements TextExtractor {
  readonly name = "WordExtractor";
  private readonly load: MammothLoader;

  constructor(options?: { load?: MammothLoader }) {
    this.load = options?.load ?? loadMammoth;
  }

  async extract(input: ExtractorInput): Promise<string> {
    let mammoth: MammothModule;
    try {
      mammoth = await this.load();
    } catch (err) {
      throw new DependencyMissingError(input.document.path, "mammoth", "Word", { cause: err });
    }

    const result = await mammoth.extractRawText({ buffer: input.bytes });
    for (const entry of result.messages) {
      devWarn(`${input.document.path}: ${entry.message}`);
    }

    const paragraphs = result.value.split(PARAGRAPH_BREAK);
    if (paragraphs.length > 1 && paragraphs[paragraphs.length - 1] === "") {
      paragraphs.pop();
    }
    return paragraphs.join("\n");
  }
}
