import { readFile, stat } from "node:fs/promises";
import { extname } from "node:path";
import type {
  DocumentReaderOptions,
  DocumentReference,
  TextExtractor,
} from "./types.js";
import { FileNotFoundError, UnsupportedFormatError } from "./errors.js";
import { PlainTextExtractor } from "./extractors/text-extractor.js";
import { PdfExtractor } from "./extractors/pdf-extractor.js";
import { WordExtractor } from "./extractors/docx-extractor.js";
import { devLog } from "../shared/index.js";

/**
 * Maps file extensions to text extractors and reads documents through them.
 *
 * A read runs in a fixed order and aborts at the first failing phase:
 * existence check, extension lookup, one read of the file, extraction.
 */
export class DocumentReader {
  private readonly extractors = new Map<string, TextExtractor>();

  constructor(options?: DocumentReaderOptions) {
    const word = new WordExtractor();
    this.register(".txt", new PlainTextExtractor(options?.encodings));
    this.register(".pdf", new PdfExtractor());
    this.register(".doc", word);
    this.register(".docx", word);
  }

  /** Adds or replaces the extractor for an extension (".md" or "md"). */
  register(extension: string, extractor: TextExtractor): void {
    this.extractors.set(normalizeExtension(extension), extractor);
  }

  supportedFormats(): string[] {
    return [...this.extractors.keys()];
  }

  async read(filePath: string): Promise<string> {
    await assertFileExists(filePath);

    const document = toDocumentReference(filePath);
    const extractor = this.extractors.get(document.extension);
    if (!extractor) {
      throw new UnsupportedFormatError(filePath, document.extension, this.supportedFormats());
    }

    const bytes = await readFile(filePath);
    devLog(`Extracting ${filePath} with ${extractor.name} (${bytes.length} bytes)`);
    return extractor.extract({ document, bytes });
  }
}

export function toDocumentReference(filePath: string): DocumentReference {
  return { path: filePath, extension: extname(filePath).toLowerCase() };
}

function normalizeExtension(extension: string): string {
  const lowered = extension.trim().toLowerCase();
  return lowered.startsWith(".") ? lowered : `.${lowered}`;
}

async function assertFileExists(filePath: string): Promise<void> {
  try {
    const info = await stat(filePath);
    if (!info.isFile()) {
      throw new FileNotFoundError(filePath, "Not a file");
    }
  } catch (err) {
    if (err instanceof FileNotFoundError) throw err;
    if (isErrnoException(err) && (err.code === "ENOENT" || err.code === "ENOTDIR")) {
      throw new FileNotFoundError(filePath);
    }
    throw err;
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

let defaultReader: DocumentReader | null = null;

/** Reads a document with the default extractor registry. */
export async function readDocument(filePath: string): Promise<string> {
  defaultReader ??= new DocumentReader();
  return defaultReader.read(filePath);
}
