import type { ExtractorInput, TextExtractor } from "../types.js";
import { DependencyMissingError } from "../errors.js";

interface PdfPage {
  getTextContent(): Promise<{ items: ReadonlyArray<object> }>;
}

interface PdfDocument {
  numPages: number;
  getPage(pageNumber: number): Promise<PdfPage>;
}

interface PdfLoadingTask {
  promise: Promise<PdfDocument>;
  destroy(): Promise<void>;
}

export interface PdfJsModule {
  getDocument(source: {
    data: Uint8Array;
    useWorkerFetch?: boolean;
    isEvalSupported?: boolean;
    disableFontFace?: boolean;
    verbosity?: number;
  }): PdfLoadingTask;
}

export type PdfJsLoader = () => Promise<PdfJsModule>;

// pdfjs VerbosityLevel.ERRORS; silences the missing standard font data warning.
const PDFJS_VERBOSITY_ERRORS = 0;

const loadPdfJs: PdfJsLoader = () => import("pdfjs-dist/legacy/build/pdf.mjs");

export class PdfExtractor implements TextExtractor {
  readonly name = "PdfExtractor";
  private readonly load: PdfJsLoader;

  constructor(options?: { load?: PdfJsLoader }) {
    this.load = options?.load ?? loadPdfJs;
  }

  async extract(input: ExtractorInput): Promise<string> {
    let pdfjs: PdfJsModule;
    try {
      pdfjs = await this.load();
    } catch (err) {
      throw new DependencyMissingError(input.document.path, "pdfjs-dist", "PDF", { cause: err });
    }

    const loadingTask = pdfjs.getDocument({
      data: new Uint8Array(input.bytes),
      useWorkerFetch: false,
      isEvalSupported: false,
      disableFontFace: true,
      verbosity: PDFJS_VERBOSITY_ERRORS,
    });

    try {
      const pdfDoc = await loadingTask.promise;
      const pages: string[] = [];
      for (let pageNumber = 1; pageNumber <= pdfDoc.numPages; pageNumber++) {
        const page = await pdfDoc.getPage(pageNumber);
        const textContent = await page.getTextContent();
        pages.push(joinTextItems(textContent.items));
      }
      return pages.join("\n");
    } finally {
      await loadingTask.destroy();
    }
  }
}

function joinTextItems(items: ReadonlyArray<object>): string {
  return items
    .map((item) => {
      const str = "str" in item && typeof item.str === "string" ? item.str : "";
      const eol = "hasEOL" in item && item.hasEOL === true;
      return eol ? `${str}\n` : str;
    })
    .join(" ")
    .replace(/[ \t]+/g, " ")
    .replace(/ *\n */g, "\n")
    .trim();
}
