export { DocumentReader, readDocument, toDocumentReference } from "./document-reader.js";
export {
  DocumentReadError,
  FileNotFoundError,
  UnsupportedFormatError,
  DecodingError,
  DependencyMissingError,
} from "./errors.js";
export type { DocumentReadErrorCode } from "./errors.js";
export {
  PlainTextExtractor,
  decodeStrict,
  DEFAULT_TEXT_ENCODING,
  DEFAULT_FALLBACK_ENCODINGS,
} from "./extractors/text-extractor.js";
export { PdfExtractor } from "./extractors/pdf-extractor.js";
export type { PdfJsLoader, PdfJsModule } from "./extractors/pdf-extractor.js";
export { WordExtractor } from "./extractors/docx-extractor.js";
export type { MammothLoader, MammothModule } from "./extractors/docx-extractor.js";
export type {
  DocumentReaderOptions,
  DocumentReference,
  ExtractorInput,
  TextEncodingChain,
  TextExtractor,
} from "./types.js";
