export interface DocumentReference {
  /** Path as given by the caller. */
  path: string;
  /** Lowercased suffix including the dot (".pdf"), or "" when the path has none. */
  extension: string;
}

export interface ExtractorInput {
  document: DocumentReference;
  bytes: Buffer;
}

export interface TextExtractor {
  readonly name: string;
  extract(input: ExtractorInput): Promise<string>;
}

export interface TextEncodingChain {
  primary: string;
  fallbacks: string[];
}

export interface DocumentReaderOptions {
  encodings?: Partial<TextEncodingChain>;
}
