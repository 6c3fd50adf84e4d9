export type DocumentReadErrorCode =
  | "FILE_NOT_FOUND"
  | "UNSUPPORTED_FORMAT"
  | "DECODING_FAILED"
  | "DEPENDENCY_MISSING";

export class DocumentReadError extends Error {
  constructor(
    message: string,
    public readonly code: DocumentReadErrorCode,
    public readonly path: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "DocumentReadError";
  }
}

export class FileNotFoundError extends DocumentReadError {
  constructor(path: string, detail = "File not found") {
    super(`${detail}: ${path}`, "FILE_NOT_FOUND", path);
    this.name = "FileNotFoundError";
  }
}

export class UnsupportedFormatError extends DocumentReadError {
  constructor(
    path: string,
    public readonly extension: string,
    public readonly supportedFormats: string[],
  ) {
    super(
      `Unsupported file format: ${extension || "(none)"}. Supported formats are: ${supportedFormats.join(", ")}`,
      "UNSUPPORTED_FORMAT",
      path,
    );
    this.name = "UnsupportedFormatError";
  }
}

export class DecodingError extends DocumentReadError {
  constructor(
    path: string,
    public readonly encoding: string,
    public readonly attempted: string[],
    options?: ErrorOptions,
  ) {
    super(
      `Unable to decode ${path} as ${encoding} (tried: ${attempted.join(", ")})`,
      "DECODING_FAILED",
      path,
      options,
    );
    this.name = "DecodingError";
  }
}

export class DependencyMissingError extends DocumentReadError {
  constructor(
    path: string,
    public readonly dependency: string,
    public readonly format: string,
    options?: ErrorOptions,
  ) {
    super(
      `${dependency} is required to read ${format} files. Install it using: npm install ${dependency}`,
      "DEPENDENCY_MISSING",
      path,
      options,
    );
    this.name = "DependencyMissingError";
  }
}
