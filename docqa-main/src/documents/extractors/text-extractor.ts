import iconv from "iconv-lite";
import type {
  ExtractorInput,
  TextEncodingChain,
  TextExtractor,
} from "../types.js";
import { DecodingError } from "../errors.js";
import { devWarn } from "../../shared/index.js";

export const DEFAULT_TEXT_ENCODING = "utf-8";
export const DEFAULT_FALLBACK_ENCODINGS = ["latin1", "ascii", "utf-16"];

const BOM = "\uFEFF";

export class PlainTextExtractor implements TextExtractor {
  readonly name = "PlainTextExtractor";
  private readonly chain: string[];

  constructor(encodings?: Partial<TextEncodingChain>) {
    this.chain = [
      encodings?.primary ?? DEFAULT_TEXT_ENCODING,
      ...(encodings?.fallbacks ?? DEFAULT_FALLBACK_ENCODINGS),
    ];
  }

  get encodings(): string[] {
    return [...this.chain];
  }

  async extract(input: ExtractorInput): Promise<string> {
    const attempted: string[] = [];
    let lastError: DecodingError | null = null;

    for (const encoding of this.chain) {
      attempted.push(encoding);
      const decoded = decodeStrict(input.bytes, encoding);
      if (decoded !== null) {
        if (attempted.length > 1) {
          devWarn(`Decoded ${input.document.path} with fallback encoding ${encoding}`);
        }
        return decoded;
      }
      lastError = new DecodingError(input.document.path, encoding, [...attempted]);
    }

    throw lastError ?? new DecodingError(input.document.path, "(none)", attempted);
  }
}

/**
 * Decodes `bytes` as `encoding`, or returns null when the bytes are not valid
 * in that encoding. Validity means the decoded text encodes back to the exact
 * same bytes; the codec replaces invalid sequences instead of throwing.
 */
export function decodeStrict(bytes: Buffer, encoding: string): string | null {
  if (!iconv.encodingExists(encoding)) {
    return null;
  }

  const decoded = iconv.decode(bytes, encoding, { stripBOM: false });
  const matches = reencodingTargets(bytes, encoding).some((target) =>
    iconv.encode(decoded, target, { addBOM: false }).equals(bytes),
  );
  if (!matches) {
    return null;
  }

  return decoded.startsWith(BOM) ? decoded.slice(BOM.length) : decoded;
}

/**
 * The byte-order-neutral codecs read either order but always write
 * little-endian, so the round trip has to use the order the input carries.
 */
function reencodingTargets(bytes: Buffer, encoding: string): string[] {
  const family = encoding.toLowerCase().replace(/[^a-z0-9]/g, "");
  if (family === "utf16") {
    if (startsWith(bytes, [0xfe, 0xff])) return ["utf-16be"];
    if (startsWith(bytes, [0xff, 0xfe])) return ["utf-16le"];
    return ["utf-16le", "utf-16be"];
  }
  if (family === "utf32") {
    if (startsWith(bytes, [0x00, 0x00, 0xfe, 0xff])) return ["utf-32be"];
    if (startsWith(bytes, [0xff, 0xfe, 0x00, 0x00])) return ["utf-32le"];
    return ["utf-32le", "utf-32be"];
  }
  return [encoding];
}

function startsWith(bytes: Buffer, prefix: number[]): boolean {
  return prefix.every((byte, index) => bytes[index] === byte);
}
