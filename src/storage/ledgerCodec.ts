/**
 * Line codec for the upload ledger.
 *
 * One record per line: `fileName<fullImageURL<thumbImageURL`. Inside a field
 * the characters `%`, `<`, CR and LF are percent-escaped so any file name or
 * URL round-trips; fields without them are written verbatim.
 */

export interface LedgerEntry {
  readonly fileName: string;
  readonly fullImageURL: string;
  readonly thumbImageURL: string;
}

export const FIELD_SEPARATOR = "<";
export const RECORD_TERMINATOR = "\n";

const ESCAPES: Record<string, string> = {
  "%": "%25",
  "<": "%3C",
  "\r": "%0D",
  "\n": "%0A",
};

const UNESCAPES: Record<string, string> = {
  "25": "%",
  "3C": "<",
  "0D": "\r",
  "0A": "\n",
};

export class LedgerDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LedgerDecodeError";
  }
}

export function escapeField(value: string): string {
  return value.replace(/[%<\r\n]/g, (ch) => ESCAPES[ch] ?? ch);
}

export function unescapeField(value: string): string {
  return value.replace(/%(.{0,2})/g, (_match, code: string) => {
    const decoded = UNESCAPES[code.toUpperCase()];
    if (decoded === undefined) {
      throw new LedgerDecodeError(`invalid escape "%${code}"`);
    }
    return decoded;
  });
}

export function encodeRecord(entry: LedgerEntry): string {
  return (
    [entry.fileName, entry.fullImageURL, entry.thumbImageURL]
      .map(escapeField)
      .join(FIELD_SEPARATOR) + RECORD_TERMINATOR
  );
}

/** Decode one line (without its terminator). Throws LedgerDecodeError. */
export function decodeRecord(line: string): LedgerEntry {
  const fields = line.replace(/\r$/, "").split(FIELD_SEPARATOR);
  if (fields.length !== 3) {
    throw new LedgerDecodeError(`expected 3 fields, found ${fields.length}`);
  }
  const [fileName, fullImageURL, thumbImageURL] = fields.map(unescapeField);
  return Object.freeze({ fileName, fullImageURL, thumbImageURL });
}

export interface DecodeFailure {
  lineNumber: number;
  reason: string;
}

export type LedgerDecodeResult = { entries: LedgerEntry[] } | { failure: DecodeFailure };

/**
 * Decode a whole ledger file. Every record ends with a line break: a last
 * line without one is a torn write. Any other empty line, or a record that
 * does not decode, is a failure too.
 */
export function decodeLedger(content: string): LedgerDecodeResult {
  if (content.length === 0) return { entries: [] };

  const lines = content.split(RECORD_TERMINATOR);
  if (lines[lines.length - 1] !== "") {
    return { failure: { lineNumber: lines.length, reason: "unterminated record" } };
  }
  lines.pop();

  const entries: LedgerEntry[] = [];
  for (let index = 0; index < lines.length; index++) {
    try {
      entries.push(decodeRecord(lines[index]));
    } catch (error) {
      if (error instanceof LedgerDecodeError) {
        return { failure: { lineNumber: index + 1, reason: error.message } };
      }
      throw error;
    }
  }
  return { entries };
}

const LINE_FEED = 0x0a;

function firstInvalidUtf8Line(bytes: Uint8Array): number {
  const decoder = new TextDecoder("utf-8", { fatal: true });
  let lineNumber = 1;
  let start = 0;
  for (let index = 0; index <= bytes.length; index++) {
    if (index === bytes.length || bytes[index] === LINE_FEED) {
      try {
        decoder.decode(bytes.subarray(start, index));
      } catch {
        return lineNumber;
      }
      lineNumber++;
      start = index + 1;
    }
  }
  return lineNumber;
}

/** Decode raw ledger bytes; bytes that are not valid UTF-8 are a failure. */
export function decodeLedgerBytes(bytes: Uint8Array): LedgerDecodeResult {
  let content: string;
  try {
    content = new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (error) {
    if (!(error instanceof TypeError)) throw error;
    return { failure: { lineNumber: firstInvalidUtf8Line(bytes), reason: "invalid UTF-8" } };
  }
  return decodeLedger(content);
}
