import { promises as fs } from "node:fs";
import type { FileHandle } from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";
import { acquireAccessGuard, type AccessGuard, type AccessGuardOptions } from "./accessGuard";
import { LedgerCorruptError, LedgerWriteError } from "./errors";
import { decodeLedgerBytes, encodeRecord, type LedgerEntry } from "./ledgerCodec";

export type { LedgerEntry } from "./ledgerCodec";

export const LEDGER_FILE_NAME = ".gallery-uploader-ledger";

export interface UploadLedgerOptions {
  logger?: Logger;
  guard?: AccessGuardOptions;
}

export function ledgerPathFor(directoryPath: string): string {
  return path.join(directoryPath, LEDGER_FILE_NAME);
}

/**
 * Durable, append-only record of the images of one directory that have been
 * fully uploaded (full + thumbnail).
 *
 * Exactly one UploadLedger may be open per directory at a time, across
 * processes: `open` takes the access guard and fails fast when it is held.
 * Each `recordProcessed` reaches the file (and disk) before it reaches memory.
 */
export class UploadLedger {
  private readonly records: LedgerEntry[];
  private byteLength: number;
  private closed = false;

  private constructor(
    readonly ledgerPath: string,
    private readonly handle: FileHandle,
    private readonly guard: AccessGuard,
    records: LedgerEntry[],
    byteLength: number,
    private readonly logger?: Logger
  ) {
    this.records = records;
    this.byteLength = byteLength;
  }

  /**
   * Open the ledger of `directoryPath`, creating it when absent.
   *
   * @throws LedgerLockUnavailableError another run holds this directory
   * @throws LedgerCorruptError a record is torn, not UTF-8, or not three fields
   */
  static async open(directoryPath: string, options: UploadLedgerOptions = {}): Promise<UploadLedger> {
    const ledgerPath = ledgerPathFor(directoryPath);
    const guard = acquireAccessGuard(ledgerPath, options.guard);

    let handle: FileHandle | undefined;
    try {
      handle = await fs.open(ledgerPath, "a+");
      const bytes = await handle.readFile();
      const decoded = decodeLedgerBytes(bytes);
      if ("failure" in decoded) {
        throw new LedgerCorruptError(ledgerPath, decoded.failure.lineNumber, decoded.failure.reason);
      }

      options.logger?.debug({ ledgerPath, entries: decoded.entries.length }, "Upload ledger opened");
      return new UploadLedger(
        ledgerPath,
        handle,
        guard,
        decoded.entries,
        bytes.length,
        options.logger
      );
    } catch (error) {
      if (handle) {
        await handle.close();
      }
      guard.release();
      throw error;
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  isAlreadyProcessed(fileName: string): boolean {
    return this.records.some((entry) => entry.fileName === fileName);
  }

  /**
   * Append one entry. The record is written and flushed before the in-memory
   * sequence changes; on a failed write the file is cut back to its prior
   * length so neither side moves.
   */
  async recordProcessed(fileName: string, fullImageURL: string, thumbImageURL: string): Promise<LedgerEntry> {
    if (this.closed) {
      throw new LedgerWriteError(`Ledger ${this.ledgerPath} is closed`);
    }
    if (fileName.length === 0) {
      throw new LedgerWriteError("Cannot record an entry without a file name");
    }
    if (this.isAlreadyProcessed(fileName)) {
      throw new LedgerWriteError(`${fileName} is already recorded in ${this.ledgerPath}`);
    }

    const entry: LedgerEntry = Object.freeze({ fileName, fullImageURL, thumbImageURL });
    const record = encodeRecord(entry);
    const previousLength = this.byteLength;

    try {
      await this.handle.appendFile(record, { encoding: "utf-8" });
      await this.handle.sync();
    } catch (error) {
      let rollback = "";
      try {
        await this.handle.truncate(previousLength);
      } catch (truncateError) {
        rollback = `; rollback failed: ${truncateError instanceof Error ? truncateError.message : String(truncateError)}`;
      }
      throw new LedgerWriteError(`Failed to record ${fileName} in ${this.ledgerPath}${rollback}`, { cause: error });
    }

    this.byteLength = previousLength + Buffer.byteLength(record, "utf-8");
    this.records.push(entry);
    this.logger?.debug({ fileName }, "Recorded uploaded image");
    return entry;
  }

  entries(): readonly LedgerEntry[] {
    return [...this.records];
  }

  /** Release the file handle and the access guard. Safe to call twice. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.handle.close();
    } finally {
      this.guard.release();
    }
  }
}

/**
 * Run `fn` with the ledger of `directoryPath` open, closing it on every exit
 * path.
 */
export async function withUploadLedger<T>(
  directoryPath: string,
  fn: (ledger: UploadLedger) => Promise<T>,
  options: UploadLedgerOptions = {}
): Promise<T> {
  const ledger = await UploadLedger.open(directoryPath, options);
  try {
    return await fn(ledger);
  } finally {
    await ledger.close();
  }
}
