export class LedgerError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Another live holder owns the ledger of this directory. Never retried. */
export class LedgerLockUnavailableError extends LedgerError {
  constructor(
    public readonly ledgerPath: string,
    public readonly ownerPid: number | null,
    options?: ErrorOptions
  ) {
    super(
      ownerPid === null
        ? `Ledger ${ledgerPath} is locked by another process`
        : `Ledger ${ledgerPath} is locked by process ${ownerPid}`,
      options
    );
  }
}

/** The ledger file failed structural validation; the operator has to remove it. */
export class LedgerCorruptError extends LedgerError {
  constructor(
    public readonly ledgerPath: string,
    public readonly lineNumber: number,
    reason: string
  ) {
    super(
      `Ledger ${ledgerPath} is corrupted at line ${lineNumber} (${reason}); remove it manually to start over`
    );
  }
}

export class LedgerWriteError extends LedgerError {}
