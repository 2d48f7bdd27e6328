export class LedgerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The backing store could not be reached or authenticated. */
export class ConnectionError extends LedgerError {}

/** A read round-trip failed after connecting. */
export class PersistError extends LedgerError {}

/** An append or cell update failed after connecting. */
export class WriteError extends PersistError {}
