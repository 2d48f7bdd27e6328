import type { LedgerSheet, LedgerStore } from "./LedgerStore";
import { WriteError } from "./errors";
import { HEADER } from "./rows";

/** Keeps the ledger in process. Used for local runs and tests. */
export class MemoryLedgerStore implements LedgerStore, LedgerSheet {
  readonly rows: string[][];

  constructor(dataRows: string[][] = []) {
    this.rows = [[...HEADER], ...dataRows.map(r => [...r])];
  }

  async connect(): Promise<LedgerSheet> {
    return this;
  }

  async readAllRows(): Promise<string[][]> {
    return this.rows.map(r => [...r]);
  }

  async appendRow(row: string[]): Promise<void> {
    this.rows.push([...row]);
  }

  async updateCell(rowIndex: number, column: number, value: string): Promise<void> {
    const row = this.rows[rowIndex - 1];
    if (!row) throw new WriteError(`row ${rowIndex} does not exist`);
    while (row.length < column) row.push("");
    row[column - 1] = value;
  }
}
