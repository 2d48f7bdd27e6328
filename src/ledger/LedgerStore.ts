export interface LedgerSheet {
  /** All rows in sheet order, header first. */
  readAllRows(): Promise<string[][]>;
  appendRow(row: string[]): Promise<void>;
  /** rowIndex and column are 1-indexed, as in the sheet. */
  updateCell(rowIndex: number, column: number, value: string): Promise<void>;
}

export interface LedgerStore {
  connect(): Promise<LedgerSheet>;
}
