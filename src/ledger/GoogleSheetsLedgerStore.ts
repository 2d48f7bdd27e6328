import { google, type sheets_v4 } from "googleapis";
import { z } from "zod";
import { ConnectionError, PersistError, WriteError } from "./errors";
import type { LedgerSheet, LedgerStore } from "./LedgerStore";
import { HEADER } from "./rows";
import { logInfo } from "../utils/logger";

const SCOPES = ["https://www.googleapis.com/auth/spreadsheets"];
const serviceAccountSchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1)
});

export type GoogleSheetsOptions = {
  spreadsheetId: string;
  sheetName: string;
  /** Service-account JSON; takes precedence over keyFile. */
  credentialsJson?: string;
  keyFile?: string;
  timeoutMs?: number;
};

export function columnLetter(column: number): string {
  return String.fromCharCode(64 + column);
}

const LAST_COLUMN = columnLetter(HEADER.length);

function toCells(values: unknown[][] | null | undefined): string[][] {
  return (values ?? []).map(row => row.map(cell => (cell == null ? "" : String(cell))));
}

function parseCredentials(json: string) {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (e) {
    throw new ConnectionError("GOOGLE_CREDENTIALS_JSON is not valid JSON", { cause: e });
  }
  const parsed = serviceAccountSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConnectionError(`service account credentials invalid: ${parsed.error.issues.map(i => i.path.join(".") + ": " + i.message).join("; ")}`);
  }
  return { client_email: parsed.data.client_email, private_key: parsed.data.private_key };
}

class GoogleSheet implements LedgerSheet {
  constructor(private sheets: sheets_v4.Sheets, private spreadsheetId: string, private sheetName: string) {}

  async readAllRows(): Promise<string[][]> {
    try {
      const res = await this.sheets.spreadsheets.values.get({
        spreadsheetId: this.spreadsheetId,
        range: `${this.sheetName}!A:${LAST_COLUMN}`
      });
      return toCells(res.data.values);
    } catch (e) {
      throw new PersistError(`reading ${this.sheetName} failed`, { cause: e });
    }
  }

  async appendRow(row: string[]): Promise<void> {
    try {
      await this.sheets.spreadsheets.values.append({
        spreadsheetId: this.spreadsheetId,
        range: `${this.sheetName}!A1`,
        valueInputOption: "RAW",
        insertDataOption: "INSERT_ROWS",
        requestBody: { values: [row] }
      });
    } catch (e) {
      throw new WriteError(`appending to ${this.sheetName} failed`, { cause: e });
    }
  }

  async updateCell(rowIndex: number, column: number, value: string): Promise<void> {
    const range = `${this.sheetName}!${columnLetter(column)}${rowIndex}`;
    try {
      await this.sheets.spreadsheets.values.update({
        spreadsheetId: this.spreadsheetId,
        range,
        valueInputOption: "RAW",
        requestBody: { values: [[value]] }
      });
    } catch (e) {
      throw new WriteError(`updating ${range} failed`, { cause: e });
    }
  }
}

export class GoogleSheetsLedgerStore implements LedgerStore {
  private sheet: Promise<LedgerSheet> | null = null;

  constructor(private options: GoogleSheetsOptions) {}

  connect(): Promise<LedgerSheet> {
    if (!this.sheet) {
      this.sheet = this.open().catch(e => {
        this.sheet = null;
        throw e;
      });
    }
    return this.sheet;
  }

  private async open(): Promise<LedgerSheet> {
    const { spreadsheetId, sheetName } = this.options;
    const auth = this.options.credentialsJson
      ? new google.auth.GoogleAuth({ credentials: parseCredentials(this.options.credentialsJson), scopes: SCOPES })
      : new google.auth.GoogleAuth({ keyFile: this.options.keyFile, scopes: SCOPES });
    const sheets = google.sheets({ version: "v4", auth, timeout: this.options.timeoutMs ?? 15000 });

    let firstRow: string[][];
    try {
      const res = await sheets.spreadsheets.values.get({ spreadsheetId, range: `${sheetName}!A1:${LAST_COLUMN}1` });
      firstRow = toCells(res.data.values);
    } catch (e) {
      throw new ConnectionError(`cannot open spreadsheet ${spreadsheetId}`, { cause: e });
    }

    const sheet = new GoogleSheet(sheets, spreadsheetId, sheetName);
    if (firstRow.length === 0) {
      await sheet.appendRow(HEADER);
      logInfo("wrote ledger header", { spreadsheetId, sheetName });
    }
    return sheet;
  }
}
