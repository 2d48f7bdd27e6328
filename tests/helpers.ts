import axios from "axios";
import { ConnectionError, WriteError } from "../src/ledger/errors";
import type { LedgerSheet } from "../src/ledger/LedgerStore";
import { MemoryLedgerStore } from "../src/ledger/MemoryLedgerStore";
import type { ChatTransport, ChoiceLayout } from "../src/messaging/ChatTransport";
import { TelegramTransport } from "../src/messaging/telegramAdapter";
import type { ChatEvent, ChoiceOption, Sender } from "../src/types";

export type Outbound =
  | { kind: "text"; identity: string; text: string }
  | { kind: "photo"; identity: string; attachmentHandle: string; caption: string }
  | { kind: "choices"; identity: string; text: string; options: ChoiceOption[]; layout?: ChoiceLayout };

export class RecordingTransport implements ChatTransport {
  readonly sent: Outbound[] = [];
  readonly failingIdentities = new Set<string>();

  private check(identity: string) {
    if (this.failingIdentities.has(identity)) throw new Error(`chat ${identity} unreachable`);
  }

  async sendText(identity: string, text: string): Promise<void> {
    this.check(identity);
    this.sent.push({ kind: "text", identity, text });
  }

  async sendPhoto(identity: string, attachmentHandle: string, caption: string): Promise<void> {
    this.check(identity);
    this.sent.push({ kind: "photo", identity, attachmentHandle, caption });
  }

  async offerChoices(identity: string, prompt: string, options: ChoiceOption[], layout?: ChoiceLayout): Promise<void> {
    this.check(identity);
    this.sent.push({ kind: "choices", identity, text: prompt, options, layout });
  }

  to(identity: string): Outbound[] {
    return this.sent.filter(m => m.identity === identity);
  }

  lastTo(identity: string): Outbound | undefined {
    const all = this.to(identity);
    return all[all.length - 1];
  }

  lastTextTo(identity: string): string {
    const last = this.lastTo(identity);
    if (!last || last.kind === "photo") return "";
    return last.text;
  }
}

/** In-memory ledger whose connection or writes can be made to fail. */
export class FlakyLedgerStore extends MemoryLedgerStore {
  failConnect = false;
  failWrites = false;

  async connect(): Promise<LedgerSheet> {
    if (this.failConnect) throw new ConnectionError("store offline");
    return this;
  }

  async appendRow(row: string[]): Promise<void> {
    if (this.failWrites) throw new WriteError("append rejected");
    return super.appendRow(row);
  }

  async updateCell(rowIndex: number, column: number, value: string): Promise<void> {
    if (this.failWrites) throw new WriteError("update rejected");
    return super.updateCell(rowIndex, column, value);
  }
}

export const MAX: Sender = { firstName: "Max", lastName: "Muster" };

export function text(identity: string, body: string, sender: Sender = MAX): ChatEvent {
  return { kind: "text", identity, sender, text: body };
}

export function command(identity: string, name: string, args: string[] = [], sender: Sender = MAX): ChatEvent {
  return { kind: "command", identity, sender, name, args };
}

export function photo(identity: string, attachmentHandle: string, sender: Sender = MAX): ChatEvent {
  return { kind: "photo", identity, sender, attachmentHandle };
}

export function select(identity: string, choiceToken: string, sender: Sender = MAX): ChatEvent {
  return { kind: "selection", identity, sender, choiceToken };
}

export type RowInput = {
  orderNumber: string;
  createdAt?: string;
  requesterName?: string;
  requesterIdentity?: string;
  article?: string;
  quantity?: string;
  urgency?: string;
  costCenter?: string;
  status?: string;
  fulfilledAt?: string;
};

export function row(r: RowInput): string[] {
  return [
    r.orderNumber,
    r.createdAt ?? "2026-10-19 09:00:00",
    r.requesterName ?? "Max Muster",
    r.requesterIdentity ?? "U1",
    r.article ?? "Toner",
    r.quantity ?? "1",
    r.urgency ?? "Normal",
    r.costCenter ?? "Lager",
    r.status ?? "",
    r.fulfilledAt ?? "",
  ];
}

export type TelegramCall = { url: string | undefined; body: unknown };

/** TelegramTransport over an axios instance whose adapter records each request. */
export function recordingTelegram() {
  const calls: TelegramCall[] = [];
  const http = axios.create({
    baseURL: "https://telegram.invalid/bottest-secret",
    adapter: async config => {
      calls.push({ url: config.url, body: JSON.parse(String(config.data)) });
      return { data: { ok: true }, status: 200, statusText: "OK", headers: {}, config };
    }
  });
  return { calls, transport: new TelegramTransport("test-secret", http) };
}
