import type { LedgerRequest, Urgency } from "../types";

export type OrderStage = "ARTICLE" | "QUANTITY" | "URGENCY" | "COST_CENTER" | "ATTACHMENT" | "CONFIRM";

export type OrderDraft = {
  article?: string;
  quantity?: string;
  urgency?: Urgency;
  costCenter?: string;
  attachmentReference?: string;
};

export type OrderSession = { flow: "order"; stage: OrderStage; draft: OrderDraft };

export type CancelSession = { flow: "cancel"; stage: "SELECTING"; pending: LedgerRequest[] };

export type Session = OrderSession | CancelSession;

type Entry = { session: Session; touchedAt: number };

/**
 * Scratch state of the active flow per identity. At most one flow is active
 * for an identity; starting another replaces it. Nothing here survives a
 * restart of the process.
 */
export class SessionStore {
  private entries = new Map<string, Entry>();

  /** ttlMs <= 0 keeps idle sessions forever. */
  constructor(private ttlMs = 60 * 60 * 1000, private clock: () => number = Date.now) {}

  private expired(entry: Entry, now: number): boolean {
    return this.ttlMs > 0 && now - entry.touchedAt > this.ttlMs;
  }

  get(identity: string): Session | undefined {
    const entry = this.entries.get(identity);
    if (!entry) return undefined;
    if (this.expired(entry, this.clock())) {
      this.entries.delete(identity);
      return undefined;
    }
    return entry.session;
  }

  /** Also drops every other expired session, so abandoned flows do not pile up. */
  set(identity: string, session: Session): void {
    const now = this.clock();
    for (const [key, entry] of this.entries) {
      if (this.expired(entry, now)) this.entries.delete(key);
    }
    this.entries.set(identity, { session, touchedAt: now });
  }

  clear(identity: string): boolean {
    return this.entries.delete(identity);
  }

  get size(): number {
    return this.entries.size;
  }
}
