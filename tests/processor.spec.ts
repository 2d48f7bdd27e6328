import { describe, it, expect } from "vitest";
import { SessionStore } from "../src/conversation/SessionStore";
import { RequestLedger } from "../src/ledger/RequestLedger";
import { AdminNotifier } from "../src/notifications/AdminNotifier";
import {
  articlePrompt,
  HELP_TEXT,
  identityText,
  NO_ACTIVE_FLOW,
  NOTHING_TO_ABORT,
  quantityPrompt,
  SEARCH_USAGE,
  STALE_CHOICE,
  STATS_FAILED,
  TRY_AGAIN_LATER,
  UNKNOWN_COMMAND,
  urgencyPrompt
} from "../src/notifications/format";
import { Processor } from "../src/pipeline/processor";
import { command, FlakyLedgerStore, RecordingTransport, row, select, text } from "./helpers";

const NOW = new Date(2026, 9, 21, 12, 0, 0);
const ADMIN = "ADMIN";

function setup(opts: { adminChatId?: string; sessions?: SessionStore; transport?: RecordingTransport } = {}) {
  const store = new FlakyLedgerStore([
    row({ orderNumber: "#001", requesterIdentity: "U1", article: "Toner" }),
    row({ orderNumber: "#002", requesterIdentity: "U2", requesterName: "Anna Schmidt", article: "Papier", costCenter: "HR", status: "x" }),
    row({ orderNumber: "#003", requesterIdentity: "U2", article: "Kabel", createdAt: "2026-10-12 08:00:00" })
  ]);
  const transport = opts.transport ?? new RecordingTransport();
  const notifier = new AdminNotifier(transport, opts.adminChatId);
  const processor = new Processor({
    ledger: new RequestLedger(store),
    transport,
    notifier,
    costCenters: ["Lager", "HR"],
    sessions: opts.sessions,
    now: () => NOW
  });
  return { store, transport, notifier, processor };
}

/** Delivers every message only after a macrotask, so handlers overlap unless serialized. */
class SlowTransport extends RecordingTransport {
  async sendText(identity: string, body: string): Promise<void> {
    await new Promise(resolve => setTimeout(resolve, 5));
    return super.sendText(identity, body);
  }
}

describe("commands", () => {
  it("lists the identity's pending requests", async () => {
    const { transport, processor } = setup();
    await processor.handleEvent(command("U1", "meine_bestellungen"));
    expect(transport.lastTextTo("U1")).toBe(
      "📋 Deine offenen Bestellungen:\n\n" +
        "#001 - Toner\n   Menge: 1 | Normal\n   Kostenstelle: Lager\n   Datum: 2026-10-19 09:00:00\n\n" +
        "/stornieren - Bestellung stornieren\n/start - Neue Bestellung"
    );
  });

  it("answers the short alias with an empty list", async () => {
    const { transport, processor } = setup();
    await processor.handleEvent(command("U9", "bestellungen"));
    expect(transport.lastTextTo("U9")).toBe("📋 Du hast keine offenen Bestellungen.\n\n/start - Neue Bestellung aufgeben");
  });

  it("reports an unavailable ledger when listing", async () => {
    const { store, transport, processor } = setup();
    store.failConnect = true;
    await processor.handleEvent(command("U1", "meine_bestellungen"));
    expect(transport.lastTextTo("U1")).toBe(TRY_AGAIN_LATER);
  });

  it("searches with the joined arguments", async () => {
    const { transport, processor } = setup();
    await processor.handleEvent(command("U1", "suche", ["anna", "schmidt"]));
    expect(transport.lastTextTo("U1")).toBe(
      "🔍 Suchergebnisse für 'anna schmidt':\n\n✅ #002 - Papier\n   Anna Schmidt | 1 | HR\n   2026-10-19 09:00:00"
    );
  });

  it("explains search usage without a term", async () => {
    const { transport, processor } = setup();
    await processor.handleEvent(command("U1", "suche"));
    expect(transport.lastTextTo("U1")).toBe(SEARCH_USAGE);
  });

  it("says so when nothing matches", async () => {
    const { transport, processor } = setup();
    await processor.handleEvent(command("U1", "suche", ["Bagger"]));
    expect(transport.lastTextTo("U1")).toBe('🔍 Keine Ergebnisse für "Bagger"\n\nVersuche einen anderen Suchbegriff.');
  });

  it("sends this week's statistics", async () => {
    const { transport, processor } = setup();
    await processor.handleEvent(command("U1", "statistik"));
    expect(transport.lastTextTo("U1")).toBe(
      "📊 Wochenübersicht\n\n📦 Gesamt: 2 Bestellungen\n⏳ Offen: 1\n✅ Bestellt: 1\n❌ Storniert: 0\n\nNach Kostenstelle:\n  Lager: 1\n  HR: 1"
    );
  });

  it("reports failed statistics", async () => {
    const { store, transport, processor } = setup();
    store.failConnect = true;
    await processor.handleEvent(command("U1", "statistik"));
    expect(transport.lastTextTo("U1")).toBe(STATS_FAILED);
  });

  it("shows the identity, help and unknown commands", async () => {
    const { transport, processor } = setup();
    await processor.handleEvent(command("4711", "meine_id"));
    expect(transport.lastTextTo("4711")).toBe(identityText("4711"));
    expect(identityText("4711")).toBe("🔑 Deine Chat-ID: 4711\n\nFüge diese in die .env Datei ein:\nADMIN_CHAT_ID=4711");

    await processor.handleEvent(command("U1", "hilfe"));
    expect(transport.lastTextTo("U1")).toBe(HELP_TEXT);
    await processor.handleEvent(command("U1", "help"));
    expect(transport.lastTextTo("U1")).toBe(HELP_TEXT);
    await processor.handleEvent(command("U1", "bestellen"));
    expect(transport.lastTextTo("U1")).toBe(UNKNOWN_COMMAND);
  });

  it("has nothing to abort without a flow", async () => {
    const { transport, processor } = setup();
    await processor.handleEvent(command("U1", "cancel"));
    expect(transport.lastTextTo("U1")).toBe(NOTHING_TO_ABORT);
  });
});

describe("routing", () => {
  it("answers input outside a flow", async () => {
    const { transport, processor } = setup();
    await processor.handleEvent(text("U1", "Hallo"));
    expect(transport.lastTextTo("U1")).toBe(NO_ACTIVE_FLOW);
    await processor.handleEvent(command("U1", "weiter"));
    expect(transport.lastTextTo("U1")).toBe(NO_ACTIVE_FLOW);
    await processor.handleEvent(select("U1", "cc:0"));
    expect(transport.lastTextTo("U1")).toBe(STALE_CHOICE);
  });

  it("keeps the running flow across stateless commands", async () => {
    const { transport, processor } = setup();
    await processor.handleEvent(command("U1", "start"));
    await processor.handleEvent(text("U1", "Toner"));
    await processor.handleEvent(command("U1", "meine_bestellungen"));
    await processor.handleEvent(command("U1", "statistik"));
    await processor.handleEvent(text("U1", "4"));

    expect(transport.lastTo("U1")).toMatchObject({ kind: "choices", text: urgencyPrompt("4") });
    expect(processor.sessions.get("U1")).toMatchObject({ stage: "URGENCY", draft: { article: "Toner", quantity: "4" } });
  });

  it("keeps flows of different identities apart", async () => {
    const { processor } = setup();
    await processor.handleEvent(command("U1", "start"));
    await processor.handleEvent(command("U2", "start"));
    await processor.handleEvent(text("U1", "Toner"));

    expect(processor.sessions.get("U1")).toMatchObject({ stage: "QUANTITY", draft: { article: "Toner" } });
    expect(processor.sessions.get("U2")).toMatchObject({ stage: "ARTICLE", draft: {} });
  });

  it("handles one identity's events in arrival order", async () => {
    const { transport, processor } = setup({ transport: new SlowTransport() });
    await Promise.all([
      processor.handleEvent(command("U1", "start")),
      processor.handleEvent(text("U1", "Toner")),
      processor.handleEvent(text("U1", "2"))
    ]);

    expect(transport.to("U1").map(m => (m.kind === "photo" ? "" : m.text))).toEqual([
      articlePrompt("Max"),
      quantityPrompt("Toner"),
      urgencyPrompt("2")
    ]);
    expect(processor.sessions.get("U1")).toMatchObject({ stage: "URGENCY" });
  });

  it("forgets an idle flow after the session timeout", async () => {
    let clock = 0;
    const { transport, processor } = setup({ sessions: new SessionStore(1000, () => clock) });
    await processor.handleEvent(command("U1", "start"));
    clock = 1500;
    await processor.handleEvent(text("U1", "Toner"));
    expect(transport.lastTextTo("U1")).toBe(NO_ACTIVE_FLOW);
  });

  it("survives a transport failure and keeps serving the identity", async () => {
    const { transport, processor } = setup();
    transport.failingIdentities.add("U1");
    await expect(processor.handleEvent(command("U1", "start"))).resolves.toBeUndefined();

    transport.failingIdentities.delete("U1");
    await processor.handleEvent(text("U1", "Toner"));
    expect(transport.lastTextTo("U1")).toBe(quantityPrompt("Toner"));
  });
});

describe("pushWeeklySummary", () => {
  it("needs an admin chat", async () => {
    const { processor } = setup();
    expect(await processor.pushWeeklySummary()).toBe("no_admin");
  });

  it("sends the summary to the admin", async () => {
    const { transport, processor } = setup({ adminChatId: ADMIN });
    expect(await processor.pushWeeklySummary()).toBe("sent");
    expect(transport.lastTextTo(ADMIN).split("\n")[0]).toBe("📅 Wöchentliche Zusammenfassung");
    expect(transport.lastTextTo(ADMIN)).toContain("📦 Gesamt: 2 Bestellungen");
  });

  it("reports an unavailable ledger", async () => {
    const { store, processor } = setup({ adminChatId: ADMIN });
    store.failConnect = true;
    expect(await processor.pushWeeklySummary()).toBe("unavailable");
  });

  it("reports a failed delivery", async () => {
    const { transport, processor } = setup({ adminChatId: ADMIN });
    transport.failingIdentities.add(ADMIN);
    expect(await processor.pushWeeklySummary()).toBe("delivery_failed");
  });
});
