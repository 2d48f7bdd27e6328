import { CancelFlow } from "../conversation/cancelFlow";
import { OrderFlow, SKIP_COMMANDS } from "../conversation/orderFlow";
import { SessionStore } from "../conversation/SessionStore";
import type { RequestLedger } from "../ledger/RequestLedger";
import type { ChatTransport } from "../messaging/ChatTransport";
import type { AdminNotifier } from "../notifications/AdminNotifier";
import {
  HELP_TEXT,
  identityText,
  NO_ACTIVE_FLOW,
  NOTHING_TO_ABORT,
  pendingList,
  SEARCH_USAGE,
  searchResults,
  STALE_CHOICE,
  STATS_FAILED,
  TRY_AGAIN_LATER,
  UNKNOWN_COMMAND,
  weeklyStats
} from "../notifications/format";
import type { ChatEvent, CommandMessage } from "../types";
import { withLock } from "../utils/locks";
import { errorMessage, logDebug, logError } from "../utils/logger";

export type ProcessorDeps = {
  ledger: RequestLedger;
  transport: ChatTransport;
  notifier: AdminNotifier;
  costCenters: string[];
  sessions?: SessionStore;
  now?: () => Date;
};

export type WeeklySummaryOutcome = "sent" | "no_admin" | "unavailable" | "delivery_failed";

export class Processor {
  readonly sessions: SessionStore;
  private orders: OrderFlow;
  private cancellations: CancelFlow;
  private now: () => Date;

  constructor(private deps: ProcessorDeps) {
    this.sessions = deps.sessions ?? new SessionStore();
    this.now = deps.now ?? (() => new Date());
    const flowDeps = { ...deps, sessions: this.sessions, now: this.now };
    this.orders = new OrderFlow(flowDeps);
    this.cancellations = new CancelFlow(flowDeps);
  }

  /** Events of one identity are handled strictly one after another. */
  handleEvent(event: ChatEvent): Promise<void> {
    return withLock(`session:${event.identity}`, async () => {
      logDebug("chat event", { identity: event.identity, kind: event.kind });
      try {
        await this.dispatch(event);
      } catch (e) {
        logError("handling chat event failed", { identity: event.identity, kind: event.kind, error: errorMessage(e) });
      }
    });
  }

  private async dispatch(event: ChatEvent): Promise<void> {
    if (event.kind === "command" && !this.isFlowInput(event)) {
      return this.command(event);
    }
    const session = this.sessions.get(event.identity);
    if (session?.flow === "order") return this.orders.handle(event, session);
    if (session?.flow === "cancel") return this.cancellations.handle(event, session);
    await this.deps.transport.sendText(event.identity, event.kind === "selection" ? STALE_CHOICE : NO_ACTIVE_FLOW);
  }

  private isFlowInput(event: CommandMessage): boolean {
    return SKIP_COMMANDS.includes(event.name);
  }

  private async command(event: CommandMessage): Promise<void> {
    const { identity } = event;
    const { ledger, transport } = this.deps;

    switch (event.name) {
      case "start":
        return this.orders.start(identity, event.sender);

      case "stornieren":
        return this.cancellations.start(identity);

      case "abbrechen":
      case "cancel": {
        const session = this.sessions.get(identity);
        if (session?.flow === "order") return this.orders.abort(identity);
        if (session?.flow === "cancel") return this.cancellations.abort(identity);
        await transport.sendText(identity, NOTHING_TO_ABORT);
        return;
      }

      case "meine_bestellungen":
      case "bestellungen": {
        const pending = await ledger.listPending(identity);
        await transport.sendText(identity, pending.ok ? pendingList(pending.value) : TRY_AGAIN_LATER);
        return;
      }

      case "suche": {
        const term = event.args.join(" ").trim();
        if (!term) {
          await transport.sendText(identity, SEARCH_USAGE);
          return;
        }
        const results = await ledger.search(term);
        await transport.sendText(identity, results.ok ? searchResults(term, results.value) : TRY_AGAIN_LATER);
        return;
      }

      case "statistik": {
        const stats = await ledger.weeklyAggregate(this.now());
        await transport.sendText(identity, stats.ok ? weeklyStats(stats.value) : STATS_FAILED);
        return;
      }

      case "meine_id":
        await transport.sendText(identity, identityText(identity));
        return;

      case "hilfe":
      case "help":
        await transport.sendText(identity, HELP_TEXT);
        return;

      default:
        await transport.sendText(identity, UNKNOWN_COMMAND);
    }
  }

  /** Pushes this week's statistics to the admin chat on demand. */
  async pushWeeklySummary(): Promise<WeeklySummaryOutcome> {
    if (!this.deps.notifier.enabled) return "no_admin";
    const stats = await this.deps.ledger.weeklyAggregate(this.now());
    if (!stats.ok) return "unavailable";
    return (await this.deps.notifier.weeklySummary(stats.value)) ? "sent" : "delivery_failed";
  }
}
