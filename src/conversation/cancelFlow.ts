import type { RequestLedger } from "../ledger/RequestLedger";
import type { ChatTransport } from "../messaging/ChatTransport";
import type { AdminNotifier } from "../notifications/AdminNotifier";
import {
  alreadyProcessed,
  CANCEL_ABORTED,
  CANCEL_FAILED,
  CANCEL_PROMPT,
  cancelledReply,
  cancelOptionLabel,
  NOTHING_TO_CANCEL,
  STALE_CHOICE,
  TRY_AGAIN_LATER,
  USE_BUTTONS
} from "../notifications/format";
import type { ChatEvent, ChoiceOption, Sender } from "../types";
import type { CancelSession, SessionStore } from "./SessionStore";

const CANCEL_PREFIX = "cancel:";
export const CANCEL_ABORT_TOKEN = `${CANCEL_PREFIX}abort`;

export function cancelToken(rowPosition: number): string {
  return `${CANCEL_PREFIX}${rowPosition}`;
}

export type CancelFlowDeps = {
  sessions: SessionStore;
  ledger: RequestLedger;
  transport: ChatTransport;
  notifier: AdminNotifier;
  now?: () => Date;
};

export class CancelFlow {
  private now: () => Date;

  constructor(private deps: CancelFlowDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async start(identity: string): Promise<void> {
    const { sessions, ledger, transport } = this.deps;
    sessions.clear(identity);
    const pending = await ledger.listPending(identity);
    if (!pending.ok) {
      await transport.sendText(identity, TRY_AGAIN_LATER);
      return;
    }
    if (pending.value.length === 0) {
      await transport.sendText(identity, NOTHING_TO_CANCEL);
      return;
    }

    sessions.set(identity, { flow: "cancel", stage: "SELECTING", pending: pending.value });
    const options: ChoiceOption[] = pending.value.map(r => ({ label: cancelOptionLabel(r), token: cancelToken(r.rowPosition) }));
    options.push({ label: "❌ Abbrechen", token: CANCEL_ABORT_TOKEN });
    await transport.offerChoices(identity, CANCEL_PROMPT, options);
  }

  async abort(identity: string): Promise<void> {
    this.deps.sessions.clear(identity);
    await this.deps.transport.sendText(identity, CANCEL_ABORTED);
  }

  async handle(event: ChatEvent, session: CancelSession): Promise<void> {
    const { identity } = event;
    const { sessions, ledger, transport, notifier } = this.deps;

    if (event.kind !== "selection") {
      await transport.sendText(identity, USE_BUTTONS);
      return;
    }
    if (event.choiceToken === CANCEL_ABORT_TOKEN) return this.abort(identity);
    if (!event.choiceToken.startsWith(CANCEL_PREFIX)) {
      await transport.sendText(identity, STALE_CHOICE);
      return;
    }

    // Only rows offered to this identity can be cancelled.
    const rowPosition = Number(event.choiceToken.slice(CANCEL_PREFIX.length));
    const request = session.pending.find(r => r.rowPosition === rowPosition);
    sessions.clear(identity);
    if (!request) {
      await transport.sendText(identity, CANCEL_FAILED);
      return;
    }

    const result = await ledger.cancel(request.rowPosition, this.now(), request.orderNumber);
    if (!result.ok) {
      await transport.sendText(identity, result.error.kind === "not_pending" ? alreadyProcessed(request.orderNumber) : CANCEL_FAILED);
      return;
    }
    await transport.sendText(identity, cancelledReply(request));
    notifier.cancelled(request, firstNameOf(event.sender));
  }
}

function firstNameOf(sender: Sender): string {
  return sender.firstName || sender.lastName || "";
}
