import type { RequestLedger } from "../ledger/RequestLedger";
import { URGENCY_LABELS } from "../ledger/rows";
import type { ChatTransport } from "../messaging/ChatTransport";
import type { AdminNotifier } from "../notifications/AdminNotifier";
import {
  ANSWER_LAST_QUESTION,
  articlePrompt,
  ATTACHMENT_REMINDER,
  attachmentPrompt,
  confirmationPrompt,
  COST_CENTER_INVALID,
  costCenterPrompt,
  EMPTY_ANSWER,
  ORDER_ABORTED,
  PHOTO_NOT_EXPECTED,
  PHOTO_RECEIVED,
  quantityPrompt,
  RESTARTING,
  SAVE_FAILED,
  STALE_CHOICE,
  submittedReply,
  URGENCY_INVALID,
  urgencyPrompt,
  USE_BUTTONS
} from "../notifications/format";
import type { ChatEvent, ChoiceOption, RequestDetails, Sender, Urgency } from "../types";
import type { OrderDraft, OrderSession, SessionStore } from "./SessionStore";

export const SKIP_COMMANDS = ["weiter", "skip"];

export const ConfirmToken = {
  submit: "confirm:submit",
  restart: "confirm:restart",
  abort: "confirm:abort"
} as const;

const URGENCY_PREFIX = "urgency:";
const COST_CENTER_PREFIX = "cc:";

const URGENCY_OPTIONS: ChoiceOption[] = [
  { label: `🔴 ${URGENCY_LABELS.urgent}`, token: `${URGENCY_PREFIX}urgent` },
  { label: `🟢 ${URGENCY_LABELS.normal}`, token: `${URGENCY_PREFIX}normal` }
];

const CONFIRM_OPTIONS: ChoiceOption[] = [
  { label: "✅ Bestätigen & Absenden", token: ConfirmToken.submit },
  { label: "✏️ Nochmal von vorne", token: ConfirmToken.restart },
  { label: "❌ Abbrechen", token: ConfirmToken.abort }
];

/** Accepts "🔴 Dringend", "dringend", "urgent", "Normal", ... */
export function parseUrgency(input: string): Urgency | null {
  const word = input.toLowerCase().replace(/[^\p{L}]/gu, "");
  if (word === "dringend" || word === "urgent") return "urgent";
  if (word === "normal") return "normal";
  return null;
}

export function requesterName(sender: Sender): string {
  return `${sender.firstName} ${sender.lastName ?? ""}`.trim();
}

function completeDraft(draft: OrderDraft): RequestDetails | null {
  const { article, quantity, urgency, costCenter } = draft;
  if (article === undefined || quantity === undefined || urgency === undefined || costCenter === undefined) return null;
  return { article, quantity, urgency, costCenter, attachmentReference: draft.attachmentReference ?? "" };
}

export type OrderFlowDeps = {
  sessions: SessionStore;
  ledger: RequestLedger;
  transport: ChatTransport;
  notifier: AdminNotifier;
  costCenters: string[];
  now?: () => Date;
};

/**
 * ARTICLE -> QUANTITY -> URGENCY -> COST_CENTER -> ATTACHMENT -> CONFIRM.
 * Abort from any stage is handled by the processor through abort().
 */
export class OrderFlow {
  private now: () => Date;

  constructor(private deps: OrderFlowDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  private get transport() {
    return this.deps.transport;
  }

  private costCenterOptions(): ChoiceOption[] {
    return this.deps.costCenters.map((name, i) => ({ label: name, token: `${COST_CENTER_PREFIX}${i}` }));
  }

  private resolveCostCenter(event: ChatEvent): string | null {
    if (event.kind === "selection" && event.choiceToken.startsWith(COST_CENTER_PREFIX)) {
      const index = Number(event.choiceToken.slice(COST_CENTER_PREFIX.length));
      return Number.isInteger(index) ? this.deps.costCenters[index] ?? null : null;
    }
    if (event.kind === "text") {
      const wanted = event.text.trim().toLowerCase();
      return this.deps.costCenters.find(c => c.toLowerCase() === wanted) ?? null;
    }
    return null;
  }

  private save(identity: string, session: OrderSession) {
    this.deps.sessions.set(identity, session);
  }

  async start(identity: string, sender: Sender): Promise<void> {
    this.save(identity, { flow: "order", stage: "ARTICLE", draft: {} });
    await this.transport.sendText(identity, articlePrompt(sender.firstName));
  }

  async abort(identity: string): Promise<void> {
    this.deps.sessions.clear(identity);
    await this.transport.sendText(identity, ORDER_ABORTED);
  }

  async handle(event: ChatEvent, session: OrderSession): Promise<void> {
    const { identity } = event;
    const { draft } = session;

    if (event.kind === "photo" && session.stage !== "ATTACHMENT") {
      await this.transport.sendText(identity, PHOTO_NOT_EXPECTED);
      return;
    }

    switch (session.stage) {
      case "ARTICLE":
      case "QUANTITY": {
        if (event.kind !== "text") return this.unexpected(event);
        const answer = event.text.trim();
        if (!answer) {
          await this.transport.sendText(identity, EMPTY_ANSWER);
          return;
        }
        if (session.stage === "ARTICLE") {
          this.save(identity, { ...session, stage: "QUANTITY", draft: { ...draft, article: answer } });
          await this.transport.sendText(identity, quantityPrompt(answer));
        } else {
          this.save(identity, { ...session, stage: "URGENCY", draft: { ...draft, quantity: answer } });
          await this.transport.offerChoices(identity, urgencyPrompt(answer), URGENCY_OPTIONS, { columns: 2 });
        }
        return;
      }

      case "URGENCY": {
        const raw =
          event.kind === "selection" && event.choiceToken.startsWith(URGENCY_PREFIX)
            ? event.choiceToken.slice(URGENCY_PREFIX.length)
            : event.kind === "text"
              ? event.text
              : null;
        if (raw === null) return this.unexpected(event);
        const urgency = parseUrgency(raw);
        if (!urgency) {
          await this.transport.offerChoices(identity, URGENCY_INVALID, URGENCY_OPTIONS, { columns: 2 });
          return;
        }
        this.save(identity, { ...session, stage: "COST_CENTER", draft: { ...draft, urgency } });
        await this.transport.offerChoices(identity, costCenterPrompt(URGENCY_LABELS[urgency]), this.costCenterOptions(), { columns: 3 });
        return;
      }

      case "COST_CENTER": {
        if (event.kind === "selection" && !event.choiceToken.startsWith(COST_CENTER_PREFIX)) return this.unexpected(event);
        if (event.kind !== "selection" && event.kind !== "text") return this.unexpected(event);
        const costCenter = this.resolveCostCenter(event);
        if (!costCenter) {
          await this.transport.offerChoices(identity, COST_CENTER_INVALID, this.costCenterOptions(), { columns: 3 });
          return;
        }
        this.save(identity, { ...session, stage: "ATTACHMENT", draft: { ...draft, costCenter } });
        await this.transport.sendText(identity, attachmentPrompt(costCenter));
        return;
      }

      case "ATTACHMENT": {
        let attachmentReference: string;
        if (event.kind === "photo") {
          attachmentReference = event.attachmentHandle;
          await this.transport.sendText(identity, PHOTO_RECEIVED);
        } else if (event.kind === "command" && SKIP_COMMANDS.includes(event.name)) {
          attachmentReference = "";
        } else if (event.kind === "text") {
          await this.transport.sendText(identity, ATTACHMENT_REMINDER);
          return;
        } else {
          return this.unexpected(event);
        }
        return this.showConfirmation(identity, { ...session, stage: "CONFIRM", draft: { ...draft, attachmentReference } });
      }

      case "CONFIRM": {
        if (event.kind !== "selection") {
          await this.transport.sendText(identity, USE_BUTTONS);
          return;
        }
        switch (event.choiceToken) {
          case ConfirmToken.submit:
            return this.submit(identity, event.sender, draft);
          case ConfirmToken.restart:
            this.save(identity, { flow: "order", stage: "ARTICLE", draft: {} });
            await this.transport.sendText(identity, RESTARTING);
            await this.transport.sendText(identity, articlePrompt());
            return;
          case ConfirmToken.abort:
            return this.abort(identity);
          default:
            return this.unexpected(event);
        }
      }
    }
  }

  private async showConfirmation(identity: string, session: OrderSession): Promise<void> {
    const details = completeDraft(session.draft);
    if (!details) {
      this.save(identity, { flow: "order", stage: "ARTICLE", draft: {} });
      await this.transport.sendText(identity, articlePrompt());
      return;
    }
    this.save(identity, session);
    await this.transport.offerChoices(identity, confirmationPrompt(details), CONFIRM_OPTIONS);
  }

  private async submit(identity: string, sender: Sender, draft: OrderDraft): Promise<void> {
    const details = completeDraft(draft);
    this.deps.sessions.clear(identity);
    if (!details) {
      await this.transport.sendText(identity, SAVE_FAILED);
      return;
    }
    const result = await this.deps.ledger.append(
      { ...details, requesterName: requesterName(sender), requesterIdentity: identity },
      this.now()
    );
    if (!result.ok) {
      await this.transport.sendText(identity, SAVE_FAILED);
      return;
    }
    await this.transport.sendText(identity, submittedReply(result.value));
    this.deps.notifier.newRequest(result.value);
  }

  private async unexpected(event: ChatEvent): Promise<void> {
    await this.transport.sendText(event.identity, event.kind === "selection" ? STALE_CHOICE : ANSWER_LAST_QUESTION);
  }
}
