import type { ChatTransport } from "../messaging/ChatTransport";
import type { AppendedRequest, LedgerRequest, WeeklyAggregate } from "../types";
import { errorMessage, logError } from "../utils/logger";
import { adminCancelled, adminNewRequest, adminPhotoCaption, WEEKLY_SUMMARY_TITLE, weeklyStats } from "./format";

/**
 * Best-effort delivery to the admin chat. Each dispatch runs detached from the
 * caller; failures are logged and dropped.
 */
export class AdminNotifier {
  private inFlight = new Set<Promise<void>>();

  constructor(private transport: ChatTransport, private adminChatId?: string) {}

  get enabled(): boolean {
    return Boolean(this.adminChatId);
  }

  private dispatch(what: string, deliver: (adminChatId: string) => Promise<void>): void {
    const adminChatId = this.adminChatId;
    if (!adminChatId) return;
    const delivery = deliver(adminChatId)
      .catch(e => {
        logError("could not notify admin", { what, error: errorMessage(e) });
      })
      .finally(() => {
        this.inFlight.delete(delivery);
      });
    this.inFlight.add(delivery);
  }

  newRequest(request: AppendedRequest): void {
    this.dispatch(`new order ${request.orderNumber}`, async adminChatId => {
      await this.transport.sendText(adminChatId, adminNewRequest(request));
      if (request.attachmentReference) {
        await this.transport.sendPhoto(adminChatId, request.attachmentReference, adminPhotoCaption(request.orderNumber));
      }
    });
  }

  cancelled(request: LedgerRequest, firstName: string): void {
    this.dispatch(`cancelled order ${request.orderNumber}`, adminChatId =>
      this.transport.sendText(adminChatId, adminCancelled(request, firstName))
    );
  }

  /** Awaited by the manual trigger, unlike the event notifications. */
  async weeklySummary(stats: WeeklyAggregate): Promise<boolean> {
    if (!this.adminChatId) return false;
    try {
      await this.transport.sendText(this.adminChatId, weeklyStats(stats, WEEKLY_SUMMARY_TITLE));
      return true;
    } catch (e) {
      logError("could not send weekly summary", { error: errorMessage(e) });
      return false;
    }
  }

  /** Resolves once every delivery dispatched so far has settled. */
  async flush(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }
}
