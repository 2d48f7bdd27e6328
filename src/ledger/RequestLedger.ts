import { startOfWeek } from "date-fns";
import { ConnectionError, LedgerError } from "./errors";
import type { LedgerSheet, LedgerStore } from "./LedgerStore";
import { OrderCounter } from "./OrderCounter";
import { Column, dataRows, formatCreatedAt, formatFulfilledAt, fromRow, parseCreatedAt, statusOf, toRow } from "./rows";
import { CANCELLED_STATUS } from "../types";
import type { AppendedRequest, LedgerRequest, NewRequest, WeeklyAggregate } from "../types";
import { withLock } from "../utils/locks";
import { errorMessage, logError, logInfo, logWarn } from "../utils/logger";

export const SEARCH_LIMIT = 10;

export type LedgerFailureKind = "unavailable" | "persist_failed" | "row_mismatch" | "not_pending";

export type LedgerFailure = { kind: LedgerFailureKind; message: string };

export type LedgerResult<T> = { ok: true; value: T } | { ok: false; error: LedgerFailure };

class CancelRefused extends Error {
  constructor(readonly kind: "row_mismatch" | "not_pending", message: string) {
    super(message);
  }
}

function failure(e: unknown): LedgerFailure {
  if (e instanceof ConnectionError) return { kind: "unavailable", message: errorMessage(e) };
  return { kind: "persist_failed", message: errorMessage(e) };
}

export class RequestLedger {
  private counter = new OrderCounter();

  constructor(private store: LedgerStore, private lockKey = "ledger") {}

  private async run<T>(operation: string, fn: (sheet: LedgerSheet) => Promise<T>): Promise<LedgerResult<T>> {
    try {
      const sheet = await this.store.connect();
      return { ok: true, value: await fn(sheet) };
    } catch (e) {
      if (e instanceof CancelRefused) {
        logWarn(`ledger ${operation} refused`, { reason: e.message });
        return { ok: false, error: { kind: e.kind, message: e.message } };
      }
      if (!(e instanceof LedgerError)) throw e;
      logError(`ledger ${operation} failed`, { error: errorMessage(e), cause: e.cause === undefined ? undefined : errorMessage(e.cause) });
      return { ok: false, error: failure(e) };
    }
  }

  private async rows(sheet: LedgerSheet): Promise<LedgerRequest[]> {
    return dataRows(await sheet.readAllRows());
  }

  append(request: NewRequest, now: Date = new Date()): Promise<LedgerResult<AppendedRequest>> {
    return this.run("append", sheet =>
      withLock(this.lockKey, async () => {
        const rowCount = (await sheet.readAllRows()).length;
        const appended: AppendedRequest = {
          ...request,
          orderNumber: this.counter.reserve(rowCount),
          createdAt: formatCreatedAt(now)
        };
        await sheet.appendRow(toRow(appended));
        logInfo("saved order", { orderNumber: appended.orderNumber, requester: appended.requesterName, article: appended.article });
        return appended;
      })
    );
  }

  listPending(identity: string): Promise<LedgerResult<LedgerRequest[]>> {
    return this.run("listPending", async sheet =>
      (await this.rows(sheet)).filter(r => r.requesterIdentity === identity && statusOf(r.fulfillmentStatus) === "pending")
    );
  }

  /**
   * Marks the row cancelled. Ownership is not checked here: rowPosition must
   * come from listPending for the caller's identity. With expectedOrderNumber
   * the row is re-read first and the update refused if it no longer holds
   * that order or is no longer pending.
   */
  cancel(rowPosition: number, now: Date = new Date(), expectedOrderNumber?: string): Promise<LedgerResult<void>> {
    return this.run("cancel", sheet =>
      withLock(this.lockKey, async () => {
        if (expectedOrderNumber !== undefined) {
          const cells = (await sheet.readAllRows())[rowPosition - 1];
          const current = cells ? fromRow(cells, rowPosition) : null;
          if (!current || current.orderNumber !== expectedOrderNumber) {
            throw new CancelRefused("row_mismatch", `row ${rowPosition} does not hold ${expectedOrderNumber}`);
          }
          if (statusOf(current.fulfillmentStatus) !== "pending") {
            throw new CancelRefused("not_pending", `${expectedOrderNumber} is no longer pending`);
          }
        }
        await sheet.updateCell(rowPosition, Column.fulfillmentStatus, CANCELLED_STATUS);
        await sheet.updateCell(rowPosition, Column.fulfilledAt, formatFulfilledAt(now));
        logInfo("cancelled order", { rowPosition, orderNumber: expectedOrderNumber });
      })
    );
  }

  search(term: string): Promise<LedgerResult<LedgerRequest[]>> {
    const needle = term.toLowerCase();
    return this.run("search", async sheet => {
      const matches: LedgerRequest[] = [];
      for (const r of await this.rows(sheet)) {
        if ([r.article, r.requesterName, r.costCenter].some(field => field.toLowerCase().includes(needle))) {
          matches.push(r);
          if (matches.length === SEARCH_LIMIT) break;
        }
      }
      return matches;
    });
  }

  weeklyAggregate(now: Date = new Date()): Promise<LedgerResult<WeeklyAggregate>> {
    const weekStart = startOfWeek(now, { weekStartsOn: 1 });
    return this.run("weeklyAggregate", async sheet => {
      const aggregate: WeeklyAggregate = { weekStart, total: 0, pending: 0, fulfilled: 0, cancelled: 0, byCostCenter: new Map() };
      for (const r of await this.rows(sheet)) {
        const createdAt = parseCreatedAt(r.createdAt);
        if (!createdAt || createdAt < weekStart || createdAt > now) continue;
        aggregate.total += 1;
        aggregate[statusOf(r.fulfillmentStatus)] += 1;
        aggregate.byCostCenter.set(r.costCenter, (aggregate.byCostCenter.get(r.costCenter) ?? 0) + 1);
      }
      return aggregate;
    });
  }
}
