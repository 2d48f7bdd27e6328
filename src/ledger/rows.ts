import { format, isValid, parse } from "date-fns";
import { CANCELLED_STATUS } from "../types";
import type { AppendedRequest, LedgerRequest, RequestStatus, Urgency } from "../types";

export const HEADER = [
  "BestellNr",
  "Zeitstempel",
  "Mitarbeiter",
  "ChatId",
  "Artikel",
  "Menge",
  "Dringlichkeit",
  "Kostenstelle",
  "Bestellt?",
  "Bestellt am",
  "Foto"
];

// 1-indexed sheet columns
export const Column = {
  orderNumber: 1,
  createdAt: 2,
  requesterName: 3,
  requesterIdentity: 4,
  article: 5,
  quantity: 6,
  urgency: 7,
  costCenter: 8,
  fulfillmentStatus: 9,
  fulfilledAt: 10,
  attachmentReference: 11
} as const;

// Rows shorter than this carry no cost center and are skipped by every query.
const MIN_CELLS = Column.costCenter;

const CREATED_AT_FORMAT = "yyyy-MM-dd HH:mm:ss";
const FULFILLED_AT_FORMAT = "yyyy-MM-dd HH:mm";

export const URGENCY_LABELS: Record<Urgency, string> = {
  urgent: "Dringend",
  normal: "Normal"
};

export function formatCreatedAt(date: Date): string {
  return format(date, CREATED_AT_FORMAT);
}

export function formatFulfilledAt(date: Date): string {
  return format(date, FULFILLED_AT_FORMAT);
}

export function parseCreatedAt(value: string): Date | null {
  const parsed = parse(value.trim(), CREATED_AT_FORMAT, new Date(0));
  return isValid(parsed) ? parsed : null;
}

// Older ledgers marked cancellations in German; only CANCELLED is written.
const CANCELLED_MARKERS = [CANCELLED_STATUS, "STORNIERT"];

export function statusOf(fulfillmentStatus: string): RequestStatus {
  const status = fulfillmentStatus.trim().toUpperCase();
  if (status === "") return "pending";
  if (CANCELLED_MARKERS.includes(status)) return "cancelled";
  return "fulfilled";
}

export function toRow(request: AppendedRequest): string[] {
  return [
    request.orderNumber,
    request.createdAt,
    request.requesterName,
    request.requesterIdentity,
    request.article,
    request.quantity,
    URGENCY_LABELS[request.urgency],
    request.costCenter,
    "",
    "",
    request.attachmentReference
  ];
}

export function fromRow(cells: string[], rowPosition: number): LedgerRequest | null {
  if (cells.length < MIN_CELLS) return null;
  const cell = (column: number) => cells[column - 1] ?? "";
  return {
    rowPosition,
    orderNumber: cell(Column.orderNumber),
    createdAt: cell(Column.createdAt),
    requesterName: cell(Column.requesterName),
    requesterIdentity: cell(Column.requesterIdentity),
    article: cell(Column.article),
    quantity: cell(Column.quantity),
    urgency: cell(Column.urgency),
    costCenter: cell(Column.costCenter),
    fulfillmentStatus: cell(Column.fulfillmentStatus),
    fulfilledAt: cell(Column.fulfilledAt),
    attachmentReference: cell(Column.attachmentReference)
  };
}

/** Data rows (header skipped) that carry the full request layout. */
export function dataRows(rows: string[][]): LedgerRequest[] {
  const requests: LedgerRequest[] = [];
  rows.slice(1).forEach((cells, i) => {
    const request = fromRow(cells, i + 2);
    if (request) requests.push(request);
  });
  return requests;
}
