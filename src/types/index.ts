export type Urgency = "urgent" | "normal";

export const CANCELLED_STATUS = "CANCELLED";

/** One ledger row as read back from the store. */
export type LedgerRequest = {
  rowPosition: number;
  orderNumber: string;
  createdAt: string;
  requesterName: string;
  requesterIdentity: string;
  article: string;
  quantity: string;
  urgency: string;
  costCenter: string;
  fulfillmentStatus: string;
  fulfilledAt: string;
  attachmentReference: string;
};

export type NewRequest = {
  requesterName: string;
  requesterIdentity: string;
  article: string;
  quantity: string;
  urgency: Urgency;
  costCenter: string;
  attachmentReference: string;
};

export type RequestDetails = Omit<NewRequest, "requesterName" | "requesterIdentity">;

export type AppendedRequest = NewRequest & {
  orderNumber: string;
  createdAt: string;
};

export type RequestStatus = "pending" | "fulfilled" | "cancelled";

export type WeeklyAggregate = {
  weekStart: Date;
  total: number;
  pending: number;
  fulfilled: number;
  cancelled: number;
  byCostCenter: Map<string, number>;
};

export type Sender = {
  firstName: string;
  lastName?: string;
};

type EventBase = { identity: string; sender: Sender };

export type TextMessage = EventBase & { kind: "text"; text: string };
export type PhotoMessage = EventBase & { kind: "photo"; attachmentHandle: string };
export type CommandMessage = EventBase & { kind: "command"; name: string; args: string[] };
export type SelectionMessage = EventBase & { kind: "selection"; choiceToken: string };

export type ChatEvent = TextMessage | PhotoMessage | CommandMessage | SelectionMessage;

export type ChoiceOption = {
  label: string;
  token: string;
};
