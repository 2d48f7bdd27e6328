import type { ChoiceOption } from "../types";

export type ChoiceLayout = {
  /** Options per keyboard row. */
  columns?: number;
};

/** Outbound side of the chat: every reply the bot makes goes through here. */
export interface ChatTransport {
  sendText(identity: string, text: string): Promise<void>;
  sendPhoto(identity: string, attachmentHandle: string, caption: string): Promise<void>;
  offerChoices(identity: string, prompt: string, options: ChoiceOption[], layout?: ChoiceLayout): Promise<void>;
}
